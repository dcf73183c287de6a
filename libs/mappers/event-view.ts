import type { CanonicalEvent, MetadataValue } from "../validation/dto";

interface SummaryBase {
    timestamp: string;
    source: string | null;
}

export type EventSummary = SummaryBase &
    (
        | { signal: "r_peak"; hr_estimate_bpm: number | null }
        | { signal: "st_elev" | "st_depr"; magnitude_mv: number | null; lead: string | null }
        | { signal: "marked_event"; label: string | null }
    );

const RR_KEYS = ["rr_ms", "rr_interval_ms", "rr"];

function numberFrom(v: MetadataValue | undefined): number | undefined {
    if (typeof v === "number") return Number.isFinite(v) ? v : undefined;
    if (typeof v === "string" && v.trim() !== "") {
        const n = Number(v);
        return Number.isFinite(n) ? n : undefined;
    }
    return undefined;
}

function textFrom(v: MetadataValue | undefined): string | null {
    if (v === undefined || v === null) return null;
    return String(v);
}

function round1(n: number) {
    return Math.round(n * 10) / 10;
}

/**
 * bpm reading as-is, else 60000 / R-R interval, taken from metadata or from the
 * gap to the previous R-peak.
 */
export function heartRateEstimate(event: CanonicalEvent, previousPeak?: CanonicalEvent): number | null {
    if (event.unit === "bpm" && event.value !== undefined) return event.value;
    for (const key of RR_KEYS) {
        const rr = numberFrom(event.metadata[key]);
        if (rr !== undefined && rr > 0) return round1(60000 / rr);
    }
    if (previousPeak) {
        const rr = Date.parse(event.timestamp) - Date.parse(previousPeak.timestamp);
        if (rr > 0) return round1(60000 / rr);
    }
    return null;
}

function summarize(event: CanonicalEvent, previousPeak?: CanonicalEvent): EventSummary | undefined {
    const { timestamp, signal, metadata } = event;
    const source = textFrom(metadata.source);
    switch (signal) {
        case "r_peak":
            return { timestamp, source, signal, hr_estimate_bpm: heartRateEstimate(event, previousPeak) };
        case "st_elev":
        case "st_depr":
            return { timestamp, source, signal, magnitude_mv: event.value ?? null, lead: textFrom(metadata.lead) };
        case "marked_event":
            return { timestamp, source, signal, label: textFrom(metadata.label ?? metadata.original_label) };
        case "ecg":
            return undefined; // raw samples are too dense for a summary
    }
}

/** Expects events in ascending time order, as the store returns them. */
export function toEventSummaries(events: readonly CanonicalEvent[]): EventSummary[] {
    const out: EventSummary[] = [];
    let previousPeak: CanonicalEvent | undefined;
    for (const e of events) {
        const s = summarize(e, previousPeak);
        if (s) out.push(s);
        if (e.signal === "r_peak") previousPeak = e;
    }
    return out;
}
