import { z } from "zod";

import { parseInstant } from "../../normalize/timestamp";
import { LiveMetricSampleSchema, type LiveMetricSample } from "../../validation/dto";
import { NotFoundError } from "../../validation/errors";
import { getJson, utcDay } from "./http";
import type { LiveMetricProvider, ProviderDeps } from "./types";

export const FITBIT_API_BASE = "https://api.fitbit.com";

// Older payloads carry `timestamp` + `value.deep`; the current API uses `dateTime` + `value.deepRmssd`.
const HrvEntrySchema = z.object({
    timestamp: z.string().optional(),
    dateTime: z.string().optional(),
    value: z.object({
        deep: z.number().nonnegative().optional(),
        deepRmssd: z.number().nonnegative().optional(),
        dailyRmssd: z.number().nonnegative().optional(),
    }),
});

const BreathEntrySchema = z.object({
    dateTime: z.string().optional(),
    timestamp: z.string().optional(),
    value: z.object({ breathingRate: z.number().positive() }),
});

type Reading = { value: number; at?: Date };

function latest<T>(entries: unknown, schema: z.ZodType<T>, pick: (e: T) => Reading | undefined): Reading | undefined {
    if (!Array.isArray(entries)) return undefined;
    let last: Reading | undefined;
    let discarded = 0;
    for (const raw of entries) {
        const parsed = schema.safeParse(raw);
        const reading = parsed.success ? pick(parsed.data) : undefined;
        if (reading) last = reading;
        else discarded++;
    }
    if (discarded) console.warn("fitbit-entries-discarded", { discarded, total: entries.length });
    return last;
}

function field(doc: unknown, key: string): unknown {
    return typeof doc === "object" && doc !== null ? Object.entries(doc).find(([k]) => k === key)?.[1] : undefined;
}

export class FitbitProvider implements LiveMetricProvider {
    readonly vendor = "fitbit" as const;

    constructor(private readonly deps: ProviderDeps) {}

    async fetchLiveMetric(userId: string): Promise<LiveMetricSample> {
        const { tokens, fetch: fetchImpl = fetch, baseUrl = FITBIT_API_BASE, now = () => new Date() } = this.deps;
        const token = await tokens.getAccessToken(userId);
        const day = utcDay(now());

        const [hrvDoc, brDoc] = await Promise.all([
            getJson(fetchImpl, this.vendor, `${baseUrl}/1/user/-/hrv/date/${day}.json`, token),
            getJson(fetchImpl, this.vendor, `${baseUrl}/1/user/-/br/date/${day}.json`, token),
        ]);

        const hrv = latest(field(hrvDoc, "hrv"), HrvEntrySchema, e => {
            const value = e.value.deepRmssd ?? e.value.deep ?? e.value.dailyRmssd;
            return value === undefined ? undefined : { value, at: parseInstant(e.timestamp ?? e.dateTime) };
        });
        const br = latest(field(brDoc, "br"), BreathEntrySchema, e => ({
            value: e.value.breathingRate,
            at: parseInstant(e.timestamp ?? e.dateTime),
        }));

        if (!hrv || !br) throw new NotFoundError(`no fitbit HRV/breathing data for ${day}`);

        const stamps = [hrv.at, br.at].filter((d): d is Date => d !== undefined).map(d => d.getTime());
        const at = stamps.length ? new Date(Math.max(...stamps)) : now();
        return LiveMetricSampleSchema.parse({ breath_rate: br.value, hrv: hrv.value, timestamp: at.toISOString() });
    }
}
