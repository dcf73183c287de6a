import type { ParsedRow } from "../adapters/types";
import type { FieldMapper, MappedRecord } from "../mappers/field-mapper";
import {
    ALLOWED_UNITS,
    CanonicalEventSchema,
    type CanonicalEvent,
    type Unit,
} from "../validation/dto";
import { ParseError, StoreError, ValidationError } from "../validation/errors";
import { REFERENCE_TIME_ZONE, parseInstant } from "./timestamp";

export type RejectReason =
    | "malformed_record"
    | "missing_timestamp"
    | "invalid_timestamp"
    | "missing_signal"
    | "invalid_value"
    | "invalid_unit"
    | "duplicate"
    | "store_failed";

export interface Rejection {
    row: number;
    reason: RejectReason;
    error: ParseError | ValidationError | StoreError;
}

export type RecordOutcome =
    | { ok: true; event: CanonicalEvent }
    | { ok: false; reason: RejectReason; error: ValidationError };

export interface NormalizeOptions {
    mapper: FieldMapper;
    /** IANA zone applied to timestamps that carry no offset. */
    timeZone?: string;
}

export interface AcceptedRow {
    row: number;
    event: CanonicalEvent;
}

export interface NormalizedBatch {
    accepted: AcceptedRow[];
    rows_ingested: number;
    rows_dropped: number;
    rejections: Rejection[];
}

function reject(reason: RejectReason, message: string, details?: unknown): RecordOutcome {
    return { ok: false, reason, error: new ValidationError(message, details) };
}

function isBlank(v: unknown): boolean {
    return v === undefined || v === null || (typeof v === "string" && v.trim() === "");
}

function readValue(raw: unknown): number | undefined | null {
    if (isBlank(raw)) return undefined;
    const n = typeof raw === "number" ? raw : typeof raw === "string" ? Number(raw.trim()) : NaN;
    return Number.isFinite(n) ? n : null;
}

/**
 * One mapped record -> immutable CanonicalEvent, or the reason it was turned away.
 * Never throws for bad data.
 */
export function normalizeRecord(
    mapped: MappedRecord,
    mapper: FieldMapper,
    timeZone: string = REFERENCE_TIME_ZONE,
): RecordOutcome {
    if (isBlank(mapped.timestamp)) return reject("missing_timestamp", "timestamp is missing");
    const instant = parseInstant(mapped.timestamp, timeZone);
    if (!instant) {
        return reject("invalid_timestamp", `unparseable timestamp: ${String(mapped.timestamp)}`);
    }

    const signal = mapped.signal;
    if (!signal) return reject("missing_signal", "signal is missing");

    const value = readValue(mapped.value);
    if (value === null) return reject("invalid_value", `value is not a number: ${String(mapped.value)}`);

    let unit: Unit | undefined;
    if (!isBlank(mapped.unit)) {
        unit = mapper.unitFor(String(mapped.unit));
        if (!unit) return reject("invalid_unit", `unknown unit: ${String(mapped.unit)}`);
        if (!ALLOWED_UNITS[signal].includes(unit)) {
            return reject("invalid_unit", `unit ${unit} is not allowed for signal ${signal}`);
        }
    }

    const candidate = {
        timestamp: instant.toISOString(),
        signal,
        ...(value !== undefined ? { value } : {}),
        ...(unit ? { unit } : {}),
        metadata: mapped.metadata,
    };
    const parsed = CanonicalEventSchema.safeParse(candidate);
    if (!parsed.success) {
        return reject("invalid_value", "event failed schema validation", parsed.error.issues);
    }
    Object.freeze(parsed.data.metadata);
    return { ok: true, event: Object.freeze(parsed.data) };
}

/**
 * Row-isolated pass over a parsed upload: every row ends up either in `accepted`
 * or in `rejections`, so rows_ingested + rows_dropped always equals the row count.
 */
export function normalizeBatch(rows: Iterable<ParsedRow>, options: NormalizeOptions): NormalizedBatch {
    const timeZone = options.timeZone ?? REFERENCE_TIME_ZONE;
    const accepted: AcceptedRow[] = [];
    const rejections: Rejection[] = [];

    for (const parsed of rows) {
        if (!parsed.ok) {
            rejections.push({ row: parsed.row, reason: "malformed_record", error: parsed.error });
            continue;
        }
        const outcome = normalizeRecord(options.mapper.map(parsed.record), options.mapper, timeZone);
        if (outcome.ok) accepted.push({ row: parsed.row, event: outcome.event });
        else rejections.push({ row: parsed.row, reason: outcome.reason, error: outcome.error });
    }

    return { accepted, rows_ingested: accepted.length, rows_dropped: rejections.length, rejections };
}
