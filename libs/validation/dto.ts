import { z } from "zod";

export const SIGNAL_KINDS = ["ecg", "r_peak", "st_elev", "st_depr", "marked_event"] as const;
export const UNITS = ["mV", "bpm"] as const;

export const SignalKindSchema = z.enum(SIGNAL_KINDS);
export const UnitSchema = z.enum(UNITS);

export type SignalKind = z.infer<typeof SignalKindSchema>;
export type Unit = z.infer<typeof UnitSchema>;

// Which units each signal accepts; an empty list means the signal carries no unit.
export const ALLOWED_UNITS: Readonly<Record<SignalKind, readonly Unit[]>> = {
    ecg: ["mV"],
    r_peak: ["bpm"],
    st_elev: ["mV"],
    st_depr: ["mV"],
    marked_event: [],
};

export const MetadataValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
export type MetadataValue = z.infer<typeof MetadataValueSchema>;

export const CanonicalEventSchema = z.object({
    timestamp: z.string().datetime(),   // UTC, always "Z"
    signal: SignalKindSchema,
    value: z.number().finite().optional(),
    unit: UnitSchema.optional(),
    metadata: z.record(MetadataValueSchema),
});

export type CanonicalEvent = Readonly<z.infer<typeof CanonicalEventSchema>>;

export const CheckInRequestSchema = z.object({
    user_id: z.string().trim().min(1),
    text: z.string(),
    breath_rate: z.number().finite().positive(),
    hrv: z.number().finite().nonnegative(),
});

export type CheckInRequest = z.infer<typeof CheckInRequestSchema>;

export const CheckInSchema = CheckInRequestSchema.extend({
    timestamp: z.string().datetime(),
});

export type CheckIn = Readonly<z.infer<typeof CheckInSchema>>;

export const LiveMetricSampleSchema = z.object({
    breath_rate: z.number().finite().positive(),
    hrv: z.number().finite().nonnegative(),
    timestamp: z.string().datetime(),
});

export type LiveMetricSample = z.infer<typeof LiveMetricSampleSchema>;

export const RangeQuerySchema = z
    .object({
        since: z.string().datetime({ offset: true }),
        until: z.string().datetime({ offset: true }),
        scope: z.string().min(1).optional(),
        view: z.enum(["events", "summary"]).optional(),
    })
    .refine((q) => Date.parse(q.since) <= Date.parse(q.until), {
        message: "since must not be after until",
        path: ["until"],
    });

export type RangeQuery = z.infer<typeof RangeQuerySchema>;

export type Trend = "none" | "stable" | "rising";

export type UploadStatus = "success" | "partial" | "error";

export interface UploadSummary {
    status: UploadStatus;
    rows_ingested: number;
    rows_dropped: number;
}

export interface CheckInResponse {
    coherence_score: number;
    message: string;
}
