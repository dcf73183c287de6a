import { z } from "zod";

import { isValidTimeZone, REFERENCE_TIME_ZONE } from "./normalize/timestamp";

const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);
const optionalString = z.preprocess(blankToUndefined, z.string().trim().min(1).optional());

const EnvSchema = z.object({
    DEFAULT_TIME_ZONE: z
        .preprocess(blankToUndefined, z.string().default(REFERENCE_TIME_ZONE))
        .refine(isValidTimeZone, { message: "not an IANA time zone" }),
    // Both unset -> in-process stores
    EVENTS_TABLE_NAME: optionalString,
    HISTORY_TABLE_NAME: optionalString,
    FIELD_MAP_PATH: optionalString,
    METRICS_NS: optionalString,
    AUDIT_FN_ARN: optionalString,
    FITBIT_API_BASE: z.preprocess(blankToUndefined, z.string().url().optional()),
    OURA_API_BASE: z.preprocess(blankToUndefined, z.string().url().optional()),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
        throw new Error(`Invalid configuration: ${issues}`);
    }
    return parsed.data;
}
