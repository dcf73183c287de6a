import { subDays } from "date-fns";
import { z } from "zod";

import { parseInstant } from "../../normalize/timestamp";
import { LiveMetricSampleSchema, type LiveMetricSample } from "../../validation/dto";
import { NotFoundError, ProviderError } from "../../validation/errors";
import { getJson, utcDay } from "./http";
import type { LiveMetricProvider, ProviderDeps } from "./types";

export const OURA_API_BASE = "https://api.ouraring.com";

const SleepSessionSchema = z.object({
    day: z.string(),
    bedtime_end: z.string().optional(),
    average_breath: z.number().positive().nullable().optional(),
    average_hrv: z.number().nonnegative().nullable().optional(),
});

const SleepResponseSchema = z.object({ data: z.array(z.unknown()) });

export class OuraProvider implements LiveMetricProvider {
    readonly vendor = "oura" as const;

    constructor(private readonly deps: ProviderDeps) {}

    async fetchLiveMetric(userId: string): Promise<LiveMetricSample> {
        const { tokens, fetch: fetchImpl = fetch, baseUrl = OURA_API_BASE, now = () => new Date() } = this.deps;
        const token = await tokens.getAccessToken(userId);
        const end = now();
        const url = `${baseUrl}/v2/usercollection/sleep?start_date=${utcDay(subDays(end, 1))}&end_date=${utcDay(end)}`;

        const doc = SleepResponseSchema.safeParse(await getJson(fetchImpl, this.vendor, url, token));
        if (!doc.success) {
            throw new ProviderError("oura sleep response has no data list", doc.error.issues);
        }

        // Most recent session that has both numbers
        for (const raw of [...doc.data.data].reverse()) {
            const s = SleepSessionSchema.safeParse(raw);
            if (!s.success) continue;
            const { average_breath, average_hrv, bedtime_end, day } = s.data;
            if (average_breath == null || average_hrv == null) continue;
            const at = parseInstant(bedtime_end ?? day) ?? end;
            return LiveMetricSampleSchema.parse({
                breath_rate: average_breath,
                hrv: average_hrv,
                timestamp: at.toISOString(),
            });
        }
        throw new NotFoundError(`no oura sleep session with breath and HRV since ${utcDay(subDays(end, 1))}`);
    }
}
