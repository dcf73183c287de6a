import type { APIGatewayProxyResult } from "aws-lambda";

import { defaultContext, type AppContext } from "../../../libs/app/context";
import { submitCheckIn } from "../../../libs/checkin/service";
import { errorResponse, json, jsonBody, type ApiRequest } from "../../../libs/http/response";

// POST /check-in {user_id, text, breath_rate, hrv} -> {coherence_score, message}
export function createCheckInHandler(ctx: () => AppContext = defaultContext) {
    return async (event: ApiRequest): Promise<APIGatewayProxyResult> => {
        const t0 = Date.now();
        try {
            const app = ctx();
            const out = await submitCheckIn(
                { buffer: app.buffer, messages: app.messages, clock: app.clock },
                jsonBody(event),
            );
            console.info("check-in-scored", { score: out.coherence_score, trend: out.trend, window: out.history.length });
            await Promise.all([
                app.metrics.count("checkin_count"),
                app.metrics.ms("checkin_latency_ms", Date.now() - t0),
            ]);
            return json(200, { coherence_score: out.coherence_score, message: out.message });
        } catch (err) {
            return errorResponse("check-in-failed", err);
        }
    };
}

export const handler = createCheckInHandler();
