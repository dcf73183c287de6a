import type { APIGatewayProxyResult } from "aws-lambda";

import { isWearableVendor } from "../../../libs/adapters/wearables";
import { defaultContext, type AppContext } from "../../../libs/app/context";
import { recordLiveSample } from "../../../libs/checkin/service";
import { errorResponse, header, json, type ApiRequest } from "../../../libs/http/response";
import { AuthError, ValidationError } from "../../../libs/validation/errors";

function bearerToken(event: ApiRequest): string {
    const m = header(event, "authorization")?.match(/^Bearer\s+(\S+)$/i);
    if (!m) throw new AuthError("Missing bearer token");
    return m[1];
}

// GET /live-check-in/{vendor}?user_id=   Authorization: Bearer <vendor access token>
export function createLiveCheckInHandler(ctx: () => AppContext = defaultContext) {
    return async (event: ApiRequest): Promise<APIGatewayProxyResult> => {
        try {
            const vendor = event.pathParameters?.vendor ?? event.queryStringParameters?.vendor;
            if (!isWearableVendor(vendor)) throw new ValidationError(`Unknown wearable vendor: ${String(vendor)}`);
            const userId = event.queryStringParameters?.user_id?.trim();
            if (!userId) throw new ValidationError("user_id is required");
            const token = bearerToken(event);

            const app = ctx();
            const sample = await app.provider(vendor, { getAccessToken: async () => token }).fetchLiveMetric(userId);
            const out = await recordLiveSample({ buffer: app.buffer, messages: app.messages }, userId, sample);
            console.info("live-check-in-scored", { vendor, score: out.coherence_score, trend: out.trend });
            await app.metrics.count("live_checkin_count", 1, { vendor });

            return json(200, {
                vendor,
                sample,
                coherence_score: out.coherence_score,
                trend: out.trend,
                trend_note: out.trend_note ?? null,
                message: out.message,
            });
        } catch (err) {
            return errorResponse("live-check-in-failed", err);
        }
    };
}

export const handler = createLiveCheckInHandler();
