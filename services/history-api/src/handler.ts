import type { APIGatewayProxyResult } from "aws-lambda";

import { defaultContext, type AppContext } from "../../../libs/app/context";
import { errorResponse, json, type ApiRequest } from "../../../libs/http/response";
import { detectTrend } from "../../../libs/scoring/trend";
import { ValidationError } from "../../../libs/validation/errors";

// GET /history?user_id=  -> {user_id, history, trend}; unknown users get an empty history
export function createHistoryHandler(ctx: () => AppContext = defaultContext) {
    return async (event: ApiRequest): Promise<APIGatewayProxyResult> => {
        try {
            const userId = event.queryStringParameters?.user_id?.trim();
            if (!userId) throw new ValidationError("user_id is required");
            const history = await ctx().buffer.history(userId);
            return json(200, { user_id: userId, history, trend: detectTrend(history) });
        } catch (err) {
            return errorResponse("history-failed", err);
        }
    };
}

export const handler = createHistoryHandler();
