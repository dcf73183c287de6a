import type { APIGatewayProxyResult } from "aws-lambda";

import { defaultContext, type AppContext } from "../../../libs/app/context";
import { errorResponse, json, type ApiRequest } from "../../../libs/http/response";
import { toEventSummaries } from "../../../libs/mappers/event-view";
import { RangeQuerySchema } from "../../../libs/validation/dto";
import { ValidationError } from "../../../libs/validation/errors";

// GET /events?since=&until=[&scope=][&view=summary]  -> events in [since, until), ascending
export function createEventsHandler(ctx: () => AppContext = defaultContext) {
    return async (event: ApiRequest): Promise<APIGatewayProxyResult> => {
        try {
            const parsed = RangeQuerySchema.safeParse(event.queryStringParameters ?? {});
            if (!parsed.success) {
                const issues = parsed.error.issues.map(i => `${i.path.join(".") || "query"}: ${i.message}`).join("; ");
                throw new ValidationError(`Invalid range query: ${issues}`, parsed.error.issues);
            }
            const q = parsed.data;
            const since = new Date(q.since);
            const until = new Date(q.until);

            const events = await ctx().events.query(since, until, q.scope);
            const body = q.view === "summary" ? toEventSummaries(events) : events;
            return json(200, {
                since: since.toISOString(),
                until: until.toISOString(),
                count: body.length,
                events: body,
            });
        } catch (err) {
            return errorResponse("events-query-failed", err);
        }
    };
}

export const handler = createEventsHandler();
