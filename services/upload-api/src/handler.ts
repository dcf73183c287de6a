import type { APIGatewayProxyResult } from "aws-lambda";

import { defaultContext, type AppContext } from "../../../libs/app/context";
import { errorResponse, header, json, rawBody, statusFor, type ApiRequest } from "../../../libs/http/response";
import { ingestUpload } from "../../../libs/ingest/pipeline";
import type { UploadSummary } from "../../../libs/validation/dto";
import { errorMessage } from "../../../libs/validation/errors";

// POST /upload?filename=&format=&tz_override=&scope=   body = file, base64 allowed
export function createUploadHandler(ctx: () => AppContext = defaultContext) {
    return async (event: ApiRequest): Promise<APIGatewayProxyResult> => {
        const t0 = Date.now();
        const qs = event.queryStringParameters ?? {};
        let app: AppContext;
        try {
            app = ctx();
        } catch (err) {
            return errorResponse("upload-failed", err);
        }

        try {
            const result = await ingestUpload(
                {
                    content: rawBody(event),
                    filename: qs.filename,
                    format: qs.format,
                    tzOverride: qs.tz_override,
                    scope: qs.scope,
                    contentType: header(event, "content-type"),
                },
                { events: app.events, mapper: app.mapper, timeZone: app.config.DEFAULT_TIME_ZONE },
            );
            const summary: UploadSummary = {
                status: result.status,
                rows_ingested: result.rows_ingested,
                rows_dropped: result.rows_dropped,
            };
            console.info("upload-ingested", { format: result.format, scope: result.scope, ...summary });
            await Promise.all([
                app.metrics.count("rows_ingested", result.rows_ingested, { format: result.format }),
                app.metrics.count("rows_dropped", result.rows_dropped, { format: result.format }),
                app.metrics.ms("upload_latency_ms", Date.now() - t0),
                app.audit({
                    type: "upload",
                    at: app.clock().toISOString(),
                    filename: qs.filename ?? null,
                    format: result.format,
                    scope: result.scope,
                    ...summary,
                    rejections: result.rejections.map(r => ({ row: r.row, reason: r.reason })),
                }),
            ]);
            return json(200, summary);
        } catch (err) {
            const statusCode = statusFor(err);
            if (statusCode === 500) return errorResponse("upload-failed", err);
            console.warn("upload-rejected", { error: errorMessage(err) });
            await app.metrics.count("upload_error_count");
            return json(statusCode, { status: "error", rows_ingested: 0, rows_dropped: 0, error: errorMessage(err) });
        }
    };
}

export const handler = createUploadHandler();
