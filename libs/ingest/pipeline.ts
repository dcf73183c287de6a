import { detectFormat, parseRecords, type UploadFormat } from "../adapters";
import type { FieldMapper } from "../mappers/field-mapper";
import { normalizeBatch, type Rejection } from "../normalize/normalizer";
import { isValidTimeZone } from "../normalize/timestamp";
import { GLOBAL_SCOPE, type EventStore } from "../store/events/types";
import type { UploadStatus, UploadSummary } from "../validation/dto";
import { IngestError, StoreError, ValidationError, errorMessage } from "../validation/errors";

export interface UploadInput {
    content: Buffer;
    filename?: string;
    contentType?: string;
    format?: string;
    /** IANA zone for timestamps without an offset. Explicit offsets always win. */
    tzOverride?: string;
    scope?: string;
}

export interface IngestDeps {
    events: EventStore;
    mapper: FieldMapper;
    timeZone: string;
}

export interface IngestResult extends UploadSummary {
    format: UploadFormat;
    scope: string;
    rejections: Rejection[];
}

export function uploadStatus(rowsDropped: number): UploadStatus {
    return rowsDropped === 0 ? "success" : "partial";
}

/**
 * Whole upload -> stored events. Throws IngestError only for structural problems
 * (unreadable file, bad format, bad zone); anything row-level is counted as dropped.
 */
export async function ingestUpload(input: UploadInput, deps: IngestDeps): Promise<IngestResult> {
    const timeZone = input.tzOverride?.trim() || deps.timeZone;
    if (!isValidTimeZone(timeZone)) {
        throw new IngestError(`Unknown time zone: ${timeZone}`, { tz_override: input.tzOverride });
    }
    const scope = input.scope?.trim() || GLOBAL_SCOPE;

    const format = detectFormat(input.content, input);
    const batch = normalizeBatch(parseRecords(input.content, format), { mapper: deps.mapper, timeZone });

    const rejections = [...batch.rejections];
    let stored = 0;
    for (const { row, event } of batch.accepted) {
        let added: boolean;
        try {
            added = await deps.events.append(event, scope);
        } catch (e) {
            // Rows already written stay written; this one is counted and the batch goes on.
            console.error("upload-row-store-failed", { row, scope, error: errorMessage(e) });
            rejections.push({ row, reason: "store_failed", error: new StoreError(`Row ${row}: ${errorMessage(e)}`) });
            continue;
        }
        if (added) {
            stored++;
        } else {
            rejections.push({ row, reason: "duplicate", error: new ValidationError(`Row ${row}: duplicate event`) });
        }
    }
    rejections.sort((a, b) => a.row - b.row);

    if (rejections.length) {
        console.warn("upload-rows-dropped", {
            format,
            scope,
            dropped: rejections.length,
            sample: rejections.slice(0, 5).map(r => ({ row: r.row, reason: r.reason, error: r.error.message })),
        });
    }

    return {
        status: uploadStatus(rejections.length),
        rows_ingested: stored,
        rows_dropped: rejections.length,
        format,
        scope,
        rejections,
    };
}
