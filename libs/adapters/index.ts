import { IngestError } from "../validation/errors";
import { parseCsvRecords } from "./csv/records";
import { parseJsonRecords } from "./json/records";
import type { ParsedRow, UploadFormat } from "./types";

export type { ParsedRow, UploadFormat } from "./types";
export { parseCsvRecords } from "./csv/records";
export { parseJsonRecords } from "./json/records";

export interface FormatHint {
    format?: string;
    filename?: string;
    contentType?: string;
}

const UNSUPPORTED = "Unsupported file format. Please upload CSV or JSON.";

function asFormat(v: string): UploadFormat | undefined {
    const f = v.trim().toLowerCase();
    return f === "csv" || f === "json" ? f : undefined;
}

/** Explicit format, then file extension, then content type, then the first non-blank character. */
export function detectFormat(content: Buffer, hint: FormatHint = {}): UploadFormat {
    if (hint.format) {
        const f = asFormat(hint.format);
        if (!f) throw new IngestError(UNSUPPORTED, { format: hint.format });
        return f;
    }

    const ext = hint.filename?.match(/\.([^./\\]+)$/)?.[1];
    if (ext) {
        const f = asFormat(ext);
        if (!f) throw new IngestError(UNSUPPORTED, { filename: hint.filename });
        return f;
    }

    const ct = hint.contentType?.toLowerCase() ?? "";
    if (ct.includes("csv")) return "csv";
    if (ct.includes("json")) return "json";

    const first = content.toString("utf8").replace(/^\uFEFF/, "").trimStart().charAt(0);
    if (!first) throw new IngestError("Upload is empty");
    return first === "[" || first === "{" ? "json" : "csv";
}

export function parseRecords(content: Buffer, format: UploadFormat): Iterable<ParsedRow> {
    return format === "csv" ? parseCsvRecords(content) : parseJsonRecords(content);
}
