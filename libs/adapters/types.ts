import type { ParseError } from "../validation/errors";
import type { RawRecord } from "../mappers/field-mapper";

export type UploadFormat = "csv" | "json";

/** Row numbers are 1-based and count data rows/elements only (a CSV header is not a row). */
export type ParsedRow =
    | { ok: true; row: number; record: RawRecord }
    | { ok: false; row: number; error: ParseError };
