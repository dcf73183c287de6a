import { check } from "../../contracts/src/validate";
import { IngestError, ParseError, errorMessage } from "../../validation/errors";
import type { RawRecord } from "../../mappers/field-mapper";
import type { ParsedRow } from "../types";

function isRawRecord(v: unknown): v is RawRecord {
    return typeof v === "object" && v !== null && !Array.isArray(v);
}

// Either a bare array, or an object wrapping the list ({"events": [...]}): first array value wins.
function recordList(doc: unknown): unknown[] | undefined {
    if (Array.isArray(doc)) return doc;
    if (isRawRecord(doc)) return Object.values(doc).find(Array.isArray);
    return undefined;
}

function* elements(list: unknown[]): Generator<ParsedRow> {
    for (let i = 0; i < list.length; i++) {
        const el = list[i];
        const row = i + 1;
        const v = check("raw-record.v1", el);
        if (!v.ok) {
            yield { ok: false, row, error: new ParseError(`Record ${row}: ${v.errors.join("; ")}`) };
        } else if (isRawRecord(el)) {
            yield { ok: true, row, record: el };
        } else {
            yield { ok: false, row, error: new ParseError(`Record ${row}: not an object`) };
        }
    }
}

export function parseJsonRecords(buf: Buffer): Iterable<ParsedRow> {
    let doc: unknown;
    try {
        doc = JSON.parse(buf.toString("utf8").replace(/^\uFEFF/, ""));
    } catch (e) {
        throw new IngestError(`Could not parse JSON: ${errorMessage(e)}`);
    }
    const list = recordList(doc);
    if (!list) throw new IngestError("JSON upload does not contain a list of records");
    return elements(list);
}
