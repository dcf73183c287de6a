import { parse } from "csv-parse/sync";

import { IngestError, ParseError, errorMessage } from "../../validation/errors";
import type { RawRecord } from "../../mappers/field-mapper";
import type { ParsedRow } from "../types";

type CsvEntry = { ok: true; cells: string[] } | { ok: false; message: string };

/*
 * Records and skipped records come back in file order, so a malformed quote on one
 * row is that row's failure only. A quote still open at EOF leaves nothing to
 * resynchronize on: the file is unreadable.
 */
function readCsv(buf: Buffer): CsvEntry[] {
    const entries: CsvEntry[] = [];
    const unterminated: { message?: string } = {};
    let skippedLine: number | undefined;
    try {
        parse(buf, {
            bom: true,
            skip_empty_lines: true,
            trim: true,
            relax_column_count: true,
            relax_quotes: true,
            skip_records_with_error: true,
            on_record: (record: string[]) => {
                entries.push({ ok: true, cells: record });
                return record;
            },
            on_skip: err => {
                if (!err) return undefined;
                if (err.code === "CSV_QUOTE_NOT_CLOSED") {
                    unterminated.message = err.message;
                    return undefined;
                }
                // one bad record can report several errors from the same line
                const line = "lines" in err && typeof err.lines === "number" ? err.lines : undefined;
                if (line !== undefined && line === skippedLine) return undefined;
                skippedLine = line;
                entries.push({ ok: false, message: err.message });
                return undefined;
            },
        });
    } catch (e) {
        throw new IngestError(`Could not parse CSV: ${errorMessage(e)}`);
    }
    if (unterminated.message) throw new IngestError(`Could not parse CSV: ${unterminated.message}`);
    return entries;
}

function* toRecords(header: string[], entries: CsvEntry[]): Generator<ParsedRow> {
    for (let i = 0; i < entries.length; i++) {
        const entry = entries[i];
        const row = i + 1;
        if (!entry.ok) {
            yield { ok: false, row, error: new ParseError(`Row ${row}: ${entry.message}`) };
            continue;
        }
        const cells = entry.cells;
        if (cells.length !== header.length) {
            yield {
                ok: false,
                row,
                error: new ParseError(`Row ${row}: expected ${header.length} fields, got ${cells.length}`),
            };
            continue;
        }
        const record: RawRecord = {};
        header.forEach((name, col) => {
            record[name] = cells[col];
        });
        yield { ok: true, row, record };
    }
}

/**
 * Tabular upload -> raw records keyed by header name.
 * Values stay strings; the normalizer decides what they mean.
 */
export function parseCsvRecords(buf: Buffer): Iterable<ParsedRow> {
    const [header, ...entries] = readCsv(buf);
    if (!header) return [];
    if (!header.ok) throw new IngestError(`Could not parse CSV header: ${header.message}`);
    const names = header.cells.map((h, i) => h || `column_${i + 1}`);
    return toRecords(names, entries);
}
