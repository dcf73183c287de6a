import { validate } from "../contracts/src/validate";
import type { MetadataValue, SignalKind, Unit } from "../validation/dto";
import defaultTable from "./field-map.json";

export const CANONICAL_FIELDS = ["timestamp", "signal", "value", "unit", "metadata"] as const;
export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

/**
 * Pure-data mapping table. Adding a device format means adding rows here,
 * never branches in the mapper or the normalizer.
 */
export interface FieldMapTable {
    fields: Partial<Record<CanonicalField, string[]>>;
    signals: Record<string, SignalKind>;
    units: Record<string, Unit>;
}

export type RawRecord = Record<string, unknown>;

export interface MappedRecord {
    timestamp?: unknown;
    signal?: SignalKind;
    value?: unknown;
    unit?: unknown;
    metadata: Record<string, MetadataValue>;
}

export interface FieldMapper {
    map(record: RawRecord): MappedRecord;
    signalFor(label: string): SignalKind | undefined;
    unitFor(label: string): Unit | undefined;
}

const META_PREFIX = "meta.";

/** "R-peak", "R Peak" and "r_peak" all fold to "rpeak". */
export function foldLabel(label: string): string {
    return label.trim().toLowerCase().replace(/[^a-z0-9]+/g, "");
}

export function loadFieldMapTable(data: unknown): FieldMapTable {
    validate<FieldMapTable>("field-map.v1", data);
    return data;
}

export const DEFAULT_FIELD_MAP: FieldMapTable = loadFieldMapTable(defaultTable);

export function extendFieldMap(base: FieldMapTable, extension: Partial<FieldMapTable>): FieldMapTable {
    const fields: Partial<Record<CanonicalField, string[]>> = {};
    for (const field of CANONICAL_FIELDS) {
        const aliases = [...(base.fields[field] ?? []), ...(extension.fields?.[field] ?? [])];
        if (aliases.length) fields[field] = aliases;
    }
    return loadFieldMapTable({
        fields,
        signals: { ...base.signals, ...extension.signals },
        units: { ...base.units, ...extension.units },
    });
}

function indexBy<V>(entries: Iterable<[string, V]>): Map<string, V> {
    const index = new Map<string, V>();
    for (const [label, v] of entries) {
        const key = foldLabel(label);
        if (!index.has(key)) index.set(key, v);
    }
    return index;
}

function isBlank(v: unknown): boolean {
    return v === undefined || v === null || (typeof v === "string" && v.trim() === "");
}

function asLabel(v: unknown): string | undefined {
    if (typeof v === "string") return v.trim() || undefined;
    if (typeof v === "number" && Number.isFinite(v)) return String(v);
    return undefined;
}

function putScalar(metadata: Record<string, MetadataValue>, key: string, raw: unknown) {
    if (isBlank(raw)) return;
    if (typeof raw === "string") metadata[key] = raw.trim();
    else if (typeof raw === "number" || typeof raw === "boolean") metadata[key] = raw;
    else metadata[key] = JSON.stringify(raw);
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
    return typeof v === "object" && v !== null && !Array.isArray(v);
}

function mergeMetadata(metadata: Record<string, MetadataValue>, raw: unknown) {
    let source = raw;
    if (typeof raw === "string" && raw.trim().startsWith("{")) {
        try {
            source = JSON.parse(raw);
        } catch {
            source = raw; // not JSON after all, keep the text
        }
    }
    if (isPlainObject(source)) {
        for (const [k, v] of Object.entries(source)) putScalar(metadata, k, v);
    } else {
        putScalar(metadata, "meta", source);
    }
}

export function createFieldMapper(table: FieldMapTable = DEFAULT_FIELD_MAP): FieldMapper {
    const fieldIndex = indexBy<CanonicalField>(
        CANONICAL_FIELDS.flatMap(field =>
            (table.fields[field] ?? []).map((alias): [string, CanonicalField] => [alias, field]),
        ),
    );
    const signalIndex = indexBy<SignalKind>(Object.entries(table.signals));
    const unitIndex = indexBy<Unit>(Object.entries(table.units));

    const signalFor = (label: string) => signalIndex.get(foldLabel(label));
    const unitFor = (label: string) => unitIndex.get(foldLabel(label));

    function map(record: RawRecord): MappedRecord {
        const metadata: Record<string, MetadataValue> = {};
        const found: Partial<Record<Exclude<CanonicalField, "metadata">, unknown>> = {};
        const labelColumns: Array<{ name: string; kind: SignalKind; value: unknown }> = [];

        for (const [name, raw] of Object.entries(record)) {
            if (name.startsWith(META_PREFIX)) {
                putScalar(metadata, name.slice(META_PREFIX.length), raw);
                continue;
            }
            const field = fieldIndex.get(foldLabel(name));
            const kind = field ? undefined : signalFor(name);
            if (field === "metadata") {
                mergeMetadata(metadata, raw);
            } else if (field && !(field in found)) {
                found[field] = raw;
            } else if (kind) {
                labelColumns.push({ name, kind, value: raw });
            } else {
                putScalar(metadata, name, raw);
            }
        }

        const mapped: MappedRecord = {
            timestamp: found.timestamp,
            value: found.value,
            unit: found.unit,
            metadata,
        };

        if ("signal" in found) {
            // Generic field ("Event Type", "type"): the label is the record's own value.
            const label = asLabel(found.signal);
            if (label !== undefined) {
                const kind = signalFor(label);
                mapped.signal = kind ?? "marked_event";
                if (!kind) metadata.original_label = label;
            }
            // Label-named columns are plain data once the record names its own signal
            for (const c of labelColumns) putScalar(metadata, c.name, c.value);
            return mapped;
        }

        // Wide layout: the column name is the label and its cell is the value.
        const present = labelColumns.filter(c => !isBlank(c.value));
        if (present.length === 1) {
            mapped.signal = present[0].kind;
            if (isBlank(mapped.value)) mapped.value = present[0].value;
        } else if (present.length > 1) {
            mapped.signal = "marked_event";
            metadata.original_label = present.map(c => c.name).join(" | ");
            for (const c of present) putScalar(metadata, c.name, c.value);
        }
        return mapped;
    }

    return { map, signalFor, unitFor };
}
