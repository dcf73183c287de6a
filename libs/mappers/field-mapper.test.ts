import { ValidationError } from "../validation/errors";
import { DEFAULT_FIELD_MAP, createFieldMapper, extendFieldMap, foldLabel, loadFieldMapTable } from "./field-mapper";

const mapper = createFieldMapper();

test("folds labels down to lowercase alphanumerics", () => {
    expect(foldLabel(" R-Peak ")).toBe("rpeak");
    expect(foldLabel("ST_Elevation")).toBe("stelevation");
});

test("vendor label in a generic column maps to its signal", () => {
    const m = mapper.map({ "Timestamp": "2025-08-17T10:00:00Z", "Event Type": "R-peak", "ECG Channel": "1.2" });
    expect(m.timestamp).toBe("2025-08-17T10:00:00Z");
    expect(m.signal).toBe("r_peak");
    expect(m.value).toBe("1.2");
    expect(m.metadata).toEqual({});
});

test("unknown label becomes a marked event keeping the original label", () => {
    const m = mapper.map({ timestamp: "2025-08-17T10:00:00Z", signal: "Weird Label" });
    expect(m.signal).toBe("marked_event");
    expect(m.metadata.original_label).toBe("Weird Label");
});

test("label-named columns become metadata when the record names its signal", () => {
    const m = mapper.map({ timestamp: "2025-08-17T10:00:00Z", type: "R-peak", Marker: "button pressed" });
    expect(m.signal).toBe("r_peak");
    expect(m.metadata).toEqual({ Marker: "button pressed" });
});

test("wide layout: the one filled label column is the signal and its cell the value", () => {
    const m = mapper.map({ timestamp: "2025-08-17T10:00:00Z", "ST Elevation": "0.15", "R-peak": "" });
    expect(m.signal).toBe("st_elev");
    expect(m.value).toBe("0.15");
});

test("wide layout with several filled label columns is a marked event", () => {
    const m = mapper.map({ timestamp: "2025-08-17T10:00:00Z", "ST Elevation": "0.15", "R-peak": "1" });
    expect(m.signal).toBe("marked_event");
    expect(m.metadata).toEqual({ original_label: "ST Elevation | R-peak", "ST Elevation": "0.15", "R-peak": "1" });
});

test("meta.* columns, a metadata JSON cell and unknown columns all land in metadata", () => {
    const m = mapper.map({
        timestamp: "2025-08-17T10:00:00Z",
        signal: "ecg",
        "meta.lead": "II",
        meta: '{"source":"holter","gain":2}',
        device: "patch-7",
        note: "",
    });
    expect(m.signal).toBe("ecg");
    expect(m.metadata).toEqual({ lead: "II", source: "holter", gain: 2, device: "patch-7" });
});

test("nested metadata objects from JSON records are flattened one level", () => {
    const m = mapper.map({ timestamp: 1700000000, signal: "marked_event", metadata: { label: "Dizzy", flagged: true } });
    expect(m.metadata).toEqual({ label: "Dizzy", flagged: true });
});

test("unit lookup goes through the table", () => {
    expect(mapper.unitFor("Millivolts")).toBe("mV");
    expect(mapper.unitFor("beats/min")).toBe("bpm");
    expect(mapper.unitFor("furlongs")).toBeUndefined();
});

test("a new device format is a table extension, not code", () => {
    const extended = createFieldMapper(
        extendFieldMap(DEFAULT_FIELD_MAP, { fields: { timestamp: ["captured"] }, signals: { "Heartbeat Mark": "r_peak" } }),
    );
    const m = extended.map({ captured: "2025-08-17T10:00:00Z", type: "Heartbeat Mark" });
    expect(m.timestamp).toBe("2025-08-17T10:00:00Z");
    expect(m.signal).toBe("r_peak");
});

test("malformed tables are rejected", () => {
    expect(() => loadFieldMapTable({ fields: {}, signals: { x: "not_a_signal" }, units: {} })).toThrow(ValidationError);
});
