import { isValidTimeZone, parseInstant } from "./timestamp";

const iso = (raw: unknown, tz?: string) => parseInstant(raw, tz)?.toISOString();

test("explicit offsets and Z are absolute regardless of zone", () => {
    expect(iso("2025-08-17T10:00:00Z", "America/New_York")).toBe("2025-08-17T10:00:00.000Z");
    expect(iso("2025-08-17T12:00:00+02:00", "Asia/Tokyo")).toBe("2025-08-17T10:00:00.000Z");
});

test("naive wall-clock time is read in the given zone", () => {
    expect(iso("2025-08-17 10:00:00", "America/New_York")).toBe("2025-08-17T14:00:00.000Z");
    expect(iso("2025-01-15T10:00:00", "Europe/Berlin")).toBe("2025-01-15T09:00:00.000Z");
    expect(iso("2025-01-15T10:00:00")).toBe("2025-01-15T10:00:00.000Z");
});

test("numbers and numeric strings are epoch seconds", () => {
    expect(iso(1700000000)).toBe("2023-11-14T22:13:20.000Z");
    expect(iso("1700000000")).toBe("2023-11-14T22:13:20.000Z");
});

test("junk yields undefined", () => {
    expect(parseInstant("not-a-time")).toBeUndefined();
    expect(parseInstant("")).toBeUndefined();
    expect(parseInstant(Number.NaN)).toBeUndefined();
    expect(parseInstant({ at: 1 })).toBeUndefined();
    // milliseconds read as seconds: far past year 9999
    expect(parseInstant(1755424800000)).toBeUndefined();
});

test("recognizes IANA zones", () => {
    expect(isValidTimeZone("Europe/Berlin")).toBe(true);
    expect(isValidTimeZone("Mars/Olympus_Mons")).toBe(false);
});
