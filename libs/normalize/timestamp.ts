import { fromUnixTime, isValid, parseISO } from "date-fns";
import { fromZonedTime } from "date-fns-tz";

export const REFERENCE_TIME_ZONE = "UTC";

const EXPLICIT_ZONE = /\d{2}:\d{2}(?::\d{2}(?:[.,]\d+)?)?(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;
const EPOCH_SECONDS = /^-?\d+(?:\.\d+)?$/;

export function isValidTimeZone(timeZone: string): boolean {
    try {
        new Intl.DateTimeFormat("en-US", { timeZone });
        return true;
    } catch {
        return false;
    }
}

/**
 * Raw timestamp -> absolute instant.
 * - numbers and numeric strings are UNIX epoch seconds
 * - strings ending in Z or an offset are absolute already
 * - anything else is wall-clock time in `timeZone`
 * Returns undefined when nothing sensible can be made of the input.
 */
export function parseInstant(raw: unknown, timeZone: string = REFERENCE_TIME_ZONE): Date | undefined {
    let d: Date | undefined;
    if (typeof raw === "number") {
        d = Number.isFinite(raw) ? fromUnixTime(raw) : undefined;
    } else if (typeof raw === "string") {
        const text = raw.trim();
        if (!text) return undefined;
        try {
            if (EPOCH_SECONDS.test(text)) d = fromUnixTime(Number(text));
            else if (EXPLICIT_ZONE.test(text)) d = parseISO(text);
            else d = fromZonedTime(text, timeZone);
        } catch {
            return undefined; // RangeError from date-fns-tz on an unknown zone
        }
    }
    if (!d || !isValid(d)) return undefined;
    // ISO 8601 needs a four-digit year; epoch milliseconds read as seconds land far outside it
    const year = d.getUTCFullYear();
    return year >= 0 && year <= 9999 ? d : undefined;
}
