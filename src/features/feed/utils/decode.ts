import { MalformedValueError, MissingFieldError } from "@core/domain/error";

// ----------------------------------------------------------------------
// Strict decoders for the untyped feed payload.
// Every decoder takes the JSON path of the value so errors point at it.
// ----------------------------------------------------------------------

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function joinPath(path: string, key: string | number): string {
    return typeof key === "number" ? `${path}[${key}]` : `${path}.${key}`;
}

export function expectRecord(value: unknown, path: string): JsonRecord {
    if (!isRecord(value)) throw new MalformedValueError(path, "object");
    return value;
}

export function expectArray(value: unknown, path: string): unknown[] {
    if (!Array.isArray(value)) throw new MalformedValueError(path, "array");
    return value;
}

export function expectString(value: unknown, path: string): string {
    if (typeof value !== "string") throw new MalformedValueError(path, "string");
    return value;
}

export function expectInteger(value: unknown, path: string): number {
    if (typeof value !== "number" || !Number.isInteger(value)) {
        throw new MalformedValueError(path, "integer");
    }
    return value;
}

// The feed writes offsets without a colon ("+0100"); Date only takes "+01:00"
const COMPACT_OFFSET = /([+-]\d{2})(\d{2})$/;
const ISO_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;

// Date rolls "02-31" over into March instead of rejecting it
function isCalendarDate(year: number, month: number, day: number): boolean {
    if (month < 1 || month > 12 || day < 1) return false;
    // Day 0 of the next month is the last day of this one
    const lastDay = new Date(0);
    lastDay.setUTCFullYear(year, month, 0);
    return day <= lastDay.getUTCDate();
}

export function expectTimestamp(value: unknown, path: string): Date {
    const raw = expectString(value, path).trim();
    const match = ISO_TIMESTAMP.exec(raw);
    if (match === null || !isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))) {
        throw new MalformedValueError(path, "timestamp");
    }

    const date = new Date(raw.replace(COMPACT_OFFSET, "$1:$2"));
    if (Number.isNaN(date.getTime())) throw new MalformedValueError(path, "timestamp");
    return date;
}

/**
 * Reads a required field. A missing (or null) field is a MissingFieldError
 * carrying the field's full path.
 */
export function requireField<T>(
    record: JsonRecord,
    key: string,
    path: string,
    decode: (value: unknown, path: string) => T
): T {
    const fieldPath = joinPath(path, key);
    const value = record[key];
    if (value === undefined || value === null) throw new MissingFieldError(fieldPath);
    return decode(value, fieldPath);
}

/**
 * Reads a field that may be left out; present values must still decode.
 */
export function optionalField<T>(
    record: JsonRecord,
    key: string,
    path: string,
    decode: (value: unknown, path: string) => T
): T | undefined {
    const value = record[key];
    if (value === undefined || value === null) return undefined;
    return decode(value, joinPath(path, key));
}

export function decodeArray<T>(
    value: unknown,
    path: string,
    decodeItem: (item: unknown, path: string) => T
): T[] {
    return expectArray(value, path).map((item, index) => decodeItem(item, joinPath(path, index)));
}
