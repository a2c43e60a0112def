/**
 * Parse environment variable as string with fallback
 * @param key
 * @param fallback
 * @returns Parsed value
 */

export function getEnv(key: string | undefined, fallback: string): string {
    if (key === undefined || key.trim() === "") return fallback;
    return key.trim();
}

export function getEnvNumber(key: string | undefined, fallback: number): number {
    if (key === undefined || key.trim() === "") return fallback;
    const parsed = Number(key);
    return IsNaN(parsed) ? fallback : parsed;
}

/**
 * Like `getEnvNumber`, but only accepts whole numbers >= `min`.
 */
export function getEnvInteger(key: string | undefined, fallback: number, min = 1): number {
    const parsed = getEnvNumber(key, fallback);
    return Number.isInteger(parsed) && parsed >= min ? parsed : fallback;
}

export function getEnvBoolean(key: string | undefined, fallback = false): boolean {
    if (key === undefined) return fallback;
    return ["true", "1", "yes", "y", "on"].includes(key.trim().toLowerCase());
}

export function getEnvArray(key: string | undefined, separator = ",", fallback: string[] = []): string[] {
    if (!key) return fallback;
    return key
        .split(separator)
        .map((item) => item.trim())
        .filter((item) => item !== "");
}

/**
 * Parses a separated list of integers. Entries that are not integers are dropped;
 * an unset or fully invalid list yields the fallback.
 */
export function getEnvIntegerArray(key: string | undefined, separator = ",", fallback: number[] = []): number[] {
    const values = getEnvArray(key, separator)
        .filter((item) => /^-?\d+$/.test(item))
        .map(Number);
    return values.length > 0 ? values : fallback;
}

export function IsNaN(value: number): boolean {
    return Number.isNaN(value);
}
