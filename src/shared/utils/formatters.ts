import { getDisplayTime } from "@core/domain/departure";

import type { Departure } from "@core/domain/departure";

const clockFormatters = new Map<string, Intl.DateTimeFormat>();

function getClockFormatter(timeZone: string): Intl.DateTimeFormat {
    let formatter = clockFormatters.get(timeZone);
    if (!formatter) {
        formatter = new Intl.DateTimeFormat("en-GB", {
            timeZone,
            hour: "2-digit",
            minute: "2-digit",
            second: "2-digit",
            hourCycle: "h23",
        });
        clockFormatters.set(timeZone, formatter);
    }
    return formatter;
}

type ClockParts = { hour: string; minute: string; second: string };

function getClockParts(date: Date, timeZone: string): ClockParts {
    const parts = getClockFormatter(timeZone).formatToParts(date);
    const valueFor = (type: Intl.DateTimeFormatPartTypes) => parts.find((part) => part.type === type)?.value ?? "00";
    return { hour: valueFor("hour"), minute: valueFor("minute"), second: valueFor("second") };
}

/**
 * Wall clock for the board footer.
 * @returns `HH:MM:SS` in the given time zone (e.g. "09:05:30")
 */
export function formatClockTime(date: Date, timeZone: string): string {
    const { hour, minute, second } = getClockParts(date, timeZone);
    return `${hour}:${minute}:${second}`;
}

/**
 * @returns `HH:MM` in the given time zone
 */
export function formatHourMinute(date: Date, timeZone: string): string {
    const { hour, minute } = getClockParts(date, timeZone);
    return `${hour}:${minute}`;
}

/**
 * Departure cell text: realtime (else planned) time plus the countdown,
 * e.g. "10:05 (+5)". Overdue departures keep their sign: "10:05 (+-1)".
 */
export function formatDepartureTime(departure: Departure, timeZone: string): string {
    return `${formatHourMinute(getDisplayTime(departure), timeZone)} (+${departure.countdownMinutes})`;
}
