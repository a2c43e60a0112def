import { describe, expect, it } from "vitest";

import { formatClockTime, formatDepartureTime, formatHourMinute } from "@shared/utils/formatters";
import { makeDeparture } from "@test/factories";

describe("formatters", () => {
    it("formats the clock as HH:MM:SS in the board time zone", () => {
        const instant = new Date("2024-01-01T08:05:09Z");

        expect(formatClockTime(instant, "UTC")).toBe("08:05:09");
        expect(formatClockTime(instant, "Europe/Vienna")).toBe("09:05:09");
    });

    it("uses a 00-23 hour cycle", () => {
        expect(formatClockTime(new Date("2024-01-01T23:00:00Z"), "Europe/Vienna")).toBe("00:00:00");
        expect(formatHourMinute(new Date("2024-07-01T22:30:00Z"), "Europe/Vienna")).toBe("00:30");
    });

    it("prefers the realtime estimate for the departure cell", () => {
        const planned = new Date("2024-01-01T09:00:00Z");

        expect(formatDepartureTime(makeDeparture({ timePlanned: planned, countdownMinutes: 5 }), "Europe/Vienna")).toBe(
            "10:00 (+5)"
        );
        expect(
            formatDepartureTime(
                makeDeparture({ timePlanned: planned, timeReal: new Date("2024-01-01T09:02:00Z"), countdownMinutes: 7 }),
                "Europe/Vienna"
            )
        ).toBe("10:02 (+7)");
    });

    it("prints overdue countdowns as they come", () => {
        const departure = makeDeparture({ timePlanned: new Date("2024-01-01T09:00:00Z"), countdownMinutes: -1 });

        expect(formatDepartureTime(departure, "UTC")).toBe("09:00 (+-1)");
    });
});
