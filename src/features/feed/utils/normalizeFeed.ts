import { APP_CONFIG } from "@core/config/env";
import { createDeparture, createLine, sortDepartures } from "@core/domain/departure";
import { MissingFieldError, NormalizationError } from "@core/domain/error";

import {
    decodeArray,
    expectInteger,
    expectRecord,
    expectString,
    expectTimestamp,
    isRecord,
    optionalField,
    requireField,
} from "@feed/utils/decode";
import { toVehicleType } from "@feed/utils/vehicleType";

import type { Departure, Line, TrafficNote } from "@core/domain/departure";

// ----------------------------------------------------------------------
// Types
// ----------------------------------------------------------------------

export type FeedSnapshot = {
    departures: Departure[];
    /** `undefined` when the feed has no usable traffic section (hides the rotating footer) */
    trafficNotes?: TrafficNote[];
};

type RawDepartureTime = {
    timePlanned: Date;
    timeReal?: Date;
    countdown: number;
};

type MonitorLine = {
    line: Line;
    destinationName: string;
    departures: RawDepartureTime[];
};

// ----------------------------------------------------------------------
// Decoders
// ----------------------------------------------------------------------

function decodeDepartureTime(value: unknown, path: string): RawDepartureTime {
    const departure = expectRecord(value, path);
    const time = requireField(departure, "departureTime", path, expectRecord);
    const timePath = `${path}.departureTime`;

    return {
        timePlanned: requireField(time, "timePlanned", timePath, expectTimestamp),
        timeReal: optionalField(time, "timeReal", timePath, expectTimestamp),
        countdown: requireField(time, "countdown", timePath, expectInteger),
    };
}

function decodeMonitorLine(value: unknown, path: string): MonitorLine {
    const raw = expectRecord(value, path);

    const name = requireField(raw, "name", path, expectString);
    const destinationName = requireField(raw, "towards", path, expectString);
    const vehicleType = toVehicleType(requireField(raw, "type", path, expectString));

    const departuresPath = `${path}.departures`;
    const departures = requireField(raw, "departures", path, expectRecord);

    return {
        line: createLine(vehicleType, name),
        destinationName,
        departures: requireField(departures, "departure", departuresPath, (list, listPath) =>
            decodeArray(list, listPath, decodeDepartureTime)
        ),
    };
}

function decodeMonitor(value: unknown, path: string): Departure[] {
    const monitor = expectRecord(value, path);

    const locationStop = requireField(monitor, "locationStop", path, expectRecord);
    const properties = requireField(locationStop, "properties", `${path}.locationStop`, expectRecord);
    const stationName = requireField(properties, "title", `${path}.locationStop.properties`, expectString);

    const lines = requireField(monitor, "lines", path, (list, listPath) =>
        decodeArray(list, listPath, decodeMonitorLine)
    );

    return lines.flatMap(({ line, destinationName, departures }) =>
        departures.map((time) =>
            createDeparture({
                line,
                destinationName,
                stationName,
                timePlanned: time.timePlanned,
                timeReal: time.timeReal,
                countdownMinutes: time.countdown,
            })
        )
    );
}

function decodePriority(value: unknown, path: string): string {
    if (typeof value === "number" && Number.isFinite(value)) return String(value);
    return expectString(value, path);
}

function decodeTrafficNote(value: unknown, path: string): TrafficNote {
    const raw = expectRecord(value, path);
    const priority = optionalField(raw, "priority", path, decodePriority);

    return Object.freeze({
        title: requireField(raw, "title", path, expectString),
        description: requireField(raw, "description", path, expectString),
        ...(priority !== undefined ? { priority } : {}),
    });
}

// ----------------------------------------------------------------------
// Public API
// ----------------------------------------------------------------------

/**
 * Traffic notes are all-or-nothing: one bad entry drops the whole section.
 */
export function normalizeTrafficNotes(value: unknown): TrafficNote[] | undefined {
    if (!Array.isArray(value)) return undefined;

    try {
        return decodeArray(value, "data.trafficInfos", decodeTrafficNote);
    } catch (error) {
        if (!(error instanceof NormalizationError)) throw error;
        if (APP_CONFIG.IS_DEV) {
            console.warn("[normalizeFeed] Discarding traffic notes:", error.message);
        }
        return undefined;
    }
}

/**
 * Converts a parsed monitor payload into departures sorted by countdown plus
 * the optional traffic notes.
 * Any problem in the monitors aborts the whole normalization.
 */
export function normalizeFeed(payload: unknown): FeedSnapshot {
    const data = isRecord(payload) ? payload.data : undefined;
    const monitors = isRecord(data) ? data.monitors : undefined;

    if (!Array.isArray(monitors)) {
        throw new MissingFieldError("monitors");
    }

    const departures = monitors.flatMap((monitor, index) => decodeMonitor(monitor, `data.monitors[${index}]`));
    const trafficNotes = isRecord(data) ? normalizeTrafficNotes(data.trafficInfos) : undefined;

    return {
        departures: sortDepartures(departures),
        ...(trafficNotes !== undefined ? { trafficNotes } : {}),
    };
}
