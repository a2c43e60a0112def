import { UI_TEXT } from "@core/config/locale";
import { IndexOutOfBoundsError } from "@core/domain/error";

import { formatClockTime, formatDepartureTime } from "@shared/utils/formatters";

import type { Departure, TrafficNote } from "@core/domain/departure";

// ----------------------------------------------------------------------
// Constants & Types
// ----------------------------------------------------------------------

// Lines taken by the table's header, footer and borders
export const RESERVED_ROWS = 5;
// Screen lines one departure row takes, separator included
export const ROW_HEIGHT = 3;

export type BoardLayout = {
    reservedRows: number;
    rowHeight: number;
};

export const DEFAULT_LAYOUT: BoardLayout = { reservedRows: RESERVED_ROWS, rowHeight: ROW_HEIGHT };

export type BoardRow = [departure: string, line: string, station: string, destination: string];

/**
 * Table content before layout. A footer with fewer than four cells spans the
 * remaining columns with its last cell.
 */
export type BoardTable = {
    head: BoardRow;
    body: BoardRow[];
    footer: string[];
};

export type BoardRowsInput = {
    departures: readonly Departure[];
    trafficNotes?: readonly TrafficNote[];
    rotationIndex: number | null;
    height: number;
    now: Date;
    timeZone: string;
    layout?: BoardLayout;
};

const BLANK_ROW: BoardRow = ["", "", "", ""];

// ----------------------------------------------------------------------
// Helpers
// ----------------------------------------------------------------------

export function getBodyRowCount(height: number, layout: BoardLayout = DEFAULT_LAYOUT): number {
    return Math.max(0, Math.floor((height - layout.reservedRows) / layout.rowHeight));
}

/**
 * Resolves the note shown for a rotation index.
 * `index` wraps around the note count; a missing or empty note list is a caller error.
 */
export function selectTrafficNote(
    trafficNotes: readonly TrafficNote[] | undefined,
    rotationIndex: number
): { note: TrafficNote; position: number; total: number } {
    if (!trafficNotes || trafficNotes.length === 0) {
        throw new IndexOutOfBoundsError(rotationIndex, trafficNotes ? 0 : null);
    }
    if (!Number.isInteger(rotationIndex) || rotationIndex < 0) {
        throw new IndexOutOfBoundsError(rotationIndex, trafficNotes.length);
    }

    const position = rotationIndex % trafficNotes.length;
    return { note: trafficNotes[position], position, total: trafficNotes.length };
}

export function buildFooter(input: Pick<BoardRowsInput, "trafficNotes" | "rotationIndex" | "now" | "timeZone">): string[] {
    const clock = formatClockTime(input.now, input.timeZone);
    if (input.rotationIndex === null) return [clock];

    const { note, position, total } = selectTrafficNote(input.trafficNotes, input.rotationIndex);
    return [clock, `${position + 1}/${total}`, note.title, note.description];
}

// ----------------------------------------------------------------------
// Public API
// ----------------------------------------------------------------------

/**
 * Builds the board's table content: header, exactly `getBodyRowCount(height)`
 * body rows (truncated or padded with blank rows) and the footer.
 */
export function buildBoardTable(input: BoardRowsInput): BoardTable {
    const rowCount = getBodyRowCount(input.height, input.layout);

    const body: BoardRow[] = input.departures
        .slice(0, rowCount)
        .map((departure): BoardRow => [
            formatDepartureTime(departure, input.timeZone),
            departure.line.name,
            departure.stationName,
            departure.destinationName,
        ]);

    while (body.length < rowCount) {
        body.push([...BLANK_ROW]);
    }

    const [departure, line, station, destination] = UI_TEXT.BOARD.COLUMNS;

    return {
        head: [departure, line, station, destination],
        body,
        footer: buildFooter(input),
    };
}
