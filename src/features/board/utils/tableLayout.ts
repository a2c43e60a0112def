import Table from "cli-table3";

import type { BoardTable } from "@board/utils/boardRows";

/**
 * Lays out the board table to exactly `width` columns. Returns the table text,
 * one screen line per text line.
 */
export type TableRenderer = (table: BoardTable, width: number) => string;

const COLUMN_COUNT = 4;
// Relative share of the free width per column: departure, line, station, destination
const COLUMN_WEIGHTS = [2, 1, 3, 3];
const MIN_COLUMN_WIDTH = 3;

// Rounded corners on top of the default box drawing set
const ROUNDED_CHARS = {
    "top-left": "╭",
    "top-right": "╮",
    "bottom-left": "╰",
    "bottom-right": "╯",
};

// Strip any SGR sequences so every character maps to one grid cell
const ANSI_SGR = /\u001b\[[0-9;]*m/g;
// C0 (except the line feed), DEL and C1: the terminal would act on them
const CONTROL_CHARS = /[\u0000-\u0009\u000b-\u001f\u007f-\u009f]/g;

/**
 * Makes feed text safe to lay out: line breaks become "\n" and every other
 * control character becomes a space.
 */
export function toCellText(text: string): string {
    return text.replace(/\r\n?/g, "\n").replace(CONTROL_CHARS, " ");
}

/**
 * Splits `width` into column widths (padding included) so that the columns
 * plus the COLUMN_COUNT + 1 vertical borders fill the whole width.
 */
export function getColumnWidths(width: number): number[] {
    const available = Math.max(width - (COLUMN_COUNT + 1), COLUMN_COUNT * MIN_COLUMN_WIDTH);
    const totalWeight = COLUMN_WEIGHTS.reduce((sum, weight) => sum + weight, 0);

    const widths = COLUMN_WEIGHTS.map((weight) =>
        Math.max(MIN_COLUMN_WIDTH, Math.floor((available * weight) / totalWeight))
    );

    // Hand the rounding remainder out one column at a time, last column first
    let remainder = available - widths.reduce((sum, w) => sum + w, 0);
    for (let i = widths.length - 1; remainder > 0; i = (i - 1 + widths.length) % widths.length) {
        widths[i] += 1;
        remainder -= 1;
    }

    // Raising narrow columns to the minimum can overshoot; take it back from the widest
    while (remainder < 0) {
        widths[widths.indexOf(Math.max(...widths))] -= 1;
        remainder += 1;
    }

    return widths;
}

export const renderTable: TableRenderer = (board, width) => {
    const table = new Table({
        head: board.head.map(toCellText),
        colWidths: getColumnWidths(width),
        wordWrap: true,
        chars: ROUNDED_CHARS,
        style: {
            "padding-left": 1,
            "padding-right": 1,
            head: [],
            border: [],
            compact: false,
        },
    });

    board.body.forEach((row) => table.push(row.map(toCellText)));

    const footer = board.footer.slice(0, COLUMN_COUNT).map(toCellText);
    const span = COLUMN_COUNT - footer.length + 1;
    table.push(
        footer.map((content, index) =>
            index === footer.length - 1 && span > 1 ? { content, colSpan: span } : content
        )
    );

    return table.toString().replace(ANSI_SGR, "");
};
