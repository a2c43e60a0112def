import { BOARD_CONFIG } from "@core/config/env";
import { InvalidDimensionsError } from "@core/domain/error";
import { frameFromText } from "@core/domain/frame";

import { buildBoardTable, DEFAULT_LAYOUT } from "@board/utils/boardRows";
import { renderTable } from "@board/utils/tableLayout";

import type { Departure, TrafficNote } from "@core/domain/departure";
import type { Frame } from "@core/domain/frame";
import type { BoardLayout } from "@board/utils/boardRows";
import type { TableRenderer } from "@board/utils/tableLayout";

export const MIN_WIDTH = 20;
export const MIN_HEIGHT = 6;

export type FormatBoardInput = {
    departures: readonly Departure[];
    trafficNotes?: readonly TrafficNote[];
    /** Footer note to show, or `null` for a clock-only footer */
    rotationIndex: number | null;
    width: number;
    height: number;
    now: Date;
    timeZone?: string;
    layout?: BoardLayout;
    render?: TableRenderer;
};

/**
 * Renders one full board frame of exactly `width` x `height` characters.
 */
export function formatBoard(input: FormatBoardInput): Frame {
    const { width, height, render = renderTable } = input;

    if (!Number.isInteger(width) || !Number.isInteger(height) || width < MIN_WIDTH || height < MIN_HEIGHT) {
        throw new InvalidDimensionsError(width, height, MIN_WIDTH, MIN_HEIGHT);
    }

    const table = buildBoardTable({
        departures: input.departures,
        trafficNotes: input.trafficNotes,
        rotationIndex: input.rotationIndex,
        height,
        now: input.now,
        timeZone: input.timeZone ?? BOARD_CONFIG.TIME_ZONE,
        layout: input.layout ?? DEFAULT_LAYOUT,
    });

    return frameFromText(render(table, width), width, height);
}
