import { createFrame } from "@core/domain/frame";
import { FrameDimensionMismatchError } from "@core/domain/error";

import type { Frame } from "@core/domain/frame";

export type CellUpdate = Readonly<{
    x: number;
    y: number;
    char: string;
}>;

export function hasResized(prev: Frame, cur: Frame): boolean {
    return prev.width !== cur.width || prev.height !== cur.height;
}

/**
 * Cells that differ between two frames of the same size, in row-major order.
 * Callers must check `hasResized` first and redraw fully instead.
 */
export function diffFrames(prev: Frame, cur: Frame): CellUpdate[] {
    if (hasResized(prev, cur)) {
        throw new FrameDimensionMismatchError(
            `Cannot diff a ${prev.width}x${prev.height} frame against a ${cur.width}x${cur.height} frame`
        );
    }

    const updates: CellUpdate[] = [];
    for (let i = 0; i < cur.cells.length; i++) {
        if (prev.cells[i] !== cur.cells[i]) {
            updates.push({ x: i % cur.width, y: Math.floor(i / cur.width), char: cur.cells[i] });
        }
    }
    return updates;
}

/**
 * Writes the updates into a copy of `frame`.
 */
export function applyCellUpdates(frame: Frame, updates: readonly CellUpdate[]): Frame {
    const cells = [...frame.cells];
    for (const { x, y, char } of updates) {
        if (x < 0 || y < 0 || x >= frame.width || y >= frame.height) {
            throw new FrameDimensionMismatchError(`Update (${x}, ${y}) outside ${frame.width}x${frame.height} frame`);
        }
        cells[y * frame.width + x] = char;
    }
    return createFrame(frame.width, frame.height, cells);
}
