import { TerminalIOError } from "@core/domain/error";
import { frameRow } from "@core/domain/frame";

import type { Frame } from "@core/domain/frame";
import type { CellUpdate } from "@board/utils/frameDiff";

// ----------------------------------------------------------------------
// ANSI / VT sequences
// ----------------------------------------------------------------------

const ESC = "\u001b[";

export const ANSI = {
    CLEAR: `${ESC}2J`,
    HOME: `${ESC}H`,
    HIDE_CURSOR: `${ESC}?25l`,
    SHOW_CURSOR: `${ESC}?25h`,
    // 0-based coordinates in, 1-based out
    moveTo: (x: number, y: number) => `${ESC}${y + 1};${x + 1}H`,
} as const;

const FALLBACK_SIZE = { width: 80, height: 24 };

// ----------------------------------------------------------------------
// Types
// ----------------------------------------------------------------------

export type ScreenSize = { width: number; height: number };

/**
 * The part of a tty write stream the screen uses (process.stdout in practice).
 */
export type TerminalOutput = {
    columns?: number;
    rows?: number;
    write(chunk: string): boolean;
    on?(event: "error", listener: (error: Error) => void): unknown;
};

export interface BoardScreen {
    size(): ScreenSize;
    drawFull(frame: Frame): void;
    drawUpdates(updates: readonly { x: number; y: number; char: string }[]): void;
    showMessage(lines: readonly string[]): void;
    flush(): void;
    restore(): void;
}

/**
 * Queues cursor moves and characters and writes them as one chunk per flush,
 * so a sub-frame never reaches the terminal half drawn.
 */
export class TerminalScreen implements BoardScreen {
    private readonly output: TerminalOutput;
    private queue: string[] = [];
    private streamError: Error | null = null;

    constructor(output: TerminalOutput) {
        this.output = output;
        this.output.on?.("error", (error) => {
            this.streamError = error;
        });
    }

    /**
     * Usable screen size. The last column and row stay empty so writing the
     * bottom-right cell never scrolls the terminal.
     */
    size(): ScreenSize {
        const { columns, rows } = this.output;
        if (!columns || !rows) return { ...FALLBACK_SIZE };
        return { width: Math.max(columns - 1, 0), height: Math.max(rows - 1, 0) };
    }

    drawFull(frame: Frame): void {
        this.queue.push(ANSI.CLEAR, ANSI.HOME, ANSI.HIDE_CURSOR);
        for (let y = 0; y < frame.height; y++) {
            this.queue.push(ANSI.moveTo(0, y), frameRow(frame, y));
        }
    }

    drawUpdates(updates: readonly CellUpdate[]): void {
        for (const { x, y, char } of updates) {
            this.queue.push(ANSI.moveTo(x, y), char);
        }
    }

    showMessage(lines: readonly string[]): void {
        this.queue.push(ANSI.CLEAR, ANSI.HOME, ANSI.HIDE_CURSOR);
        lines.forEach((line, y) => this.queue.push(ANSI.moveTo(0, y), line));
    }

    flush(): void {
        this.queue.push(ANSI.HOME);
        const chunk = this.queue.join("");
        this.queue = [];
        this.write(chunk);
    }

    restore(): void {
        const { rows } = this.output;
        this.write(`${rows ? ANSI.moveTo(0, rows - 1) : ""}${ANSI.SHOW_CURSOR}\n`);
    }

    private write(chunk: string): void {
        if (this.streamError) {
            throw new TerminalIOError(`Terminal output failed: ${this.streamError.message}`, { cause: this.streamError });
        }
        try {
            this.output.write(chunk);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new TerminalIOError(`Terminal write failed: ${message}`, { cause: error });
        }
    }
}
