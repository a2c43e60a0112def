import { APP_CONFIG, BOARD_CONFIG } from "@core/config/env";
import { UI_TEXT } from "@core/config/locale";
import { classifyBoardError, isRecoverable } from "@core/domain/error";

import { normalizeFeed } from "@feed/utils/normalizeFeed";

import { FrameBuffer } from "@board/services/FrameBuffer";
import { formatBoard, MIN_HEIGHT, MIN_WIDTH } from "@board/utils/formatBoard";
import { getBoardErrorMessage } from "@board/utils/errorMessages";

import type { BoardErrorCode } from "@core/domain/error";
import type { FeedSnapshot } from "@feed/utils/normalizeFeed";
import type { BoardScreen } from "@board/terminal/TerminalScreen";
import type { TableRenderer } from "@board/utils/tableLayout";

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export type RefreshState = "fetching" | "displaying";

// Listener type definitions
type ErrorListener = (code: BoardErrorCode, error: unknown) => void;

export type BoardRefreshLoopOptions = {
    /** Returns the parsed feed payload */
    fetchFeed: () => Promise<unknown>;
    screen: BoardScreen;
    refreshIntervalMs: number;
    subframesPerFetch: number;
    timeZone?: string;
    sleep?: (ms: number) => Promise<void>;
    now?: () => Date;
    onError?: ErrorListener;
    render?: TableRenderer;
    /** Full redraw after every fetch; defaults to on with debug logging, which writes over the board */
    redrawAfterFetch?: boolean;
};

/**
 * Drives the board: fetch, normalize, then draw `subframesPerFetch` sub-frames
 * one interval apart while the footer rotates through the traffic notes.
 *
 * Feed failures (transport, parse, normalization) end only the current cycle
 * and are shown on screen until the next one. Rendering and terminal failures
 * reject `run()`.
 */
export class BoardRefreshLoop {
    private readonly options: BoardRefreshLoopOptions;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly now: () => Date;
    private readonly redrawAfterFetch: boolean;
    private readonly buffer = new FrameBuffer();

    private rotation = 0;
    private stopped = false;
    private currentState: RefreshState = "fetching";

    constructor(options: BoardRefreshLoopOptions) {
        this.options = options;
        this.sleep = options.sleep ?? delay;
        this.now = options.now ?? (() => new Date());
        this.redrawAfterFetch = options.redrawAfterFetch ?? APP_CONFIG.IS_DEV;
    }

    get state(): RefreshState {
        return this.currentState;
    }

    /**
     * Runs cycles until `stop()` is called. Rejects on fatal errors.
     */
    async run(): Promise<void> {
        this.stopped = false;
        while (!this.stopped) {
            await this.runCycle();
        }
    }

    /**
     * Ends `run()` after the sub-frame in progress.
     */
    stop(): void {
        this.stopped = true;
    }

    /**
     * One fetch followed by its sub-frames.
     */
    async runCycle(): Promise<void> {
        this.currentState = "fetching";

        let snapshot: FeedSnapshot;
        try {
            snapshot = normalizeFeed(await this.options.fetchFeed());
        } catch (error: unknown) {
            await this.handleFeedError(error);
            return;
        }

        if (this.redrawAfterFetch) this.buffer.invalidate();

        this.currentState = "displaying";
        for (let i = 0; i < this.options.subframesPerFetch && !this.stopped; i++) {
            this.drawSubframe(snapshot);
            await this.sleep(this.options.refreshIntervalMs);
        }
    }

    /**
     * Formats and draws one sub-frame, then advances the footer rotation.
     */
    private drawSubframe(snapshot: FeedSnapshot): void {
        const { screen } = this.options;
        const size = screen.size();
        const hasNotes = snapshot.trafficNotes !== undefined && snapshot.trafficNotes.length > 0;

        const frame = formatBoard({
            departures: snapshot.departures,
            trafficNotes: snapshot.trafficNotes,
            rotationIndex: hasNotes ? this.rotation : null,
            width: Math.max(size.width, MIN_WIDTH),
            height: Math.max(size.height, MIN_HEIGHT),
            now: this.now(),
            timeZone: this.options.timeZone ?? BOARD_CONFIG.TIME_ZONE,
            render: this.options.render,
        });
        this.rotation += 1;

        const presentation = this.buffer.present(frame);
        if (presentation.kind === "full") {
            screen.drawFull(presentation.frame);
        } else {
            screen.drawUpdates(presentation.updates);
        }
        screen.flush();
    }

    private async handleFeedError(error: unknown): Promise<void> {
        const code = classifyBoardError(error);
        if (!isRecoverable(code)) throw error;

        if (APP_CONFIG.IS_DEV) {
            console.error("[BoardRefreshLoop] Refresh cycle failed:", error);
        }
        this.options.onError?.(code, error);

        const { screen, refreshIntervalMs } = this.options;
        screen.showMessage([
            getBoardErrorMessage(code, error),
            UI_TEXT.ERROR.RETRY_HINT(Math.round(refreshIntervalMs / 1000)),
        ]);
        screen.flush();
        this.buffer.invalidate();

        await this.sleep(refreshIntervalMs);
    }
}
