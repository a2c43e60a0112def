import { diffFrames, hasResized } from "@board/utils/frameDiff";

import type { Frame } from "@core/domain/frame";
import type { CellUpdate } from "@board/utils/frameDiff";

export type FramePresentation =
    | { kind: "full"; frame: Frame }
    | { kind: "diff"; updates: CellUpdate[] };

/**
 * Double buffer of the last drawn frame and the next one.
 * Presenting a frame replaces the previous one.
 */
export class FrameBuffer {
    private previous: Frame | null = null;

    /**
     * Decides how to draw `next`: fully when nothing was drawn yet or the size
     * changed, otherwise as the cell diff against the previous frame.
     */
    present(next: Frame): FramePresentation {
        const previous = this.previous;
        this.previous = next;

        if (previous === null || hasResized(previous, next)) {
            return { kind: "full", frame: next };
        }
        return { kind: "diff", updates: diffFrames(previous, next) };
    }

    /**
     * Forget the previous frame so the next presentation is a full redraw
     * (e.g. after something else was written to the screen).
     */
    invalidate(): void {
        this.previous = null;
    }
}
