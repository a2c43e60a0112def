import { FrameDimensionMismatchError } from "@core/domain/error";

/**
 * One full screen of characters, row-major.
 * `cells.length === width * height` holds for every Frame.
 */
export type Frame = Readonly<{
    width: number;
    height: number;
    cells: readonly string[];
}>;

export function createFrame(width: number, height: number, cells: readonly string[]): Frame {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
        throw new FrameDimensionMismatchError(`Invalid frame size ${width}x${height}`);
    }
    if (cells.length !== width * height) {
        throw new FrameDimensionMismatchError(
            `Frame ${width}x${height} needs ${width * height} cells, got ${cells.length}`
        );
    }
    return Object.freeze({ width, height, cells: Object.freeze([...cells]) });
}

// A cell never holds a control character
const CONTROL_CHAR = /[\u0000-\u001f\u007f-\u009f]/;

/**
 * Fits multi-line text into a width x height grid.
 * Lines are split into code points, clipped or padded with spaces; missing
 * lines are blank and surplus lines are dropped. Control characters become
 * spaces.
 */
export function frameFromText(text: string, width: number, height: number): Frame {
    const lines = text.split(/\r?\n/);
    const cells: string[] = [];

    for (let y = 0; y < height; y++) {
        const chars = Array.from(lines[y] ?? "", (char) => (CONTROL_CHAR.test(char) ? " " : char)).slice(0, width);
        while (chars.length < width) chars.push(" ");
        cells.push(...chars);
    }

    return createFrame(width, height, cells);
}

export function frameRow(frame: Frame, y: number): string {
    return frame.cells.slice(y * frame.width, (y + 1) * frame.width).join("");
}
