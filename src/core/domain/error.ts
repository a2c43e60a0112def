import { HttpError, TransportError } from "@core/network/fetchAPI";

/** Error codes surfaced by the refresh loop */
export type BoardErrorCode =
    | "ERR:TRANSPORT" // Fetch failed (network / HTTP)
    | "ERR:PARSE" // Response body is not valid JSON
    | "ERR:NORMALIZATION" // Payload parsed but has an unexpected shape
    | "ERR:RENDERING" // Internal contract violation while drawing
    | "ERR:TERMINAL" // Terminal write failed
    | "ERR:UNKNOWN";

// ----------------------------------------------------------------------
// Feed errors
// ----------------------------------------------------------------------

export class FeedParseError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "FeedParseError";
    }
}

export abstract class NormalizationError extends Error {}

export class MissingFieldError extends NormalizationError {
    readonly field: string;

    constructor(field: string) {
        super(`Missing response field: ${field}`);
        this.name = "MissingFieldError";
        this.field = field;
    }
}

export class MalformedValueError extends NormalizationError {
    readonly path: string;
    readonly expectedType: string;

    constructor(path: string, expectedType: string) {
        super(`Malformed value at ${path}: expected ${expectedType}`);
        this.name = "MalformedValueError";
        this.path = path;
        this.expectedType = expectedType;
    }
}

export class UnknownVehicleCodeError extends NormalizationError {
    readonly code: string;

    constructor(code: string) {
        super(`Unknown vehicle type code: ${code}`);
        this.name = "UnknownVehicleCodeError";
        this.code = code;
    }
}

// ----------------------------------------------------------------------
// Rendering & terminal errors
// ----------------------------------------------------------------------

export abstract class RenderingError extends Error {}

export class IndexOutOfBoundsError extends RenderingError {
    readonly index: number;
    readonly length: number | null;

    constructor(index: number, length: number | null) {
        super(
            length === null
                ? `Traffic note index ${index} supplied without traffic notes`
                : `Traffic note index ${index} out of bounds for ${length} note(s)`
        );
        this.name = "IndexOutOfBoundsError";
        this.index = index;
        this.length = length;
    }
}

export class InvalidDimensionsError extends RenderingError {
    constructor(width: number, height: number, minWidth: number, minHeight: number) {
        super(`Board size ${width}x${height} is below the minimum of ${minWidth}x${minHeight}`);
        this.name = "InvalidDimensionsError";
    }
}

export class FrameDimensionMismatchError extends RenderingError {
    constructor(message: string) {
        super(message);
        this.name = "FrameDimensionMismatchError";
    }
}

export class TerminalIOError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "TerminalIOError";
    }
}

// ----------------------------------------------------------------------
// Classification
// ----------------------------------------------------------------------

export function classifyBoardError(error: unknown): BoardErrorCode {
    if (error instanceof HttpError || error instanceof TransportError) return "ERR:TRANSPORT";
    if (error instanceof FeedParseError) return "ERR:PARSE";
    if (error instanceof NormalizationError) return "ERR:NORMALIZATION";
    if (error instanceof RenderingError) return "ERR:RENDERING";
    if (error instanceof TerminalIOError) return "ERR:TERMINAL";
    return "ERR:UNKNOWN";
}

/**
 * Only feed side failures end a single refresh cycle; everything else ends the process.
 */
export function isRecoverable(code: BoardErrorCode): boolean {
    return code === "ERR:TRANSPORT" || code === "ERR:PARSE" || code === "ERR:NORMALIZATION";
}
