import { UI_TEXT } from "@core/config/locale";

import type { BoardErrorCode } from "@core/domain/error";

/**
 * Map of error codes to operator-facing messages
 */
export const ERROR_MESSAGE_MAP: Record<BoardErrorCode, (detail: string) => string> = {
    "ERR:TRANSPORT": UI_TEXT.ERROR.TRANSPORT,
    "ERR:PARSE": UI_TEXT.ERROR.PARSE,
    "ERR:NORMALIZATION": UI_TEXT.ERROR.NORMALIZATION,
    "ERR:RENDERING": UI_TEXT.ERROR.RENDERING,
    "ERR:TERMINAL": UI_TEXT.ERROR.TERMINAL,
    "ERR:UNKNOWN": UI_TEXT.ERROR.UNKNOWN,
};

/**
 * Get an operator-facing message for a board error
 * @param code - The error code
 * @param error - The error itself, used for the detail text
 */
export function getBoardErrorMessage(code: BoardErrorCode, error: unknown): string {
    const detail = error instanceof Error ? error.message : String(error);
    return `[${code}] ${ERROR_MESSAGE_MAP[code](detail)}`;
}
