export const UI_TEXT = {
    BOARD: {
        COLUMNS: ["Departure", "Line", "Closest station", "Destination"],
    },
    ERROR: {
        TRANSPORT: (detail: string) => `Could not reach the departure feed: ${detail}`,
        PARSE: (detail: string) => `The departure feed sent an unreadable response: ${detail}`,
        NORMALIZATION: (detail: string) => `The departure feed has an unexpected format: ${detail}`,
        RENDERING: (detail: string) => `Failed to draw the departure board: ${detail}`,
        TERMINAL: (detail: string) => `Failed to write to the terminal: ${detail}`,
        UNKNOWN: (detail: string) => `Unexpected error: ${detail}`,
        RETRY_HINT: (seconds: number) => `Retrying in ${seconds}s…`,
    },
} as const;
