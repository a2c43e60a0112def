import { getEnv, getEnvBoolean, getEnvInteger, getEnvIntegerArray } from "@core/utils/parser";

// ----------------------------------------------------------------------
// Internal Parsing Helpers & Raw Data
// ----------------------------------------------------------------------

// Stops shown when BOARD_STOP_IDS is not set (Rathaus / Schottentor / Volkstheater area)
const DEFAULT_STOP_IDS: number[] = [
    252, // Rathaus – 2 (towards Friedrich-Engels-Platz)
    269, // Rathaus – 2 (towards Dornbach)
    4205, // Rathaus – U2
    4210, // Rathaus – U2
    1346, // Landesgerichtsstraße – 43, 44, N43 (outbound)
    1212, // Schottentor – 37, 38, 40, 41, 42 (outbound)
    1303, // Schottentor – 40A (outbound)
    3701, // Schottentor – N38 (outbound, weekends only)
    5568, // Schottentor – N41 (outbound)
    17, // Rathausplatz/Burgtheater – D, 1, 71, N25, N38, N60, N66
    48, // Stadiongasse/Parlament – D, 1, 71 (towards Volkstheater)
    16, // Stadiongasse/Parlament – D, 1, 2, 71 (towards Schottentor)
    1401, // Volkstheater – 48A (outbound)
    1440, // Volkstheater – 49 (outbound)
    4908, // Volkstheater – U3 (towards Ottakring)
    4909, // Volkstheater – U3 (towards Simmering)
    1376, // Auerspergstraße – 46 (outbound)
    5691, // Auerspergstraße – N46 (outbound)
];

const RAW_API_URL = getEnv(process.env.BOARD_API_URL, "http://www.wienerlinien.at/ogd_realtime/monitor");

// ----------------------------------------------------------------------
// Exported Configurations
// ----------------------------------------------------------------------

export const APP_CONFIG = {
    NAME: getEnv(process.env.BOARD_APP_NAME, "departure-board"),
    IS_DEV: getEnvBoolean(process.env.BOARD_DEBUG, false),
} as const;

export const API_CONFIG = {
    MONITOR: {
        URL: RAW_API_URL.replace(/\/+$/, ""),
        TRAFFIC_INFO: getEnv(process.env.BOARD_TRAFFIC_INFO, "stoerunglang"),
        RETRIES: getEnvInteger(process.env.BOARD_FETCH_RETRIES, 1),
    },
} as const;

export const BOARD_CONFIG = {
    STOP_IDS: getEnvIntegerArray(process.env.BOARD_STOP_IDS, ",", DEFAULT_STOP_IDS),
    REFRESH_INTERVAL_S: getEnvInteger(process.env.BOARD_REFRESH_INTERVAL_S, 1),
    SUBFRAMES_PER_FETCH: getEnvInteger(process.env.BOARD_SUBFRAMES_PER_FETCH, 10),
    TIME_ZONE: getEnv(process.env.BOARD_TIME_ZONE, "Europe/Vienna"),
} as const;

export type BoardOptions = {
    stopIds: number[];
    refreshIntervalS: number;
    subframesPerFetch: number;
};

/**
 * The operator facing options of the board, as read from the environment.
 */
export function getBoardOptions(): BoardOptions {
    return {
        stopIds: [...BOARD_CONFIG.STOP_IDS],
        refreshIntervalS: BOARD_CONFIG.REFRESH_INTERVAL_S,
        subframesPerFetch: BOARD_CONFIG.SUBFRAMES_PER_FETCH,
    };
}
