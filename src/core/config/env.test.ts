import { afterEach, describe, expect, it, vi } from "vitest";

async function loadConfig() {
    vi.resetModules();
    return import("@core/config/env");
}

describe("env config", () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it("uses the built-in defaults", async () => {
        vi.stubEnv("BOARD_STOP_IDS", "");
        vi.stubEnv("BOARD_REFRESH_INTERVAL_S", "");
        vi.stubEnv("BOARD_SUBFRAMES_PER_FETCH", "");

        const { getBoardOptions, API_CONFIG } = await loadConfig();
        const options = getBoardOptions();

        expect(options.stopIds).toHaveLength(18);
        expect(options.stopIds[0]).toBe(252);
        expect(options.refreshIntervalS).toBe(1);
        expect(options.subframesPerFetch).toBe(10);
        expect(API_CONFIG.MONITOR.TRAFFIC_INFO).toBe("stoerunglang");
    });

    it("reads the board options from the environment", async () => {
        vi.stubEnv("BOARD_STOP_IDS", "17,48");
        vi.stubEnv("BOARD_REFRESH_INTERVAL_S", "2");
        vi.stubEnv("BOARD_SUBFRAMES_PER_FETCH", "5");
        vi.stubEnv("BOARD_API_URL", "http://feed.test/monitor/");

        const { getBoardOptions, API_CONFIG } = await loadConfig();

        expect(getBoardOptions()).toEqual({ stopIds: [17, 48], refreshIntervalS: 2, subframesPerFetch: 5 });
        expect(API_CONFIG.MONITOR.URL).toBe("http://feed.test/monitor");
    });
});
