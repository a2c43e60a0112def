import "dotenv/config";

import { API_CONFIG, BOARD_CONFIG, getBoardOptions } from "@core/config/env";
import { classifyBoardError } from "@core/domain/error";

import { getMonitorData } from "@feed/api/getMonitorData";

import { BoardRefreshLoop } from "@board/services/BoardRefreshLoop";
import { TerminalScreen } from "@board/terminal/TerminalScreen";
import { getBoardErrorMessage } from "@board/utils/errorMessages";

async function main(): Promise<void> {
    const options = getBoardOptions();
    const screen = new TerminalScreen(process.stdout);

    const loop = new BoardRefreshLoop({
        fetchFeed: () => getMonitorData({ stopIds: options.stopIds, trafficInfo: API_CONFIG.MONITOR.TRAFFIC_INFO }),
        screen,
        refreshIntervalMs: options.refreshIntervalS * 1000,
        subframesPerFetch: options.subframesPerFetch,
        timeZone: BOARD_CONFIG.TIME_ZONE,
    });

    const shutdown = () => {
        loop.stop();
        screen.restore();
        process.exit(0);
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);

    try {
        await loop.run();
    } finally {
        screen.restore();
    }
}

main().catch((error: unknown) => {
    console.error(getBoardErrorMessage(classifyBoardError(error), error));
    process.exitCode = 1;
});
