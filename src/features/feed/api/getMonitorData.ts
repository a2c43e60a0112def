import { fetchText } from "@core/network/fetchAPI";
import { FeedParseError } from "@core/domain/error";

import { API_CONFIG, BOARD_CONFIG } from "@core/config/env";

import type { FetchTextOptions } from "@core/network/fetchAPI";

export type MonitorRequest = {
    stopIds: readonly number[];
    trafficInfo: string;
};

/**
 * Builds the monitor URL, e.g.
 * `http://host/monitor?activateTrafficInfo=stoerunglang&stopId=252&stopId=269`
 */
export function buildMonitorUrl(baseUrl: string, request: MonitorRequest): string {
    const params = new URLSearchParams();
    params.append("activateTrafficInfo", request.trafficInfo);
    request.stopIds.forEach((stopId) => params.append("stopId", String(stopId)));
    return `${baseUrl}?${params.toString()}`;
}

/**
 * Parses the raw response body. The result is still untyped; see `normalizeFeed`.
 */
export function parseMonitorResponse(body: string): unknown {
    try {
        return JSON.parse(body);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new FeedParseError(`[getMonitorData] Response is not valid JSON: ${message}`, { cause: error });
    }
}

/**
 * Fetches the realtime monitor payload for the configured stops.
 * @returns The parsed JSON payload
 */
export async function getMonitorData(
    request: MonitorRequest = { stopIds: BOARD_CONFIG.STOP_IDS, trafficInfo: API_CONFIG.MONITOR.TRAFFIC_INFO },
    options: FetchTextOptions & { baseUrl?: string } = {}
): Promise<unknown> {
    const { baseUrl = API_CONFIG.MONITOR.URL, ...fetchOptions } = options;
    const body = await fetchText(buildMonitorUrl(baseUrl, request), {
        retries: API_CONFIG.MONITOR.RETRIES,
        ...fetchOptions,
    });
    return parseMonitorResponse(body);
}
