import { afterEach, describe, expect, it, vi } from "vitest";

import { FeedParseError } from "@core/domain/error";
import { HttpError, TransportError } from "@core/network/fetchAPI";
import { buildMonitorUrl, getMonitorData, parseMonitorResponse } from "@feed/api/getMonitorData";

const REQUEST = { stopIds: [252, 269], trafficInfo: "stoerunglang" };

describe("buildMonitorUrl", () => {
    it("repeats stopId for every stop, in order", () => {
        expect(buildMonitorUrl("http://feed.test/monitor", REQUEST)).toBe(
            "http://feed.test/monitor?activateTrafficInfo=stoerunglang&stopId=252&stopId=269"
        );
    });
});

describe("parseMonitorResponse", () => {
    it("parses JSON bodies", () => {
        expect(parseMonitorResponse('{"data":{"monitors":[]}}')).toEqual({ data: { monitors: [] } });
    });

    it("raises a FeedParseError for anything else", () => {
        expect(() => parseMonitorResponse("<html>maintenance</html>")).toThrow(FeedParseError);
    });
});

describe("getMonitorData", () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it("fetches the monitor URL and returns the parsed payload", async () => {
        const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response('{"data":{"monitors":[]}}'));
        vi.stubGlobal("fetch", fetchMock);

        const payload = await getMonitorData(REQUEST, { baseUrl: "http://feed.test/monitor" });

        expect(payload).toEqual({ data: { monitors: [] } });
        expect(fetchMock).toHaveBeenCalledTimes(1);
        expect(fetchMock.mock.calls[0][0]).toBe(
            "http://feed.test/monitor?activateTrafficInfo=stoerunglang&stopId=252&stopId=269"
        );
        expect(fetchMock.mock.calls[0][1]?.method).toBe("GET");
    });

    it("raises HttpError for error statuses", async () => {
        vi.stubGlobal("fetch", vi.fn(async () => new Response("down", { status: 503 })));

        const request = getMonitorData(REQUEST, { baseUrl: "http://feed.test/monitor" });

        await expect(request).rejects.toBeInstanceOf(HttpError);
        await expect(request).rejects.toMatchObject({ status: 503 });
    });

    it("raises TransportError when there is no response", async () => {
        vi.stubGlobal(
            "fetch",
            vi.fn(async () => {
                throw new TypeError("fetch failed");
            })
        );

        await expect(getMonitorData(REQUEST, { baseUrl: "http://feed.test/monitor" })).rejects.toBeInstanceOf(
            TransportError
        );
    });

    it("raises FeedParseError for a body that is not JSON", async () => {
        vi.stubGlobal("fetch", vi.fn(async () => new Response("not json")));

        await expect(getMonitorData(REQUEST, { baseUrl: "http://feed.test/monitor" })).rejects.toBeInstanceOf(
            FeedParseError
        );
    });

    it("retries when asked to", async () => {
        const fetchMock = vi
            .fn<() => Promise<Response>>()
            .mockRejectedValueOnce(new TypeError("fetch failed"))
            .mockResolvedValue(new Response('{"data":{"monitors":[]}}'));
        vi.stubGlobal("fetch", fetchMock);

        const payload = await getMonitorData(REQUEST, {
            baseUrl: "http://feed.test/monitor",
            retries: 2,
            retryDelay: 0,
        });

        expect(payload).toEqual({ data: { monitors: [] } });
        expect(fetchMock).toHaveBeenCalledTimes(2);
    });
});
