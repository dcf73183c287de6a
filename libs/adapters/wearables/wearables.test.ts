import { AuthError, NotFoundError, ProviderError } from "../../validation/errors";
import { createLiveMetricProvider, isWearableVendor, type AccessTokenSource } from "./index";

const tokens: AccessTokenSource = { getAccessToken: async () => "test-token" };
const now = () => new Date("2025-08-17T12:00:00Z");

const reply = (body: unknown, status = 200) =>
    new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });

function fakeFetch(route: (url: string) => Response) {
    return jest.fn(async (url: string, _init?: { headers?: Record<string, string> }) => route(url));
}

beforeEach(() => {
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
    jest.restoreAllMocks();
});

describe("fitbit", () => {
    test("reads deep RMSSD and breathing rate for today", async () => {
        const fetch = fakeFetch(url =>
            url.includes("/hrv/")
                ? reply({ hrv: [{ dateTime: "2025-08-17", value: { dailyRmssd: 34.3, deepRmssd: 31.9 } }] })
                : reply({ br: [{ dateTime: "2025-08-17", value: { breathingRate: 15.2 } }] }),
        );
        const provider = createLiveMetricProvider("fitbit", { tokens, fetch, now, baseUrl: "https://fitbit.test" });

        await expect(provider.fetchLiveMetric("u1")).resolves.toEqual({
            breath_rate: 15.2,
            hrv: 31.9,
            timestamp: "2025-08-17T00:00:00.000Z",
        });
        expect(fetch).toHaveBeenCalledWith("https://fitbit.test/1/user/-/hrv/date/2025-08-17.json", {
            headers: { Authorization: "Bearer test-token" },
        });
        expect(fetch).toHaveBeenCalledWith("https://fitbit.test/1/user/-/br/date/2025-08-17.json", {
            headers: { Authorization: "Bearer test-token" },
        });
    });

    test("accepts the older timestamp/deep layout and skips unusable entries", async () => {
        const fetch = fakeFetch(url =>
            url.includes("/hrv/")
                ? reply({ hrv: [{ timestamp: "2025-08-17T06:10:00Z", value: { deep: 42 } }, { value: {} }] })
                : reply({ br: [{ timestamp: "2025-08-17T06:00:00Z", value: { breathingRate: 16 } }] }),
        );
        const provider = createLiveMetricProvider("fitbit", { tokens, fetch, now });

        await expect(provider.fetchLiveMetric("u1")).resolves.toEqual({
            breath_rate: 16,
            hrv: 42,
            timestamp: "2025-08-17T06:10:00.000Z",
        });
        expect(console.warn).toHaveBeenCalledWith("fitbit-entries-discarded", { discarded: 1, total: 2 });
    });

    test("no data for today is NotFound", async () => {
        const fetch = fakeFetch(url => (url.includes("/hrv/") ? reply({ hrv: [] }) : reply({ br: [] })));
        await expect(createLiveMetricProvider("fitbit", { tokens, fetch, now }).fetchLiveMetric("u1")).rejects.toBeInstanceOf(NotFoundError);
    });

    test("401 is an auth error, other failures are provider errors", async () => {
        const denied = fakeFetch(() => reply({ errors: [] }, 401));
        await expect(createLiveMetricProvider("fitbit", { tokens, fetch: denied, now }).fetchLiveMetric("u1")).rejects.toBeInstanceOf(AuthError);

        const down = fakeFetch(() => reply({ errors: [] }, 503));
        await expect(createLiveMetricProvider("fitbit", { tokens, fetch: down, now }).fetchLiveMetric("u1")).rejects.toThrow(
            new ProviderError("fitbit request failed with status 503"),
        );
    });
});

describe("oura", () => {
    test("uses the latest sleep session with both numbers", async () => {
        const fetch = fakeFetch(() =>
            reply({
                data: [
                    { day: "2025-08-16", bedtime_end: "2025-08-16T07:00:00+02:00", average_breath: 14.5, average_hrv: 55 },
                    { day: "2025-08-17", bedtime_end: "2025-08-17T06:45:00+02:00", average_breath: 15.25, average_hrv: 48 },
                    { day: "2025-08-17", average_breath: null, average_hrv: null },
                ],
            }),
        );
        const provider = createLiveMetricProvider("oura", { tokens, fetch, now, baseUrl: "https://oura.test" });

        await expect(provider.fetchLiveMetric("u1")).resolves.toEqual({
            breath_rate: 15.25,
            hrv: 48,
            timestamp: "2025-08-17T04:45:00.000Z",
        });
        expect(fetch).toHaveBeenCalledWith(
            "https://oura.test/v2/usercollection/sleep?start_date=2025-08-16&end_date=2025-08-17",
            { headers: { Authorization: "Bearer test-token" } },
        );
    });

    test("a body that is not JSON is a provider error", async () => {
        const fetch = fakeFetch(() => new Response("<html>maintenance</html>", { status: 200 }));
        await expect(createLiveMetricProvider("oura", { tokens, fetch, now }).fetchLiveMetric("u1")).rejects.toBeInstanceOf(ProviderError);
    });

    test("a response without a data list is a provider error", async () => {
        const fetch = fakeFetch(() => reply({ sessions: [] }));
        await expect(createLiveMetricProvider("oura", { tokens, fetch, now }).fetchLiveMetric("u1")).rejects.toThrow(
            new ProviderError("oura sleep response has no data list"),
        );
    });

    test("403 is an auth error", async () => {
        const fetch = fakeFetch(() => reply({}, 403));
        await expect(createLiveMetricProvider("oura", { tokens, fetch, now }).fetchLiveMetric("u1")).rejects.toBeInstanceOf(AuthError);
    });

    test("no usable session is NotFound", async () => {
        const fetch = fakeFetch(() => reply({ data: [] }));
        await expect(createLiveMetricProvider("oura", { tokens, fetch, now }).fetchLiveMetric("u1")).rejects.toBeInstanceOf(NotFoundError);
    });
});

test("vendor names are a closed set", () => {
    expect(isWearableVendor("oura")).toBe(true);
    expect(isWearableVendor("garmin")).toBe(false);
    expect(createLiveMetricProvider("oura", { tokens }).vendor).toBe("oura");
});
