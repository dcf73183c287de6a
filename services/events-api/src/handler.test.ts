import { apiRequest, testContext } from "../../../libs/app/testing";
import type { AppContext } from "../../../libs/app/context";
import { createEventsHandler } from "./handler";

async function seeded(): Promise<AppContext> {
    const ctx = testContext();
    await ctx.events.append({ timestamp: "2025-08-17T10:00:00.000Z", signal: "ecg", value: 0.1, unit: "mV", metadata: {} });
    await ctx.events.append({ timestamp: "2025-08-17T10:00:01.000Z", signal: "st_depr", value: -0.1, unit: "mV", metadata: { lead: "V5" } });
    await ctx.events.append({ timestamp: "2025-08-17T10:00:02.000Z", signal: "marked_event", metadata: { label: "Dizzy" } });
    return ctx;
}

beforeEach(() => {
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
    jest.restoreAllMocks();
});

test("returns events in [since, until), ascending", async () => {
    const ctx = await seeded();
    const handler = createEventsHandler(() => ctx);

    const res = await handler(apiRequest({
        queryStringParameters: { since: "2025-08-17T12:00:00+02:00", until: "2025-08-17T10:00:02Z" },
    }));

    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body)).toEqual({
        since: "2025-08-17T10:00:00.000Z",
        until: "2025-08-17T10:00:02.000Z",
        count: 2,
        events: [
            { timestamp: "2025-08-17T10:00:00.000Z", signal: "ecg", value: 0.1, unit: "mV", metadata: {} },
            { timestamp: "2025-08-17T10:00:01.000Z", signal: "st_depr", value: -0.1, unit: "mV", metadata: { lead: "V5" } },
        ],
    });
});

test("summary view drops raw ECG", async () => {
    const ctx = await seeded();
    const handler = createEventsHandler(() => ctx);

    const res = await handler(apiRequest({
        queryStringParameters: { since: "2025-08-17T00:00:00Z", until: "2025-08-18T00:00:00Z", view: "summary" },
    }));

    expect(JSON.parse(res.body).events).toEqual([
        { timestamp: "2025-08-17T10:00:01.000Z", source: null, signal: "st_depr", magnitude_mv: -0.1, lead: "V5" },
        { timestamp: "2025-08-17T10:00:02.000Z", source: null, signal: "marked_event", label: "Dizzy" },
    ]);
});

test("an empty window is an empty list", async () => {
    const handler = createEventsHandler(() => testContext());
    const res = await handler(apiRequest({ queryStringParameters: { since: "2025-08-17T00:00:00Z", until: "2025-08-17T00:00:00Z" } }));
    expect(JSON.parse(res.body)).toEqual({ since: "2025-08-17T00:00:00.000Z", until: "2025-08-17T00:00:00.000Z", count: 0, events: [] });
});

test("since after until is a 400", async () => {
    const handler = createEventsHandler(() => testContext());
    const res = await handler(apiRequest({ queryStringParameters: { since: "2025-08-18T00:00:00Z", until: "2025-08-17T00:00:00Z" } }));

    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body)).toEqual({ ok: false, error: "Invalid range query: until: since must not be after until" });
});

test("missing bounds are a 400", async () => {
    const handler = createEventsHandler(() => testContext());
    const res = await handler(apiRequest());
    expect(res.statusCode).toBe(400);
});
