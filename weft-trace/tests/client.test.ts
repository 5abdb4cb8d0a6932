import { afterEach, describe, expect, it, vi } from "vitest";
import { createTelemetryClient, getHeaders, normalizeEndpoint, resolveDefaultConfig } from "../src/index.js";

function okResponse(): Response {
  return new Response("{}", { status: 200, headers: { "Content-Type": "application/json" } });
}

function bodyOf(call: unknown[]): Record<string, unknown> {
  const init = call[1];
  if (typeof init !== "object" || init === null || !("body" in init) || typeof init.body !== "string") {
    throw new Error("request without a JSON body");
  }
  return JSON.parse(init.body);
}

describe("normalizeEndpoint", () => {
  it("appends /api once", () => {
    expect(normalizeEndpoint("http://telemetry.local/")).toBe("http://telemetry.local/api");
    expect(normalizeEndpoint("http://telemetry.local/api")).toBe("http://telemetry.local/api");
    expect(normalizeEndpoint("")).toBe("");
  });
});

describe("resolveDefaultConfig", () => {
  it("is disabled without an endpoint", () => {
    vi.stubEnv("TELEMETRY_ENDPOINT", "");
    vi.stubEnv("TELEMETRY_ENABLED", "");
    expect(resolveDefaultConfig().enabled).toBe(false);
  });

  it("picks the auth mode from the credentials present", () => {
    vi.stubEnv("TELEMETRY_AUTH_MODE", "");
    vi.stubEnv("TELEMETRY_API_KEY", "");
    vi.stubEnv("TELEMETRY_BEARER", "test-token");
    const config = { ...resolveDefaultConfig(), serviceId: "orders-api" };

    expect(config.authMode).toBe("bearer");
    expect(getHeaders(config)["Authorization"]).toBe("Bearer test-token");
  });
});

describe("createTelemetryClient", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("does nothing when disabled", async () => {
    const fetchMock = vi.fn(async () => okResponse());
    vi.stubGlobal("fetch", fetchMock);

    const client = createTelemetryClient({ serviceId: "orders-api", enabled: false, endpoint: "http://t.local" });
    client.log("info", "hello");
    await client.flush();

    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("ships logs, metrics and spans on flush", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => okResponse());
    vi.stubGlobal("fetch", fetchMock);

    const client = createTelemetryClient({
      serviceId: "orders-api",
      enabled: true,
      endpoint: "http://t.local",
      env: "test",
      authMode: "apiKey",
      apiKey: "test-key",
    });

    client.event("service.started", "up", { port: 8080 });
    client.metric("web.request.count", 1, { endpoint: "/a" });
    client.metric("web.request.count", 1, { endpoint: "/b" });
    client.span({ traceId: "t-1", spanId: "s-1", name: "/a", startTime: "2024-01-01T00:00:00.000Z" });
    await client.shutdown();

    expect(fetchMock.mock.calls.map((call) => call[0])).toEqual([
      "http://t.local/api/logs",
      "http://t.local/api/metrics",
      "http://t.local/api/traces",
    ]);

    const headers = fetchMock.mock.calls[0]?.[1].headers;
    expect(headers).toMatchObject({ "X-API-Key": "test-key", "X-Service-Id": "orders-api", "X-Env": "test" });

    const metrics = bodyOf(fetchMock.mock.calls[1] ?? []);
    expect(metrics.name).toBe("web.request.count");
    expect(metrics.metricType).toBe("counter");
    expect(metrics.dataPoints).toHaveLength(2);

    const traces = bodyOf(fetchMock.mock.calls[2] ?? []);
    expect(traces.spans).toEqual([
      {
        traceId: "t-1",
        spanId: "s-1",
        name: "/a",
        startTime: "2024-01-01T00:00:00.000Z",
        serviceName: "orders-api",
        attributes: { serviceId: "orders-api", env: "test" },
      },
    ]);
  });

  it("drops the oldest entries past maxQueue", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => okResponse());
    vi.stubGlobal("fetch", fetchMock);

    const client = createTelemetryClient({
      serviceId: "orders-api",
      enabled: true,
      endpoint: "http://t.local",
      maxQueue: 2,
    });
    client.log("info", "one");
    client.log("info", "two");
    client.log("info", "three");
    await client.shutdown();

    const logs = bodyOf(fetchMock.mock.calls[0] ?? []);
    expect(Array.isArray(logs.entries) ? logs.entries.map((e: { message: string }) => e.message) : []).toEqual([
      "two",
      "three",
    ]);
  });

  it("sends every queued entry in batches of maxBatch", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => okResponse());
    vi.stubGlobal("fetch", fetchMock);

    const client = createTelemetryClient({
      serviceId: "orders-api",
      enabled: true,
      endpoint: "http://t.local",
      maxBatch: 2,
    });
    for (const message of ["one", "two", "three", "four", "five"]) {
      client.log("info", message);
    }
    await client.shutdown();

    const batches = fetchMock.mock.calls.map((call) => {
      const { entries } = bodyOf(call);
      return Array.isArray(entries) ? entries.map((e: { message: string }) => e.message) : [];
    });
    expect(batches).toEqual([["one", "two"], ["three", "four"], ["five"]]);
  });

  it("waits for a flush already in flight and sends what was queued meanwhile", async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => {
      await gate;
      return okResponse();
    });
    vi.stubGlobal("fetch", fetchMock);

    const client = createTelemetryClient({ serviceId: "orders-api", enabled: true, endpoint: "http://t.local" });
    client.log("info", "first");
    const running = client.flush();
    client.log("info", "second");
    const stopped = client.shutdown();
    release();
    await Promise.all([running, stopped]);

    const messages = fetchMock.mock.calls.flatMap((call) => {
      const { entries } = bodyOf(call);
      return Array.isArray(entries) ? entries.map((e: { message: string }) => e.message) : [];
    });
    expect(messages).toEqual(["first", "second"]);
  });

  it("retries failed requests and logs the dropped batch", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const fetchMock = vi
      .fn(async (_url: string, _init: RequestInit) => okResponse())
      .mockRejectedValueOnce(new Error("connection refused"));
    vi.stubGlobal("fetch", fetchMock);

    const client = createTelemetryClient({
      serviceId: "orders-api",
      enabled: true,
      endpoint: "http://t.local",
      retry: 1,
    });
    client.log("warn", "retry me");
    await client.shutdown();

    expect(fetchMock).toHaveBeenCalledTimes(2);

    fetchMock.mockClear();
    fetchMock.mockRejectedValue(new Error("still down"));
    const noRetry = createTelemetryClient({
      serviceId: "orders-api",
      enabled: true,
      endpoint: "http://t.local",
      retry: 0,
    });
    noRetry.log("warn", "lost");
    await expect(noRetry.shutdown()).resolves.toBeUndefined();
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(console.log).toHaveBeenCalledWith(
      expect.stringMatching(/\[telemetry\] Dropping telemetry batch for \/logs: still down$/)
    );
  });
});
