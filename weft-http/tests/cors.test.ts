import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { resetConfig, setConfig } from "@weft/sys";
import { matchesOrigin, parseCorsOrigins } from "../src/index.js";
import { createFixtureServer } from "./fixtures/web-server.js";

describe("parseCorsOrigins", () => {
  it("treats * as any origin", () => {
    expect(parseCorsOrigins(" * ")).toBe("*");
  });

  it("splits and normalizes a list", () => {
    expect(parseCorsOrigins("https://a.example.com/, ,https://b.example.com")).toEqual([
      "https://a.example.com",
      "https://b.example.com",
    ]);
  });
});

describe("matchesOrigin", () => {
  it("matches exact origins and subdomain wildcards", () => {
    expect(matchesOrigin("https://app.example.com", "https://app.example.com")).toBe(true);
    expect(matchesOrigin("https://api.example.com", "*.example.com")).toBe(true);
    expect(matchesOrigin("https://example.org", "*.example.com")).toBe(false);
    expect(matchesOrigin("not a url", "*.example.com")).toBe(false);
  });
});

describe("CORS middleware", () => {
  beforeEach(() => {
    resetConfig();
    vi.stubEnv("APP_ENV", "test");
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    resetConfig();
  });

  it("sends no CORS headers when no origins are configured", async () => {
    await createFixtureServer().test(async (_app, client) => {
      const res = await client.get("/1", { headers: { origin: "https://app.example.com" } });
      expect(res.headers.get("access-control-allow-origin")).toBeNull();
    });
  });

  it("allows any origin with *", async () => {
    setConfig("web.corsOrigins", "*");

    await createFixtureServer().test(async (_app, client) => {
      const res = await client.get("/1", { headers: { origin: "https://anywhere.example.net" } });
      expect(res.headers.get("access-control-allow-origin")).toBe("*");
      expect(res.headers.get("access-control-allow-credentials")).toBeNull();
    });
  });

  it("echoes a listed origin with credentials", async () => {
    setConfig("web.corsOrigins", "https://app.example.com,*.internal.example.com");

    await createFixtureServer().test(async (_app, client) => {
      const res = await client.get("/1", { headers: { origin: "https://tools.internal.example.com" } });
      expect(res.status).toBe(200);
      expect(res.headers.get("access-control-allow-origin")).toBe("https://tools.internal.example.com");
      expect(res.headers.get("access-control-allow-credentials")).toBe("true");
      expect(res.headers.get("vary")).toContain("Origin");
    });
  });

  it("leaves unlisted origins without CORS headers", async () => {
    setConfig("web.corsOrigins", "https://app.example.com");

    await createFixtureServer().test(async (_app, client) => {
      const res = await client.get("/1", { headers: { origin: "https://evil.example.org" } });
      expect(res.status).toBe(200);
      expect(res.headers.get("access-control-allow-origin")).toBeNull();
    });
  });

  it("answers preflight requests", async () => {
    setConfig("web.corsOrigins", "https://app.example.com");

    await createFixtureServer().test(async (_app, client) => {
      const allowed = await client.request("OPTIONS", "/1", {
        headers: { origin: "https://app.example.com", "access-control-request-method": "POST" },
      });
      expect(allowed.status).toBe(204);
      expect(allowed.headers.get("access-control-allow-methods")).toBe("GET, POST, PUT, PATCH, DELETE, OPTIONS");

      const denied = await client.request("OPTIONS", "/1", {
        headers: { origin: "https://evil.example.org", "access-control-request-method": "POST" },
      });
      expect(denied.status).toBe(403);
    });
  });
});
