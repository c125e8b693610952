/**
 * Tests for caller identification middleware.
 *
 * Verifies:
 * - API key auth (valid, invalid, missing)
 * - X-Caller-Id fallback without keys
 * - API keys through the full app
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import type { AppEnv } from "../../src/types/api-contract.js";
import type { ApiKeyRecord } from "../../src/types/auth.js";
import { authMiddleware, createAuthConfig } from "../../src/middleware/auth.js";
import { createTestApp, jsonRequest } from "../setup.js";
import type { ErrorBody } from "../setup.js";

function makeApp(apiKeys?: readonly ApiKeyRecord[]) {
  const app = new Hono<AppEnv>();
  app.use("*", authMiddleware(apiKeys === undefined ? undefined : createAuthConfig(apiKeys)));
  app.get("/whoami", (c) => c.json({ caller: c.get("caller") }));
  return app;
}

describe("authMiddleware with API keys", () => {
  const app = makeApp([{ key: "test-key-owner", identity: "owner" }]);

  it("resolves a known key to its identity", async () => {
    const res = await app.request("/whoami", { headers: { "X-Api-Key": "test-key-owner" } });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ caller: { type: "api-key", identity: "owner" } });
  });

  it("returns 401 for an unknown key", async () => {
    const res = await app.request("/whoami", { headers: { "X-Api-Key": "nope" } });

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({ code: "UNAUTHORIZED", message: "Invalid API key" });
  });

  it("returns 401 without a key, even with X-Caller-Id", async () => {
    const res = await app.request("/whoami", { headers: { "X-Caller-Id": "owner" } });

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe("Authentication required");
  });
});

describe("authMiddleware without API keys", () => {
  const app = makeApp();

  it("trusts X-Caller-Id", async () => {
    const res = await app.request("/whoami", { headers: { "X-Caller-Id": " payee-1 " } });

    expect(await res.json()).toEqual({ caller: { type: "header", identity: "payee-1" } });
  });

  it("returns 401 for a missing or blank header", async () => {
    const missing = await app.request("/whoami");
    const blank = await app.request("/whoami", { headers: { "X-Caller-Id": "  " } });

    expect(missing.status).toBe(401);
    expect(blank.status).toBe(401);
    const body = (await missing.json()) as ErrorBody;
    expect(body.error.message).toBe("X-Caller-Id header required");
  });
});

describe("API keys through the app", () => {
  it("makes the key's identity the splitter owner", async () => {
    const { app } = createTestApp({
      auth: createAuthConfig([{ key: "test-key-owner", identity: "owner" }]),
    });

    const res = await app.request(
      jsonRequest("/api/v1/splitters", "POST", { id: "s1" }, { "X-Api-Key": "test-key-owner" }),
    );

    expect(res.status).toBe(201);
    const body = (await res.json()) as { data: { owner: string } };
    expect(body.data.owner).toBe("owner");
  });

  it("leaves health routes open", async () => {
    const { app } = createTestApp({
      auth: createAuthConfig([{ key: "test-key-owner", identity: "owner" }]),
    });

    const res = await app.request("/health");
    expect(res.status).toBe(200);
  });
});
