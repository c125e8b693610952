/**
 * Tests for health check endpoints.
 *
 * Verifies:
 * - GET /health returns 200 with status "ok"
 * - GET /ready reports the notification log and every splitter
 * - GET /ready returns 503 when the log fails its integrity check
 * - GET /ready returns 503 when a splitter's notifications were refused
 * - X-Request-Id is set on responses
 */

import { describe, it, expect, vi } from "vitest";
import { callerRequest, createTestApp, jsonRequest } from "./setup.js";

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);

    const body = (await res.json()) as { status: string; timestamp: string };
    expect(body.status).toBe("ok");
    expect(typeof body.timestamp).toBe("string");
  });

  it("generates an X-Request-Id header", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("preserves incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "test-req-123" }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });
});

describe("GET /ready", () => {
  it("is ready with no splitters", async () => {
    const { app } = createTestApp();
    const res = await app.request("/ready");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string; splitters: number; subsystems: unknown };
    expect(body.status).toBe("ready");
    expect(body.splitters).toBe(0);
    expect(body.subsystems).toEqual({ eventLog: { status: "ok" } });
  });

  it("checks every splitter", async () => {
    const { app } = createTestApp();
    await app.request(callerRequest("owner", "/api/v1/splitters", "POST", { id: "s1" }));
    await app.request(
      callerRequest("funder", "/api/v1/splitters/s1/deposits", "POST", {
        amount: { amount: "5", currency: "USDC", decimals: 6 },
      }),
    );

    const res = await app.request("/ready");
    const body = (await res.json()) as { splitters: number; subsystems: unknown };
    expect(res.status).toBe(200);
    expect(body.splitters).toBe(1);
    expect(body.subsystems).toEqual({
      eventLog: { status: "ok" },
      "splitter:s1": { status: "ok" },
    });
  });

  it("returns 503 when the notification log is broken", async () => {
    const { app, eventStore } = createTestApp();
    vi.spyOn(eventStore, "verifyIntegrity").mockReturnValue({
      valid: false,
      lastVerifiedPosition: 3,
      errors: [{ position: 4, reason: "Hash mismatch at position 4" }],
    });

    const res = await app.request("/ready");

    expect(res.status).toBe(503);
    const body = (await res.json()) as { status: string; subsystems: unknown };
    expect(body.status).toBe("not_ready");
    expect(body.subsystems).toEqual({
      eventLog: { status: "down", detail: "lastVerifiedPosition=3, errors=1" },
    });
  });

  it("returns 503 when a committed deposit could not be logged", async () => {
    const onPublishError = vi.fn();
    const { app, eventStore } = createTestApp({ onPublishError });
    await app.request(callerRequest("owner", "/api/v1/splitters", "POST", { id: "s1" }));
    vi.spyOn(eventStore, "append").mockImplementationOnce(() => {
      throw new Error("disk full");
    });

    const deposit = await app.request(
      callerRequest("funder", "/api/v1/splitters/s1/deposits", "POST", {
        amount: { amount: "5", currency: "USDC", decimals: 6 },
      }),
    );
    expect(deposit.status).toBe(201);

    const res = await app.request("/ready");
    expect(res.status).toBe(503);
    const body = (await res.json()) as { subsystems: unknown };
    expect(body.subsystems).toEqual({
      eventLog: { status: "ok" },
      "splitter:s1": { status: "down", detail: "unpublished notification batches: 1" },
    });
    expect(onPublishError).toHaveBeenCalledTimes(1);
    expect(onPublishError).toHaveBeenCalledWith(
      expect.objectContaining({ streamId: "splitter:s1", reason: "disk full" }),
    );
  });
});

describe("notification subscription", () => {
  it("hands every recorded notification to onEvent", async () => {
    const onEvent = vi.fn();
    const { app } = createTestApp({ onEvent });
    await app.request(callerRequest("owner", "/api/v1/splitters", "POST", { id: "s1" }));
    await app.request(
      callerRequest("owner", "/api/v1/splitters/s1/initialize", "POST", {
        identities: ["p1", "p2"],
        shares: [1, 1],
      }),
    );

    expect(onEvent).toHaveBeenCalledTimes(2);
    expect(onEvent).toHaveBeenLastCalledWith(
      expect.objectContaining({ streamId: "splitter:s1", version: 2 }),
    );
  });
});
