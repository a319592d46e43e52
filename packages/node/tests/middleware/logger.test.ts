/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import { as, createTestApp, jsonRequest, TOKEN } from "../setup.js";
import type { RequestLogEntry } from "../../src/middleware/logger.js";

describe("loggerMiddleware", () => {
  it("calls logFn with request details", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    const res = await app.request("/health", { headers: { "X-Request-Id": "req-1" } });

    expect(res.status).toBe(200);
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      method: "GET",
      path: "/health",
      status: 200,
      requestId: "req-1",
      account: undefined,
    });
    expect(entries[0]?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("records the authenticated account and the final status", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(
      jsonRequest(
        "/api/v1/streams",
        "POST",
        { recipient: "bob", token: TOKEN, totalAmount: "10", startTime: "1000", endTime: "2000" },
        as("alice"),
      ),
    );

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      method: "POST",
      path: "/api/v1/streams",
      status: 422,
      account: "alice",
    });
  });
});
