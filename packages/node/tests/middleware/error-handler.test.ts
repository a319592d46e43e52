/**
 * Tests for error handler middleware.
 *
 * Verifies domain errors are mapped to correct HTTP status codes
 * and the error envelope format.
 */

import { describe, it, expect, vi } from "vitest";
import { Hono } from "hono";
import { ScheduleError } from "@cadence/schedules";
import { LedgerError } from "@cadence/ledger";
import type { AppEnv } from "../../src/types/api-contract.js";
import { createErrorHandler, statusForCode } from "../../src/middleware/error-handler.js";
import { as, createTestApp, jsonRequest } from "../setup.js";
import type { ErrorBody } from "../setup.js";

function throwingApp(err: Error, report?: (e: Error) => void) {
  const app = new Hono<AppEnv>();
  app.onError(createErrorHandler(report));
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

describe("statusForCode", () => {
  it("maps known codes", () => {
    expect(statusForCode("SCHEDULE_NOT_FOUND")).toBe(404);
    expect(statusForCode("NOTHING_TO_CLAIM")).toBe(422);
    expect(statusForCode("ALREADY_TERMINAL")).toBe(409);
    expect(statusForCode("INVALID_LABEL")).toBe(400);
  });

  it("treats unknown codes as internal faults", () => {
    expect(statusForCode("CONSERVATION_VIOLATION")).toBe(500);
  });
});

describe("error handler", () => {
  it("passes the domain message through for client errors", async () => {
    const res = await throwingApp(new LedgerError("INSUFFICIENT_BALANCE", "alice has 0 USDC")).request(
      "/boom",
    );
    expect(res.status).toBe(422);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "INSUFFICIENT_BALANCE",
      message: "alice has 0 USDC",
    });
  });

  it("hides the message of an unmapped domain error and reports it", async () => {
    const report = vi.fn();
    const err = new ScheduleError("CONSERVATION_VIOLATION", "stream 3: settle 1 + refund 1 != total 1");

    const res = await throwingApp(err, report).request("/boom");

    expect(res.status).toBe(500);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "CONSERVATION_VIOLATION",
      message: "Internal server error",
    });
    expect(report).toHaveBeenCalledTimes(1);
    expect(report.mock.calls[0]?.[0]).toBe(err);
  });

  it("turns unexpected errors into INTERNAL_ERROR", async () => {
    const report = vi.fn();
    const res = await throwingApp(new TypeError("x is undefined"), report).request("/boom");

    expect(res.status).toBe(500);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "INTERNAL_ERROR",
      message: "Internal server error",
    });
    expect(report).toHaveBeenCalledTimes(1);
  });

  it("maps engine errors raised through the app", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/streams/4/claim", "POST", undefined, as("bob")));

    expect(res.status).toBe(404);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("SCHEDULE_NOT_FOUND");
  });

  it("returns a NOT_FOUND envelope for unknown routes", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/nowhere");

    expect(res.status).toBe(404);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "NOT_FOUND",
      message: "No route for GET /api/v1/nowhere",
    });
  });
});
