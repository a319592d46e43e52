/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe: engines initialized and event log intact
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { CadenceService } from "../services/cadence-service.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(service: CadenceService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.verifyEvents();
    const engines: SubsystemStatus = service.isReady()
      ? { status: "ok" }
      : { status: "down", detail: "engines not initialized" };
    const eventLog: SubsystemStatus = integrity.valid
      ? { status: "ok" }
      : { status: "down", detail: `chainValid=false, errors=${String(integrity.errors.length)}` };
    const ready = engines.status === "ok" && eventLog.status === "ok";

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        subsystems: { engines, eventLog },
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
