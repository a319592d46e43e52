/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import type { Context } from "hono";
import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { CadenceService } from "./services/cadence-service.js";
import type { CadenceServiceConfig } from "./services/cadence-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
} from "./middleware/idempotency.js";
import {
  authMiddleware,
  headerAccountMiddleware,
  requirePermission,
} from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createErrorEnvelope } from "./types/envelope.js";
import { createHealthRoutes } from "./routes/health.js";
import { createStreamRoutes } from "./routes/streams.js";
import { createVestingRoutes } from "./routes/vesting.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createLedgerRoutes } from "./routes/ledger.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: CadenceServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Sees every error that becomes a 500 */
  readonly reportError?: (err: Error, c: Context<AppEnv>) => void;
  readonly idempotencyTtlMs?: number;
  /**
   * Auth configuration. When provided, API key / JWT auth is enforced;
   * otherwise the caller is read from X-Account-Id.
   */
  readonly auth?: AuthConfig;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: CadenceService;
  readonly idempotencyStore: InMemoryIdempotencyStore;
}

// =============================================================================
// Factory
// =============================================================================

export function createApp(options: CreateAppOptions): AppInstance {
  const service = new CadenceService(options.serviceConfig);
  const idempotencyStore = new InMemoryIdempotencyStore(
    options.idempotencyTtlMs ?? 86400000,
  );

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.reportError));
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev)
    app.use("/api/*", headerAccountMiddleware());
  }

  // Everything but reads needs write permission
  const write = requirePermission("write");
  app.use("/api/*", async (c, next) =>
    c.req.method === "GET" || c.req.method === "HEAD" ? next() : write(c, next),
  );

  app.use("/api/*", idempotencyMiddleware(idempotencyStore));

  app.route("/api/v1/streams", createStreamRoutes());
  app.route("/api/v1/vesting", createVestingRoutes());
  app.route("/api/v1/accounts", createAccountRoutes());
  app.route("/api/v1/ledger", createLedgerRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service, idempotencyStore };
}
