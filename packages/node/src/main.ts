/**
 * @cadence/node — Entry point.
 *
 * Loads config, builds the app, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { SystemClock } from "@cadence/schedules";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  let authConfig: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0 || config.JWT_SECRET !== undefined) {
    const keyMap = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      keyMap.set(k.key, k);
    }
    authConfig = {
      apiKeys: keyMap,
      jwtSecret: config.JWT_SECRET,
      jwtIssuer: config.JWT_ISSUER,
    };
    logger.info(
      { apiKeyCount: parsedKeys.length, jwtEnabled: config.JWT_SECRET !== undefined },
      "Auth configured",
    );
  } else if (config.NODE_ENV === "production") {
    throw new Error("API_KEYS or JWT_SECRET must be set in production");
  } else {
    logger.warn("No API keys or JWT secret configured — callers are taken from X-Account-Id");
  }

  if (config.CLOCK_OFFSET_SECONDS !== 0) {
    logger.warn({ offsetSeconds: config.CLOCK_OFFSET_SECONDS }, "Engine clock is offset");
  }

  const { app } = createApp({
    serviceConfig: {
      admin: config.ADMIN_ACCOUNT,
      clock: new SystemClock(BigInt(config.CLOCK_OFFSET_SECONDS)),
      logger,
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${String(entry.status)}`);
    },
    reportError: (err, c) => {
      logger.error({ err, requestId: c.get("requestId") }, "Unhandled error");
    },
    idempotencyTtlMs: config.IDEMPOTENCY_TTL_MS,
    auth: authConfig,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Cadence node started");

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "Error while closing server");
        process.exit(1);
      }
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
