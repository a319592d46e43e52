/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps domain errors (ScheduleError, LedgerError, EventStoreError)
 * to HTTP status codes by their `code`.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { ScheduleError } from "@cadence/schedules";
import { LedgerError } from "@cadence/ledger";
import { EventStoreError } from "@cadence/event-store";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/envelope.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 422 | 500 | 503;

export const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Schedule engine errors
  NOT_INITIALIZED: 503,
  ALREADY_INITIALIZED: 409,
  UNAUTHORIZED: 403,
  INVALID_AMOUNT: 400,
  INVALID_DURATION: 400,
  INVALID_SCHEDULE: 400,
  INVALID_START_TIME: 400,
  INVALID_RECIPIENT: 400,
  INVALID_LABEL: 400,
  SCHEDULE_NOT_FOUND: 404,
  ALREADY_TERMINAL: 409,
  NOTHING_TO_CLAIM: 422,
  INVALID_TRANSITION: 409,
  ID_SPACE_EXHAUSTED: 409,

  // Ledger errors
  EMPTY_TRANSACTION: 400,
  INVALID_ACCOUNT: 400,
  SELF_TRANSFER: 400,
  INSUFFICIENT_BALANCE: 422,
  DUPLICATE_CORRELATION_ID: 409,
  DUPLICATE_ACCOUNT_ID: 409,
  UNKNOWN_ACCOUNT: 404,

  // Event store errors
  CONCURRENCY_CONFLICT: 409,
};

type DomainError = ScheduleError | LedgerError | EventStoreError;

function isDomainError(err: Error): err is DomainError {
  return (
    err instanceof ScheduleError ||
    err instanceof LedgerError ||
    err instanceof EventStoreError
  );
}

/** Status for a domain error code; unmapped codes are internal faults. */
export function statusForCode(code: string): ErrorStatus {
  return STATUS_MAP[code] ?? 500;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Build Hono's onError handler. `report` sees every error that becomes
 * a 500, before its details are hidden from the client.
 */
export function createErrorHandler(
  report?: (err: Error, c: Context<AppEnv>) => void,
): (err: Error, c: Context<AppEnv>) => Response {
  return (err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    if (isDomainError(err)) {
      const status = statusForCode(err.code);
      if (status === 500) {
        report?.(err, c);
        return c.json(createErrorEnvelope(err.code, "Internal server error"), 500);
      }
      return c.json(createErrorEnvelope(err.code, err.message), status);
    }

    report?.(err, c);
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}
