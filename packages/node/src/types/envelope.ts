/**
 * Response envelopes.
 *
 * Success: { data: T }
 * Failure: { error: { code, message, details? } }
 *
 * Domain error codes (ScheduleErrorCode, LedgerErrorCode, ...) pass
 * through unchanged; ApiErrorCode lists the codes the HTTP layer adds.
 */

export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "INTERNAL_ERROR";

export interface ErrorDetail {
  readonly code: ApiErrorCode | (string & {});
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export interface DataEnvelope<T> {
  readonly data: T;
}

export function createErrorEnvelope(
  code: ErrorDetail["code"],
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return details === undefined
    ? { error: { code, message } }
    : { error: { code, message, details } };
}

export function dataEnvelope<T>(data: T): DataEnvelope<T> {
  return { data };
}
