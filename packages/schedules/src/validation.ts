/**
 * Creation-time validation.
 *
 * Every check runs before the engine issues any transfer, so a rejected
 * create leaves balances, ids and indexes untouched.
 */

import { I128_MAX, isAccountId, isTokenId, isU64, U64_MAX } from "@cadence/types";
import type { AccountId } from "@cadence/types";
import type { StreamParams, VestingParams } from "./types.js";
import { ScheduleError } from "./types.js";

const LABEL_PATTERN = /^[A-Za-z0-9_]{1,32}$/;

function assertParties(sender: AccountId, recipient: AccountId, token: string): void {
  if (!isAccountId(sender) || !isAccountId(recipient)) {
    throw new ScheduleError(
      "INVALID_RECIPIENT",
      `Invalid account id: "${isAccountId(sender) ? recipient : sender}"`,
    );
  }
  if (!isTokenId(token)) {
    throw new ScheduleError("INVALID_SCHEDULE", `Invalid token id: "${token}"`);
  }
}

function assertTotal(totalAmount: bigint): void {
  if (totalAmount <= 0n || totalAmount > I128_MAX) {
    throw new ScheduleError(
      "INVALID_AMOUNT",
      `Total amount must be a positive i128, got ${totalAmount.toString()}`,
    );
  }
}

function assertTime(value: bigint, field: string): void {
  if (!isU64(value)) {
    throw new ScheduleError(
      "INVALID_DURATION",
      `${field} must be a u64, got ${String(value)}`,
    );
  }
}

/**
 * @throws ScheduleError INVALID_RECIPIENT | INVALID_AMOUNT | INVALID_DURATION | INVALID_START_TIME
 */
export function validateStreamParams(
  sender: AccountId,
  params: StreamParams,
  now: bigint,
): void {
  assertParties(sender, params.recipient, params.token);
  if (sender === params.recipient) {
    throw new ScheduleError(
      "INVALID_RECIPIENT",
      `Cannot stream from "${sender}" to itself`,
    );
  }
  assertTotal(params.totalAmount);
  assertTime(params.startTime, "startTime");
  assertTime(params.endTime, "endTime");
  if (params.endTime <= params.startTime) {
    throw new ScheduleError(
      "INVALID_DURATION",
      `endTime (${params.endTime.toString()}) must be after startTime (${params.startTime.toString()})`,
    );
  }
  if (params.startTime < now) {
    throw new ScheduleError(
      "INVALID_START_TIME",
      `startTime ${params.startTime.toString()} is in the past (now ${now.toString()})`,
    );
  }
}

/**
 * @throws ScheduleError INVALID_RECIPIENT | INVALID_AMOUNT | INVALID_DURATION | INVALID_SCHEDULE | INVALID_LABEL
 */
export function validateVestingParams(grantor: AccountId, params: VestingParams): void {
  assertParties(grantor, params.beneficiary, params.token);
  assertTotal(params.totalAmount);
  assertTime(params.startTime, "startTime");
  assertTime(params.cliffDuration, "cliffDuration");
  assertTime(params.totalDuration, "totalDuration");
  if (params.totalDuration === 0n) {
    throw new ScheduleError("INVALID_DURATION", "totalDuration must be positive");
  }
  if (params.startTime > U64_MAX - params.totalDuration) {
    throw new ScheduleError(
      "INVALID_DURATION",
      "startTime + totalDuration overflows u64",
    );
  }
  if (params.cliffDuration >= params.totalDuration) {
    throw new ScheduleError(
      "INVALID_SCHEDULE",
      `cliffDuration (${params.cliffDuration.toString()}) must be less than totalDuration (${params.totalDuration.toString()})`,
    );
  }
  if (params.cliffAmount < 0n || params.cliffAmount > params.totalAmount) {
    throw new ScheduleError(
      "INVALID_AMOUNT",
      `cliffAmount must be within [0, ${params.totalAmount.toString()}], got ${params.cliffAmount.toString()}`,
    );
  }
  validateLabel(params.label);
}

export function validateLabel(label: string): void {
  if (!LABEL_PATTERN.test(label)) {
    throw new ScheduleError(
      "INVALID_LABEL",
      `Label must be 1-32 characters of [A-Za-z0-9_], got "${label}"`,
    );
  }
}
