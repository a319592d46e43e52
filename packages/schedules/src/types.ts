/**
 * @cadence/schedules — Domain types.
 *
 * A schedule escrows a fixed total of one token and releases it to a
 * recipient over time. Two kinds share one record shape:
 *
 * - stream: linear release from startTime to endTime
 * - vesting: nothing before the cliff, cliffAmount at the cliff, then
 *   linear release of the remainder to startTime + totalDuration
 *
 * All amounts are bigint token units (i128 range); all times are bigint
 * seconds (u64 range). There is no floating point anywhere.
 */

import type { AccountId, TokenId } from "@cadence/types";

// =============================================================================
// Status
// =============================================================================

export type ScheduleKind = "stream" | "vesting";

/**
 * - active: accruing and claimable
 * - completed: everything claimed
 * - cancelled: stream terminated by its sender
 * - revoked: vesting grant terminated by its grantor
 */
export type ScheduleStatus = "active" | "completed" | "cancelled" | "revoked";

export type TerminalStatus = Exclude<ScheduleStatus, "active">;

// =============================================================================
// Records
// =============================================================================

/**
 * What a cancel or revoke paid out. `originalTotal` keeps the pre-revoke
 * total since revocation caps `totalAmount` down to what had vested.
 */
export interface TerminationRecord {
  readonly at: bigint;
  readonly settledAmount: bigint;
  readonly refundedAmount: bigint;
  readonly originalTotal: bigint;
}

interface ScheduleBase {
  /** Sequential from 0 per engine, never reused */
  readonly id: number;
  /** Grantor for vesting */
  readonly sender: AccountId;
  /** Beneficiary for vesting */
  readonly recipient: AccountId;
  readonly token: TokenId;
  readonly totalAmount: bigint;
  /** Includes amounts settled on termination */
  readonly claimedAmount: bigint;
  readonly startTime: bigint;
  readonly status: ScheduleStatus;
  readonly lastClaimTime: bigint;
  readonly createdAt: bigint;
  readonly termination?: TerminationRecord;
}

export interface StreamSchedule extends ScheduleBase {
  readonly kind: "stream";
  readonly endTime: bigint;
}

export interface VestingSchedule extends ScheduleBase {
  readonly kind: "vesting";
  /** Offset from startTime; strictly less than totalDuration */
  readonly cliffDuration: bigint;
  /** Unlocked at once when the cliff is reached */
  readonly cliffAmount: bigint;
  readonly totalDuration: bigint;
  readonly label: string;
  readonly revocable: boolean;
}

export type Schedule = StreamSchedule | VestingSchedule;

/**
 * One successful claim. Settlement on termination is not a claim and
 * does not appear in the history.
 */
export interface ClaimRecord {
  readonly amount: bigint;
  readonly timestamp: bigint;
}

/** Point-in-time view of a schedule. */
export interface ScheduleProgress {
  readonly id: number;
  readonly kind: ScheduleKind;
  readonly status: ScheduleStatus;
  readonly totalAmount: bigint;
  readonly accruedAmount: bigint;
  readonly claimedAmount: bigint;
  readonly claimableAmount: bigint;
  readonly asOf: bigint;
}

// =============================================================================
// Creation parameters
// =============================================================================

export interface StreamParams {
  readonly recipient: AccountId;
  readonly token: TokenId;
  readonly totalAmount: bigint;
  readonly startTime: bigint;
  readonly endTime: bigint;
}

export interface VestingParams {
  readonly beneficiary: AccountId;
  readonly token: TokenId;
  readonly totalAmount: bigint;
  readonly startTime: bigint;
  readonly cliffDuration: bigint;
  readonly cliffAmount: bigint;
  readonly totalDuration: bigint;
  readonly label: string;
  readonly revocable: boolean;
}

// =============================================================================
// Errors
// =============================================================================

export type ScheduleErrorCode =
  | "NOT_INITIALIZED"
  | "ALREADY_INITIALIZED"
  | "UNAUTHORIZED"
  | "INVALID_AMOUNT"
  | "INVALID_DURATION"
  | "INVALID_SCHEDULE"
  | "INVALID_START_TIME"
  | "INVALID_RECIPIENT"
  | "INVALID_LABEL"
  | "SCHEDULE_NOT_FOUND"
  | "ALREADY_TERMINAL"
  | "NOTHING_TO_CLAIM"
  | "INVALID_TRANSITION"
  | "CONSERVATION_VIOLATION"
  | "ID_SPACE_EXHAUSTED";

export class ScheduleError extends Error {
  public readonly code: ScheduleErrorCode;
  constructor(code: ScheduleErrorCode, message: string) {
    super(message);
    this.name = "ScheduleError";
    this.code = code;
  }
}
