/**
 * Claim and termination planning.
 *
 * Pure functions from (schedule, now) to the amounts that must move and
 * the record that results. Engines apply a plan only after the ledger
 * accepted its transfers.
 */

import { accrued, claimableAmount } from "./accrual.js";
import { assertTransition, isTerminal, terminationStatus } from "./lifecycle.js";
import type { Schedule } from "./types.js";
import { ScheduleError } from "./types.js";

export interface ClaimPlan<S extends Schedule> {
  readonly amount: bigint;
  readonly next: S;
}

export interface TerminationPlan<S extends Schedule> {
  /** Accrued but unclaimed; goes to the recipient */
  readonly settleable: bigint;
  /** Never accrued; goes back to the sender */
  readonly refund: bigint;
  readonly next: S;
}

function assertActive(schedule: Schedule): void {
  if (isTerminal(schedule.status)) {
    throw new ScheduleError(
      "ALREADY_TERMINAL",
      `${schedule.kind} ${String(schedule.id)} is ${schedule.status}`,
    );
  }
}

/**
 * @throws ScheduleError ALREADY_TERMINAL | NOTHING_TO_CLAIM
 */
export function planClaim<S extends Schedule>(schedule: S, now: bigint): ClaimPlan<S> {
  assertActive(schedule);

  const amount = claimableAmount(schedule, now);
  if (amount <= 0n) {
    throw new ScheduleError(
      "NOTHING_TO_CLAIM",
      `Nothing to claim on ${schedule.kind} ${String(schedule.id)} at ${now.toString()}`,
    );
  }

  const claimedAmount = schedule.claimedAmount + amount;
  const status = claimedAmount >= schedule.totalAmount ? "completed" : "active";
  if (status !== schedule.status) {
    assertTransition(schedule.kind, schedule.status, status);
  }

  return {
    amount,
    next: { ...schedule, claimedAmount, status, lastClaimTime: now },
  };
}

/**
 * Split the unclaimed remainder between recipient and sender at `now`.
 *
 * Vesting totals are capped down to what had vested, so the terminated
 * record reports no further remainder.
 *
 * @throws ScheduleError ALREADY_TERMINAL | CONSERVATION_VIOLATION
 */
export function planTermination<S extends Schedule>(
  schedule: S,
  now: bigint,
): TerminationPlan<S> {
  assertActive(schedule);
  const status = terminationStatus(schedule.kind);
  assertTransition(schedule.kind, schedule.status, status);

  const { totalAmount, claimedAmount } = schedule;
  const settleable = claimableAmount(schedule, now);
  const refund = totalAmount - claimedAmount - settleable;

  if (
    refund < 0n ||
    settleable + refund + claimedAmount !== totalAmount ||
    accrued(schedule, now) > totalAmount
  ) {
    throw new ScheduleError(
      "CONSERVATION_VIOLATION",
      `${schedule.kind} ${String(schedule.id)}: settle ${settleable.toString()} + refund ${refund.toString()} + claimed ${claimedAmount.toString()} != total ${totalAmount.toString()}`,
    );
  }

  const settledTotal = claimedAmount + settleable;
  return {
    settleable,
    refund,
    next: {
      ...schedule,
      status,
      claimedAmount: settledTotal,
      totalAmount: schedule.kind === "vesting" ? settledTotal : totalAmount,
      termination: {
        at: now,
        settledAmount: settleable,
        refundedAmount: refund,
        originalTotal: totalAmount,
      },
    },
  };
}
