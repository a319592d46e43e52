/**
 * Accrual — how much of a schedule has been released at a given time.
 *
 * Pure functions. Every call recomputes from the schedule's total and
 * full duration, so truncation never accumulates across claims: the
 * amount released by time T is the same no matter how many claims
 * happened before T.
 */

import { clampAmount, maxAmount, mulDiv } from "@cadence/ledger";
import type { Schedule, ScheduleProgress, StreamSchedule, VestingSchedule } from "./types.js";
import { isTerminal } from "./lifecycle.js";

/**
 * Linear release between start and end, truncating toward zero.
 */
export function streamAccrued(schedule: StreamSchedule, now: bigint): bigint {
  const { startTime, endTime, totalAmount } = schedule;
  if (now <= startTime) return 0n;
  if (now >= endTime) return totalAmount;
  return mulDiv(totalAmount, now - startTime, endTime - startTime);
}

/**
 * Cliff then linear. The cliff amount unlocks in full at
 * `startTime + cliffDuration`, whatever share of the duration that is.
 */
export function vestingAccrued(schedule: VestingSchedule, now: bigint): bigint {
  const { startTime, cliffDuration, cliffAmount, totalDuration, totalAmount } = schedule;
  const cliffTime = startTime + cliffDuration;
  if (now < cliffTime) return 0n;
  if (now >= startTime + totalDuration) return totalAmount;
  return (
    cliffAmount +
    mulDiv(totalAmount - cliffAmount, now - cliffTime, totalDuration - cliffDuration)
  );
}

/**
 * Amount released by `now`, clamped to [0, totalAmount].
 *
 * Terminal schedules are frozen at their claimed amount: completion,
 * cancellation and revocation all pay out everything owed.
 */
export function accrued(schedule: Schedule, now: bigint): bigint {
  if (isTerminal(schedule.status)) {
    return schedule.claimedAmount;
  }
  const raw = schedule.kind === "stream"
    ? streamAccrued(schedule, now)
    : vestingAccrued(schedule, now);
  return clampAmount(raw, 0n, schedule.totalAmount);
}

export function claimableAmount(schedule: Schedule, now: bigint): bigint {
  return maxAmount(0n, accrued(schedule, now) - schedule.claimedAmount);
}

export function progress(schedule: Schedule, now: bigint): ScheduleProgress {
  const accruedAmount = accrued(schedule, now);
  return {
    id: schedule.id,
    kind: schedule.kind,
    status: schedule.status,
    totalAmount: schedule.totalAmount,
    accruedAmount,
    claimedAmount: schedule.claimedAmount,
    claimableAmount: maxAmount(0n, accruedAmount - schedule.claimedAmount),
    asOf: now,
  };
}
