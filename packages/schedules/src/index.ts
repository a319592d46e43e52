/**
 * @cadence/schedules — Time-based token release.
 *
 * Streams (linear) and vesting grants (cliff + linear) over an escrowing
 * token ledger. Integer-only accrual, atomic claim and termination, and
 * conservation of every escrowed unit.
 *
 * @packageDocumentation
 */

export type {
  ScheduleKind,
  ScheduleStatus,
  TerminalStatus,
  TerminationRecord,
  StreamSchedule,
  VestingSchedule,
  Schedule,
  ClaimRecord,
  ScheduleProgress,
  StreamParams,
  VestingParams,
  ScheduleErrorCode,
} from "./types.js";
export { ScheduleError } from "./types.js";

export {
  accrued,
  claimableAmount,
  progress,
  streamAccrued,
  vestingAccrued,
} from "./accrual.js";

export {
  assertTransition,
  canTransition,
  isTerminal,
  terminationStatus,
} from "./lifecycle.js";

export { validateStreamParams, validateVestingParams, validateLabel } from "./validation.js";

export type { KeyValueStore } from "./storage.js";
export { InMemoryKeyValueStore } from "./storage.js";

export type { ScheduleStores } from "./repository.js";
export { ScheduleRepository, inMemoryScheduleStores } from "./repository.js";

export type { ClaimPlan, TerminationPlan } from "./settlement.js";
export { planClaim, planTermination } from "./settlement.js";

export type { Authorizer, ValueTransfer, EventSink, Clock } from "./collaborators.js";
export {
  ScopedAuthorizer,
  SystemClock,
  ManualClock,
  escrowAccount,
  isReservedAccount,
  ESCROW_PREFIX,
} from "./collaborators.js";

export type { EngineDeps } from "./engine.js";
export { ScheduleEngine } from "./engine.js";
export { StreamEngine } from "./stream-engine.js";
export { VestingEngine } from "./vesting-engine.js";
