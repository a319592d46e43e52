/**
 * Engine collaborators.
 *
 * The engines never decide who is calling, what time it is, where value
 * lives or who listens. Each of those is injected:
 *
 * - Authorizer: proves the caller controls an account
 * - ValueTransfer: moves tokens atomically (TokenLedger satisfies it)
 * - EventSink: receives domain events (InMemoryEventStore satisfies it)
 * - Clock: current time in seconds
 */

import type {
  AccountId,
  DomainEvent,
  TransferInstruction,
} from "@cadence/types";
import { ISSUANCE_PREFIX } from "@cadence/ledger";
import type { ScheduleKind } from "./types.js";
import { ScheduleError } from "./types.js";

// =============================================================================
// Interfaces
// =============================================================================

export interface Authorizer {
  /** @throws ScheduleError UNAUTHORIZED */
  requireAuth(account: AccountId): void;
}

export interface ValueTransfer {
  /** Applies all instructions or none. */
  transfer(instructions: readonly TransferInstruction[], correlationId: string): void;
}

export interface EventSink {
  /** Throws if `emit(event)` would refuse the event. Appends nothing. */
  check(event: DomainEvent): void;
  /** Called only after the change the event records has committed. */
  emit(event: DomainEvent): void;
}

export interface Clock {
  now(): bigint;
}

// =============================================================================
// Implementations
// =============================================================================

/**
 * Authorizes exactly one identity at a time, for the duration of a
 * synchronous call. Engine operations never yield, so the identity set by
 * `runAs` is the one every `requireAuth` inside the call sees.
 */
export class ScopedAuthorizer implements Authorizer {
  private identity: AccountId | undefined;

  runAs<T>(identity: AccountId, fn: () => T): T {
    const previous = this.identity;
    this.identity = identity;
    try {
      return fn();
    } finally {
      this.identity = previous;
    }
  }

  requireAuth(account: AccountId): void {
    if (this.identity === undefined) {
      throw new ScheduleError("UNAUTHORIZED", `No authenticated caller; "${account}" must sign`);
    }
    if (this.identity !== account) {
      throw new ScheduleError(
        "UNAUTHORIZED",
        `Caller "${this.identity}" is not authorized to act for "${account}"`,
      );
    }
  }
}

/** Wall-clock seconds. */
export class SystemClock implements Clock {
  constructor(private readonly offsetSeconds: bigint = 0n) {}

  now(): bigint {
    return BigInt(Math.floor(Date.now() / 1000)) + this.offsetSeconds;
  }
}

/** A clock that only moves when told to. */
export class ManualClock implements Clock {
  constructor(private current: bigint = 0n) {}

  now(): bigint {
    return this.current;
  }

  set(time: bigint): void {
    this.current = time;
  }

  advance(seconds: bigint): void {
    this.current += seconds;
  }
}

export const ESCROW_PREFIX = "escrow:";

/** Ledger account holding the escrowed balance of every schedule of a kind. */
export function escrowAccount(kind: ScheduleKind): AccountId {
  return `${ESCROW_PREFIX}${kind}`;
}

/** Escrow and issuance accounts belong to the system, never to a party. */
export function isReservedAccount(account: AccountId): boolean {
  return account.startsWith(ESCROW_PREFIX) || account.startsWith(ISSUANCE_PREFIX);
}
