/**
 * ScheduleEngine — operations shared by streams and vesting grants.
 *
 * Every mutating operation follows the same order:
 *   authorize → load → plan → check event → transfer (one atomic batch)
 *   → persist → publish event
 *
 * Nothing is written before the event sink has accepted the event and the
 * ledger has accepted the transfer batch, so a failed call leaves records,
 * ids, indexes and balances as they were.
 */

import { randomUUID } from "node:crypto";
import type { AccountId, DomainEvent, TransferInstruction } from "@cadence/types";
import { claimableAmount, progress } from "./accrual.js";
import type { Authorizer, Clock, EventSink, ValueTransfer } from "./collaborators.js";
import { escrowAccount, isReservedAccount } from "./collaborators.js";
import { ScheduleRepository } from "./repository.js";
import { planClaim, planTermination } from "./settlement.js";
import type {
  ClaimRecord,
  Schedule,
  ScheduleKind,
  ScheduleProgress,
} from "./types.js";
import { ScheduleError } from "./types.js";

export interface EngineDeps<S extends Schedule> {
  readonly authorizer: Authorizer;
  readonly ledger: ValueTransfer;
  readonly events: EventSink;
  readonly clock: Clock;
  readonly repository?: ScheduleRepository<S>;
  /** Defaults to `escrow:<kind>` */
  readonly escrowAccount?: AccountId;
}

export class ScheduleEngine<S extends Schedule> {
  protected readonly authorizer: Authorizer;
  protected readonly ledger: ValueTransfer;
  protected readonly events: EventSink;
  protected readonly clock: Clock;
  protected readonly repository: ScheduleRepository<S>;
  protected readonly escrow: AccountId;
  private _admin: AccountId | undefined;

  constructor(
    protected readonly kind: ScheduleKind,
    deps: EngineDeps<S>,
  ) {
    this.authorizer = deps.authorizer;
    this.ledger = deps.ledger;
    this.events = deps.events;
    this.clock = deps.clock;
    this.repository = deps.repository ?? new ScheduleRepository<S>();
    this.escrow = deps.escrowAccount ?? escrowAccount(kind);
  }

  // ─── Initialization ───────────────────────────────────────────────────

  /**
   * Bind the engine to its admin. Required once before any mutation.
   *
   * @throws ScheduleError ALREADY_INITIALIZED | UNAUTHORIZED
   */
  initialize(admin: AccountId): void {
    if (this._admin !== undefined) {
      throw new ScheduleError("ALREADY_INITIALIZED", `${this.kind} engine is already initialized`);
    }
    this.authorizer.requireAuth(admin);
    const event = this.prepareEvent(`${this.kind}.initialized`, admin, `${this.kind}:init`, { admin });
    this._admin = admin;
    this.events.emit(event);
  }

  /** @throws ScheduleError NOT_INITIALIZED */
  admin(): AccountId {
    return this.requireInitialized();
  }

  get initialized(): boolean {
    return this._admin !== undefined;
  }

  // ─── Claim ────────────────────────────────────────────────────────────

  /**
   * Withdraw everything accrued and not yet claimed.
   *
   * @throws ScheduleError UNAUTHORIZED | SCHEDULE_NOT_FOUND | ALREADY_TERMINAL | NOTHING_TO_CLAIM
   */
  claim(recipient: AccountId, id: number): bigint {
    this.requireInitialized();
    this.authorizer.requireAuth(recipient);
    const schedule = this.repository.require(id);
    if (schedule.recipient !== recipient) {
      throw new ScheduleError(
        "UNAUTHORIZED",
        `"${recipient}" is not the recipient of ${this.kind} ${String(id)}`,
      );
    }

    const now = this.clock.now();
    const plan = planClaim(schedule, now);
    const sequence = this.repository.claimHistory(id).length + 1;
    const correlationId = `${this.kind}:${String(id)}:claim:${String(sequence)}`;
    const event = this.prepareEvent(`${this.kind}.claimed`, recipient, correlationId, {
      scheduleId: id,
      recipient,
      amount: plan.amount.toString(),
      claimedAmount: plan.next.claimedAmount.toString(),
      completed: plan.next.status === "completed",
    });

    this.ledger.transfer(
      [{ token: schedule.token, from: this.escrow, to: recipient, amount: plan.amount }],
      correlationId,
    );
    this.repository.put(plan.next);
    this.repository.appendClaim(id, { amount: plan.amount, timestamp: now });
    this.events.emit(event);
    return plan.amount;
  }

  // ─── Queries ──────────────────────────────────────────────────────────

  /** @throws ScheduleError SCHEDULE_NOT_FOUND */
  get(id: number): S {
    return this.repository.require(id);
  }

  find(id: number): S | undefined {
    return this.repository.get(id);
  }

  getClaimable(id: number): bigint {
    return claimableAmount(this.repository.require(id), this.clock.now());
  }

  getProgress(id: number): ScheduleProgress {
    return progress(this.repository.require(id), this.clock.now());
  }

  schedulesBySender(account: AccountId): readonly number[] {
    return this.repository.bySender(account);
  }

  schedulesByRecipient(account: AccountId): readonly number[] {
    return this.repository.byRecipient(account);
  }

  claimHistory(id: number): readonly ClaimRecord[] {
    return this.repository.claimHistory(id);
  }

  count(): number {
    return this.repository.count();
  }

  // ─── Shared internals ─────────────────────────────────────────────────

  protected requireInitialized(): AccountId {
    if (this._admin === undefined) {
      throw new ScheduleError("NOT_INITIALIZED", `${this.kind} engine is not initialized`);
    }
    return this._admin;
  }

  /**
   * Settle and refund at the current time. The caller must be the sender.
   * Returns the refund.
   */
  protected terminate(sender: AccountId, id: number, guard?: (schedule: S) => void): bigint {
    this.requireInitialized();
    this.authorizer.requireAuth(sender);
    const schedule = this.repository.require(id);
    if (schedule.sender !== sender) {
      throw new ScheduleError(
        "UNAUTHORIZED",
        `"${sender}" is not the sender of ${this.kind} ${String(id)}`,
      );
    }
    guard?.(schedule);

    const plan = planTermination(schedule, this.clock.now());
    const correlationId = `${this.kind}:${String(id)}:${plan.next.status === "revoked" ? "revoke" : "cancel"}`;
    const event = this.prepareEvent(`${this.kind}.${plan.next.status}`, sender, correlationId, {
      scheduleId: id,
      settledAmount: plan.settleable.toString(),
      refundedAmount: plan.refund.toString(),
      originalTotal: schedule.totalAmount.toString(),
    });

    const instructions: TransferInstruction[] = [];
    if (plan.settleable > 0n) {
      instructions.push({ token: schedule.token, from: this.escrow, to: schedule.recipient, amount: plan.settleable });
    }
    if (plan.refund > 0n) {
      instructions.push({ token: schedule.token, from: this.escrow, to: sender, amount: plan.refund });
    }
    if (instructions.length > 0) {
      this.ledger.transfer(instructions, correlationId);
    }
    this.repository.put(plan.next);
    this.events.emit(event);
    return plan.refund;
  }

  /**
   * Escrow each schedule's total from the sender, store the new records
   * and publish `event`, which the sink must already have checked.
   */
  protected escrowAndInsert(
    sender: AccountId,
    schedules: readonly S[],
    correlationId: string,
    event: DomainEvent,
  ): void {
    this.ledger.transfer(
      schedules.map((s) => ({ token: s.token, from: sender, to: this.escrow, amount: s.totalAmount })),
      correlationId,
    );
    for (const schedule of schedules) {
      this.repository.insert(schedule);
    }
    this.events.emit(event);
  }

  /**
   * Escrow and issuance accounts, this engine's configured escrow
   * included, are never a schedule party.
   *
   * @throws ScheduleError INVALID_RECIPIENT
   */
  protected assertOpenParties(sender: AccountId, recipient: AccountId): void {
    for (const account of [sender, recipient]) {
      if (account === this.escrow || isReservedAccount(account)) {
        throw new ScheduleError(
          "INVALID_RECIPIENT",
          `Account "${account}" is reserved and cannot be a ${this.kind} party`,
        );
      }
    }
  }

  /** Build an event and have the sink check it, before anything commits. */
  protected prepareEvent(
    type: string,
    actor: AccountId,
    correlationId: string,
    payload: Readonly<Record<string, unknown>>,
  ): DomainEvent {
    const event: DomainEvent = {
      type,
      metadata: {
        eventId: randomUUID(),
        timestamp: new Date().toISOString(),
        actor,
        correlationId,
        source: this.kind,
      },
      payload,
    };
    this.events.check(event);
    return event;
  }
}
