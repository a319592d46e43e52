/**
 * CadenceService — Composition root for the domain packages.
 *
 * Route handlers delegate to this service; they never import the engines
 * directly. One service owns one token ledger, one event log and the two
 * schedule engines escrowing into that ledger.
 *
 * Every mutating call names the calling account. The call runs inside
 * `ScopedAuthorizer.runAs(caller, ...)`, so an engine's `requireAuth`
 * sees the authenticated account and nothing else.
 */

import pino from "pino";
import type { Logger } from "pino";
import { randomUUID } from "node:crypto";
import { LedgerError, TokenLedger } from "@cadence/ledger";
import {
  InMemoryEventStore,
  createCadenceCatalog,
} from "@cadence/event-store";
import type {
  EventStoreIntegrityResult,
  HashedStoredEvent,
  TokensMintedPayload,
} from "@cadence/event-store";
import {
  ScopedAuthorizer,
  StreamEngine,
  SystemClock,
  VestingEngine,
  isReservedAccount,
} from "@cadence/schedules";
import type {
  Clock,
  StreamParams,
  StreamSchedule,
  VestingParams,
  VestingSchedule,
} from "@cadence/schedules";
import type { AccountId, DomainEvent, EventSource, TokenId } from "@cadence/types";

// =============================================================================
// Configuration
// =============================================================================

export interface CadenceServiceConfig {
  /** Account that initializes both engines and alone may mint */
  readonly admin: AccountId;
  /** Default: wall-clock seconds */
  readonly clock?: Clock | undefined;
  /** Default: silent */
  readonly logger?: Logger | undefined;
}

export interface ClaimOutcome<S> {
  readonly amount: bigint;
  readonly schedule: S;
}

export interface TerminationOutcome<S> {
  readonly refund: bigint;
  readonly schedule: S;
}

export interface AccountBalance {
  readonly account: AccountId;
  readonly token: TokenId;
  readonly balance: bigint;
}

export interface EventQuery {
  readonly source?: EventSource | undefined;
  readonly correlationId?: string | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class CadenceService {
  readonly ledger: TokenLedger;
  readonly eventStore: InMemoryEventStore;
  readonly authorizer: ScopedAuthorizer;
  readonly clock: Clock;
  readonly streams: StreamEngine;
  readonly vesting: VestingEngine;

  private readonly _admin: AccountId;
  private readonly _log: Logger;
  private _mintSequence = 0;

  constructor(config: CadenceServiceConfig) {
    this._admin = config.admin;
    this._log = (config.logger ?? pino({ level: "silent" })).child({
      component: "cadence-service",
    });

    this.ledger = new TokenLedger();
    this.eventStore = new InMemoryEventStore({
      catalog: createCadenceCatalog(),
      onHandlerError: ({ error, event }) => {
        this._log.error(
          { err: error, type: event.event.type, globalPosition: event.globalPosition },
          "Event subscriber failed",
        );
      },
    });
    this.authorizer = new ScopedAuthorizer();
    this.clock = config.clock ?? new SystemClock();

    const deps = {
      authorizer: this.authorizer,
      ledger: this.ledger,
      events: this.eventStore,
      clock: this.clock,
    };
    this.streams = new StreamEngine(deps);
    this.vesting = new VestingEngine(deps);

    this.actAs(this._admin, () => {
      this.streams.initialize(this._admin);
      this.vesting.initialize(this._admin);
    });
    this._log.info({ admin: this._admin }, "Engines initialized");
  }

  get admin(): AccountId {
    return this._admin;
  }

  isReady(): boolean {
    return this.streams.initialized && this.vesting.initialized;
  }

  /** Run `fn` with `account` as the only authorized identity. */
  actAs<T>(account: AccountId, fn: () => T): T {
    return this.authorizer.runAs(account, fn);
  }

  // ─── Streams ───────────────────────────────────────────────────────

  createStream(caller: AccountId, params: StreamParams): StreamSchedule {
    const id = this.actAs(caller, () => this.streams.create(caller, params));
    this._log.info({ id, sender: caller, recipient: params.recipient }, "Stream created");
    return this.streams.get(id);
  }

  createStreams(caller: AccountId, batch: readonly StreamParams[]): readonly StreamSchedule[] {
    const ids = this.actAs(caller, () => this.streams.createBatch(caller, batch));
    this._log.info({ ids, sender: caller }, "Stream batch created");
    return ids.map((id) => this.streams.get(id));
  }

  claimStream(caller: AccountId, id: number): ClaimOutcome<StreamSchedule> {
    const amount = this.actAs(caller, () => this.streams.claim(caller, id));
    this._log.info({ id, recipient: caller, amount: amount.toString() }, "Stream claimed");
    return { amount, schedule: this.streams.get(id) };
  }

  cancelStream(caller: AccountId, id: number): TerminationOutcome<StreamSchedule> {
    const refund = this.actAs(caller, () => this.streams.cancel(caller, id));
    this._log.info({ id, sender: caller, refund: refund.toString() }, "Stream cancelled");
    return { refund, schedule: this.streams.get(id) };
  }

  // ─── Vesting ───────────────────────────────────────────────────────

  createVesting(caller: AccountId, params: VestingParams): VestingSchedule {
    const id = this.actAs(caller, () => this.vesting.create(caller, params));
    this._log.info(
      { id, grantor: caller, beneficiary: params.beneficiary, label: params.label },
      "Vesting created",
    );
    return this.vesting.get(id);
  }

  claimVesting(caller: AccountId, id: number): ClaimOutcome<VestingSchedule> {
    const amount = this.actAs(caller, () => this.vesting.claim(caller, id));
    this._log.info({ id, beneficiary: caller, amount: amount.toString() }, "Vesting claimed");
    return { amount, schedule: this.vesting.get(id) };
  }

  revokeVesting(caller: AccountId, id: number): TerminationOutcome<VestingSchedule> {
    const refund = this.actAs(caller, () => this.vesting.revoke(caller, id));
    this._log.info({ id, grantor: caller, refund: refund.toString() }, "Vesting revoked");
    return { refund, schedule: this.vesting.get(id) };
  }

  // ─── Ledger ────────────────────────────────────────────────────────

  /**
   * Issue new supply. Only the admin account may mint, and never into an
   * escrow or issuance account.
   *
   * @throws ScheduleError UNAUTHORIZED
   * @throws LedgerError INVALID_ACCOUNT | INVALID_AMOUNT
   */
  mint(caller: AccountId, account: AccountId, token: TokenId, amount: bigint): AccountBalance {
    this.actAs(caller, () => this.authorizer.requireAuth(this._admin));
    if (isReservedAccount(account)) {
      throw new LedgerError("INVALID_ACCOUNT", `Cannot mint into reserved account "${account}"`);
    }

    const correlationId = `mint:${String(this._mintSequence + 1)}`;
    const payload: TokensMintedPayload = {
      account,
      token,
      amount: amount.toString(),
    };
    const event: DomainEvent = {
      type: "ledger.minted",
      metadata: {
        eventId: randomUUID(),
        timestamp: new Date().toISOString(),
        actor: caller,
        correlationId,
        source: "ledger",
      },
      payload,
    };
    this.eventStore.check(event);
    this.ledger.mint(account, token, amount, correlationId);
    this._mintSequence++;
    this.eventStore.emit(event);
    this._log.info({ account, token, amount: amount.toString() }, "Minted");
    return this.getBalance(account, token);
  }

  /** Zero for accounts the ledger has never seen. */
  getBalance(account: AccountId, token: TokenId): AccountBalance {
    return { account, token, balance: this.ledger.balanceOf(account, token) };
  }

  // ─── Events ────────────────────────────────────────────────────────

  readEvents(query: EventQuery = {}): readonly HashedStoredEvent[] {
    const events =
      query.source === undefined
        ? this.eventStore.readAll({ correlationId: query.correlationId })
        : this.eventStore.read(query.source);

    if (query.source !== undefined && query.correlationId !== undefined) {
      const correlationId = query.correlationId;
      return events.filter((e) => e.event.metadata.correlationId === correlationId);
    }
    return events;
  }

  verifyEvents(): EventStoreIntegrityResult {
    const result = this.eventStore.verifyIntegrity();
    if (!result.valid) {
      this._log.error({ errors: result.errors.length }, "Event log integrity check failed");
    }
    return result;
  }
}
