/**
 * Schedule record manager.
 *
 * Layout:
 * - one record per schedule, keyed by id (full-record replace on write)
 * - an id counter
 * - two append-only id lists per account (as sender, as recipient)
 * - one append-only claim history per schedule
 *
 * Index lists and claim histories are only ever appended to; records are
 * never deleted.
 */

import { U32_MAX } from "@cadence/types";
import type { AccountId } from "@cadence/types";
import { claimableAmount } from "./accrual.js";
import type { KeyValueStore } from "./storage.js";
import { InMemoryKeyValueStore } from "./storage.js";
import type { ClaimRecord, Schedule } from "./types.js";
import { ScheduleError } from "./types.js";

export interface ScheduleStores<S extends Schedule> {
  readonly records: KeyValueStore<number, S>;
  readonly counter: KeyValueStore<"nextId", number>;
  readonly bySender: KeyValueStore<AccountId, readonly number[]>;
  readonly byRecipient: KeyValueStore<AccountId, readonly number[]>;
  readonly claims: KeyValueStore<number, readonly ClaimRecord[]>;
}

export function inMemoryScheduleStores<S extends Schedule>(): ScheduleStores<S> {
  return {
    records: new InMemoryKeyValueStore(),
    counter: new InMemoryKeyValueStore(),
    bySender: new InMemoryKeyValueStore(),
    byRecipient: new InMemoryKeyValueStore(),
    claims: new InMemoryKeyValueStore(),
  };
}

export class ScheduleRepository<S extends Schedule> {
  private readonly stores: ScheduleStores<S>;

  constructor(stores?: ScheduleStores<S>) {
    this.stores = stores ?? inMemoryScheduleStores<S>();
  }

  // ─── Records ──────────────────────────────────────────────────────────

  get(id: number): S | undefined {
    return this.stores.records.get(id);
  }

  /**
   * @throws ScheduleError SCHEDULE_NOT_FOUND
   */
  require(id: number): S {
    const schedule = this.stores.records.get(id);
    if (schedule === undefined) {
      throw new ScheduleError("SCHEDULE_NOT_FOUND", `Schedule ${String(id)} not found`);
    }
    return schedule;
  }

  /**
   * Replace an existing record. New records go through `insert`.
   */
  put(schedule: S): void {
    this.require(schedule.id);
    this.stores.records.set(schedule.id, schedule);
  }

  /**
   * Store a newly created schedule under the next id and index it by
   * both parties.
   */
  insert(schedule: S): void {
    const expected = this.peekNextId();
    if (schedule.id !== expected) {
      throw new ScheduleError(
        "INVALID_SCHEDULE",
        `Schedule id ${String(schedule.id)} is out of sequence (next is ${String(expected)})`,
      );
    }
    this.stores.records.set(schedule.id, schedule);
    this.stores.counter.set("nextId", expected + 1);
    appendTo(this.stores.bySender, schedule.sender, schedule.id);
    appendTo(this.stores.byRecipient, schedule.recipient, schedule.id);
  }

  // ─── Ids ──────────────────────────────────────────────────────────────

  /**
   * The id the next insert will take, without consuming it.
   *
   * @throws ScheduleError ID_SPACE_EXHAUSTED
   */
  peekNextId(offset = 0): number {
    const id = (this.stores.counter.get("nextId") ?? 0) + offset;
    if (id > U32_MAX) {
      throw new ScheduleError("ID_SPACE_EXHAUSTED", "No schedule ids left in the u32 range");
    }
    return id;
  }

  count(): number {
    return this.stores.counter.get("nextId") ?? 0;
  }

  // ─── Indexes ──────────────────────────────────────────────────────────

  bySender(account: AccountId): readonly number[] {
    return this.stores.bySender.get(account) ?? [];
  }

  byRecipient(account: AccountId): readonly number[] {
    return this.stores.byRecipient.get(account) ?? [];
  }

  // ─── Claim history ────────────────────────────────────────────────────

  appendClaim(id: number, record: ClaimRecord): void {
    this.require(id);
    appendTo(this.stores.claims, id, record);
  }

  claimHistory(id: number): readonly ClaimRecord[] {
    this.require(id);
    return this.stores.claims.get(id) ?? [];
  }

  // ─── Derived ──────────────────────────────────────────────────────────

  claimable(id: number, now: bigint): bigint {
    return claimableAmount(this.require(id), now);
  }
}

function appendTo<K, T>(store: KeyValueStore<K, readonly T[]>, key: K, value: T): void {
  store.set(key, [...(store.get(key) ?? []), value]);
}
