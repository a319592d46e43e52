/**
 * Shared fixtures: a real ledger and event store behind both engines,
 * a manual clock and a scoped authorizer.
 */

import { TokenLedger } from "@cadence/ledger";
import { InMemoryEventStore, createCadenceCatalog } from "@cadence/event-store";
import type { AccountId } from "@cadence/types";
import { ManualClock, ScopedAuthorizer } from "../src/collaborators.js";
import { StreamEngine } from "../src/stream-engine.js";
import { VestingEngine } from "../src/vesting-engine.js";
import { ScheduleError } from "../src/types.js";
import type { ScheduleErrorCode, StreamParams, VestingParams } from "../src/types.js";

export const TOKEN = "USDC";
export const ADMIN = "admin";
export const YEAR = 31_536_000n;

export interface Harness {
  readonly ledger: TokenLedger;
  readonly store: InMemoryEventStore;
  readonly clock: ManualClock;
  readonly auth: ScopedAuthorizer;
  readonly streams: StreamEngine;
  readonly vesting: VestingEngine;
  /** Run `fn` authenticated as `account`. */
  as<T>(account: AccountId, fn: () => T): T;
  balance(account: AccountId): bigint;
}

export function createHarness(options?: { readonly now?: bigint; readonly initialize?: boolean }): Harness {
  const ledger = new TokenLedger();
  const store = new InMemoryEventStore({ catalog: createCadenceCatalog() });
  const clock = new ManualClock(options?.now ?? 0n);
  const auth = new ScopedAuthorizer();
  const deps = { authorizer: auth, ledger, events: store, clock };
  const streams = new StreamEngine(deps);
  const vesting = new VestingEngine(deps);

  const as = <T>(account: AccountId, fn: () => T): T => auth.runAs(account, fn);

  if (options?.initialize !== false) {
    as(ADMIN, () => {
      streams.initialize(ADMIN);
      vesting.initialize(ADMIN);
    });
  }

  return {
    ledger,
    store,
    clock,
    auth,
    streams,
    vesting,
    as,
    balance: (account) => ledger.balanceOf(account, TOKEN),
  };
}

export function streamParams(overrides: Partial<StreamParams> = {}): StreamParams {
  return {
    recipient: "bob",
    token: TOKEN,
    totalAmount: 10_000n,
    startTime: 1_000n,
    endTime: 2_000n,
    ...overrides,
  };
}

export function vestingParams(overrides: Partial<VestingParams> = {}): VestingParams {
  return {
    beneficiary: "bob",
    token: TOKEN,
    totalAmount: 100_000n,
    startTime: 1_000n,
    cliffDuration: YEAR,
    cliffAmount: 25_000n,
    totalDuration: 4n * YEAR,
    label: "team_grant",
    revocable: true,
    ...overrides,
  };
}

export function expectScheduleError(fn: () => unknown, code: ScheduleErrorCode): ScheduleError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ScheduleError && err.code === code) {
      return err;
    }
    throw new Error(`Expected ScheduleError ${code}, got ${String(err)}`);
  }
  throw new Error(`Expected ScheduleError ${code}, but nothing was thrown`);
}
