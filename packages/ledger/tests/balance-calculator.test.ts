/**
 * Tests for the balance calculator.
 *
 * Covers:
 * - Per-token balances for holder (credit-normal) and issuance (debit-normal) accounts
 * - Trial balance lines, columns and the per-token balancing check
 * - Edge cases (empty entries, unknown accounts, balances against the normal side)
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { LedgerEntry } from "@cadence/types";
import { AccountRegistry } from "../src/accounts.js";
import { computeTokenBalance, computeTrialBalance } from "../src/balance-calculator.js";
import { LedgerError } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const TS = "2024-01-15T10:00:00.000Z";

function entry(
  id: string,
  accountId: string,
  type: "debit" | "credit",
  token: string,
  amount: bigint,
  correlationId: string,
): LedgerEntry {
  return { id, accountId, type, token, amount, timestamp: TS, correlationId };
}

/** Mint 1000 USDC to alice, alice pays bob 300, mint 50 XRP to bob. */
const ENTRIES: readonly LedgerEntry[] = [
  entry("m1:0:debit", "issuance:USDC", "debit", "USDC", 1000n, "m1"),
  entry("m1:0:credit", "alice", "credit", "USDC", 1000n, "m1"),
  entry("t1:0:debit", "alice", "debit", "USDC", 300n, "t1"),
  entry("t1:0:credit", "bob", "credit", "USDC", 300n, "t1"),
  entry("m2:0:debit", "issuance:XRP", "debit", "XRP", 50n, "m2"),
  entry("m2:0:credit", "bob", "credit", "XRP", 50n, "m2"),
];

let accounts: AccountRegistry;

beforeEach(() => {
  accounts = new AccountRegistry();
  accounts.register("issuance:USDC", "issuance", TS);
  accounts.register("issuance:XRP", "issuance", TS);
  accounts.register("alice", "holder", TS);
  accounts.register("bob", "holder", TS);
});

// ─── computeTokenBalance ─────────────────────────────────────────────────

describe("computeTokenBalance", () => {
  it("nets credits against debits for a holder", () => {
    expect(computeTokenBalance("alice", "USDC", ENTRIES, accounts)).toEqual({
      accountId: "alice",
      token: "USDC",
      balance: 700n,
      totalDebits: 300n,
      totalCredits: 1000n,
    });
  });

  it("nets debits against credits for an issuance account", () => {
    expect(computeTokenBalance("issuance:USDC", "USDC", ENTRIES, accounts)).toEqual({
      accountId: "issuance:USDC",
      token: "USDC",
      balance: 1000n,
      totalDebits: 1000n,
      totalCredits: 0n,
    });
  });

  it("keeps tokens apart", () => {
    expect(computeTokenBalance("bob", "USDC", ENTRIES, accounts).balance).toBe(300n);
    expect(computeTokenBalance("bob", "XRP", ENTRIES, accounts).balance).toBe(50n);
  });

  it("returns zero for a token the account never touched", () => {
    expect(computeTokenBalance("alice", "XRP", ENTRIES, accounts)).toEqual({
      accountId: "alice",
      token: "XRP",
      balance: 0n,
      totalDebits: 0n,
      totalCredits: 0n,
    });
  });

  it("throws for an unregistered account", () => {
    expect(() => computeTokenBalance("carol", "USDC", ENTRIES, accounts)).toThrow(LedgerError);
  });
});

// ─── computeTrialBalance ─────────────────────────────────────────────────

describe("computeTrialBalance", () => {
  it("places each net amount in its normal column and balances per token", () => {
    const trial = computeTrialBalance(ENTRIES, accounts, TS);

    expect(trial.generatedAt).toBe(TS);
    expect(trial.balanced).toBe(true);
    expect(trial.lines).toEqual([
      { accountId: "issuance:USDC", kind: "issuance", token: "USDC", debitBalance: 1000n, creditBalance: 0n },
      { accountId: "alice", kind: "holder", token: "USDC", debitBalance: 0n, creditBalance: 700n },
      { accountId: "bob", kind: "holder", token: "USDC", debitBalance: 0n, creditBalance: 300n },
      { accountId: "issuance:XRP", kind: "issuance", token: "XRP", debitBalance: 50n, creditBalance: 0n },
      { accountId: "bob", kind: "holder", token: "XRP", debitBalance: 0n, creditBalance: 50n },
    ]);
  });

  it("is empty and balanced with no entries", () => {
    expect(computeTrialBalance([], accounts, TS)).toEqual({ lines: [], generatedAt: TS, balanced: true });
  });

  it("moves a balance against the normal side into the other column", () => {
    const trial = computeTrialBalance(
      [
        entry("x:0:debit", "alice", "debit", "USDC", 10n, "x"),
        entry("x:0:credit", "issuance:USDC", "credit", "USDC", 10n, "x"),
      ],
      accounts,
      TS,
    );

    expect(trial.lines).toEqual([
      { accountId: "alice", kind: "holder", token: "USDC", debitBalance: 10n, creditBalance: 0n },
      { accountId: "issuance:USDC", kind: "issuance", token: "USDC", debitBalance: 0n, creditBalance: 10n },
    ]);
    expect(trial.balanced).toBe(true);
  });

  it("reports an unbalanced token", () => {
    const trial = computeTrialBalance([...ENTRIES, entry("y:0:credit", "bob", "credit", "XRP", 5n, "y")], accounts, TS);
    expect(trial.balanced).toBe(false);
  });

  it("throws for an entry on an unregistered account", () => {
    try {
      computeTrialBalance([entry("z:0:debit", "carol", "debit", "USDC", 1n, "z")], accounts, TS);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(LedgerError);
      expect((err as LedgerError).code).toBe("UNKNOWN_ACCOUNT");
    }
  });
});
