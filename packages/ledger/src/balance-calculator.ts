/**
 * @cadence/ledger — Balance calculation.
 *
 * Computes account balances and the trial balance from the entry log.
 * All calculations are deterministic bigint sums.
 *
 * Rules:
 * - Balances are computed per token (never cross-token)
 * - Normal balance rules determine sign conventions
 * - Trial balance must always balance (debits = credits per token)
 */

import type { AccountId, LedgerEntry, TokenId } from "@cadence/types";
import type { AccountRegistry } from "./accounts.js";
import type { TokenBalance, TrialBalance, TrialBalanceLine } from "./types.js";
import { NORMAL_BALANCE } from "./types.js";

interface BalanceAccumulator {
  readonly accountId: AccountId;
  readonly token: TokenId;
  totalDebits: bigint;
  totalCredits: bigint;
}

function buildAccumulators(
  entries: readonly LedgerEntry[],
): Map<string, BalanceAccumulator> {
  const accumulators = new Map<string, BalanceAccumulator>();

  for (const entry of entries) {
    const key = `${entry.accountId}::${entry.token}`;
    let acc = accumulators.get(key);

    if (acc === undefined) {
      acc = {
        accountId: entry.accountId,
        token: entry.token,
        totalDebits: 0n,
        totalCredits: 0n,
      };
      accumulators.set(key, acc);
    }

    if (entry.type === "debit") {
      acc.totalDebits += entry.amount;
    } else {
      acc.totalCredits += entry.amount;
    }
  }

  return accumulators;
}

/**
 * Compute the balance of one account in one token.
 */
export function computeTokenBalance(
  accountId: AccountId,
  token: TokenId,
  entries: readonly LedgerEntry[],
  accounts: AccountRegistry,
): TokenBalance {
  const normal = accounts.getNormalBalance(accountId);
  let totalDebits = 0n;
  let totalCredits = 0n;

  for (const entry of entries) {
    if (entry.accountId !== accountId || entry.token !== token) continue;
    if (entry.type === "debit") {
      totalDebits += entry.amount;
    } else {
      totalCredits += entry.amount;
    }
  }

  return {
    accountId,
    token,
    balance: normal === "debit" ? totalDebits - totalCredits : totalCredits - totalDebits,
    totalDebits,
    totalCredits,
  };
}

/**
 * Compute the trial balance from all entries.
 *
 * For each account+token the net amount goes in the column of the
 * account's normal direction (or the opposite column when contra).
 */
export function computeTrialBalance(
  entries: readonly LedgerEntry[],
  accounts: AccountRegistry,
  timestamp: string,
): TrialBalance {
  const lines: TrialBalanceLine[] = [];
  const tokenTotals = new Map<TokenId, { debits: bigint; credits: bigint }>();

  for (const acc of buildAccumulators(entries).values()) {
    const kind = accounts.assertExists(acc.accountId).kind;
    const netDebit = acc.totalDebits - acc.totalCredits;

    let debitBalance = 0n;
    let creditBalance = 0n;
    if (NORMAL_BALANCE[kind] === "debit" ? netDebit >= 0n : netDebit > 0n) {
      debitBalance = netDebit;
    } else {
      creditBalance = -netDebit;
    }

    lines.push({
      accountId: acc.accountId,
      kind,
      token: acc.token,
      debitBalance,
      creditBalance,
    });

    let totals = tokenTotals.get(acc.token);
    if (totals === undefined) {
      totals = { debits: 0n, credits: 0n };
      tokenTotals.set(acc.token, totals);
    }
    totals.debits += debitBalance;
    totals.credits += creditBalance;
  }

  let balanced = true;
  for (const totals of tokenTotals.values()) {
    if (totals.debits !== totals.credits) {
      balanced = false;
      break;
    }
  }

  return { lines, generatedAt: timestamp, balanced };
}
