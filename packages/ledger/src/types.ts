/**
 * @cadence/ledger — Internal types for the token ledger.
 *
 * These extend the shared @cadence/types with ledger-specific
 * structures used only within this package.
 *
 * Rules:
 * - All types are readonly
 * - No mutation of stored entries
 * - Fail-closed: invalid transfers throw, never silently succeed
 */

import type { AccountId, LedgerEntry, TokenId } from "@cadence/types";

// ─── Account Types ───────────────────────────────────────────────────────

/**
 * Kinds of ledger account.
 *
 * - holder: a wallet or escrow that owns tokens (credit-normal, cannot go negative)
 * - issuance: the supply account of a token, debited on every mint
 */
export type AccountKind = "holder" | "issuance";

/** Normal balance direction for an account. */
export type NormalBalance = "debit" | "credit";

export const NORMAL_BALANCE: Readonly<Record<AccountKind, NormalBalance>> = {
  holder: "credit",
  issuance: "debit",
} as const;

/** Prefix of the per-token issuance account id. */
export const ISSUANCE_PREFIX = "issuance:";

export function issuanceAccountId(token: TokenId): AccountId {
  return `${ISSUANCE_PREFIX}${token}`;
}

// ─── Ledger Types ────────────────────────────────────────────────────────

export interface LedgerAccount {
  readonly id: AccountId;
  readonly kind: AccountKind;
  readonly openedAt: string;
}

/**
 * A balanced group of ledger entries sharing a correlation ID.
 */
export interface LedgerTransaction {
  readonly correlationId: string;
  readonly entries: readonly LedgerEntry[];
  readonly timestamp: string;
  readonly description?: string | undefined;
}

/**
 * Balance of one account in one token.
 */
export interface TokenBalance {
  readonly accountId: AccountId;
  readonly token: TokenId;
  /** Net balance in the account's normal direction. */
  readonly balance: bigint;
  readonly totalDebits: bigint;
  readonly totalCredits: bigint;
}

export interface TrialBalanceLine {
  readonly accountId: AccountId;
  readonly kind: AccountKind;
  readonly token: TokenId;
  readonly debitBalance: bigint;
  readonly creditBalance: bigint;
}

/**
 * The full trial balance report.
 * Total debits MUST equal total credits (per token): every unit held
 * somewhere was issued exactly once.
 */
export interface TrialBalance {
  readonly lines: readonly TrialBalanceLine[];
  readonly generatedAt: string;
  readonly balanced: boolean;
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type LedgerErrorCode =
  | "EMPTY_TRANSACTION"
  | "INVALID_AMOUNT"
  | "INVALID_ACCOUNT"
  | "SELF_TRANSFER"
  | "INSUFFICIENT_BALANCE"
  | "DUPLICATE_CORRELATION_ID"
  | "DUPLICATE_ACCOUNT_ID"
  | "UNKNOWN_ACCOUNT"
  | "UNBALANCED_TRANSACTION";

/**
 * Structured error from the token ledger.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Transfer Types ──────────────────────────────────────────────────────

export interface TransferOptions {
  readonly description?: string | undefined;
}

/**
 * Result of a committed transfer batch.
 */
export interface TransferResult {
  readonly correlationId: string;
  readonly entryCount: number;
  readonly timestamp: string;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

export interface LedgerSnapshot {
  readonly version: 1;
  readonly accounts: readonly LedgerAccount[];
  readonly transactions: readonly LedgerTransaction[];
  readonly createdAt: string;
}

// ─── Query Types ─────────────────────────────────────────────────────────

export interface EntryFilter {
  readonly accountId?: AccountId | undefined;
  readonly correlationId?: string | undefined;
  readonly token?: TokenId | undefined;
  readonly fromTimestamp?: string | undefined;
  readonly toTimestamp?: string | undefined;
}
