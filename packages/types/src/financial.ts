/**
 * Financial Types
 *
 * Integer-unit primitives shared by the ledger and the release engines.
 *
 * Rules:
 * - Amounts are bigint counts of a token's smallest unit (no decimals, no floats)
 * - Amounts fit in a signed 128-bit integer
 * - Timestamps and durations are unsigned 64-bit seconds
 * - Ledger entries are append-only by contract
 */

/** Identifier of an account (wallet, organisation, escrow). */
export type AccountId = string;

/** Identifier of a fungible token. */
export type TokenId = string;

/** Signed 128-bit quantity of a token's smallest unit. */
export type Amount = bigint;

/** Unsigned 64-bit ledger time, in seconds. */
export type Timestamp = bigint;

/**
 * Type of ledger entry (double-entry accounting).
 */
export type LedgerEntryType = "debit" | "credit";

/**
 * A single line in the token ledger.
 * Always part of a balanced transaction (debits = credits per token).
 */
export interface LedgerEntry {
  readonly id: string;
  readonly accountId: AccountId;
  readonly type: LedgerEntryType;
  readonly token: TokenId;
  readonly amount: Amount;
  /** ISO 8601 wall-clock time the entry was written */
  readonly timestamp: string;
  /** Groups the entries of one balanced transaction */
  readonly correlationId: string;
}

/**
 * An instruction to move value between two accounts.
 * Issued by the release engines, executed by the ledger.
 */
export interface TransferInstruction {
  readonly token: TokenId;
  readonly from: AccountId;
  readonly to: AccountId;
  readonly amount: Amount;
}
