/**
 * @cadence/ledger — Append-only double-entry token ledger.
 *
 * Enforces double-entry invariants over integer token units:
 * - Every transaction balances (debits = credits per token)
 * - Entries are immutable once appended
 * - Holder balances never go negative
 * - Transfer batches commit atomically or not at all
 *
 * Design rules:
 * - All types are readonly
 * - Fail-closed: invalid transfers throw, never silently succeed
 * - Zero runtime dependencies beyond @cadence/types
 */

export { TokenLedger } from "./ledger.js";

export { AccountRegistry } from "./accounts.js";

export {
  computeTokenBalance,
  computeTrialBalance,
} from "./balance-calculator.js";

export {
  assertPositiveAmount,
  mulDiv,
  minAmount,
  maxAmount,
  clampAmount,
} from "./amount-math.js";

export type {
  AccountKind,
  NormalBalance,
  LedgerAccount,
  LedgerTransaction,
  TokenBalance,
  TrialBalanceLine,
  TrialBalance,
  LedgerErrorCode,
  TransferOptions,
  TransferResult,
  LedgerSnapshot,
  EntryFilter,
} from "./types.js";

export {
  LedgerError,
  NORMAL_BALANCE,
  ISSUANCE_PREFIX,
  issuanceAccountId,
} from "./types.js";
