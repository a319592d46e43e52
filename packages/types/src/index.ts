/**
 * @cadence/types — Shared domain types for the Cadence stack.
 *
 * Used across all Cadence packages:
 * - Integer financial primitives (amounts, timestamps, ledger entries)
 * - Transfer instructions between the engines and the ledger
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

export type {
  AccountId,
  TokenId,
  Amount,
  Timestamp,
  LedgerEntry,
  LedgerEntryType,
  TransferInstruction,
} from "./financial.js";

export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

export {
  I128_MIN,
  I128_MAX,
  U64_MAX,
  U32_MAX,
  isI128,
  isU64,
  isU32,
} from "./bounds.js";

export {
  isAccountId,
  isTokenId,
  isLedgerEntryType,
  isLedgerEntry,
  isTransferInstruction,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
