/**
 * Runtime Type Guards
 *
 * Narrowing functions for Cadence domain types, used at system
 * boundaries (API inputs, deserialized data, collaborator results).
 */

import type {
  LedgerEntry,
  LedgerEntryType,
  TransferInstruction,
} from "./financial.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";
import { isI128 } from "./bounds.js";

// =============================================================================
// Identifier guards
// =============================================================================

const IDENTIFIER = /^[A-Za-z0-9_:.\-]{1,128}$/;

export function isAccountId(value: unknown): value is string {
  return typeof value === "string" && IDENTIFIER.test(value);
}

export function isTokenId(value: unknown): value is string {
  return typeof value === "string" && IDENTIFIER.test(value);
}

// =============================================================================
// Financial guards
// =============================================================================

const ENTRY_TYPES = new Set<string>(["debit", "credit"]);

export function isLedgerEntryType(value: unknown): value is LedgerEntryType {
  return typeof value === "string" && ENTRY_TYPES.has(value);
}

export function isLedgerEntry(value: unknown): value is LedgerEntry {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    isAccountId(v.accountId) &&
    isLedgerEntryType(v.type) &&
    isTokenId(v.token) &&
    isI128(v.amount) &&
    typeof v.timestamp === "string" &&
    typeof v.correlationId === "string"
  );
}

export function isTransferInstruction(
  value: unknown,
): value is TransferInstruction {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isTokenId(v.token) &&
    isAccountId(v.from) &&
    isAccountId(v.to) &&
    isI128(v.amount)
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["stream", "vesting", "ledger"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    isEventSource(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
