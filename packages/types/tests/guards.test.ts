/**
 * Runtime type guard tests for @cadence/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isAccountId,
  isTokenId,
  isLedgerEntryType,
  isLedgerEntry,
  isTransferInstruction,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "../src/guards.js";
import {
  I128_MAX,
  I128_MIN,
  U64_MAX,
  U32_MAX,
  isI128,
  isU64,
  isU32,
} from "../src/bounds.js";

// =============================================================================
// Bounds
// =============================================================================

describe("isI128", () => {
  it("accepts the full signed range", () => {
    expect(isI128(0n)).toBe(true);
    expect(isI128(I128_MAX)).toBe(true);
    expect(isI128(I128_MIN)).toBe(true);
  });

  it("rejects values past either end", () => {
    expect(isI128(I128_MAX + 1n)).toBe(false);
    expect(isI128(I128_MIN - 1n)).toBe(false);
  });

  it("rejects numbers (must be bigint)", () => {
    expect(isI128(100)).toBe(false);
    expect(isI128("100")).toBe(false);
  });
});

describe("isU64", () => {
  it("accepts zero and the maximum", () => {
    expect(isU64(0n)).toBe(true);
    expect(isU64(U64_MAX)).toBe(true);
  });

  it("rejects negatives and overflow", () => {
    expect(isU64(-1n)).toBe(false);
    expect(isU64(U64_MAX + 1n)).toBe(false);
  });
});

describe("isU32", () => {
  it("accepts integers in range", () => {
    expect(isU32(0)).toBe(true);
    expect(isU32(U32_MAX)).toBe(true);
  });

  it("rejects fractions, negatives and overflow", () => {
    expect(isU32(1.5)).toBe(false);
    expect(isU32(-1)).toBe(false);
    expect(isU32(U32_MAX + 1)).toBe(false);
  });
});

// =============================================================================
// Identifiers
// =============================================================================

describe("isAccountId / isTokenId", () => {
  it("accepts plain identifiers", () => {
    expect(isAccountId("org-treasury")).toBe(true);
    expect(isAccountId("escrow:stream")).toBe(true);
    expect(isTokenId("USDC")).toBe(true);
  });

  it("rejects empty and whitespace", () => {
    expect(isAccountId("")).toBe(false);
    expect(isAccountId("alice bob")).toBe(false);
    expect(isTokenId(42)).toBe(false);
  });

  it("rejects identifiers longer than 128 chars", () => {
    expect(isAccountId("a".repeat(129))).toBe(false);
    expect(isAccountId("a".repeat(128))).toBe(true);
  });
});

// =============================================================================
// Financial guards
// =============================================================================

describe("isLedgerEntryType", () => {
  it("accepts debit and credit", () => {
    expect(isLedgerEntryType("debit")).toBe(true);
    expect(isLedgerEntryType("credit")).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isLedgerEntryType("transfer")).toBe(false);
    expect(isLedgerEntryType(undefined)).toBe(false);
  });
});

describe("isLedgerEntry", () => {
  const entry = {
    id: "e-1",
    accountId: "alice",
    type: "debit",
    token: "USDC",
    amount: 100n,
    timestamp: "2024-01-01T00:00:00.000Z",
    correlationId: "c-1",
  };

  it("accepts a valid entry", () => {
    expect(isLedgerEntry(entry)).toBe(true);
  });

  it("rejects a string amount", () => {
    expect(isLedgerEntry({ ...entry, amount: "100" })).toBe(false);
  });

  it("rejects an unknown entry type", () => {
    expect(isLedgerEntry({ ...entry, type: "both" })).toBe(false);
  });
});

describe("isTransferInstruction", () => {
  it("accepts a valid instruction", () => {
    expect(
      isTransferInstruction({ token: "USDC", from: "a", to: "b", amount: 5n }),
    ).toBe(true);
  });

  it("rejects a missing recipient", () => {
    expect(isTransferInstruction({ token: "USDC", from: "a", amount: 5n })).toBe(
      false,
    );
  });
});

// =============================================================================
// Event guards
// =============================================================================

describe("isEventMetadata", () => {
  const metadata = {
    eventId: "evt-1",
    timestamp: "2024-01-01T00:00:00.000Z",
    actor: "alice",
    correlationId: "stream:0:create",
    source: "stream",
  };

  it("accepts valid metadata", () => {
    expect(isEventMetadata(metadata)).toBe(true);
  });

  it("rejects an unknown source", () => {
    expect(isEventMetadata({ ...metadata, source: "vault" })).toBe(false);
  });

  it("recognises every source", () => {
    expect(isEventSource("stream")).toBe(true);
    expect(isEventSource("vesting")).toBe(true);
    expect(isEventSource("ledger")).toBe(true);
  });
});

describe("isDomainEvent", () => {
  it("accepts a valid event", () => {
    expect(
      isDomainEvent({
        type: "stream.created",
        metadata: {
          eventId: "evt-1",
          timestamp: "2024-01-01T00:00:00.000Z",
          actor: "alice",
          correlationId: "c",
          source: "stream",
        },
        payload: { id: 0 },
      }),
    ).toBe(true);
  });

  it("rejects a null payload", () => {
    expect(
      isDomainEvent({
        type: "stream.created",
        metadata: {
          eventId: "evt-1",
          timestamp: "t",
          actor: "a",
          correlationId: "c",
          source: "stream",
        },
        payload: null,
      }),
    ).toBe(false);
  });
});
