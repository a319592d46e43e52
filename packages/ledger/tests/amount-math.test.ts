/**
 * Tests for integer token arithmetic.
 */

import { describe, it, expect } from "vitest";
import { I128_MAX } from "@cadence/types";
import {
  assertPositiveAmount,
  mulDiv,
  minAmount,
  maxAmount,
  clampAmount,
} from "../src/amount-math.js";
import { LedgerError } from "../src/types.js";

// ─── Helpers ─────────────────────────────────────────────────────────────

describe("assertPositiveAmount", () => {
  it("accepts positive amounts", () => {
    expect(() => assertPositiveAmount(1n, "ctx")).not.toThrow();
    expect(() => assertPositiveAmount(I128_MAX, "ctx")).not.toThrow();
  });

  it("rejects zero, negatives and overflow", () => {
    expect(() => assertPositiveAmount(0n, "ctx")).toThrow(LedgerError);
    expect(() => assertPositiveAmount(-1n, "ctx")).toThrow(LedgerError);
    expect(() => assertPositiveAmount(I128_MAX + 1n, "ctx")).toThrow(LedgerError);
  });

  it("includes the context in the message", () => {
    expect(() => assertPositiveAmount(0n, "mint")).toThrow(/^mint: amount must be a positive i128, got 0$/);
  });
});

describe("mulDiv", () => {
  it("truncates toward zero", () => {
    expect(mulDiv(10n, 1n, 3n)).toBe(3n);
    expect(mulDiv(-10n, 1n, 3n)).toBe(-3n);
  });

  it("does not lose precision on large products", () => {
    expect(mulDiv(I128_MAX, 2n, 2n)).toBe(I128_MAX);
  });

  it("rejects a zero denominator", () => {
    expect(() => mulDiv(1n, 1n, 0n)).toThrow(LedgerError);
  });
});

describe("min / max / clamp", () => {
  it("picks the smaller and larger", () => {
    expect(minAmount(3n, 5n)).toBe(3n);
    expect(maxAmount(3n, 5n)).toBe(5n);
  });

  it("clamps into range", () => {
    expect(clampAmount(-1n, 0n, 10n)).toBe(0n);
    expect(clampAmount(11n, 0n, 10n)).toBe(10n);
    expect(clampAmount(7n, 0n, 10n)).toBe(7n);
  });
});
