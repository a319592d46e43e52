/**
 * Tests for creation-time validation.
 */

import { describe, it, expect } from "vitest";
import { validateLabel, validateStreamParams, validateVestingParams } from "../src/validation.js";
import { expectScheduleError, streamParams, vestingParams, YEAR } from "./helpers.js";

describe("validateStreamParams", () => {
  it("accepts a well-formed stream", () => {
    expect(() => validateStreamParams("alice", streamParams(), 500n)).not.toThrow();
  });

  it("accepts a stream starting right now", () => {
    expect(() => validateStreamParams("alice", streamParams(), 1_000n)).not.toThrow();
  });

  it("rejects streaming to oneself", () => {
    expectScheduleError(
      () => validateStreamParams("bob", streamParams(), 0n),
      "INVALID_RECIPIENT",
    );
  });

  it("rejects malformed accounts", () => {
    expectScheduleError(
      () => validateStreamParams("alice", streamParams({ recipient: "" }), 0n),
      "INVALID_RECIPIENT",
    );
  });

  it("rejects non-positive and oversized totals", () => {
    expectScheduleError(
      () => validateStreamParams("alice", streamParams({ totalAmount: 0n }), 0n),
      "INVALID_AMOUNT",
    );
    expectScheduleError(
      () => validateStreamParams("alice", streamParams({ totalAmount: -5n }), 0n),
      "INVALID_AMOUNT",
    );
    expectScheduleError(
      () => validateStreamParams("alice", streamParams({ totalAmount: 2n ** 127n }), 0n),
      "INVALID_AMOUNT",
    );
  });

  it("rejects empty or inverted intervals", () => {
    expectScheduleError(
      () => validateStreamParams("alice", streamParams({ endTime: 1_000n }), 0n),
      "INVALID_DURATION",
    );
    expectScheduleError(
      () => validateStreamParams("alice", streamParams({ endTime: 999n }), 0n),
      "INVALID_DURATION",
    );
  });

  it("rejects times outside u64", () => {
    expectScheduleError(
      () => validateStreamParams("alice", streamParams({ endTime: 2n ** 64n }), 0n),
      "INVALID_DURATION",
    );
  });

  it("rejects a start in the past", () => {
    const err = expectScheduleError(
      () => validateStreamParams("alice", streamParams(), 1_001n),
      "INVALID_START_TIME",
    );
    expect(err.message).toBe("startTime 1000 is in the past (now 1001)");
  });
});

describe("validateVestingParams", () => {
  it("accepts a well-formed grant", () => {
    expect(() => validateVestingParams("alice", vestingParams())).not.toThrow();
  });

  it("allows a grantor to vest to itself", () => {
    expect(() => validateVestingParams("bob", vestingParams())).not.toThrow();
  });

  it("rejects a zero duration", () => {
    expectScheduleError(
      () => validateVestingParams("alice", vestingParams({ totalDuration: 0n, cliffDuration: 0n })),
      "INVALID_DURATION",
    );
  });

  it("rejects a cliff at or past the end", () => {
    expectScheduleError(
      () => validateVestingParams("alice", vestingParams({ cliffDuration: 4n * YEAR })),
      "INVALID_SCHEDULE",
    );
  });

  it("rejects cliff amounts outside [0, total]", () => {
    expectScheduleError(
      () => validateVestingParams("alice", vestingParams({ cliffAmount: -1n })),
      "INVALID_AMOUNT",
    );
    expectScheduleError(
      () => validateVestingParams("alice", vestingParams({ cliffAmount: 100_001n })),
      "INVALID_AMOUNT",
    );
    expect(() => validateVestingParams("alice", vestingParams({ cliffAmount: 100_000n }))).not.toThrow();
  });

  it("rejects an end past the u64 range", () => {
    expectScheduleError(
      () => validateVestingParams("alice", vestingParams({ startTime: 2n ** 64n - 10n })),
      "INVALID_DURATION",
    );
  });
});

describe("validateLabel", () => {
  it("accepts 1 to 32 word characters", () => {
    expect(() => validateLabel("a")).not.toThrow();
    expect(() => validateLabel("Series_A_2024")).not.toThrow();
    expect(() => validateLabel("x".repeat(32))).not.toThrow();
  });

  it("rejects empty, long and punctuated labels", () => {
    expectScheduleError(() => validateLabel(""), "INVALID_LABEL");
    expectScheduleError(() => validateLabel("x".repeat(33)), "INVALID_LABEL");
    expectScheduleError(() => validateLabel("seed round"), "INVALID_LABEL");
  });
});
