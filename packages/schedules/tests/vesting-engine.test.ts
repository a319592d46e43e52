/**
 * Tests for VestingEngine against a real ledger and event store.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { escrowAccount } from "../src/collaborators.js";
import type { VestingParams } from "../src/types.js";
import type { Harness } from "./helpers.js";
import { TOKEN, YEAR, createHarness, expectScheduleError, vestingParams } from "./helpers.js";

const ESCROW = escrowAccount("vesting");
const START = 1_000n;

describe("VestingEngine", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness({ now: 0n });
    h.ledger.mint("alice", TOKEN, 500_000n, "seed");
  });

  function grant(overrides: Partial<VestingParams> = {}): number {
    return h.as("alice", () => h.vesting.create("alice", vestingParams(overrides)));
  }

  // ─── Create ────────────────────────────────────────────────────────

  describe("create", () => {
    it("escrows the total and stores every term", () => {
      const id = grant();
      expect(h.balance(ESCROW)).toBe(100_000n);
      const record = h.vesting.get(id);
      expect(record.kind).toBe("vesting");
      expect(record.label).toBe("team_grant");
      expect(record.revocable).toBe(true);
      expect(record.cliffAmount).toBe(25_000n);
      expect(record.totalDuration).toBe(4n * YEAR);
    });

    it("refuses reserved accounts as either party", () => {
      expectScheduleError(() => grant({ beneficiary: ESCROW }), "INVALID_RECIPIENT");
      expectScheduleError(() => grant({ beneficiary: escrowAccount("stream") }), "INVALID_RECIPIENT");
      expectScheduleError(() => grant({ beneficiary: `issuance:${TOKEN}` }), "INVALID_RECIPIENT");
      expect(h.vesting.count()).toBe(0);
      expect(h.balance("alice")).toBe(500_000n);
    });

    it("refuses an escrow account as grantor", () => {
      const streamEscrow = escrowAccount("stream");
      h.ledger.mint(streamEscrow, TOKEN, 100_000n, "stream-escrow-seed");
      expectScheduleError(
        () => h.as(streamEscrow, () => h.vesting.create(streamEscrow, vestingParams())),
        "INVALID_RECIPIENT",
      );
      expect(h.balance(streamEscrow)).toBe(100_000n);
      expect(h.balance(ESCROW)).toBe(0n);
    });

    it("allows a start in the past", () => {
      h.clock.set(10n * YEAR);
      expect(grant()).toBe(0);
    });

    it("rejects bad labels", () => {
      expectScheduleError(() => grant({ label: "not ok" }), "INVALID_LABEL");
      expect(h.balance("alice")).toBe(500_000n);
    });

    it("indexes grantor and beneficiary", () => {
      grant();
      grant({ beneficiary: "carol" });
      expect(h.vesting.schedulesByGrantor("alice")).toEqual([0, 1]);
      expect(h.vesting.schedulesByBeneficiary("carol")).toEqual([1]);
    });

    it("keeps its own id sequence apart from streams", () => {
      h.as("alice", () =>
        h.streams.create("alice", {
          recipient: "bob",
          token: TOKEN,
          totalAmount: 1n,
          startTime: 10n,
          endTime: 20n,
        }),
      );
      expect(grant()).toBe(0);
    });
  });

  // ─── Accrual through the engine ────────────────────────────────────

  describe("vesting progress", () => {
    it("vests half after two of four years with a quarter cliff", () => {
      const id = grant();
      h.clock.set(START + 2n * YEAR);
      expect(h.vesting.getProgress(id).accruedAmount).toBe(50_000n);
      h.clock.set(START + 4n * YEAR);
      expect(h.vesting.getProgress(id).accruedAmount).toBe(100_000n);
    });

    it("jumps to an explicit cliff amount at the cliff instant", () => {
      const id = grant({ cliffAmount: 50_000n });
      h.clock.set(START + YEAR - 1n);
      expect(h.vesting.getClaimable(id)).toBe(0n);
      h.clock.set(START + YEAR);
      expect(h.vesting.getClaimable(id)).toBe(50_000n);
    });
  });

  // ─── Claim ─────────────────────────────────────────────────────────

  describe("claim", () => {
    it("pays the cliff then the linear remainder", () => {
      const id = grant();
      h.clock.set(START + YEAR);
      expect(h.as("bob", () => h.vesting.claim("bob", id))).toBe(25_000n);
      h.clock.set(START + 4n * YEAR);
      expect(h.as("bob", () => h.vesting.claim("bob", id))).toBe(75_000n);
      expect(h.vesting.get(id).status).toBe("completed");
      expect(h.balance("bob")).toBe(100_000n);
    });

    it("refuses before the cliff", () => {
      const id = grant();
      h.clock.set(START + YEAR - 1n);
      expectScheduleError(() => h.as("bob", () => h.vesting.claim("bob", id)), "NOTHING_TO_CLAIM");
    });

    it("emits vesting.claimed", () => {
      const id = grant();
      h.clock.set(START + YEAR);
      h.as("bob", () => h.vesting.claim("bob", id));
      const claimed = h.store.readAll({ correlationId: "vesting:0:claim:1" });
      expect(claimed.map((e) => e.event.type)).toEqual(["vesting.claimed"]);
      expect(claimed[0]?.event.payload).toEqual({
        scheduleId: 0,
        recipient: "bob",
        amount: "25000",
        claimedAmount: "25000",
        completed: false,
      });
    });
  });

  // ─── Revoke ────────────────────────────────────────────────────────

  describe("revoke", () => {
    it("settles vested, refunds unvested and caps the total", () => {
      const id = grant({ cliffAmount: 50_000n });
      h.clock.set(START + YEAR);
      expect(h.as("alice", () => h.vesting.revoke("alice", id))).toBe(50_000n);

      expect(h.balance("bob")).toBe(50_000n);
      expect(h.balance("alice")).toBe(450_000n);
      expect(h.balance(ESCROW)).toBe(0n);

      const record = h.vesting.get(id);
      expect(record.status).toBe("revoked");
      expect(record.totalAmount).toBe(50_000n);
      expect(record.claimedAmount).toBe(50_000n);
      expect(record.termination?.originalTotal).toBe(100_000n);
    });

    it("reports a frozen, fully settled grant afterwards", () => {
      const id = grant();
      h.clock.set(START + 2n * YEAR);
      h.as("bob", () => h.vesting.claim("bob", id));
      h.as("alice", () => h.vesting.revoke("alice", id));
      h.clock.set(START + 10n * YEAR);
      expect(h.vesting.getProgress(id)).toEqual({
        id,
        kind: "vesting",
        status: "revoked",
        totalAmount: 50_000n,
        accruedAmount: 50_000n,
        claimedAmount: 50_000n,
        claimableAmount: 0n,
        asOf: START + 10n * YEAR,
      });
    });

    it("refuses non-revocable grants", () => {
      const id = grant({ revocable: false });
      const err = expectScheduleError(() => h.as("alice", () => h.vesting.revoke("alice", id)), "UNAUTHORIZED");
      expect(err.message).toBe("Vesting 0 is not revocable");
      expect(h.vesting.get(id).status).toBe("active");
    });

    it("only the grantor may revoke", () => {
      const id = grant();
      expectScheduleError(() => h.as("bob", () => h.vesting.revoke("bob", id)), "UNAUTHORIZED");
    });

    it("refuses a second revoke", () => {
      const id = grant();
      h.as("alice", () => h.vesting.revoke("alice", id));
      expectScheduleError(() => h.as("alice", () => h.vesting.revoke("alice", id)), "ALREADY_TERMINAL");
    });

    it("refuses claims once revoked", () => {
      const id = grant();
      h.clock.set(START + YEAR);
      h.as("alice", () => h.vesting.revoke("alice", id));
      expect(h.balance("bob")).toBe(25_000n);

      h.clock.set(START + 3n * YEAR);
      expectScheduleError(() => h.as("bob", () => h.vesting.claim("bob", id)), "ALREADY_TERMINAL");
      expect(h.balance("bob")).toBe(25_000n);
      expect(h.vesting.claimHistory(id)).toEqual([]);
    });

    it("emits vesting.revoked", () => {
      const id = grant();
      h.as("alice", () => h.vesting.revoke("alice", id));
      const [revoked] = h.store.readAll({ correlationId: "vesting:0:revoke" });
      expect(revoked?.event.type).toBe("vesting.revoked");
      expect(revoked?.event.payload).toEqual({
        scheduleId: 0,
        settledAmount: "0",
        refundedAmount: "100000",
        originalTotal: "100000",
      });
    });
  });
});
