/**
 * Tests for the event catalog and the Cadence event definitions.
 */

import { describe, it, expect } from "vitest";
import { EventCatalog, CatalogError } from "../src/catalog.js";
import { CADENCE_EVENTS, createCadenceCatalog } from "../src/schedule-events.js";

describe("EventCatalog", () => {
  it("registers and looks up schemas", () => {
    const catalog = new EventCatalog();
    catalog.register({
      type: "stream.created",
      version: 1,
      description: "created",
      source: "stream",
      validate: () => true,
    });
    expect(catalog.has("stream.created")).toBe(true);
    expect(catalog.getSchema("stream.created")?.version).toBe(1);
    expect(catalog.size).toBe(1);
  });

  it("replaces a schema only on a version change", () => {
    const catalog = new EventCatalog();
    const v1 = { type: "x", version: 1, description: "one", source: "ledger" as const, validate: () => true };
    catalog.register(v1);
    catalog.register({ ...v1, description: "again" });
    expect(catalog.getSchema("x")?.description).toBe("one");
    catalog.register({ ...v1, version: 2, description: "two" });
    expect(catalog.getSchema("x")?.description).toBe("two");
  });

  it("rejects non-positive versions", () => {
    const catalog = new EventCatalog();
    expect(() =>
      catalog.register({ type: "x", version: 0, description: "", source: "ledger", validate: () => true }),
    ).toThrow(CatalogError);
  });

  it("treats unregistered types as invalid", () => {
    expect(new EventCatalog().validate("nope", {})).toBe(false);
  });
});

describe("createCadenceCatalog", () => {
  const catalog = createCadenceCatalog();

  it("registers every event type", () => {
    expect(catalog.listTypes()).toEqual(Object.values(CADENCE_EVENTS).sort());
  });

  it("groups schemas by source", () => {
    expect(catalog.listBySource("vesting").map((s) => s.type)).toEqual([
      "vesting.initialized",
      "vesting.created",
      "vesting.claimed",
      "vesting.revoked",
    ]);
    expect(catalog.listBySource("ledger").map((s) => s.type)).toEqual(["ledger.minted"]);
  });

  it("validates a stream creation payload", () => {
    const payload = {
      scheduleId: 0,
      sender: "alice",
      recipient: "bob",
      token: "USDC",
      totalAmount: "1000",
      startTime: "100",
      endTime: "200",
    };
    expect(catalog.validate("stream.created", payload)).toBe(true);
    expect(catalog.validate("stream.created", { ...payload, totalAmount: 1000 })).toBe(false);
    expect(catalog.validate("stream.created", { ...payload, scheduleId: -1 })).toBe(false);
    expect(catalog.validate("stream.created", null)).toBe(false);
  });

  it("validates batch ids", () => {
    expect(
      catalog.validate("stream.batch_created", { scheduleIds: [0, 1], sender: "a", totalAmount: "10" }),
    ).toBe(true);
    expect(
      catalog.validate("stream.batch_created", { scheduleIds: ["0"], sender: "a", totalAmount: "10" }),
    ).toBe(false);
  });

  it("validates termination payloads", () => {
    expect(
      catalog.validate("vesting.revoked", {
        scheduleId: 3,
        settledAmount: "0",
        refundedAmount: "400",
        originalTotal: "1000",
      }),
    ).toBe(true);
    expect(catalog.validate("vesting.revoked", { scheduleId: 3 })).toBe(false);
  });
});
