/**
 * @cadence/event-store — Domain event definitions.
 *
 * Naming convention: `<source>.<action>`
 * Examples:
 * - stream.created
 * - vesting.revoked
 * - ledger.minted
 *
 * Amounts and timestamps are decimal strings; schedule ids are numbers.
 */

import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Payloads
// =============================================================================

export type EngineInitializedPayload = {
  readonly admin: string;
};

export type StreamCreatedPayload = {
  readonly scheduleId: number;
  readonly sender: string;
  readonly recipient: string;
  readonly token: string;
  readonly totalAmount: string;
  readonly startTime: string;
  readonly endTime: string;
};

export type StreamsBatchCreatedPayload = {
  readonly scheduleIds: readonly number[];
  readonly sender: string;
  readonly totalAmount: string;
};

export type VestingCreatedPayload = {
  readonly scheduleId: number;
  readonly grantor: string;
  readonly beneficiary: string;
  readonly token: string;
  readonly totalAmount: string;
  readonly startTime: string;
  readonly cliffDuration: string;
  readonly cliffAmount: string;
  readonly totalDuration: string;
  readonly label: string;
  readonly revocable: boolean;
};

export type ScheduleClaimedPayload = {
  readonly scheduleId: number;
  readonly recipient: string;
  readonly amount: string;
  readonly claimedAmount: string;
  readonly completed: boolean;
};

/** Shared by stream cancellation and vesting revocation. */
export type ScheduleTerminatedPayload = {
  readonly scheduleId: number;
  readonly settledAmount: string;
  readonly refundedAmount: string;
  readonly originalTotal: string;
};

export type TokensMintedPayload = {
  readonly account: string;
  readonly token: string;
  readonly amount: string;
};

// =============================================================================
// Event Types
// =============================================================================

export const CADENCE_EVENTS = {
  STREAM_INITIALIZED: "stream.initialized",
  STREAM_CREATED: "stream.created",
  STREAMS_BATCH_CREATED: "stream.batch_created",
  STREAM_CLAIMED: "stream.claimed",
  STREAM_CANCELLED: "stream.cancelled",
  VESTING_INITIALIZED: "vesting.initialized",
  VESTING_CREATED: "vesting.created",
  VESTING_CLAIMED: "vesting.claimed",
  VESTING_REVOKED: "vesting.revoked",
  LEDGER_MINTED: "ledger.minted",
} as const;

export type CadenceEventType = (typeof CADENCE_EVENTS)[keyof typeof CADENCE_EVENTS];

// =============================================================================
// Validation helpers
// =============================================================================

type FieldKind = "string" | "amount" | "id" | "boolean" | "ids";

const AMOUNT_PATTERN = /^-?\d+$/;

function fieldMatches(value: unknown, kind: FieldKind): boolean {
  switch (kind) {
    case "string":
      return typeof value === "string" && value.length > 0;
    case "amount":
      return typeof value === "string" && AMOUNT_PATTERN.test(value);
    case "id":
      return typeof value === "number" && Number.isInteger(value) && value >= 0;
    case "boolean":
      return typeof value === "boolean";
    case "ids":
      return Array.isArray(value) && value.every((v) => fieldMatches(v, "id"));
  }
}

function shape(fields: Readonly<Record<string, FieldKind>>): (payload: unknown) => boolean {
  return (payload) => {
    if (typeof payload !== "object" || payload === null) return false;
    const record = payload as Record<string, unknown>;
    return Object.entries(fields).every(([key, kind]) => fieldMatches(record[key], kind));
  };
}

const CLAIMED = shape({
  scheduleId: "id",
  recipient: "string",
  amount: "amount",
  claimedAmount: "amount",
  completed: "boolean",
});

const TERMINATED = shape({
  scheduleId: "id",
  settledAmount: "amount",
  refundedAmount: "amount",
  originalTotal: "amount",
});

const INITIALIZED = shape({ admin: "string" });

// =============================================================================
// Schemas
// =============================================================================

const SCHEMAS: readonly EventSchema[] = [
  {
    type: CADENCE_EVENTS.STREAM_INITIALIZED,
    version: 1,
    description: "The stream engine was bound to its admin account",
    source: "stream",
    validate: INITIALIZED,
  },
  {
    type: CADENCE_EVENTS.STREAM_CREATED,
    version: 1,
    description: "A linear stream was created and its total escrowed",
    source: "stream",
    validate: shape({
      scheduleId: "id",
      sender: "string",
      recipient: "string",
      token: "string",
      totalAmount: "amount",
      startTime: "amount",
      endTime: "amount",
    }),
  },
  {
    type: CADENCE_EVENTS.STREAMS_BATCH_CREATED,
    version: 1,
    description: "Several streams were created in one all-or-nothing batch",
    source: "stream",
    validate: shape({ scheduleIds: "ids", sender: "string", totalAmount: "amount" }),
  },
  {
    type: CADENCE_EVENTS.STREAM_CLAIMED,
    version: 1,
    description: "The recipient withdrew accrued stream funds",
    source: "stream",
    validate: CLAIMED,
  },
  {
    type: CADENCE_EVENTS.STREAM_CANCELLED,
    version: 1,
    description: "The sender cancelled a stream; accrued funds settled, remainder refunded",
    source: "stream",
    validate: TERMINATED,
  },
  {
    type: CADENCE_EVENTS.VESTING_INITIALIZED,
    version: 1,
    description: "The vesting engine was bound to its admin account",
    source: "vesting",
    validate: INITIALIZED,
  },
  {
    type: CADENCE_EVENTS.VESTING_CREATED,
    version: 1,
    description: "A cliff vesting grant was created and its total escrowed",
    source: "vesting",
    validate: shape({
      scheduleId: "id",
      grantor: "string",
      beneficiary: "string",
      token: "string",
      totalAmount: "amount",
      startTime: "amount",
      cliffDuration: "amount",
      cliffAmount: "amount",
      totalDuration: "amount",
      label: "string",
      revocable: "boolean",
    }),
  },
  {
    type: CADENCE_EVENTS.VESTING_CLAIMED,
    version: 1,
    description: "The beneficiary withdrew vested funds",
    source: "vesting",
    validate: CLAIMED,
  },
  {
    type: CADENCE_EVENTS.VESTING_REVOKED,
    version: 1,
    description: "The grantor revoked a grant; vested funds settled, unvested refunded",
    source: "vesting",
    validate: TERMINATED,
  },
  {
    type: CADENCE_EVENTS.LEDGER_MINTED,
    version: 1,
    description: "New token supply was issued to a holder",
    source: "ledger",
    validate: shape({ account: "string", token: "string", amount: "amount" }),
  },
];

/**
 * A catalog with every Cadence event type registered.
 */
export function createCadenceCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of SCHEMAS) {
    catalog.register(schema);
  }
  return catalog;
}
