/**
 * Event Types
 *
 * Every state change in Cadence is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Payloads are JSON values; amounts travel as decimal strings
 * - No UPDATE, no DELETE — only new events
 */

/** Subsystems that emit events. */
export type EventSource = "stream" | "vesting" | "ledger";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Account that caused this event */
  readonly actor: string;

  readonly causationId?: string;

  /** Groups related events and ledger transactions */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event, discriminated by `type`
 * (e.g. "stream.created", "vesting.revoked").
 */
export interface DomainEvent {
  readonly type: string;
  readonly metadata: EventMetadata;
  readonly payload: Readonly<Record<string, unknown>>;
}
