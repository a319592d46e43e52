/**
 * Schedule lifecycle.
 *
 *   active ──► completed
 *     │
 *     ├──────► cancelled   (stream only)
 *     └──────► revoked     (vesting only)
 *
 * Terminal states have no outgoing transitions.
 */

import type { ScheduleKind, ScheduleStatus, TerminalStatus } from "./types.js";
import { ScheduleError } from "./types.js";

const TRANSITIONS: Readonly<Record<ScheduleKind, Readonly<Record<ScheduleStatus, readonly ScheduleStatus[]>>>> = {
  stream: {
    active: ["completed", "cancelled"],
    completed: [],
    cancelled: [],
    revoked: [],
  },
  vesting: {
    active: ["completed", "revoked"],
    completed: [],
    cancelled: [],
    revoked: [],
  },
};

export function isTerminal(status: ScheduleStatus): status is TerminalStatus {
  return status !== "active";
}

export function canTransition(
  kind: ScheduleKind,
  from: ScheduleStatus,
  to: ScheduleStatus,
): boolean {
  return TRANSITIONS[kind][from].includes(to);
}

/**
 * @throws ScheduleError INVALID_TRANSITION
 */
export function assertTransition(
  kind: ScheduleKind,
  from: ScheduleStatus,
  to: ScheduleStatus,
): void {
  if (!canTransition(kind, from, to)) {
    throw new ScheduleError(
      "INVALID_TRANSITION",
      `A ${kind} cannot move from "${from}" to "${to}"`,
    );
  }
}

/** Status a schedule ends in when its owner terminates it. */
export function terminationStatus(kind: ScheduleKind): "cancelled" | "revoked" {
  return kind === "stream" ? "cancelled" : "revoked";
}
