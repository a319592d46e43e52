/**
 * Routes shared by both schedule kinds, mounted under
 * /api/v1/streams and /api/v1/vesting.
 *
 * GET  /:id            — Schedule record
 * GET  /:id/claimable  — Claimable now
 * GET  /:id/progress   — Accrued / claimed / claimable snapshot
 * GET  /:id/claims     — Claim history
 * POST /:id/claim      — Claim as the recipient
 * POST /:id/<terminate> — Cancel (streams) or revoke (vesting) as the sender
 */

import type { Hono } from "hono";
import type { Schedule, ScheduleEngine } from "@cadence/schedules";
import type { AppEnv } from "../types/api-contract.js";
import type {
  CadenceService,
  ClaimOutcome,
  TerminationOutcome,
} from "../services/cadence-service.js";
import { toClaimDto, toProgressDto, toScheduleDto } from "../types/dto.js";
import { createErrorEnvelope, dataEnvelope } from "../types/envelope.js";
import type { ErrorEnvelope } from "../types/envelope.js";
import { IdParamSchema } from "../types/query.js";

export interface ScheduleRouteBindings<S extends Schedule> {
  readonly engine: (service: CadenceService) => ScheduleEngine<S>;
  readonly claim: (service: CadenceService, caller: string, id: number) => ClaimOutcome<S>;
  readonly terminatePath: "cancel" | "revoke";
  readonly terminate: (
    service: CadenceService,
    caller: string,
    id: number,
  ) => TerminationOutcome<S>;
}

/** Schedule id from the `:id` path segment, or undefined when malformed. */
export function parseScheduleId(raw: string | undefined): number | undefined {
  const parsed = IdParamSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

export function invalidIdEnvelope(raw: string | undefined): ErrorEnvelope {
  return createErrorEnvelope("VALIDATION_ERROR", `Invalid schedule id '${raw ?? ""}'`);
}

export function mountScheduleRoutes<S extends Schedule>(
  routes: Hono<AppEnv>,
  bindings: ScheduleRouteBindings<S>,
): void {
  routes.get("/:id", (c) => {
    const id = parseScheduleId(c.req.param("id"));
    if (id === undefined) return c.json(invalidIdEnvelope(c.req.param("id")), 400);
    const schedule = bindings.engine(c.get("service")).get(id);
    return c.json(dataEnvelope(toScheduleDto(schedule)));
  });

  routes.get("/:id/claimable", (c) => {
    const id = parseScheduleId(c.req.param("id"));
    if (id === undefined) return c.json(invalidIdEnvelope(c.req.param("id")), 400);
    const engine = bindings.engine(c.get("service"));
    return c.json(
      dataEnvelope({ id, claimableAmount: engine.getClaimable(id).toString() }),
    );
  });

  routes.get("/:id/progress", (c) => {
    const id = parseScheduleId(c.req.param("id"));
    if (id === undefined) return c.json(invalidIdEnvelope(c.req.param("id")), 400);
    const progress = bindings.engine(c.get("service")).getProgress(id);
    return c.json(dataEnvelope(toProgressDto(progress)));
  });

  routes.get("/:id/claims", (c) => {
    const id = parseScheduleId(c.req.param("id"));
    if (id === undefined) return c.json(invalidIdEnvelope(c.req.param("id")), 400);
    const engine = bindings.engine(c.get("service"));
    const schedule = engine.get(id);
    return c.json(
      dataEnvelope({
        id: schedule.id,
        claims: engine.claimHistory(schedule.id).map(toClaimDto),
      }),
    );
  });

  routes.post("/:id/claim", (c) => {
    const id = parseScheduleId(c.req.param("id"));
    if (id === undefined) return c.json(invalidIdEnvelope(c.req.param("id")), 400);
    const { amount, schedule } = bindings.claim(c.get("service"), c.get("auth").account, id);
    return c.json(
      dataEnvelope({ amount: amount.toString(), schedule: toScheduleDto(schedule) }),
    );
  });

  routes.post(`/:id/${bindings.terminatePath}`, (c) => {
    const id = parseScheduleId(c.req.param("id"));
    if (id === undefined) return c.json(invalidIdEnvelope(c.req.param("id")), 400);
    const { refund, schedule } = bindings.terminate(
      c.get("service"),
      c.get("auth").account,
      id,
    );
    return c.json(
      dataEnvelope({ refund: refund.toString(), schedule: toScheduleDto(schedule) }),
    );
  });
}
