/**
 * Per-account schedule indexes.
 *
 * GET /api/v1/accounts/:account/streams  — Streams sent and received
 * GET /api/v1/accounts/:account/vesting  — Grants made and held
 *
 * Both lists are in creation order.
 */

import { Hono } from "hono";
import type { Schedule, ScheduleEngine } from "@cadence/schedules";
import type { AppEnv } from "../types/api-contract.js";
import { toScheduleDto } from "../types/dto.js";
import type { ScheduleDto } from "../types/dto.js";
import { dataEnvelope } from "../types/envelope.js";

interface AccountSchedules {
  readonly account: string;
  readonly sent: readonly ScheduleDto[];
  readonly received: readonly ScheduleDto[];
}

function listFor<S extends Schedule>(
  engine: ScheduleEngine<S>,
  account: string,
): AccountSchedules {
  const load = (id: number): ScheduleDto => toScheduleDto(engine.get(id));
  return {
    account,
    sent: engine.schedulesBySender(account).map(load),
    received: engine.schedulesByRecipient(account).map(load),
  };
}

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:account/streams", (c) => {
    const account = c.req.param("account");
    return c.json(dataEnvelope(listFor(c.get("service").streams, account)));
  });

  routes.get("/:account/vesting", (c) => {
    const account = c.req.param("account");
    return c.json(dataEnvelope(listFor(c.get("service").vesting, account)));
  });

  return routes;
}
