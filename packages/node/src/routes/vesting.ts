/**
 * Vesting routes.
 *
 * POST /api/v1/vesting             — Grant, escrowing the total
 * POST /api/v1/vesting/:id/revoke  — Revoke as the grantor
 * plus the shared schedule routes (see schedules.ts)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateVestingSchema, toScheduleDto } from "../types/dto.js";
import { dataEnvelope } from "../types/envelope.js";
import { validateBody } from "../middleware/validate.js";
import { mountScheduleRoutes } from "./schedules.js";

export function createVestingRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateVestingSchema), (c) => {
    const schedule = c
      .get("service")
      .createVesting(c.get("auth").account, c.get("validatedBody"));
    return c.json(dataEnvelope(toScheduleDto(schedule)), 201);
  });

  mountScheduleRoutes(routes, {
    engine: (service) => service.vesting,
    claim: (service, caller, id) => service.claimVesting(caller, id),
    terminatePath: "revoke",
    terminate: (service, caller, id) => service.revokeVesting(caller, id),
  });

  return routes;
}
