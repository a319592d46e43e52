/**
 * Stream routes.
 *
 * POST /api/v1/streams             — Create a stream, escrowing its total
 * POST /api/v1/streams/batch       — Create several streams atomically
 * POST /api/v1/streams/:id/cancel  — Cancel as the sender
 * plus the shared schedule routes (see schedules.ts)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateStreamBatchSchema, CreateStreamSchema, toScheduleDto } from "../types/dto.js";
import { dataEnvelope } from "../types/envelope.js";
import { validateBody } from "../middleware/validate.js";
import { mountScheduleRoutes } from "./schedules.js";

export function createStreamRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateStreamSchema), (c) => {
    const schedule = c
      .get("service")
      .createStream(c.get("auth").account, c.get("validatedBody"));
    return c.json(dataEnvelope(toScheduleDto(schedule)), 201);
  });

  routes.post("/batch", validateBody(CreateStreamBatchSchema), (c) => {
    const schedules = c
      .get("service")
      .createStreams(c.get("auth").account, c.get("validatedBody").streams);
    return c.json(dataEnvelope(schedules.map(toScheduleDto)), 201);
  });

  mountScheduleRoutes(routes, {
    engine: (service) => service.streams,
    claim: (service, caller, id) => service.claimStream(caller, id),
    terminatePath: "cancel",
    terminate: (service, caller, id) => service.cancelStream(caller, id),
  });

  return routes;
}
