/**
 * Event log routes.
 *
 * GET /api/v1/events         — List events (cursor pagination by global position)
 * GET /api/v1/events/verify  — Re-verify the hash chain
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate, decodeCursor } from "../types/pagination.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { createErrorEnvelope, dataEnvelope } from "../types/envelope.js";
import { parseQuery } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = parseQuery(ListEventsQuerySchema, c.req.query());
    if (query === undefined) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }
    if (query.cursor !== undefined && decodeCursor(query.cursor) === undefined) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid cursor"), 400);
    }

    const events = c.get("service").readEvents({
      source: query.source,
      correlationId: query.correlationId,
    });

    return c.json(
      paginate(
        events,
        { cursor: query.cursor, limit: query.limit },
        (e) => e.globalPosition,
        "globalPosition",
      ),
    );
  });

  routes.get("/verify", (c) => {
    const result = c.get("service").verifyEvents();
    return c.json(dataEnvelope(result), result.valid ? 200 : 409);
  });

  return routes;
}
