/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { CadenceService } from "../services/cadence-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Hono environment type for the Cadence app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The node's service (set for every /api request) */
    service: CadenceService;

    /** Calling account and role (set by auth middleware) */
    auth: AuthContext;
  };
}
