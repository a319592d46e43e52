/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createStreamRoutes } from "./streams.js";
export { createVestingRoutes } from "./vesting.js";
export { createAccountRoutes } from "./accounts.js";
export { createLedgerRoutes } from "./ledger.js";
export { createEventRoutes } from "./events.js";
export { mountScheduleRoutes, parseScheduleId } from "./schedules.js";
export type { ScheduleRouteBindings } from "./schedules.js";
