/**
 * @cadence/node — HTTP API over the schedule engines.
 *
 * @packageDocumentation
 */

export { CadenceService } from "./services/cadence-service.js";
export type {
  CadenceServiceConfig,
  ClaimOutcome,
  TerminationOutcome,
  EventQuery,
  AccountBalance,
} from "./services/cadence-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
