/**
 * @cadence/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isReservedAccount } from "@cadence/schedules";
import type { Role } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

const ACCOUNT_PATTERN = /^[A-Za-z0-9_.:-]{1,128}$/;

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),
  JWT_SECRET: z.string().min(16).optional(),
  JWT_ISSUER: z.string().default("cadence"),

  // Engines
  ADMIN_ACCOUNT: z
    .string()
    .regex(ACCOUNT_PATTERN)
    .refine((account) => !isReservedAccount(account), "must not be an escrow or issuance account")
    .default("admin"),
  CLOCK_OFFSET_SECONDS: z.coerce.number().int().default(0),

  // Idempotency
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86400000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
  readonly account: string;
}

function parseRole(raw: string): Role {
  switch (raw) {
    case "admin":
    case "operator":
    case "viewer":
      return raw;
    default:
      throw new Error(
        `Invalid role "${raw}" in API_KEYS. Must be: admin, operator, or viewer`,
      );
  }
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:account1,key2:role2:account2". Account ids may not
 * contain ":" here; use JWT subjects for namespaced accounts.
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const [key, role, account, ...rest] = entry.trim().split(":");
    if (key === undefined || role === undefined || account === undefined || rest.length > 0) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:account`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (account === "") {
      throw new Error("Account cannot be empty in API_KEYS");
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key in API_KEYS for account "${account}"`);
    }
    seen.add(key);

    keys.push({ key, role: parseRole(role), account });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
