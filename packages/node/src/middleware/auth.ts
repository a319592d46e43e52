/**
 * Authentication middleware.
 *
 * Supports two strategies:
 * 1. API key via X-Api-Key header → looked up in the configured key registry
 * 2. JWT bearer token via Authorization header → HMAC-SHA256 signature verify
 *
 * On success, sets `c.set("auth", authContext)`.
 * On failure, returns 401 or 403. Escrow and issuance accounts are never
 * an identity, whatever the credential says.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import type { Context, MiddlewareHandler } from "hono";
import { isReservedAccount } from "@cadence/schedules";
import { z } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import type {
  AuthContext,
  Permission,
  ApiKeyRecord,
  JwtClaims,
} from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/envelope.js";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
  /** JWT HMAC secret (if JWT auth is enabled) */
  readonly jwtSecret?: string | undefined;
  /** Expected JWT issuer */
  readonly jwtIssuer?: string | undefined;
}

export const ACCOUNT_HEADER = "X-Account-Id";

/**
 * Create authentication middleware.
 *
 * Tries X-Api-Key first, then Authorization: Bearer.
 * Returns 401 if neither is present or valid.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    let auth: AuthContext | undefined;

    // Strategy 1: API Key
    const apiKey = c.req.header("X-Api-Key");
    if (apiKey !== undefined) {
      const record = config.apiKeys.get(apiKey);
      if (record === undefined) {
        return c.json(
          createErrorEnvelope("UNAUTHORIZED", "Invalid API key"),
          401,
        );
      }
      auth = { type: "api-key", account: record.account, role: record.role };
    }

    // Strategy 2: JWT Bearer
    if (auth === undefined) {
      const authHeader = c.req.header("Authorization");
      if (authHeader !== undefined && authHeader.startsWith("Bearer ")) {
        if (config.jwtSecret === undefined) {
          return c.json(
            createErrorEnvelope("UNAUTHORIZED", "JWT authentication not configured"),
            401,
          );
        }
        const claims = verifyJwt(authHeader.slice(7), config.jwtSecret, config.jwtIssuer);
        if (claims === undefined) {
          return c.json(
            createErrorEnvelope("UNAUTHORIZED", "Invalid or expired JWT"),
            401,
          );
        }
        auth = { type: "jwt", account: claims.sub, role: claims.role };
      }
    }

    if (auth === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }
    if (isReservedAccount(auth.account)) {
      return reservedAccount(c, auth.account);
    }

    c.set("auth", auth);
    return next();
  };
}

/**
 * Unsecured mode (tests, dev): the caller names its own account in
 * X-Account-Id and gets the admin role. Requests without the header
 * are anonymous viewers.
 */
export function headerAccountMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const account = c.req.header(ACCOUNT_HEADER);
    if (account !== undefined && isReservedAccount(account)) {
      return reservedAccount(c, account);
    }
    c.set(
      "auth",
      account === undefined || account === ""
        ? { type: "header", account: "anonymous", role: "viewer" }
        : { type: "header", account, role: "admin" },
    );
    return next();
  };
}

function reservedAccount(c: Context<AppEnv>, account: string): Response {
  return c.json(
    createErrorEnvelope("FORBIDDEN", `Account "${account}" is reserved`),
    403,
  );
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Create a permission guard middleware.
 *
 * Must run AFTER the auth middleware. Returns 403 if the authenticated
 * role lacks the required permission.
 */
export function requirePermission(
  permission: Permission,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `Role '${auth.role}' lacks '${permission}' permission`,
        ),
        403,
      );
    }
    return next();
  };
}

// =============================================================================
// JWT Helpers
// =============================================================================

const JwtHeaderSchema = z.object({ alg: z.literal("HS256") });

const JwtPayloadSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(["admin", "operator", "viewer"]),
  iss: z.string().optional(),
  exp: z.number().int(),
  iat: z.number().int(),
});

function decodeSegment(segment: string): unknown {
  try {
    return JSON.parse(Buffer.from(segment, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
}

function sign(input: string, secret: string): string {
  return createHmac("sha256", secret).update(input).digest("base64url");
}

/**
 * Verify an HS256 JWT.
 *
 * @returns Decoded claims, or undefined if invalid/expired.
 */
export function verifyJwt(
  token: string,
  secret: string,
  expectedIssuer?: string,
  nowSeconds: number = Math.floor(Date.now() / 1000),
): JwtClaims | undefined {
  const [headerB64, payloadB64, signatureB64, ...rest] = token.split(".");
  if (
    headerB64 === undefined ||
    payloadB64 === undefined ||
    signatureB64 === undefined ||
    rest.length > 0
  ) {
    return undefined;
  }

  const expected = Buffer.from(sign(`${headerB64}.${payloadB64}`, secret));
  const actual = Buffer.from(signatureB64);
  if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
    return undefined;
  }

  if (!JwtHeaderSchema.safeParse(decodeSegment(headerB64)).success) {
    return undefined;
  }

  const parsed = JwtPayloadSchema.safeParse(decodeSegment(payloadB64));
  if (!parsed.success) {
    return undefined;
  }
  const payload = parsed.data;

  if (payload.exp < nowSeconds) {
    return undefined;
  }
  if (expectedIssuer !== undefined && payload.iss !== expectedIssuer) {
    return undefined;
  }
  return {
    sub: payload.sub,
    role: payload.role,
    iss: payload.iss ?? "",
    exp: payload.exp,
    iat: payload.iat,
  };
}

/**
 * Create a signed JWT for testing/bootstrapping.
 */
export function signJwt(
  claims: Omit<JwtClaims, "iat"> & { iat?: number },
  secret: string,
): string {
  const header = Buffer.from(
    JSON.stringify({ alg: "HS256", typ: "JWT" }),
  ).toString("base64url");

  const payload = Buffer.from(
    JSON.stringify({
      ...claims,
      iat: claims.iat ?? Math.floor(Date.now() / 1000),
    }),
  ).toString("base64url");

  return `${header}.${payload}.${sign(`${header}.${payload}`, secret)}`;
}
