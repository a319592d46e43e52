/**
 * Authentication and authorization types.
 *
 * Every authenticated caller is a ledger account. The account is the
 * identity the schedule engines see for the duration of the request.
 *
 * Role hierarchy: admin > operator > viewer
 */

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "operator" | "viewer";

/**
 * - read: queries
 * - write: create, claim, cancel, revoke on the caller's own schedules
 * - admin: minting supply
 */
export type Permission = "read" | "write" | "admin";

export const ROLE_PERMISSIONS: Readonly<Record<Role, readonly Permission[]>> = {
  viewer: ["read"],
  operator: ["read", "write"],
  admin: ["read", "write", "admin"],
};

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved caller, set by the auth middleware (or, in unsecured mode, by
 * the X-Account-Id header).
 */
export interface AuthContext {
  readonly type: "api-key" | "jwt" | "header";
  readonly account: string;
  readonly role: Role;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly account: string;
}

// =============================================================================
// JWT Claims
// =============================================================================

export interface JwtClaims {
  /** Account id */
  readonly sub: string;
  readonly role: Role;
  readonly iss: string;
  readonly exp: number;
  readonly iat: number;
}
