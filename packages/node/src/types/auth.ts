/**
 * Authentication and authorization types.
 *
 * Callers are identified by an API key (X-Api-Key header). In unsecured
 * mode the X-Caller-Id header names the caller directly.
 *
 * Role hierarchy: admin > member
 */

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "member";

/** Permission levels for role-based access control */
export type Permission = "read" | "write" | "admin";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  member: ["read", "write"],
  admin: ["read", "write", "admin"],
};

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

export function isRole(value: string): value is Role {
  return value === "admin" || value === "member";
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved caller, set by the auth middleware.
 *
 * `anonymous` only occurs in unsecured mode when no X-Caller-Id was sent;
 * its identity is the empty string and it may only read.
 */
export interface AuthContext {
  readonly type: "api-key" | "caller-header" | "anonymous";
  readonly identity: string;
  readonly role: Role;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  /** Identity the key acts as */
  readonly identity: string;
  readonly role: Role;
}
