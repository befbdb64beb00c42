/**
 * Authentication and authorization types.
 *
 * Every request acts as one ledger account. The account comes from:
 * 1. An API key via X-Api-Key header (secured mode)
 * 2. The X-Account-Id header (unsecured mode, no keys configured)
 *
 * Role hierarchy: admin > operator > viewer
 */

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "operator" | "viewer";

/** Permission levels for role-based access control */
export type Permission = "read" | "write" | "admin";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  operator: ["read", "write"],
  admin: ["read", "write", "admin"],
};

/**
 * Check whether a role has a specific permission.
 */
export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved caller, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key" | "header";
  readonly role: Role;

  /** Ledger account the request acts as */
  readonly accountId: string;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly accountId: string;
}
