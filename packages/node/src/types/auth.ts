/**
 * Authentication and authorization types.
 *
 * Callers authenticate with an API key via the X-Api-Key header. Each key
 * is bound to an on-chain identity: the address the engine sees as the
 * caller, and whether that address is an account or a contract.
 *
 * Role hierarchy: owner > reporter > viewer
 */

import type { Address, CallerKind } from "@roundfeed/types";

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "owner" | "reporter" | "viewer";

/** Permission levels for role-based access control */
export type Permission = "read" | "fund" | "submit" | "admin";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read", "fund"],
  reporter: ["read", "fund", "submit"],
  owner: ["read", "fund", "submit", "admin"],
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
 * Resolved authentication context, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key" | "anonymous";
  readonly identity: string;
  readonly role: Role;
  readonly address: Address;
  readonly kind: CallerKind;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly address: Address;
  readonly kind: CallerKind;
}
