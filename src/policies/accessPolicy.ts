// src/policies/accessPolicy.ts
import { PermissionError } from "../utils/errors";

export const Role = {
  Admin: "admin",
  Tenant: "tenant",
} as const;

export type Role = (typeof Role)[keyof typeof Role];

/** The authenticated caller, resolved by the identity layer for every request. */
export interface Actor {
  accountId: string;
  role: Role;
  /** Tenant profile of the caller; always null for administrators. */
  tenantId: string | null;
}

const operationRoles = {
  "room:list": Role.Admin,
  "room:read": Role.Admin,
  "room:create": Role.Admin,
  "room:update": Role.Admin,
  "room:delete": Role.Admin,
  "bill:list": Role.Admin,
  "bill:read": Role.Admin,
  "bill:create": Role.Admin,
  "bill:update": Role.Admin,
  "bill:delete": Role.Admin,
  "complaint:list": Role.Admin,
  "complaint:setStatus": Role.Admin,
  "tenant:list": Role.Admin,
  "tenant:delete": Role.Admin,
  "tenant:assignRoom": Role.Admin,
  "dashboard:admin": Role.Admin,
  "bill:pay": Role.Tenant,
  "bill:listOwn": Role.Tenant,
  "complaint:create": Role.Tenant,
  "complaint:listOwn": Role.Tenant,
  "tenant:viewOwn": Role.Tenant,
  "dashboard:tenant": Role.Tenant,
} satisfies Record<string, Role>;

export type Operation = keyof typeof operationRoles;

export type AccessDecision = { allowed: true } | { allowed: false; reason: string };

export function requiredRole(operation: Operation): Role {
  return operationRoles[operation];
}

export function authorize(actor: Actor, operation: Operation): AccessDecision {
  const role = operationRoles[operation];
  if (actor.role !== role) {
    return {
      allowed: false,
      reason:
        role === Role.Admin
          ? "Access denied. Admin privileges required."
          : "This action is only available to tenants.",
    };
  }
  if (role === Role.Tenant && !actor.tenantId) {
    return { allowed: false, reason: "Tenant profile not found. Please contact administrator." };
  }
  return { allowed: true };
}

export function assertAuthorized(actor: Actor, operation: Operation): void {
  const decision = authorize(actor, operation);
  if (!decision.allowed) throw new PermissionError(decision.reason);
}

export function ownsRecord(actor: Actor, ownerTenantId: string): boolean {
  return actor.role === Role.Tenant && actor.tenantId === ownerTenantId;
}

/** Authorizes a tenant operation and returns the caller's own tenant id. */
export function requireOwnTenant(actor: Actor, operation: Operation): string {
  assertAuthorized(actor, operation);
  if (!actor.tenantId) {
    throw new PermissionError("Tenant profile not found. Please contact administrator.");
  }
  return actor.tenantId;
}
