/**
 * Admin permissions
 * Each privileged pool operation requires one explicit permission flag
 */

import { PermissionError } from "../errors.js";
import { AdminPermission, type AdminActor } from "../../types/pool.types.js";

const ALL_PERMISSIONS = Object.values(AdminPermission);

export function isAdminPermission(value: unknown): value is AdminPermission {
  return (
    typeof value === "string" &&
    ALL_PERMISSIONS.some((permission) => permission === value)
  );
}

export function createActor(
  id: string,
  permissions: Iterable<AdminPermission>,
): AdminActor {
  return { id, permissions: new Set(permissions) };
}

/**
 * Actor holding every permission, used by the scheduler
 */
export function systemActor(id = "system"): AdminActor {
  return createActor(id, ALL_PERMISSIONS);
}

export function hasPermission(
  actor: AdminActor,
  permission: AdminPermission,
): boolean {
  return actor.permissions.has(permission);
}

export function requirePermission(
  actor: AdminActor,
  permission: AdminPermission,
): void {
  if (!hasPermission(actor, permission)) {
    throw new PermissionError(
      `Actor ${actor.id} lacks the ${permission} permission`,
    );
  }
}
