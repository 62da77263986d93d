// Role-based access control as plain data plus pure functions.
//
// A registry maps each role to its member set and to the role that
// administers it. Authorization decisions (who may call grant/revoke) are
// made by the caller through assertRole(); the functions here only read or
// change membership.

import type { Address } from 'viem';

import { NotAuthorizedError } from './errors.js';
import { DEFAULT_ADMIN_ROLE, roleName } from './roles.js';
import type { RoleId } from './types.js';

export interface RoleRegistry {
  members: Map<RoleId, Set<Address>>;
  admins: Map<RoleId, RoleId>;
}

export function createRoleRegistry(): RoleRegistry {
  return { members: new Map(), admins: new Map() };
}

export function hasRole(registry: RoleRegistry, role: RoleId, account: Address): boolean {
  return registry.members.get(role)?.has(account) ?? false;
}

/** Role that administers `role`; unset roles are administered by AdminRole */
export function getRoleAdmin(registry: RoleRegistry, role: RoleId): RoleId {
  return registry.admins.get(role) ?? DEFAULT_ADMIN_ROLE;
}

export function setRoleAdmin(registry: RoleRegistry, role: RoleId, adminRole: RoleId): void {
  registry.admins.set(role, adminRole);
}

/** Adds `account` to `role`. Returns false when it was already a member. */
export function grantRole(registry: RoleRegistry, role: RoleId, account: Address): boolean {
  let members = registry.members.get(role);
  if (!members) {
    members = new Set();
    registry.members.set(role, members);
  }
  if (members.has(account)) {
    return false;
  }
  members.add(account);
  return true;
}

/** Removes `account` from `role`. Returns false when it was not a member. */
export function revokeRole(registry: RoleRegistry, role: RoleId, account: Address): boolean {
  return registry.members.get(role)?.delete(account) ?? false;
}

export function assertRole(registry: RoleRegistry, role: RoleId, account: Address): void {
  if (!hasRole(registry, role, account)) {
    throw new NotAuthorizedError(account, roleName(role));
  }
}

/** Current members of a role, in grant order */
export function roleMembers(registry: RoleRegistry, role: RoleId): Address[] {
  return [...(registry.members.get(role) ?? [])];
}
