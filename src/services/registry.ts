import type { Address } from "viem";
import type { RoleSet } from "../utils/types";

// =============================================================================
// ROLE SETS
// =============================================================================

export function createRoleSet(members: Address[] = []): RoleSet {
  const set: RoleSet = { members: [], index: new Map() };
  for (const member of members) addMember(set, member);
  return set;
}

export function hasMember(set: RoleSet, address: Address): boolean {
  return set.index.has(address);
}

/**
 * Append `address` if it is not already a member.
 * Returns true when the set changed.
 */
export function addMember(set: RoleSet, address: Address): boolean {
  if (set.index.has(address)) return false;
  set.index.set(address, set.members.length);
  set.members.push(address);
  return true;
}

/**
 * Swap-and-pop removal: the last member takes the removed slot.
 * Returns false when `address` was not a member.
 */
export function removeMember(set: RoleSet, address: Address): boolean {
  const position = set.index.get(address);
  if (position === undefined) return false;

  const lastPosition = set.members.length - 1;
  const last = set.members[lastPosition];
  if (position !== lastPosition) {
    set.members[position] = last;
    set.index.set(last, position);
  }
  set.members.pop();
  set.index.delete(address);
  return true;
}

export function listMembers(set: RoleSet): Address[] {
  return [...set.members];
}
