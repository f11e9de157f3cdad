/**
 * Grant Storage
 *
 * Backing store for the authorization set. Insert-only: there is no removal
 * path, matching the gate's one-way state machine.
 */

import type { Capability, Identity } from "../types";

export interface GrantRecord {
  identity: Identity;
  capability: Capability;
  granted_by: Identity;
  granted_at: number;
}

export interface GrantStore {
  hasGrant(identity: Identity, capability: Capability): boolean;

  /**
   * Insert a grant (idempotent on identity + capability).
   * @returns true if the row was new
   */
  insertGrant(record: GrantRecord): boolean;

  listGrants(): GrantRecord[];
}

export class MemoryGrantStore implements GrantStore {
  private grants = new Map<string, GrantRecord>();

  hasGrant(identity: Identity, capability: Capability): boolean {
    return this.grants.has(grantKey(identity, capability));
  }

  insertGrant(record: GrantRecord): boolean {
    const key = grantKey(record.identity, record.capability);
    if (this.grants.has(key)) return false;
    this.grants.set(key, { ...record });
    return true;
  }

  listGrants(): GrantRecord[] {
    return [...this.grants.values()].sort((a, b) => a.granted_at - b.granted_at);
  }
}

function grantKey(identity: Identity, capability: Capability): string {
  return `${capability}:${identity}`;
}
