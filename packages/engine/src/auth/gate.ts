/**
 * Authorization Gate
 *
 * Tracks which principals may invoke engine operations, register pools, or
 * decrypt. Per (identity, capability) the only transition is
 * unauthorized → authorized, issued by the deploying owner or by a principal
 * that already holds the capability. There is no revocation.
 */

import type { Capability, Clock, Identity } from "../types";
import { systemClock } from "../types";
import { UnauthorizedCallerError } from "../errors";
import { emitAudit, type AuditSink } from "../audit/sink";
import { MemoryGrantStore, type GrantRecord, type GrantStore } from "./grants";
import { createLogger } from "../logger";

const logger = createLogger("auth");

export interface AuthorizationGateOptions {
  /** Deploying owner; implicitly holds every capability. */
  owner: Identity;
  store?: GrantStore;
  audit?: AuditSink;
  clock?: Clock;
}

export class AuthorizationGate {
  readonly owner: Identity;
  private readonly store: GrantStore;
  private readonly audit?: AuditSink;
  private readonly clock: Clock;

  constructor(opts: AuthorizationGateOptions) {
    if (!opts.owner) {
      throw new Error("AuthorizationGate: owner identity is required");
    }
    this.owner = opts.owner;
    this.store = opts.store ?? new MemoryGrantStore();
    this.audit = opts.audit;
    this.clock = opts.clock ?? systemClock;
  }

  isAuthorized(identity: Identity, capability: Capability = "engine"): boolean {
    return identity === this.owner || this.store.hasGrant(identity, capability);
  }

  /**
   * @throws UnauthorizedCallerError
   */
  require(identity: Identity, capability: Capability): void {
    if (!this.isAuthorized(identity, capability)) {
      throw new UnauthorizedCallerError(identity, capability);
    }
  }

  /**
   * Grant `capability` to `grantee`.
   *
   * @returns true if the grant is new, false if it already existed
   * @throws UnauthorizedCallerError if the granter does not hold the capability
   */
  grant(granter: Identity, grantee: Identity, capability: Capability): boolean {
    this.require(granter, capability);
    if (!grantee) {
      throw new Error("AuthorizationGate: grantee identity is required");
    }
    if (grantee === this.owner) {
      return false;
    }

    const ts = this.clock();
    const inserted = this.store.insertGrant({
      identity: grantee,
      capability,
      granted_by: granter,
      granted_at: ts,
    });
    if (inserted) {
      logger.info("Capability granted", { grantee, capability, granted_by: granter });
      emitAudit(this.audit, {
        operation: "grant",
        caller: granter,
        ts,
        details: { grantee, capability },
      });
    }
    return inserted;
  }

  listGrants(): GrantRecord[] {
    return this.store.listGrants();
  }
}
