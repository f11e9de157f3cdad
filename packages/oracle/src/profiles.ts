/**
 * Credit Profile Store
 *
 * Per-owner record of opaque financial attributes. Writes are self-service
 * (caller must be the owner) and replace the profile wholesale.
 */

import {
  emitAudit,
  ProfileNotFoundError,
  systemClock,
  UnauthorizedCallerError,
  type AuditSink,
  type Clock,
  type HomomorphicEngine,
  type Identity,
  type OpaqueValue,
} from "@cipherscore/engine";
import type { OracleStorage, ProfileRow } from "./storage";
import type { CreditProfile, FinancialAttributes } from "./types";

export interface CreditProfileStoreOptions {
  storage: OracleStorage;
  engine: HomomorphicEngine;
  audit?: AuditSink;
  clock?: Clock;
}

export class CreditProfileStore {
  private readonly storage: OracleStorage;
  private readonly engine: HomomorphicEngine;
  private readonly audit?: AuditSink;
  private readonly clock: Clock;

  constructor(opts: CreditProfileStoreOptions) {
    this.storage = opts.storage;
    this.engine = opts.engine;
    this.audit = opts.audit;
    this.clock = opts.clock ?? systemClock;
  }

  /**
   * Replace the owner's attributes. Every value is validated before anything
   * is written.
   *
   * @returns the profile's new revision
   * @throws UnauthorizedCallerError if caller is not the owner
   * @throws MalformedCiphertextError if any attribute is not a valid ciphertext
   */
  submit(caller: Identity, owner: Identity, attributes: FinancialAttributes<OpaqueValue>): number {
    if (caller !== owner) {
      throw new UnauthorizedCallerError(caller, "profile_owner");
    }

    const blobs = {
      income: this.validated(attributes.income),
      assets: this.validated(attributes.assets),
      debts: this.validated(attributes.debts),
      payment_history: this.validated(attributes.payment_history),
      credit_utilization: this.validated(attributes.credit_utilization),
    };

    const ts = this.clock();
    const revision = this.storage.writeProfile(owner, blobs, ts);
    emitAudit(this.audit, {
      operation: "profile_submitted",
      caller,
      ts,
      details: { revision },
    });
    return revision;
  }

  /**
   * @throws ProfileNotFoundError
   */
  get(owner: Identity): CreditProfile {
    const row = this.storage.getProfile(owner);
    if (!row) {
      throw new ProfileNotFoundError(owner);
    }
    return this.toProfile(row);
  }

  has(owner: Identity): boolean {
    return this.storage.getProfile(owner) !== null;
  }

  /**
   * Record a score computed from `revision`. Only the scoring pipeline calls this.
   *
   * @returns false if the profile moved past `revision` in the meantime
   */
  storeScore(owner: Identity, score: OpaqueValue, revision: number): boolean {
    if (!this.has(owner)) {
      throw new ProfileNotFoundError(owner);
    }
    return this.storage.writeScore(owner, this.validated(score), revision, this.clock());
  }

  private validated(value: OpaqueValue): Uint8Array {
    // restore re-checks length and backend structure
    return this.engine.restore(value.toBytes()).toBytes();
  }

  private toProfile(row: ProfileRow): CreditProfile {
    const score = row.score ? this.engine.restore(row.score) : null;
    return {
      owner: row.owner,
      attributes: {
        income: this.engine.restore(row.income),
        assets: this.engine.restore(row.assets),
        debts: this.engine.restore(row.debts),
        payment_history: this.engine.restore(row.payment_history),
        credit_utilization: this.engine.restore(row.credit_utilization),
      },
      score,
      revision: row.revision,
      score_revision: row.score_revision,
      updated_at: row.updated_at,
      score_computed_at: row.score_computed_at,
      score_stale: score !== null && row.score_revision !== row.revision,
      exists: true,
    };
  }
}
