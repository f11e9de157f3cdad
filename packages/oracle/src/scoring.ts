/**
 * Confidential Scoring Pipeline
 *
 * Deterministic weighted combination of a profile's opaque attributes. The
 * formula is written once over Arithmetic<T>, so the same code produces the
 * opaque score (through the engine) and the plaintext oracle value.
 */

import {
  emitAudit,
  opaqueArithmetic,
  plaintextArithmetic,
  systemClock,
  type Arithmetic,
  type AuditSink,
  type Clock,
  type HomomorphicEngine,
  type Identity,
  type OpaqueValue,
} from "@cipherscore/engine";
import type { CreditProfileStore } from "./profiles";
import type { FinancialAttributes } from "./types";

// Conceptual weights are 35/30/20/15; income is measured in currency units
// rather than a 0–100 scale, so its integer scalar is 3.
export const SCORE_WEIGHTS = Object.freeze({
  payment_history: 35n,
  income: 3n,
  credit_utilization: 20n,
  assets: 15n,
});

/** Final scale applied to the weighted total (score is in hundredths). */
export const SCORE_SCALE_NUMERATOR = 100n;

/**
 * Combine attributes into a score. Debts are carried in the profile but do
 * not enter the formula.
 */
export function combineScore<T>(ops: Arithmetic<T>, attributes: FinancialAttributes<T>): T {
  const paymentTerm = ops.scale(attributes.payment_history, SCORE_WEIGHTS.payment_history);
  const incomeTerm = ops.scale(attributes.income, SCORE_WEIGHTS.income);
  const utilizationTerm = ops.scale(attributes.credit_utilization, SCORE_WEIGHTS.credit_utilization);
  const assetTerm = ops.scale(attributes.assets, SCORE_WEIGHTS.assets);
  const total = ops.add(ops.add(ops.add(paymentTerm, incomeTerm), utilizationTerm), assetTerm);
  return ops.scale(total, SCORE_SCALE_NUMERATOR);
}

/**
 * Plaintext oracle: the score the pipeline must reproduce under encryption.
 */
export function computePlaintextScore(attributes: FinancialAttributes<bigint>): bigint {
  return combineScore(plaintextArithmetic, attributes);
}

export interface ScoringPipelineOptions {
  engine: HomomorphicEngine;
  profiles: CreditProfileStore;
  /** Service identity holding the engine grant. */
  principal: Identity;
  audit?: AuditSink;
  clock?: Clock;
}

export class ScoringPipeline {
  private readonly ops: Arithmetic<OpaqueValue>;
  private readonly profiles: CreditProfileStore;
  private readonly principal: Identity;
  private readonly audit?: AuditSink;
  private readonly clock: Clock;

  constructor(opts: ScoringPipelineOptions) {
    this.ops = opaqueArithmetic(opts.engine, opts.principal);
    this.profiles = opts.profiles;
    this.principal = opts.principal;
    this.audit = opts.audit;
    this.clock = opts.clock ?? systemClock;
  }

  /**
   * Compute and store the owner's opaque score.
   *
   * @throws ProfileNotFoundError if the owner never submitted data
   */
  computeScore(owner: Identity): OpaqueValue {
    const profile = this.profiles.get(owner);
    const score = combineScore(this.ops, profile.attributes);
    this.profiles.storeScore(owner, score, profile.revision);
    emitAudit(this.audit, {
      operation: "score_computed",
      caller: this.principal,
      ts: this.clock(),
      result: score.toString(),
      details: { owner, revision: profile.revision },
    });
    return score;
  }
}
