/**
 * Confidential Loan Matcher
 *
 * Compares an opaque score against every active pool's opaque threshold and
 * derives an opaque loan amount capped by the pool maximum. Like scoring,
 * both formulas are generic over Arithmetic<T> so they can be checked
 * against plaintext.
 */

import {
  opaqueArithmetic,
  plaintextArithmetic,
  PoolInactiveError,
  type Arithmetic,
  type HomomorphicEngine,
  type Identity,
  type OpaqueValue,
} from "@cipherscore/engine";
import type { LendingPoolRegistry } from "./pools";

/** Public multiplier from score to candidate loan amount. */
export const LOAN_SCALE = 10n;

export interface MatchCandidate<T> {
  pool_id: number;
  active: boolean;
  min_score: T;
}

/**
 * Pool ids whose threshold the score meets, in the order given. Inactive
 * pools are skipped without a comparison.
 */
export function selectMatches<T>(ops: Arithmetic<T>, score: T, pools: readonly MatchCandidate<T>[]): number[] {
  const matches: number[] = [];
  for (const pool of pools) {
    if (!pool.active) continue;
    if (ops.atLeast(score, pool.min_score)) {
      matches.push(pool.pool_id);
    }
  }
  return matches;
}

/**
 * score × LOAN_SCALE, capped at maxLoan. At the cap the pool's own
 * maxLoan value is returned, not a recomputation.
 */
export function deriveLoanAmount<T>(ops: Arithmetic<T>, score: T, maxLoan: T): T {
  const candidate = ops.scale(score, LOAN_SCALE);
  return ops.atLeast(candidate, maxLoan) ? maxLoan : candidate;
}

export function computePlaintextMatches(score: bigint, pools: readonly MatchCandidate<bigint>[]): number[] {
  return selectMatches(plaintextArithmetic, score, pools);
}

export function computePlaintextLoanAmount(score: bigint, maxLoan: bigint): bigint {
  return deriveLoanAmount(plaintextArithmetic, score, maxLoan);
}

export interface LoanMatcherOptions {
  engine: HomomorphicEngine;
  registry: LendingPoolRegistry;
  /** Service identity holding the engine grant. */
  principal: Identity;
}

export class LoanMatcher {
  private readonly ops: Arithmetic<OpaqueValue>;
  private readonly registry: LendingPoolRegistry;

  constructor(opts: LoanMatcherOptions) {
    this.ops = opaqueArithmetic(opts.engine, opts.principal);
    this.registry = opts.registry;
  }

  /**
   * Matching pool ids in registration order, against a registry snapshot
   * taken at call time.
   */
  findMatches(score: OpaqueValue): number[] {
    return selectMatches(this.ops, score, this.registry.listPools());
  }

  /**
   * @throws InvalidPoolError if poolId is out of range
   * @throws PoolInactiveError if the pool is deactivated
   */
  optimalLoanAmount(score: OpaqueValue, poolId: number): OpaqueValue {
    const pool = this.registry.getPool(poolId);
    if (!pool.active) {
      throw new PoolInactiveError(poolId);
    }
    return deriveLoanAmount(this.ops, score, pool.max_loan);
  }
}
