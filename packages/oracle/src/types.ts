/**
 * Oracle Types
 *
 * Record shapes for credit profiles and lending pools. Persisted and wire
 * field names are snake_case; every confidential field is an OpaqueValue.
 */

import type { Identity, OpaqueValue } from "@cipherscore/engine";

/**
 * The financial attributes a data owner submits, over any value type:
 * OpaqueValue in the store, bigint for the plaintext oracle.
 */
export interface FinancialAttributes<T> {
  income: T;
  assets: T;
  debts: T;
  /** 0 – 100 */
  payment_history: T;
  /** Utilization ratio in percent, 0 – 100 */
  credit_utilization: T;
}

export const ATTRIBUTE_NAMES = [
  "income",
  "assets",
  "debts",
  "payment_history",
  "credit_utilization",
] as const satisfies readonly (keyof FinancialAttributes<unknown>)[];

export type AttributeName = (typeof ATTRIBUTE_NAMES)[number];

export interface CreditProfile {
  owner: Identity;
  attributes: FinancialAttributes<OpaqueValue>;
  /** Null until the scoring pipeline first runs. */
  score: OpaqueValue | null;
  /** Incremented on every submission. */
  revision: number;
  /** Revision the stored score was computed from. */
  score_revision: number | null;
  updated_at: number;
  score_computed_at: number | null;
  /** True when attributes were resubmitted after the score was computed. */
  score_stale: boolean;
  exists: true;
}

export interface LendingPool {
  /** Append index; permanent, never reused. */
  pool_id: number;
  operator: Identity;
  min_score: OpaqueValue;
  max_loan: OpaqueValue;
  /** Annual interest rate in basis points (1 bp = 0.01 %). Public. */
  interest_rate_bps: number;
  active: boolean;
  name: string;
  created_at: number;
}

/** Public view of a pool: no thresholds, even encrypted. */
export type LendingPoolSummary = Omit<LendingPool, "min_score" | "max_loan">;

export interface NewPoolParams<T> {
  min_score: T;
  max_loan: T;
  interest_rate_bps: number;
  name: string;
}
