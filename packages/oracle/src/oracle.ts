/**
 * Credit Oracle
 *
 * Wires one deployment together: backend → codec → engine, the authorization
 * gate, storage, profile store, scoring pipeline, pool registry and matcher.
 * The oracle's own service identity is granted engine use at construction,
 * which is the only principal the pipeline and matcher act as.
 */

import {
  AuthorizationGate,
  HomomorphicEngine,
  OpaqueCodec,
  ScoreUnavailableError,
  systemClock,
  type AuditSink,
  type Capability,
  type Clock,
  type EncryptionBackend,
  type Identity,
  type OpaqueValue,
} from "@cipherscore/engine";
import { OracleStorage } from "./storage";
import { CreditProfileStore } from "./profiles";
import { ScoringPipeline } from "./scoring";
import { LendingPoolRegistry } from "./pools";
import { LoanMatcher } from "./matcher";
import type {
  CreditProfile,
  FinancialAttributes,
  LendingPoolSummary,
  NewPoolParams,
} from "./types";

export const DEFAULT_SERVICE_IDENTITY = "cipherscore:oracle";

export interface CreditOracleOptions {
  backend: EncryptionBackend;
  /** Deploying owner; implicitly holds every capability. */
  owner: Identity;
  storage?: OracleStorage;
  audit?: AuditSink;
  clock?: Clock;
  serviceIdentity?: Identity;
}

export class CreditOracle {
  readonly owner: Identity;
  readonly serviceIdentity: Identity;
  readonly storage: OracleStorage;
  readonly gate: AuthorizationGate;
  readonly engine: HomomorphicEngine;
  readonly profiles: CreditProfileStore;
  readonly pipeline: ScoringPipeline;
  readonly registry: LendingPoolRegistry;
  readonly matcher: LoanMatcher;

  constructor(opts: CreditOracleOptions) {
    const clock = opts.clock ?? systemClock;
    const audit = opts.audit;
    this.owner = opts.owner;
    this.serviceIdentity = opts.serviceIdentity ?? DEFAULT_SERVICE_IDENTITY;
    this.storage = opts.storage ?? new OracleStorage(":memory:");

    this.gate = new AuthorizationGate({ owner: opts.owner, store: this.storage, audit, clock });
    this.engine = new HomomorphicEngine({
      codec: new OpaqueCodec(opts.backend),
      gate: this.gate,
      audit,
      clock,
    });
    this.gate.grant(opts.owner, this.serviceIdentity, "engine");

    this.profiles = new CreditProfileStore({ storage: this.storage, engine: this.engine, audit, clock });
    this.pipeline = new ScoringPipeline({
      engine: this.engine,
      profiles: this.profiles,
      principal: this.serviceIdentity,
      audit,
      clock,
    });
    this.registry = new LendingPoolRegistry({
      storage: this.storage,
      engine: this.engine,
      gate: this.gate,
      audit,
      clock,
    });
    this.matcher = new LoanMatcher({
      engine: this.engine,
      registry: this.registry,
      principal: this.serviceIdentity,
    });
  }

  /**
   * Encrypt plaintext attributes at the edge and store them for the caller.
   *
   * @returns the profile's new revision
   */
  submitFinancialData(caller: Identity, attributes: FinancialAttributes<bigint>): number {
    return this.submitEncryptedData(caller, {
      income: this.engine.encrypt(attributes.income),
      assets: this.engine.encrypt(attributes.assets),
      debts: this.engine.encrypt(attributes.debts),
      payment_history: this.engine.encrypt(attributes.payment_history),
      credit_utilization: this.engine.encrypt(attributes.credit_utilization),
    });
  }

  submitEncryptedData(caller: Identity, attributes: FinancialAttributes<OpaqueValue>): number {
    return this.profiles.submit(caller, caller, attributes);
  }

  computeCreditScore(caller: Identity): OpaqueValue {
    return this.pipeline.computeScore(caller);
  }

  getProfile(owner: Identity): CreditProfile {
    return this.profiles.get(owner);
  }

  findLoanMatches(score: OpaqueValue): number[] {
    return this.matcher.findMatches(score);
  }

  /**
   * Match using the owner's stored score.
   *
   * @throws ScoreUnavailableError when no score was computed or it is stale
   */
  findLoanMatchesForOwner(owner: Identity): number[] {
    return this.matcher.findMatches(this.currentScore(owner));
  }

  getOptimalLoanAmountForOwner(owner: Identity, poolId: number): OpaqueValue {
    return this.matcher.optimalLoanAmount(this.currentScore(owner), poolId);
  }

  getOptimalLoanAmount(score: OpaqueValue, poolId: number): OpaqueValue {
    return this.matcher.optimalLoanAmount(score, poolId);
  }

  /**
   * Encrypt pool thresholds at the edge and register the pool.
   */
  addLendingPool(caller: Identity, params: NewPoolParams<bigint>): number {
    return this.registry.addPool(caller, {
      min_score: this.engine.encrypt(params.min_score),
      max_loan: this.engine.encrypt(params.max_loan),
      interest_rate_bps: params.interest_rate_bps,
      name: params.name,
    });
  }

  deactivateLendingPool(caller: Identity, poolId: number): void {
    this.registry.deactivatePool(caller, poolId);
  }

  listLendingPools(): LendingPoolSummary[] {
    return this.registry.listSummaries();
  }

  grant(granter: Identity, grantee: Identity, capability: Capability): boolean {
    return this.gate.grant(granter, grantee, capability);
  }

  /** Privileged; requires the decrypt capability. */
  decrypt(caller: Identity, value: OpaqueValue): bigint {
    return this.engine.decrypt(caller, value);
  }

  close(): void {
    this.storage.close();
  }

  /**
   * The owner's stored score, if it was computed from the latest revision.
   *
   * @throws ScoreUnavailableError when no score was computed or it is stale
   */
  currentScore(owner: Identity): OpaqueValue {
    const profile = this.profiles.get(owner);
    if (profile.score === null) {
      throw new ScoreUnavailableError(owner, "never_computed");
    }
    if (profile.score_stale) {
      throw new ScoreUnavailableError(owner, "stale");
    }
    return profile.score;
  }
}
