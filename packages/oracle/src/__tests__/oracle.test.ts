/**
 * Credit Oracle Tests
 *
 * End-to-end deployment flow through the facade, on both backends.
 */

import { describe, it, expect, beforeEach, afterEach, beforeAll } from "vitest";
import {
  MemoryAuditSink,
  PaillierBackend,
  PlaintextOutOfRangeError,
  ScoreUnavailableError,
  SimulatedBackend,
  UnauthorizedCallerError,
} from "@cipherscore/engine";
import { CreditOracle, DEFAULT_SERVICE_IDENTITY } from "../oracle";
import { ALICE, BOB, OWNER, SCENARIO_ATTRIBUTES, SCENARIO_SCORE } from "./fixtures";

const PRIME_POOL = {
  min_score: 700n,
  max_loan: 10_000n,
  interest_rate_bps: 500,
  name: "Prime Lending Pool",
};

describe("CreditOracle", () => {
  let oracle: CreditOracle;
  let audit: MemoryAuditSink;

  beforeEach(() => {
    audit = new MemoryAuditSink();
    oracle = new CreditOracle({
      backend: new SimulatedBackend("test-seed"),
      owner: OWNER,
      audit,
      clock: () => 1_000,
    });
  });

  afterEach(() => {
    oracle.close();
  });

  it("should grant its service identity engine use at construction", () => {
    expect(oracle.serviceIdentity).toBe(DEFAULT_SERVICE_IDENTITY);
    expect(oracle.gate.isAuthorized(DEFAULT_SERVICE_IDENTITY, "engine")).toBe(true);
    expect(oracle.gate.isAuthorized(DEFAULT_SERVICE_IDENTITY, "decrypt")).toBe(false);
    expect(oracle.gate.listGrants()).toEqual([
      { identity: DEFAULT_SERVICE_IDENTITY, capability: "engine", granted_by: OWNER, granted_at: 1_000 },
    ]);
  });

  it("should run the full deployment flow", () => {
    expect(oracle.addLendingPool(OWNER, PRIME_POOL)).toBe(0);
    expect(oracle.submitFinancialData(ALICE, SCENARIO_ATTRIBUTES)).toBe(1);

    const score = oracle.computeCreditScore(ALICE);
    expect(oracle.decrypt(OWNER, score)).toBe(SCENARIO_SCORE);

    expect(oracle.findLoanMatches(score)).toEqual([0]);
    expect(oracle.findLoanMatchesForOwner(ALICE)).toEqual([0]);

    const amount = oracle.getOptimalLoanAmount(score, 0);
    expect(oracle.decrypt(OWNER, amount)).toBe(10_000n);
    expect(oracle.decrypt(OWNER, oracle.getOptimalLoanAmountForOwner(ALICE, 0))).toBe(10_000n);
  });

  it("should accept pre-encrypted submissions", () => {
    const e = oracle.engine;
    const revision = oracle.submitEncryptedData(BOB, {
      income: e.encrypt(SCENARIO_ATTRIBUTES.income),
      assets: e.encrypt(SCENARIO_ATTRIBUTES.assets),
      debts: e.encrypt(SCENARIO_ATTRIBUTES.debts),
      payment_history: e.encrypt(SCENARIO_ATTRIBUTES.payment_history),
      credit_utilization: e.encrypt(SCENARIO_ATTRIBUTES.credit_utilization),
    });
    expect(revision).toBe(1);
    expect(oracle.decrypt(OWNER, oracle.computeCreditScore(BOB))).toBe(SCENARIO_SCORE);
  });

  it("should refuse owner matching before a score exists", () => {
    oracle.submitFinancialData(ALICE, SCENARIO_ATTRIBUTES);
    expect(() => oracle.findLoanMatchesForOwner(ALICE)).toThrow(ScoreUnavailableError);
    expect(() => oracle.findLoanMatchesForOwner(ALICE)).toThrow("never_computed");
  });

  it("should refuse owner matching on a stale score", () => {
    oracle.submitFinancialData(ALICE, SCENARIO_ATTRIBUTES);
    oracle.computeCreditScore(ALICE);
    oracle.submitFinancialData(ALICE, { ...SCENARIO_ATTRIBUTES, income: 1n });

    expect(oracle.getProfile(ALICE).score_stale).toBe(true);
    expect(() => oracle.findLoanMatchesForOwner(ALICE)).toThrow("stale");

    oracle.computeCreditScore(ALICE);
    expect(oracle.getProfile(ALICE).score_stale).toBe(false);
  });

  it("should list pool summaries without thresholds", () => {
    oracle.addLendingPool(OWNER, PRIME_POOL);
    oracle.deactivateLendingPool(OWNER, 0);
    expect(oracle.listLendingPools()).toEqual([
      {
        pool_id: 0,
        operator: OWNER,
        interest_rate_bps: 500,
        active: false,
        name: "Prime Lending Pool",
        created_at: 1_000,
      },
    ]);
  });

  it("should gate decrypt and registry behind grants", () => {
    const value = oracle.engine.encrypt(42n);
    expect(() => oracle.decrypt(ALICE, value)).toThrow(UnauthorizedCallerError);
    expect(() => oracle.addLendingPool(ALICE, PRIME_POOL)).toThrow(UnauthorizedCallerError);

    expect(oracle.grant(OWNER, ALICE, "registry")).toBe(true);
    expect(oracle.grant(OWNER, ALICE, "registry")).toBe(false);
    expect(oracle.addLendingPool(ALICE, PRIME_POOL)).toBe(0);
  });

  it("should keep plaintext out of the audit trail", () => {
    oracle.addLendingPool(OWNER, PRIME_POOL);
    oracle.submitFinancialData(ALICE, SCENARIO_ATTRIBUTES);
    oracle.computeCreditScore(ALICE);
    oracle.findLoanMatchesForOwner(ALICE);

    const serialized = JSON.stringify(audit.list());
    expect(serialized).not.toContain(SCENARIO_SCORE.toString());
    expect(audit.list("compare_at_least").every((e) => e.result === undefined)).toBe(true);
  });
});

describe("CreditOracle on Paillier", () => {
  let backend: PaillierBackend;

  beforeAll(() => {
    backend = PaillierBackend.generate(512);
  });

  it("should produce the same results as the plaintext formulas", () => {
    const oracle = new CreditOracle({ backend, owner: OWNER });
    try {
      oracle.addLendingPool(OWNER, PRIME_POOL);
      oracle.addLendingPool(OWNER, { ...PRIME_POOL, min_score: 200_000_000n, name: "Platinum" });
      oracle.submitFinancialData(ALICE, SCENARIO_ATTRIBUTES);

      const score = oracle.computeCreditScore(ALICE);
      expect(oracle.decrypt(OWNER, score)).toBe(SCENARIO_SCORE);
      expect(oracle.findLoanMatchesForOwner(ALICE)).toEqual([0]);
      expect(oracle.decrypt(OWNER, oracle.getOptimalLoanAmount(score, 0))).toBe(10_000n);
    } finally {
      oracle.close();
    }
  });

  it("should refuse a score whose weighted total would wrap past the modulus", () => {
    const oracle = new CreditOracle({ backend, owner: OWNER });
    try {
      oracle.submitFinancialData(ALICE, { ...SCENARIO_ATTRIBUTES, income: backend.maxPlaintext });
      expect(() => oracle.computeCreditScore(ALICE)).toThrow(PlaintextOutOfRangeError);
      expect(oracle.getProfile(ALICE).score).toBeNull();
    } finally {
      oracle.close();
    }
  });
});
