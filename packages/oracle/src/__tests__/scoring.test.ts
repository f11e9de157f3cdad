/**
 * Scoring Pipeline Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ProfileNotFoundError, UnauthorizedCallerError } from "@cipherscore/engine";
import { ScoringPipeline, computePlaintextScore } from "../scoring";
import type { FinancialAttributes } from "../types";
import {
  ALICE,
  OWNER,
  SCENARIO_ATTRIBUTES,
  SCENARIO_SCORE,
  SERVICE,
  createHarness,
  encryptAttributes,
  type Harness,
} from "./fixtures";

describe("computePlaintextScore", () => {
  it("should score the reference borrower at 165,357,500", () => {
    expect(computePlaintextScore(SCENARIO_ATTRIBUTES)).toBe(SCENARIO_SCORE);
  });

  it("should ignore debts", () => {
    expect(computePlaintextScore({ ...SCENARIO_ATTRIBUTES, debts: 999_999n })).toBe(SCENARIO_SCORE);
  });

  it("should score an all-zero profile at zero", () => {
    expect(
      computePlaintextScore({ income: 0n, assets: 0n, debts: 0n, payment_history: 0n, credit_utilization: 0n })
    ).toBe(0n);
  });
});

describe("ScoringPipeline", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  it("should compute an opaque score that decrypts to the plaintext formula", () => {
    h.profiles.submit(ALICE, ALICE, encryptAttributes(h.engine, SCENARIO_ATTRIBUTES));
    const score = h.pipeline.computeScore(ALICE);
    expect(h.engine.decrypt(OWNER, score)).toBe(SCENARIO_SCORE);
  });

  it("should agree with the plaintext oracle across profiles", () => {
    const profiles: FinancialAttributes<bigint>[] = [
      { income: 0n, assets: 0n, debts: 0n, payment_history: 100n, credit_utilization: 0n },
      { income: 12_345n, assets: 1n, debts: 5n, payment_history: 0n, credit_utilization: 100n },
      { income: 80_000n, assets: 250_000n, debts: 40_000n, payment_history: 60n, credit_utilization: 75n },
    ];
    for (const attributes of profiles) {
      h.profiles.submit(ALICE, ALICE, encryptAttributes(h.engine, attributes));
      const score = h.pipeline.computeScore(ALICE);
      expect(h.engine.decrypt(OWNER, score)).toBe(computePlaintextScore(attributes));
    }
  });

  it("should be deterministic for the same attributes", () => {
    h.profiles.submit(ALICE, ALICE, encryptAttributes(h.engine, SCENARIO_ATTRIBUTES));
    const first = h.pipeline.computeScore(ALICE);
    const second = h.pipeline.computeScore(ALICE);
    expect(second.equals(first)).toBe(true);
  });

  it("should store the score against the profile's revision", () => {
    h.profiles.submit(ALICE, ALICE, encryptAttributes(h.engine, SCENARIO_ATTRIBUTES));
    h.clock.now = 3_000;
    const score = h.pipeline.computeScore(ALICE);

    const profile = h.profiles.get(ALICE);
    expect(profile.score?.equals(score)).toBe(true);
    expect(profile.score_revision).toBe(1);
    expect(profile.score_computed_at).toBe(3_000);
    expect(profile.score_stale).toBe(false);
  });

  it("should throw ProfileNotFoundError for an owner without data", () => {
    expect(() => h.pipeline.computeScore(ALICE)).toThrow(ProfileNotFoundError);
  });

  it("should require the engine grant for its principal", () => {
    h.profiles.submit(ALICE, ALICE, encryptAttributes(h.engine, SCENARIO_ATTRIBUTES));
    const rogue = new ScoringPipeline({ engine: h.engine, profiles: h.profiles, principal: "rogue" });
    expect(() => rogue.computeScore(ALICE)).toThrow(UnauthorizedCallerError);
    expect(h.profiles.get(ALICE).score).toBeNull();
  });

  it("should audit the computed score under the service identity", () => {
    h.profiles.submit(ALICE, ALICE, encryptAttributes(h.engine, SCENARIO_ATTRIBUTES));
    const score = h.pipeline.computeScore(ALICE);
    const events = h.audit.list("score_computed");
    expect(events).toEqual([
      {
        operation: "score_computed",
        caller: SERVICE,
        ts: 1_000,
        result: score.toString(),
        details: { owner: ALICE, revision: 1 },
      },
    ]);
  });

  it("should run the formula as four scalings, three additions and one final scaling", () => {
    h.profiles.submit(ALICE, ALICE, encryptAttributes(h.engine, SCENARIO_ATTRIBUTES));
    h.audit.clear();
    h.pipeline.computeScore(ALICE);
    expect(h.audit.list("scalar_multiply")).toHaveLength(5);
    expect(h.audit.list("add")).toHaveLength(3);
  });
});
