/**
 * Shared wiring for oracle tests: one in-memory deployment on the
 * simulated backend with a controllable clock.
 */

import {
  AuthorizationGate,
  HomomorphicEngine,
  MemoryAuditSink,
  OpaqueCodec,
  SimulatedBackend,
  type EncryptionBackend,
  type OpaqueValue,
} from "@cipherscore/engine";
import { OracleStorage } from "../storage";
import { CreditProfileStore } from "../profiles";
import { ScoringPipeline } from "../scoring";
import { LendingPoolRegistry } from "../pools";
import { LoanMatcher } from "../matcher";
import type { FinancialAttributes } from "../types";

export const OWNER = "owner";
export const SERVICE = "oracle-service";
export const ALICE = "alice";
export const BOB = "bob";

/** Scenario borrower: scores 165,357,500. */
export const SCENARIO_ATTRIBUTES: FinancialAttributes<bigint> = {
  income: 50_000n,
  assets: 100_000n,
  debts: 20_000n,
  payment_history: 85n,
  credit_utilization: 30n,
};

export const SCENARIO_SCORE = 165_357_500n;

export interface Harness {
  clock: { now: number };
  audit: MemoryAuditSink;
  storage: OracleStorage;
  gate: AuthorizationGate;
  engine: HomomorphicEngine;
  profiles: CreditProfileStore;
  pipeline: ScoringPipeline;
  registry: LendingPoolRegistry;
  matcher: LoanMatcher;
}

export function createHarness(backend: EncryptionBackend = new SimulatedBackend("test-seed")): Harness {
  const clock = { now: 1_000 };
  const now = () => clock.now;
  const audit = new MemoryAuditSink();
  const storage = new OracleStorage(":memory:");
  const gate = new AuthorizationGate({ owner: OWNER, store: storage, audit, clock: now });
  const engine = new HomomorphicEngine({ codec: new OpaqueCodec(backend), gate, audit, clock: now });
  gate.grant(OWNER, SERVICE, "engine");

  const profiles = new CreditProfileStore({ storage, engine, audit, clock: now });
  const pipeline = new ScoringPipeline({ engine, profiles, principal: SERVICE, audit, clock: now });
  const registry = new LendingPoolRegistry({ storage, engine, gate, audit, clock: now });
  const matcher = new LoanMatcher({ engine, registry, principal: SERVICE });
  audit.clear();

  return { clock, audit, storage, gate, engine, profiles, pipeline, registry, matcher };
}

export function encryptAttributes(
  engine: HomomorphicEngine,
  attributes: FinancialAttributes<bigint>
): FinancialAttributes<OpaqueValue> {
  return {
    income: engine.encrypt(attributes.income),
    assets: engine.encrypt(attributes.assets),
    debts: engine.encrypt(attributes.debts),
    payment_history: engine.encrypt(attributes.payment_history),
    credit_utilization: engine.encrypt(attributes.credit_utilization),
  };
}
