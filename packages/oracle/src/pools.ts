/**
 * Lending Pool Registry
 *
 * Append-only arena of pools addressed by insertion index. Pools are never
 * removed or compacted; deactivation only clears the active flag.
 */

import {
  createLogger,
  emitAudit,
  InvalidPoolError,
  InvalidRequestError,
  systemClock,
  UnauthorizedCallerError,
  type AuditSink,
  type AuthorizationGate,
  type Clock,
  type HomomorphicEngine,
  type Identity,
  type OpaqueValue,
} from "@cipherscore/engine";
import type { OracleStorage, PoolRow } from "./storage";
import type { LendingPool, LendingPoolSummary, NewPoolParams } from "./types";

const logger = createLogger("registry");

export const MAX_INTEREST_RATE_BPS = 10_000;
const MAX_POOL_NAME_LENGTH = 120;

export interface LendingPoolRegistryOptions {
  storage: OracleStorage;
  engine: HomomorphicEngine;
  gate: AuthorizationGate;
  audit?: AuditSink;
  clock?: Clock;
}

export class LendingPoolRegistry {
  private readonly storage: OracleStorage;
  private readonly engine: HomomorphicEngine;
  private readonly gate: AuthorizationGate;
  private readonly audit?: AuditSink;
  private readonly clock: Clock;

  constructor(opts: LendingPoolRegistryOptions) {
    this.storage = opts.storage;
    this.engine = opts.engine;
    this.gate = opts.gate;
    this.audit = opts.audit;
    this.clock = opts.clock ?? systemClock;
  }

  /**
   * Register a pool operated by `caller`.
   *
   * @returns the new pool_id (its append index)
   * @throws UnauthorizedCallerError without the registry capability
   * @throws InvalidRequestError for a bad rate or name
   */
  addPool(caller: Identity, params: NewPoolParams<OpaqueValue>): number {
    this.gate.require(caller, "registry");

    const rate = params.interest_rate_bps;
    if (!Number.isInteger(rate) || rate < 0 || rate > MAX_INTEREST_RATE_BPS) {
      throw new InvalidRequestError(`interest_rate_bps must be an integer in [0, ${MAX_INTEREST_RATE_BPS}]`, {
        interest_rate_bps: rate,
      });
    }
    const name = params.name.trim();
    if (name.length === 0 || name.length > MAX_POOL_NAME_LENGTH) {
      throw new InvalidRequestError(`name must be 1-${MAX_POOL_NAME_LENGTH} characters`);
    }

    const minScore = this.engine.restore(params.min_score.toBytes());
    const maxLoan = this.engine.restore(params.max_loan.toBytes());
    const ts = this.clock();

    const poolId = this.storage.appendPool({
      operator: caller,
      min_score: minScore.toBytes(),
      max_loan: maxLoan.toBytes(),
      interest_rate_bps: rate,
      name,
      created_at: ts,
    });

    logger.info("Lending pool added", { pool_id: poolId, operator: caller, interest_rate_bps: rate });
    emitAudit(this.audit, {
      operation: "pool_added",
      caller,
      ts,
      details: { pool_id: poolId, name, interest_rate_bps: rate },
    });
    return poolId;
  }

  /**
   * Clear a pool's active flag. Allowed for the pool's operator and the
   * deploying owner; deactivating an inactive pool is a no-op.
   */
  deactivatePool(caller: Identity, poolId: number): void {
    const pool = this.getPool(poolId);
    if (caller !== pool.operator && caller !== this.gate.owner) {
      throw new UnauthorizedCallerError(caller, "pool_operator");
    }
    if (!this.storage.deactivatePool(poolId)) {
      return;
    }
    const ts = this.clock();
    logger.info("Lending pool deactivated", { pool_id: poolId, caller });
    emitAudit(this.audit, {
      operation: "pool_deactivated",
      caller,
      ts,
      details: { pool_id: poolId },
    });
  }

  /**
   * @throws InvalidPoolError if no pool has this id
   */
  getPool(poolId: number): LendingPool {
    const row = Number.isInteger(poolId) && poolId >= 0 ? this.storage.getPool(poolId) : null;
    if (!row) {
      throw new InvalidPoolError(poolId);
    }
    return this.toPool(row);
  }

  /**
   * Snapshot of every pool, active or not, in registration order.
   */
  listPools(): LendingPool[] {
    return this.storage.listPools().map((row) => this.toPool(row));
  }

  listSummaries(): LendingPoolSummary[] {
    return this.listPools().map(({ min_score: _min, max_loan: _max, ...summary }) => summary);
  }

  private toPool(row: PoolRow): LendingPool {
    return {
      pool_id: row.pool_id,
      operator: row.operator,
      min_score: this.engine.restore(row.min_score),
      max_loan: this.engine.restore(row.max_loan),
      interest_rate_bps: row.interest_rate_bps,
      active: row.active === 1,
      name: row.name,
      created_at: row.created_at,
    };
  }
}
