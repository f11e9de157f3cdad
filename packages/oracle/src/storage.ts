/**
 * Oracle Storage
 *
 * SQLite-based persistent storage for credit profiles, lending pools and
 * authorization grants. Ciphertexts are stored as BLOBs; nothing here ever
 * sees a plaintext.
 */

import Database from "better-sqlite3";
import type { Capability, GrantRecord, GrantStore, Identity } from "@cipherscore/engine";

export interface ProfileRow {
  owner: string;
  income: Buffer;
  assets: Buffer;
  debts: Buffer;
  payment_history: Buffer;
  credit_utilization: Buffer;
  score: Buffer | null;
  revision: number;
  score_revision: number | null;
  updated_at: number;
  score_computed_at: number | null;
}

export interface PoolRow {
  pool_id: number;
  operator: string;
  min_score: Buffer;
  max_loan: Buffer;
  interest_rate_bps: number;
  active: number;
  name: string;
  created_at: number;
}

export interface ProfileBlobs {
  income: Uint8Array;
  assets: Uint8Array;
  debts: Uint8Array;
  payment_history: Uint8Array;
  credit_utilization: Uint8Array;
}

export interface NewPoolRow {
  operator: string;
  min_score: Uint8Array;
  max_loan: Uint8Array;
  interest_rate_bps: number;
  name: string;
  created_at: number;
}

interface GrantRow {
  identity: string;
  capability: Capability;
  granted_by: string;
  granted_at: number;
}

export class OracleStorage implements GrantStore {
  private db: Database.Database;

  constructor(dbPath: string = ":memory:") {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.initSchema();
  }

  /**
   * Initialize database schema.
   */
  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS credit_profiles (
        owner TEXT PRIMARY KEY,
        income BLOB NOT NULL,
        assets BLOB NOT NULL,
        debts BLOB NOT NULL,
        payment_history BLOB NOT NULL,
        credit_utilization BLOB NOT NULL,
        score BLOB,
        revision INTEGER NOT NULL,
        score_revision INTEGER,
        updated_at INTEGER NOT NULL,
        score_computed_at INTEGER
      )
    `);

    // pool_id is assigned explicitly inside appendPool's transaction
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS lending_pools (
        pool_id INTEGER PRIMARY KEY,
        operator TEXT NOT NULL,
        min_score BLOB NOT NULL,
        max_loan BLOB NOT NULL,
        interest_rate_bps INTEGER NOT NULL CHECK(interest_rate_bps >= 0 AND interest_rate_bps <= 10000),
        active INTEGER NOT NULL CHECK(active IN (0, 1)),
        name TEXT NOT NULL,
        created_at INTEGER NOT NULL
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS grants (
        identity TEXT NOT NULL,
        capability TEXT NOT NULL CHECK(capability IN ('engine', 'registry', 'decrypt')),
        granted_by TEXT NOT NULL,
        granted_at INTEGER NOT NULL,
        PRIMARY KEY (identity, capability)
      )
    `);
  }

  // ==========================================================================
  // Credit profiles
  // ==========================================================================

  /**
   * Overwrite the owner's attributes wholesale and bump the revision.
   * A previously computed score is kept (and becomes stale).
   *
   * @returns the new revision
   */
  writeProfile(owner: Identity, blobs: ProfileBlobs, updatedAt: number): number {
    const upsert = this.db.prepare(`
      INSERT INTO credit_profiles (
        owner, income, assets, debts, payment_history, credit_utilization,
        score, revision, score_revision, updated_at, score_computed_at
      )
      VALUES (?, ?, ?, ?, ?, ?, NULL, 1, NULL, ?, NULL)
      ON CONFLICT(owner) DO UPDATE SET
        income = excluded.income,
        assets = excluded.assets,
        debts = excluded.debts,
        payment_history = excluded.payment_history,
        credit_utilization = excluded.credit_utilization,
        revision = credit_profiles.revision + 1,
        updated_at = excluded.updated_at
    `);
    const readRevision = this.db.prepare<[string], { revision: number }>(
      `SELECT revision FROM credit_profiles WHERE owner = ?`
    );

    const write = this.db.transaction((): number => {
      upsert.run(
        owner,
        Buffer.from(blobs.income),
        Buffer.from(blobs.assets),
        Buffer.from(blobs.debts),
        Buffer.from(blobs.payment_history),
        Buffer.from(blobs.credit_utilization),
        updatedAt
      );
      const row = readRevision.get(owner);
      if (!row) {
        throw new Error(`writeProfile: row for ${owner} vanished inside its transaction`);
      }
      return row.revision;
    });
    return write();
  }

  getProfile(owner: Identity): ProfileRow | null {
    const stmt = this.db.prepare<[string], ProfileRow>(
      `SELECT * FROM credit_profiles WHERE owner = ?`
    );
    return stmt.get(owner) ?? null;
  }

  /**
   * Store a computed score, only if the profile is still at `revision`.
   *
   * @returns true if the score was written
   */
  writeScore(owner: Identity, score: Uint8Array, revision: number, computedAt: number): boolean {
    const stmt = this.db.prepare(`
      UPDATE credit_profiles
      SET score = ?, score_revision = ?, score_computed_at = ?
      WHERE owner = ? AND revision = ?
    `);
    const result = stmt.run(Buffer.from(score), revision, computedAt, owner, revision);
    return result.changes > 0;
  }

  // ==========================================================================
  // Lending pools
  // ==========================================================================

  /**
   * Append a pool. Ids are gap-free and start at 0.
   *
   * @returns the new pool_id
   */
  appendPool(pool: NewPoolRow): number {
    const nextId = this.db.prepare<[], { next_id: number }>(
      `SELECT COALESCE(MAX(pool_id) + 1, 0) AS next_id FROM lending_pools`
    );
    const insert = this.db.prepare(`
      INSERT INTO lending_pools (
        pool_id, operator, min_score, max_loan, interest_rate_bps, active, name, created_at
      )
      VALUES (?, ?, ?, ?, ?, 1, ?, ?)
    `);

    const append = this.db.transaction((): number => {
      const poolId = nextId.get()?.next_id ?? 0;
      insert.run(
        poolId,
        pool.operator,
        Buffer.from(pool.min_score),
        Buffer.from(pool.max_loan),
        pool.interest_rate_bps,
        pool.name,
        pool.created_at
      );
      return poolId;
    });
    return append.immediate();
  }

  getPool(poolId: number): PoolRow | null {
    const stmt = this.db.prepare<[number], PoolRow>(
      `SELECT * FROM lending_pools WHERE pool_id = ?`
    );
    return stmt.get(poolId) ?? null;
  }

  /**
   * All pools in registration order.
   */
  listPools(): PoolRow[] {
    const stmt = this.db.prepare<[], PoolRow>(`SELECT * FROM lending_pools ORDER BY pool_id ASC`);
    return stmt.all();
  }

  /**
   * Clear the active flag. One-way.
   *
   * @returns true if the pool was active before
   */
  deactivatePool(poolId: number): boolean {
    const stmt = this.db.prepare(
      `UPDATE lending_pools SET active = 0 WHERE pool_id = ? AND active = 1`
    );
    return stmt.run(poolId).changes > 0;
  }

  // ==========================================================================
  // Grants (GrantStore)
  // ==========================================================================

  hasGrant(identity: Identity, capability: Capability): boolean {
    const stmt = this.db.prepare<[string, string], { found: number }>(
      `SELECT 1 AS found FROM grants WHERE identity = ? AND capability = ? LIMIT 1`
    );
    return stmt.get(identity, capability) !== undefined;
  }

  insertGrant(record: GrantRecord): boolean {
    const stmt = this.db.prepare(`
      INSERT INTO grants (identity, capability, granted_by, granted_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(identity, capability) DO NOTHING
    `);
    const result = stmt.run(record.identity, record.capability, record.granted_by, record.granted_at);
    return result.changes > 0;
  }

  listGrants(): GrantRecord[] {
    const stmt = this.db.prepare<[], GrantRow>(
      `SELECT identity, capability, granted_by, granted_at FROM grants ORDER BY granted_at ASC, rowid ASC`
    );
    return stmt.all();
  }

  close(): void {
    this.db.close();
  }
}
