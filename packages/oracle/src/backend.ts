/**
 * Backend selection and oracle wiring from configuration.
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { z } from "zod";
import {
  createLogger,
  JsonlAuditSink,
  PaillierBackend,
  SimulatedBackend,
  type EncryptionBackend,
} from "@cipherscore/engine";
import type { BackendConfig, OracleConfig } from "./config";
import { CreditOracle } from "./oracle";
import { OracleStorage } from "./storage";

const logger = createLogger("backend");

const paillierKeyFileSchema = z.object({
  scheme: z.literal("paillier"),
  p: z.string().regex(/^[0-9a-f]+$/i),
  q: z.string().regex(/^[0-9a-f]+$/i),
});

/**
 * Load a Paillier key file, or generate and write one (mode 0600) if the
 * path does not exist yet.
 */
export function loadOrCreatePaillierKey(path: string, bits: number): PaillierBackend {
  if (existsSync(path)) {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
      throw new Error(
        `Failed to read Paillier key file ${path}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    const parsed = paillierKeyFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Invalid Paillier key file ${path}: ${parsed.error.issues[0]?.message ?? "unknown"}`);
    }
    return PaillierBackend.fromKeyFile(parsed.data);
  }

  const backend = PaillierBackend.generate(bits);
  writeFileSync(path, JSON.stringify(backend.toKeyFile(), null, 2) + "\n", { mode: 0o600 });
  logger.info("Generated Paillier key", { path, bits });
  return backend;
}

export function createBackend(config: BackendConfig): EncryptionBackend {
  switch (config.kind) {
    case "simulated":
      logger.warn("Using the simulated backend: ciphertexts are NOT confidential");
      return new SimulatedBackend(config.seed);
    case "paillier":
      if (config.keyFile) {
        return loadOrCreatePaillierKey(config.keyFile, config.bits);
      }
      logger.warn("No Paillier key file configured; using an ephemeral key", { bits: config.bits });
      return PaillierBackend.generate(config.bits);
  }
}

/**
 * Build the deployed oracle: backend, SQLite storage and, when configured,
 * the JSONL audit trail.
 */
export function createOracle(config: OracleConfig): CreditOracle {
  return new CreditOracle({
    backend: createBackend(config.backend),
    owner: config.owner,
    storage: new OracleStorage(config.dbPath),
    audit: config.auditFile ? new JsonlAuditSink(config.auditFile) : undefined,
  });
}
