/**
 * Oracle Configuration
 *
 * Reads CIPHERSCORE_* environment variables. Invalid configuration is a
 * startup failure and throws a plain Error listing every issue.
 */

import { z } from "zod";
import { DEFAULT_PAILLIER_BITS } from "@cipherscore/engine";

export const DEFAULT_PORT = 7788;

const envSchema = z
  .object({
    CIPHERSCORE_BACKEND: z.enum(["simulated", "paillier"]),
    CIPHERSCORE_SIM_SEED: z.string().min(1).optional(),
    CIPHERSCORE_PAILLIER_KEY_FILE: z.string().min(1).optional(),
    CIPHERSCORE_PAILLIER_BITS: z.coerce.number().int().min(256).default(DEFAULT_PAILLIER_BITS),
    CIPHERSCORE_DB_PATH: z.string().min(1).default(":memory:"),
    CIPHERSCORE_OWNER: z.string().min(1),
    CIPHERSCORE_PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
    CIPHERSCORE_AUDIT_FILE: z.string().min(1).optional(),
  })
  .superRefine((env, ctx) => {
    if (env.CIPHERSCORE_BACKEND === "simulated" && !env.CIPHERSCORE_SIM_SEED) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CIPHERSCORE_SIM_SEED"],
        message: "required when CIPHERSCORE_BACKEND=simulated",
      });
    }
  });

export type BackendConfig =
  | { kind: "simulated"; seed: string }
  | { kind: "paillier"; keyFile?: string; bits: number };

export interface OracleConfig {
  backend: BackendConfig;
  dbPath: string;
  owner: string;
  port: number;
  /** JSONL audit trail; no audit records are kept when unset. */
  auditFile?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): OracleConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const cfg = parsed.data;
  const backend: BackendConfig =
    cfg.CIPHERSCORE_BACKEND === "simulated"
      ? { kind: "simulated", seed: cfg.CIPHERSCORE_SIM_SEED ?? "" }
      : {
          kind: "paillier",
          keyFile: cfg.CIPHERSCORE_PAILLIER_KEY_FILE,
          bits: cfg.CIPHERSCORE_PAILLIER_BITS,
        };
  return {
    backend,
    dbPath: cfg.CIPHERSCORE_DB_PATH,
    owner: cfg.CIPHERSCORE_OWNER,
    port: cfg.CIPHERSCORE_PORT,
    auditFile: cfg.CIPHERSCORE_AUDIT_FILE,
  };
}
