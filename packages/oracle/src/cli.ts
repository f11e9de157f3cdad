#!/usr/bin/env node
/**
 * cipherscore CLI
 *
 *   cipherscore serve                      start the HTTP oracle from CIPHERSCORE_* env
 *   cipherscore keygen [--out file] [--seed s]
 *   cipherscore demo [--backend simulated|paillier] [--bits n] [--reveal]
 */

import minimist from "minimist";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { PaillierBackend, SimulatedBackend, type EncryptionBackend } from "@cipherscore/engine";
import { loadConfig } from "./config";
import { createOracle } from "./backend";
import { CreditOracle } from "./oracle";
import { startOracleServer } from "./server";
import { generateKeypair, identityOf, keypairFromSeed, writeKeypairFile } from "./identity";

export type Output = (line: string) => void;

const USAGE = [
  "Usage: cipherscore <command> [options]",
  "",
  "Commands:",
  "  serve                  Start the HTTP oracle (configured by CIPHERSCORE_* env vars)",
  "  keygen                 Generate an Ed25519 identity (--out <file>, --seed <dev seed>)",
  "  demo                   Run the deployment flow in-process",
  "                         (--backend simulated|paillier, --bits <n>, --reveal)",
];

/** Pool registered by the demo deployment. */
export const DEMO_POOL = {
  name: "Prime Lending Pool",
  min_score: 700n,
  max_loan: 10_000n,
  interest_rate_bps: 500,
} as const;

/** Borrower attributes used by the demo. */
export const DEMO_BORROWER = {
  income: 50_000n,
  assets: 100_000n,
  debts: 20_000n,
  payment_history: 85n,
  credit_utilization: 30n,
} as const;

function short(encoded: string): string {
  return encoded.length > 24 ? `${encoded.slice(0, 24)}...` : encoded;
}

function demoBackend(kind: string, bits: number): EncryptionBackend {
  if (kind === "paillier") {
    return PaillierBackend.generate(bits);
  }
  if (kind === "simulated") {
    return new SimulatedBackend("cipherscore-demo");
  }
  throw new Error(`Unknown backend: ${kind}`);
}

/**
 * Deploy an oracle, register a pool, submit and score one borrower, then
 * match. Mirrors a production deployment end to end, in one process.
 */
export function runDemo(opts: { backend: string; bits: number; reveal: boolean }, out: Output): void {
  const owner = identityOf(keypairFromSeed("cipherscore-demo-owner"));
  const borrower = identityOf(keypairFromSeed("cipherscore-demo-borrower"));
  const oracle = new CreditOracle({ backend: demoBackend(opts.backend, opts.bits), owner });

  try {
    out(`Backend: ${oracle.engine.backendName}`);
    out(`Owner: ${owner}`);
    out(`Oracle service identity ${oracle.serviceIdentity} authorized on engine`);

    const poolId = oracle.addLendingPool(owner, DEMO_POOL);
    out(`Registered pool ${poolId}: ${DEMO_POOL.name} (${DEMO_POOL.interest_rate_bps} bps)`);

    const revision = oracle.submitFinancialData(borrower, DEMO_BORROWER);
    out(`Borrower ${borrower} submitted profile revision ${revision}`);

    const score = oracle.computeCreditScore(borrower);
    out(`Encrypted score: ${short(score.toString())}`);

    const matches = oracle.findLoanMatchesForOwner(borrower);
    out(`Matching pools: [${matches.join(", ")}]`);

    for (const id of matches) {
      const amount = oracle.getOptimalLoanAmount(score, id);
      out(`Pool ${id} encrypted loan amount: ${short(amount.toString())}`);
      if (opts.reveal) {
        out(`Pool ${id} loan amount (revealed by owner): ${oracle.decrypt(owner, amount)}`);
      }
    }
    if (opts.reveal) {
      out(`Score (revealed by owner): ${oracle.decrypt(owner, score)}`);
    }
  } finally {
    oracle.close();
  }
}

async function serve(out: Output): Promise<void> {
  const config = loadConfig();
  const oracle = createOracle(config);
  const server = await startOracleServer({ oracle, port: config.port });
  out(`cipherscore oracle listening on ${server.url}`);

  const shutdown = () => {
    server
      .close()
      .then(() => oracle.close())
      .catch((error: unknown) => {
        console.error("Shutdown failed:", error);
        process.exitCode = 1;
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

function stringArg(args: minimist.ParsedArgs, name: string): string | undefined {
  const value: unknown = args[name];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * @returns process exit code
 */
export async function runCli(argv: string[], out: Output = console.log): Promise<number> {
  const args = minimist(argv.filter((x) => x !== "--"), {
    string: ["out", "seed", "backend", "bits"],
    boolean: ["reveal", "help"],
  });
  const command = args._[0];

  const help = args.help === true;
  if (help || command === undefined) {
    USAGE.forEach((line) => out(line));
    return help ? 0 : 1;
  }

  switch (command) {
    case "serve":
      await serve(out);
      return 0;

    case "keygen": {
      const seed = stringArg(args, "seed");
      const outFile = stringArg(args, "out");
      const keypair = seed ? keypairFromSeed(seed) : generateKeypair();
      out(`Identity: ${identityOf(keypair)}`);
      if (outFile) {
        writeKeypairFile(outFile, keypair);
        out(`Keypair written to ${outFile}`);
      }
      return 0;
    }

    case "demo": {
      const rawBits = stringArg(args, "bits");
      const bits = rawBits ? Number(rawBits) : 1024;
      if (!Number.isInteger(bits)) {
        out(`Invalid --bits: ${rawBits}`);
        return 1;
      }
      const backend = stringArg(args, "backend") ?? "simulated";
      runDemo({ backend, bits, reveal: args.reveal === true }, out);
      return 0;
    }

    default:
      out(`Unknown command: ${command}`);
      USAGE.forEach((line) => out(line));
      return 1;
  }
}

const invokedDirectly =
  process.argv[1] !== undefined && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (invokedDirectly) {
  runCli(process.argv.slice(2))
    .then((code) => {
      if (code !== 0) process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error("Error:", err instanceof Error ? err.message : err);
      process.exit(1);
    });
}
