/**
 * Configuration and Backend Selection Tests
 */

import { describe, it, expect, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { PaillierBackend } from "@cipherscore/engine";
import { DEFAULT_PORT, loadConfig } from "../config";
import { createBackend, createOracle, loadOrCreatePaillierKey } from "../backend";
import { DEFAULT_SERVICE_IDENTITY } from "../oracle";

describe("loadConfig", () => {
  it("should apply defaults for a simulated deployment", () => {
    const config = loadConfig({
      CIPHERSCORE_BACKEND: "simulated",
      CIPHERSCORE_SIM_SEED: "test-seed",
      CIPHERSCORE_OWNER: "owner",
    });
    expect(config).toEqual({
      backend: { kind: "simulated", seed: "test-seed" },
      dbPath: ":memory:",
      owner: "owner",
      port: DEFAULT_PORT,
    });
  });

  it("should parse Paillier settings and numeric strings", () => {
    const config = loadConfig({
      CIPHERSCORE_BACKEND: "paillier",
      CIPHERSCORE_PAILLIER_KEY_FILE: "/tmp/key.json",
      CIPHERSCORE_PAILLIER_BITS: "1024",
      CIPHERSCORE_DB_PATH: "/tmp/oracle.db",
      CIPHERSCORE_OWNER: "owner",
      CIPHERSCORE_PORT: "9000",
    });
    expect(config).toEqual({
      backend: { kind: "paillier", keyFile: "/tmp/key.json", bits: 1024 },
      dbPath: "/tmp/oracle.db",
      owner: "owner",
      port: 9000,
    });
  });

  it("should read an optional audit file path", () => {
    const config = loadConfig({
      CIPHERSCORE_BACKEND: "simulated",
      CIPHERSCORE_SIM_SEED: "test-seed",
      CIPHERSCORE_OWNER: "owner",
      CIPHERSCORE_AUDIT_FILE: "/tmp/audit.jsonl",
    });
    expect(config.auditFile).toBe("/tmp/audit.jsonl");
    expect(() =>
      loadConfig({ CIPHERSCORE_BACKEND: "paillier", CIPHERSCORE_OWNER: "owner", CIPHERSCORE_AUDIT_FILE: "" })
    ).toThrow(/CIPHERSCORE_AUDIT_FILE/);
  });

  it("should require a seed for the simulated backend", () => {
    expect(() =>
      loadConfig({ CIPHERSCORE_BACKEND: "simulated", CIPHERSCORE_OWNER: "owner" })
    ).toThrow("CIPHERSCORE_SIM_SEED: required when CIPHERSCORE_BACKEND=simulated");
  });

  it("should reject an unknown backend, a missing owner and a bad port", () => {
    expect(() => loadConfig({ CIPHERSCORE_BACKEND: "rot13", CIPHERSCORE_OWNER: "owner" })).toThrow(
      /CIPHERSCORE_BACKEND/
    );
    expect(() => loadConfig({ CIPHERSCORE_BACKEND: "paillier" })).toThrow(/CIPHERSCORE_OWNER/);
    expect(() =>
      loadConfig({ CIPHERSCORE_BACKEND: "paillier", CIPHERSCORE_OWNER: "owner", CIPHERSCORE_PORT: "http" })
    ).toThrow(/CIPHERSCORE_PORT/);
  });
});

describe("createBackend", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("should build a simulated backend from its seed", () => {
    const backend = createBackend({ kind: "simulated", seed: "test-seed" });
    expect(backend.name).toBe("simulated");
    expect(backend.decrypt(backend.encrypt(12n))).toBe(12n);
  });

  it("should generate a Paillier key file once and reload it", () => {
    dir = mkdtempSync(path.join(tmpdir(), "cipherscore-key-"));
    const file = path.join(dir, "paillier.json");

    const created = loadOrCreatePaillierKey(file, 512);
    expect(existsSync(file)).toBe(true);
    expect(statSync(file).mode & 0o777).toBe(0o600);

    const reloaded = createBackend({ kind: "paillier", keyFile: file, bits: 512 });
    expect(reloaded).toBeInstanceOf(PaillierBackend);
    expect(reloaded.decrypt(created.encrypt(77n))).toBe(77n);
  });

  it("should reject a corrupt key file", () => {
    dir = mkdtempSync(path.join(tmpdir(), "cipherscore-key-"));
    const file = path.join(dir, "paillier.json");
    writeFileSync(file, JSON.stringify({ scheme: "rsa", p: "11", q: "13" }));
    expect(() => loadOrCreatePaillierKey(file, 512)).toThrow(/Invalid Paillier key file/);
  });
});

describe("createOracle", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("should append audit records to the configured file", () => {
    dir = mkdtempSync(path.join(tmpdir(), "cipherscore-audit-"));
    const auditFile = path.join(dir, "audit.jsonl");
    const oracle = createOracle({
      backend: { kind: "simulated", seed: "test-seed" },
      dbPath: ":memory:",
      owner: "owner",
      port: 0,
      auditFile,
    });
    try {
      oracle.grant("owner", "auditor", "decrypt");
    } finally {
      oracle.close();
    }

    const events = readFileSync(auditFile, "utf8")
      .trim()
      .split("\n")
      .map((line): unknown => JSON.parse(line));
    expect(events).toEqual([
      {
        operation: "grant",
        caller: "owner",
        ts: expect.any(Number),
        details: { grantee: DEFAULT_SERVICE_IDENTITY, capability: "engine" },
      },
      {
        operation: "grant",
        caller: "owner",
        ts: expect.any(Number),
        details: { grantee: "auditor", capability: "decrypt" },
      },
    ]);
  });

  it("should run without an audit trail when none is configured", () => {
    const oracle = createOracle({
      backend: { kind: "simulated", seed: "test-seed" },
      dbPath: ":memory:",
      owner: "owner",
      port: 0,
    });
    expect(oracle.grant("owner", "auditor", "decrypt")).toBe(true);
    oracle.close();
  });
});
