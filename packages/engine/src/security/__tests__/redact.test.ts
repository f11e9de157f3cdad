/**
 * Redaction & Logger Tests
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { redactSecrets, REDACTED } from "../redact";
import { log } from "../../logger";

describe("redactSecrets", () => {
  it("should redact sensitive keys recursively", () => {
    expect(
      redactSecrets({
        caller: "alice",
        seed: "test-seed",
        nested: { secretKeyB58: "abc", plaintext: 5n, pool_id: 2 },
        list: [{ private_key: "x" }],
      })
    ).toEqual({
      caller: "alice",
      seed: REDACTED,
      nested: { secretKeyB58: REDACTED, plaintext: REDACTED, pool_id: 2 },
      list: [{ private_key: REDACTED }],
    });
  });

  it("should render bigints and byte arrays safely", () => {
    expect(redactSecrets({ scalar: 35n, blob: new Uint8Array(48) })).toEqual({
      scalar: "35",
      blob: "<48 bytes>",
    });
  });
});

describe("log", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    delete process.env.CIPHERSCORE_LOG_JSON;
    delete process.env.CIPHERSCORE_LOG_LEVEL;
  });

  it("should emit JSON lines when CIPHERSCORE_LOG_JSON=1", () => {
    process.env.CIPHERSCORE_LOG_JSON = "1";
    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    log("info", "Pool added", { pool_id: 0, passphrase: "hunter2" });
    const line = JSON.parse(String(spy.mock.calls[0]?.[0]));
    expect(line.level).toBe("info");
    expect(line.message).toBe("Pool added");
    expect(line.data).toEqual({ pool_id: 0, passphrase: REDACTED });
  });

  it("should use a level prefix in console mode", () => {
    const spy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    log("warn", "Privileged decrypt");
    expect(spy).toHaveBeenCalledWith("[WARN]", "Privileged decrypt");
  });

  it("should drop lines below CIPHERSCORE_LOG_LEVEL", () => {
    process.env.CIPHERSCORE_LOG_LEVEL = "warn";
    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    log("info", "hidden");
    expect(spy).not.toHaveBeenCalled();
  });
});
