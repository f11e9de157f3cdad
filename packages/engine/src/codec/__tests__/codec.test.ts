/**
 * Opaque Value Codec Tests
 */

import { describe, it, expect } from "vitest";
import { OpaqueCodec } from "../codec";
import { OpaqueValue } from "../opaque";
import { SimulatedBackend } from "../simulated";
import { MalformedCiphertextError } from "../../errors";
import { base64urlEncode } from "../../security/encoding";

describe("OpaqueCodec", () => {
  const codec = new OpaqueCodec(new SimulatedBackend("test-seed"));

  it("should wrap encryptions as fixed-length opaque values", () => {
    const value = codec.encrypt(50_000n);
    expect(value).toBeInstanceOf(OpaqueValue);
    expect(value.byteLength).toBe(48);
    expect(codec.decrypt(value)).toBe(50_000n);
  });

  it("should render opaque values as base64url only", () => {
    const value = codec.encrypt(85n);
    const encoded = value.toString();
    expect(encoded).toMatch(/^[A-Za-z0-9_-]{64}$/);
    expect(JSON.stringify({ score: value })).toBe(`{"score":"${encoded}"}`);
  });

  it("should restore persisted bytes and parse the base64url form", () => {
    const value = codec.encrypt(123n);
    expect(codec.restore(value.toBytes()).equals(value)).toBe(true);
    expect(codec.parse(value.toString()).equals(value)).toBe(true);
  });

  it("should reject bytes of the wrong length on restore", () => {
    expect(() => codec.restore(new Uint8Array(32))).toThrow(MalformedCiphertextError);
    expect(() => codec.restore(new Uint8Array(32))).toThrow("expected 48 bytes, got 32");
  });

  it("should reject bytes that fail backend validation on restore", () => {
    const bytes = codec.encrypt(123n).toBytes();
    bytes[47] ^= 0xff;
    expect(() => codec.restore(bytes)).toThrow("authentication tag mismatch");
  });

  it("should reject a non-base64url string on parse", () => {
    expect(() => codec.parse("not base64!")).toThrow(MalformedCiphertextError);
    expect(() => codec.parse(base64urlEncode(new Uint8Array(10)))).toThrow("expected 48 bytes, got 10");
  });

  it("should reject an opaque value from a backend with another length", () => {
    const foreign = OpaqueValue.of(new Uint8Array(64), 64);
    expect(() => codec.decrypt(foreign)).toThrow("expected 48 bytes, got 64");
  });

  it("should copy bytes so callers cannot mutate a value", () => {
    const value = codec.encrypt(9n);
    const bytes = value.toBytes();
    bytes[0] ^= 0xff;
    expect(codec.decrypt(value)).toBe(9n);
  });
});
