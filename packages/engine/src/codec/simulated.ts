/**
 * Simulated Backend
 *
 * Reversible, deterministic stand-in for a homomorphic scheme. NOT secure:
 * the plaintext is recoverable by anyone holding the seed. It exists so the
 * pipeline can be tested against a plaintext oracle.
 *
 * Layout (48 bytes):
 *   [0..32)  256-bit big-endian plaintext XOR keyed mask
 *   [32..48) HMAC-SHA256(key, body) truncated to 16 bytes
 */

import { createHmac } from "node:crypto";
import type { EncryptionBackend } from "./backend";
import { MalformedCiphertextError, PlaintextOutOfRangeError } from "../errors";
import { bigintToBytes, bytesEqual, bytesToBigint } from "../security/encoding";

const VALUE_BYTES = 32;
const TAG_BYTES = 16;

export const SIMULATED_CIPHERTEXT_LENGTH = VALUE_BYTES + TAG_BYTES;
export const SIMULATED_MAX_PLAINTEXT = (1n << 256n) - 1n;

export class SimulatedBackend implements EncryptionBackend {
  readonly name = "simulated";
  readonly ciphertextLength = SIMULATED_CIPHERTEXT_LENGTH;
  readonly maxPlaintext = SIMULATED_MAX_PLAINTEXT;

  private readonly key: Uint8Array;
  private readonly mask: Uint8Array;

  constructor(seed: string | Uint8Array) {
    if (seed.length === 0) {
      throw new Error("SimulatedBackend: seed must not be empty");
    }
    this.key = createHmac("sha256", "cipherscore/simulated/key").update(seed).digest();
    this.mask = createHmac("sha256", this.key).update("mask").digest();
  }

  encrypt(plaintext: bigint): Uint8Array {
    this.checkRange(plaintext, "plaintext");
    const body = this.xorMask(bigintToBytes(plaintext, VALUE_BYTES));
    const out = new Uint8Array(SIMULATED_CIPHERTEXT_LENGTH);
    out.set(body, 0);
    out.set(this.tag(body), VALUE_BYTES);
    return out;
  }

  decrypt(ciphertext: Uint8Array): bigint {
    this.validate(ciphertext);
    return bytesToBigint(this.xorMask(ciphertext.subarray(0, VALUE_BYTES)));
  }

  add(a: Uint8Array, b: Uint8Array): Uint8Array {
    const sum = this.decrypt(a) + this.decrypt(b);
    this.checkRange(sum, "sum");
    return this.encrypt(sum);
  }

  scalarMultiply(a: Uint8Array, k: bigint): Uint8Array {
    if (k < 0n) {
      throw new PlaintextOutOfRangeError("scalar must be non-negative");
    }
    const product = this.decrypt(a) * k;
    this.checkRange(product, "product");
    return this.encrypt(product);
  }

  compareAtLeast(a: Uint8Array, b: Uint8Array): boolean {
    return this.decrypt(a) >= this.decrypt(b);
  }

  validate(ciphertext: Uint8Array): void {
    if (ciphertext.length !== SIMULATED_CIPHERTEXT_LENGTH) {
      throw new MalformedCiphertextError(
        `expected ${SIMULATED_CIPHERTEXT_LENGTH} bytes, got ${ciphertext.length}`
      );
    }
    const body = ciphertext.subarray(0, VALUE_BYTES);
    const tag = ciphertext.subarray(VALUE_BYTES);
    if (!bytesEqual(tag, this.tag(body))) {
      throw new MalformedCiphertextError("authentication tag mismatch");
    }
  }

  private checkRange(value: bigint, what: string): void {
    if (value < 0n) {
      throw new PlaintextOutOfRangeError(`${what} must be non-negative`);
    }
    if (value > SIMULATED_MAX_PLAINTEXT) {
      throw new PlaintextOutOfRangeError(`${what} exceeds 256 bits`);
    }
  }

  private tag(body: Uint8Array): Uint8Array {
    return createHmac("sha256", this.key).update(body).digest().subarray(0, TAG_BYTES);
  }

  private xorMask(bytes: Uint8Array): Uint8Array {
    const out = new Uint8Array(VALUE_BYTES);
    for (let i = 0; i < VALUE_BYTES; i++) {
      out[i] = bytes[i] ^ this.mask[i];
    }
    return out;
  }
}
