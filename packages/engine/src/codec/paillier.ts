/**
 * Paillier Backend
 *
 * Additively homomorphic public-key scheme with generator g = n + 1.
 *
 *   encrypt(m) = (1 + m·n) · r^n  mod n²
 *   add(a, b)  = a · b            mod n²
 *   mul(a, k)  = a^k              mod n²
 *
 * Sums and scalar products are rerandomized with a fresh r^n so a result
 * cannot be linked to its operands. Order comparison is not homomorphic in
 * Paillier: compareAtLeast decrypts internally and returns only the boolean.
 *
 * Plaintexts live in Z_n, where a result past n would wrap. The backend
 * holds the private key, so add and scalarMultiply check the exact result
 * against maxPlaintext before combining and throw PlaintextOutOfRangeError
 * instead of wrapping. maxPlaintext is (n - 1) / 2 so the sum of two
 * in-range operands is still below n.
 */

import { generatePrimeSync, randomBytes } from "node:crypto";
import type { EncryptionBackend } from "./backend";
import { MalformedCiphertextError, PlaintextOutOfRangeError } from "../errors";
import { bigintToBytes, byteLengthOf, bytesToBigint } from "../security/encoding";
import { gcd, lcm, modInverse, modPow } from "./math";

export const DEFAULT_PAILLIER_BITS = 2048;
const MIN_PAILLIER_BITS = 256;

/** Serialized private key: the two primes as lowercase hex. */
export interface PaillierKeyFile {
  scheme: "paillier";
  p: string;
  q: string;
}

export class PaillierBackend implements EncryptionBackend {
  readonly name = "paillier";
  readonly ciphertextLength: number;
  readonly maxPlaintext: bigint;

  readonly n: bigint;
  private readonly nSquared: bigint;
  private readonly p: bigint;
  private readonly q: bigint;
  private readonly lambda: bigint;
  private readonly mu: bigint;

  constructor(p: bigint, q: bigint) {
    if (p === q) {
      throw new Error("PaillierBackend: p and q must be distinct primes");
    }
    const n = p * q;
    if (gcd(n, (p - 1n) * (q - 1n)) !== 1n) {
      throw new Error("PaillierBackend: gcd(pq, (p-1)(q-1)) must be 1");
    }
    this.p = p;
    this.q = q;
    this.n = n;
    this.nSquared = n * n;
    this.lambda = lcm(p - 1n, q - 1n);
    // With g = n + 1, L(g^λ mod n²) = λ mod n
    this.mu = modInverse(this.lambda % n, n);
    this.ciphertextLength = byteLengthOf(this.nSquared);
    this.maxPlaintext = (n - 1n) / 2n;
  }

  /**
   * Generate a fresh key with an n of roughly `bits` bits.
   */
  static generate(bits: number = DEFAULT_PAILLIER_BITS): PaillierBackend {
    if (!Number.isInteger(bits) || bits < MIN_PAILLIER_BITS || bits % 2 !== 0) {
      throw new Error(`PaillierBackend: modulus size must be an even integer >= ${MIN_PAILLIER_BITS}`);
    }
    const primeBits = bits / 2;
    for (;;) {
      const p = generatePrimeSync(primeBits, { bigint: true });
      const q = generatePrimeSync(primeBits, { bigint: true });
      if (p !== q && gcd(p * q, (p - 1n) * (q - 1n)) === 1n) {
        return new PaillierBackend(p, q);
      }
    }
  }

  static fromKeyFile(key: PaillierKeyFile): PaillierBackend {
    return new PaillierBackend(BigInt(`0x${key.p}`), BigInt(`0x${key.q}`));
  }

  toKeyFile(): PaillierKeyFile {
    return { scheme: "paillier", p: this.p.toString(16), q: this.q.toString(16) };
  }

  encrypt(plaintext: bigint): Uint8Array {
    if (plaintext < 0n) {
      throw new PlaintextOutOfRangeError("plaintext must be non-negative");
    }
    if (plaintext > this.maxPlaintext) {
      throw new PlaintextOutOfRangeError("plaintext exceeds the modulus bound");
    }
    const gm = (1n + plaintext * this.n) % this.nSquared;
    return this.encode((gm * this.noise()) % this.nSquared);
  }

  decrypt(ciphertext: Uint8Array): bigint {
    const c = this.decode(ciphertext);
    const u = modPow(c, this.lambda, this.nSquared);
    const l = (u - 1n) / this.n;
    return (l * this.mu) % this.n;
  }

  add(a: Uint8Array, b: Uint8Array): Uint8Array {
    this.checkRange(this.operand(a) + this.operand(b), "sum");
    const product = (this.decode(a) * this.decode(b)) % this.nSquared;
    return this.encode((product * this.noise()) % this.nSquared);
  }

  scalarMultiply(a: Uint8Array, k: bigint): Uint8Array {
    if (k < 0n) {
      throw new PlaintextOutOfRangeError("scalar must be non-negative");
    }
    this.checkRange(this.operand(a) * k, "product");
    const scaled = modPow(this.decode(a), k, this.nSquared);
    return this.encode((scaled * this.noise()) % this.nSquared);
  }

  compareAtLeast(a: Uint8Array, b: Uint8Array): boolean {
    return this.decrypt(a) >= this.decrypt(b);
  }

  validate(ciphertext: Uint8Array): void {
    this.decode(ciphertext);
  }

  /** Decrypted operand; a ciphertext of an out-of-range value is rejected too. */
  private operand(ciphertext: Uint8Array): bigint {
    const value = this.decrypt(ciphertext);
    this.checkRange(value, "operand");
    return value;
  }

  private checkRange(value: bigint, what: string): void {
    if (value > this.maxPlaintext) {
      throw new PlaintextOutOfRangeError(`${what} exceeds the modulus bound`);
    }
  }

  private decode(ciphertext: Uint8Array): bigint {
    if (ciphertext.length !== this.ciphertextLength) {
      throw new MalformedCiphertextError(
        `expected ${this.ciphertextLength} bytes, got ${ciphertext.length}`
      );
    }
    const c = bytesToBigint(ciphertext);
    if (c === 0n || c >= this.nSquared) {
      throw new MalformedCiphertextError("value outside the ciphertext group");
    }
    return c;
  }

  private encode(c: bigint): Uint8Array {
    return bigintToBytes(c, this.ciphertextLength);
  }

  /** r^n mod n² for a random r coprime to n. */
  private noise(): bigint {
    const width = byteLengthOf(this.n);
    for (;;) {
      const r = bytesToBigint(randomBytes(width)) % this.n;
      if (r !== 0n && gcd(r, this.n) === 1n) {
        return modPow(r, this.n, this.nSquared);
      }
    }
  }
}
