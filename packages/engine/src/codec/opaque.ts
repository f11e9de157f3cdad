/**
 * OpaqueValue
 *
 * An encrypted non-negative integer. Holds a copy of the backend's ciphertext
 * bytes and exposes nothing about the plaintext: no numeric conversion, and
 * string/JSON forms are the base64url of the ciphertext.
 */

import { MalformedCiphertextError } from "../errors";
import { base64urlEncode, bytesEqual } from "../security/encoding";

export class OpaqueValue {
  private readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = new Uint8Array(bytes);
  }

  /**
   * Wrap ciphertext bytes, enforcing the backend's fixed length.
   * Upper layers go through OpaqueCodec.restore rather than calling this.
   *
   * @throws MalformedCiphertextError on a length mismatch
   */
  static of(bytes: Uint8Array, expectedLength: number): OpaqueValue {
    if (bytes.length !== expectedLength) {
      throw new MalformedCiphertextError(`expected ${expectedLength} bytes, got ${bytes.length}`, {
        expected_length: expectedLength,
        actual_length: bytes.length,
      });
    }
    return new OpaqueValue(bytes);
  }

  get byteLength(): number {
    return this.bytes.length;
  }

  /** Copy of the ciphertext bytes. */
  toBytes(): Uint8Array {
    return new Uint8Array(this.bytes);
  }

  /** Ciphertext equality (not plaintext equality under randomized backends). */
  equals(other: OpaqueValue): boolean {
    return bytesEqual(this.bytes, other.bytes);
  }

  toString(): string {
    return base64urlEncode(this.bytes);
  }

  toJSON(): string {
    return this.toString();
  }
}
