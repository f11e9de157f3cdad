/**
 * Opaque Value Codec
 *
 * The only place plaintext integers cross into or out of OpaqueValue.
 * Wraps a pluggable EncryptionBackend and enforces the fixed-length
 * ciphertext contract on everything that comes back in.
 *
 * Only HomomorphicEngine should hold a codec: its decrypt is the capability
 * check in front of codec.decrypt.
 */

import type { EncryptionBackend } from "./backend";
import { OpaqueValue } from "./opaque";
import { MalformedCiphertextError } from "../errors";
import { base64urlDecode } from "../security/encoding";

export class OpaqueCodec {
  constructor(readonly backend: EncryptionBackend) {}

  get ciphertextLength(): number {
    return this.backend.ciphertextLength;
  }

  get maxPlaintext(): bigint {
    return this.backend.maxPlaintext;
  }

  encrypt(plaintext: bigint): OpaqueValue {
    return this.wrap(this.backend.encrypt(plaintext));
  }

  decrypt(value: OpaqueValue): bigint {
    return this.backend.decrypt(this.unwrap(value));
  }

  /**
   * Rehydrate persisted or transported ciphertext bytes.
   *
   * @throws MalformedCiphertextError on wrong length or failed backend validation
   */
  restore(bytes: Uint8Array): OpaqueValue {
    const value = this.wrap(bytes);
    this.backend.validate(bytes);
    return value;
  }

  /**
   * Rehydrate the base64url form produced by OpaqueValue.toString().
   */
  parse(encoded: string): OpaqueValue {
    let bytes: Uint8Array;
    try {
      bytes = base64urlDecode(encoded);
    } catch (error) {
      throw new MalformedCiphertextError("not valid base64url", {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
    return this.restore(bytes);
  }

  /** Wrap backend output as an OpaqueValue of this backend's length. */
  wrap(bytes: Uint8Array): OpaqueValue {
    return OpaqueValue.of(bytes, this.backend.ciphertextLength);
  }

  /**
   * Ciphertext bytes of `value`, after checking it belongs to this backend's
   * length class.
   */
  unwrap(value: OpaqueValue): Uint8Array {
    if (value.byteLength !== this.backend.ciphertextLength) {
      throw new MalformedCiphertextError(
        `expected ${this.backend.ciphertextLength} bytes, got ${value.byteLength}`,
        { expected_length: this.backend.ciphertextLength, actual_length: value.byteLength }
      );
    }
    return value.toBytes();
  }
}
