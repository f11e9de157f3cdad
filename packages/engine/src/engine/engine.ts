/**
 * Homomorphic Arithmetic Engine
 *
 * Add, scalar-multiply and order-compare opaque values without exposing
 * plaintext. Every operation checks the caller's capability before touching
 * its arguments, and emits an audit record only on success.
 */

import type { Clock, Identity } from "../types";
import { systemClock } from "../types";
import type { OpaqueCodec } from "../codec/codec";
import type { OpaqueValue } from "../codec/opaque";
import type { AuthorizationGate } from "../auth/gate";
import { emitAudit, type AuditOperation, type AuditSink } from "../audit/sink";
import { PlaintextOutOfRangeError } from "../errors";
import { createLogger } from "../logger";

const logger = createLogger("engine");

export interface HomomorphicEngineOptions {
  codec: OpaqueCodec;
  gate: AuthorizationGate;
  audit?: AuditSink;
  clock?: Clock;
}

export class HomomorphicEngine {
  private readonly codec: OpaqueCodec;
  private readonly gate: AuthorizationGate;
  private readonly audit?: AuditSink;
  private readonly clock: Clock;

  constructor(opts: HomomorphicEngineOptions) {
    this.codec = opts.codec;
    this.gate = opts.gate;
    this.audit = opts.audit;
    this.clock = opts.clock ?? systemClock;
  }

  get backendName(): string {
    return this.codec.backend.name;
  }

  get ciphertextLength(): number {
    return this.codec.ciphertextLength;
  }

  /**
   * Encrypt a plaintext. Public: data owners encrypt their own attributes.
   */
  encrypt(plaintext: bigint): OpaqueValue {
    return this.codec.encrypt(plaintext);
  }

  /** Rehydrate persisted ciphertext bytes. */
  restore(bytes: Uint8Array): OpaqueValue {
    return this.codec.restore(bytes);
  }

  /** Rehydrate a base64url ciphertext. */
  parse(encoded: string): OpaqueValue {
    return this.codec.parse(encoded);
  }

  add(caller: Identity, a: OpaqueValue, b: OpaqueValue): OpaqueValue {
    this.gate.require(caller, "engine");
    const result = this.codec.wrap(
      this.codec.backend.add(this.codec.unwrap(a), this.codec.unwrap(b))
    );
    this.record("add", caller, result);
    return result;
  }

  scalarMultiply(caller: Identity, a: OpaqueValue, k: bigint): OpaqueValue {
    this.gate.require(caller, "engine");
    if (k < 0n) {
      throw new PlaintextOutOfRangeError("scalar must be non-negative");
    }
    const result = this.codec.wrap(this.codec.backend.scalarMultiply(this.codec.unwrap(a), k));
    this.record("scalar_multiply", caller, result, { scalar: k.toString() });
    return result;
  }

  /**
   * True iff plaintext(a) >= plaintext(b). The outcome is not written to the
   * audit record.
   */
  compareAtLeast(caller: Identity, a: OpaqueValue, b: OpaqueValue): boolean {
    this.gate.require(caller, "engine");
    const outcome = this.codec.backend.compareAtLeast(this.codec.unwrap(a), this.codec.unwrap(b));
    this.record("compare_at_least", caller);
    return outcome;
  }

  /**
   * Privileged escape hatch for audit and testing. Never on the scoring or
   * matching path.
   */
  decrypt(caller: Identity, a: OpaqueValue): bigint {
    this.gate.require(caller, "engine");
    this.gate.require(caller, "decrypt");
    const plaintext = this.codec.decrypt(a);
    logger.warn("Privileged decrypt", { caller });
    this.record("decrypt", caller);
    return plaintext;
  }

  private record(
    operation: AuditOperation,
    caller: Identity,
    result?: OpaqueValue,
    details?: Record<string, string>
  ): void {
    emitAudit(this.audit, {
      operation,
      caller,
      ts: this.clock(),
      ...(result && { result: result.toString() }),
      ...(details && { details }),
    });
  }
}
