/**
 * Engine Types
 *
 * Shared boundary types for the confidential-computation engine.
 */

/**
 * Opaque, comparable principal identifier supplied by the calling context
 * (over HTTP, the base58 public key that signed the request).
 */
export type Identity = string;

/** Millisecond timestamp source used to stamp records. */
export type Clock = () => number;

/**
 * Permissions tracked by the authorization gate.
 * - engine: invoke homomorphic operations
 * - registry: register lending pools
 * - decrypt: privileged decryption (audit/testing only)
 */
export type Capability = "engine" | "registry" | "decrypt";

export const CAPABILITIES = ["engine", "registry", "decrypt"] as const satisfies readonly Capability[];

export const systemClock: Clock = () => Date.now();
