/**
 * Arithmetic Views
 *
 * The scoring and loan-amount formulas are written once against Arithmetic<T>
 * and run either over opaque values (through the engine, as a fixed caller)
 * or over plaintext bigints. Running both on the same inputs must give the
 * same number, which is how the pipeline is checked against a plaintext oracle.
 */

import type { Identity } from "../types";
import type { OpaqueValue } from "../codec/opaque";
import type { HomomorphicEngine } from "./engine";

export interface Arithmetic<T> {
  add(a: T, b: T): T;
  scale(a: T, k: bigint): T;
  atLeast(a: T, b: T): boolean;
}

export const plaintextArithmetic: Arithmetic<bigint> = {
  add: (a, b) => a + b,
  scale: (a, k) => a * k,
  atLeast: (a, b) => a >= b,
};

export function opaqueArithmetic(engine: HomomorphicEngine, caller: Identity): Arithmetic<OpaqueValue> {
  return {
    add: (a, b) => engine.add(caller, a, b),
    scale: (a, k) => engine.scalarMultiply(caller, a, k),
    atLeast: (a, b) => engine.compareAtLeast(caller, a, b),
  };
}
