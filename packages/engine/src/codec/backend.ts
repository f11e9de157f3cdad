/**
 * EncryptionBackend Interface
 *
 * Defines the contract a pluggable encryption scheme must satisfy to sit behind
 * the codec and engine. Implementations can be a genuine homomorphic scheme or
 * a reversible simulation for tests.
 *
 * Core invariants:
 * - Every ciphertext is exactly `ciphertextLength` bytes, whatever the plaintext
 * - decrypt(add(encrypt(x), encrypt(y))) === x + y
 * - decrypt(scalarMultiply(encrypt(x), k)) === x * k
 * - compareAtLeast(encrypt(x), encrypt(y)) === (x >= y)
 * - add is commutative and associative under decryption
 *
 * Error behavior:
 * - Structurally invalid ciphertexts throw MalformedCiphertextError
 * - Plaintexts (and results) outside [0, maxPlaintext] throw PlaintextOutOfRangeError;
 *   a result is never reduced or wrapped into range
 *
 * Callers pass bytes that already have the right length; length checks live
 * in the codec.
 */

export interface EncryptionBackend {
  /** Stable backend identifier (e.g. "simulated", "paillier"). */
  readonly name: string;

  /** Fixed byte length of every ciphertext this backend produces. */
  readonly ciphertextLength: number;

  /** Largest plaintext the backend represents. */
  readonly maxPlaintext: bigint;

  encrypt(plaintext: bigint): Uint8Array;

  decrypt(ciphertext: Uint8Array): bigint;

  add(a: Uint8Array, b: Uint8Array): Uint8Array;

  /**
   * @param k Public, non-negative scalar
   */
  scalarMultiply(a: Uint8Array, k: bigint): Uint8Array;

  /**
   * True iff plaintext(a) >= plaintext(b). May decrypt internally but must
   * not expose either plaintext.
   */
  compareAtLeast(a: Uint8Array, b: Uint8Array): boolean;

  /**
   * Check backend-specific structure beyond length.
   * @throws MalformedCiphertextError
   */
  validate(ciphertext: Uint8Array): void;
}
