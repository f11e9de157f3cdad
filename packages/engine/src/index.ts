/**
 * @cipherscore/engine
 *
 * Confidential-computation engine: opaque value codec, pluggable encryption
 * backends, homomorphic arithmetic and the authorization gate.
 */

export type { Identity, Clock, Capability } from "./types";
export { CAPABILITIES, systemClock } from "./types";

export {
  CipherScoreError,
  UnauthorizedCallerError,
  MalformedCiphertextError,
  PlaintextOutOfRangeError,
  ProfileNotFoundError,
  InvalidPoolError,
  PoolInactiveError,
  ScoreUnavailableError,
  InvalidRequestError,
  isCipherScoreError,
  UNAUTHORIZED_CALLER,
  MALFORMED_CIPHERTEXT,
  PLAINTEXT_OUT_OF_RANGE,
  PROFILE_NOT_FOUND,
  INVALID_POOL,
  POOL_INACTIVE,
  SCORE_UNAVAILABLE,
  INVALID_REQUEST,
  type CipherScoreErrorCode,
} from "./errors";

export { log, createLogger, type Logger, type LogLevel } from "./logger";
export { redactSecrets, REDACTED } from "./security/redact";
export {
  base64urlEncode,
  base64urlDecode,
  bigintToBytes,
  bytesToBigint,
  bytesEqual,
} from "./security/encoding";

// Codec & backends
export type { EncryptionBackend } from "./codec/backend";
export { OpaqueValue } from "./codec/opaque";
export { OpaqueCodec } from "./codec/codec";
export {
  SimulatedBackend,
  SIMULATED_CIPHERTEXT_LENGTH,
  SIMULATED_MAX_PLAINTEXT,
} from "./codec/simulated";
export { PaillierBackend, DEFAULT_PAILLIER_BITS, type PaillierKeyFile } from "./codec/paillier";

// Engine
export { HomomorphicEngine, type HomomorphicEngineOptions } from "./engine/engine";
export {
  plaintextArithmetic,
  opaqueArithmetic,
  type Arithmetic,
} from "./engine/arithmetic";

// Authorization & audit
export { AuthorizationGate, type AuthorizationGateOptions } from "./auth/gate";
export { MemoryGrantStore, type GrantStore, type GrantRecord } from "./auth/grants";
export {
  emitAudit,
  MemoryAuditSink,
  JsonlAuditSink,
  type AuditSink,
  type AuditEvent,
  type AuditOperation,
} from "./audit/sink";
