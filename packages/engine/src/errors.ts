/**
 * CipherScore Errors
 *
 * Every failure the engine and oracle raise is a synchronous precondition
 * violation. Each carries a stable code so transports can map it without
 * matching on messages. Details never carry plaintext.
 */

// Type-safe error codes
export const UNAUTHORIZED_CALLER = "UNAUTHORIZED_CALLER";
export const MALFORMED_CIPHERTEXT = "MALFORMED_CIPHERTEXT";
export const PLAINTEXT_OUT_OF_RANGE = "PLAINTEXT_OUT_OF_RANGE";
export const PROFILE_NOT_FOUND = "PROFILE_NOT_FOUND";
export const INVALID_POOL = "INVALID_POOL";
export const POOL_INACTIVE = "POOL_INACTIVE";
export const SCORE_UNAVAILABLE = "SCORE_UNAVAILABLE";
export const INVALID_REQUEST = "INVALID_REQUEST";

export type CipherScoreErrorCode =
  | typeof UNAUTHORIZED_CALLER
  | typeof MALFORMED_CIPHERTEXT
  | typeof PLAINTEXT_OUT_OF_RANGE
  | typeof PROFILE_NOT_FOUND
  | typeof INVALID_POOL
  | typeof POOL_INACTIVE
  | typeof SCORE_UNAVAILABLE
  | typeof INVALID_REQUEST;

export class CipherScoreError extends Error {
  constructor(
    message: string,
    public readonly code: CipherScoreErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "CipherScoreError";
  }
}

export class UnauthorizedCallerError extends CipherScoreError {
  constructor(
    public readonly caller: string,
    public readonly capability: string
  ) {
    super(`Caller ${caller} is not authorized for "${capability}"`, UNAUTHORIZED_CALLER, {
      caller,
      capability,
    });
    this.name = "UnauthorizedCallerError";
  }
}

export class MalformedCiphertextError extends CipherScoreError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Malformed ciphertext: ${reason}`, MALFORMED_CIPHERTEXT, details);
    this.name = "MalformedCiphertextError";
  }
}

/**
 * Raised when a plaintext (or an arithmetic result) falls outside what the
 * backend can represent. The offending value is deliberately not reported.
 */
export class PlaintextOutOfRangeError extends CipherScoreError {
  constructor(reason: string) {
    super(`Plaintext out of range: ${reason}`, PLAINTEXT_OUT_OF_RANGE);
    this.name = "PlaintextOutOfRangeError";
  }
}

export class ProfileNotFoundError extends CipherScoreError {
  constructor(public readonly owner: string) {
    super(`No credit profile for ${owner}`, PROFILE_NOT_FOUND, { owner });
    this.name = "ProfileNotFoundError";
  }
}

export class InvalidPoolError extends CipherScoreError {
  constructor(public readonly poolId: number) {
    super(`Lending pool ${poolId} does not exist`, INVALID_POOL, { pool_id: poolId });
    this.name = "InvalidPoolError";
  }
}

export class PoolInactiveError extends CipherScoreError {
  constructor(public readonly poolId: number) {
    super(`Lending pool ${poolId} is inactive`, POOL_INACTIVE, { pool_id: poolId });
    this.name = "PoolInactiveError";
  }
}

export class ScoreUnavailableError extends CipherScoreError {
  constructor(
    public readonly owner: string,
    reason: "never_computed" | "stale"
  ) {
    super(`Credit score for ${owner} is unavailable (${reason})`, SCORE_UNAVAILABLE, {
      owner,
      reason,
    });
    this.name = "ScoreUnavailableError";
  }
}

export class InvalidRequestError extends CipherScoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, INVALID_REQUEST, details);
    this.name = "InvalidRequestError";
  }
}

export function isCipherScoreError(error: unknown): error is CipherScoreError {
  return error instanceof CipherScoreError;
}
