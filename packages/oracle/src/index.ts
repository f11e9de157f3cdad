/**
 * @cipherscore/oracle
 *
 * Credit profiles, the confidential scoring pipeline, lending pool registry
 * and matcher, plus the HTTP and CLI surfaces around them.
 */

export * from "./types";
export { OracleStorage, type ProfileRow, type PoolRow, type ProfileBlobs, type NewPoolRow } from "./storage";
export { CreditProfileStore, type CreditProfileStoreOptions } from "./profiles";
export {
  ScoringPipeline,
  SCORE_WEIGHTS,
  SCORE_SCALE_NUMERATOR,
  combineScore,
  computePlaintextScore,
  type ScoringPipelineOptions,
} from "./scoring";
export { LendingPoolRegistry, MAX_INTEREST_RATE_BPS, type LendingPoolRegistryOptions } from "./pools";
export {
  LoanMatcher,
  LOAN_SCALE,
  selectMatches,
  deriveLoanAmount,
  computePlaintextMatches,
  computePlaintextLoanAmount,
  type MatchCandidate,
  type LoanMatcherOptions,
} from "./matcher";
export { CreditOracle, DEFAULT_SERVICE_IDENTITY, type CreditOracleOptions } from "./oracle";
export { loadConfig, DEFAULT_PORT, type OracleConfig, type BackendConfig } from "./config";
export { createBackend, createOracle, loadOrCreatePaillierKey } from "./backend";
export {
  generateKeypair,
  keypairFromSeed,
  identityOf,
  signingMessage,
  signRequest,
  verifyRequest,
  ReplayGuard,
  loadKeypairFile,
  writeKeypairFile,
  IDENTITY_HEADER,
  TIMESTAMP_HEADER,
  SIGNATURE_HEADER,
  MAX_CLOCK_SKEW_MS,
  type Keypair,
  type SignedHeaders,
  type SignedRequest,
  type VerifyInput,
  type VerifyResult,
} from "./identity";
export { startOracleServer, MAX_BODY_BYTES, type OracleServer, type OracleServerOptions } from "./server";
