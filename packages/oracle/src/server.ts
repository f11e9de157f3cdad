/**
 * Oracle HTTP Server
 *
 * JSON over node:http. Every route except GET /health and GET /pools needs
 * a signed request (see identity.ts); the verified public key is the caller.
 * Plaintext only ever appears in request bodies, where it is encrypted
 * before anything else touches it.
 */

import http from "node:http";
import type { IncomingMessage, ServerResponse } from "node:http";
import { z } from "zod";
import {
  CAPABILITIES,
  createLogger,
  isCipherScoreError,
  InvalidRequestError,
  type CipherScoreErrorCode,
  type Clock,
  type Identity,
  type OpaqueValue,
} from "@cipherscore/engine";
import type { CreditOracle } from "./oracle";
import {
  IDENTITY_HEADER,
  SIGNATURE_HEADER,
  TIMESTAMP_HEADER,
  ReplayGuard,
  verifyRequest,
} from "./identity";
import { ATTRIBUTE_NAMES, type CreditProfile, type FinancialAttributes } from "./types";

const logger = createLogger("server");

export const MAX_BODY_BYTES = 64 * 1024;

export interface OracleServerOptions {
  port?: number; // 0 for random port
  oracle: CreditOracle;
  clock?: Clock;
}

export interface OracleServer {
  url: string;
  port: number;
  close(): Promise<void>;
}

// Values above Number.MAX_SAFE_INTEGER lose precision in JSON.parse; send those as decimal strings
const plaintextSchema = z
  .union([
    z.number().int().nonnegative().safe("numbers above 2^53 - 1 must be sent as decimal strings"),
    z.string().regex(/^\d+$/, "must be a non-negative integer"),
  ])
  .transform((value) => BigInt(value));

const ciphertextSchema = z.string().min(1);

const plaintextAttributesSchema = z.object({
  income: plaintextSchema,
  assets: plaintextSchema,
  debts: plaintextSchema,
  payment_history: plaintextSchema,
  credit_utilization: plaintextSchema,
});

const encryptedAttributesSchema = z.object({
  income: ciphertextSchema,
  assets: ciphertextSchema,
  debts: ciphertextSchema,
  payment_history: ciphertextSchema,
  credit_utilization: ciphertextSchema,
});

const submitProfileSchema = z.union([
  z.object({ attributes: plaintextAttributesSchema }).strict(),
  z.object({ encrypted: encryptedAttributesSchema }).strict(),
]);

const addPoolSchema = z.object({
  min_score: plaintextSchema,
  max_loan: plaintextSchema,
  interest_rate_bps: z.number().int(),
  name: z.string(),
});

/** Omit `score` to use the caller's stored, current score. */
const scoreBodySchema = z.object({
  score: ciphertextSchema.optional(),
});

const grantSchema = z.object({
  grantee: z.string().min(1),
  capability: z.enum(CAPABILITIES),
});

class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

const STATUS_BY_CODE: Record<CipherScoreErrorCode, number> = {
  UNAUTHORIZED_CALLER: 403,
  MALFORMED_CIPHERTEXT: 400,
  PLAINTEXT_OUT_OF_RANGE: 400,
  INVALID_REQUEST: 400,
  PROFILE_NOT_FOUND: 404,
  INVALID_POOL: 404,
  POOL_INACTIVE: 409,
  SCORE_UNAVAILABLE: 409,
};

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function sendError(res: ServerResponse, error: unknown): void {
  if (error instanceof HttpError) {
    sendJson(res, error.status, { error: error.message, code: error.code });
    return;
  }
  if (isCipherScoreError(error)) {
    sendJson(res, STATUS_BY_CODE[error.code], { error: error.message, code: error.code });
    return;
  }
  logger.error("Unhandled request error", {
    error: error instanceof Error ? error.message : String(error),
  });
  sendJson(res, 500, { error: "Internal server error", code: "INTERNAL" });
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        // Drain the rest so the 413 reaches the client instead of a reset
        req.removeAllListeners("data");
        req.resume();
        reject(new HttpError(413, "Request body too large", "PAYLOAD_TOO_LARGE"));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string): T {
  let json: unknown;
  try {
    json = raw.length === 0 ? {} : JSON.parse(raw);
  } catch {
    throw new InvalidRequestError("body is not valid JSON");
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new InvalidRequestError(`${where}${issue?.message ?? "invalid body"}`);
  }
  return parsed.data;
}

function headerValue(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

function profileView(profile: CreditProfile) {
  return {
    owner: profile.owner,
    attributes: Object.fromEntries(
      ATTRIBUTE_NAMES.map((name) => [name, profile.attributes[name].toString()])
    ),
    score: profile.score?.toString() ?? null,
    revision: profile.revision,
    score_revision: profile.score_revision,
    score_stale: profile.score_stale,
    updated_at: profile.updated_at,
    score_computed_at: profile.score_computed_at,
  };
}

/**
 * Start the oracle HTTP server.
 */
export function startOracleServer(opts: OracleServerOptions): Promise<OracleServer> {
  const { port = 0, oracle } = opts;
  const clock = opts.clock ?? Date.now;
  const replays = new ReplayGuard();

  const authenticate = (req: IncomingMessage, path: string, body: string): Identity => {
    const method = req.method ?? "GET";
    const now = clock();
    const result = verifyRequest({
      method,
      path,
      body,
      identity: headerValue(req, IDENTITY_HEADER),
      timestamp: headerValue(req, TIMESTAMP_HEADER),
      signature: headerValue(req, SIGNATURE_HEADER),
      now,
    });
    if (!result.ok) {
      throw new HttpError(401, `Unauthenticated: ${result.reason}`, "UNAUTHENTICATED");
    }
    if (!replays.accept({ identity: result.identity, method, path, timestamp: result.timestamp, body }, now)) {
      throw new HttpError(401, "Unauthenticated: request already seen", "UNAUTHENTICATED");
    }
    return result.identity;
  };

  const scoreFor = (caller: Identity, encoded: string | undefined): OpaqueValue =>
    encoded === undefined ? oracle.currentScore(caller) : oracle.engine.parse(encoded);

  const handle = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const method = req.method ?? "GET";
    const path = req.url ?? "/";
    const pathname = new URL(path, "http://localhost").pathname;

    if (method === "GET" && pathname === "/health") {
      sendJson(res, 200, { ok: true, service: "cipherscore", backend: oracle.engine.backendName });
      return;
    }

    if (method === "GET" && pathname === "/pools") {
      sendJson(res, 200, { pools: oracle.listLendingPools() });
      return;
    }

    const body = await readBody(req);
    const caller = authenticate(req, path, body);

    if (method === "POST" && pathname === "/profiles") {
      const input = parseBody(submitProfileSchema, body);
      const revision =
        "attributes" in input
          ? oracle.submitFinancialData(caller, input.attributes)
          : oracle.submitEncryptedData(caller, parseEncrypted(oracle, input.encrypted));
      sendJson(res, 200, { owner: caller, revision });
      return;
    }

    const profileMatch = pathname.match(/^\/profiles\/([^/]+)$/);
    if (method === "GET" && profileMatch && profileMatch[1] !== "score") {
      const owner = profileMatch[1];
      if (owner !== caller) {
        throw new HttpError(403, "Profiles are readable by their owner only", "UNAUTHORIZED_CALLER");
      }
      sendJson(res, 200, profileView(oracle.getProfile(owner)));
      return;
    }

    if (method === "POST" && pathname === "/profiles/score") {
      const score = oracle.computeCreditScore(caller);
      const profile = oracle.getProfile(caller);
      sendJson(res, 200, { owner: caller, score: score.toString(), revision: profile.score_revision });
      return;
    }

    if (method === "POST" && pathname === "/pools") {
      const input = parseBody(addPoolSchema, body);
      const poolId = oracle.addLendingPool(caller, input);
      sendJson(res, 201, { pool_id: poolId });
      return;
    }

    const deactivateMatch = pathname.match(/^\/pools\/(\d+)\/deactivate$/);
    if (method === "POST" && deactivateMatch) {
      const poolId = Number(deactivateMatch[1]);
      oracle.deactivateLendingPool(caller, poolId);
      sendJson(res, 200, { pool_id: poolId, active: false });
      return;
    }

    if (method === "POST" && pathname === "/matches") {
      const input = parseBody(scoreBodySchema, body);
      sendJson(res, 200, { pool_ids: oracle.findLoanMatches(scoreFor(caller, input.score)) });
      return;
    }

    const loanMatch = pathname.match(/^\/pools\/(\d+)\/loan-amount$/);
    if (method === "POST" && loanMatch) {
      const input = parseBody(scoreBodySchema, body);
      const poolId = Number(loanMatch[1]);
      const amount = oracle.getOptimalLoanAmount(scoreFor(caller, input.score), poolId);
      sendJson(res, 200, { pool_id: poolId, loan_amount: amount.toString() });
      return;
    }

    if (method === "POST" && pathname === "/grants") {
      const input = parseBody(grantSchema, body);
      const granted = oracle.grant(caller, input.grantee, input.capability);
      sendJson(res, 200, { grantee: input.grantee, capability: input.capability, granted });
      return;
    }

    throw new HttpError(404, "Not found", "NOT_FOUND");
  };

  const server = http.createServer((req, res) => {
    handle(req, res).catch((error: unknown) => sendError(res, error));
  });

  return new Promise<OracleServer>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      const address = server.address();
      const actualPort = typeof address === "object" && address ? address.port : port;
      const url = `http://localhost:${actualPort}`;
      logger.info("Oracle server listening", { url });

      resolve({
        url,
        port: actualPort,
        close() {
          return new Promise<void>((done, fail) => {
            server.close((error) => (error ? fail(error) : done()));
            server.closeAllConnections();
          });
        },
      });
    });
  });
}

function parseEncrypted(
  oracle: CreditOracle,
  encrypted: Record<(typeof ATTRIBUTE_NAMES)[number], string>
): FinancialAttributes<OpaqueValue> {
  return {
    income: oracle.engine.parse(encrypted.income),
    assets: oracle.engine.parse(encrypted.assets),
    debts: oracle.engine.parse(encrypted.debts),
    payment_history: oracle.engine.parse(encrypted.payment_history),
    credit_utilization: oracle.engine.parse(encrypted.credit_utilization),
  };
}
