/**
 * Request Identity
 *
 * Identities are base58 Ed25519 public keys (tweetnacl). A request is signed
 * over `METHOD\nPATH\nTIMESTAMP\nBODY`; the server verifies the detached
 * signature and the timestamp skew before treating the key as the caller.
 * A ReplayGuard then refuses the same signed request a second time while its
 * timestamp is still inside the skew window.
 */

import nacl from "tweetnacl";
import bs58 from "bs58";
import { createHash } from "node:crypto";
import { readFileSync, writeFileSync } from "node:fs";
import { z } from "zod";
import type { Identity } from "@cipherscore/engine";

export type Keypair = {
  publicKey: Uint8Array;
  secretKey: Uint8Array;
};

export const IDENTITY_HEADER = "x-cipherscore-identity";
export const TIMESTAMP_HEADER = "x-cipherscore-timestamp";
export const SIGNATURE_HEADER = "x-cipherscore-signature";

export const MAX_CLOCK_SKEW_MS = 5 * 60 * 1000;

export function generateKeypair(): Keypair {
  return nacl.sign.keyPair();
}

/**
 * Deterministic keypair from an arbitrary seed string (dev and tests only).
 */
export function keypairFromSeed(seed: string): Keypair {
  const seedHash = createHash("sha256").update(seed).digest();
  return nacl.sign.keyPair.fromSeed(new Uint8Array(seedHash));
}

export function identityOf(keypair: Keypair): Identity {
  return bs58.encode(keypair.publicKey);
}

export function signingMessage(method: string, path: string, timestamp: number, body: string): string {
  return `${method.toUpperCase()}\n${path}\n${timestamp}\n${body}`;
}

export interface SignedHeaders {
  [IDENTITY_HEADER]: string;
  [TIMESTAMP_HEADER]: string;
  [SIGNATURE_HEADER]: string;
}

export function signRequest(
  keypair: Keypair,
  method: string,
  path: string,
  body: string,
  timestamp: number = Date.now()
): SignedHeaders {
  const message = new TextEncoder().encode(signingMessage(method, path, timestamp, body));
  const signature = nacl.sign.detached(message, keypair.secretKey);
  return {
    [IDENTITY_HEADER]: identityOf(keypair),
    [TIMESTAMP_HEADER]: String(timestamp),
    [SIGNATURE_HEADER]: bs58.encode(signature),
  };
}

export type VerifyResult =
  | { ok: true; identity: Identity; timestamp: number }
  | { ok: false; reason: string };

export interface VerifyInput {
  method: string;
  path: string;
  body: string;
  identity?: string;
  timestamp?: string;
  signature?: string;
  now: number;
}

export function verifyRequest(input: VerifyInput): VerifyResult {
  const { identity, timestamp, signature } = input;
  if (!identity || !timestamp || !signature) {
    return { ok: false, reason: "missing signature headers" };
  }
  if (!/^\d+$/.test(timestamp)) {
    return { ok: false, reason: "invalid timestamp" };
  }
  const ts = Number(timestamp);
  if (Math.abs(input.now - ts) > MAX_CLOCK_SKEW_MS) {
    return { ok: false, reason: "timestamp outside allowed skew" };
  }

  let publicKey: Uint8Array;
  let sig: Uint8Array;
  try {
    publicKey = bs58.decode(identity);
    sig = bs58.decode(signature);
  } catch {
    return { ok: false, reason: "invalid base58" };
  }
  if (publicKey.length !== nacl.sign.publicKeyLength || sig.length !== nacl.sign.signatureLength) {
    return { ok: false, reason: "invalid key or signature length" };
  }

  const message = new TextEncoder().encode(signingMessage(input.method, input.path, ts, input.body));
  if (!nacl.sign.detached.verify(message, sig, publicKey)) {
    return { ok: false, reason: "signature mismatch" };
  }
  return { ok: true, identity, timestamp: ts };
}

export interface SignedRequest {
  identity: Identity;
  method: string;
  path: string;
  timestamp: number;
  body: string;
}

/**
 * Remembers accepted requests until their timestamp leaves the skew window.
 * Clients must use a fresh timestamp to repeat an identical request.
 */
export class ReplayGuard {
  private readonly seen = new Map<string, number>();

  /**
   * @returns false if this exact signed request was already accepted
   */
  accept(request: SignedRequest, now: number): boolean {
    for (const [key, expiresAt] of this.seen) {
      if (expiresAt < now) this.seen.delete(key);
    }
    const digest = createHash("sha256")
      .update(signingMessage(request.method, request.path, request.timestamp, request.body))
      .digest("hex");
    const key = `${request.identity}:${digest}`;
    if (this.seen.has(key)) {
      return false;
    }
    this.seen.set(key, request.timestamp + MAX_CLOCK_SKEW_MS);
    return true;
  }

  get size(): number {
    return this.seen.size;
  }
}

const keypairFileSchema = z.object({
  publicKeyB58: z.string().min(1),
  secretKeyB58: z.string().min(1),
});

export function writeKeypairFile(path: string, keypair: Keypair): void {
  const data = {
    publicKeyB58: identityOf(keypair),
    secretKeyB58: bs58.encode(keypair.secretKey),
  };
  writeFileSync(path, JSON.stringify(data, null, 2) + "\n", { mode: 0o600 });
}

export function loadKeypairFile(path: string): Keypair {
  const parsed = keypairFileSchema.safeParse(JSON.parse(readFileSync(path, "utf-8")));
  if (!parsed.success) {
    throw new Error(`Keypair file ${path} must contain publicKeyB58 and secretKeyB58`);
  }
  const secretKey = bs58.decode(parsed.data.secretKeyB58);
  if (secretKey.length !== nacl.sign.secretKeyLength) {
    throw new Error(`Invalid secret key length: expected 64 bytes, got ${secretKey.length}`);
  }
  const keypair = nacl.sign.keyPair.fromSecretKey(secretKey);
  if (identityOf(keypair) !== parsed.data.publicKeyB58) {
    throw new Error("Public key in file does not match secret key");
  }
  return keypair;
}
