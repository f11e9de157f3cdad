/**
 * Byte Encoding Utilities
 *
 * Base64url for blobs crossing a text boundary, and fixed-width big-endian
 * conversion between bigint and bytes for ciphertext layouts.
 */

import { timingSafeEqual } from "node:crypto";

/**
 * Encode bytes to base64url string (URL-safe base64, no padding).
 */
export function base64urlEncode(bytes: Uint8Array): string {
  return Buffer.from(bytes)
    .toString("base64")
    .replace(/\+/g, "-")
    .replace(/\//g, "_")
    .replace(/=/g, "");
}

/**
 * Decode base64url string to bytes.
 *
 * @throws Error if input is not valid base64url
 */
export function base64urlDecode(str: string): Uint8Array {
  if (str === "") {
    return new Uint8Array(0);
  }

  // Validate before decoding; Buffer silently drops unknown characters
  if (!/^[A-Za-z0-9_-]+$/.test(str)) {
    throw new Error("Invalid base64url string: contains invalid characters");
  }

  let padded = str.replace(/-/g, "+").replace(/_/g, "/");
  while (padded.length % 4) {
    padded += "=";
  }

  return new Uint8Array(Buffer.from(padded, "base64"));
}

/**
 * Encode a non-negative bigint as exactly `width` big-endian bytes.
 *
 * @throws RangeError if the value is negative or does not fit
 */
export function bigintToBytes(value: bigint, width: number): Uint8Array {
  if (value < 0n) {
    throw new RangeError("bigintToBytes: negative value");
  }
  const out = new Uint8Array(width);
  let rest = value;
  for (let i = width - 1; i >= 0; i--) {
    out[i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  if (rest !== 0n) {
    throw new RangeError(`bigintToBytes: value does not fit in ${width} bytes`);
  }
  return out;
}

/**
 * Decode big-endian bytes as a non-negative bigint.
 */
export function bytesToBigint(bytes: Uint8Array): bigint {
  let value = 0n;
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}

/**
 * Number of bytes needed to hold `value` (at least 1).
 */
export function byteLengthOf(value: bigint): number {
  let length = 1;
  let rest = value >> 8n;
  while (rest > 0n) {
    length++;
    rest >>= 8n;
  }
  return length;
}

/**
 * Constant-time byte comparison for tags and signatures.
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}
