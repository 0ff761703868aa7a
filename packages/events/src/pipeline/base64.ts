/**
 * Strict base64 decoding for event blobs
 *
 * Buffer.from(..., "base64") silently skips characters it does not
 * understand, so the alphabet and padding are checked first.
 */

import { InvalidEncodingError } from "../errors.js";

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const WHITESPACE = /[\t\n\r ]/g;

/**
 * Decode a base64 string to bytes, ignoring ASCII whitespace
 */
export function decodeBase64(encoded: string): Uint8Array {
  const compact = encoded.replace(WHITESPACE, "");
  if (!BASE64_PATTERN.test(compact)) {
    throw new InvalidEncodingError("Event blob contains characters outside the base64 alphabet");
  }
  if (compact.length % 4 !== 0) {
    throw new InvalidEncodingError(`Event blob length ${compact.length} is not a multiple of 4`);
  }
  const buffer = Buffer.from(compact, "base64");
  return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
}

/**
 * Encode bytes as base64
 */
export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
}

/**
 * Normalise pipeline input to bytes. Strings are base64; byte input is used as-is.
 */
export function toEventBytes(input: string | Uint8Array): Uint8Array {
  return typeof input === "string" ? decodeBase64(input) : input;
}
