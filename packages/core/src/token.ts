import { randomBytes } from 'node:crypto';

/** Byte length of the token returned by `GET /generate` (32 hex chars). */
export const GENERATE_TOKEN_BYTES = 16;

/** Byte length of each per-word token returned by `POST /tokens` (16 hex chars). */
export const WORD_TOKEN_BYTES = 8;

/**
 * Generate a pseudorandom token from the OS secure random source.
 * The result is `byteLength * 2` lowercase hex characters.
 */
export function generateToken(byteLength: number = GENERATE_TOKEN_BYTES): string {
  if (!Number.isInteger(byteLength) || byteLength <= 0) {
    throw new RangeError(`Token byte length must be a positive integer, got ${byteLength}`);
  }
  return randomBytes(byteLength).toString('hex');
}
