import { computeChecksum } from './checksum.js';
import { generateToken, WORD_TOKEN_BYTES } from './token.js';
import type { TokensPayload, TokensResponse } from './types.js';

/**
 * Characters that separate words: the Unicode whitespace set, including the
 * C0 separators U+001C–U+001F and NEL, but not the byte order mark.
 */
const WHITESPACE = /[\t\n\v\f\r\x1c-\x1f \x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+/;

/** Split text on runs of whitespace, dropping empty fragments. */
export function splitWords(text: string): string[] {
  return text.split(WHITESPACE).filter((word) => word.length > 0);
}

export function countWords(text: string): number {
  return splitWords(text).length;
}

/**
 * Compute the checksum of the payload text and issue one token per word.
 *
 * Empty or whitespace-only text still yields a single token, so the
 * response always carries at least one.
 */
export function handleTokensRequest(payload: TokensPayload): TokensResponse {
  const text = payload.text ?? '';

  const checksum = computeChecksum(text);

  const count = Math.max(1, countWords(text));
  const tokens = Array.from({ length: count }, () => generateToken(WORD_TOKEN_BYTES));

  return { checksum, tokens };
}
