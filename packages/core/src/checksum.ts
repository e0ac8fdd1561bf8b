import { createHash } from 'node:crypto';

/**
 * SHA-256 of the UTF-8 encoded text, as lowercase hex.
 * Missing text hashes as the empty string.
 */
export function computeChecksum(text?: string | null): string {
  return createHash('sha256').update(text ?? '', 'utf-8').digest('hex');
}
