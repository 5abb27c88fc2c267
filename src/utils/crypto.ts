import { createHash } from 'crypto';

/**
 * Generate a SHA-256 hash of a string
 */
export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

/**
 * Generate a short hash (8 characters)
 */
export function shortHash(input: string): string {
  return sha256(input).substring(0, 8);
}
