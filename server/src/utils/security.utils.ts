/**
 * Security Utilities
 * Hashing helpers so resource identifiers never appear raw in info-level logs
 */

import crypto from 'crypto';

/**
 * SHA-256 hash truncated to 12 hex chars
 */
export function hashForLog(value: string | undefined): string {
  if (!value) return 'none';
  return crypto.createHash('sha256').update(value).digest('hex').substring(0, 12);
}

/**
 * Constant-time string comparison (hashes first so lengths never leak)
 */
export function safeEqual(a: string, b: string): boolean {
  const left = crypto.createHash('sha256').update(a).digest();
  const right = crypto.createHash('sha256').update(b).digest();
  return crypto.timingSafeEqual(left, right);
}
