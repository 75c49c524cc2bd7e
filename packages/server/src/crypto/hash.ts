import { createHash } from 'node:crypto';

/**
 * Hash a value using SHA-256 and return as base64url
 */
export function sha256Base64Url(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('base64url');
}
