import { randomBytes } from 'node:crypto';
import { IDENTIFIER_LENGTH } from '../config/constants.js';

/**
 * Generate cryptographically secure random identifier bytes
 */
export function generateIdentifierBytes(length: number = IDENTIFIER_LENGTH): Buffer {
  return randomBytes(length);
}

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length).toString('base64url');
}
