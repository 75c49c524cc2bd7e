const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*$/;

/**
 * Encode bytes as base64url without padding
 */
export function encodeBase64Url(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64url');
}

/**
 * Strict base64url decoding
 *
 * Node's decoder silently skips characters outside the alphabet, so the input
 * is checked first and then re-encoded: only the canonical encoding of a byte
 * string is accepted. Returns null for anything else.
 */
export function decodeBase64Url(value: string): Buffer | null {
  if (!BASE64URL_PATTERN.test(value) || value.length % 4 === 1) {
    return null;
  }

  const bytes = Buffer.from(value, 'base64url');
  if (bytes.toString('base64url') !== value) {
    return null;
  }

  return bytes;
}
