/**
 * Session service constants
 */

// Identifier length (bytes). 128 bits of entropy.
export const IDENTIFIER_LENGTH = 16;

// Signing algorithms (HMAC) and their output lengths in bytes
export const SIGNING_ALGORITHM_SHA256 = 'sha256' as const;
export const SIGNING_ALGORITHM_SHA512 = 'sha512' as const;

export const SUPPORTED_SIGNING_ALGORITHMS = [
  SIGNING_ALGORITHM_SHA256,
  SIGNING_ALGORITHM_SHA512,
] as const;

export type SigningAlgorithm = (typeof SUPPORTED_SIGNING_ALGORITHMS)[number];

export const SIGNATURE_LENGTHS: Record<SigningAlgorithm, number> = {
  [SIGNING_ALGORITHM_SHA256]: 32,
  [SIGNING_ALGORITHM_SHA512]: 64,
};

// Minimum signing key length (bytes)
export const MIN_SIGNING_KEY_LENGTH = 32;

// Longest token string the codec will attempt to decode
export const MAX_TOKEN_LENGTH = 512;

// Authorization token purposes: letters, digits, '.', '_', '-'
export const PURPOSE_PATTERN = /^[a-z0-9][a-z0-9._-]{0,63}$/i;

// Transmission
export const TRANSMISSION_COOKIE = 'cookie' as const;
export const TRANSMISSION_HEADER = 'header' as const;
export const DEFAULT_SESSION_COOKIE_NAME = '__session';
export const WILDCARD_ORIGIN = '*';

// Browsers cap cookie lifetime at 400 days
export const MAX_COOKIE_MAX_AGE = 34560000;

// Characters of the origin digest appended to an isolated cookie name (72 bits)
export const COOKIE_ISOLATION_SUFFIX_LENGTH = 12;

// Default TTLs (in seconds)
export const DEFAULT_SESSION_TTL = 86400; // 24 hours
export const DEFAULT_ONE_TIME_TOKEN_TTL = 3600; // 1 hour

// Argon2id defaults (OWASP minimum: 19 MiB, 2 iterations, 1 lane)
export const DEFAULT_ARGON2_MEMORY_COST = 19456; // KiB
export const DEFAULT_ARGON2_TIME_COST = 2;
export const DEFAULT_ARGON2_PARALLELISM = 1;

// Password policy
export const MIN_PASSWORD_LENGTH = 8;
export const MAX_PASSWORD_LENGTH = 1024;

// Legacy scrypt parameters
export const SCRYPT_SALT_LENGTH = 16;

// Store call bounds
export const DEFAULT_STORE_TIMEOUT_MS = 2000;
export const DEFAULT_STORE_RETRY_ATTEMPTS = 3;
export const DEFAULT_STORE_RETRY_BASE_DELAY_MS = 50;

// Expired record cleanup
export const DEFAULT_SWEEP_INTERVAL_MS = 300000; // 5 minutes

// Rate limiting defaults (sign-in endpoint)
export const DEFAULT_RATE_LIMIT_WINDOW_MS = 60000; // 1 minute
export const DEFAULT_RATE_LIMIT_MAX_REQUESTS = 10;

// HTTP headers
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_ORIGIN = 'Origin';
export const HEADER_SEC_FETCH_SITE = 'Sec-Fetch-Site';
export const HEADER_WWW_AUTHENTICATE = 'WWW-Authenticate';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';

// Cache control for auth responses
export const AUTH_CACHE_CONTROL = 'no-store';
export const AUTH_PRAGMA = 'no-cache';
