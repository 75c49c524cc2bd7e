import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import type { CookieSameSite, TransmissionMode } from '@session-warden/shared';
import * as constants from './constants.js';
import type { SigningAlgorithm } from './constants.js';
import type { Argon2Params } from '../crypto/password-hasher.js';

type Env = Record<string, string | undefined>;

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(env: Env, envVar: string): string | undefined {
  // Check for file-based secret first (Docker secrets pattern)
  const filePath = env[`${envVar}_FILE`];

  if (filePath) {
    if (!existsSync(filePath)) {
      throw new Error(`${envVar}_FILE points to a missing file: ${filePath}`);
    }
    return readFileSync(filePath, 'utf-8').trim();
  }

  // Fall back to direct environment variable
  return env[envVar];
}

/**
 * "false" and "0" are false, everything else is true
 */
const booleanTransform = (s: string) => s !== 'false' && s !== '0';

const listTransform = (s: string) =>
  s
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('0.0.0.0'),
  DATABASE_URL: z.string().url().optional(),
  EMBEDDED_DB_DIR: z.string().optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  SESSION_SIGNING_ALGORITHM: z.enum(constants.SUPPORTED_SIGNING_ALGORITHMS).default('sha256'),
  SESSION_TTL: z.coerce
    .number()
    .int()
    .nonnegative()
    .max(constants.MAX_COOKIE_MAX_AGE)
    .default(constants.DEFAULT_SESSION_TTL),
  SESSION_SLIDING_EXPIRATION: z.string().default('false').transform(booleanTransform),
  SESSION_TRANSMISSION: z
    .enum([constants.TRANSMISSION_COOKIE, constants.TRANSMISSION_HEADER])
    .default(constants.TRANSMISSION_COOKIE),
  SESSION_COOKIE_NAME: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/)
    .default(constants.DEFAULT_SESSION_COOKIE_NAME),
  SESSION_COOKIE_SAME_SITE: z.enum(['Strict', 'Lax', 'None']).default('Strict'),
  SESSION_COOKIE_ISOLATION: z.string().default('false').transform(booleanTransform),
  ALLOWED_ORIGINS: z.string().default('').transform(listTransform),
  ARGON2_MEMORY_COST: z.coerce.number().int().positive().default(constants.DEFAULT_ARGON2_MEMORY_COST),
  ARGON2_TIME_COST: z.coerce.number().int().positive().default(constants.DEFAULT_ARGON2_TIME_COST),
  ARGON2_PARALLELISM: z.coerce.number().int().positive().default(constants.DEFAULT_ARGON2_PARALLELISM),
  ONE_TIME_TOKEN_TTL: z.coerce.number().int().positive().default(constants.DEFAULT_ONE_TIME_TOKEN_TTL),
  STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(constants.DEFAULT_STORE_TIMEOUT_MS),
  STORE_RETRY_ATTEMPTS: z.coerce.number().int().positive().default(constants.DEFAULT_STORE_RETRY_ATTEMPTS),
  STORE_RETRY_BASE_DELAY_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(constants.DEFAULT_STORE_RETRY_BASE_DELAY_MS),
  SWEEP_INTERVAL_MS: z.coerce.number().int().nonnegative().default(constants.DEFAULT_SWEEP_INTERVAL_MS),
  DEV_ACCOUNT_EMAIL: z.string().email().optional(),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(constants.DEFAULT_RATE_LIMIT_WINDOW_MS),
  RATE_LIMIT_MAX_REQUESTS: z.coerce
    .number()
    .int()
    .positive()
    .default(constants.DEFAULT_RATE_LIMIT_MAX_REQUESTS),
});

/**
 * Application configuration loaded from environment
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: 'development' | 'production' | 'test';
  };
  database: {
    url: string | undefined;
    embeddedDir: string | undefined;
  };
  secrets: {
    signingKey: string | undefined;
    previousSigningKeys: string[];
  };
  logging: {
    level: string;
  };
  session: {
    algorithm: SigningAlgorithm;
    ttl: number; // seconds
    slidingExpiration: boolean;
    transmission: TransmissionMode;
    cookieName: string;
    cookieSameSite: CookieSameSite;
    cookieIsolation: boolean;
  };
  origins: {
    allowed: string[];
  };
  hasher: Argon2Params;
  authorizationTokens: {
    oneTimeTtl: number; // seconds
  };
  store: {
    timeoutMs: number;
    retryAttempts: number;
    retryBaseDelayMs: number;
  };
  rateLimit: {
    windowMs: number;
    maxRequests: number;
  };
  sweepIntervalMs: number; // 0 disables the periodic sweep
  devAccount: { email: string; password: string } | undefined;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: Env = process.env): Config {
  const parsed = EnvSchema.parse(env);

  if (parsed.SESSION_TRANSMISSION === constants.TRANSMISSION_COOKIE) {
    if (parsed.ALLOWED_ORIGINS.includes(constants.WILDCARD_ORIGIN)) {
      throw new Error('ALLOWED_ORIGINS must not contain "*" when sessions travel in cookies');
    }
    if (parsed.SESSION_COOKIE_SAME_SITE === 'None' && parsed.ALLOWED_ORIGINS.length === 0) {
      throw new Error('SESSION_COOKIE_SAME_SITE=None requires an explicit ALLOWED_ORIGINS list');
    }
  }

  const devPassword = readSecret(env, 'DEV_ACCOUNT_PASSWORD');

  return {
    server: {
      port: parsed.PORT,
      host: parsed.HOST,
      nodeEnv: parsed.NODE_ENV,
    },
    database: {
      url: parsed.DATABASE_URL,
      embeddedDir: parsed.EMBEDDED_DB_DIR,
    },
    secrets: {
      signingKey: readSecret(env, 'SESSION_SIGNING_KEY'),
      previousSigningKeys: listTransform(readSecret(env, 'SESSION_SIGNING_KEYS_PREVIOUS') ?? ''),
    },
    logging: {
      level: parsed.LOG_LEVEL,
    },
    session: {
      algorithm: parsed.SESSION_SIGNING_ALGORITHM,
      ttl: parsed.SESSION_TTL,
      slidingExpiration: parsed.SESSION_SLIDING_EXPIRATION,
      transmission: parsed.SESSION_TRANSMISSION,
      cookieName: parsed.SESSION_COOKIE_NAME,
      cookieSameSite: parsed.SESSION_COOKIE_SAME_SITE,
      cookieIsolation: parsed.SESSION_COOKIE_ISOLATION,
    },
    origins: {
      allowed: parsed.ALLOWED_ORIGINS,
    },
    hasher: {
      memoryCost: parsed.ARGON2_MEMORY_COST,
      timeCost: parsed.ARGON2_TIME_COST,
      parallelism: parsed.ARGON2_PARALLELISM,
    },
    authorizationTokens: {
      oneTimeTtl: parsed.ONE_TIME_TOKEN_TTL,
    },
    store: {
      timeoutMs: parsed.STORE_TIMEOUT_MS,
      retryAttempts: parsed.STORE_RETRY_ATTEMPTS,
      retryBaseDelayMs: parsed.STORE_RETRY_BASE_DELAY_MS,
    },
    rateLimit: {
      windowMs: parsed.RATE_LIMIT_WINDOW_MS,
      maxRequests: parsed.RATE_LIMIT_MAX_REQUESTS,
    },
    sweepIntervalMs: parsed.SWEEP_INTERVAL_MS,
    devAccount:
      parsed.DEV_ACCOUNT_EMAIL && devPassword
        ? { email: parsed.DEV_ACCOUNT_EMAIL, password: devPassword }
        : undefined,
  };
}

// Re-export constants
export { constants };
