import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { CookieSameSite, TransmissionMode } from '@session-warden/shared';
import {
  DEFAULT_ONE_TIME_TOKEN_TTL,
  DEFAULT_RATE_LIMIT_MAX_REQUESTS,
  DEFAULT_RATE_LIMIT_WINDOW_MS,
  DEFAULT_SESSION_COOKIE_NAME,
  DEFAULT_SESSION_TTL,
  DEFAULT_STORE_RETRY_ATTEMPTS,
  DEFAULT_STORE_RETRY_BASE_DELAY_MS,
  DEFAULT_STORE_TIMEOUT_MS,
  HEADER_AUTHORIZATION,
  MAX_COOKIE_MAX_AGE,
  HEADER_WWW_AUTHENTICATE,
  TRANSMISSION_COOKIE,
  type SigningAlgorithm,
} from './config/constants.js';
import { Argon2CredentialHasher, type CredentialHasher } from './crypto/password-hasher.js';
import { HmacSigner, type SigningKeyInput } from './crypto/signer.js';
import { TokenCodec } from './crypto/token-codec.js';
import { createLogger, type Logger } from './logging/logger.js';
import { createErrorHandler, requestLogger, securityHeaders } from './middleware/error-handler.js';
import { requireSession } from './middleware/session-auth.js';
import type { SessionTransportOptions } from './middleware/session-transport.js';
import { createAuthorizationTokenRoutes, createPasswordRoutes, createSessionRoutes } from './routes/index.js';
import { OriginPolicyGuard } from './security/origin-policy.js';
import { AccountService } from './services/account-service.js';
import { AuthorizationTokenService } from './services/authorization-token-service.js';
import type { RetryOptions } from './services/retry.js';
import { SessionManager } from './services/session-manager.js';
import type { IStorage } from './storage/interfaces/index.js';
import { systemClock, type Clock } from './types/clock.js';
import type { SessionVariables } from './types/hono.js';

export interface SessionServerOptions {
  storage: IStorage;
  signingKey: SigningKeyInput | undefined;
  previousSigningKeys?: SigningKeyInput[];
  algorithm?: SigningAlgorithm;
  hasher?: CredentialHasher;
  session?: {
    ttl?: number; // seconds
    slidingExpiration?: boolean;
    transmission?: TransmissionMode;
    cookieName?: string;
    cookieSameSite?: CookieSameSite;
    cookieIsolation?: boolean;
  };
  allowedOrigins?: string[];
  oneTimeTokenTtl?: number; // seconds
  store?: {
    timeoutMs?: number;
    retryAttempts?: number;
    retryBaseDelayMs?: number;
  };
  rateLimit?: {
    windowMs: number;
    maxRequests: number;
  };
  logger?: Logger;
  enableLogging?: boolean;
  /**
   * Send Strict-Transport-Security (production behind TLS)
   */
  hsts?: boolean;
  clock?: Clock;
}

export interface SessionServer {
  app: Hono<{ Variables: SessionVariables }>;
  sessions: SessionManager;
  accounts: AccountService;
  authorizationTokens: AuthorizationTokenService;
}

/**
 * Create the session service application
 *
 * Throws at startup on a missing or short signing key, on a session ttl
 * above the cookie Max-Age limit, on a wildcard origin combined with cookie
 * transmission, or on SameSite=None cookies without an origin allow-list.
 */
export function createSessionServer(options: SessionServerOptions): SessionServer {
  const {
    storage,
    signingKey,
    previousSigningKeys = [],
    algorithm,
    hasher = new Argon2CredentialHasher(),
    session = {},
    allowedOrigins = [],
    oneTimeTokenTtl = DEFAULT_ONE_TIME_TOKEN_TTL,
    store = {},
    rateLimit = {
      windowMs: DEFAULT_RATE_LIMIT_WINDOW_MS,
      maxRequests: DEFAULT_RATE_LIMIT_MAX_REQUESTS,
    },
    logger = createLogger(),
    enableLogging = true,
    hsts = false,
    clock = systemClock,
  } = options;

  const transport: SessionTransportOptions = {
    transmission: session.transmission ?? TRANSMISSION_COOKIE,
    cookieName: session.cookieName ?? DEFAULT_SESSION_COOKIE_NAME,
    sameSite: session.cookieSameSite ?? 'Strict',
    isolation: session.cookieIsolation ?? false,
  };
  const sessionTtl = session.ttl ?? DEFAULT_SESSION_TTL;

  if (sessionTtl > MAX_COOKIE_MAX_AGE) {
    throw new Error(`Session ttl must not exceed ${MAX_COOKIE_MAX_AGE} seconds`);
  }
  if (
    transport.transmission === TRANSMISSION_COOKIE &&
    transport.sameSite === 'None' &&
    allowedOrigins.length === 0
  ) {
    throw new Error('SameSite=None session cookies require an explicit origin allow-list');
  }

  const retry: RetryOptions = {
    attempts: store.retryAttempts ?? DEFAULT_STORE_RETRY_ATTEMPTS,
    baseDelayMs: store.retryBaseDelayMs ?? DEFAULT_STORE_RETRY_BASE_DELAY_MS,
  };
  const storeTimeoutMs = store.timeoutMs ?? DEFAULT_STORE_TIMEOUT_MS;

  const signer = new HmacSigner({ currentKey: signingKey, previousKeys: previousSigningKeys, algorithm });
  const codec = new TokenCodec(signer);
  const guard = new OriginPolicyGuard({ allowedOrigins, transmission: transport.transmission });

  const sessions = new SessionManager({
    sessions: storage.sessions,
    accounts: storage.accounts,
    hasher,
    codec,
    guard,
    sessionTtl,
    slidingExpiration: session.slidingExpiration,
    storeTimeoutMs,
    clock,
    logger,
  });
  const accounts = new AccountService({
    accounts: storage.accounts,
    hasher,
    sessionManager: sessions,
    storeTimeoutMs,
    logger,
  });
  const authorizationTokens = new AuthorizationTokenService({
    tokens: storage.authorizationTokens,
    codec,
    defaultTtl: oneTimeTokenTtl,
    storeTimeoutMs,
    clock,
    logger,
  });

  const app = new Hono<{ Variables: SessionVariables }>();
  const httpLogger = logger.child({ component: 'http' });

  // Global error handler
  app.onError(createErrorHandler(httpLogger));

  // Security headers
  app.use('*', securityHeaders({ hsts }));

  // Logging
  if (enableLogging) {
    app.use('*', requestLogger(httpLogger));
  }

  // CORS only for the configured front ends; credentials allowed for cookies
  if (allowedOrigins.length > 0) {
    app.use(
      '*',
      cors({
        origin: allowedOrigins,
        credentials: transport.transmission === TRANSMISSION_COOKIE,
        allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
        allowHeaders: [HEADER_AUTHORIZATION, 'Content-Type'],
        exposeHeaders: [HEADER_WWW_AUTHENTICATE],
        maxAge: 86400,
      })
    );
  }

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok' }));

  const sessionRequired = requireSession({ manager: sessions, transport, retry, clock });

  app.route(
    '/sessions',
    createSessionRoutes({
      manager: sessions,
      guard,
      transport,
      retry,
      rateLimit,
      requireSession: sessionRequired,
      clock,
      logger: httpLogger,
    })
  );

  app.route(
    '/password',
    createPasswordRoutes({
      accounts,
      manager: sessions,
      transport,
      requireSession: sessionRequired,
      clock,
    })
  );

  app.route(
    '/authorization-tokens',
    createAuthorizationTokenRoutes({
      tokens: authorizationTokens,
      retry,
      requireSession: sessionRequired,
    })
  );

  return { app, sessions, accounts, authorizationTokens };
}
