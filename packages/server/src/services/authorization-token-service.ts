import { DEFAULT_ONE_TIME_TOKEN_TTL, DEFAULT_STORE_TIMEOUT_MS } from '../config/constants.js';
import { isValidPurpose, type TokenCodec } from '../crypto/token-codec.js';
import { AuthError, capture, err, ok, type Result } from '../errors/index.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import type { IAuthorizationTokenStorage } from '../storage/interfaces/authorization-token-storage.js';
import { systemClock, type Clock } from '../types/clock.js';
import { AuthorizationTokenId, type AccountId } from '../types/identifier.js';
import type { AuthorizationTokenRecord } from '../types/session.js';
import { callStore } from './store-call.js';

export interface AuthorizationTokenServiceOptions {
  tokens: IAuthorizationTokenStorage;
  codec: TokenCodec;
  defaultTtl?: number; // seconds
  storeTimeoutMs?: number;
  clock?: Clock;
  logger?: Logger;
}

export interface IssueAuthorizationTokenOptions {
  oneTime?: boolean;
  ttlSeconds?: number;
}

export interface IssuedAuthorizationToken {
  token: string;
  record: AuthorizationTokenRecord;
}

/**
 * Purpose-bound tokens (email verification, password reset, ...)
 *
 * The purpose is part of the signed message, so a token issued for one
 * purpose fails signature verification under any other.
 */
export class AuthorizationTokenService {
  private readonly tokens: IAuthorizationTokenStorage;
  private readonly codec: TokenCodec;
  private readonly defaultTtl: number;
  private readonly storeTimeoutMs: number;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(options: AuthorizationTokenServiceOptions) {
    this.tokens = options.tokens;
    this.codec = options.codec;
    this.defaultTtl = options.defaultTtl ?? DEFAULT_ONE_TIME_TOKEN_TTL;
    this.storeTimeoutMs = options.storeTimeoutMs ?? DEFAULT_STORE_TIMEOUT_MS;
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? createSilentLogger()).child({ component: 'authorization-tokens' });
  }

  async issue(
    subjectId: AccountId,
    purpose: string,
    options: IssueAuthorizationTokenOptions = {}
  ): Promise<Result<IssuedAuthorizationToken>> {
    if (!isValidPurpose(purpose)) {
      return err(AuthError.invalidRequest('Invalid token purpose'));
    }

    const createdAt = this.clock.now();
    const ttl = options.ttlSeconds ?? this.defaultTtl;
    const record: AuthorizationTokenRecord = {
      id: AuthorizationTokenId.generate(),
      subjectId,
      purpose,
      oneTime: options.oneTime ?? true,
      createdAt,
      expiresAt: new Date(createdAt.getTime() + Math.max(0, ttl) * 1000),
    };

    const stored = await this.store('authorizationTokens.put', () => this.tokens.put(record));
    if (!stored.ok) {
      this.log.warn({ event: 'authorization_token.issue_failed', purpose, code: stored.error.code });
      return err(stored.error);
    }

    this.log.info({
      event: 'authorization_token.issued',
      subjectId: subjectId.toString(),
      purpose,
      oneTime: record.oneTime,
    });
    return ok({ token: this.codec.encode(record.id, purpose), record });
  }

  /**
   * Check a token for a purpose. One-time tokens are consumed by a
   * successful verification; losing the race to consume one denies access.
   */
  async verify(token: string, purpose: string): Promise<Result<AuthorizationTokenRecord>> {
    const decoded = this.codec.decode(token, purpose);
    if (!decoded.ok) {
      return this.reject(purpose, AuthError.invalidToken());
    }

    const id = AuthorizationTokenId.fromBytes(decoded.id);
    const found = await this.store('authorizationTokens.get', () => this.tokens.get(id));
    if (!found.ok) {
      return this.reject(purpose, found.error);
    }

    const record = found.value;
    if (!record || record.purpose !== purpose) {
      return this.reject(purpose, AuthError.sessionExpired('Authorization token is not live'));
    }

    if (record.oneTime) {
      const consumed = await this.store('authorizationTokens.delete', () => this.tokens.delete(id));
      if (!consumed.ok) {
        return this.reject(purpose, consumed.error);
      }
      if (!consumed.value) {
        return this.reject(purpose, AuthError.sessionExpired('Authorization token already used'));
      }
    }

    this.log.info({
      event: 'authorization_token.accepted',
      subjectId: record.subjectId.toString(),
      purpose,
    });
    return ok(record);
  }

  /**
   * Invalidate a token. Unknown or undecodable tokens are already invalid.
   */
  async revoke(token: string, purpose: string): Promise<Result<void>> {
    const decoded = this.codec.decode(token, purpose);
    if (!decoded.ok) {
      return ok(undefined);
    }

    const id = AuthorizationTokenId.fromBytes(decoded.id);
    const deleted = await this.store('authorizationTokens.delete', () => this.tokens.delete(id));
    if (!deleted.ok) {
      return err(deleted.error);
    }
    return ok(undefined);
  }

  async sweepExpired(): Promise<Result<number>> {
    return this.store('authorizationTokens.deleteExpired', () => this.tokens.deleteExpired());
  }

  private store<T>(operation: string, call: () => Promise<T>): Promise<Result<T>> {
    return capture(() => callStore(operation, this.storeTimeoutMs, call));
  }

  private reject<T>(purpose: string, error: AuthError): Result<T> {
    this.log.info({ event: 'authorization_token.rejected', purpose, code: error.code }, error.description);
    return err(error);
  }
}
