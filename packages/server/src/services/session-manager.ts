import type { TransmissionMode } from '@session-warden/shared';
import { DEFAULT_STORE_TIMEOUT_MS, TRANSMISSION_COOKIE } from '../config/constants.js';
import type { CredentialHasher } from '../crypto/password-hasher.js';
import { generateRandomBase64Url } from '../crypto/random.js';
import type { TokenCodec } from '../crypto/token-codec.js';
import { AuthError, ERROR_DUPLICATE_ID, ERROR_NOT_FOUND, capture, err, ok } from '../errors/index.js';
import type { Result } from '../errors/index.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import type { OriginPolicyGuard } from '../security/origin-policy.js';
import type { IAccountStorage } from '../storage/interfaces/account-storage.js';
import type { ISessionStorage } from '../storage/interfaces/session-storage.js';
import { systemClock, type Clock } from '../types/clock.js';
import { SessionId, type AccountId } from '../types/identifier.js';
import type { Account, SessionAttributes, SessionRecord } from '../types/session.js';
import { callStore } from './store-call.js';

// A fresh id collides with probability 2^-128; one retry is plenty
const MAX_START_ATTEMPTS = 2;

export interface SessionManagerOptions {
  sessions: ISessionStorage;
  accounts: IAccountStorage;
  hasher: CredentialHasher;
  codec: TokenCodec;
  guard: OriginPolicyGuard;
  sessionTtl: number; // seconds
  slidingExpiration?: boolean;
  storeTimeoutMs?: number;
  clock?: Clock;
  logger?: Logger;
}

export interface StartSessionOptions {
  ttlSeconds?: number;
  attributes?: SessionAttributes;
}

export interface StartedSession {
  token: string;
  record: SessionRecord;
}

export interface VerifyRequestInput {
  token: string | undefined;
  transport: TransmissionMode;
  origin?: string;
  fetchSite?: string;
}

/**
 * Credential ids are emails; compare them case-insensitively
 */
export function normalizeCredentialId(credentialId: string): string {
  return credentialId.trim().toLowerCase();
}

/**
 * Session manager
 *
 * Issues, verifies and revokes sessions. Expected failures come back as
 * `Result` values; the manager holds no mutable state besides the cached
 * dummy hash.
 */
export class SessionManager {
  private readonly sessions: ISessionStorage;
  private readonly accounts: IAccountStorage;
  private readonly hasher: CredentialHasher;
  private readonly codec: TokenCodec;
  private readonly guard: OriginPolicyGuard;
  private readonly sessionTtl: number;
  private readonly slidingExpiration: boolean;
  private readonly storeTimeoutMs: number;
  private readonly clock: Clock;
  private readonly log: Logger;
  private dummyHashPromise: Promise<string> | null = null;

  constructor(options: SessionManagerOptions) {
    this.sessions = options.sessions;
    this.accounts = options.accounts;
    this.hasher = options.hasher;
    this.codec = options.codec;
    this.guard = options.guard;
    this.sessionTtl = options.sessionTtl;
    this.slidingExpiration = options.slidingExpiration ?? false;
    this.storeTimeoutMs = options.storeTimeoutMs ?? DEFAULT_STORE_TIMEOUT_MS;
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? createSilentLogger()).child({ component: 'session-manager' });
  }

  get usesSlidingExpiration(): boolean {
    return this.slidingExpiration;
  }

  /**
   * Compute the dummy hash ahead of the first sign-in attempt
   */
  async warmUp(): Promise<void> {
    await this.dummyHash();
  }

  /**
   * Check a credential pair
   *
   * Unknown account, wrong password and a malformed stored hash all yield the
   * same `invalid_credentials`. An unknown account still pays for one hash
   * verification against the dummy hash.
   */
  async authenticate(credentialId: string, plaintext: string): Promise<Result<AccountId>> {
    const normalized = normalizeCredentialId(credentialId);

    const lookup = await this.store('accounts.findByCredentialId', () =>
      this.accounts.findByCredentialId(normalized)
    );
    if (!lookup.ok) {
      return this.reject('credentials.rejected', lookup.error);
    }

    const account = lookup.value;
    const encodedHash = account?.passwordHash ?? (await this.dummyHash());
    const valid = await this.verifyHash(encodedHash, plaintext, account);

    if (!account) {
      return this.reject('credentials.rejected', AuthError.invalidCredentials(), {
        reason: 'unknown_account',
      });
    }
    if (!valid) {
      return this.reject('credentials.rejected', AuthError.invalidCredentials(), {
        subjectId: account.id.toString(),
        reason: 'wrong_password',
      });
    }

    await this.rehashIfNeeded(account, plaintext);
    this.log.info({ event: 'credentials.accepted', subjectId: account.id.toString() });
    return ok(account.id);
  }

  /**
   * Create and store a session for an already authenticated subject
   */
  async startSession(
    subjectId: AccountId,
    options: StartSessionOptions = {}
  ): Promise<Result<StartedSession>> {
    const ttl = options.ttlSeconds ?? this.sessionTtl;

    for (let attempt = 1; attempt <= MAX_START_ATTEMPTS; attempt++) {
      const createdAt = this.clock.now();
      const record: SessionRecord = {
        id: SessionId.generate(),
        subjectId,
        createdAt,
        // A non-positive ttl yields a session that is already expired
        expiresAt: new Date(createdAt.getTime() + Math.max(0, ttl) * 1000),
        attributes: { ...options.attributes },
      };

      const stored = await this.store('sessions.put', () => this.sessions.put(record));
      if (stored.ok) {
        this.log.info({
          event: 'session.started',
          subjectId: subjectId.toString(),
          expiresAt: record.expiresAt.toISOString(),
        });
        return ok({ token: this.codec.encode(record.id), record });
      }
      if (stored.error.code !== ERROR_DUPLICATE_ID) {
        return this.reject('session.start_failed', stored.error, { subjectId: subjectId.toString() });
      }
      this.log.warn({ event: 'session.id_collision', attempt });
    }

    return this.reject(
      'session.start_failed',
      AuthError.duplicateId('Could not allocate a unique session id'),
      { subjectId: subjectId.toString() }
    );
  }

  /**
   * Resolve a presented token to its live session record
   */
  async verifySession(token: string): Promise<Result<SessionRecord>> {
    const decoded = this.codec.decode(token);
    if (!decoded.ok) {
      return this.reject('session.rejected', AuthError.invalidToken());
    }

    const id = SessionId.fromBytes(decoded.id);
    const found = await this.store('sessions.get', () => this.sessions.get(id));
    if (!found.ok) {
      return this.reject('session.rejected', found.error);
    }

    const record = found.value;
    if (!record) {
      return this.reject('session.rejected', AuthError.sessionExpired());
    }

    if (!this.slidingExpiration) {
      return ok(record);
    }

    const expiresAt = new Date(this.clock.now().getTime() + this.sessionTtl * 1000);
    if (expiresAt.getTime() <= record.expiresAt.getTime()) {
      return ok(record);
    }

    const touched = await this.store('sessions.touch', () => this.sessions.touch(id, expiresAt));
    if (!touched.ok) {
      // Deleted between the read and the touch
      const error = touched.error.code === ERROR_NOT_FOUND ? AuthError.sessionExpired() : touched.error;
      return this.reject('session.rejected', error, { subjectId: record.subjectId.toString() });
    }

    return ok({ ...record, expiresAt });
  }

  /**
   * Verify the session of an incoming request
   *
   * Cookie transport is subject to the origin policy before the token is
   * even looked at.
   */
  async verifyRequest(input: VerifyRequestInput): Promise<Result<SessionRecord>> {
    if (input.transport === TRANSMISSION_COOKIE) {
      const decision = this.guard.check({ origin: input.origin, fetchSite: input.fetchSite });
      if (!decision.allowed) {
        return this.reject('origin.rejected', AuthError.originNotAllowed(input.origin), {
          reason: decision.reason,
        });
      }
    }

    if (!input.token) {
      return this.reject('session.rejected', AuthError.invalidToken('No session token presented'));
    }

    return this.verifySession(input.token);
  }

  /**
   * End one session. Ending an unknown, expired or undecodable session
   * succeeds.
   */
  async endSession(token: string): Promise<Result<void>> {
    const decoded = this.codec.decode(token);
    if (!decoded.ok) {
      this.log.debug({ event: 'session.end_ignored', reason: 'undecodable' });
      return ok(undefined);
    }

    const id = SessionId.fromBytes(decoded.id);
    const deleted = await this.store('sessions.delete', () => this.sessions.delete(id));
    if (!deleted.ok) {
      return this.reject('session.end_failed', deleted.error);
    }

    this.log.info({ event: 'session.ended' });
    return ok(undefined);
  }

  /**
   * End every session of a subject ("sign out everywhere")
   */
  async endAllSessions(subjectId: AccountId): Promise<Result<number>> {
    const deleted = await this.store('sessions.deleteAllForSubject', () =>
      this.sessions.deleteAllForSubject(subjectId)
    );
    if (!deleted.ok) {
      return this.reject('session.end_all_failed', deleted.error, { subjectId: subjectId.toString() });
    }

    this.log.info({ event: 'session.ended_all', subjectId: subjectId.toString(), revoked: deleted.value });
    return deleted;
  }

  /**
   * Authenticate and start a session in one step
   */
  async signIn(
    credentialId: string,
    plaintext: string,
    options: StartSessionOptions = {}
  ): Promise<Result<StartedSession>> {
    const authenticated = await this.authenticate(credentialId, plaintext);
    if (!authenticated.ok) {
      return err(authenticated.error);
    }
    return this.startSession(authenticated.value, options);
  }

  /**
   * Physically remove expired session records
   */
  async sweepExpired(): Promise<Result<number>> {
    const swept = await this.store('sessions.deleteExpired', () => this.sessions.deleteExpired());
    if (!swept.ok) {
      return this.reject('session.sweep_failed', swept.error);
    }
    if (swept.value > 0) {
      this.log.debug({ event: 'session.swept', removed: swept.value });
    }
    return swept;
  }

  private store<T>(operation: string, call: () => Promise<T>): Promise<Result<T>> {
    return capture(() => callStore(operation, this.storeTimeoutMs, call));
  }

  private reject<T>(
    event: string,
    error: AuthError,
    fields: Record<string, string> = {}
  ): Result<T> {
    const level = error.statusCode >= 500 ? 'warn' : 'info';
    this.log[level]({ event, code: error.code, ...fields }, error.description);
    return err(error);
  }

  private dummyHash(): Promise<string> {
    if (!this.dummyHashPromise) {
      this.dummyHashPromise = this.hasher
        .hash(generateRandomBase64Url(32))
        .catch((error: unknown) => {
          this.dummyHashPromise = null;
          throw error;
        });
    }
    return this.dummyHashPromise;
  }

  private async verifyHash(
    encodedHash: string,
    plaintext: string,
    account: Account | null
  ): Promise<boolean> {
    try {
      return await this.hasher.verify(encodedHash, plaintext);
    } catch (error) {
      if (!(error instanceof AuthError)) {
        throw error;
      }
      this.log.error(
        { event: 'credentials.malformed_hash', subjectId: account?.id.toString(), code: error.code },
        error.description
      );
      return false;
    }
  }

  private async rehashIfNeeded(account: Account, plaintext: string): Promise<void> {
    if (!this.hasher.needsRehash(account.passwordHash)) {
      return;
    }

    const passwordHash = await this.hasher.hash(plaintext);
    const rehashed = await this.store('accounts.updatePasswordHash', () =>
      this.accounts.updatePasswordHash(account.id, passwordHash)
    );

    if (rehashed.ok) {
      this.log.info({ event: 'credentials.rehashed', subjectId: account.id.toString() });
    } else {
      this.log.warn(
        { event: 'credentials.rehash_failed', subjectId: account.id.toString(), code: rehashed.error.code },
        rehashed.error.description
      );
    }
  }
}
