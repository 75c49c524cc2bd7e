import { DEFAULT_STORE_TIMEOUT_MS, MAX_PASSWORD_LENGTH, MIN_PASSWORD_LENGTH } from '../config/constants.js';
import type { CredentialHasher } from '../crypto/password-hasher.js';
import { AuthError, capture, err, ok, type Result } from '../errors/index.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import type { IAccountStorage } from '../storage/interfaces/account-storage.js';
import type { AccountId } from '../types/identifier.js';
import type { Account } from '../types/session.js';
import { normalizeCredentialId, type SessionManager } from './session-manager.js';
import { callStore } from './store-call.js';

export interface AccountServiceOptions {
  accounts: IAccountStorage;
  hasher: CredentialHasher;
  sessionManager: SessionManager;
  storeTimeoutMs?: number;
  logger?: Logger;
}

function checkPasswordPolicy(password: string): AuthError | null {
  if (password.length < MIN_PASSWORD_LENGTH) {
    return AuthError.invalidRequest(`Password must be at least ${MIN_PASSWORD_LENGTH} characters`);
  }
  if (password.length > MAX_PASSWORD_LENGTH) {
    return AuthError.invalidRequest(`Password must be at most ${MAX_PASSWORD_LENGTH} characters`);
  }
  return null;
}

/**
 * Account registration and password changes
 */
export class AccountService {
  private readonly accounts: IAccountStorage;
  private readonly hasher: CredentialHasher;
  private readonly sessionManager: SessionManager;
  private readonly storeTimeoutMs: number;
  private readonly log: Logger;

  constructor(options: AccountServiceOptions) {
    this.accounts = options.accounts;
    this.hasher = options.hasher;
    this.sessionManager = options.sessionManager;
    this.storeTimeoutMs = options.storeTimeoutMs ?? DEFAULT_STORE_TIMEOUT_MS;
    this.log = (options.logger ?? createSilentLogger()).child({ component: 'accounts' });
  }

  async register(credentialId: string, password: string): Promise<Result<Account>> {
    const policyError = checkPasswordPolicy(password);
    if (policyError) {
      return err(policyError);
    }

    const passwordHash = await this.hasher.hash(password);
    const created = await this.store('accounts.create', () =>
      this.accounts.create({ credentialId: normalizeCredentialId(credentialId), passwordHash })
    );
    if (!created.ok) {
      this.log.warn({ event: 'account.register_failed', code: created.error.code });
      return created;
    }

    this.log.info({ event: 'account.registered', subjectId: created.value.id.toString() });
    return created;
  }

  /**
   * Replace a subject's password after re-checking the current one, then
   * end every session the subject holds
   */
  async changePassword(
    subjectId: AccountId,
    currentPassword: string,
    newPassword: string
  ): Promise<Result<void>> {
    const policyError = checkPasswordPolicy(newPassword);
    if (policyError) {
      return err(policyError);
    }

    const found = await this.store('accounts.findById', () => this.accounts.findById(subjectId));
    if (!found.ok) {
      return found;
    }

    const account = found.value;
    if (!account) {
      return err(AuthError.invalidCredentials());
    }

    const verified = await capture(() => this.hasher.verify(account.passwordHash, currentPassword));
    if (!verified.ok || !verified.value) {
      this.log.info({ event: 'account.password_change_rejected', subjectId: subjectId.toString() });
      return err(AuthError.invalidCredentials());
    }

    const passwordHash = await this.hasher.hash(newPassword);
    const updated = await this.store('accounts.updatePasswordHash', () =>
      this.accounts.updatePasswordHash(subjectId, passwordHash)
    );
    if (!updated.ok) {
      return updated;
    }

    const revoked = await this.sessionManager.endAllSessions(subjectId);
    if (!revoked.ok) {
      return err(revoked.error);
    }

    this.log.info({
      event: 'account.password_changed',
      subjectId: subjectId.toString(),
      revoked: revoked.value,
    });
    return ok(undefined);
  }

  private store<T>(operation: string, call: () => Promise<T>): Promise<Result<T>> {
    return capture(() => callStore(operation, this.storeTimeoutMs, call));
  }
}
