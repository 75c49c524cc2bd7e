import { describe, it, expect, beforeEach } from 'vitest';
import { HmacSigner } from '../../crypto/signer.js';
import { TokenCodec } from '../../crypto/token-codec.js';
import { unwrap } from '../../errors/result.js';
import { OriginPolicyGuard } from '../../security/origin-policy.js';
import { AccountService } from '../../services/account-service.js';
import { SessionManager } from '../../services/session-manager.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import { createMemoryStorage } from '../../storage/memory/index.js';
import { TEST_SIGNING_KEY, TestClock, createTestHasher } from '../test-utils.js';

describe('AccountService', () => {
  let storage: IStorage;
  let manager: SessionManager;
  let service: AccountService;

  beforeEach(() => {
    const clock = new TestClock();
    const hasher = createTestHasher();
    storage = createMemoryStorage(clock);
    manager = new SessionManager({
      sessions: storage.sessions,
      accounts: storage.accounts,
      hasher,
      codec: new TokenCodec(new HmacSigner({ currentKey: TEST_SIGNING_KEY })),
      guard: new OriginPolicyGuard({ allowedOrigins: [], transmission: 'header' }),
      sessionTtl: 3600,
      clock,
    });
    service = new AccountService({ accounts: storage.accounts, hasher, sessionManager: manager });
  });

  it('should register with a normalized credential id and a hashed password', async () => {
    const account = unwrap(await service.register(' Carol@Example.com', 'test-password-1'));

    expect(account.credentialId).toBe('carol@example.com');
    expect(account.passwordHash.startsWith('$argon2id$')).toBe(true);
    expect((await manager.authenticate('carol@example.com', 'test-password-1')).ok).toBe(true);
  });

  it('should refuse a duplicate credential id', async () => {
    unwrap(await service.register('carol@example.com', 'test-password-1'));

    const again = await service.register('CAROL@example.com', 'test-password-2');

    expect(!again.ok && again.error.code).toBe('duplicate_id');
  });

  it('should enforce the password length policy', async () => {
    const short = await service.register('carol@example.com', 'short');
    const long = await service.register('carol@example.com', 'x'.repeat(1025));

    expect(!short.ok && short.error.description).toBe('Password must be at least 8 characters');
    expect(!long.ok && long.error.description).toBe('Password must be at most 1024 characters');
  });

  it('should change the password and end every session', async () => {
    const account = unwrap(await service.register('carol@example.com', 'test-password-1'));
    const { token } = unwrap(await manager.startSession(account.id));

    unwrap(await service.changePassword(account.id, 'test-password-1', 'test-password-2'));

    expect((await manager.verifySession(token)).ok).toBe(false);
    expect((await manager.authenticate('carol@example.com', 'test-password-1')).ok).toBe(false);
    expect((await manager.authenticate('carol@example.com', 'test-password-2')).ok).toBe(true);
  });

  it('should keep sessions when the current password is wrong', async () => {
    const account = unwrap(await service.register('carol@example.com', 'test-password-1'));
    const { token } = unwrap(await manager.startSession(account.id));

    const result = await service.changePassword(account.id, 'not-the-password', 'test-password-2');

    expect(!result.ok && result.error.code).toBe('invalid_credentials');
    expect((await manager.verifySession(token)).ok).toBe(true);
  });

  it('should refuse a password change when the stored hash is unusable', async () => {
    const account = unwrap(await service.register('carol@example.com', 'test-password-1'));
    const salt = Buffer.alloc(16, 1).toString('base64');
    const hash = Buffer.alloc(32, 2).toString('base64');
    await storage.accounts.updatePasswordHash(account.id, `$scrypt$1000$8$1$${salt}$${hash}`);

    const result = await service.changePassword(account.id, 'test-password-1', 'test-password-2');

    expect(!result.ok && result.error.code).toBe('invalid_credentials');
  });
});
