import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { PGlite } from '@electric-sql/pglite';
import { sql } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/pglite';
import { migrate } from 'drizzle-orm/pglite/migrator';
import type { Database } from '../../storage/drizzle/client.js';
import { MIGRATIONS_FOLDER, createDrizzleStorage } from '../../storage/drizzle/index.js';
import * as schema from '../../storage/drizzle/schema.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import { createMemoryStorage } from '../../storage/memory/index.js';
import { AccountId, AuthorizationTokenId, SessionId } from '../../types/identifier.js';
import type { AuthorizationTokenRecord, SessionRecord } from '../../types/session.js';
import { TestClock } from '../test-utils.js';

interface Backend {
  setUp(): Promise<void>;
  create(clock: TestClock): Promise<IStorage>;
  tearDown(): Promise<void>;
}

const memoryBackend: Backend = {
  setUp: async () => {},
  create: async (clock) => createMemoryStorage(clock),
  tearDown: async () => {},
};

function pgliteBackend(): Backend {
  let client: PGlite | null = null;
  let db: Database | null = null;

  return {
    async setUp() {
      client = new PGlite();
      const migrated = drizzle(client, { schema });
      await migrate(migrated, { migrationsFolder: MIGRATIONS_FOLDER });
      // The journal skips migrations already applied
      await migrate(migrated, { migrationsFolder: MIGRATIONS_FOLDER });
      db = migrated;
    },
    async create(clock) {
      if (!db) {
        throw new Error('PGlite backend not set up');
      }
      await db.execute(sql.raw('TRUNCATE sessions, accounts, authorization_tokens'));
      return createDrizzleStorage(db, clock);
    },
    async tearDown() {
      await client?.close();
    },
  };
}

const backends: Array<[string, Backend]> = [
  ['memory', memoryBackend],
  ['drizzle (PGlite)', pgliteBackend()],
];

describe.each(backends)('%s storage', (_name, backend) => {
  let clock: TestClock;
  let storage: IStorage;

  beforeAll(async () => {
    await backend.setUp();
  });

  afterAll(async () => {
    await backend.tearDown();
  });

  beforeEach(async () => {
    clock = new TestClock();
    storage = await backend.create(clock);
  });

  function sessionRecord(subjectId: AccountId, ttlSeconds: number = 60): SessionRecord {
    const createdAt = clock.now();
    return {
      id: SessionId.generate(),
      subjectId,
      createdAt,
      expiresAt: new Date(createdAt.getTime() + ttlSeconds * 1000),
      attributes: {},
    };
  }

  describe('sessions', () => {
    it('should store and load a record', async () => {
      const record = { ...sessionRecord(AccountId.generate()), attributes: { device: 'laptop', mfa: true } };

      await storage.sessions.put(record);
      const loaded = await storage.sessions.get(record.id);

      expect(loaded).not.toBeNull();
      expect(loaded?.id.equals(record.id)).toBe(true);
      expect(loaded?.subjectId.equals(record.subjectId)).toBe(true);
      expect(loaded?.createdAt.getTime()).toBe(record.createdAt.getTime());
      expect(loaded?.expiresAt.getTime()).toBe(record.expiresAt.getTime());
      expect(loaded?.attributes).toEqual({ device: 'laptop', mfa: true });
    });

    it('should refuse a duplicate id', async () => {
      const record = sessionRecord(AccountId.generate());
      await storage.sessions.put(record);

      await expect(storage.sessions.put(record)).rejects.toMatchObject({ code: 'duplicate_id' });
    });

    it('should return null for an unknown id', async () => {
      expect(await storage.sessions.get(SessionId.generate())).toBeNull();
    });

    it('should treat a record as absent from its expiry instant', async () => {
      const record = sessionRecord(AccountId.generate(), 60);
      await storage.sessions.put(record);

      clock.advance(59);
      expect(await storage.sessions.get(record.id)).not.toBeNull();

      clock.advance(1);
      expect(await storage.sessions.get(record.id)).toBeNull();
    });

    it('should move the expiry of a live record', async () => {
      const record = sessionRecord(AccountId.generate(), 60);
      await storage.sessions.put(record);

      const extended = new Date(clock.now().getTime() + 120_000);
      await storage.sessions.touch(record.id, extended);

      expect((await storage.sessions.get(record.id))?.expiresAt.getTime()).toBe(extended.getTime());
    });

    it('should not touch an absent or expired record', async () => {
      const record = sessionRecord(AccountId.generate(), 60);
      await storage.sessions.put(record);
      clock.advance(60);

      const later = new Date(clock.now().getTime() + 60_000);
      await expect(storage.sessions.touch(record.id, later)).rejects.toMatchObject({ code: 'not_found' });
      await expect(storage.sessions.touch(SessionId.generate(), later)).rejects.toMatchObject({
        code: 'not_found',
      });
    });

    it('should delete idempotently', async () => {
      const record = sessionRecord(AccountId.generate());
      await storage.sessions.put(record);

      await storage.sessions.delete(record.id);
      await storage.sessions.delete(record.id);

      expect(await storage.sessions.get(record.id)).toBeNull();
    });

    it('should delete every session of one subject only', async () => {
      const subject = AccountId.generate();
      const other = AccountId.generate();
      const mine = [sessionRecord(subject), sessionRecord(subject), sessionRecord(subject)];
      const theirs = sessionRecord(other);
      for (const record of [...mine, theirs]) {
        await storage.sessions.put(record);
      }

      expect(await storage.sessions.deleteAllForSubject(subject)).toBe(3);
      for (const record of mine) {
        expect(await storage.sessions.get(record.id)).toBeNull();
      }
      expect(await storage.sessions.get(theirs.id)).not.toBeNull();
      expect(await storage.sessions.deleteAllForSubject(subject)).toBe(0);
    });

    it('should sweep expired records only', async () => {
      const subject = AccountId.generate();
      const short = sessionRecord(subject, 10);
      const long = sessionRecord(subject, 100);
      await storage.sessions.put(short);
      await storage.sessions.put(long);

      clock.advance(10);

      expect(await storage.sessions.deleteExpired()).toBe(1);
      expect(await storage.sessions.get(long.id)).not.toBeNull();
    });
  });

  describe('accounts', () => {
    it('should create and find an account', async () => {
      const created = await storage.accounts.create({
        credentialId: 'carol@example.com',
        passwordHash: '$argon2id$placeholder',
      });

      expect(created.createdAt.getTime()).toBe(clock.now().getTime());
      expect((await storage.accounts.findByCredentialId('carol@example.com'))?.id.equals(created.id)).toBe(true);
      expect((await storage.accounts.findById(created.id))?.credentialId).toBe('carol@example.com');
      expect(await storage.accounts.findByCredentialId('dave@example.com')).toBeNull();
    });

    it('should refuse a taken credential id', async () => {
      await storage.accounts.create({ credentialId: 'carol@example.com', passwordHash: 'h1' });

      await expect(
        storage.accounts.create({ credentialId: 'carol@example.com', passwordHash: 'h2' })
      ).rejects.toMatchObject({ code: 'duplicate_id' });
    });

    it('should replace the password hash', async () => {
      const created = await storage.accounts.create({ credentialId: 'carol@example.com', passwordHash: 'h1' });

      await storage.accounts.updatePasswordHash(created.id, 'h2');

      expect((await storage.accounts.findById(created.id))?.passwordHash).toBe('h2');
      await expect(storage.accounts.updatePasswordHash(AccountId.generate(), 'h3')).rejects.toMatchObject({
        code: 'not_found',
      });
    });
  });

  describe('authorization tokens', () => {
    function tokenRecord(ttlSeconds: number = 60): AuthorizationTokenRecord {
      const createdAt = clock.now();
      return {
        id: AuthorizationTokenId.generate(),
        subjectId: AccountId.generate(),
        purpose: 'email-verify',
        oneTime: true,
        createdAt,
        expiresAt: new Date(createdAt.getTime() + ttlSeconds * 1000),
      };
    }

    it('should store and load a record', async () => {
      const record = tokenRecord();
      await storage.authorizationTokens.put(record);

      const loaded = await storage.authorizationTokens.get(record.id);

      expect(loaded?.purpose).toBe('email-verify');
      expect(loaded?.oneTime).toBe(true);
      expect(loaded?.subjectId.equals(record.subjectId)).toBe(true);
    });

    it('should report a successful delete exactly once', async () => {
      const record = tokenRecord();
      await storage.authorizationTokens.put(record);

      expect(await storage.authorizationTokens.delete(record.id)).toBe(true);
      expect(await storage.authorizationTokens.delete(record.id)).toBe(false);
    });

    it('should not report deleting an expired record', async () => {
      const record = tokenRecord(60);
      await storage.authorizationTokens.put(record);
      clock.advance(60);

      expect(await storage.authorizationTokens.get(record.id)).toBeNull();
      expect(await storage.authorizationTokens.delete(record.id)).toBe(false);
    });

    it('should sweep expired records', async () => {
      await storage.authorizationTokens.put(tokenRecord(10));
      const live = tokenRecord(100);
      await storage.authorizationTokens.put(live);
      clock.advance(10);

      expect(await storage.authorizationTokens.deleteExpired()).toBe(1);
      expect(await storage.authorizationTokens.get(live.id)).not.toBeNull();
    });
  });
});
