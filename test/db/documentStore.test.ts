import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DatabaseConnection } from '../../src/db/database.js';
import { DocumentStore } from '../../src/db/documentStore.js';
import { ChallengeCollection, SolveCollection, UserCollection } from '../../src/db/schemas.js';
import { Challenge } from '../../src/db/types/ctf.types.js';

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

const challenge = (overrides: Partial<Challenge> = {}): Challenge => ({
  title: 'Warmup',
  description: 'Find the flag',
  flag_hash: 'a'.repeat(64),
  points: 100,
  author: 'anonymous',
  tags: null,
  is_active: true,
  ...overrides,
});

describe('DocumentStore', () => {
  let db: DatabaseConnection;
  let store: DocumentStore;

  beforeEach(async () => {
    db = new DatabaseConnection({ connectionString: 'sqlite::memory:' });
    await db.initialize();
    store = new DocumentStore(db.getAdapter());
  });

  afterEach(async () => {
    await db.close();
  });

  describe('create', () => {
    it('should return a generated UUID', async () => {
      const id = await store.create(ChallengeCollection, challenge());
      expect(id).toMatch(UUID);
    });

    it('should generate a distinct id per document', async () => {
      const first = await store.create(ChallengeCollection, challenge());
      const second = await store.create(ChallengeCollection, challenge());
      expect(first).not.toBe(second);
    });

    it('should round-trip tags, booleans and nulls', async () => {
      const id = await store.create(ChallengeCollection, challenge({ tags: ['web', 'easy'] }));

      const stored = await store.findById(ChallengeCollection, id);

      expect(stored).toMatchObject({
        _id: id,
        title: 'Warmup',
        tags: ['web', 'easy'],
        is_active: true,
        points: 100,
      });
      expect(stored?.created_at).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.000Z$/);
      expect(stored?.updated_at).toBe(stored?.created_at);
    });

    it('should reject points beyond the largest exact integer before writing', async () => {
      await expect(
        store.create(ChallengeCollection, challenge({ points: Number.MAX_SAFE_INTEGER + 1 }))
      ).rejects.toMatchObject({
        statusCode: 422,
        message: 'points must be at most 9007199254740991',
        field: 'points',
      });
      expect(await store.findMany(ChallengeCollection, {}, 10)).toEqual([]);
    });

    it('should keep points above the 32-bit range', async () => {
      const id = await store.create(ChallengeCollection, challenge({ points: 3000000000 }));

      const stored = await store.findById(ChallengeCollection, id);

      expect(stored?.points).toBe(3000000000);
    });

    it('should reject a negative points value before writing', async () => {
      await expect(store.create(ChallengeCollection, challenge({ points: -1 }))).rejects.toMatchObject({
        statusCode: 422,
        field: 'points',
      });
      expect(await store.findMany(ChallengeCollection, { is_active: true }, 10)).toEqual([]);
    });

    it('should report a unique index violation as a 500', async () => {
      const user = {
        username: 'alice',
        email: 'alice@example.com',
        password_hash: 'b'.repeat(64),
        bio: null,
        avatar_url: null,
      };
      await store.create(UserCollection, user);

      await expect(store.create(UserCollection, user)).rejects.toMatchObject({
        statusCode: 500,
        message: 'Database operation failed',
      });
    });
  });

  describe('findOne', () => {
    it('should return null when nothing matches', async () => {
      expect(await store.findOne(ChallengeCollection, { title: 'missing' })).toBeNull();
    });

    it('should match every field of an equality filter', async () => {
      await store.create(ChallengeCollection, challenge({ title: 'A', points: 10 }));
      const id = await store.create(ChallengeCollection, challenge({ title: 'A', points: 20 }));

      const found = await store.findOne(ChallengeCollection, { title: 'A', points: 20 });

      expect(found?._id).toBe(id);
    });

    it('should match any clause of an $or filter', async () => {
      const id = await store.create(UserCollection, {
        username: 'alice',
        email: 'alice@example.com',
        password_hash: 'b'.repeat(64),
        bio: null,
        avatar_url: null,
      });

      const byEmail = await store.findOne(UserCollection, {
        $or: [{ username: 'someone-else' }, { email: 'alice@example.com' }],
      });
      const neither = await store.findOne(UserCollection, {
        $or: [{ username: 'bob' }, { email: 'bob@example.com' }],
      });

      expect(byEmail?._id).toBe(id);
      expect(neither).toBeNull();
    });
  });

  describe('findMany', () => {
    it('should filter and cap the result at the limit', async () => {
      for (let i = 0; i < 5; i++) {
        await store.create(ChallengeCollection, challenge({ title: `active-${i}` }));
      }
      await store.create(ChallengeCollection, challenge({ title: 'hidden', is_active: false }));

      const all = await store.findMany(ChallengeCollection, { is_active: true }, 100);
      const capped = await store.findMany(ChallengeCollection, { is_active: true }, 3);

      expect(all.map((c) => c.title)).toEqual(['active-0', 'active-1', 'active-2', 'active-3', 'active-4']);
      expect(capped).toHaveLength(3);
    });
  });

  describe('aggregate', () => {
    it('should sum per group, highest total first', async () => {
      const solve = (username: string, points: number) =>
        store.create(SolveCollection, { challenge_id: 'c', username, points });

      await solve('alice', 100);
      await solve('bob', 300);
      await solve('alice', 250);
      await solve('carol', 50);

      const totals = await store.aggregate(SolveCollection, {
        groupBy: 'username',
        sum: 'points',
        limit: 10,
      });

      expect(totals).toEqual([
        { key: 'alice', total: 350 },
        { key: 'bob', total: 300 },
        { key: 'carol', total: 50 },
      ]);
    });

    it('should break ties by key and apply the limit', async () => {
      await store.create(SolveCollection, { challenge_id: 'c', username: 'zed', points: 10 });
      await store.create(SolveCollection, { challenge_id: 'c', username: 'amy', points: 10 });
      await store.create(SolveCollection, { challenge_id: 'c', username: 'max', points: 5 });

      const totals = await store.aggregate(SolveCollection, {
        groupBy: 'username',
        sum: 'points',
        limit: 2,
      });

      expect(totals).toEqual([
        { key: 'amy', total: 10 },
        { key: 'zed', total: 10 },
      ]);
    });

    it('should return nothing for an empty collection', async () => {
      const totals = await store.aggregate(SolveCollection, {
        groupBy: 'username',
        sum: 'points',
        limit: 50,
      });
      expect(totals).toEqual([]);
    });
  });

  describe('diagnostics', () => {
    it('should list application collections only', async () => {
      expect(await store.listCollections(10)).toEqual(['challenge', 'solve', 'user']);
    });

    it('should respect the collection limit', async () => {
      expect(await store.listCollections(2)).toEqual(['challenge', 'solve']);
    });

    it('should name an in-memory database', async () => {
      expect(await store.databaseName()).toBe(':memory:');
    });
  });
});
