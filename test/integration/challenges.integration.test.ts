import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import { Errors } from '../../src/utils/errors.js';
import { createTestContext, seedChallenge, TestContext } from '../utils/test-helpers.js';

describe('Challenges API', () => {
  let ctx: TestContext;

  const warmup = {
    title: 'Warmup',
    description: 'Find the flag',
    flag: 'flag{abc}',
    points: 100,
    tags: ['web', 'easy'],
  };

  beforeEach(async () => {
    ctx = await createTestContext();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await ctx.db.close();
  });

  describe('POST /api/challenges', () => {
    it('should store the challenge with a flag digest', async () => {
      const res = await request(ctx.app).post('/api/challenges').send(warmup);

      expect(res.status).toBe(200);
      expect(res.body.ok).toBe(true);

      const stored = await ctx.challengesRepo.findById(res.body.challenge_id);
      expect(stored).toMatchObject({
        title: 'Warmup',
        description: 'Find the flag',
        flag_hash: ctx.hashing.digest('flag{abc}'),
        points: 100,
        author: 'anonymous',
        tags: ['web', 'easy'],
        is_active: true,
      });
    });

    it('should accept a challenge without tags', async () => {
      const { tags: _tags, ...untagged } = warmup;
      const res = await request(ctx.app).post('/api/challenges').send(untagged);

      expect(res.status).toBe(200);
      const stored = await ctx.challengesRepo.findById(res.body.challenge_id);
      expect(stored?.tags).toBeNull();
    });

    it('should reject negative points', async () => {
      const res = await request(ctx.app)
        .post('/api/challenges')
        .send({ ...warmup, points: -10 });

      expect(res.status).toBe(422);
      expect(res.body).toEqual({
        error: { message: 'points must be a non-negative integer', field: 'points' },
      });
    });

    it('should reject points too large to total exactly', async () => {
      const res = await request(ctx.app)
        .post('/api/challenges')
        .send({ ...warmup, points: 1e20 });

      expect(res.status).toBe(422);
      expect(res.body).toEqual({
        error: { message: 'points must be at most 9007199254740991', field: 'points' },
      });
    });

    it('should accept points above the 32-bit range', async () => {
      const res = await request(ctx.app)
        .post('/api/challenges')
        .send({ ...warmup, points: 3000000000 });

      expect(res.status).toBe(200);
      const stored = await ctx.challengesRepo.findById(res.body.challenge_id);
      expect(stored?.points).toBe(3000000000);
    });

    it('should reject a missing flag', async () => {
      const { flag: _flag, ...noFlag } = warmup;
      const res = await request(ctx.app).post('/api/challenges').send(noFlag);

      expect(res.status).toBe(422);
      expect(res.body).toEqual({ error: { message: 'flag is required', field: 'flag' } });
    });
  });

  describe('GET /api/challenges', () => {
    it('should list active challenges without flag digests', async () => {
      const created = await request(ctx.app).post('/api/challenges').send(warmup);

      const res = await request(ctx.app).get('/api/challenges');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        ok: true,
        items: [
          {
            _id: created.body.challenge_id,
            title: 'Warmup',
            description: 'Find the flag',
            points: 100,
            author: 'anonymous',
            tags: ['web', 'easy'],
            is_active: true,
            created_at: expect.any(String),
            updated_at: expect.any(String),
          },
        ],
      });
      expect(res.body.items[0]).not.toHaveProperty('flag_hash');
    });

    it('should leave out inactive challenges', async () => {
      await seedChallenge(ctx, { title: 'Live' });
      await seedChallenge(ctx, { title: 'Retired', isActive: false });

      const res = await request(ctx.app).get('/api/challenges');

      expect(res.body.items).toHaveLength(1);
      expect(res.body.items[0].title).toBe('Live');
    });

    it('should return at most 100 challenges', async () => {
      for (let i = 0; i < 105; i++) {
        await seedChallenge(ctx, { title: `Challenge ${i}` });
      }

      const res = await request(ctx.app).get('/api/challenges');

      expect(res.body.items).toHaveLength(100);
    });

    it('should return an empty list when nothing is active', async () => {
      const res = await request(ctx.app).get('/api/challenges');

      expect(res.body).toEqual({ ok: true, items: [] });
    });

    it('should surface store failures as a 500', async () => {
      vi.spyOn(ctx.challengesRepo, 'findActive').mockRejectedValue(
        Errors.internal('Database operation failed')
      );

      const res = await request(ctx.app).get('/api/challenges');

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ error: { message: 'Database operation failed' } });
    });
  });
});
