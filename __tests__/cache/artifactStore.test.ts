import { describe, it, expect } from 'vitest';
import { MemoryArtifactStore, RedisArtifactStore } from '../../src/cache/artifactStore.js';
import { CacheError } from '../../src/errors/index.js';
import { FakeRedis } from '../fixtures/fakes.js';

describe('artifactStore', () => {
  describe('MemoryArtifactStore', () => {
    it('should keep artifacts per game', async () => {
      const store = new MemoryArtifactStore();
      await store.set('2023020001', 'shifts', '[]');
      await store.set('2023020001', 'changes', '[1]');
      await store.set('2023020002', 'shifts', '[2]');

      expect(await store.get('2023020001', 'shifts')).toBe('[]');
      expect(await store.get('2023020001', 'rosters')).toBeUndefined();
      expect(await store.kinds('2023020001')).toEqual(['changes', 'shifts']);
    });

    it('should invalidate selected kinds or the whole game', async () => {
      const store = new MemoryArtifactStore();
      await store.set('2023020001', 'shifts', '[]');
      await store.set('2023020001', 'changes', '[]');

      await store.invalidate('2023020001', ['changes']);
      expect(await store.kinds('2023020001')).toEqual(['shifts']);

      await store.invalidate('2023020001');
      expect(await store.kinds('2023020001')).toEqual([]);
    });
  });

  describe('RedisArtifactStore', () => {
    it('should keep one hash per game under the prefix', async () => {
      const redis = new FakeRedis();
      const store = new RedisArtifactStore(redis, 'test');
      await store.set('2023020001', 'shifts', '[]');

      expect([...redis.hashes.keys()]).toEqual(['test:game:2023020001']);
      expect(await store.get('2023020001', 'shifts')).toBe('[]');
      expect(await store.get('2023020001', 'changes')).toBeUndefined();
    });

    it('should list and invalidate kinds', async () => {
      const redis = new FakeRedis();
      const store = new RedisArtifactStore(redis, 'test');
      await store.set('2023020001', 'shifts', '[]');
      await store.set('2023020001', 'changes', '[]');
      await store.set('2023020001', 'rosters', '[]');

      expect(await store.kinds('2023020001')).toEqual(['changes', 'rosters', 'shifts']);
      await store.invalidate('2023020001', ['changes', 'rosters']);
      expect(await store.kinds('2023020001')).toEqual(['shifts']);
      await store.invalidate('2023020001', []);
      expect(await store.kinds('2023020001')).toEqual(['shifts']);
      await store.invalidate('2023020001');
      expect(redis.hashes.size).toBe(0);
    });

    it('should wrap client failures in CacheError', async () => {
      const redis = new FakeRedis();
      const store = new RedisArtifactStore(redis, 'test');
      redis.failNext = new Error('connection reset');

      const err = await store.get('2023020001', 'shifts').catch((e: unknown) => e);
      expect(err).toBeInstanceOf(CacheError);
      expect(err).toMatchObject({
        operation: 'hget',
        code: 'CACHE_ERROR',
        message: 'Redis hget failed for game 2023020001: connection reset',
      });
    });
  });
});
