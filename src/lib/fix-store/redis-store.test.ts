/**
 * Redis Fixed Playlist Store Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RedisFixedPlaylistStore } from './redis-store';

const mockRedis = vi.hoisted(() => ({
  get: vi.fn(),
  set: vi.fn(),
  quit: vi.fn(),
  connect: vi.fn(),
  disconnect: vi.fn(),
  on: vi.fn(),
}));

vi.mock('ioredis', () => ({
  default: vi.fn(() => mockRedis),
}));

const ID = 'a'.repeat(32);

describe('RedisFixedPlaylistStore', () => {
  let store: RedisFixedPlaylistStore;

  beforeEach(() => {
    vi.clearAllMocks();
    mockRedis.connect.mockResolvedValue(undefined);
    store = new RedisFixedPlaylistStore({ redisUrl: 'redis://localhost:6379', ttlSeconds: 120 });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('put', () => {
    it('writes with an expiry and only if the id is unused', async () => {
      mockRedis.set.mockResolvedValueOnce('OK');

      const id = await store.put('#EXTM3U\n');

      expect(id).toMatch(/^[0-9a-f]{32}$/);
      expect(mockRedis.set).toHaveBeenCalledWith(`checker:fixed:${id}`, '#EXTM3U\n', 'EX', 120, 'NX');
    });

    it('retries with a fresh id when the first is taken', async () => {
      mockRedis.set.mockResolvedValueOnce(null).mockResolvedValueOnce('OK');

      const id = await store.put('content');

      expect(mockRedis.set).toHaveBeenCalledTimes(2);
      expect(mockRedis.set.mock.calls[1][0]).toBe(`checker:fixed:${id}`);
      expect(mockRedis.set.mock.calls[0][0]).not.toBe(mockRedis.set.mock.calls[1][0]);
    });

    it('gives up after repeated collisions', async () => {
      mockRedis.set.mockResolvedValue(null);

      await expect(store.put('content')).rejects.toThrow('No free fixed playlist id after 3 attempts');
      expect(mockRedis.set).toHaveBeenCalledTimes(3);
    });

    it('rejects when Redis is unreachable and does not reconnect', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      mockRedis.connect.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

      await expect(store.put('content')).rejects.toThrow('Fixed playlist store is unavailable');
      expect(await store.get(ID)).toBeNull();
      expect(mockRedis.connect).toHaveBeenCalledTimes(1);
      expect(mockRedis.disconnect).toHaveBeenCalledTimes(1);
      expect(mockRedis.set).not.toHaveBeenCalled();
      expect(store.isRedisConnected()).toBe(false);
    });

    it('honors a custom key prefix', async () => {
      mockRedis.set.mockResolvedValueOnce('OK');
      const prefixed = new RedisFixedPlaylistStore({ keyPrefix: 'test:' });

      const id = await prefixed.put('content');

      expect(mockRedis.set.mock.calls[0][0]).toBe(`test:${id}`);
      expect(mockRedis.set.mock.calls[0][3]).toBe(3600);
    });
  });

  describe('get', () => {
    it('returns stored content', async () => {
      mockRedis.get.mockResolvedValueOnce('#EXTM3U\n');

      expect(await store.get(ID)).toBe('#EXTM3U\n');
      expect(mockRedis.get).toHaveBeenCalledWith(`checker:fixed:${ID}`);
    });

    it('returns null when the entry is missing', async () => {
      mockRedis.get.mockResolvedValueOnce(null);
      expect(await store.get(ID)).toBeNull();
    });

    it('shares one connection between concurrent calls', async () => {
      mockRedis.get.mockResolvedValue(null);

      await Promise.all([store.get(ID), store.get(ID), store.get(ID)]);

      expect(mockRedis.connect).toHaveBeenCalledTimes(1);
      expect(mockRedis.get).toHaveBeenCalledTimes(3);
      expect(store.isRedisConnected()).toBe(true);
    });

    it('returns null for malformed ids without touching Redis', async () => {
      expect(await store.get('../../etc')).toBeNull();
      expect(mockRedis.connect).not.toHaveBeenCalled();
    });

    it('returns null on Redis error', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      mockRedis.get.mockRejectedValueOnce(new Error('Redis connection failed'));

      expect(await store.get(ID)).toBeNull();
      expect(error).toHaveBeenCalledTimes(1);
    });
  });

  describe('close', () => {
    it('quits an open connection', async () => {
      mockRedis.get.mockResolvedValueOnce(null);
      await store.get(ID);

      await store.close();

      expect(mockRedis.quit).toHaveBeenCalledTimes(1);
      expect(store.isRedisConnected()).toBe(false);
    });

    it('does nothing before the first connection', async () => {
      await store.close();
      expect(mockRedis.quit).not.toHaveBeenCalled();
    });
  });
});
