/**
 * Redis Fixed Playlist Store
 *
 * Keeps corrected playlists in Redis with an expiry. Ids are only ever
 * written with SET NX, so a generated id has at most one writer.
 *
 * Uses REDIS_URL or localhost:6379.
 */

import Redis from 'ioredis';
import { CHECKER_CONFIG } from '@/lib/config';
import { createLogger } from '@/lib/logger';
import { generateFixedPlaylistId, isFixedPlaylistId } from './fixed-playlist-id';
import type { FixedPlaylistStore } from './fixed-playlist-store';

const logger = createLogger('FixedPlaylistStore');

/**
 * Fresh ids tried before giving up on a put
 */
const MAX_PUT_ATTEMPTS = 3;

export interface RedisFixedPlaylistStoreOptions {
  redisUrl?: string;
  ttlSeconds?: number;
  keyPrefix?: string;
}

/**
 * Fixed playlist store using Redis
 *
 * The connection is opened on first use and shared by every later call. A
 * store that failed to connect stays unavailable until it is closed.
 */
export class RedisFixedPlaylistStore implements FixedPlaylistStore {
  private readonly redisUrl: string;
  private readonly ttlSeconds: number;
  private readonly keyPrefix: string;
  private connection: Promise<Redis | null> | null = null;
  private client: Redis | null = null;

  constructor(options: RedisFixedPlaylistStoreOptions = {}) {
    this.redisUrl = options.redisUrl ?? process.env.REDIS_URL ?? 'redis://localhost:6379';
    this.ttlSeconds = options.ttlSeconds ?? CHECKER_CONFIG.fixedPlaylistTtlSeconds;
    this.keyPrefix = options.keyPrefix ?? CHECKER_CONFIG.fixedPlaylistKeyPrefix;
  }

  private connect(): Promise<Redis | null> {
    if (!this.connection) {
      this.connection = this.openConnection();
    }
    return this.connection;
  }

  private async openConnection(): Promise<Redis | null> {
    const redis = new Redis(this.redisUrl, {
      lazyConnect: true,
      enableOfflineQueue: false,
      maxRetriesPerRequest: 1,
      retryStrategy: () => null,
    });

    redis.on('error', (err: Error) => {
      logger.warn('Fixed playlist store connection error', { message: err.message });
    });
    redis.on('end', () => {
      if (this.client === redis) {
        this.client = null;
      }
    });

    try {
      await redis.connect();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('Fixed playlist store is unreachable', { message });
      redis.disconnect();
      return null;
    }

    this.client = redis;
    return redis;
  }

  /**
   * Store content under a fresh id
   *
   * @throws When Redis is unavailable or no free id was found
   */
  async put(content: string): Promise<string> {
    const redis = await this.connect();
    if (!redis) {
      throw new Error('Fixed playlist store is unavailable');
    }

    for (let attempt = 0; attempt < MAX_PUT_ATTEMPTS; attempt++) {
      const id = generateFixedPlaylistId();
      const result = await redis.set(`${this.keyPrefix}${id}`, content, 'EX', this.ttlSeconds, 'NX');
      if (result === 'OK') {
        logger.debug('Stored fixed playlist', { id, bytes: content.length });
        return id;
      }
    }

    throw new Error(`No free fixed playlist id after ${MAX_PUT_ATTEMPTS} attempts`);
  }

  /**
   * Get stored content
   *
   * @returns Content, or null if not found, malformed id or Redis unavailable
   */
  async get(id: string): Promise<string | null> {
    if (!isFixedPlaylistId(id)) {
      return null;
    }

    const redis = await this.connect();
    if (!redis) {
      return null;
    }

    try {
      return await redis.get(`${this.keyPrefix}${id}`);
    } catch (error) {
      logger.error('Error reading fixed playlist', error, { id });
      return null;
    }
  }

  /**
   * Close the Redis connection
   */
  async close(): Promise<void> {
    const redis = this.client;
    this.client = null;
    this.connection = null;
    if (redis) {
      await redis.quit();
    }
  }

  isRedisConnected(): boolean {
    return this.client !== null;
  }
}
