/**
 * Fixed Playlist Store
 *
 * Short-lived storage for corrected playlists, so a caller can hand out an
 * id and serve the download later.
 */

import { CHECKER_CONFIG, getCheckerConfig, type CheckerConfig } from '@/lib/config';
import { generateFixedPlaylistId } from './fixed-playlist-id';
import { RedisFixedPlaylistStore } from './redis-store';

export interface FixedPlaylistStore {
  /** Store content and return its new id */
  put(content: string): Promise<string>;
  /** Content for an id, or null when unknown or expired */
  get(id: string): Promise<string | null>;
}

interface MemoryEntry {
  content: string;
  expiresAt: number;
}

/**
 * In-process store with per-entry expiry
 */
export class MemoryFixedPlaylistStore implements FixedPlaylistStore {
  private entries = new Map<string, MemoryEntry>();
  private ttlSeconds: number;
  private now: () => number;

  constructor(ttlSeconds: number = CHECKER_CONFIG.fixedPlaylistTtlSeconds, now: () => number = Date.now) {
    this.ttlSeconds = ttlSeconds;
    this.now = now;
  }

  async put(content: string): Promise<string> {
    this.purgeExpired();

    let id = generateFixedPlaylistId();
    while (this.entries.has(id)) {
      id = generateFixedPlaylistId();
    }

    this.entries.set(id, { content, expiresAt: this.now() + this.ttlSeconds * 1000 });
    return id;
  }

  async get(id: string): Promise<string | null> {
    const entry = this.entries.get(id);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(id);
      return null;
    }
    return entry.content;
  }

  /**
   * Number of stored entries, expired ones included until purged
   */
  get size(): number {
    return this.entries.size;
  }

  purgeExpired(): void {
    const now = this.now();
    for (const [id, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(id);
      }
    }
  }
}

/**
 * Store for the given configuration: Redis when a URL is configured,
 * otherwise in memory
 */
export function createFixedPlaylistStore(config: CheckerConfig = getCheckerConfig()): FixedPlaylistStore {
  if (config.redisUrl) {
    return new RedisFixedPlaylistStore({
      redisUrl: config.redisUrl,
      ttlSeconds: config.fixedPlaylistTtlSeconds,
    });
  }
  return new MemoryFixedPlaylistStore(config.fixedPlaylistTtlSeconds);
}
