/**
 * Checker Configuration
 *
 * Thresholds and defaults tuned to the target DVR platform's known limits.
 *
 * Configuration:
 * - MAX_PLAYLIST_CHANNELS: channel count above which a capacity warning is raised
 * - DEFAULT_GROUP_TITLE: group-title suggested for entries without one
 * - FIXED_PLAYLIST_TTL_SECONDS: how long stored corrected playlists are kept
 * - REDIS_URL: Redis connection string; corrected playlists are kept in memory when unset
 */

/**
 * Built-in defaults
 */
export const CHECKER_CONFIG = {
  /** Practical per-playlist channel ceiling of the DVR platform */
  maxPlaylistChannels: 750,

  /** Grouping value suggested when group-title is missing */
  defaultGroupTitle: 'Unsorted',

  /** Placeholder used when no display name can be derived */
  unknownChannelName: 'Unknown Channel',

  /** Display names longer than this are truncated */
  maxDisplayNameLength: 50,

  /** Quoted or guide-title candidates must be shorter than this */
  maxCandidateLength: 60,

  /** Stored corrected playlists expire after one hour */
  fixedPlaylistTtlSeconds: 60 * 60,

  /** Redis key prefix for stored corrected playlists */
  fixedPlaylistKeyPrefix: 'checker:fixed:',
} as const;

export interface CheckerConfig {
  maxPlaylistChannels: number;
  defaultGroupTitle: string;
  fixedPlaylistTtlSeconds: number;
  /** null when corrected playlists should be kept in memory */
  redisUrl: string | null;
}

/**
 * Parse a positive integer from an environment value, or return the fallback
 */
function positiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return !isNaN(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Resolve the effective configuration.
 *
 * Priority:
 * 1. Environment variables (if set and valid)
 * 2. Built-in defaults
 */
export function getCheckerConfig(env: NodeJS.ProcessEnv = process.env): CheckerConfig {
  return {
    maxPlaylistChannels: positiveInt(env.MAX_PLAYLIST_CHANNELS, CHECKER_CONFIG.maxPlaylistChannels),
    defaultGroupTitle: env.DEFAULT_GROUP_TITLE?.trim() || CHECKER_CONFIG.defaultGroupTitle,
    fixedPlaylistTtlSeconds: positiveInt(
      env.FIXED_PLAYLIST_TTL_SECONDS,
      CHECKER_CONFIG.fixedPlaylistTtlSeconds
    ),
    redisUrl: env.REDIS_URL?.trim() || null,
  };
}
