/**
 * Fixed Playlist Store Module
 */

export {
  MemoryFixedPlaylistStore,
  createFixedPlaylistStore,
  type FixedPlaylistStore,
} from './fixed-playlist-store';

export { generateFixedPlaylistId, isFixedPlaylistId } from './fixed-playlist-id';

export { RedisFixedPlaylistStore, type RedisFixedPlaylistStoreOptions } from './redis-store';
