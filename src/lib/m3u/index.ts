/**
 * M3U Module
 *
 * Extended-M3U playlist checking and repair
 */

export {
  // Attributes
  ExtinfAttributes,
  parseAttributes,
  formatAttributes,
  parseExtinfLine,
  buildExtinfLine,
  type ParsedExtinf,

  // Constants
  EXTINF_PREFIX,
  PLAYLIST_START,
  VLC_OPTION_PREFIX,
} from './attributes';

export { sanitizeChannelNameForId, isGracenoteId } from './identifiers';

export {
  deriveDisplayName,
  cleanupRawName,
  isLowQualityTvgName,
  CLEANUP_STEPS,
  type CleanupStep,
} from './display-name';

export {
  checkPlaylist,
  splitLines,
  isPreferredStreamFormat,
  type PlaylistEntry,
  type PlaylistCheckOptions,
  type PlaylistCheckResult,
  type ValidationMode,
} from './playlist-checker';

export {
  serializeFixOperations,
  parseFixOperations,
  type FixOperation,
  type RebuildAttributesFix,
  type ReorderStreamUrlFix,
  type FixOperationParseResult,
} from './fix-operations';

export { applyFixes, type ApplyFixesResult } from './fix-applicator';
