/**
 * Identifier helpers: tvg-id derivation and external guide id heuristics.
 */

/**
 * Sanitize a channel name into a tvg-id: keep word characters, spaces and
 * hyphens, collapse space/hyphen runs to one underscore, lowercase.
 */
export function sanitizeChannelNameForId(name: string): string {
  return name
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .trim()
    .replace(/[\s-]+/g, '_')
    .toLowerCase();
}

const GRACENOTE_PATTERN = /^(EP|MV|SH|GR)\d{8,}(\.[FS]\.EP)?$|^\d{8,}$/;

/**
 * Heuristic: does this tvg-id look like a Gracenote guide identifier that the
 * DVR can resolve without an external guide file?
 */
export function isGracenoteId(tvgId: string): boolean {
  if (!tvgId) return false;
  return GRACENOTE_PATTERN.test(tvgId);
}
