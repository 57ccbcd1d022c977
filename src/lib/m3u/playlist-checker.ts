/**
 * Playlist Checker
 *
 * Walks an extended-M3U playlist line by line, validates every entry and
 * stages fix operations for the problems that can be repaired mechanically.
 */

import { CHECKER_CONFIG } from '@/lib/config';
import { DiagnosticCollector, type Diagnostic } from '@/lib/diagnostics';
import { createLogger } from '@/lib/logger';
import {
  EXTINF_PREFIX,
  PLAYLIST_START,
  VLC_OPTION_PREFIX,
  parseAttributes,
  parseExtinfLine,
} from './attributes';
import { deriveDisplayName, isLowQualityTvgName } from './display-name';
import type { FixOperation } from './fix-operations';
import { sanitizeChannelNameForId } from './identifiers';

const logger = createLogger('PlaylistChecker');

export type ValidationMode = 'basic' | 'advanced';

/**
 * One playable channel, with the effective (possibly fixed) attribute values
 */
export interface PlaylistEntry {
  readonly name: string;
  readonly tvgId: string;
  readonly tvgName: string;
  readonly tvgLogo: string;
  readonly groupTitle: string;
  readonly streamUrl: string;
}

export interface PlaylistCheckOptions {
  /** Entry count above which a capacity warning is raised */
  maxChannels?: number;
  /** group-title suggested in advanced mode */
  defaultGroupTitle?: string;
}

export interface PlaylistCheckResult {
  diagnostics: Diagnostic[];
  entries: PlaylistEntry[];
  fixes: FixOperation[];
}

/**
 * Split text into physical lines. A trailing terminator does not produce an
 * extra empty line.
 */
export function splitLines(content: string): string[] {
  if (!content) return [];
  const lines = content.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Whether a URL looks like one of the DVR's preferred containers (HLS or MPEG-TS)
 */
export function isPreferredStreamFormat(url: string): boolean {
  const lower = url.toLowerCase();
  return lower.endsWith('.m3u8') || lower.includes('.ts') || lower.includes('/hls/');
}

interface StreamUrlMatch {
  url: string;
  /** 0-indexed line the URL sits on */
  index: number;
}

/**
 * Scan forward from a header for its stream URL, skipping blanks and comment
 * lines, stopping at the next header or playlist-start marker.
 */
function findStreamUrl(lines: readonly string[], headerIndex: number): StreamUrlMatch | null {
  for (let j = headerIndex + 1; j < lines.length; j++) {
    const line = lines[j].trim();
    if (!line) continue;
    if (line.startsWith(EXTINF_PREFIX) || line.startsWith(PLAYLIST_START)) {
      return null;
    }
    if (!line.startsWith('#')) {
      return { url: line, index: j };
    }
  }
  return null;
}

/**
 * Record a sighting of `key` and warn when it has been seen before
 */
function trackDuplicate(
  seen: Map<string, number[]>,
  key: string,
  lineNum: number,
  warn: (previous: string) => void
): void {
  const previous = seen.get(key);
  if (previous) {
    warn(previous.join(', '));
    previous.push(lineNum);
  } else {
    seen.set(key, [lineNum]);
  }
}

/**
 * Check playlist content.
 *
 * @param content - Raw playlist text
 * @param mode - `basic` checks tvg-id and URL placement; `advanced` adds
 *   tvg-name, group-title and stream format checks
 */
export function checkPlaylist(
  content: string,
  mode: ValidationMode = 'advanced',
  options: PlaylistCheckOptions = {}
): PlaylistCheckResult {
  const maxChannels = options.maxChannels ?? CHECKER_CONFIG.maxPlaylistChannels;
  const defaultGroupTitle = options.defaultGroupTitle ?? CHECKER_CONFIG.defaultGroupTitle;

  const report = new DiagnosticCollector('playlist');
  const entries: PlaylistEntry[] = [];
  const fixes: FixOperation[] = [];
  const tvgIdLines = new Map<string, number[]>();
  const nameLines = new Map<string, number[]>();
  const lines = splitLines(content);

  let i = 0;
  while (i < lines.length) {
    const lineNum = i + 1;
    const line = lines[i].trim();

    if (!line) {
      i++;
      continue;
    }

    if (line.startsWith(EXTINF_PREFIX)) {
      const parsed = parseExtinfLine(line);
      if (!parsed) {
        report.error(
          `Malformed EXTINF line: ${line}. Expected '#EXTINF:<duration> [attributes],<channel name>'.`,
          lineNum
        );
        i++;
        continue;
      }

      const { duration, attributesText, rawName } = parsed;
      if (!rawName) {
        report.error(`Channel name missing in EXTINF line: ${line}`, lineNum);
      }

      const attributes = parseAttributes(attributesText);
      const staged = attributes.clone();
      let modified = false;
      const displayName = deriveDisplayName(rawName, attributes);

      if (!attributes.has('tvg-id')) {
        const suggestedId = sanitizeChannelNameForId(displayName);
        if (suggestedId) {
          staged.set('tvg-id', suggestedId);
          modified = true;
          report.warning(
            `Channel '${rawName}' is missing 'tvg-id'. This is crucial for guide matching on the DVR. Suggesting fix: Add tvg-id='${suggestedId}'.`,
            lineNum
          );
        } else {
          report.warning(
            `Channel '${rawName}' is missing 'tvg-id'. (Cannot auto-suggest a fix for this name.)`,
            lineNum
          );
        }
      }

      if (mode === 'advanced') {
        const tvgName = attributes.get('tvg-name').trim();
        if (!tvgName) {
          staged.set('tvg-name', displayName);
          modified = true;
          report.warning(
            `Channel '${rawName}' is missing 'tvg-name'. The DVR often uses this for display. Suggesting fix: Add tvg-name='${displayName}'.`,
            lineNum
          );
        } else if (
          tvgName !== displayName &&
          displayName !== CHECKER_CONFIG.unknownChannelName &&
          isLowQualityTvgName(tvgName)
        ) {
          staged.set('tvg-name', displayName);
          modified = true;
          report.warning(
            `Channel '${rawName}' has an unclean 'tvg-name' attribute ('${tvgName}'). Suggesting fix: Change tvg-name to '${displayName}'.`,
            lineNum
          );
        }

        if (!attributes.has('group-title')) {
          staged.set('group-title', defaultGroupTitle);
          modified = true;
          report.suggestion(
            `Channel '${rawName}' is missing 'group-title'. Adding one helps organize channels on the DVR. Suggesting fix: Add group-title='${defaultGroupTitle}'.`,
            lineNum
          );
        }
      }

      if (modified) {
        fixes.push({
          type: 'rebuild_attributes',
          lineNum,
          duration,
          nameText: rawName,
          finalAttributes: staged.toRecord(),
        });
      }

      const effectiveTvgId = staged.get('tvg-id').trim();
      if (effectiveTvgId) {
        trackDuplicate(tvgIdLines, effectiveTvgId, lineNum, (previous) =>
          report.warning(
            `Duplicate 'tvg-id' '${effectiveTvgId}' found for channel '${rawName}'. Previous at line(s): ${previous}. The DVR may only import one instance.`,
            lineNum
          )
        );
      }

      // Keyed on the raw name, not the cleaned tvg-name
      if (rawName) {
        trackDuplicate(nameLines, rawName, lineNum, (previous) =>
          report.warning(
            `Duplicate channel name '${rawName}'. Previous at line(s): ${previous}. This might cause confusion.`,
            lineNum
          )
        );
      }

      const stream = findStreamUrl(lines, i);
      if (stream) {
        if (stream.index !== i + 1) {
          fixes.push({
            type: 'reorder_stream_url',
            lineNum,
            originalLineNum: stream.index + 1,
            url: stream.url,
            channelName: rawName,
          });
          report.error(
            `Stream URL for channel '${rawName}' was not immediately after the EXTINF line. Found at Line ${stream.index + 1}. Suggesting fix: Reorder URL.`,
            lineNum
          );
        }
        i = stream.index + 1;
      } else {
        report.error(
          `Missing stream URL after EXTINF line for channel '${rawName}'. Each #EXTINF must be immediately followed by a stream URL.`,
          lineNum
        );
        i++;
      }

      if (mode === 'advanced' && stream && !isPreferredStreamFormat(stream.url)) {
        report.suggestion(
          `Stream URL for '${rawName}' might not be HLS (.m3u8) or MPEG-TS (.ts). The DVR generally prefers HLS or raw MPEG-TS streams.`,
          lineNum
        );
      }

      entries.push({
        name: rawName,
        tvgId: effectiveTvgId,
        tvgName: staged.get('tvg-name'),
        tvgLogo: staged.get('tvg-logo'),
        groupTitle: staged.get('group-title'),
        streamUrl: stream?.url ?? '',
      });
      continue;
    }

    if (!line.startsWith(VLC_OPTION_PREFIX) && !line.startsWith(PLAYLIST_START)) {
      report.warning(`Unexpected line (might be ignored): ${line}`, lineNum);
    }
    i++;
  }

  if (entries.length > maxChannels) {
    report.warning(
      `Detected ${entries.length} channels. The DVR might experience performance issues or limits with more than ~${maxChannels} channels per playlist.`
    );
  }

  logger.debug('Playlist checked', {
    mode,
    lines: lines.length,
    entries: entries.length,
    diagnostics: report.items.length,
    fixes: fixes.length,
  });

  return { diagnostics: report.items, entries, fixes };
}
