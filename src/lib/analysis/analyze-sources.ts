/**
 * Source Analysis
 *
 * Runs the playlist, guide and compatibility checks for one request and
 * bundles their results with the corrected playlist.
 */

import { getCheckerConfig, type CheckerConfig } from '@/lib/config';
import { checkCompatibility } from '@/lib/compatibility';
import { DiagnosticCollector, type Diagnostic } from '@/lib/diagnostics';
import { checkGuide, type GuideCheckResult } from '@/lib/epg';
import {
  applyFixes,
  checkPlaylist,
  serializeFixOperations,
  type PlaylistCheckResult,
  type ValidationMode,
} from '@/lib/m3u';
import { createLogger, generateRunId } from '@/lib/logger';

const logger = createLogger('Analysis');

export interface AnalyzeSourcesInput {
  /** Playlist text; absent or empty means no playlist was provided */
  playlist?: string;
  /** Guide text; absent or empty means no guide was provided */
  guide?: string;
  mode?: ValidationMode;
  /** Overrides the environment-derived configuration */
  config?: CheckerConfig;
}

export interface AnalysisReport {
  runId: string;
  mode: ValidationMode;
  playlist: PlaylistCheckResult | null;
  guide: GuideCheckResult | null;
  compatibility: Diagnostic[];
  advisories: string[];
  /** Playlist with all staged fixes applied, null when nothing was staged */
  correctedPlaylist: string | null;
  /** Number of staged fix operations */
  fixCount: number;
  /** Staged fix operations, serialized for a later replay */
  fixesJson: string;
}

const PLAYLIST_ONLY_ADVISORY =
  "The DVR can display guide data without an external EPG source if your M3U channels use 'tvg-id's that map to known Gracenote IDs. Otherwise, an external EPG source is required.";

const GUIDE_ONLY_ADVISORY =
  "EPG data alone is not sufficient for the DVR; it needs to be linked to channels in a playlist (via 'tvg-id').";

function isProvided(content: string | undefined): content is string {
  return content !== undefined && content !== '';
}

/**
 * Analyze whichever of playlist and guide were provided
 */
export function analyzeSources(input: AnalyzeSourcesInput): AnalysisReport {
  const mode = input.mode ?? 'advanced';
  const config = input.config ?? getCheckerConfig();
  const runId = generateRunId();
  const log = logger.child({ runId });

  return log.withTiming(
    'Analyze sources',
    () => {
      let playlist: PlaylistCheckResult | null = null;
      let guide: GuideCheckResult | null = null;
      let correctedPlaylist: string | null = null;

      if (isProvided(input.playlist)) {
        playlist = checkPlaylist(input.playlist, mode, {
          maxChannels: config.maxPlaylistChannels,
          defaultGroupTitle: config.defaultGroupTitle,
        });
        if (playlist.fixes.length > 0) {
          correctedPlaylist = applyFixes(input.playlist, playlist.fixes).content;
        }
      }

      if (isProvided(input.guide)) {
        guide = checkGuide(input.guide);
      }

      let compatibility: Diagnostic[] = [];
      let advisories: string[] = [];

      if (playlist && guide) {
        const result = checkCompatibility(playlist.entries, guide.channels);
        compatibility = result.issues;
        advisories = result.advisories;
      } else if (playlist) {
        const notes = new DiagnosticCollector('compatibility');
        notes.note('No EPG file was provided.');
        compatibility = notes.items;
        advisories = [PLAYLIST_ONLY_ADVISORY];
      } else if (guide) {
        const notes = new DiagnosticCollector('compatibility');
        notes.note('No M3U file was provided.');
        compatibility = notes.items;
        advisories = [GUIDE_ONLY_ADVISORY];
      }

      const fixes = playlist?.fixes ?? [];

      log.info('Analysis complete', {
        mode,
        entries: playlist?.entries.length ?? 0,
        guideChannels: guide?.channels.size ?? 0,
        fixes: fixes.length,
      });

      return {
        runId,
        mode,
        playlist,
        guide,
        compatibility,
        advisories,
        correctedPlaylist,
        fixCount: fixes.length,
        fixesJson: serializeFixOperations(fixes),
      };
    },
    { mode }
  );
}

/**
 * All diagnostics of a report, playlist first, then guide, then compatibility
 */
export function allDiagnostics(report: AnalysisReport): Diagnostic[] {
  return [
    ...(report.playlist?.diagnostics ?? []),
    ...(report.guide?.diagnostics ?? []),
    ...report.compatibility,
  ];
}

/**
 * Whether any error-severity diagnostic was found
 */
export function hasErrors(report: AnalysisReport): boolean {
  return allDiagnostics(report).some((diagnostic) => diagnostic.severity === 'error');
}
