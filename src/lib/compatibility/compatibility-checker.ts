/**
 * Compatibility Checker
 *
 * Cross-references playlist tvg-ids against guide channel ids.
 */

import { DiagnosticCollector, type Diagnostic } from '@/lib/diagnostics';
import type { GuideChannel } from '@/lib/epg';
import { isGracenoteId, type PlaylistEntry } from '@/lib/m3u';

/**
 * Best-practice reminders appended to every compatibility check
 */
export const GENERAL_ADVISORIES: readonly string[] = [
  "For optimal guide data, ensure 'tvg-id' in M3U exactly matches 'id' in EPG (case-sensitive).",
  "Missing or inconsistent 'tvg-id' attributes are the most common reason for guide data not showing up.",
  "Duplicate 'tvg-id' values in M3U can cause unpredictable channel importing on the DVR.",
  "Ensure your EPG file includes essential program details like <title>, <desc>, series-id (for TV shows), and episode-num for best DVR functionality.",
  'Overlapping program times in EPG for a single channel can lead to incorrect guide display or recording issues.',
  'The DVR prefers HLS (.m3u8) or raw MPEG-TS (.ts) streams. Other formats might have limited or no support.',
  "Consider adding a 'group-title' to your M3U channels to organize them into categories in the DVR's UI.",
  "Remember: the DVR can display guide data without an external EPG file if your M3U channels use 'tvg-id's that map to known Gracenote IDs. Otherwise, an external EPG source is required.",
];

export interface CompatibilityResult {
  issues: Diagnostic[];
  advisories: string[];
}

/**
 * Check that playlist entries and guide channels can be matched by id.
 * Entries without a tvg-id are the playlist checker's concern and are not
 * reported again here.
 */
export function checkCompatibility(
  entries: readonly PlaylistEntry[],
  channels: ReadonlyMap<string, GuideChannel>
): CompatibilityResult {
  const report = new DiagnosticCollector('compatibility');

  if (channels.size === 0 && entries.length > 0) {
    if (entries.some((entry) => isGracenoteId(entry.tvgId))) {
      report.note(
        "The EPG file has no channels. Some M3U 'tvg-id's look like Gracenote IDs, which the DVR can match without an external EPG file; other channels will have no guide data."
      );
    } else {
      report.note(
        "The EPG file has no channels, so no M3U channel can be matched to guide data. Use an EPG source with matching channel ids, or 'tvg-id's that map to Gracenote IDs."
      );
    }
  }

  const playlistIds = new Set(entries.map((entry) => entry.tvgId).filter((id) => id !== ''));

  for (const entry of entries) {
    if (entry.tvgId && !channels.has(entry.tvgId)) {
      report.warning(
        `M3U channel '${entry.name}' (tvg-id: '${entry.tvgId}') has no matching EPG data found by 'tvg-id'. This channel might not show guide data on the DVR.`
      );
    }
  }

  for (const [id, channel] of channels) {
    if (!playlistIds.has(id)) {
      const names = channel.displayNames.length > 0 ? channel.displayNames.join(', ') : 'N/A';
      report.warning(
        `EPG channel '${names}' (id: '${id}') has no matching M3U channel via 'tvg-id'. This EPG data will not be used by the DVR.`
      );
    }
  }

  return { issues: report.items, advisories: [...GENERAL_ADVISORIES] };
}
