/**
 * Command-line options for the playlist check script
 */

import type { Severity } from '@/lib/diagnostics';
import type { ValidationMode } from '@/lib/m3u';
import { parseSeverityList } from '@/lib/report';

export interface CheckOptions {
  playlistPath: string | null;
  guidePath: string | null;
  mode: ValidationMode;
  /** Where to write the corrected playlist */
  outputPath: string | null;
  /** Where to write the serialized fix operations */
  fixesPath: string | null;
  /** Severities to list; all when null */
  severities: Severity[] | null;
  /** Keep the corrected playlist in the fixed-playlist store and print its id */
  store: boolean;
  help: boolean;
}

export type CheckOptionsResult =
  | { success: true; options: CheckOptions }
  | { success: false; error: string };

export const USAGE = `Usage:
  tsx scripts/check-playlist.ts --playlist=<file> [--guide=<file>] [options]

Options:
  --playlist=FILE   Extended-M3U playlist to check
  --guide=FILE      XMLTV guide to check and cross-reference
  --mode=MODE       basic or advanced (default: advanced)
  --output=FILE     Write the corrected playlist to FILE
  --fixes=FILE      Write the staged fix operations as JSON to FILE
  --only=LIST       Only list these severities, e.g. error,warning
  --store           Keep the corrected playlist in the store and print its id
  --help            Show this message`;

function valueOf(arg: string): string {
  return arg.substring(arg.indexOf('=') + 1);
}

/**
 * Parse script arguments (without the node and script paths)
 */
export function parseCheckArgs(args: readonly string[]): CheckOptionsResult {
  const options: CheckOptions = {
    playlistPath: null,
    guidePath: null,
    mode: 'advanced',
    outputPath: null,
    fixesPath: null,
    severities: null,
    store: false,
    help: false,
  };

  for (const arg of args) {
    if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--store') {
      options.store = true;
    } else if (arg.startsWith('--playlist=')) {
      options.playlistPath = valueOf(arg) || null;
    } else if (arg.startsWith('--guide=')) {
      options.guidePath = valueOf(arg) || null;
    } else if (arg.startsWith('--output=')) {
      options.outputPath = valueOf(arg) || null;
    } else if (arg.startsWith('--fixes=')) {
      options.fixesPath = valueOf(arg) || null;
    } else if (arg.startsWith('--mode=')) {
      const mode = valueOf(arg);
      if (mode !== 'basic' && mode !== 'advanced') {
        return { success: false, error: `Invalid mode '${mode}'. Expected basic or advanced.` };
      }
      options.mode = mode;
    } else if (arg.startsWith('--only=')) {
      const severities = parseSeverityList(valueOf(arg));
      if (!severities) {
        return { success: false, error: `Invalid severity list '${valueOf(arg)}'.` };
      }
      options.severities = severities;
    } else {
      return { success: false, error: `Unknown argument '${arg}'.` };
    }
  }

  if (!options.help && !options.playlistPath && !options.guidePath) {
    return { success: false, error: 'Provide --playlist and/or --guide.' };
  }

  return { success: true, options };
}
