/**
 * Report Rendering
 *
 * Plain-text rendering of an analysis report for terminals and log files.
 */

import { allDiagnostics, type AnalysisReport } from '@/lib/analysis';
import {
  countBySeverity,
  filterBySeverity,
  formatDiagnostic,
  type Diagnostic,
  type Severity,
} from '@/lib/diagnostics';

export interface RenderReportOptions {
  /** Only list diagnostics of these severities; the summary still counts all */
  severities?: Severity[];
}

const ALL_SEVERITIES: Severity[] = ['error', 'warning', 'suggestion', 'note'];

function renderSection(
  title: string,
  diagnostics: readonly Diagnostic[] | null,
  severities: Severity[],
  details?: string
): string[] {
  const lines = [`== ${title} ==`];
  if (diagnostics === null) {
    lines.push('Not provided.');
    return lines;
  }

  if (details) lines.push(details);

  const shown = filterBySeverity(diagnostics, ...severities);
  if (shown.length === 0) {
    lines.push('No issues found.');
  } else {
    lines.push(...shown.map(formatDiagnostic));
  }
  return lines;
}

/**
 * Render a report as text, one diagnostic per line
 */
export function renderReport(report: AnalysisReport, options: RenderReportOptions = {}): string {
  const severities = options.severities ?? ALL_SEVERITIES;
  const { playlist, guide } = report;

  const sections: string[][] = [
    renderSection(
      'M3U Playlist',
      playlist?.diagnostics ?? null,
      severities,
      playlist ? `${playlist.entries.length} channel(s), ${report.fixCount} fix(es) staged` : undefined
    ),
    renderSection(
      'EPG Guide',
      guide?.diagnostics ?? null,
      severities,
      guide ? `${guide.channels.size} channel(s), ${guide.programs.length} program(s)` : undefined
    ),
    renderSection('Compatibility', report.compatibility, severities),
  ];

  if (report.advisories.length > 0) {
    sections.push(['== Advisories ==', ...report.advisories.map((advice) => `- ${advice}`)]);
  }

  const counts = countBySeverity(allDiagnostics(report));
  sections.push([
    `Summary: ${counts.error} error(s), ${counts.warning} warning(s), ${counts.suggestion} suggestion(s), ${counts.note} note(s)`,
  ]);

  return `${sections.map((lines) => lines.join('\n')).join('\n\n')}\n`;
}

/**
 * Parse a comma-separated severity list, e.g. `error,warning`.
 * Returns null when any item is not a severity.
 */
export function parseSeverityList(value: string): Severity[] | null {
  const severities: Severity[] = [];
  for (const item of value.split(',')) {
    const name = item.trim().toLowerCase();
    const severity = ALL_SEVERITIES.find((candidate) => candidate === name);
    if (!severity) return null;
    severities.push(severity);
  }
  return severities;
}
