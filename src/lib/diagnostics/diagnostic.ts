/**
 * Diagnostics
 *
 * A single tagged record for everything the checkers report, plus the
 * conventional text rendering consumed by presentation layers.
 */

export type Severity = 'error' | 'warning' | 'suggestion' | 'note';

export type DiagnosticSource = 'playlist' | 'guide' | 'compatibility';

export interface Diagnostic {
  severity: Severity;
  source: DiagnosticSource;
  message: string;
  /** 1-indexed source line, when the finding is tied to one */
  line?: number;
}

const SOURCE_LABELS: Record<DiagnosticSource, string> = {
  playlist: 'M3U',
  guide: 'EPG',
  compatibility: 'Compatibility',
};

const SEVERITY_LABELS: Record<Severity, string> = {
  error: 'Error',
  warning: 'Warning',
  suggestion: 'Suggestion',
  note: 'Note',
};

/**
 * Render a diagnostic as a plain text line, e.g.
 * `M3U Warning (Line 3): Channel 'ESPN' is missing 'tvg-id'.`
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const label = `${SOURCE_LABELS[diagnostic.source]} ${SEVERITY_LABELS[diagnostic.severity]}`;
  const location = diagnostic.line !== undefined ? ` (Line ${diagnostic.line})` : '';
  return `${label}${location}: ${diagnostic.message}`;
}

/**
 * Count diagnostics per severity
 */
export function countBySeverity(diagnostics: readonly Diagnostic[]): Record<Severity, number> {
  const counts: Record<Severity, number> = { error: 0, warning: 0, suggestion: 0, note: 0 };
  for (const diagnostic of diagnostics) {
    counts[diagnostic.severity]++;
  }
  return counts;
}

/**
 * Keep only diagnostics of the given severities
 */
export function filterBySeverity(
  diagnostics: readonly Diagnostic[],
  ...severities: Severity[]
): Diagnostic[] {
  return diagnostics.filter((d) => severities.includes(d.severity));
}

/**
 * Small accumulator bound to one source, so checkers don't repeat it per call
 */
export class DiagnosticCollector {
  readonly items: Diagnostic[] = [];

  constructor(private readonly source: DiagnosticSource) {}

  add(severity: Severity, message: string, line?: number): void {
    this.items.push(
      line === undefined
        ? { severity, source: this.source, message }
        : { severity, source: this.source, message, line }
    );
  }

  error(message: string, line?: number): void {
    this.add('error', message, line);
  }

  warning(message: string, line?: number): void {
    this.add('warning', message, line);
  }

  suggestion(message: string, line?: number): void {
    this.add('suggestion', message, line);
  }

  note(message: string, line?: number): void {
    this.add('note', message, line);
  }
}
