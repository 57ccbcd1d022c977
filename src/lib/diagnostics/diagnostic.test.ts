/**
 * Diagnostic Tests
 */

import { describe, it, expect } from 'vitest';
import {
  formatDiagnostic,
  countBySeverity,
  filterBySeverity,
  DiagnosticCollector,
  type Diagnostic,
} from './diagnostic';

describe('Diagnostics', () => {
  describe('formatDiagnostic', () => {
    it('renders source, severity and line', () => {
      expect(
        formatDiagnostic({ severity: 'warning', source: 'playlist', message: 'Missing tvg-id.', line: 3 })
      ).toBe('M3U Warning (Line 3): Missing tvg-id.');
    });

    it('omits the line when absent', () => {
      expect(formatDiagnostic({ severity: 'error', source: 'guide', message: 'Bad root.' })).toBe(
        'EPG Error: Bad root.'
      );
    });

    it('labels compatibility notes', () => {
      expect(formatDiagnostic({ severity: 'note', source: 'compatibility', message: 'No guide.' })).toBe(
        'Compatibility Note: No guide.'
      );
    });
  });

  describe('countBySeverity', () => {
    it('counts each severity', () => {
      const diagnostics: Diagnostic[] = [
        { severity: 'error', source: 'playlist', message: 'a' },
        { severity: 'error', source: 'guide', message: 'b' },
        { severity: 'suggestion', source: 'playlist', message: 'c' },
      ];

      expect(countBySeverity(diagnostics)).toEqual({ error: 2, warning: 0, suggestion: 1, note: 0 });
    });
  });

  describe('filterBySeverity', () => {
    it('keeps matching severities in order', () => {
      const diagnostics: Diagnostic[] = [
        { severity: 'warning', source: 'playlist', message: 'a' },
        { severity: 'note', source: 'compatibility', message: 'b' },
        { severity: 'error', source: 'playlist', message: 'c' },
      ];

      expect(filterBySeverity(diagnostics, 'error', 'warning').map((d) => d.message)).toEqual(['a', 'c']);
    });
  });

  describe('DiagnosticCollector', () => {
    it('tags items with its source and keeps discovery order', () => {
      const collector = new DiagnosticCollector('guide');
      collector.error('first');
      collector.suggestion('second', 7);

      expect(collector.items).toEqual([
        { severity: 'error', source: 'guide', message: 'first' },
        { severity: 'suggestion', source: 'guide', message: 'second', line: 7 },
      ]);
    });
  });
});
