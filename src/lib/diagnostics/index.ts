/**
 * Diagnostics Module
 */

export {
  formatDiagnostic,
  countBySeverity,
  filterBySeverity,
  DiagnosticCollector,
  type Diagnostic,
  type DiagnosticSource,
  type Severity,
} from './diagnostic';
