/**
 * Analysis Module
 */

export {
  analyzeSources,
  allDiagnostics,
  hasErrors,
  type AnalyzeSourcesInput,
  type AnalysisReport,
} from './analyze-sources';
