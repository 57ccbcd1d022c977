/**
 * Display Name Derivation
 *
 * Picks a clean, concise display name for a playlist entry. Candidates are
 * tried in priority order; the last resort runs the raw name through an
 * ordered pipeline of named cleanup steps.
 */

import { CHECKER_CONFIG } from '@/lib/config';
import type { ExtinfAttributes } from './attributes';

export interface CleanupStep {
  name: string;
  apply: (value: string) => string;
}

function replaceStep(name: string, pattern: RegExp): CleanupStep {
  return { name, apply: (value) => value.replace(pattern, '').trim() };
}

/**
 * Cleanup pipeline for raw names, applied in order
 */
export const CLEANUP_STEPS: readonly CleanupStep[] = [
  replaceStep('stripQuotes', /["']/g),
  replaceStep('stripDoubleDashDescription', /\s+--\s+.*$/),
  replaceStep('stripDashDescription', /\s+-\s+.*$/),
  replaceStep('stripColonDescription', /\s*:\s+.*$/),
  replaceStep('stripParenthetical', /\s*\(.*\)$/),
  replaceStep('stripBracketed', /\s*\[.*\]$/),
  replaceStep('stripTrailingQualifier', /\s+(HD|SD|Live|TV|Channel|Show|Movie|Series|Now)\s*$/i),
  {
    name: 'truncate',
    apply: (value) =>
      value.length > CHECKER_CONFIG.maxDisplayNameLength
        ? `${value.substring(0, CHECKER_CONFIG.maxDisplayNameLength - 3).trim()}...`
        : value,
  },
  replaceStep('stripPunctuation', /[^\p{L}\p{N}_\s.,&+\-:]/gu),
];

/**
 * Run the cleanup pipeline over a raw name
 */
export function cleanupRawName(rawName: string): string {
  return CLEANUP_STEPS.reduce((value, step) => step.apply(value), rawName.trim());
}

/**
 * (a) explicit guide-title attribute
 */
function fromGuideTitle(attributes: ExtinfAttributes): string | null {
  const title = attributes.get('tvc-guide-title').trim();
  return title || null;
}

/**
 * (b) content of a leading quoted segment, e.g. `"Pluto Movies",description`
 */
function fromLeadingQuote(rawName: string): string | null {
  const match = rawName.match(/^["']([^"']+)["']/);
  if (!match) return null;
  const candidate = match[1].trim();
  return candidate && candidate.length < CHECKER_CONFIG.maxCandidateLength ? candidate : null;
}

/**
 * (c) text before the first comma, if there is one and it is short enough
 */
function fromFirstSegment(rawName: string): string | null {
  if (!rawName.includes(',')) return null;
  const segment = rawName.split(',', 1)[0].trim();
  if (segment.length <= 2) return null;
  const candidate = segment.replace(/["']/g, '').trim();
  return candidate && candidate.length <= CHECKER_CONFIG.maxDisplayNameLength ? candidate : null;
}

/**
 * Derive the display-name candidate for an entry
 */
export function deriveDisplayName(rawName: string, attributes: ExtinfAttributes): string {
  const trimmed = rawName.trim();
  return (
    fromGuideTitle(attributes) ??
    fromLeadingQuote(trimmed) ??
    fromFirstSegment(trimmed) ??
    (cleanupRawName(trimmed) || CHECKER_CONFIG.unknownChannelName)
  );
}

/**
 * Whether an existing tvg-name looks like it carries more than a name:
 * purely numeric, over-long, containing commas or quotes, or a description
 * separator.
 */
export function isLowQualityTvgName(tvgName: string): boolean {
  return (
    /^\d+$/.test(tvgName) ||
    tvgName.length > CHECKER_CONFIG.maxDisplayNameLength ||
    tvgName.includes(',') ||
    tvgName.includes('"') ||
    tvgName.includes("'") ||
    /\s+--\s+.*$/.test(tvgName) ||
    /\s*:\s+.*$/.test(tvgName) ||
    /\s*\([^)]*\)$/.test(tvgName)
  );
}
