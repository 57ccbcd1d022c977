/**
 * Fix Applicator
 *
 * Replays fix operations against the original playlist text. Operations are
 * applied in descending line order so earlier indices never drift.
 */

import { createLogger } from '@/lib/logger';
import { buildExtinfLine } from './attributes';
import type { FixOperation, RebuildAttributesFix, ReorderStreamUrlFix } from './fix-operations';

const logger = createLogger('FixApplicator');

export interface ApplyFixesResult {
  /** Corrected text */
  content: string;
  /** Operations that changed the text */
  applied: number;
  /** Operations skipped (out of range, or already in place) */
  skipped: number;
}

interface Line {
  text: string;
  eol: string;
}

/**
 * Split text into lines, keeping each line's terminator
 */
function splitKeepingTerminators(content: string): Line[] {
  const lines: Line[] = [];
  const regex = /([^\r\n]*)(\r\n|\r|\n|$)/g;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(content)) !== null) {
    if (match[0] === '') break;
    lines.push({ text: match[1], eol: match[2] });
  }

  return lines;
}

/**
 * Most common terminator in the document, `\n` when there is none
 */
function dominantLineEnding(lines: readonly Line[]): string {
  const counts = new Map<string, number>();
  for (const { eol } of lines) {
    if (eol) counts.set(eol, (counts.get(eol) ?? 0) + 1);
  }
  let best = '\n';
  let bestCount = 0;
  for (const [eol, count] of counts) {
    if (count > bestCount) {
      best = eol;
      bestCount = count;
    }
  }
  return best;
}

function applyRebuild(lines: Line[], fix: RebuildAttributesFix, defaultEol: string): boolean {
  const index = fix.lineNum - 1;
  lines[index] = {
    text: buildExtinfLine(fix.duration, fix.finalAttributes, fix.nameText),
    eol: lines[index].eol || defaultEol,
  };
  return true;
}

function applyReorder(lines: Line[], fix: ReorderStreamUrlFix, defaultEol: string): boolean {
  const headerIndex = fix.lineNum - 1;
  const originalIndex = fix.originalLineNum - 1;
  const url = fix.url.trim();

  const next = lines[headerIndex + 1];
  if (next && next.text.trim() === url) {
    return false;
  }

  if (originalIndex < lines.length && lines[originalIndex].text.trim() === url) {
    lines.splice(originalIndex, 1);
  } else {
    logger.warn('Stream URL not found at its original line, inserting only', {
      channel: fix.channelName,
      originalLineNum: fix.originalLineNum,
    });
  }

  // The header may have been the last, unterminated line
  if (!lines[headerIndex].eol) {
    lines[headerIndex] = { ...lines[headerIndex], eol: defaultEol };
  }
  lines.splice(headerIndex + 1, 0, { text: fix.url, eol: defaultEol });
  return true;
}

/**
 * Apply fix operations to playlist text.
 *
 * Replaying a reorder against already-fixed text is a no-op; rebuilding an
 * already-rebuilt header yields the identical line.
 */
export function applyFixes(content: string, operations: readonly FixOperation[]): ApplyFixesResult {
  const lines = splitKeepingTerminators(content);
  const defaultEol = dominantLineEnding(lines);
  // Array.prototype.sort is stable, so same-line operations keep their order
  const sorted = [...operations].sort((a, b) => b.lineNum - a.lineNum);

  let applied = 0;
  let skipped = 0;

  for (const fix of sorted) {
    const index = fix.lineNum - 1;
    if (index < 0 || index >= lines.length) {
      logger.warn('Skipping fix at invalid line index', { lineNum: fix.lineNum, type: fix.type });
      skipped++;
      continue;
    }

    const changed =
      fix.type === 'rebuild_attributes'
        ? applyRebuild(lines, fix, defaultEol)
        : applyReorder(lines, fix, defaultEol);

    if (changed) {
      applied++;
    } else {
      skipped++;
    }
  }

  return {
    content: lines.map((line) => line.text + line.eol).join(''),
    applied,
    skipped,
  };
}
