/**
 * Guide Checker
 *
 * Validates an XMLTV program guide: channel registry, per-program
 * completeness and per-channel schedule overlaps.
 */

import { DiagnosticCollector, type Diagnostic } from '@/lib/diagnostics';
import { createLogger } from '@/lib/logger';
import { findChild, findChildren, parseXmlDocument, type XmlElement } from './xml-tree';
import { parseXmltvDate } from './xmltv-date';

const logger = createLogger('GuideChecker');

const UNKNOWN_TITLE = 'Unknown Title';

export interface GuideChannel {
  id: string;
  /** Non-empty display-name texts, in document order */
  displayNames: string[];
  iconUrl: string | null;
}

export interface GuideProgram {
  channelId: string;
  /** Raw `start` attribute */
  start: string;
  /** Raw `stop` attribute */
  stop: string;
  /** Parsed start, seconds since epoch (zone ignored) */
  startTime: number | null;
  stopTime: number | null;
  title: string;
  hasDescription: boolean;
  hasSeriesId: boolean;
  hasEpisodeNum: boolean;
  isMovie: boolean;
}

export interface GuideCheckResult {
  diagnostics: Diagnostic[];
  channels: Map<string, GuideChannel>;
  /** Programs of registered channels, in document order */
  programs: GuideProgram[];
}

interface ProgramFinding {
  severity: 'error' | 'suggestion';
  text: string;
}

function hasText(elements: readonly XmlElement[]): boolean {
  return elements.some((element) => element.text.trim() !== '');
}

function readChannel(element: XmlElement, id: string): GuideChannel {
  const icon = findChild(element, 'icon');
  return {
    id,
    displayNames: findChildren(element, 'display-name')
      .map((name) => name.text.trim())
      .filter((name) => name !== ''),
    iconUrl: icon?.attributes.src || null,
  };
}

function readProgram(element: XmlElement): GuideProgram {
  const start = element.attributes.start ?? '';
  const stop = element.attributes.stop ?? '';
  const title = findChild(element, 'title')?.text.trim();

  return {
    channelId: element.attributes.channel ?? '',
    start,
    stop,
    startTime: parseXmltvDate(start),
    stopTime: parseXmltvDate(stop),
    title: title || UNKNOWN_TITLE,
    hasDescription: hasText(findChildren(element, 'desc')),
    hasSeriesId: Boolean(element.attributes['series-id']),
    hasEpisodeNum: hasText(findChildren(element, 'episode-num')),
    isMovie: findChildren(element, 'category').some(
      (category) => category.text.trim().toLowerCase() === 'movie'
    ),
  };
}

/**
 * Everything wrong with one program, errors and suggestions mixed, in a
 * fixed order
 */
function programFindings(program: GuideProgram, element: XmlElement): ProgramFinding[] {
  const findings: ProgramFinding[] = [];
  const error = (text: string) => findings.push({ severity: 'error', text });
  const suggest = (text: string) => findings.push({ severity: 'suggestion', text });

  if (!program.channelId) {
    error("Program element missing 'channel' attribute.");
  }

  if (!program.start) {
    error("Missing 'start' time.");
  } else if (program.startTime === null) {
    error(`Invalid 'start' time format: '${program.start}'.`);
  }

  if (!program.stop) {
    error("Missing 'stop' time.");
  } else if (program.stopTime === null) {
    error(`Invalid 'stop' time format: '${program.stop}'.`);
  }

  if (program.startTime !== null && program.stopTime !== null && program.startTime >= program.stopTime) {
    error(`Start time (${program.start}) is equal to or after stop time (${program.stop}).`);
  }

  if (!hasText(findChildren(element, 'title'))) {
    error("Missing 'title'. Essential for guide display.");
  }

  if (!program.hasDescription) {
    suggest("Missing 'desc' (description).");
  }
  if (!program.hasSeriesId && !program.isMovie) {
    suggest("Missing 'series-id'.");
  }
  if (!program.hasEpisodeNum && !program.isMovie) {
    suggest("Missing 'episode-num'.");
  }

  return findings;
}

/**
 * Warn about adjacent programs of one channel whose times overlap.
 * Programs with an unparsable start or stop are left out; equal start
 * times keep document order.
 */
function checkOverlaps(channelId: string, programs: readonly GuideProgram[], report: DiagnosticCollector): void {
  const timed = programs
    .filter((p) => p.startTime !== null && p.stopTime !== null)
    .sort((a, b) => (a.startTime ?? 0) - (b.startTime ?? 0));

  for (let i = 0; i < timed.length - 1; i++) {
    const current = timed[i];
    const next = timed[i + 1];
    if ((current.stopTime ?? 0) > (next.startTime ?? 0)) {
      report.warning(
        `Overlapping programs for channel '${channelId}': '${current.title}' (${current.start} - ${current.stop}) overlaps with '${next.title}' (${next.start} - ${next.stop}).`
      );
    }
  }
}

/**
 * Check guide content.
 *
 * Malformed XML yields a single error and empty results; every other
 * problem is reported and checking continues.
 */
export function checkGuide(content: string): GuideCheckResult {
  const report = new DiagnosticCollector('guide');
  const channels = new Map<string, GuideChannel>();
  const programsByChannel = new Map<string, GuideProgram[]>();
  const programs: GuideProgram[] = [];

  const parsed = parseXmlDocument(content);
  if (!parsed.success) {
    report.error(`The EPG file is not well-formed XML: ${parsed.error}`);
    logger.debug('Guide rejected', { error: parsed.error });
    return { diagnostics: report.items, channels, programs };
  }

  const { root } = parsed;
  if (root.name !== 'tv') {
    report.error("Root element is not 'tv'. Expected '<tv>' tag.");
  }

  for (const element of findChildren(root, 'channel')) {
    const id = element.attributes.id;
    if (!id) {
      report.error("Channel element missing 'id' attribute.");
      continue;
    }

    if (channels.has(id)) {
      report.error(`Duplicate 'channel id' '${id}' found in EPG file. Each channel must have a unique ID.`);
    }

    if (findChildren(element, 'display-name').length === 0) {
      report.warning(`Channel '${id}' missing 'display-name'.`);
    }

    channels.set(id, readChannel(element, id));
    programsByChannel.set(id, []);
  }

  for (const element of findChildren(root, 'programme')) {
    const program = readProgram(element);
    const findings = programFindings(program, element);

    if (findings.length > 0) {
      const message = `Channel '${program.channelId || 'N/A'}' Program ('${program.title}' from ${program.start || 'N/A'} to ${program.stop || 'N/A'}): ${findings.map((f) => f.text).join('; ')}`;
      if (findings.some((f) => f.severity === 'error')) {
        report.error(message);
      } else {
        report.suggestion(message);
      }
    }

    const channelPrograms = programsByChannel.get(program.channelId);
    if (channelPrograms) {
      channelPrograms.push(program);
      programs.push(program);
    } else if (program.channelId) {
      report.error(`Program references unknown channel ID '${program.channelId}'.`);
    }
  }

  for (const [channelId, channelPrograms] of programsByChannel) {
    checkOverlaps(channelId, channelPrograms, report);
  }

  logger.debug('Guide checked', {
    channels: channels.size,
    programs: programs.length,
    diagnostics: report.items.length,
  });

  return { diagnostics: report.items, channels, programs };
}
