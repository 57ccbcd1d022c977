/**
 * Fix Operations
 *
 * Structured, replayable edits produced by the playlist checker. Line
 * numbers always refer to the original, unmodified input.
 */

/**
 * Replace an `#EXTINF:` header line wholesale
 */
export interface RebuildAttributesFix {
  type: 'rebuild_attributes';
  /** 1-indexed header line */
  lineNum: number;
  /** Duration as written in the original header */
  duration: string;
  /** Raw text after the header's separator comma */
  nameText: string;
  /** Original attributes overlaid with the staged changes */
  finalAttributes: Record<string, string>;
}

/**
 * Move a misplaced stream URL to immediately follow its header
 */
export interface ReorderStreamUrlFix {
  type: 'reorder_stream_url';
  /** 1-indexed header line */
  lineNum: number;
  /** 1-indexed line the URL was found on */
  originalLineNum: number;
  url: string;
  channelName: string;
}

export type FixOperation = RebuildAttributesFix | ReorderStreamUrlFix;

export type FixOperationParseResult =
  | { success: true; operations: FixOperation[] }
  | { success: false; error: string };

/**
 * Serialize operations for persistence or a later replay
 */
export function serializeFixOperations(operations: readonly FixOperation[]): string {
  return JSON.stringify(operations);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLineNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1;
}

function toStringRecord(value: unknown): Record<string, string> | null {
  if (!isRecord(value)) return null;
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') return null;
    result[key] = entry;
  }
  return result;
}

/**
 * Validate one decoded element, returning the operation or a reason
 */
function toFixOperation(value: unknown): FixOperation | string {
  if (!isRecord(value)) {
    return 'not an object';
  }
  if (!isLineNumber(value.lineNum)) {
    return 'lineNum must be a positive integer';
  }

  switch (value.type) {
    case 'rebuild_attributes': {
      const finalAttributes = toStringRecord(value.finalAttributes);
      if (typeof value.duration !== 'string' || !/^-?\d+$/.test(value.duration)) {
        return 'duration must be an integer string';
      }
      if (typeof value.nameText !== 'string') {
        return 'nameText must be a string';
      }
      if (!finalAttributes) {
        return 'finalAttributes must map strings to strings';
      }
      return {
        type: 'rebuild_attributes',
        lineNum: value.lineNum,
        duration: value.duration,
        nameText: value.nameText,
        finalAttributes,
      };
    }
    case 'reorder_stream_url': {
      if (!isLineNumber(value.originalLineNum)) {
        return 'originalLineNum must be a positive integer';
      }
      if (typeof value.url !== 'string' || !value.url.trim()) {
        return 'url must be a non-empty string';
      }
      if (typeof value.channelName !== 'string') {
        return 'channelName must be a string';
      }
      return {
        type: 'reorder_stream_url',
        lineNum: value.lineNum,
        originalLineNum: value.originalLineNum,
        url: value.url,
        channelName: value.channelName,
      };
    }
    default:
      return `unknown type ${JSON.stringify(value.type)}`;
  }
}

/**
 * Decode and validate a serialized operation list
 */
export function parseFixOperations(json: string): FixOperationParseResult {
  let decoded: unknown;
  try {
    decoded = JSON.parse(json);
  } catch (error) {
    return {
      success: false,
      error: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  if (!Array.isArray(decoded)) {
    return { success: false, error: 'Expected an array of fix operations' };
  }

  const operations: FixOperation[] = [];
  for (let i = 0; i < decoded.length; i++) {
    const operation = toFixOperation(decoded[i]);
    if (typeof operation === 'string') {
      return { success: false, error: `Fix operation ${i}: ${operation}` };
    }
    operations.push(operation);
  }

  return { success: true, operations };
}
