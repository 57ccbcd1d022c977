/**
 * EXTINF Attributes
 *
 * Parsing and formatting of the `key="value"` attributes carried on
 * `#EXTINF:` header lines, plus the header line split itself.
 */

export const EXTINF_PREFIX = '#EXTINF:';
export const PLAYLIST_START = '#EXTM3U';
export const VLC_OPTION_PREFIX = '#EXTVLCOPT:';

/**
 * Case-insensitive, insertion-ordered attribute map.
 * A missing key reads as the empty string.
 */
export class ExtinfAttributes {
  private readonly values = new Map<string, string>();

  constructor(entries: Iterable<readonly [string, string]> = []) {
    for (const [key, value] of entries) {
      this.set(key, value);
    }
  }

  get(key: string): string {
    return this.values.get(key.toLowerCase()) ?? '';
  }

  /** Whether the key is present with a non-blank value */
  has(key: string): boolean {
    return this.get(key).trim() !== '';
  }

  set(key: string, value: string): void {
    this.values.set(key.toLowerCase(), value);
  }

  get size(): number {
    return this.values.size;
  }

  clone(): ExtinfAttributes {
    return new ExtinfAttributes(this.values);
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.values);
  }
}

/**
 * Parse key-value attributes from the attribute section of a header line.
 * Values may contain spaces but not double quotes.
 */
export function parseAttributes(text: string): ExtinfAttributes {
  const attributes = new ExtinfAttributes();
  const regex = /(\S+)="([^"]*)"/g;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(text)) !== null) {
    attributes.set(match[1], match[2]);
  }

  return attributes;
}

/**
 * Format attributes as space-joined `key="value"` tokens, keys sorted,
 * blank values omitted.
 */
export function formatAttributes(attributes: Readonly<Record<string, string>>): string {
  return Object.keys(attributes)
    .sort()
    .filter((key) => attributes[key].trim() !== '')
    .map((key) => `${key}="${attributes[key].replace(/"/g, '\\"')}"`)
    .join(' ');
}

/**
 * Header line split into its three parts
 */
export interface ParsedExtinf {
  /** Signed integer duration, kept as written */
  duration: string;
  /** Everything between the duration and the first top-level comma */
  attributesText: string;
  /** Text after that comma, trimmed */
  rawName: string;
}

/**
 * Index of the first comma that is not inside a double-quoted value, or -1
 */
function findTopLevelComma(text: string): number {
  let inQuotes = false;
  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === ',' && !inQuotes) {
      return i;
    }
  }
  return -1;
}

/**
 * Split a `#EXTINF:<int>[ attrs],<name>` line. Returns null when malformed.
 */
export function parseExtinfLine(line: string): ParsedExtinf | null {
  const durationMatch = line.match(/^#EXTINF:(-?\d+)/);
  if (!durationMatch) {
    return null;
  }

  const rest = line.substring(durationMatch[0].length);
  const commaIndex = findTopLevelComma(rest);
  if (commaIndex === -1) {
    return null;
  }

  return {
    duration: durationMatch[1],
    attributesText: rest.substring(0, commaIndex).trim(),
    rawName: rest.substring(commaIndex + 1).trim(),
  };
}

/**
 * Rebuild a header line from its parts
 */
export function buildExtinfLine(
  duration: string,
  attributes: Readonly<Record<string, string>>,
  name: string
): string {
  const attributesText = formatAttributes(attributes);
  return `${EXTINF_PREFIX}${duration}${attributesText ? ` ${attributesText}` : ''},${name}`;
}
