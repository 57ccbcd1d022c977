/**
 * XMLTV timestamps: `YYYYMMDDHHMMSS` with an optional `±HHMM` offset.
 */

/**
 * Parse an XMLTV timestamp into seconds since the epoch.
 *
 * The offset is accepted but ignored, so all programs of a guide compare on
 * their wall-clock times. Trailing text after the timestamp is tolerated.
 * Returns null for anything that is not a real calendar date and time.
 */
export function parseXmltvDate(dateStr: string): number | null {
  if (!dateStr) return null;

  const match = dateStr.match(/^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})\s*([+-]\d{4})?/);
  if (!match) return null;

  const [year, month, day, hour, minute, second] = match.slice(1, 7).map((part) => parseInt(part, 10));
  const time = Date.UTC(year, month - 1, day, hour, minute, second);
  const date = new Date(time);

  // Date.UTC rolls out-of-range components over (Feb 30 -> Mar 2); reject those
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return null;
  }

  return Math.floor(time / 1000);
}
