/**
 * Timestamp parsing for export files.
 *
 * Exports write timestamps in a few shapes: YAML timestamps (already a Date
 * once parsed), ISO strings with microsecond fractions, space-separated
 * date-times, bare dates and epoch milliseconds. Strings without a zone are
 * read as UTC so parsing does not depend on the host time zone.
 */

const DATE_TIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

function zoneOffsetMinutes(zone: string | undefined): number {
  if (zone === undefined || zone.toUpperCase() === "Z") {
    return 0;
  }
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  return sign * (hours * 60 + minutes);
}

function parseDateTimeString(value: string): Date | null {
  const match = DATE_TIME_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, year, month, day, hour = "0", minute = "0", second = "0", fraction = "", zone] =
    match;
  if (year === undefined || month === undefined || day === undefined) {
    return null;
  }

  const y = Number(year);
  const mo = Number(month);
  const d = Number(day);
  const h = Number(hour);
  const mi = Number(minute);
  const s = Number(second);
  const ms = Number((fraction + "000").slice(0, 3));

  if (mo < 1 || mo > 12 || h > 23 || mi > 59 || s > 59) {
    return null;
  }

  const instant = new Date(Date.UTC(2000, 0, 1, h, mi, s, ms));
  // Date.UTC reads years 0-99 as 1900-1999; setUTCFullYear takes them as given
  instant.setUTCFullYear(y, mo - 1, d);
  // 2024-02-30 rolls over into March; reject instead
  if (instant.getUTCDate() !== d) {
    return null;
  }

  return new Date(instant.getTime() - zoneOffsetMinutes(zone) * 60_000);
}

/**
 * Parse a timestamp value from a descriptor or front-matter block.
 *
 * @returns The instant, or null when the value is not a recognizable timestamp
 */
export function parseTimestamp(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(value.getTime());
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? new Date(value) : null;
  }
  if (typeof value === "string") {
    return parseDateTimeString(value);
  }
  return null;
}
