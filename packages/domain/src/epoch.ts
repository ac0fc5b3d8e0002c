/**
 * Epoch labels in the OEM feed use the CCSDS ordinal-day form
 * (`2024-067T08:28:00.000Z`). Callers may also name an epoch in calendar
 * form (`2024-03-07T08:28:00Z`). Both are read as UTC. A leap second
 * (`23:59:60`) is read as the following midnight, since epoch milliseconds
 * have no room for it.
 */

const ORDINAL_RE = /^(\d{4})-(\d{3})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?Z?$/;
const CALENDAR_RE = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?Z?$/;

const MS_PER_DAY = 86_400_000;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/** Like Date.UTC, without its mapping of years 0-99 onto 1900-1999. */
function utcDate(year: number, monthIndex: number, day: number): number {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  return date.getTime();
}

function daysInMonth(year: number, month: number): number {
  return new Date(utcDate(year, month, 0)).getUTCDate();
}

/** Truncates a fractional-seconds digit string to whole milliseconds. */
function fractionToMs(fraction: string | undefined): number {
  if (!fraction) return 0;
  return parseInt(fraction.slice(0, 3).padEnd(3, '0'), 10);
}

function timeOfDayMs(hh: string, mm: string, ss: string, fraction: string | undefined): number | null {
  const hours = parseInt(hh, 10);
  const minutes = parseInt(mm, 10);
  const seconds = parseInt(ss, 10);
  if (hours > 23 || minutes > 59 || seconds > 60) return null;
  // a leap second is only ever inserted at 23:59:60 and lands on the next midnight
  if (seconds === 60 && (hours !== 23 || minutes !== 59)) return null;
  return ((hours * 60 + minutes) * 60 + seconds) * 1000 + fractionToMs(fraction);
}

/**
 * Parse an epoch label into UTC milliseconds.
 * Returns null when the label matches neither supported form or a field is out of range.
 */
export function parseEpoch(label: string): number | null {
  const text = label.trim();

  const ordinal = ORDINAL_RE.exec(text);
  if (ordinal) {
    const [, yyyy, ddd, hh, mm, ss, fraction] = ordinal;
    const year = parseInt(yyyy, 10);
    const dayOfYear = parseInt(ddd, 10);
    if (dayOfYear < 1 || dayOfYear > (isLeapYear(year) ? 366 : 365)) return null;
    const tod = timeOfDayMs(hh, mm, ss, fraction);
    if (tod === null) return null;
    return utcDate(year, 0, 1) + (dayOfYear - 1) * MS_PER_DAY + tod;
  }

  const calendar = CALENDAR_RE.exec(text);
  if (calendar) {
    const [, yyyy, mo, dd, hh, mm, ss, fraction] = calendar;
    const year = parseInt(yyyy, 10);
    const month = parseInt(mo, 10);
    const day = parseInt(dd, 10);
    if (month < 1 || month > 12) return null;
    if (day < 1 || day > daysInMonth(year, month)) return null;
    const tod = timeOfDayMs(hh, mm, ss, fraction);
    if (tod === null) return null;
    return utcDate(year, month - 1, day) + tod;
  }

  return null;
}

/** Render UTC milliseconds as `YYYY-DDDTHH:MM:SS.fffZ`. */
export function formatOrdinalEpoch(epochMs: number): string {
  const date = new Date(epochMs);
  const year = date.getUTCFullYear();
  const dayOfYear = Math.floor((epochMs - utcDate(year, 0, 1)) / MS_PER_DAY) + 1;
  const time = date.toISOString().slice(11, 23);
  return `${String(year).padStart(4, '0')}-${String(dayOfYear).padStart(3, '0')}T${time}Z`;
}
