import type { CellDuration } from '@odsflow/shared';

// YYYY-MM-DD[THH:MM[:SS[.fff]]][Z|±HH[:]MM]
const DATE_TIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/;

// [-]PnYnMnWnDTnHnMnS, fraction allowed on seconds only
const DURATION_PATTERN =
  /^(-)?P(?:(\d+)Y)?(?:(\d+)M)?(?:(\d+)W)?(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+(?:[.,]\d+)?)S)?)?$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29;
  return DAYS_IN_MONTH[month - 1] ?? 0;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/** Offset in minutes east of UTC, null when the string carries none */
function parseOffset(zone: string | undefined): number | null {
  if (zone === undefined) return null;
  if (zone === 'Z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.substring(1).replace(':', '');
  const hours = parseInt(digits.substring(0, 2), 10);
  const minutes = digits.length > 2 ? parseInt(digits.substring(2), 10) : 0;
  if (hours > 23 || minutes > 59) return Number.NaN;
  return sign * (hours * 60 + minutes);
}

/**
 * Parse an ISO-8601 calendar date or date-time.
 * Without an offset the value is read as local time.
 * Returns null when the string is not a valid date.
 */
export function parseIsoDateTime(raw: string): Date | null {
  const match = raw.match(DATE_TIME_PATTERN);
  if (!match) return null;

  const [, y, mo, d, h, mi, s, frac, zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hours = h === undefined ? 0 : Number(h);
  const minutes = mi === undefined ? 0 : Number(mi);
  const seconds = s === undefined ? 0 : Number(s);
  const millis = frac === undefined ? 0 : Number(frac.substring(0, 3).padEnd(3, '0'));

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  const offset = parseOffset(zone);
  if (offset !== null && Number.isNaN(offset)) return null;

  if (offset === null) {
    const local = new Date(2000, 0, 1, hours, minutes, seconds, millis);
    local.setFullYear(year, month - 1, day);
    return local;
  }

  const utc = new Date(0);
  utc.setUTCFullYear(year, month - 1, day);
  utc.setUTCHours(hours, minutes - offset, seconds, millis);
  return utc;
}

/**
 * Parse an ISO-8601 duration such as "PT13H24M00S" or "P1Y2M3DT4H".
 * Weeks are folded into days. Returns null when the string is not a valid duration.
 */
export function parseIsoDuration(raw: string): CellDuration | null {
  const match = raw.match(DURATION_PATTERN);
  if (!match) return null;

  const [, minus, y, mo, w, d, h, mi, s] = match;
  if ([y, mo, w, d, h, mi, s].every((part) => part === undefined)) return null;
  // "P1DT" has a time designator with nothing after it
  if (raw.endsWith('T')) return null;

  const count = (part: string | undefined): number => (part === undefined ? 0 : Number(part));

  return {
    years: count(y),
    months: count(mo),
    days: count(w) * 7 + count(d),
    hours: count(h),
    minutes: count(mi),
    seconds: s === undefined ? 0 : Number(s.replace(',', '.')),
    negative: minus === '-',
  };
}
