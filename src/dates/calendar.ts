/**
 * Plain calendar-date arithmetic on ISO `YYYY-MM-DD` strings.
 *
 * Dates are handled as UTC midnights so that adding days never crosses a
 * daylight-saving boundary.
 */

export interface DateRange {
  start_date: string; // YYYY-MM-DD, inclusive
  end_date: string;   // YYYY-MM-DD, inclusive
}

export interface YearMonth {
  year: number;
  month: number; // 1-12
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export function isoDate(year: number, month: number, day: number): string {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/**
 * Build an ISO date from parts, or null when the parts name no real day
 * (e.g. February 30th)
 */
export function tryIsoDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1) return null;
  if (day > daysInMonth(year, month)) return null;
  return isoDate(year, month, day);
}

export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  return tryIsoDate(Number(match[1]), Number(match[2]), Number(match[3])) !== null;
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function toUtc(iso: string): Date {
  const match = ISO_DATE.exec(iso);
  if (!match) {
    throw new RangeError(`Not an ISO date: ${iso}`);
  }
  return new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
}

function fromUtc(date: Date): string {
  return isoDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
}

export function addDays(iso: string, days: number): string {
  return fromUtc(new Date(toUtc(iso).getTime() + days * MS_PER_DAY));
}

export function diffDays(fromIso: string, toIso: string): number {
  return Math.round((toUtc(toIso).getTime() - toUtc(fromIso).getTime()) / MS_PER_DAY);
}

export function yearMonthOf(iso: string): YearMonth {
  const date = toUtc(iso);
  return { year: date.getUTCFullYear(), month: date.getUTCMonth() + 1 };
}

export function addMonths(ym: YearMonth, months: number): YearMonth {
  const total = ym.year * 12 + (ym.month - 1) + months;
  return { year: Math.floor(total / 12), month: (total % 12) + 1 };
}

export function firstOfMonth(ym: YearMonth): string {
  return isoDate(ym.year, ym.month, 1);
}

export function lastOfMonth(ym: YearMonth): string {
  return isoDate(ym.year, ym.month, daysInMonth(ym.year, ym.month));
}

/** ISO weekday, Monday = 1 … Sunday = 7 */
export function isoWeekday(iso: string): number {
  const day = toUtc(iso).getUTCDay();
  return day === 0 ? 7 : day;
}

/** Monday of the ISO week containing the date */
export function startOfIsoWeek(iso: string): string {
  return addDays(iso, 1 - isoWeekday(iso));
}

export function compareIsoDates(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Every date of an inclusive range, in order
 */
export function eachDay(range: DateRange): string[] {
  const days: string[] = [];
  for (let current = range.start_date; current <= range.end_date; current = addDays(current, 1)) {
    days.push(current);
  }
  return days;
}

/**
 * Current calendar date in an IANA timezone
 */
export function todayIn(timezone: string, now: Date = new Date()): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(now);
  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((p) => p.type === type)?.value);
  return isoDate(part('year'), part('month'), part('day'));
}
