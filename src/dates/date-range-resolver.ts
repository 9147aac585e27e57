/**
 * Date Range Resolver
 *
 * Turns the date phrases accountants use ("last month", "year to date",
 * "12/01/2024 through 12/15/2024") into inclusive ISO date ranges, relative
 * to an anchor date in the reporting timezone.
 */

import { AmbiguousDateError, UnparseableDateError, ValidationError } from '../errors.js';
import {
  addDays,
  addMonths,
  firstOfMonth,
  isIsoDate,
  lastOfMonth,
  startOfIsoWeek,
  todayIn,
  tryIsoDate,
  yearMonthOf,
  type DateRange,
  type YearMonth,
} from './calendar.js';

export interface DateRangeResolverOptions {
  /** First month (1-12) of the fiscal year; fiscal phrases need it */
  fiscalYearStartMonth?: number;
}

/**
 * Parameters a tool receives for a period: either a phrase, or explicit
 * start and end expressions
 */
export interface RangeParams {
  period?: string;
  start_date?: string;
  end_date?: string;
}

type RelativeRule = (anchor: string) => DateRange;

const MONTHS: ReadonlyArray<readonly [string, number]> = [
  ['january', 1], ['february', 2], ['march', 3], ['april', 4],
  ['may', 5], ['june', 6], ['july', 7], ['august', 8],
  ['september', 9], ['october', 10], ['november', 11], ['december', 12],
];

const ISO_LITERAL = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const NUMERIC_LITERAL = /^(\d{1,2})[/-](\d{1,2})[/-](\d{4})$/;
const MONTH_FIRST_LITERAL = /^([a-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})$/;
const DAY_FIRST_LITERAL = /^(\d{1,2})(?:st|nd|rd|th)?\s+([a-z]+)\.?,?\s+(\d{4})$/;
const QUARTER_LITERAL = /^q([1-4]),?\s+(\d{4})$/;
const MONTH_YEAR_LITERAL = /^([a-z]+)\.?,?\s+(\d{4})$/;
const TRAILING_DAYS = /^(?:last|past) (\d{1,3}) days?$/;
const RANGE_EXPRESSION = /^(?:from\s+)?(.+?)\s+(?:to|through|thru|until)\s+(.+)$/;

const ALIASES: Readonly<Record<string, string>> = {
  'ytd': 'year to date',
  'previous week': 'last week',
  'previous month': 'last month',
  'previous quarter': 'last quarter',
  'previous year': 'last year',
  'current week': 'this week',
  'current month': 'this month',
  'current quarter': 'this quarter',
};

function normalize(expression: string): string {
  return expression.trim().toLowerCase().replace(/\s+/g, ' ');
}

function monthNumber(name: string): number | undefined {
  if (name.length < 3) return undefined;
  const match = MONTHS.find(([full]) => full.startsWith(name));
  return match?.[1];
}

function monthSpan(from: YearMonth, months: number): DateRange {
  return {
    start_date: firstOfMonth(from),
    end_date: lastOfMonth(addMonths(from, months - 1)),
  };
}

function calendarQuarterStart(anchor: string): YearMonth {
  const { year, month } = yearMonthOf(anchor);
  return { year, month: Math.floor((month - 1) / 3) * 3 + 1 };
}

export class DateRangeResolver {
  private readonly fiscalYearStartMonth?: number;
  private readonly rules: ReadonlyMap<string, RelativeRule>;

  constructor(options: DateRangeResolverOptions = {}) {
    const month = options.fiscalYearStartMonth;
    if (month !== undefined && (!Number.isInteger(month) || month < 1 || month > 12)) {
      throw new ValidationError(`Fiscal year start month must be between 1 and 12, got ${month}.`);
    }
    this.fiscalYearStartMonth = month;
    this.rules = new Map<string, RelativeRule>([
      ['today', (a) => ({ start_date: a, end_date: a })],
      ['yesterday', (a) => ({ start_date: addDays(a, -1), end_date: addDays(a, -1) })],
      ['this week', (a) => {
        const monday = startOfIsoWeek(a);
        return { start_date: monday, end_date: addDays(monday, 6) };
      }],
      ['last week', (a) => {
        const monday = addDays(startOfIsoWeek(a), -7);
        return { start_date: monday, end_date: addDays(monday, 6) };
      }],
      ['this month', (a) => monthSpan(yearMonthOf(a), 1)],
      ['last month', (a) => monthSpan(addMonths(yearMonthOf(a), -1), 1)],
      ['this quarter', (a) => monthSpan(calendarQuarterStart(a), 3)],
      ['last quarter', (a) => monthSpan(addMonths(calendarQuarterStart(a), -3), 3)],
      ['year to date', (a) => ({ start_date: firstOfMonth({ year: yearMonthOf(a).year, month: 1 }), end_date: a })],
      ['this year', (a) => monthSpan({ year: yearMonthOf(a).year, month: 1 }, 12)],
      ['last year', (a) => monthSpan({ year: yearMonthOf(a).year - 1, month: 1 }, 12)],
      ['this fiscal year', (a) => monthSpan(this.fiscalYearStart(a, 'this fiscal year'), 12)],
      ['last fiscal year', (a) => monthSpan(addMonths(this.fiscalYearStart(a, 'last fiscal year'), -12), 12)],
      ['this fiscal quarter', (a) => monthSpan(this.fiscalQuarterStart(a, 'this fiscal quarter'), 3)],
      ['last fiscal quarter', (a) => monthSpan(addMonths(this.fiscalQuarterStart(a, 'last fiscal quarter'), -3), 3)],
    ]);
  }

  /**
   * Resolve an expression relative to the anchor date (YYYY-MM-DD)
   */
  resolve(expression: string, anchorDate: string): DateRange {
    if (!isIsoDate(anchorDate)) {
      throw new ValidationError(`Anchor date must be a real YYYY-MM-DD date, got "${anchorDate}".`);
    }

    const normalized = normalize(expression);
    const key = ALIASES[normalized] ?? normalized;
    const rule = this.rules.get(key);
    if (rule) {
      return rule(anchorDate);
    }

    const period = this.parsePeriod(normalized, anchorDate);
    if (period) {
      return period;
    }

    const literal = this.parseLiteral(normalized);
    if (literal) {
      return { start_date: literal, end_date: literal };
    }

    const range = RANGE_EXPRESSION.exec(normalized);
    if (range) {
      const start = this.resolve(range[1], anchorDate).start_date;
      const end = this.resolve(range[2], anchorDate).end_date;
      if (start > end) {
        throw new ValidationError(`"${expression}" ends before it starts.`);
      }
      return { start_date: start, end_date: end };
    }

    throw new UnparseableDateError(expression);
  }

  /**
   * Resolve a tool's period parameters. A period phrase wins; otherwise the
   * start expression contributes its first day and the end expression its
   * last day.
   */
  resolveParams(params: RangeParams, anchorDate: string, fallback?: (anchor: string) => DateRange): DateRange {
    if (params.period) {
      return this.resolve(params.period, anchorDate);
    }
    if (!params.start_date && !params.end_date && fallback) {
      return fallback(anchorDate);
    }
    if (!params.start_date || !params.end_date) {
      throw new ValidationError('Provide a period (like "last month") or both a start date and an end date.');
    }
    const range = {
      start_date: this.resolve(params.start_date, anchorDate).start_date,
      end_date: this.resolve(params.end_date, anchorDate).end_date,
    };
    if (range.start_date > range.end_date) {
      throw new ValidationError(`The start date ${range.start_date} is after the end date ${range.end_date}.`);
    }
    return range;
  }

  /**
   * Fourteen-day pay period ending on (and including) the given date
   */
  resolveBiweekly(endDate: string): DateRange {
    if (!isIsoDate(endDate)) {
      throw new ValidationError(`Pay period end must be a real YYYY-MM-DD date, got "${endDate}".`);
    }
    return { start_date: addDays(endDate, -13), end_date: endDate };
  }

  monthRange(month: number, year: number): DateRange {
    if (!Number.isInteger(month) || month < 1 || month > 12) {
      throw new ValidationError(`Month must be between 1 and 12, got ${month}.`);
    }
    return monthSpan({ year, month }, 1);
  }

  quarterRange(quarter: number, year: number): DateRange {
    if (!Number.isInteger(quarter) || quarter < 1 || quarter > 4) {
      throw new ValidationError(`Quarter must be between 1 and 4, got ${quarter}.`);
    }
    return monthSpan({ year, month: (quarter - 1) * 3 + 1 }, 3);
  }

  /**
   * Today's date in the reporting timezone
   */
  today(timezone: string, now: Date = new Date()): string {
    return todayIn(timezone, now);
  }

  /**
   * "Q3 2024", "March 2024" and "last 30 days" (ending on the anchor)
   */
  private parsePeriod(expression: string, anchorDate: string): DateRange | null {
    let match = QUARTER_LITERAL.exec(expression);
    if (match) {
      return this.quarterRange(Number(match[1]), Number(match[2]));
    }

    match = MONTH_YEAR_LITERAL.exec(expression);
    if (match) {
      const month = monthNumber(match[1]);
      return month ? monthSpan({ year: Number(match[2]), month }, 1) : null;
    }

    match = TRAILING_DAYS.exec(expression);
    if (match) {
      const days = Number(match[1]);
      if (days < 1) {
        throw new ValidationError(`"${expression}" covers no days.`);
      }
      return { start_date: addDays(anchorDate, 1 - days), end_date: anchorDate };
    }

    return null;
  }

  private parseLiteral(expression: string): string | null {
    let match = ISO_LITERAL.exec(expression);
    if (match) {
      return tryIsoDate(Number(match[1]), Number(match[2]), Number(match[3]));
    }

    match = NUMERIC_LITERAL.exec(expression);
    if (match) {
      return tryIsoDate(Number(match[3]), Number(match[1]), Number(match[2]));
    }

    match = MONTH_FIRST_LITERAL.exec(expression);
    if (match) {
      const month = monthNumber(match[1]);
      return month ? tryIsoDate(Number(match[3]), month, Number(match[2])) : null;
    }

    match = DAY_FIRST_LITERAL.exec(expression);
    if (match) {
      const month = monthNumber(match[2]);
      return month ? tryIsoDate(Number(match[3]), month, Number(match[1])) : null;
    }

    return null;
  }

  private fiscalYearStart(anchor: string, expression: string): YearMonth {
    if (this.fiscalYearStartMonth === undefined) {
      throw new AmbiguousDateError(
        expression,
        'no fiscal year start month is configured (set FISCAL_YEAR_START_MONTH), so the fiscal calendar is unknown.'
      );
    }
    const { year, month } = yearMonthOf(anchor);
    const startYear = month >= this.fiscalYearStartMonth ? year : year - 1;
    return { year: startYear, month: this.fiscalYearStartMonth };
  }

  private fiscalQuarterStart(anchor: string, expression: string): YearMonth {
    const yearStart = this.fiscalYearStart(anchor, expression);
    const { year, month } = yearMonthOf(anchor);
    const monthsIn = (year * 12 + month) - (yearStart.year * 12 + yearStart.month);
    return addMonths(yearStart, Math.floor(monthsIn / 3) * 3);
  }
}
