import { AmbiguousDateError, UnparseableDateError, ValidationError } from '../errors.js';
import { DateRangeResolver } from './date-range-resolver.js';

const ANCHOR = '2024-12-31'; // a Tuesday

describe('DateRangeResolver', () => {
  const resolver = new DateRangeResolver();

  describe('relative expressions', () => {
    it.each([
      ['today', '2024-12-31', '2024-12-31'],
      ['yesterday', '2024-12-30', '2024-12-30'],
      ['this week', '2024-12-30', '2025-01-05'],
      ['last week', '2024-12-23', '2024-12-29'],
      ['this month', '2024-12-01', '2024-12-31'],
      ['last month', '2024-11-01', '2024-11-30'],
      ['this quarter', '2024-10-01', '2024-12-31'],
      ['last quarter', '2024-07-01', '2024-09-30'],
      ['year to date', '2024-01-01', '2024-12-31'],
      ['YTD', '2024-01-01', '2024-12-31'],
      ['last year', '2023-01-01', '2023-12-31'],
      ['Previous Month', '2024-11-01', '2024-11-30'],
    ])('should resolve "%s" to %s..%s', (expression, start, end) => {
      expect(resolver.resolve(expression, ANCHOR)).toEqual({ start_date: start, end_date: end });
    });

    it('should wrap last month and last quarter across a year boundary', () => {
      expect(resolver.resolve('last month', '2025-01-15')).toEqual({ start_date: '2024-12-01', end_date: '2024-12-31' });
      expect(resolver.resolve('last quarter', '2025-02-10')).toEqual({ start_date: '2024-10-01', end_date: '2024-12-31' });
    });

    it('should treat a Sunday as the end of its week', () => {
      expect(resolver.resolve('this week', '2024-12-29')).toEqual({ start_date: '2024-12-23', end_date: '2024-12-29' });
    });

    it('should handle a leap-year February', () => {
      expect(resolver.resolve('last month', '2024-03-05')).toEqual({ start_date: '2024-02-01', end_date: '2024-02-29' });
    });
  });

  describe('named periods', () => {
    it.each([
      ['Q3 2024', '2024-07-01', '2024-09-30'],
      ['q1, 2025', '2025-01-01', '2025-03-31'],
      ['March 2024', '2024-03-01', '2024-03-31'],
      ['feb 2023', '2023-02-01', '2023-02-28'],
      ['last 7 days', '2024-12-25', '2024-12-31'],
      ['past 1 day', '2024-12-31', '2024-12-31'],
    ])('should resolve "%s" to %s..%s', (expression, start, end) => {
      expect(resolver.resolve(expression, ANCHOR)).toEqual({ start_date: start, end_date: end });
    });

    it('should join two quarters into one range', () => {
      expect(resolver.resolve('Q1 2024 through Q2 2024', ANCHOR)).toEqual({
        start_date: '2024-01-01',
        end_date: '2024-06-30',
      });
    });

    it('should refuse a trailing window of no days', () => {
      expect(() => resolver.resolve('last 0 days', ANCHOR)).toThrow(ValidationError);
    });
  });

  describe('literals', () => {
    it.each([
      ['2024-12-15'],
      ['12/15/2024'],
      ['12-15-2024'],
      ['December 15, 2024'],
      ['Dec 15, 2024'],
      ['dec. 15th 2024'],
      ['15 December 2024'],
    ])('should read "%s" as a single day', (expression) => {
      expect(resolver.resolve(expression, ANCHOR)).toEqual({ start_date: '2024-12-15', end_date: '2024-12-15' });
    });

    it.each(['2024-02-30', '02/30/2024', '13/01/2024', 'Smarch 3, 2024'])('should refuse the impossible date "%s"', (expression) => {
      expect(() => resolver.resolve(expression, ANCHOR)).toThrow(UnparseableDateError);
    });

    it('should refuse gibberish with a plain-language hint', () => {
      expect(() => resolver.resolve('the other day', ANCHOR)).toThrow(
        '"the other day" is not a date I understand. Try a date like 12/31/2024, "December 31, 2024", or a phrase like "last month".'
      );
    });
  });

  describe('ranges', () => {
    it('should join two literals', () => {
      expect(resolver.resolve('12/01/2024 through 12/15/2024', ANCHOR)).toEqual({
        start_date: '2024-12-01',
        end_date: '2024-12-15',
      });
      expect(resolver.resolve('from 2024-11-01 to 2024-11-30', ANCHOR)).toEqual({
        start_date: '2024-11-01',
        end_date: '2024-11-30',
      });
    });

    it('should widen phrases to their outer edges', () => {
      expect(resolver.resolve('last quarter to last month', ANCHOR)).toEqual({
        start_date: '2024-07-01',
        end_date: '2024-11-30',
      });
    });

    it('should refuse a range that ends before it starts', () => {
      expect(() => resolver.resolve('2024-12-15 to 2024-12-01', ANCHOR)).toThrow(ValidationError);
    });
  });

  describe('fiscal calendar', () => {
    it('should be ambiguous without a fiscal year start month', () => {
      expect(() => resolver.resolve('this fiscal year', ANCHOR)).toThrow(AmbiguousDateError);
      expect(() => resolver.resolve('last fiscal quarter', ANCHOR)).toThrow(AmbiguousDateError);
    });

    it('should follow a July fiscal year', () => {
      const fiscal = new DateRangeResolver({ fiscalYearStartMonth: 7 });
      expect(fiscal.resolve('this fiscal year', ANCHOR)).toEqual({ start_date: '2024-07-01', end_date: '2025-06-30' });
      expect(fiscal.resolve('last fiscal year', ANCHOR)).toEqual({ start_date: '2023-07-01', end_date: '2024-06-30' });
      expect(fiscal.resolve('this fiscal quarter', ANCHOR)).toEqual({ start_date: '2024-10-01', end_date: '2024-12-31' });
      expect(fiscal.resolve('last fiscal quarter', ANCHOR)).toEqual({ start_date: '2024-07-01', end_date: '2024-09-30' });
    });

    it('should place early-year anchors in the fiscal year that began the previous calendar year', () => {
      const fiscal = new DateRangeResolver({ fiscalYearStartMonth: 4 });
      expect(fiscal.resolve('this fiscal year', '2025-02-14')).toEqual({ start_date: '2024-04-01', end_date: '2025-03-31' });
      expect(fiscal.resolve('this fiscal quarter', '2025-02-14')).toEqual({ start_date: '2025-01-01', end_date: '2025-03-31' });
    });

    it('should reject a fiscal start month outside 1-12', () => {
      expect(() => new DateRangeResolver({ fiscalYearStartMonth: 13 })).toThrow(ValidationError);
    });
  });

  describe('pay periods and calendar helpers', () => {
    it('should make a 14-day bi-weekly period ending on the given date', () => {
      expect(resolver.resolveBiweekly('2024-12-31')).toEqual({ start_date: '2024-12-18', end_date: '2024-12-31' });
    });

    it('should build month and quarter ranges', () => {
      expect(resolver.monthRange(2, 2023)).toEqual({ start_date: '2023-02-01', end_date: '2023-02-28' });
      expect(resolver.quarterRange(4, 2024)).toEqual({ start_date: '2024-10-01', end_date: '2024-12-31' });
      expect(() => resolver.quarterRange(5, 2024)).toThrow(ValidationError);
      expect(() => resolver.monthRange(0, 2024)).toThrow(ValidationError);
    });

    it('should compute today in the reporting timezone', () => {
      const now = new Date('2025-01-01T03:00:00Z');
      expect(resolver.today('UTC', now)).toBe('2025-01-01');
      expect(resolver.today('America/Denver', now)).toBe('2024-12-31');
    });

    it('should reject an anchor that is not a real date', () => {
      expect(() => resolver.resolve('today', '2024-02-30')).toThrow(ValidationError);
    });
  });

  describe('tool parameters', () => {
    it('should prefer a period phrase', () => {
      expect(resolver.resolveParams({ period: 'last month', start_date: '2024-01-01' }, ANCHOR)).toEqual({
        start_date: '2024-11-01',
        end_date: '2024-11-30',
      });
    });

    it('should take the first day of the start and the last day of the end expression', () => {
      expect(resolver.resolveParams({ start_date: 'last quarter', end_date: 'last month' }, ANCHOR)).toEqual({
        start_date: '2024-07-01',
        end_date: '2024-11-30',
      });
    });

    it('should fall back when no dates are given', () => {
      const range = resolver.resolveParams({}, ANCHOR, (anchor) => resolver.resolve('year to date', anchor));
      expect(range).toEqual({ start_date: '2024-01-01', end_date: '2024-12-31' });
    });

    it('should insist on both ends without a fallback', () => {
      expect(() => resolver.resolveParams({ start_date: '2024-12-01' }, ANCHOR)).toThrow(ValidationError);
    });
  });
});
