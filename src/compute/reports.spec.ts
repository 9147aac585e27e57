import { fakeRates, makeTimesheet, overtimeWeek, referenceData } from '../testing/fixtures.js';
import { ReportAggregator } from './aggregation.js';
import { ProfitabilityCalculator } from './profitability.js';
import {
  buildClientBillingSummary,
  buildDailyBreakdown,
  buildDepartmentBreakdown,
  buildEmployeeHours,
  buildHoursSummary,
  buildInvoice,
  buildJobcodeHours,
  buildOvertimeReport,
  buildPayrollReport,
  buildProjectCosts,
  buildPtoPayouts,
  buildPtoUsage,
  buildTimesheetReview,
  buildWagesReport,
} from './reports.js';
import { UtilizationCalculator } from './utilization.js';

const WEEK = { start_date: '2024-12-02', end_date: '2024-12-08' };

describe('report builders', () => {
  const aggregator = new ReportAggregator(referenceData());
  // user 1: 45h of work; user 2: 8h of vacation
  const timesheets = [...overtimeWeek(), makeTimesheet(6, 2, 21, '2024-12-03', 8)];

  describe('buildPayrollReport', () => {
    it('should total every employee with costs when all have rates', () => {
      const report = buildPayrollReport(aggregator, timesheets, WEEK, { rates: fakeRates({ 1: 20, 2: 30 }) });

      expect(report.date_range).toEqual(WEEK);
      expect(report.by_user['1']).toEqual({
        name: 'Ada Lovelace',
        regular_seconds: 144000,
        overtime_seconds: 18000,
        doubletime_seconds: 0,
        pto_seconds: 0,
        total_seconds: 162000,
        timesheet_count: 5,
        regular_cost: 800,
        overtime_cost: 150,
        doubletime_cost: 0,
        total_cost: 950,
      });
      expect(report.totals).toEqual({
        regular_seconds: 144000,
        overtime_seconds: 18000,
        doubletime_seconds: 0,
        pto_seconds: 28800,
        total_seconds: 190800,
        regular_cost: 800,
        overtime_cost: 150,
        doubletime_cost: 0,
        total_cost: 950,
      });
    });

    it('should drop cost totals when an employee has no rate', () => {
      const report = buildPayrollReport(aggregator, timesheets, WEEK, { rates: fakeRates({ 1: 20 }) });
      expect(report.by_user['1'].total_cost).toBe(950);
      expect(report.by_user['2'].total_cost).toBeUndefined();
      expect(report.totals.total_cost).toBeUndefined();
    });

    it('should list employees without time when zero time is included', () => {
      const report = buildPayrollReport(aggregator, timesheets, WEEK, { includeZeroTime: true });
      expect(Object.keys(report.by_user)).toEqual(['1', '2', '3']);
      expect(report.by_user['3'].total_seconds).toBe(0);
    });
  });

  it('should list overtime earners, largest first', () => {
    const extra = makeTimesheet(7, 2, 11, '2024-12-04', 41);
    const payroll = buildPayrollReport(aggregator, [...timesheets, extra], WEEK, { rates: fakeRates({ 1: 20, 2: 30 }) });
    const report = buildOvertimeReport(payroll);

    expect(report.total_overtime_seconds).toBe(21600);
    expect(report.employees.map((row) => [row.user_id, row.overtime_hours, row.overtime_cost])).toEqual([
      [1, 5, 150],
      [2, 1, 45],
    ]);
  });

  it('should break PTO down by jobcode', () => {
    expect(buildPtoUsage(aggregator, timesheets)).toEqual({
      total_pto_seconds: 28800,
      by_user: {
        '2': { name: 'Grace Hopper', pto_seconds: 28800, pto_hours: 8, by_jobcode: { '21': { name: 'Vacation', seconds: 28800 } } },
      },
    });
  });

  it('should price PTO payouts at the hourly rate', () => {
    const payroll = buildPayrollReport(aggregator, timesheets, WEEK);
    expect(buildPtoPayouts(payroll, fakeRates({ 2: 30 }))).toEqual({
      by_user: { '2': { name: 'Grace Hopper', pto_hours: 8, hourly_rate: 30, pto_wages: 240 } },
      total_pto_hours: 8,
      total_pto_wages: 240,
      employees_missing_rates: [],
    });
  });

  it('should leave the PTO payout total out when someone with PTO has no rate', () => {
    const payroll = buildPayrollReport(aggregator, timesheets, WEEK);
    expect(buildPtoPayouts(payroll, fakeRates({ 1: 20 }))).toEqual({
      by_user: { '2': { name: 'Grace Hopper', pto_hours: 8, hourly_rate: null, pto_wages: null } },
      total_pto_hours: 8,
      total_pto_wages: null,
      employees_missing_rates: [2],
    });
  });

  it('should count employees per department', () => {
    const breakdown = buildDepartmentBreakdown(aggregator, timesheets);
    expect(breakdown.by_group['7']).toMatchObject({ name: 'Engineering', employee_count: 1, total_seconds: 162000 });
    expect(breakdown.by_group['8']).toMatchObject({ name: 'Support', employee_count: 1, pto_seconds: 28800 });
  });

  it('should report labor cost and billable amount per jobcode', () => {
    const report = buildProjectCosts(aggregator, overtimeWeek(), fakeRates({ 1: 20 }, { 10: 100 }));
    expect(report.by_jobcode['11']).toMatchObject({
      name: 'Website',
      path: 'Acme › Website',
      total_hours: 45,
      total_cost: 950,
      billable_rate: 100,
      billable_amount: 4500,
    });
    expect(report.labor_cost_total).toBe(950);
  });

  it('should roll billing up to the top-level client', () => {
    const entries = [makeTimesheet(1, 1, 10, '2024-12-02', 1), makeTimesheet(2, 1, 11, '2024-12-02', 5)];
    expect(buildClientBillingSummary(aggregator, entries, fakeRates({}, { 11: 120 }))).toEqual({
      by_client: {
        '10': { name: 'Acme', total_seconds: 21600, billable_seconds: 18000, unpriced_seconds: 3600, billable_amount: 600 },
      },
      total_billable_amount: 600,
    });
  });

  describe('buildInvoice', () => {
    const entries = [
      makeTimesheet(1, 1, 11, '2024-12-02', 3),
      makeTimesheet(2, 1, 11, '2024-12-03', 2),
      makeTimesheet(3, 1, 10, '2024-12-03', 1),
    ];

    it('should bill each jobcode at its inherited rate', () => {
      const invoice = buildInvoice(aggregator, entries, 10, WEEK, { rates: fakeRates({}, { 10: 100 }) });
      expect(invoice.client).toEqual({ jobcode_id: 10, name: 'Acme' });
      expect(invoice.line_items).toEqual([
        { jobcode_id: 10, description: 'Acme', hours: 1, rate: 100, amount: 100 },
        { jobcode_id: 11, description: 'Acme › Website', hours: 5, rate: 100, amount: 500 },
      ]);
      expect(invoice.total_amount).toBe(600);
      expect(invoice.billable_hours).toBe(6);
    });

    it('should apply a flat rate override', () => {
      const invoice = buildInvoice(aggregator, entries, 10, WEEK, { rates: fakeRates({}, { 10: 100 }), hourlyRate: 150 });
      expect(invoice.total_amount).toBe(900);
    });

    it('should leave unpriced lines without an amount', () => {
      const invoice = buildInvoice(aggregator, entries, 10, WEEK, { rates: fakeRates({}) });
      expect(invoice.line_items.every((line) => line.rate === null && line.amount === null)).toBe(true);
      expect(invoice.unpriced_hours).toBe(6);
      expect(invoice.total_amount).toBe(0);
    });
  });

  it('should sum hours by employee, jobcode and day', () => {
    const entries = [makeTimesheet(1, 1, 11, '2024-12-03', 2), makeTimesheet(2, 2, 11, '2024-12-02', 1.5)];
    expect(buildEmployeeHours(aggregator, entries)['2']).toEqual({
      name: 'Grace Hopper',
      total_seconds: 5400,
      total_hours: 1.5,
      entry_count: 1,
    });
    expect(buildJobcodeHours(aggregator, entries)['11']).toEqual({
      name: 'Website',
      path: 'Acme › Website',
      total_seconds: 12600,
      total_hours: 3.5,
      entry_count: 2,
    });
    const daily = buildDailyBreakdown(aggregator, entries);
    expect(Object.keys(daily.by_date)).toEqual(['2024-12-02', '2024-12-03']);
    expect(daily.by_date['2024-12-03']).toEqual({ total_seconds: 7200, total_hours: 2, entry_count: 1 });
  });

  it('should summarise hours from a payroll report', () => {
    expect(buildHoursSummary(buildPayrollReport(aggregator, timesheets, WEEK))).toEqual({
      regular_hours: 40,
      overtime_hours: 5,
      doubletime_hours: 0,
      pto_hours: 8,
      total_hours: 53,
      employee_count: 2,
    });
  });

  describe('buildWagesReport', () => {
    it('should add PTO wages to worked wages', () => {
      const rates = fakeRates({ 1: 20, 2: 30 });
      const report = buildWagesReport(aggregator, buildPayrollReport(aggregator, timesheets, WEEK, { rates }), rates);
      expect(report.by_user['1']).toEqual({
        name: 'Ada Lovelace',
        payroll_id: 'A-1',
        employee_number: 101,
        hourly_rate: 20,
        regular_wages: 800,
        overtime_wages: 150,
        doubletime_wages: 0,
        pto_wages: 0,
        total_wages: 950,
      });
      expect(report.by_user['2'].total_wages).toBe(240);
      expect(report.total_wages).toBe(1190);
      expect(report.employees_missing_rates).toEqual([]);
    });

    it('should flag employees without a rate', () => {
      const rates = fakeRates({ 1: 20 });
      const report = buildWagesReport(aggregator, buildPayrollReport(aggregator, timesheets, WEEK, { rates }), rates);
      expect(report.employees_missing_rates).toEqual([2]);
      expect(report.by_user['2'].total_wages).toBeNull();
      expect(report.by_user['1'].total_wages).toBe(950);
      expect(report.total_wages).toBeNull();
    });
  });

  it('should list unlocked and running timesheets for review', () => {
    const entries = [
      makeTimesheet(1, 1, 11, '2024-12-02', 2),
      makeTimesheet(2, 1, 11, '2024-12-03', 2, { locked: 1 }),
      makeTimesheet(3, 2, 11, '2024-12-04', 1, { on_the_clock: true }),
    ];
    const review = buildTimesheetReview(aggregator, entries);
    expect(review.unlocked_count).toBe(1);
    expect(review.unlocked[0]).toEqual({
      timesheet_id: 1,
      user_id: 1,
      name: 'Ada Lovelace',
      date: '2024-12-02',
      hours: 2,
      jobcode: 'Acme › Website',
    });
    expect(review.on_the_clock.map((item) => item.timesheet_id)).toEqual([3]);
  });
});

describe('UtilizationCalculator', () => {
  const aggregator = new ReportAggregator(referenceData());
  const calculator = new UtilizationCalculator(aggregator);

  it('should measure worked time against weekday capacity', () => {
    const timesheets = [...overtimeWeek(), makeTimesheet(6, 2, 21, '2024-12-03', 8)];
    const report = calculator.calculate(timesheets, WEEK);

    expect(report.settings).toEqual({ capacity_hours_per_day: 8, exclude_weekends: true, working_days: 5 });
    expect(report.by_user['1']).toEqual({
      name: 'Ada Lovelace',
      worked_seconds: 162000,
      worked_hours: 45,
      capacity_seconds: 144000,
      capacity_hours: 40,
      utilization_percent: 112.5,
    });
    expect(report.by_user['2'].worked_seconds).toBe(0);
    expect(report.totals.utilization_percent).toBe(56.25);
  });

  it('should count weekends when asked', () => {
    expect(calculator.calculateWorkingDays(WEEK, false)).toBe(7);
  });
});

describe('ProfitabilityCalculator', () => {
  const aggregator = new ReportAggregator(referenceData());
  const timesheets = [makeTimesheet(1, 1, 11, '2024-12-02', 5), makeTimesheet(2, 2, 21, '2024-12-03', 8)];

  it('should compare revenue with labor cost including PTO', () => {
    const report = new ProfitabilityCalculator(aggregator, fakeRates({ 1: 20, 2: 30 }, { 10: 100 })).calculate(timesheets);
    expect(report).toEqual({
      revenue: 500,
      labor_cost: 340,
      profit: 160,
      margin_percent: 32,
      total_hours: 13,
      billable_hours: 5,
      unpriced_hours: 8,
      employees_missing_rates: [],
      warnings: [],
    });
  });

  it('should withhold cost and profit when a rate is missing', () => {
    const report = new ProfitabilityCalculator(aggregator, fakeRates({ 1: 20 }, { 10: 100 })).calculate(timesheets);
    expect(report.labor_cost).toBeNull();
    expect(report.profit).toBeNull();
    expect(report.employees_missing_rates).toEqual([2]);
    expect(report.warnings).toEqual(['No hourly rate found for user Grace Hopper (ID: 2)']);
  });
});
