/**
 * Report builders
 *
 * Each builder turns fetched timesheets (plus the aggregator's reference
 * data and resolved rates) into one section of an accounting package.
 * Builders are pure: no fetching, no clock.
 */

import type { DateRange } from '../dates/calendar.js';
import type { Timesheet } from '../qbtime/types.js';
import { ReportAggregator, roundCurrency } from './aggregation.js';
import type {
  AggregateRow,
  ClientBillingSummary,
  CostFields,
  DailyBreakdown,
  DepartmentBreakdown,
  HoursRow,
  HoursSummary,
  InvoiceLineItem,
  InvoiceTotals,
  OvertimeReport,
  PayrollReport,
  PayrollTotals,
  PayrollUserRow,
  ProjectCostReport,
  PtoPayoutReport,
  PtoUsageReport,
  RateLookup,
  TimesheetReview,
  TimesheetReviewItem,
  WagesReport,
} from './types.js';

export function toHours(seconds: number): number {
  return Math.round((seconds / 3600) * 100) / 100;
}

function totalSeconds(row: AggregateRow): number {
  return row.regular_seconds + row.overtime_seconds + row.doubletime_seconds + row.pto_seconds;
}

function workedSeconds(row: AggregateRow): number {
  return row.regular_seconds + row.overtime_seconds + row.doubletime_seconds;
}

function costsOf(row: Partial<CostFields>): Partial<CostFields> {
  if (row.total_cost === undefined) return {};
  return {
    regular_cost: row.regular_cost,
    overtime_cost: row.overtime_cost,
    doubletime_cost: row.doubletime_cost,
    total_cost: row.total_cost,
  };
}

/**
 * Hourly rate per employee, for every employee in the entries or the
 * reference data that has one
 */
export function hourlyRateMap(
  aggregator: ReportAggregator,
  timesheets: readonly Timesheet[],
  rates: RateLookup
): Map<number, number> {
  const ids = new Set<number>(timesheets.map((entry) => entry.user_id));
  for (const user of aggregator.users()) {
    ids.add(user.id);
  }
  const map = new Map<number, number>();
  for (const id of ids) {
    const rate = rates.hourlyRate(id);
    if (rate !== undefined) map.set(id, rate);
  }
  return map;
}

/**
 * Billable rate of the jobcode, or of its nearest ancestor that has one
 */
export function billableRateFor(aggregator: ReportAggregator, rates: RateLookup, jobcodeId: number): number | undefined {
  const direct = rates.billableRate(jobcodeId);
  if (direct !== undefined) return direct;
  for (const ancestor of aggregator.tree.ancestors(jobcodeId)) {
    const rate = rates.billableRate(ancestor.id);
    if (rate !== undefined) return rate;
  }
  return undefined;
}

// ============================================
// Payroll
// ============================================

export interface PayrollOptions {
  rates?: RateLookup;
  includeZeroTime?: boolean;
}

export function buildPayrollReport(
  aggregator: ReportAggregator,
  timesheets: readonly Timesheet[],
  range: DateRange,
  options: PayrollOptions = {}
): PayrollReport {
  const hourlyRates = options.rates ? hourlyRateMap(aggregator, timesheets, options.rates) : undefined;
  const byEmployee = aggregator.aggregate(timesheets, 'employee', {
    hourlyRates,
    includeZeroTime: options.includeZeroTime,
  });

  const totals: PayrollTotals = {
    regular_seconds: 0,
    overtime_seconds: 0,
    doubletime_seconds: 0,
    pto_seconds: 0,
    total_seconds: 0,
  };
  const by_user: Record<string, PayrollUserRow> = {};
  let allCosted = hourlyRates !== undefined;
  const costTotals: CostFields = { regular_cost: 0, overtime_cost: 0, doubletime_cost: 0, total_cost: 0 };

  for (const [userId, row] of Object.entries(byEmployee)) {
    by_user[userId] = {
      name: aggregator.userName(Number(userId)),
      regular_seconds: row.regular_seconds,
      overtime_seconds: row.overtime_seconds,
      doubletime_seconds: row.doubletime_seconds,
      pto_seconds: row.pto_seconds,
      total_seconds: totalSeconds(row),
      timesheet_count: row.entry_count,
      ...costsOf(row),
    };

    totals.regular_seconds += row.regular_seconds;
    totals.overtime_seconds += row.overtime_seconds;
    totals.doubletime_seconds += row.doubletime_seconds;
    totals.pto_seconds += row.pto_seconds;
    totals.total_seconds += totalSeconds(row);

    if (row.total_cost === undefined) {
      allCosted = false;
    } else {
      costTotals.regular_cost += row.regular_cost ?? 0;
      costTotals.overtime_cost += row.overtime_cost ?? 0;
      costTotals.doubletime_cost += row.doubletime_cost ?? 0;
      costTotals.total_cost += row.total_cost;
    }
  }

  return {
    date_range: range,
    totals: allCosted
      ? {
          ...totals,
          regular_cost: roundCurrency(costTotals.regular_cost),
          overtime_cost: roundCurrency(costTotals.overtime_cost),
          doubletime_cost: roundCurrency(costTotals.doubletime_cost),
          total_cost: roundCurrency(costTotals.total_cost),
        }
      : totals,
    by_user,
  };
}

export function buildOvertimeReport(payroll: PayrollReport): OvertimeReport {
  const employees = Object.entries(payroll.by_user)
    .filter(([, row]) => row.overtime_seconds > 0 || row.doubletime_seconds > 0)
    .map(([userId, row]) => ({
      user_id: Number(userId),
      name: row.name,
      overtime_seconds: row.overtime_seconds,
      doubletime_seconds: row.doubletime_seconds,
      overtime_hours: toHours(row.overtime_seconds),
      doubletime_hours: toHours(row.doubletime_seconds),
      ...(row.total_cost !== undefined ? { overtime_cost: row.overtime_cost, doubletime_cost: row.doubletime_cost } : {}),
    }))
    .sort((a, b) => b.overtime_seconds - a.overtime_seconds || a.user_id - b.user_id);

  return {
    total_overtime_seconds: payroll.totals.overtime_seconds,
    total_doubletime_seconds: payroll.totals.doubletime_seconds,
    employees,
  };
}

export function buildPtoUsage(aggregator: ReportAggregator, timesheets: readonly Timesheet[]): PtoUsageReport {
  const report: PtoUsageReport = { total_pto_seconds: 0, by_user: {} };

  for (const item of aggregator.classify(timesheets)) {
    if (item.kind !== 'pto') continue;
    const userKey = String(item.entry.user_id);
    const user = report.by_user[userKey] ?? {
      name: aggregator.userName(item.entry.user_id),
      pto_seconds: 0,
      pto_hours: 0,
      by_jobcode: {},
    };
    const jobcodeKey = String(item.entry.jobcode_id);
    const jobcode = user.by_jobcode[jobcodeKey] ?? {
      name: aggregator.tree.get(item.entry.jobcode_id)?.name ?? `Jobcode ${item.entry.jobcode_id}`,
      seconds: 0,
    };

    jobcode.seconds += item.pto_seconds;
    user.by_jobcode[jobcodeKey] = jobcode;
    user.pto_seconds += item.pto_seconds;
    user.pto_hours = toHours(user.pto_seconds);
    report.by_user[userKey] = user;
    report.total_pto_seconds += item.pto_seconds;
  }

  return report;
}

export function buildPtoPayouts(payroll: PayrollReport, rates: RateLookup): PtoPayoutReport {
  const report: PtoPayoutReport = { by_user: {}, total_pto_hours: 0, total_pto_wages: null, employees_missing_rates: [] };
  let wages = 0;

  for (const [userId, row] of Object.entries(payroll.by_user)) {
    if (row.pto_seconds === 0) continue;
    const rate = rates.hourlyRate(Number(userId));
    const amount = rate === undefined ? null : (row.pto_seconds / 3600) * rate;
    report.by_user[userId] = {
      name: row.name,
      pto_hours: toHours(row.pto_seconds),
      hourly_rate: rate ?? null,
      pto_wages: amount === null ? null : roundCurrency(amount),
    };
    if (amount === null) {
      report.employees_missing_rates.push(Number(userId));
    } else {
      wages += amount;
    }
  }

  report.total_pto_hours = toHours(payroll.totals.pto_seconds);
  report.total_pto_wages = report.employees_missing_rates.length === 0 ? roundCurrency(wages) : null;
  return report;
}

// ============================================
// Departments & jobcodes
// ============================================

export function buildDepartmentBreakdown(
  aggregator: ReportAggregator,
  timesheets: readonly Timesheet[],
  options: PayrollOptions = {}
): DepartmentBreakdown {
  const hourlyRates = options.rates ? hourlyRateMap(aggregator, timesheets, options.rates) : undefined;
  const byGroup = aggregator.aggregate(timesheets, 'group', { hourlyRates, includeZeroTime: options.includeZeroTime });

  const members = new Map<string, Set<number>>();
  for (const item of aggregator.classify(timesheets)) {
    if (item.kind === 'excluded') continue;
    const key = String(aggregator.user(item.entry.user_id)?.group_id ?? 0);
    const set = members.get(key) ?? new Set<number>();
    set.add(item.entry.user_id);
    members.set(key, set);
  }

  const breakdown: DepartmentBreakdown = { by_group: {} };
  for (const [groupId, row] of Object.entries(byGroup)) {
    breakdown.by_group[groupId] = {
      name: aggregator.groupName(Number(groupId)),
      employee_count: members.get(groupId)?.size ?? 0,
      total_seconds: totalSeconds(row),
      ...row,
    };
  }
  return breakdown;
}

export function buildProjectCosts(
  aggregator: ReportAggregator,
  timesheets: readonly Timesheet[],
  rates?: RateLookup
): ProjectCostReport {
  const hourlyRates = rates ? hourlyRateMap(aggregator, timesheets, rates) : undefined;
  const byJobcode = aggregator.aggregate(timesheets, 'jobcode', { hourlyRates });

  const report: ProjectCostReport = { by_jobcode: {} };
  let laborCost = 0;
  let allCosted = hourlyRates !== undefined;

  for (const [jobcodeId, row] of Object.entries(byJobcode)) {
    const id = Number(jobcodeId);
    const billableRate = rates ? billableRateFor(aggregator, rates, id) : undefined;
    report.by_jobcode[jobcodeId] = {
      name: aggregator.tree.get(id)?.name ?? `Jobcode ${id}`,
      path: aggregator.tree.path(id),
      total_seconds: totalSeconds(row),
      total_hours: toHours(totalSeconds(row)),
      ...row,
      ...(billableRate !== undefined
        ? { billable_rate: billableRate, billable_amount: roundCurrency((workedSeconds(row) / 3600) * billableRate) }
        : {}),
    };
    if (row.total_cost === undefined) {
      allCosted = false;
    } else {
      laborCost += row.total_cost;
    }
  }

  if (allCosted) {
    report.labor_cost_total = roundCurrency(laborCost);
  }
  return report;
}

/**
 * Worked time rolled up to each top-level jobcode (the client)
 */
export function buildClientBillingSummary(
  aggregator: ReportAggregator,
  timesheets: readonly Timesheet[],
  rates: RateLookup
): ClientBillingSummary {
  const summary: ClientBillingSummary = { by_client: {}, total_billable_amount: 0 };
  const amounts = new Map<string, number>();

  for (const item of aggregator.classify(timesheets)) {
    if (item.kind !== 'work' && item.kind !== 'doubletime') continue;
    const root = aggregator.tree.root(item.entry.jobcode_id);
    const key = String(root?.id ?? item.entry.jobcode_id);
    const row = summary.by_client[key] ?? {
      name: root?.name ?? `Jobcode ${item.entry.jobcode_id}`,
      total_seconds: 0,
      billable_seconds: 0,
      unpriced_seconds: 0,
      billable_amount: 0,
    };

    row.total_seconds += item.duration_seconds;
    const rate = billableRateFor(aggregator, rates, item.entry.jobcode_id);
    if (rate === undefined) {
      row.unpriced_seconds += item.duration_seconds;
    } else {
      row.billable_seconds += item.duration_seconds;
      amounts.set(key, (amounts.get(key) ?? 0) + (item.duration_seconds / 3600) * rate);
    }
    summary.by_client[key] = row;
  }

  let total = 0;
  for (const [key, amount] of amounts) {
    summary.by_client[key].billable_amount = roundCurrency(amount);
    total += amount;
  }
  summary.total_billable_amount = roundCurrency(total);
  return summary;
}

// ============================================
// Hours
// ============================================

export function buildEmployeeHours(aggregator: ReportAggregator, timesheets: readonly Timesheet[]): Record<string, HoursRow> {
  const rows: Record<string, HoursRow> = {};
  for (const [userId, row] of Object.entries(aggregator.aggregate(timesheets, 'employee'))) {
    rows[userId] = {
      name: aggregator.userName(Number(userId)),
      total_seconds: totalSeconds(row),
      total_hours: toHours(totalSeconds(row)),
      entry_count: row.entry_count,
    };
  }
  return rows;
}

export function buildJobcodeHours(aggregator: ReportAggregator, timesheets: readonly Timesheet[]): Record<string, HoursRow> {
  const rows: Record<string, HoursRow> = {};
  for (const [jobcodeId, row] of Object.entries(aggregator.aggregate(timesheets, 'jobcode'))) {
    const id = Number(jobcodeId);
    rows[jobcodeId] = {
      name: aggregator.tree.get(id)?.name ?? `Jobcode ${id}`,
      path: aggregator.tree.path(id),
      total_seconds: totalSeconds(row),
      total_hours: toHours(totalSeconds(row)),
      entry_count: row.entry_count,
    };
  }
  return rows;
}

export function buildDailyBreakdown(aggregator: ReportAggregator, timesheets: readonly Timesheet[]): DailyBreakdown {
  const totals = new Map<string, { seconds: number; count: number }>();
  for (const item of aggregator.classify(timesheets)) {
    if (item.kind === 'excluded') continue;
    const day = totals.get(item.entry.date) ?? { seconds: 0, count: 0 };
    day.seconds += item.duration_seconds;
    day.count++;
    totals.set(item.entry.date, day);
  }

  const breakdown: DailyBreakdown = { by_date: {} };
  for (const date of [...totals.keys()].sort()) {
    const day = totals.get(date);
    if (!day) continue;
    breakdown.by_date[date] = { total_seconds: day.seconds, total_hours: toHours(day.seconds), entry_count: day.count };
  }
  return breakdown;
}

export function buildHoursSummary(payroll: PayrollReport): HoursSummary {
  return {
    regular_hours: toHours(payroll.totals.regular_seconds),
    overtime_hours: toHours(payroll.totals.overtime_seconds),
    doubletime_hours: toHours(payroll.totals.doubletime_seconds),
    pto_hours: toHours(payroll.totals.pto_seconds),
    total_hours: toHours(payroll.totals.total_seconds),
    employee_count: Object.values(payroll.by_user).filter((row) => row.total_seconds > 0).length,
  };
}

// ============================================
// Invoicing & wages
// ============================================

export interface InvoiceOptions {
  rates: RateLookup;
  /** Flat rate that replaces every jobcode's billable rate */
  hourlyRate?: number;
}

/**
 * Invoice for one client jobcode; `timesheets` are already limited to the
 * client's jobcodes
 */
export function buildInvoice(
  aggregator: ReportAggregator,
  timesheets: readonly Timesheet[],
  clientJobcodeId: number,
  range: DateRange,
  options: InvoiceOptions
): InvoiceTotals {
  const seconds = new Map<number, number>();
  for (const item of aggregator.classify(timesheets)) {
    if (item.kind !== 'work' && item.kind !== 'doubletime') continue;
    seconds.set(item.entry.jobcode_id, (seconds.get(item.entry.jobcode_id) ?? 0) + item.duration_seconds);
  }

  const line_items: InvoiceLineItem[] = [...seconds.entries()]
    .map(([jobcodeId, total]): InvoiceLineItem => {
      const rate = options.hourlyRate ?? billableRateFor(aggregator, options.rates, jobcodeId) ?? null;
      return {
        jobcode_id: jobcodeId,
        description: aggregator.tree.path(jobcodeId),
        hours: toHours(total),
        rate,
        amount: rate === null ? null : roundCurrency((total / 3600) * rate),
      };
    })
    .sort((a, b) => a.description.localeCompare(b.description));

  let totalSecondsAll = 0;
  let billableSeconds = 0;
  for (const [jobcodeId, total] of seconds) {
    totalSecondsAll += total;
    const priced = line_items.find((line) => line.jobcode_id === jobcodeId)?.rate !== null;
    if (priced) billableSeconds += total;
  }

  return {
    client: {
      jobcode_id: clientJobcodeId,
      name: aggregator.tree.get(clientJobcodeId)?.name ?? `Jobcode ${clientJobcodeId}`,
    },
    date_range: range,
    line_items,
    total_hours: toHours(totalSecondsAll),
    billable_hours: toHours(billableSeconds),
    unpriced_hours: toHours(totalSecondsAll - billableSeconds),
    total_amount: roundCurrency(line_items.reduce((sum, line) => sum + (line.amount ?? 0), 0)),
  };
}

/**
 * Gross wages per employee for tax preparation
 */
export function buildWagesReport(aggregator: ReportAggregator, payroll: PayrollReport, rates: RateLookup): WagesReport {
  const report: WagesReport = { by_user: {}, total_wages: 0, employees_missing_rates: [] };
  let total = 0;

  for (const [userId, row] of Object.entries(payroll.by_user)) {
    const id = Number(userId);
    const user = aggregator.user(id);
    const rate = rates.hourlyRate(id);
    const base = {
      name: row.name,
      payroll_id: user?.payroll_id ?? '',
      employee_number: user?.employee_number ?? 0,
    };

    if (rate === undefined || row.total_cost === undefined) {
      report.employees_missing_rates.push(id);
      report.by_user[userId] = {
        ...base,
        hourly_rate: null,
        regular_wages: null,
        overtime_wages: null,
        doubletime_wages: null,
        pto_wages: null,
        total_wages: null,
      };
      continue;
    }

    const ptoWages = (row.pto_seconds / 3600) * rate;
    const wages = row.total_cost + ptoWages;
    report.by_user[userId] = {
      ...base,
      hourly_rate: rate,
      regular_wages: row.regular_cost ?? 0,
      overtime_wages: row.overtime_cost ?? 0,
      doubletime_wages: row.doubletime_cost ?? 0,
      pto_wages: roundCurrency(ptoWages),
      total_wages: roundCurrency(wages),
    };
    total += wages;
  }

  report.total_wages = report.employees_missing_rates.length === 0 ? roundCurrency(total) : null;
  return report;
}

// ============================================
// Review
// ============================================

export function buildTimesheetReview(aggregator: ReportAggregator, timesheets: readonly Timesheet[]): TimesheetReview {
  const toItem = (entry: Timesheet): TimesheetReviewItem => ({
    timesheet_id: entry.id,
    user_id: entry.user_id,
    name: aggregator.userName(entry.user_id),
    date: entry.date,
    hours: toHours(entry.duration),
    jobcode: aggregator.tree.path(entry.jobcode_id),
  });
  const ordered = [...timesheets].sort((a, b) => (a.date === b.date ? a.id - b.id : a.date < b.date ? -1 : 1));

  const unlocked = ordered.filter((entry) => entry.locked === 0 && !entry.on_the_clock).map(toItem);
  const onTheClock = ordered.filter((entry) => entry.on_the_clock).map(toItem);

  return {
    unlocked_count: unlocked.length,
    on_the_clock_count: onTheClock.length,
    unlocked,
    on_the_clock: onTheClock,
  };
}
