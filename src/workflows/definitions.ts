/**
 * Named accounting workflows
 *
 * Each definition says how its date range is found, what to fetch and which
 * report sections to build. The orchestrator does the rest.
 */

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
} from '../compute/reports.js';
import { ProfitabilityCalculator } from '../compute/profitability.js';
import { UtilizationCalculator } from '../compute/utilization.js';
import type { PayrollReport } from '../compute/types.js';
import { yearMonthOf } from '../dates/calendar.js';
import { ValidationError } from '../errors.js';
import {
  aggregatorStep,
  groupsStep,
  jobcodesStep,
  ratesStep,
  report,
  targetStep,
  targetTimesheetsStep,
  timesheetsStep,
  usersStep,
  weekTimesheetsStep,
} from './steps.js';
import type {
  AccountingData,
  BiweeklyPayrollParams,
  ClientInvoiceParams,
  MonthEndClosingParams,
  ProjectProfitabilityParams,
  QuarterlyTaxPrepParams,
  StepContext,
  WorkflowDefinition,
} from './types.js';

function payrollFor(ctx: StepContext<unknown, AccountingData>): PayrollReport {
  return buildPayrollReport(ctx.get('aggregator'), ctx.get('timesheets'), ctx.range, { rates: ctx.find('rates') });
}

// ============================================
// Payroll
// ============================================

export const biweeklyPayroll: WorkflowDefinition<BiweeklyPayrollParams, AccountingData> = {
  name: 'biweekly_payroll',
  description: 'Payroll package for the 14 days ending on end_date (default today)',
  resolveRange: (params, { dates, anchor }) =>
    dates.resolveBiweekly(params.end_date ? dates.resolve(params.end_date, anchor).end_date : anchor),
  steps: [
    usersStep(true),
    jobcodesStep(),
    groupsStep(),
    weekTimesheetsStep(),
    timesheetsStep(),
    aggregatorStep(),
    ratesStep(),
    report('payroll_summary', ['timesheets', 'aggregator'], payrollFor),
    report('overtime_report', ['timesheets', 'aggregator'], (ctx) => buildOvertimeReport(payrollFor(ctx))),
    report('pto_usage', ['timesheets', 'aggregator'], ({ get }) => buildPtoUsage(get('aggregator'), get('timesheets'))),
    report('department_breakdown', ['timesheets', 'aggregator', 'groups'], ({ get, find }) =>
      buildDepartmentBreakdown(get('aggregator'), get('timesheets'), { rates: find('rates') })
    ),
  ],
};

/**
 * A month given without a year is the most recent one: December asked for
 * in March is last December
 */
export const monthEndClosing: WorkflowDefinition<MonthEndClosingParams, AccountingData> = {
  name: 'month_end_closing',
  description: 'Month-end close package (default: the previous month)',
  resolveRange: (params, { dates, anchor }) => {
    if (params.month === undefined) {
      if (params.year !== undefined) {
        throw new ValidationError('Give the month to close as well as the year.');
      }
      return dates.resolve('last month', anchor);
    }
    const current = yearMonthOf(anchor);
    const year = params.year ?? (params.month > current.month ? current.year - 1 : current.year);
    return dates.monthRange(params.month, year);
  },
  steps: [
    usersStep(true),
    jobcodesStep(),
    groupsStep(),
    weekTimesheetsStep(),
    timesheetsStep(),
    aggregatorStep(),
    ratesStep(),
    report('monthly_payroll_summary', ['timesheets', 'aggregator'], payrollFor),
    report('client_billing_summary', ['timesheets', 'aggregator', 'rates'], ({ get }) =>
      buildClientBillingSummary(get('aggregator'), get('timesheets'), get('rates'))
    ),
    report('project_costs', ['timesheets', 'aggregator'], ({ get, find }) =>
      buildProjectCosts(get('aggregator'), get('timesheets'), find('rates'))
    ),
    report('employee_utilization', ['timesheets', 'aggregator'], ({ get, range }) =>
      new UtilizationCalculator(get('aggregator')).calculate(get('timesheets'), range)
    ),
    report('timesheet_review', ['timesheets', 'aggregator'], ({ get }) =>
      buildTimesheetReview(get('aggregator'), get('timesheets'))
    ),
  ],
};

export const quarterlyTaxPrep: WorkflowDefinition<QuarterlyTaxPrepParams, AccountingData> = {
  name: 'quarterly_tax_prep',
  description: 'Quarterly tax filing data (default: the last completed quarter)',
  resolveRange: (params, { dates, anchor }) => {
    if (params.quarter === undefined) {
      if (params.year !== undefined) {
        throw new ValidationError('Give the quarter as well as the year.');
      }
      return dates.resolve('last quarter', anchor);
    }
    const current = yearMonthOf(anchor);
    const currentQuarter = Math.floor((current.month - 1) / 3) + 1;
    const year = params.year ?? (params.quarter > currentQuarter ? current.year - 1 : current.year);
    return dates.quarterRange(params.quarter, year);
  },
  steps: [
    usersStep(true),
    jobcodesStep(),
    groupsStep(),
    weekTimesheetsStep(),
    timesheetsStep(),
    aggregatorStep(),
    ratesStep(),
    report('wages_by_employee', ['timesheets', 'aggregator', 'rates'], (ctx) =>
      buildWagesReport(ctx.get('aggregator'), payrollFor(ctx), ctx.get('rates'))
    ),
    report('hours_summary', ['timesheets', 'aggregator'], (ctx) => buildHoursSummary(payrollFor(ctx))),
    report('overtime_wages', ['timesheets', 'aggregator'], (ctx) => buildOvertimeReport(payrollFor(ctx))),
    report('pto_payouts', ['timesheets', 'aggregator', 'rates'], (ctx) =>
      buildPtoPayouts(payrollFor(ctx), ctx.get('rates'))
    ),
    report('department_breakdown', ['timesheets', 'aggregator', 'groups'], ({ get, find }) =>
      buildDepartmentBreakdown(get('aggregator'), get('timesheets'), { rates: find('rates') })
    ),
  ],
};

// ============================================
// Client & project
// ============================================

export const clientInvoice: WorkflowDefinition<ClientInvoiceParams, AccountingData> = {
  name: 'client_invoice',
  description: 'Invoice backup for one client: hours by employee, jobcode and day, and the totals',
  resolveRange: (params, { dates, anchor }) => dates.resolveParams(params, anchor),
  steps: [
    jobcodesStep(true),
    targetStep<ClientInvoiceParams>((params) => params.client_name),
    usersStep(),
    weekTimesheetsStep(['target']),
    targetTimesheetsStep(),
    aggregatorStep(),
    ratesStep(),
    report('hours_by_employee', ['timesheets', 'aggregator'], ({ get }) =>
      buildEmployeeHours(get('aggregator'), get('timesheets'))
    ),
    report('hours_by_jobcode', ['timesheets', 'aggregator'], ({ get }) =>
      buildJobcodeHours(get('aggregator'), get('timesheets'))
    ),
    report('daily_breakdown', ['timesheets', 'aggregator'], ({ get }) =>
      buildDailyBreakdown(get('aggregator'), get('timesheets'))
    ),
    report<ClientInvoiceParams>('invoice_totals', ['timesheets', 'aggregator', 'rates'], ({ get, range, params }) =>
      buildInvoice(get('aggregator'), get('timesheets'), get('target').id, range, {
        rates: get('rates'),
        hourlyRate: params.hourly_rate,
      })
    ),
  ],
};

export const projectProfitability: WorkflowDefinition<ProjectProfitabilityParams, AccountingData> = {
  name: 'project_profitability',
  description: 'Revenue, labor cost and margin for one project (default: year to date)',
  resolveRange: (params, { dates, anchor }) =>
    dates.resolveParams(params, anchor, (today) => dates.resolve('year to date', today)),
  steps: [
    jobcodesStep(true),
    targetStep<ProjectProfitabilityParams>((params) => params.project_name),
    usersStep(),
    weekTimesheetsStep(['target']),
    targetTimesheetsStep(),
    aggregatorStep(),
    ratesStep(),
    report('hours_by_employee', ['timesheets', 'aggregator'], ({ get }) =>
      buildEmployeeHours(get('aggregator'), get('timesheets'))
    ),
    report('labor_costs', ['timesheets', 'aggregator'], ({ get, find }) =>
      buildProjectCosts(get('aggregator'), get('timesheets'), find('rates'))
    ),
    report('profitability', ['timesheets', 'aggregator', 'rates'], ({ get }) =>
      new ProfitabilityCalculator(get('aggregator'), get('rates')).calculate(get('timesheets'))
    ),
  ],
};
