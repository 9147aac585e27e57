/**
 * Types for the aggregation engine and report builders
 */

import type { DateRange } from '../dates/calendar.js';
import type { Group, Jobcode, Timesheet, User } from '../qbtime/types.js';

export type Dimension = 'employee' | 'jobcode' | 'group';

/**
 * Reference data the aggregator resolves ids against
 */
export interface ReferenceData {
  users: readonly User[];
  jobcodes: readonly Jobcode[];
  groups: readonly Group[];
  /**
   * Every entry of the weeks being reported, on any day and jobcode. Counted
   * toward the weekly overtime threshold, never reported.
   */
  weekEntries?: readonly Timesheet[];
}

/**
 * Hourly and billable rates, already resolved through the fallback chain
 */
export interface RateLookup {
  hourlyRate(userId: number): number | undefined;
  billableRate(jobcodeId: number): number | undefined;
}

// ============================================
// AGGREGATION TYPES
// ============================================

export interface TimeTotals {
  regular_seconds: number;
  overtime_seconds: number;
  doubletime_seconds: number;
  pto_seconds: number;
  entry_count: number;
}

export interface CostFields {
  regular_cost: number;
  overtime_cost: number;
  doubletime_cost: number;
  total_cost: number;
}

/** Cost fields appear only when every contributing employee has a rate */
export type AggregateRow = TimeTotals & Partial<CostFields>;

/** Keyed by employee, jobcode or group id */
export type AggregateTotals = Record<string, AggregateRow>;

export interface AggregateOptions {
  /** Employee id → hourly rate; without it no costs are computed */
  hourlyRates?: ReadonlyMap<number, number>;
  /** Emit every known key of the dimension, zero-filled */
  includeZeroTime?: boolean;
}

export type EntryKind = 'work' | 'pto' | 'doubletime' | 'excluded';

/**
 * One time entry split into its pay buckets
 */
export interface ClassifiedEntry {
  entry: Timesheet;
  kind: EntryKind;
  duration_seconds: number;
  regular_seconds: number;
  overtime_seconds: number;
  doubletime_seconds: number;
  pto_seconds: number;
}

// ============================================
// REPORT TYPES
// ============================================

export interface PayrollTotals {
  regular_seconds: number;
  overtime_seconds: number;
  doubletime_seconds: number;
  pto_seconds: number;
  total_seconds: number;
}

export interface PayrollUserRow extends PayrollTotals, Partial<CostFields> {
  name: string;
  timesheet_count: number;
}

export interface PayrollReport {
  date_range: DateRange;
  totals: PayrollTotals & Partial<CostFields>;
  by_user: Record<string, PayrollUserRow>;
}

export interface OvertimeReport {
  total_overtime_seconds: number;
  total_doubletime_seconds: number;
  employees: Array<{
    user_id: number;
    name: string;
    overtime_seconds: number;
    doubletime_seconds: number;
    overtime_hours: number;
    doubletime_hours: number;
    overtime_cost?: number;
    doubletime_cost?: number;
  }>;
}

export interface PtoUsageReport {
  total_pto_seconds: number;
  by_user: Record<string, {
    name: string;
    pto_seconds: number;
    pto_hours: number;
    by_jobcode: Record<string, { name: string; seconds: number }>;
  }>;
}

export interface DepartmentBreakdown {
  by_group: Record<string, TimeTotals & Partial<CostFields> & {
    name: string;
    employee_count: number;
    total_seconds: number;
  }>;
}

export interface JobcodeCostRow extends TimeTotals, Partial<CostFields> {
  name: string;
  path: string;
  total_seconds: number;
  total_hours: number;
  billable_rate?: number;
  billable_amount?: number;
}

export interface ProjectCostReport {
  by_jobcode: Record<string, JobcodeCostRow>;
  labor_cost_total?: number;
}

export interface ClientBillingRow {
  name: string;
  total_seconds: number;
  billable_seconds: number;
  unpriced_seconds: number;
  billable_amount: number;
}

export interface ClientBillingSummary {
  by_client: Record<string, ClientBillingRow>;
  total_billable_amount: number;
}

export interface InvoiceLineItem {
  jobcode_id: number;
  description: string;
  hours: number;
  rate: number | null;
  amount: number | null;
}

export interface InvoiceTotals {
  client: { jobcode_id: number; name: string };
  date_range: DateRange;
  line_items: InvoiceLineItem[];
  total_hours: number;
  billable_hours: number;
  unpriced_hours: number;
  total_amount: number;
}

export interface HoursRow {
  name: string;
  path?: string;
  total_seconds: number;
  total_hours: number;
  entry_count: number;
}

export interface DailyBreakdown {
  by_date: Record<string, { total_seconds: number; total_hours: number; entry_count: number }>;
}

export interface WageRow {
  name: string;
  payroll_id: string;
  employee_number: number;
  hourly_rate: number | null;
  regular_wages: number | null;
  overtime_wages: number | null;
  doubletime_wages: number | null;
  pto_wages: number | null;
  total_wages: number | null;
}

export interface WagesReport {
  by_user: Record<string, WageRow>;
  /** Null when any employee has no rate */
  total_wages: number | null;
  employees_missing_rates: number[];
}

export interface PtoPayoutReport {
  by_user: Record<string, {
    name: string;
    pto_hours: number;
    hourly_rate: number | null;
    pto_wages: number | null;
  }>;
  total_pto_hours: number;
  /** Null when any employee with PTO has no rate */
  total_pto_wages: number | null;
  employees_missing_rates: number[];
}

export interface HoursSummary {
  regular_hours: number;
  overtime_hours: number;
  doubletime_hours: number;
  pto_hours: number;
  total_hours: number;
  employee_count: number;
}

export interface UtilizationMetrics {
  worked_seconds: number;
  worked_hours: number;
  capacity_seconds: number;
  capacity_hours: number;
  utilization_percent: number;
}

export interface UtilizationReport {
  date_range: DateRange;
  settings: {
    capacity_hours_per_day: number;
    exclude_weekends: boolean;
    working_days: number;
  };
  totals: UtilizationMetrics;
  by_user: Record<string, UtilizationMetrics & { name: string }>;
}

export interface ProfitabilityReport {
  revenue: number;
  labor_cost: number | null;
  profit: number | null;
  margin_percent: number | null;
  total_hours: number;
  billable_hours: number;
  unpriced_hours: number;
  employees_missing_rates: number[];
  warnings: string[];
}

export interface TimesheetReviewItem {
  timesheet_id: number;
  user_id: number;
  name: string;
  date: string;
  hours: number;
  jobcode: string;
}

export interface TimesheetReview {
  unlocked_count: number;
  on_the_clock_count: number;
  unlocked: TimesheetReviewItem[];
  on_the_clock: TimesheetReviewItem[];
}
