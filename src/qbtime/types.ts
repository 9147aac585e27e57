/**
 * QuickBooks Time API v1 type definitions
 *
 * Only the fields this server reads are spelled out; records keep every other
 * field the API sends.
 */

// ============================================
// Response envelope
// ============================================

/**
 * Raw list response: `results.<key>` holds the records, either keyed by id
 * or as an array
 */
export interface ListEnvelope {
  results: Record<string, unknown>;
  more?: boolean;
  supplemental_data?: Record<string, unknown>;
}

export interface Page<T> {
  page: number;
  records: T[];
  more: boolean;
  supplemental_data: Record<string, unknown>;
}

// ============================================
// Filters
// ============================================

export type FilterScalar = string | number | boolean;

export type FilterValue = FilterScalar | ReadonlyArray<string | number> | null | undefined;

export type Filters = Readonly<Record<string, FilterValue>>;

export type ActiveFilter = 'yes' | 'no' | 'both';

export type JobcodeType = 'regular' | 'pto' | 'paid_break' | 'unpaid_break';

export type JobcodeTypeFilter = JobcodeType | 'all';

// ============================================
// Records
// ============================================

export interface Jobcode {
  id: number;
  parent_id: number; // 0 = top level
  name: string;
  short_code: string;
  type: JobcodeType;
  active: boolean;
  billable: boolean;
  billable_rate: number;
  has_children: boolean;
  assigned_to_all: boolean;
  last_modified: string;
  double_time?: boolean;
  [key: string]: unknown;
}

export interface User {
  id: number;
  first_name: string;
  last_name: string;
  display_name: string;
  group_id: number; // 0 = no group
  active: boolean;
  employee_number: number;
  payroll_id: string;
  email: string;
  username: string;
  pay_rate: number;
  pay_interval: string; // 'hour' | 'year'
  hire_date: string;
  last_modified: string;
  [key: string]: unknown;
}

export interface Group {
  id: number;
  name: string;
  active: boolean;
  manager_ids: number[];
  last_modified: string;
  [key: string]: unknown;
}

export type TimesheetType = 'regular' | 'manual';

export interface Timesheet {
  id: number;
  user_id: number;
  jobcode_id: number;
  start: string; // ISO-8601 with offset, empty for manual entries
  end: string;
  duration: number; // seconds
  date: string; // YYYY-MM-DD
  tz: number;
  locked: number; // > 0 when locked
  notes: string;
  customfields: Record<string, string>;
  last_modified: string;
  type: TimesheetType;
  on_the_clock: boolean;
  double_time?: boolean;
  [key: string]: unknown;
}

/**
 * Records this server passes through without interpreting
 */
export type LooseRecord = Record<string, unknown>;

export type LastModifiedTimestamps = Record<string, string>;

// ============================================
// Typed filter parameters
// ============================================

export type JobcodeFilterParams = {
  ids?: number[];
  parent_ids?: number[];
  name?: string;
  type?: JobcodeTypeFilter;
  active?: ActiveFilter;
  customfields?: boolean;
  modified_before?: string;
  modified_since?: string;
  supplemental_data?: 'yes' | 'no';
  limit?: number;
};

export type TimesheetFilterParams = {
  ids?: number[];
  start_date?: string;
  end_date?: string;
  user_ids?: number[];
  group_ids?: number[];
  jobcode_ids?: number[];
  payroll_ids?: number[];
  on_the_clock?: ActiveFilter;
  jobcode_type?: JobcodeTypeFilter;
  modified_before?: string;
  modified_since?: string;
  supplemental_data?: 'yes' | 'no';
  limit?: number;
};

export type UserFilterParams = {
  ids?: number[];
  not_ids?: number[];
  employee_numbers?: number[];
  usernames?: string[];
  group_ids?: number[];
  not_group_ids?: number[];
  payroll_ids?: string[];
  active?: ActiveFilter;
  first_name?: string;
  last_name?: string;
  modified_before?: string;
  modified_since?: string;
  limit?: number;
};

export type GroupFilterParams = {
  ids?: number[];
  manager_ids?: number[];
  name?: string;
  active?: ActiveFilter;
  modified_before?: string;
  modified_since?: string;
  supplemental_data?: 'yes' | 'no';
  limit?: number;
};

export type PayrollFilterParams = {
  start_date: string;
  end_date: string;
  user_ids?: number[];
  group_ids?: number[];
  jobcode_ids?: number[];
  jobcode_type?: JobcodeType;
  include_zero_time?: boolean;
  limit?: number;
};
