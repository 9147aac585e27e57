/**
 * QuickBooks Time endpoint catalogue
 *
 * Each entry names the path, where the records sit in `results`, which
 * filters the endpoint insists on, and how to validate a record.
 */

import type { z } from 'zod';
import { MissingRequiredFilterError } from '../errors.js';
import {
  groupSchema,
  jobcodeSchema,
  looseRecordSchema,
  reportValueSchema,
  timesheetSchema,
  timestampSchema,
  userSchema,
} from './schemas.js';
import type { HttpMethod } from './transport.js';
import type { Filters, FilterValue, Group, Jobcode, LooseRecord, Timesheet, User } from './types.js';

export interface Endpoint<T> {
  name: string;
  path: string;
  method: HttpMethod;
  /** Key under `results` that holds the records */
  resultsKey: string;
  /** Each group lists filters of which at least one must be present */
  requiredFilters: ReadonlyArray<readonly string[]>;
  paginated: boolean;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/** Largest page the API serves */
export const MAX_PAGE_SIZE = 200;

export const DEFAULT_PAGE_SIZE = 50;

// Widened to midnight UTC when given as a bare date
const TIMESTAMP_FILTERS = new Set(['modified_before', 'modified_since']);

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

function list<T>(
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  extra: Partial<Endpoint<T>> = {}
): Endpoint<T> {
  return {
    name,
    path: name,
    method: 'GET',
    resultsKey: name,
    requiredFilters: [],
    paginated: true,
    schema,
    ...extra,
  };
}

export const ENDPOINTS = {
  jobcodes: list<Jobcode>('jobcodes', jobcodeSchema),
  users: list<User>('users', userSchema),
  currentUser: list<User>('current_user', userSchema, { resultsKey: 'users', paginated: false }),
  groups: list<Group>('groups', groupSchema),
  timesheets: list<Timesheet>('timesheets', timesheetSchema, {
    requiredFilters: [['ids', 'start_date', 'modified_before', 'modified_since']],
  }),
  currentTimesheets: list<Timesheet>('current_timesheets', timesheetSchema, { resultsKey: 'timesheets' }),
  customFields: list<LooseRecord>('customfields', looseRecordSchema),
  projects: list<LooseRecord>('projects', looseRecordSchema),
  projectActivities: list<LooseRecord>('project_activities', looseRecordSchema),
  lastModified: list<string>('last_modified_timestamps', timestampSchema, { paginated: false }),
  notifications: list<LooseRecord>('notifications', looseRecordSchema),
  managedClients: list<LooseRecord>('managed_clients', looseRecordSchema),
  currentTotals: list<LooseRecord>('current_totals', looseRecordSchema, { paginated: false }),
  payroll: list<LooseRecord>('payroll', looseRecordSchema, {
    resultsKey: 'payroll_report',
    requiredFilters: [['start_date'], ['end_date']],
  }),
  payrollByJobcode: list<LooseRecord>('payroll_by_jobcode', looseRecordSchema, {
    resultsKey: 'payroll_by_jobcode_report',
    requiredFilters: [['start_date'], ['end_date']],
  }),
  projectReport: list<unknown>('project_report', reportValueSchema, {
    path: 'reports/project',
    method: 'POST',
    requiredFilters: [['start_date'], ['end_date']],
    paginated: false,
  }),
};

// ============================================
// Filter handling
// ============================================

function isList(value: FilterValue): value is ReadonlyArray<string | number> {
  return Array.isArray(value);
}

function isPresent(value: FilterValue): value is NonNullable<FilterValue> {
  if (value === null || value === undefined || value === '') return false;
  if (isList(value)) return value.length > 0;
  return true;
}

/**
 * Throw MissingRequiredFilterError unless every required group is satisfied
 */
export function checkRequiredFilters<T>(endpoint: Endpoint<T>, filters: Filters): void {
  for (const anyOf of endpoint.requiredFilters) {
    if (!anyOf.some((key) => isPresent(filters[key]))) {
      throw new MissingRequiredFilterError(endpoint.name, anyOf);
    }
  }
}

function widenTimestamp(key: string, value: string): string {
  return TIMESTAMP_FILTERS.has(key) && DATE_ONLY.test(value) ? `${value}T00:00:00Z` : value;
}

/**
 * Query-string form: empty values dropped, arrays comma-joined, booleans
 * spelled out, bare dates on timestamp filters widened to midnight UTC
 */
export function serializeQuery(filters: Filters): Record<string, string> {
  const query: Record<string, string> = {};
  for (const [key, value] of Object.entries(filters)) {
    if (!isPresent(value)) continue;
    if (isList(value)) {
      query[key] = value.join(',');
    } else {
      query[key] = widenTimestamp(key, String(value));
    }
  }
  if (query.limit !== undefined) {
    query.limit = String(clampPageSize(Number(query.limit)));
  }
  return query;
}

/**
 * JSON body form for POST reports: `{ data: {...} }` with arrays kept
 */
export function serializeBody(filters: Filters): { data: Record<string, unknown> } {
  const data: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(filters)) {
    if (!isPresent(value)) continue;
    data[key] = typeof value === 'string' ? widenTimestamp(key, value) : value;
  }
  return { data };
}

export function clampPageSize(size: number): number {
  if (!Number.isFinite(size) || size < 1) return DEFAULT_PAGE_SIZE;
  return Math.min(Math.floor(size), MAX_PAGE_SIZE);
}
