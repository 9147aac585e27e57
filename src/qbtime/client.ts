/**
 * QuickBooks Time API v1 client
 *
 * Typed access to the endpoints this server exposes. List methods return a
 * PagedSequence; nothing is requested until it is iterated.
 */

import { ENDPOINTS } from './endpoints.js';
import type { FetchOptions, PagedSequence, RateLimitedFetcher } from './fetcher.js';
import type {
  Filters,
  Group,
  GroupFilterParams,
  Jobcode,
  JobcodeFilterParams,
  LastModifiedTimestamps,
  LooseRecord,
  PayrollFilterParams,
  Timesheet,
  TimesheetFilterParams,
  User,
  UserFilterParams,
} from './types.js';

export class QbTimeClient {
  constructor(private readonly fetcher: RateLimitedFetcher) {}

  // ============================================
  // Jobcodes
  // ============================================

  listJobcodes(params: JobcodeFilterParams = {}, options?: FetchOptions): PagedSequence<Jobcode> {
    return this.fetcher.fetchAll(ENDPOINTS.jobcodes, params, options);
  }

  getJobcode(id: number, options?: FetchOptions): Promise<Jobcode | undefined> {
    return this.fetcher.fetchOne(ENDPOINTS.jobcodes, { ids: [id], active: 'both', type: 'all' }, options);
  }

  // ============================================
  // Timesheets
  // ============================================

  listTimesheets(params: TimesheetFilterParams, options?: FetchOptions): PagedSequence<Timesheet> {
    return this.fetcher.fetchAll(ENDPOINTS.timesheets, params, options);
  }

  getTimesheet(id: number, options?: FetchOptions): Promise<Timesheet | undefined> {
    return this.fetcher.fetchOne(ENDPOINTS.timesheets, { ids: [id] }, options);
  }

  listCurrentTimesheets(params: Filters = {}, options?: FetchOptions): PagedSequence<Timesheet> {
    return this.fetcher.fetchAll(ENDPOINTS.currentTimesheets, params, options);
  }

  // ============================================
  // Users & Groups
  // ============================================

  listUsers(params: UserFilterParams = {}, options?: FetchOptions): PagedSequence<User> {
    return this.fetcher.fetchAll(ENDPOINTS.users, params, options);
  }

  getUser(id: number, options?: FetchOptions): Promise<User | undefined> {
    return this.fetcher.fetchOne(ENDPOINTS.users, { ids: [id], active: 'both' }, options);
  }

  getCurrentUser(options?: FetchOptions): Promise<User | undefined> {
    return this.fetcher.fetchOne(ENDPOINTS.currentUser, {}, options);
  }

  listGroups(params: GroupFilterParams = {}, options?: FetchOptions): PagedSequence<Group> {
    return this.fetcher.fetchAll(ENDPOINTS.groups, params, options);
  }

  // ============================================
  // Custom fields, projects, notifications
  // ============================================

  listCustomFields(params: Filters = {}, options?: FetchOptions): PagedSequence<LooseRecord> {
    return this.fetcher.fetchAll(ENDPOINTS.customFields, params, options);
  }

  listProjects(params: Filters = {}, options?: FetchOptions): PagedSequence<LooseRecord> {
    return this.fetcher.fetchAll(ENDPOINTS.projects, params, options);
  }

  listProjectActivities(params: Filters = {}, options?: FetchOptions): PagedSequence<LooseRecord> {
    return this.fetcher.fetchAll(ENDPOINTS.projectActivities, params, options);
  }

  getLastModified(types?: string[], options?: FetchOptions): Promise<LastModifiedTimestamps> {
    return this.fetcher.fetchKeyed(ENDPOINTS.lastModified, { types }, options);
  }

  listNotifications(params: Filters = {}, options?: FetchOptions): PagedSequence<LooseRecord> {
    return this.fetcher.fetchAll(ENDPOINTS.notifications, params, options);
  }

  listManagedClients(params: Filters = {}, options?: FetchOptions): PagedSequence<LooseRecord> {
    return this.fetcher.fetchAll(ENDPOINTS.managedClients, params, options);
  }

  // ============================================
  // Reports
  // ============================================

  getCurrentTotals(params: Filters = {}, options?: FetchOptions): Promise<Record<string, LooseRecord>> {
    return this.fetcher.fetchKeyed(ENDPOINTS.currentTotals, params, options);
  }

  listPayroll(params: PayrollFilterParams, options?: FetchOptions): PagedSequence<LooseRecord> {
    return this.fetcher.fetchAll(ENDPOINTS.payroll, params, options);
  }

  listPayrollByJobcode(params: PayrollFilterParams, options?: FetchOptions): PagedSequence<LooseRecord> {
    return this.fetcher.fetchAll(ENDPOINTS.payrollByJobcode, params, options);
  }

  getProjectReport(params: Filters, options?: FetchOptions): Promise<Record<string, unknown>> {
    return this.fetcher.fetchKeyed(ENDPOINTS.projectReport, params, options);
  }
}
