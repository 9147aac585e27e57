/**
 * QuickBooks Time API tools
 *
 * One tool per upstream endpoint. Date parameters accept natural language;
 * jobcode types accept accounting vocabulary.
 */

import * as z from 'zod';
import { JobcodeTree } from '../compute/jobcode-tree.js';
import {
  activeParam,
  dateFilters,
  defineTool,
  found,
  ids,
  jobcodeType,
  jobcodeTypeParam,
  listing,
  pagingParams,
  rangeParams,
  type ToolContext,
  type ToolDefinition,
} from './shared.js';

const modifiedParams = {
  modified_before: z.string().optional().describe('Only records modified before this ISO 8601 date or timestamp'),
  modified_since: z.string().optional().describe('Only records modified since this ISO 8601 date or timestamp'),
};

export function apiTools(ctx: ToolContext): ToolDefinition[] {
  const { client } = ctx;

  return [
    // ============================================
    // JOBCODE TOOLS
    // ============================================

    defineTool({
      name: 'get_jobcodes',
      description: 'List jobcodes (clients, projects and tasks) with optional filters',
      schema: {
        ids: ids('jobcode'),
        parent_ids: z.array(z.number().int()).optional().describe('Filter by parent jobcode IDs (0 = top level)'),
        name: z.string().optional().describe('Filter by name (* is a wildcard)'),
        type: jobcodeTypeParam,
        active: activeParam,
        customfields: z.boolean().optional().describe('Include custom field assignments'),
        ...modifiedParams,
        ...pagingParams,
      },
      run: ({ page, auto_paginate, type, ...filters }, signal) =>
        listing(client.listJobcodes({ ...filters, type: jobcodeType(ctx, type) }, { signal }), { page, auto_paginate }),
    }),

    defineTool({
      name: 'get_jobcode',
      description: 'Get one jobcode by ID, whatever its type or status',
      schema: { id: z.number().int().describe('Jobcode ID') },
      run: async ({ id }, signal) => found(await client.getJobcode(id, { signal }), 'jobcode', id),
    }),

    defineTool({
      name: 'search_jobcodes',
      description: 'Search jobcodes by name (use * as a wildcard), type and status',
      schema: {
        name: z.string().describe('Name to search for, e.g. "Acme*"'),
        type: jobcodeTypeParam,
        active: activeParam,
        modified_since: modifiedParams.modified_since,
        ...pagingParams,
      },
      run: ({ page, auto_paginate, type, ...filters }, signal) =>
        listing(client.listJobcodes({ ...filters, type: jobcodeType(ctx, type) ?? 'all' }, { signal }), {
          page,
          auto_paginate,
        }),
    }),

    defineTool({
      name: 'get_jobcode_hierarchy',
      description: 'Get the jobcode tree: top-level jobcodes (clients) with their projects and tasks nested below',
      schema: {
        type: jobcodeTypeParam,
        active: activeParam,
      },
      run: async ({ type, active }, signal) => {
        const jobcodes = await client
          .listJobcodes({ type: jobcodeType(ctx, type) ?? 'all', active: active ?? 'yes' }, { signal })
          .toArray();
        return { total: jobcodes.length, jobcodes: new JobcodeTree(jobcodes).hierarchy() };
      },
    }),

    // ============================================
    // TIMESHEET TOOLS
    // ============================================

    defineTool({
      name: 'get_timesheets',
      description:
        'List timesheets. Needs at least one of ids, a date range (start_date or period), modified_before or modified_since.',
      schema: {
        ids: ids('timesheet'),
        ...rangeParams,
        user_ids: ids('user'),
        group_ids: ids('group'),
        jobcode_ids: ids('jobcode'),
        payroll_ids: ids('payroll'),
        on_the_clock: activeParam.describe('Running timesheets: yes, no or both (default: no)'),
        jobcode_type: jobcodeTypeParam,
        ...modifiedParams,
        ...pagingParams,
      },
      run: ({ page, auto_paginate, start_date, end_date, period, jobcode_type, ...filters }, signal) =>
        listing(
          client.listTimesheets(
            {
              ...filters,
              ...dateFilters(ctx, { start_date, end_date, period }),
              jobcode_type: jobcodeType(ctx, jobcode_type),
            },
            { signal }
          ),
          { page, auto_paginate }
        ),
    }),

    defineTool({
      name: 'get_timesheet',
      description: 'Get one timesheet by ID',
      schema: { id: z.number().int().describe('Timesheet ID') },
      run: async ({ id }, signal) => found(await client.getTimesheet(id, { signal }), 'timesheet', id),
    }),

    defineTool({
      name: 'get_current_timesheets',
      description: 'List the timesheets of everyone who is on the clock right now',
      schema: {
        user_ids: ids('user'),
        group_ids: ids('group'),
        jobcode_ids: ids('jobcode'),
        ...pagingParams,
      },
      run: ({ page, auto_paginate, ...filters }, signal) =>
        listing(client.listCurrentTimesheets({ ...filters, on_the_clock: 'yes' }, { signal }), { page, auto_paginate }),
    }),

    // ============================================
    // USER & GROUP TOOLS
    // ============================================

    defineTool({
      name: 'get_users',
      description: 'List users (employees)',
      schema: {
        ids: ids('user'),
        group_ids: ids('group'),
        payroll_ids: z.array(z.string()).optional().describe('Filter by payroll IDs'),
        first_name: z.string().optional().describe('Filter by first name (* is a wildcard)'),
        last_name: z.string().optional().describe('Filter by last name (* is a wildcard)'),
        active: activeParam,
        ...modifiedParams,
        ...pagingParams,
      },
      run: ({ page, auto_paginate, ...filters }, signal) =>
        listing(client.listUsers(filters, { signal }), { page, auto_paginate }),
    }),

    defineTool({
      name: 'get_user',
      description: 'Get one user (employee) by ID, active or not',
      schema: { id: z.number().int().describe('User ID') },
      run: async ({ id }, signal) => found(await client.getUser(id, { signal }), 'user', id),
    }),

    defineTool({
      name: 'get_current_user',
      description: 'Get the user the access token belongs to',
      schema: {},
      run: async (_params, signal) => (await client.getCurrentUser({ signal })) ?? null,
    }),

    defineTool({
      name: 'get_groups',
      description: 'List groups (departments)',
      schema: {
        ids: ids('group'),
        manager_ids: ids('manager user'),
        name: z.string().optional().describe('Filter by name (* is a wildcard)'),
        active: activeParam,
        ...modifiedParams,
        ...pagingParams,
      },
      run: ({ page, auto_paginate, ...filters }, signal) =>
        listing(client.listGroups(filters, { signal }), { page, auto_paginate }),
    }),

    // ============================================
    // OTHER RECORDS
    // ============================================

    defineTool({
      name: 'get_custom_fields',
      description: 'List custom fields (timesheet and user fields)',
      schema: {
        ids: ids('custom field'),
        active: activeParam,
        applies_to: z.enum(['timesheet', 'user', 'jobcode']).optional().describe('Record type the field belongs to'),
        ...modifiedParams,
        ...pagingParams,
      },
      run: ({ page, auto_paginate, ...filters }, signal) =>
        listing(client.listCustomFields(filters, { signal }), { page, auto_paginate }),
    }),

    defineTool({
      name: 'get_projects',
      description: 'List projects (jobcodes set up with project tracking)',
      schema: {
        ids: ids('project'),
        jobcode_ids: ids('jobcode'),
        parent_jobcode_id: z.number().int().optional().describe('Only projects under this jobcode'),
        name: z.string().optional().describe('Filter by name (* is a wildcard)'),
        active: activeParam,
        ...modifiedParams,
        ...pagingParams,
      },
      run: ({ page, auto_paginate, ...filters }, signal) =>
        listing(client.listProjects(filters, { signal }), { page, auto_paginate }),
    }),

    defineTool({
      name: 'get_project_activities',
      description: 'List the activity feed (notes, status changes) of a project',
      schema: {
        project_id: z.number().int().describe('Project ID'),
        ids: ids('activity'),
        activity_types: z.array(z.string()).optional().describe('Filter by activity type'),
        ...modifiedParams,
        ...pagingParams,
      },
      run: ({ page, auto_paginate, ...filters }, signal) =>
        listing(client.listProjectActivities(filters, { signal }), { page, auto_paginate }),
    }),

    defineTool({
      name: 'get_last_modified',
      description: 'Get when each kind of record last changed',
      schema: {
        types: z.array(z.string()).optional().describe('Record types, e.g. ["timesheets", "users"] (default: all)'),
      },
      run: ({ types }, signal) => client.getLastModified(types, { signal }),
    }),

    defineTool({
      name: 'get_notifications',
      description: 'List pending notifications',
      schema: {
        ids: ids('notification'),
        user_id: z.number().int().optional().describe('Only notifications for this user'),
        delivery_before: z.string().optional().describe('Delivered before this ISO 8601 timestamp'),
        delivery_after: z.string().optional().describe('Delivered after this ISO 8601 timestamp'),
        ...pagingParams,
      },
      run: ({ page, auto_paginate, ...filters }, signal) =>
        listing(client.listNotifications(filters, { signal }), { page, auto_paginate }),
    }),

    defineTool({
      name: 'get_managed_clients',
      description: 'List the client companies an accountant or reseller account manages',
      schema: {
        active: activeParam,
        ...pagingParams,
      },
      run: ({ page, auto_paginate, ...filters }, signal) =>
        listing(client.listManagedClients(filters, { signal }), { page, auto_paginate }),
    }),

    // ============================================
    // REPORT TOOLS
    // ============================================

    defineTool({
      name: 'get_current_totals',
      description: "Get each user's on-the-clock status and today's and this shift's totals",
      schema: {
        user_ids: ids('user'),
        group_ids: ids('group'),
        on_the_clock: activeParam.describe('yes, no or both (default: both)'),
      },
      run: (filters, signal) => client.getCurrentTotals(filters, { signal }),
    }),

    defineTool({
      name: 'get_payroll',
      description:
        "QuickBooks Time's own payroll report: regular, overtime, double-time and PTO seconds per user. Needs a start and end date or a period.",
      schema: {
        ...rangeParams,
        user_ids: ids('user'),
        group_ids: ids('group'),
        include_zero_time: z.boolean().optional().describe('Include users with no time'),
        ...pagingParams,
      },
      run: ({ page, auto_paginate, start_date, end_date, period, ...filters }, signal) => {
        const range = dateFilters(ctx, { start_date, end_date, period });
        return listing(
          client.listPayroll({ ...filters, start_date: range.start_date ?? '', end_date: range.end_date ?? '' }, { signal }),
          { page, auto_paginate }
        );
      },
    }),

    defineTool({
      name: 'get_payroll_by_jobcode',
      description: "QuickBooks Time's payroll report broken down by jobcode. Needs a start and end date or a period.",
      schema: {
        ...rangeParams,
        user_ids: ids('user'),
        group_ids: ids('group'),
        jobcode_ids: ids('jobcode'),
        jobcode_type: jobcodeTypeParam,
        ...pagingParams,
      },
      run: ({ page, auto_paginate, start_date, end_date, period, jobcode_type, ...filters }, signal) => {
        const range = dateFilters(ctx, { start_date, end_date, period });
        const type = jobcodeType(ctx, jobcode_type);
        return listing(
          client.listPayrollByJobcode(
            {
              ...filters,
              start_date: range.start_date ?? '',
              end_date: range.end_date ?? '',
              jobcode_type: type === 'all' ? undefined : type,
            },
            { signal }
          ),
          { page, auto_paginate }
        );
      },
    }),

    defineTool({
      name: 'get_project_report',
      description: 'Time totals per user, group and jobcode for a date range. Needs a start and end date or a period.',
      schema: {
        ...rangeParams,
        user_ids: ids('user'),
        group_ids: ids('group'),
        jobcode_ids: ids('jobcode'),
        jobcode_type: jobcodeTypeParam,
      },
      run: ({ start_date, end_date, period, jobcode_type, ...filters }, signal) =>
        client.getProjectReport(
          { ...filters, ...dateFilters(ctx, { start_date, end_date, period }), jobcode_type: jobcodeType(ctx, jobcode_type) },
          { signal }
        ),
    }),
  ];
}
