/**
 * Fetch and report steps shared by the accounting workflows
 */

import { ReportAggregator } from '../compute/aggregation.js';
import { JobcodeTree } from '../compute/jobcode-tree.js';
import { startOfIsoWeek, type DateRange } from '../dates/calendar.js';
import { EntityResolver } from '../entities/entity-resolver.js';
import type { Timesheet } from '../qbtime/types.js';
import { fetchStep } from './orchestrator.js';
import type { AccountingData, PlannedFetch, ReportStep, StepContext } from './types.js';

type Fetch<TParams = unknown> = PlannedFetch<TParams, AccountingData>;

function within(entry: Timesheet, range: DateRange): boolean {
  return entry.date >= range.start_date && entry.date <= range.end_date;
}

/** Employees, inactive ones included: past periods may have their time */
export function usersStep(mandatory = false): Fetch {
  return fetchStep<unknown, AccountingData, 'users'>({
    key: 'users',
    mandatory,
    run: ({ services, signal }) => services.client.listUsers({ active: 'both' }, { signal }).toArray(),
  });
}

/** Every jobcode of every type; the endpoint defaults to regular ones only */
export function jobcodesStep(mandatory = false): Fetch {
  return fetchStep<unknown, AccountingData, 'jobcodes'>({
    key: 'jobcodes',
    mandatory,
    run: ({ services, signal }) =>
      services.client.listJobcodes({ active: 'both', type: 'all' }, { signal }).toArray(),
  });
}

export function groupsStep(): Fetch {
  return fetchStep<unknown, AccountingData, 'groups'>({
    key: 'groups',
    run: ({ services, signal }) => services.client.listGroups({ active: 'both' }, { signal }).toArray(),
  });
}

/**
 * Every timesheet from the Monday of the range's first week to the range's
 * last day, on every jobcode and running ones included. Overtime depends on
 * all of an employee's hours in a week, not only the reported ones.
 */
export function weekTimesheetsStep(after: ReadonlyArray<keyof AccountingData & string> = []): Fetch {
  return fetchStep<unknown, AccountingData, 'week_timesheets'>({
    key: 'week_timesheets',
    after,
    run: ({ services, signal, range }) =>
      services.client
        .listTimesheets(
          { start_date: startOfIsoWeek(range.start_date), end_date: range.end_date, on_the_clock: 'both' },
          { signal }
        )
        .toArray(),
  });
}

/** The timesheets dated inside the range */
export function timesheetsStep(): Fetch {
  return fetchStep<unknown, AccountingData, 'timesheets'>({
    key: 'timesheets',
    requires: ['week_timesheets'],
    run: ({ range, get }) => get('week_timesheets').filter((entry) => within(entry, range)),
  });
}

/** Timesheets in the range on the target jobcode and everything below it */
export function targetTimesheetsStep(): Fetch {
  return fetchStep<unknown, AccountingData, 'timesheets'>({
    key: 'timesheets',
    requires: ['target', 'jobcodes', 'week_timesheets'],
    run: ({ range, get }) => {
      const jobcodeIds = new Set(new JobcodeTree(get('jobcodes')).descendants(get('target').id));
      return get('week_timesheets').filter((entry) => jobcodeIds.has(entry.jobcode_id) && within(entry, range));
    },
  });
}

/**
 * Look up the client or project a workflow is about. Mandatory: there is
 * nothing to report without it.
 */
export function targetStep<TParams>(name: (params: TParams) => string): Fetch<TParams> {
  return fetchStep<TParams, AccountingData, 'target'>({
    key: 'target',
    requires: ['jobcodes'],
    mandatory: true,
    run: ({ params, get }) =>
      new EntityResolver({ jobcodes: get('jobcodes'), users: [], groups: [] }).resolveOne(name(params), 'jobcode'),
  });
}

export function aggregatorStep(): Fetch {
  return fetchStep<unknown, AccountingData, 'aggregator'>({
    key: 'aggregator',
    requires: ['users', 'jobcodes'],
    after: ['groups', 'week_timesheets'],
    run: ({ get, find }) =>
      new ReportAggregator({
        users: get('users'),
        jobcodes: get('jobcodes'),
        groups: find('groups') ?? [],
        weekEntries: find('week_timesheets'),
      }),
  });
}

export function ratesStep(): Fetch {
  return fetchStep<unknown, AccountingData, 'rates'>({
    key: 'rates',
    requires: ['users', 'jobcodes'],
    run: ({ services, get }) => services.rates.load(get('users'), get('jobcodes')),
  });
}

export function report<TParams = unknown>(
  key: string,
  requires: ReadonlyArray<keyof AccountingData & string>,
  build: (ctx: StepContext<TParams, AccountingData>) => unknown
): ReportStep<TParams, AccountingData> {
  return { kind: 'report', key, requires, build };
}
