/**
 * Shared reference data and record builders for the engine's tests
 */

import type { RateLookup, ReferenceData } from '../compute/types.js';
import { groupSchema, jobcodeSchema, timesheetSchema, userSchema } from '../qbtime/schemas.js';
import type { Group, Jobcode, Timesheet, User } from '../qbtime/types.js';

export function makeUser(fields: Record<string, unknown> & { id: number }): User {
  return userSchema.parse(fields);
}

export function makeJobcode(fields: Record<string, unknown> & { id: number; name: string }): Jobcode {
  return jobcodeSchema.parse(fields);
}

export function makeGroup(fields: Record<string, unknown> & { id: number; name: string }): Group {
  return groupSchema.parse(fields);
}

/**
 * A manual entry of whole or fractional hours
 */
export function makeTimesheet(
  id: number,
  userId: number,
  jobcodeId: number,
  date: string,
  hours: number,
  extra: Record<string, unknown> = {}
): Timesheet {
  return timesheetSchema.parse({
    id,
    user_id: userId,
    jobcode_id: jobcodeId,
    date,
    duration: Math.round(hours * 3600),
    type: 'manual',
    ...extra,
  });
}

/**
 * Two groups, three users, and a jobcode forest:
 *
 *   10 Acme › 11 Website
 *   20 Time Off (pto) › 21 Vacation
 *   30 Lunch (unpaid break)
 *   40 Holiday Shift (double time) › 41 Holiday Support
 */
export function referenceData(): ReferenceData {
  return {
    users: [
      makeUser({ id: 1, first_name: 'Ada', last_name: 'Lovelace', group_id: 7, payroll_id: 'A-1', employee_number: 101 }),
      makeUser({ id: 2, first_name: 'Grace', last_name: 'Hopper', group_id: 8, payroll_id: 'A-2', employee_number: 102 }),
      makeUser({ id: 3, username: 'ghost' }),
    ],
    jobcodes: [
      makeJobcode({ id: 10, name: 'Acme' }),
      makeJobcode({ id: 11, name: 'Website', parent_id: 10 }),
      makeJobcode({ id: 20, name: 'Time Off', type: 'pto' }),
      makeJobcode({ id: 21, name: 'Vacation', parent_id: 20 }),
      makeJobcode({ id: 30, name: 'Lunch', type: 'unpaid_break' }),
      makeJobcode({ id: 40, name: 'Holiday Shift', double_time: true }),
      makeJobcode({ id: 41, name: 'Holiday Support', parent_id: 40 }),
    ],
    groups: [makeGroup({ id: 7, name: 'Engineering' }), makeGroup({ id: 8, name: 'Support' })],
  };
}

/**
 * Five 9-hour days for user 1 on Website, Monday 2024-12-02 through Friday
 */
export function overtimeWeek(): Timesheet[] {
  return ['2024-12-02', '2024-12-03', '2024-12-04', '2024-12-05', '2024-12-06'].map((date, index) =>
    makeTimesheet(index + 1, 1, 11, date, 9)
  );
}

export function fakeRates(hourly: Record<number, number>, billable: Record<number, number> = {}): RateLookup {
  return {
    hourlyRate: (userId) => hourly[userId],
    billableRate: (jobcodeId) => billable[jobcodeId],
  };
}
