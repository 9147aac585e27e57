/**
 * Report Aggregator
 *
 * Reduces raw time entries into per-employee, per-jobcode or per-group
 * totals, splitting worked time into regular, overtime, double-time and PTO.
 *
 * Overtime is weekly: for each employee and ISO week (Monday start) of the
 * entry's date, the first 40 hours of work are regular and the rest is
 * overtime. PTO never counts toward the 40 hours; neither does time on a
 * double-time jobcode or entry. Unpaid breaks are left out entirely.
 *
 * Reports usually cover part of a week, or part of an employee's jobcodes.
 * The rest of the week's work comes in as `weekEntries`: it counts toward
 * the 40 hours but is never reported itself.
 */

import { startOfIsoWeek } from '../dates/calendar.js';
import type { Timesheet, User } from '../qbtime/types.js';
import { JobcodeTree } from './jobcode-tree.js';
import type {
  AggregateOptions,
  AggregateRow,
  AggregateTotals,
  ClassifiedEntry,
  CostFields,
  Dimension,
  EntryKind,
  ReferenceData,
  TimeTotals,
} from './types.js';

export const WEEKLY_OVERTIME_THRESHOLD_SECONDS = 40 * 3600;

export const OVERTIME_MULTIPLIER = 1.5;
export const DOUBLETIME_MULTIPLIER = 2;

/**
 * Seconds an entry covers: its duration, or end minus start when the
 * duration is missing
 */
export function entryDuration(entry: Timesheet): number {
  if (entry.duration > 0) return entry.duration;
  if (entry.start && entry.end) {
    const elapsed = Math.round((Date.parse(entry.end) - Date.parse(entry.start)) / 1000);
    if (Number.isFinite(elapsed) && elapsed > 0) return elapsed;
  }
  return 0;
}

/**
 * Chronological order within a week: date, then start time (entries without
 * a start, i.e. manual ones, first on their day), then id
 */
function compareChronologically(a: Timesheet, b: Timesheet): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  const aStart = a.start ? Date.parse(a.start) : Number.NEGATIVE_INFINITY;
  const bStart = b.start ? Date.parse(b.start) : Number.NEGATIVE_INFINITY;
  if (aStart !== bStart) return aStart < bStart ? -1 : 1;
  return a.id - b.id;
}

/** Employee and ISO week an entry's hours count toward, by its `date` */
function weekKey(entry: Timesheet): string {
  return `${entry.user_id}:${startOfIsoWeek(entry.date)}`;
}

export function roundCurrency(amount: number): number {
  return Math.round(amount * 100) / 100;
}

export function emptyTotals(): TimeTotals {
  return { regular_seconds: 0, overtime_seconds: 0, doubletime_seconds: 0, pto_seconds: 0, entry_count: 0 };
}

interface Accumulator {
  totals: TimeTotals;
  regularCost: number;
  overtimeCost: number;
  doubletimeCost: number;
  costable: boolean;
}

export class ReportAggregator {
  readonly tree: JobcodeTree;
  private usersById = new Map<number, User>();

  constructor(private readonly reference: ReferenceData) {
    this.tree = new JobcodeTree(reference.jobcodes);
    for (const user of reference.users) {
      this.usersById.set(user.id, user);
    }
  }

  user(id: number): User | undefined {
    return this.usersById.get(id);
  }

  users(): readonly User[] {
    return this.reference.users;
  }

  userName(id: number): string {
    const user = this.usersById.get(id);
    if (!user) return `User ${id}`;
    const name = `${user.first_name} ${user.last_name}`.trim();
    return name || user.display_name || user.username || `User ${id}`;
  }

  groupName(id: number): string {
    if (id === 0) return 'No group';
    return this.reference.groups.find((group) => group.id === id)?.name ?? `Group ${id}`;
  }

  /**
   * Decide which bucket an entry's time belongs to
   */
  kindOf(entry: Timesheet): EntryKind {
    const type = this.tree.effectiveType(entry.jobcode_id);
    if (type === 'unpaid_break') return 'excluded';
    if (type === 'pto') return 'pto';
    if (entry.double_time === true || this.tree.isDoubleTime(entry.jobcode_id)) return 'doubletime';
    return 'work';
  }

  /**
   * Split every entry into its pay buckets, applying the weekly 40-hour
   * threshold per employee. Output follows input order and holds only the
   * given entries.
   */
  classify(entries: readonly Timesheet[]): ClassifiedEntry[] {
    const classified = new Map<Timesheet, ClassifiedEntry>();
    const weeks = new Map<string, ClassifiedEntry[]>();

    for (const entry of entries) {
      const kind = this.kindOf(entry);
      const duration = entryDuration(entry);
      const item: ClassifiedEntry = {
        entry,
        kind,
        duration_seconds: duration,
        regular_seconds: 0,
        overtime_seconds: 0,
        doubletime_seconds: kind === 'doubletime' ? duration : 0,
        pto_seconds: kind === 'pto' ? duration : 0,
      };
      classified.set(entry, item);

      if (kind === 'work') {
        const key = weekKey(entry);
        const week = weeks.get(key) ?? [];
        week.push(item);
        weeks.set(key, week);
      }
    }

    const reported = new Set(entries.map((entry) => entry.id));
    for (const entry of this.reference.weekEntries ?? []) {
      if (reported.has(entry.id) || this.kindOf(entry) !== 'work') continue;
      const week = weeks.get(weekKey(entry));
      if (!week) continue;
      const duration = entryDuration(entry);
      week.push({
        entry,
        kind: 'work',
        duration_seconds: duration,
        regular_seconds: 0,
        overtime_seconds: 0,
        doubletime_seconds: 0,
        pto_seconds: 0,
      });
    }

    for (const week of weeks.values()) {
      week.sort((a, b) => compareChronologically(a.entry, b.entry));
      let worked = 0;
      for (const item of week) {
        const remaining = Math.max(0, WEEKLY_OVERTIME_THRESHOLD_SECONDS - worked);
        item.regular_seconds = Math.min(item.duration_seconds, remaining);
        item.overtime_seconds = item.duration_seconds - item.regular_seconds;
        worked += item.duration_seconds;
      }
    }

    return entries.flatMap((entry) => {
      const item = classified.get(entry);
      return item ? [item] : [];
    });
  }

  /**
   * Totals keyed by the dimension's id (as a string)
   */
  aggregate(entries: readonly Timesheet[], dimension: Dimension, options: AggregateOptions = {}): AggregateTotals {
    return this.aggregateClassified(this.classify(entries), dimension, options);
  }

  aggregateClassified(
    classified: readonly ClassifiedEntry[],
    dimension: Dimension,
    options: AggregateOptions = {}
  ): AggregateTotals {
    const { hourlyRates, includeZeroTime = false } = options;
    const accumulators = new Map<string, Accumulator>();

    const accumulatorFor = (key: string): Accumulator => {
      let acc = accumulators.get(key);
      if (!acc) {
        acc = { totals: emptyTotals(), regularCost: 0, overtimeCost: 0, doubletimeCost: 0, costable: true };
        accumulators.set(key, acc);
      }
      return acc;
    };

    if (includeZeroTime) {
      for (const key of this.universe(dimension)) {
        accumulatorFor(key);
      }
    }

    for (const item of classified) {
      if (item.kind === 'excluded') continue;
      const acc = accumulatorFor(this.keyOf(item.entry, dimension));
      acc.totals.regular_seconds += item.regular_seconds;
      acc.totals.overtime_seconds += item.overtime_seconds;
      acc.totals.doubletime_seconds += item.doubletime_seconds;
      acc.totals.pto_seconds += item.pto_seconds;
      acc.totals.entry_count++;

      if (hourlyRates) {
        const rate = hourlyRates.get(item.entry.user_id);
        if (rate === undefined) {
          acc.costable = false;
        } else {
          acc.regularCost += (item.regular_seconds / 3600) * rate;
          acc.overtimeCost += (item.overtime_seconds / 3600) * rate * OVERTIME_MULTIPLIER;
          acc.doubletimeCost += (item.doubletime_seconds / 3600) * rate * DOUBLETIME_MULTIPLIER;
        }
      }
    }

    const result: AggregateTotals = {};
    for (const [key, acc] of accumulators) {
      const row: AggregateRow = { ...acc.totals };
      if (hourlyRates && acc.costable) {
        Object.assign(row, this.emitCosts(acc));
      }
      result[key] = row;
    }
    return result;
  }

  private emitCosts(acc: Accumulator): CostFields {
    return {
      regular_cost: roundCurrency(acc.regularCost),
      overtime_cost: roundCurrency(acc.overtimeCost),
      doubletime_cost: roundCurrency(acc.doubletimeCost),
      total_cost: roundCurrency(acc.regularCost + acc.overtimeCost + acc.doubletimeCost),
    };
  }

  private keyOf(entry: Timesheet, dimension: Dimension): string {
    switch (dimension) {
      case 'employee':
        return String(entry.user_id);
      case 'jobcode':
        return String(entry.jobcode_id);
      case 'group':
        return String(this.usersById.get(entry.user_id)?.group_id ?? 0);
    }
  }

  private universe(dimension: Dimension): string[] {
    switch (dimension) {
      case 'employee':
        return this.reference.users.map((user) => String(user.id));
      case 'jobcode':
        return this.reference.jobcodes.map((jobcode) => String(jobcode.id));
      case 'group':
        return this.reference.groups.map((group) => String(group.id));
    }
  }
}
