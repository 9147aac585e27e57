/**
 * Utilization Calculator
 *
 * Compares worked time against capacity (working days × hours per day) for
 * each employee. PTO is not worked time; unpaid breaks are not time at all.
 */

import { eachDay, isoWeekday, type DateRange } from '../dates/calendar.js';
import type { Timesheet } from '../qbtime/types.js';
import type { ReportAggregator } from './aggregation.js';
import type { UtilizationMetrics, UtilizationReport } from './types.js';

export interface UtilizationOptions {
  capacityHoursPerDay?: number;
  excludeWeekends?: boolean;
  /** Employees to measure; defaults to everyone with time in the range */
  userIds?: readonly number[];
}

export class UtilizationCalculator {
  constructor(private readonly aggregator: ReportAggregator) {}

  /**
   * Calculate utilization for the range
   */
  calculate(timesheets: readonly Timesheet[], range: DateRange, options: UtilizationOptions = {}): UtilizationReport {
    const { capacityHoursPerDay = 8, excludeWeekends = true } = options;
    const workingDays = this.calculateWorkingDays(range, excludeWeekends);
    const capacityPerUser = workingDays * capacityHoursPerDay * 3600;

    const byEmployee = this.aggregator.aggregate(timesheets, 'employee');
    const userIds = options.userIds ?? Object.keys(byEmployee).map(Number);

    const by_user: UtilizationReport['by_user'] = {};
    let worked = 0;
    let capacity = 0;

    for (const userId of userIds) {
      const row = byEmployee[String(userId)];
      const userWorked = row ? row.regular_seconds + row.overtime_seconds + row.doubletime_seconds : 0;
      by_user[String(userId)] = {
        name: this.aggregator.userName(userId),
        ...this.calculateMetrics(userWorked, capacityPerUser),
      };
      worked += userWorked;
      capacity += capacityPerUser;
    }

    return {
      date_range: range,
      settings: {
        capacity_hours_per_day: capacityHoursPerDay,
        exclude_weekends: excludeWeekends,
        working_days: workingDays,
      },
      totals: this.calculateMetrics(worked, capacity),
      by_user,
    };
  }

  /**
   * Days in the range, less Saturdays and Sundays when excluded
   */
  calculateWorkingDays(range: DateRange, excludeWeekends: boolean): number {
    const days = eachDay(range);
    if (!excludeWeekends) return days.length;
    return days.filter((day) => isoWeekday(day) <= 5).length;
  }

  private calculateMetrics(workedSeconds: number, capacitySeconds: number): UtilizationMetrics {
    return {
      worked_seconds: workedSeconds,
      worked_hours: this.round(workedSeconds / 3600),
      capacity_seconds: capacitySeconds,
      capacity_hours: this.round(capacitySeconds / 3600),
      utilization_percent: capacitySeconds > 0 ? this.round((workedSeconds / capacitySeconds) * 100) : 0,
    };
  }

  private round(num: number): number {
    return Math.round(num * 100) / 100;
  }
}
