/**
 * Profitability Calculator
 *
 * Revenue is worked time priced at each jobcode's billable rate (inherited
 * from the nearest priced ancestor). Labor cost is the same time priced at
 * employee hourly rates, with overtime and double-time multipliers. PTO is
 * a cost with no revenue.
 */

import type { Timesheet } from '../qbtime/types.js';
import { DOUBLETIME_MULTIPLIER, OVERTIME_MULTIPLIER, roundCurrency, type ReportAggregator } from './aggregation.js';
import { billableRateFor, toHours } from './reports.js';
import type { ProfitabilityReport, RateLookup } from './types.js';

export class ProfitabilityCalculator {
  constructor(
    private readonly aggregator: ReportAggregator,
    private readonly rates: RateLookup
  ) {}

  calculate(timesheets: readonly Timesheet[]): ProfitabilityReport {
    const warnings: string[] = [];
    const missing = new Set<number>();
    let revenue = 0;
    let cost = 0;
    let totalSeconds = 0;
    let billableSeconds = 0;

    for (const item of this.aggregator.classify(timesheets)) {
      if (item.kind === 'excluded') continue;
      const { entry } = item;
      totalSeconds += item.duration_seconds;

      if (item.kind !== 'pto') {
        const billableRate = billableRateFor(this.aggregator, this.rates, entry.jobcode_id);
        if (billableRate !== undefined) {
          billableSeconds += item.duration_seconds;
          revenue += (item.duration_seconds / 3600) * billableRate;
        }
      }

      const hourlyRate = this.rates.hourlyRate(entry.user_id);
      if (hourlyRate === undefined) {
        if (item.duration_seconds > 0 && !missing.has(entry.user_id)) {
          missing.add(entry.user_id);
          warnings.push(`No hourly rate found for user ${this.aggregator.userName(entry.user_id)} (ID: ${entry.user_id})`);
        }
        continue;
      }
      cost +=
        ((item.regular_seconds + item.pto_seconds) / 3600) * hourlyRate +
        (item.overtime_seconds / 3600) * hourlyRate * OVERTIME_MULTIPLIER +
        (item.doubletime_seconds / 3600) * hourlyRate * DOUBLETIME_MULTIPLIER;
    }

    const pricedLabor = missing.size === 0;
    const laborCost = pricedLabor ? roundCurrency(cost) : null;
    const roundedRevenue = roundCurrency(revenue);
    const profit = laborCost === null ? null : roundCurrency(roundedRevenue - laborCost);

    return {
      revenue: roundedRevenue,
      labor_cost: laborCost,
      profit,
      margin_percent:
        profit === null || roundedRevenue === 0 ? null : Math.round((profit / roundedRevenue) * 10000) / 100,
      total_hours: toHours(totalSeconds),
      billable_hours: toHours(billableSeconds),
      unpriced_hours: toHours(totalSeconds - billableSeconds),
      employees_missing_rates: [...missing].sort((a, b) => a - b),
      warnings,
    };
  }
}
