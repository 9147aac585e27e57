/**
 * Compute Module
 *
 * Aggregation engine and the report builders layered on it.
 */

export {
  ReportAggregator,
  entryDuration,
  roundCurrency,
  WEEKLY_OVERTIME_THRESHOLD_SECONDS,
  OVERTIME_MULTIPLIER,
  DOUBLETIME_MULTIPLIER,
} from './aggregation.js';
export { JobcodeTree } from './jobcode-tree.js';
export { UtilizationCalculator, type UtilizationOptions } from './utilization.js';
export { ProfitabilityCalculator } from './profitability.js';
export * from './reports.js';
export type * from './types.js';
