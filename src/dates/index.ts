/**
 * Dates Module
 */

export { DateRangeResolver } from './date-range-resolver.js';
export type { DateRangeResolverOptions, RangeParams } from './date-range-resolver.js';
export * from './calendar.js';
