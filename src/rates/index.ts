/**
 * Rate Resolution Module
 */

export { RatesService, RateBook, type RatesServiceOptions } from './rates-service.js';
export type {
  RateSource,
  RateInfo,
  UserRate,
  JobcodeRate,
  RatesConfig,
  GetRatesResponse,
} from './types.js';
