/**
 * Types for rate resolution
 */

export type RateSource =
  | 'qbtime_api'      // Rate from the QuickBooks Time user or jobcode
  | 'config_file'     // Override from rates.json
  | 'config_default'  // `defaults` block of rates.json
  | 'env_default';    // DEFAULT_HOURLY_RATE

export interface RateInfo {
  rate: number;
  source: RateSource;
  source_detail?: string;  // e.g. "user.pay_rate" or "jobcode.billable_rate"
}

export interface UserRate {
  user_id: number;
  user_name: string;
  hourly_rate: RateInfo | null;
}

export interface JobcodeRate {
  jobcode_id: number;
  jobcode_name: string;
  billable: boolean;
  billable_rate: RateInfo | null;
}

export interface RatesConfig {
  user_overrides: Record<string, { hourly_rate?: number }>;
  jobcode_overrides: Record<string, { billable_rate?: number }>;
  defaults: {
    hourly_rate: number | null;
    billable_rate: number | null;
  };
}

export interface GetRatesResponse {
  users: UserRate[];
  jobcodes: JobcodeRate[];
  config_loaded: boolean;
  warnings: string[];
}
