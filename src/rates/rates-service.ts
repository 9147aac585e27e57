/**
 * Rate Resolution Service
 *
 * Provides rate lookup with a fallback chain:
 * 1. QuickBooks Time (user.pay_rate when paid hourly, jobcode.billable_rate)
 * 2. rates.json overrides
 * 3. rates.json defaults
 * 4. DEFAULT_HOURLY_RATE environment variable (hourly rates only)
 * 5. None: costs that need the rate are left out
 *
 * Nothing is kept between calls; each `load` reads rates.json afresh.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import type { RateLookup } from '../compute/types.js';
import { silentLogger, type Logger } from '../logger.js';
import type { Jobcode, User } from '../qbtime/types.js';
import type { GetRatesResponse, JobcodeRate, RateInfo, RatesConfig, UserRate } from './types.js';

const DEFAULT_CONFIG: RatesConfig = {
  user_overrides: {},
  jobcode_overrides: {},
  defaults: {
    hourly_rate: null,
    billable_rate: null,
  },
};

const ratesConfigSchema: z.ZodType<RatesConfig, z.ZodTypeDef, unknown> = z.object({
  user_overrides: z.record(z.object({ hourly_rate: z.number().nonnegative().optional() })).default({}),
  jobcode_overrides: z.record(z.object({ billable_rate: z.number().nonnegative().optional() })).default({}),
  defaults: z
    .object({
      hourly_rate: z.number().nonnegative().nullable().default(null),
      billable_rate: z.number().nonnegative().nullable().default(null),
    })
    .default({}),
});

export interface RatesServiceOptions {
  configDir?: string;
  defaultHourlyRate?: number;
  logger?: Logger;
}

/**
 * Resolved rates for one report run
 */
export class RateBook implements RateLookup {
  private userRates = new Map<number, UserRate>();
  private jobcodeRates = new Map<number, JobcodeRate>();

  constructor(
    users: readonly UserRate[],
    jobcodes: readonly JobcodeRate[],
    readonly configLoaded: boolean,
    readonly warnings: readonly string[]
  ) {
    for (const user of users) this.userRates.set(user.user_id, user);
    for (const jobcode of jobcodes) this.jobcodeRates.set(jobcode.jobcode_id, jobcode);
  }

  hourlyRate(userId: number): number | undefined {
    return this.userRates.get(userId)?.hourly_rate?.rate;
  }

  billableRate(jobcodeId: number): number | undefined {
    return this.jobcodeRates.get(jobcodeId)?.billable_rate?.rate;
  }

  toResponse(): GetRatesResponse {
    return {
      users: [...this.userRates.values()],
      jobcodes: [...this.jobcodeRates.values()],
      config_loaded: this.configLoaded,
      warnings: [...this.warnings],
    };
  }
}

export class RatesService {
  private configPath: string;
  private defaultHourlyRate?: number;
  private logger: Logger;

  constructor(options: RatesServiceOptions = {}) {
    this.configPath = join(options.configDir ?? process.cwd(), 'rates.json');
    this.defaultHourlyRate = options.defaultHourlyRate;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Resolve every user's hourly rate and every jobcode's billable rate
   */
  async load(users: readonly User[], jobcodes: readonly Jobcode[]): Promise<RateBook> {
    const warnings: string[] = [];
    const { config, loaded } = await this.loadConfig(warnings);

    const userRates = users.map((user) => this.mapUserToRate(user, config, warnings));
    const jobcodeRates = jobcodes.map((jobcode) => this.mapJobcodeToRate(jobcode, config));

    return new RateBook(userRates, jobcodeRates, loaded, warnings);
  }

  /**
   * Load rates config from file if available
   */
  private async loadConfig(warnings: string[]): Promise<{ config: RatesConfig; loaded: boolean }> {
    if (!existsSync(this.configPath)) {
      return { config: DEFAULT_CONFIG, loaded: false };
    }

    try {
      const content = await readFile(this.configPath, 'utf-8');
      const parsed = ratesConfigSchema.safeParse(JSON.parse(content));
      if (!parsed.success) {
        const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        warnings.push(`Ignoring rates.json: ${detail}`);
        return { config: DEFAULT_CONFIG, loaded: false };
      }
      return { config: parsed.data, loaded: true };
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Failed to load ${this.configPath}`, detail);
      warnings.push(`Failed to load rates.json: ${detail}`);
      return { config: DEFAULT_CONFIG, loaded: false };
    }
  }

  /**
   * Resolve a rate with fallback chain
   */
  private resolveRate(
    apiValue: number | undefined,
    apiSource: string,
    configOverride: number | undefined,
    configDefault: number | null,
    envDefault?: number
  ): RateInfo | null {
    if (apiValue !== undefined) {
      return { rate: apiValue, source: 'qbtime_api', source_detail: apiSource };
    }
    if (configOverride !== undefined) {
      return { rate: configOverride, source: 'config_file', source_detail: this.configPath };
    }
    if (configDefault !== null) {
      return { rate: configDefault, source: 'config_default', source_detail: this.configPath };
    }
    if (envDefault !== undefined) {
      return { rate: envDefault, source: 'env_default', source_detail: 'DEFAULT_HOURLY_RATE' };
    }
    return null;
  }

  private mapUserToRate(user: User, config: RatesConfig, warnings: string[]): UserRate {
    const name = `${user.first_name} ${user.last_name}`.trim() || user.username || `User ${user.id}`;
    // Salaried pay rates are annual amounts, not hourly ones
    const apiRate = user.pay_interval === 'hour' && user.pay_rate > 0 ? user.pay_rate : undefined;

    const hourlyRate = this.resolveRate(
      apiRate,
      'user.pay_rate',
      config.user_overrides[String(user.id)]?.hourly_rate,
      config.defaults.hourly_rate,
      this.defaultHourlyRate
    );

    if (!hourlyRate) {
      warnings.push(`User ${name} (${user.id}) has no hourly rate configured`);
    }

    return { user_id: user.id, user_name: name, hourly_rate: hourlyRate };
  }

  private mapJobcodeToRate(jobcode: Jobcode, config: RatesConfig): JobcodeRate {
    const apiRate = jobcode.billable && jobcode.billable_rate > 0 ? jobcode.billable_rate : undefined;

    return {
      jobcode_id: jobcode.id,
      jobcode_name: jobcode.name,
      billable: jobcode.billable,
      billable_rate: this.resolveRate(
        apiRate,
        'jobcode.billable_rate',
        config.jobcode_overrides[String(jobcode.id)]?.billable_rate,
        jobcode.billable ? config.defaults.billable_rate : null
      ),
    };
  }
}
