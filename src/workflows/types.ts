/**
 * Types for accounting workflows
 */

import type { ReportAggregator } from '../compute/aggregation.js';
import type { DateRange } from '../dates/calendar.js';
import type { DateRangeResolver } from '../dates/date-range-resolver.js';
import type { ResolvedEntity } from '../entities/types.js';
import type { ErrorCode } from '../errors.js';
import type { Logger } from '../logger.js';
import type { QbTimeClient } from '../qbtime/client.js';
import type { Group, Jobcode, Timesheet, User } from '../qbtime/types.js';
import type { RateBook, RatesService } from '../rates/rates-service.js';

export type WorkflowState = 'Resolving' | 'Fetching' | 'Aggregating' | 'Assembling' | 'Done' | 'PartiallyFailed';

export type WorkflowStatus = Extract<WorkflowState, 'Done' | 'PartiallyFailed'>;

export interface WorkflowError {
  source: string;
  code: ErrorCode | 'SKIPPED';
  message: string;
}

export interface WorkflowResult {
  name: string;
  status: WorkflowStatus;
  date_range: DateRange;
  reports: Record<string, unknown>;
  errors: WorkflowError[];
}

/**
 * Everything a workflow step may call out to
 */
export interface WorkflowServices {
  client: QbTimeClient;
  rates: RatesService;
  dates: DateRangeResolver;
}

export interface StepContext<TParams, TData> {
  params: TParams;
  range: DateRange;
  signal: AbortSignal;
  services: WorkflowServices;
  /** Output of a step this one requires */
  get<K extends keyof TData>(key: K): TData[K];
  /** Output of any earlier step, if it succeeded */
  find<K extends keyof TData>(key: K): TData[K] | undefined;
}

export interface RangeContext {
  dates: DateRangeResolver;
  /** Today in the reporting timezone */
  anchor: string;
}

/**
 * A fetch (or derivation) whose output later steps consume. Built with
 * `fetchStep`, which ties the key to the output type.
 */
export interface PlannedFetch<TParams, TData> {
  kind: 'fetch';
  key: keyof TData & string;
  requires: ReadonlyArray<keyof TData & string>;
  /** Wait for these, but carry on if they fail */
  after: ReadonlyArray<keyof TData & string>;
  mandatory: boolean;
  execute(ctx: StepContext<TParams, TData>, store: StepStore<TData>): Promise<void>;
}

export interface ReportStep<TParams, TData> {
  kind: 'report';
  key: string;
  requires: ReadonlyArray<keyof TData & string>;
  build(ctx: StepContext<TParams, TData>): unknown;
}

export type WorkflowStep<TParams, TData> = PlannedFetch<TParams, TData> | ReportStep<TParams, TData>;

export interface WorkflowDefinition<TParams, TData> {
  name: string;
  description: string;
  resolveRange(params: TParams, ctx: RangeContext): DateRange;
  steps: ReadonlyArray<WorkflowStep<TParams, TData>>;
}

export interface StepStore<TData> {
  set<K extends keyof TData>(key: K, value: TData[K]): void;
}

export interface RunOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface WorkflowOrchestratorOptions {
  services: WorkflowServices;
  timezone?: string;
  timeoutMs?: number;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Data the accounting workflows share between steps
 */
export interface AccountingData {
  users: User[];
  jobcodes: Jobcode[];
  groups: Group[];
  /** The client or project a workflow is about */
  target: ResolvedEntity;
  /** The range's weeks in full, every jobcode */
  week_timesheets: Timesheet[];
  /** What the reports cover */
  timesheets: Timesheet[];
  aggregator: ReportAggregator;
  rates: RateBook;
}

// ============================================
// Workflow parameters
// ============================================

export interface BiweeklyPayrollParams {
  end_date?: string;
}

export interface MonthEndClosingParams {
  month?: number;
  year?: number;
}

export interface QuarterlyTaxPrepParams {
  quarter?: number;
  year?: number;
}

export interface ClientInvoiceParams {
  client_name: string;
  period?: string;
  start_date?: string;
  end_date?: string;
  hourly_rate?: number;
}

export interface ProjectProfitabilityParams {
  project_name: string;
  period?: string;
  start_date?: string;
  end_date?: string;
}
