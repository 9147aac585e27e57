/**
 * Workflow Orchestrator
 *
 * Interprets a workflow definition: resolve the date range, run the fetch
 * steps in dependency waves (each wave concurrently, all sharing the one
 * token bucket), build each report section, then assemble the result.
 *
 *   Resolving → Fetching → Aggregating → Assembling → Done | PartiallyFailed
 *
 * A failed optional step is recorded and everything depending on it is
 * skipped; a failed mandatory step fails the run. Cancellation or timeout
 * discards whatever was gathered and raises CancelledError.
 */

import { AccountingError, CancelledError, toToolError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type {
  PlannedFetch,
  ReportStep,
  RunOptions,
  StepContext,
  StepStore,
  WorkflowDefinition,
  WorkflowError,
  WorkflowOrchestratorOptions,
  WorkflowResult,
  WorkflowServices,
  WorkflowState,
} from './types.js';

const DEFAULT_TIMEOUT_MS = 120_000;

/**
 * Tie a fetch step's key to the type of what it produces
 */
export function fetchStep<TParams, TData, K extends keyof TData & string>(step: {
  key: K;
  requires?: ReadonlyArray<keyof TData & string>;
  after?: ReadonlyArray<keyof TData & string>;
  mandatory?: boolean;
  run(ctx: StepContext<TParams, TData>): Promise<TData[K]> | TData[K];
}): PlannedFetch<TParams, TData> {
  return {
    kind: 'fetch',
    key: step.key,
    requires: step.requires ?? [],
    after: step.after ?? [],
    mandatory: step.mandatory ?? false,
    async execute(ctx, store) {
      store.set(step.key, await step.run(ctx));
    },
  };
}

class StepResults<TData> implements StepStore<TData> {
  private values: Partial<TData> = {};

  set<K extends keyof TData>(key: K, value: TData[K]): void {
    this.values[key] = value;
  }

  find<K extends keyof TData>(key: K): TData[K] | undefined {
    return this.values[key];
  }

  get<K extends keyof TData>(key: K): TData[K] {
    const value = this.find(key);
    if (value === undefined) {
      throw new Error(`Step output "${String(key)}" is not available`);
    }
    return value;
  }
}

export class WorkflowOrchestrator {
  private services: WorkflowServices;
  private timezone: string;
  private timeoutMs: number;
  private now: () => Date;
  private logger: Logger;

  constructor(options: WorkflowOrchestratorOptions) {
    this.services = options.services;
    this.timezone = options.timezone ?? 'UTC';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  async run<TParams, TData>(
    definition: WorkflowDefinition<TParams, TData>,
    params: TParams,
    options: RunOptions = {}
  ): Promise<WorkflowResult> {
    const external = options.signal;
    if (external?.aborted) {
      throw new CancelledError();
    }

    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    external?.addEventListener('abort', onAbort, { once: true });

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    try {
      return await this.execute(definition, params, controller.signal);
    } catch (error) {
      if (!controller.signal.aborted) throw error;
      if (timedOut) {
        throw new CancelledError(
          `The ${definition.name} workflow did not finish within ${Math.round(timeoutMs / 1000)} seconds.`
        );
      }
      throw error instanceof CancelledError ? error : new CancelledError();
    } finally {
      clearTimeout(timer);
      external?.removeEventListener('abort', onAbort);
    }
  }

  private async execute<TParams, TData>(
    definition: WorkflowDefinition<TParams, TData>,
    params: TParams,
    signal: AbortSignal
  ): Promise<WorkflowResult> {
    const log = this.logger.child(definition.name);
    let state: WorkflowState = 'Resolving';
    const transition = (next: WorkflowState): void => {
      log.debug(`${state} → ${next}`);
      state = next;
    };

    // Resolving: an unresolvable range is fatal
    const anchor = this.services.dates.today(this.timezone, this.now());
    const range = definition.resolveRange(params, { dates: this.services.dates, anchor });

    const store = new StepResults<TData>();
    const ctx: StepContext<TParams, TData> = {
      params,
      range,
      signal,
      services: this.services,
      get: <K extends keyof TData>(key: K) => store.get(key),
      find: <K extends keyof TData>(key: K) => store.find(key),
    };
    const fetches = definition.steps.filter(
      (step): step is PlannedFetch<TParams, TData> => step.kind === 'fetch'
    );
    const reportSteps = definition.steps.filter(
      (step): step is ReportStep<TParams, TData> => step.kind === 'report'
    );

    const errors: WorkflowError[] = [];
    const failures = new Map<string, unknown>();

    transition('Fetching');
    await this.runFetches(fetches, ctx, store, failures, errors, log);

    transition('Aggregating');
    const reports: Record<string, unknown> = {};
    for (const step of reportSteps) {
      this.throwIfCancelled(signal);
      const missing = step.requires.filter((key) => failures.has(key));
      if (missing.length > 0) {
        errors.push(this.skipped(step.key, missing));
        continue;
      }
      try {
        reports[step.key] = step.build(ctx);
      } catch (error) {
        if (error instanceof CancelledError) throw error;
        errors.push(this.toWorkflowError(step.key, error, log));
      }
    }
    this.throwIfCancelled(signal);

    transition('Assembling');
    const status = errors.length > 0 ? 'PartiallyFailed' : 'Done';
    transition(status);

    return { name: definition.name, status, date_range: range, reports, errors };
  }

  /**
   * Run fetch steps wave by wave: every step whose inputs have settled runs
   * in the next wave
   */
  private async runFetches<TParams, TData>(
    steps: ReadonlyArray<PlannedFetch<TParams, TData>>,
    ctx: StepContext<TParams, TData>,
    store: StepResults<TData>,
    failures: Map<string, unknown>,
    errors: WorkflowError[],
    log: Logger
  ): Promise<void> {
    const settled = new Set<string>();
    const produced = new Set<string>(steps.map((step) => step.key));
    let pending = [...steps];

    while (pending.length > 0) {
      this.throwIfCancelled(ctx.signal);

      // Skipping one step can strand another, so repeat until nothing changes
      let skippedAny = true;
      while (skippedAny) {
        skippedAny = false;
        for (const step of pending) {
          const missing = step.requires.filter((key) => failures.has(key));
          if (missing.length === 0) continue;
          if (step.mandatory) throw failures.get(missing[0]);
          failures.set(step.key, failures.get(missing[0]));
          settled.add(step.key);
          errors.push(this.skipped(step.key, missing));
          skippedAny = true;
        }
        pending = pending.filter((step) => !settled.has(step.key));
      }

      // `after` keys no step of this workflow produces are not waited on
      const ready = pending.filter(
        (step) =>
          step.requires.every((key) => settled.has(key)) &&
          step.after.every((key) => settled.has(key) || !produced.has(key))
      );
      if (ready.length === 0) {
        if (pending.length === 0) return;
        throw new Error(`Steps ${pending.map((step) => step.key).join(', ')} wait on inputs no step produces`);
      }

      log.debug(`fetching ${ready.map((step) => step.key).join(', ')}`);
      const outcomes = await Promise.allSettled(ready.map((step) => step.execute(ctx, store)));
      this.throwIfCancelled(ctx.signal);

      for (const [index, outcome] of outcomes.entries()) {
        const step = ready[index];
        settled.add(step.key);
        if (outcome.status === 'fulfilled') continue;
        if (step.mandatory) throw outcome.reason;
        failures.set(step.key, outcome.reason);
        errors.push(this.toWorkflowError(step.key, outcome.reason, log));
      }
      pending = pending.filter((step) => !settled.has(step.key));
    }
  }

  private skipped(source: string, missing: readonly string[]): WorkflowError {
    return {
      source,
      code: 'SKIPPED',
      message: `Skipped because ${missing.join(' and ')} could not be loaded.`,
    };
  }

  private toWorkflowError(source: string, error: unknown, log: Logger): WorkflowError {
    if (!(error instanceof AccountingError)) {
      log.error(`${source} failed`, error);
    }
    const { code, message } = toToolError(error);
    return { source, code, message };
  }

  private throwIfCancelled(signal: AbortSignal): void {
    if (signal.aborted) {
      throw new CancelledError();
    }
  }
}
