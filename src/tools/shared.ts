/**
 * Building blocks shared by the tool modules
 */

import * as z from 'zod';
import type { DateRangeResolver } from '../dates/date-range-resolver.js';
import { AccountingError, ValidationError, toToolError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { QbTimeClient } from '../qbtime/client.js';
import type { PagedSequence } from '../qbtime/fetcher.js';
import type { JobcodeTypeFilter } from '../qbtime/types.js';
import type { RatesService } from '../rates/rates-service.js';
import type { VocabularyMapper } from '../vocabulary/vocabulary-mapper.js';
import type { WorkflowOrchestrator } from '../workflows/orchestrator.js';

/**
 * Everything a tool handler may use
 */
export interface ToolContext {
  client: QbTimeClient;
  dates: DateRangeResolver;
  vocabulary: VocabularyMapper;
  rates: RatesService;
  orchestrator: WorkflowOrchestrator;
  timezone: string;
  now?: () => Date;
  logger: Logger;
}

/**
 * A tool with its parameters erased, ready to register or call directly
 */
export interface ToolDefinition {
  name: string;
  description: string;
  schema: z.ZodRawShape;
  call(args: unknown, signal?: AbortSignal): Promise<unknown>;
}

export function defineTool<S extends z.ZodRawShape>(definition: {
  name: string;
  description: string;
  schema: S;
  run(params: z.infer<z.ZodObject<S>>, signal?: AbortSignal): Promise<unknown> | unknown;
}): ToolDefinition {
  const parser = z.object(definition.schema);
  return {
    name: definition.name,
    description: definition.description,
    schema: definition.schema,
    async call(args, signal) {
      const parsed = parser.safeParse(args ?? {});
      if (!parsed.success) {
        const detail = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`).join('; ');
        throw new ValidationError(`Invalid parameters for ${definition.name}: ${detail}`);
      }
      return definition.run(parsed.data, signal);
    },
  };
}

export interface ToolResponse {
  [key: string]: unknown;
  content: { type: 'text'; text: string }[];
  isError?: boolean;
}

/**
 * Run a tool and shape its outcome for MCP: JSON on success, `{code, message}`
 * with isError on failure
 */
export async function respond(tool: ToolDefinition, args: unknown, logger: Logger, signal?: AbortSignal): Promise<ToolResponse> {
  try {
    const result = await tool.call(args, signal);
    return {
      content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
    };
  } catch (error) {
    if (!(error instanceof AccountingError)) {
      logger.error(`${tool.name} failed`, error);
    }
    return {
      content: [{ type: 'text', text: JSON.stringify(toToolError(error), null, 2) }],
      isError: true,
    };
  }
}

export function today(ctx: ToolContext): string {
  return ctx.dates.today(ctx.timezone, ctx.now ? ctx.now() : new Date());
}

// ============================================
// Common parameters
// ============================================

export const ids = (what: string) => z.array(z.number().int()).optional().describe(`Filter by ${what} IDs`);

export const activeParam = z.enum(['yes', 'no', 'both']).optional().describe('Active status filter (default: yes)');

export const jobcodeTypeParam = z
  .string()
  .optional()
  .describe('Jobcode type: regular, pto, paid_break, unpaid_break or all. Accounting words work too ("vacation", "lunch").');

export const pagingParams = {
  page: z.number().int().min(1).optional().describe('Page number (default: 1)'),
  limit: z.number().int().min(1).max(200).optional().describe('Results per page (max 200, default 50)'),
  auto_paginate: z.boolean().optional().describe('Fetch every page and return all records'),
};

export const rangeParams = {
  start_date: z.string().optional().describe('Start date: YYYY-MM-DD, 12/31/2024, "December 1, 2024" or a phrase like "last month"'),
  end_date: z.string().optional().describe('End date, in the same forms as start_date'),
  period: z.string().optional().describe('Whole period instead of start/end, e.g. "last month", "this quarter", "year to date"'),
};

/**
 * Interpret a jobcode type given in either vocabulary
 */
export function jobcodeType(ctx: ToolContext, term: string | undefined): JobcodeTypeFilter | undefined {
  if (term === undefined) return undefined;
  const type = ctx.vocabulary.toJobcodeType(term);
  if (!type) {
    throw new ValidationError(
      `"${term}" is not a jobcode type. Use regular, pto, paid_break, unpaid_break or all, or a word like "vacation" or "lunch".`
    );
  }
  return type;
}

/**
 * Turn natural-language date parameters into the API's start_date/end_date.
 * Either side may be left out.
 */
export function dateFilters(
  ctx: ToolContext,
  params: { start_date?: string; end_date?: string; period?: string }
): { start_date?: string; end_date?: string } {
  const anchor = today(ctx);
  if (params.period) {
    return ctx.dates.resolve(params.period, anchor);
  }
  const filters: { start_date?: string; end_date?: string } = {};
  if (params.start_date) filters.start_date = ctx.dates.resolve(params.start_date, anchor).start_date;
  if (params.end_date) filters.end_date = ctx.dates.resolve(params.end_date, anchor).end_date;
  if (filters.start_date && filters.end_date && filters.start_date > filters.end_date) {
    throw new ValidationError(`The start date ${filters.start_date} is after the end date ${filters.end_date}.`);
  }
  return filters;
}

/**
 * One page, or every page when asked
 */
export async function listing<T>(
  sequence: PagedSequence<T>,
  params: { page?: number; auto_paginate?: boolean }
): Promise<unknown> {
  if (params.auto_paginate) {
    return sequence.collect();
  }
  return sequence.page(params.page ?? 1);
}

export function found<T>(record: T | undefined, what: string, id: number): T {
  if (record === undefined) {
    throw new ValidationError(`No ${what} with ID ${id} was found.`);
  }
  return record;
}
