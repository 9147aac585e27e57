/**
 * Engine tools
 *
 * Date resolution, vocabulary translation, entity lookup, aggregation,
 * rates and schema documentation.
 */

import * as z from 'zod';
import { ReportAggregator, hourlyRateMap } from '../compute/index.js';
import type { AggregateRow, Dimension } from '../compute/types.js';
import { startOfIsoWeek } from '../dates/calendar.js';
import { EntityResolver, type EntityType } from '../entities/index.js';
import { ValidationError } from '../errors.js';
import type { Group, Jobcode, User } from '../qbtime/types.js';
import { getSchema } from '../schema/index.js';
import {
  dateFilters,
  defineTool,
  ids,
  jobcodeType,
  jobcodeTypeParam,
  rangeParams,
  today,
  type ToolContext,
  type ToolDefinition,
} from './shared.js';

const DIMENSIONS: Readonly<Record<string, Dimension>> = {
  employee: 'employee',
  user: 'employee',
  jobcode: 'jobcode',
  group: 'group',
};

const ENTITY_TYPES: readonly EntityType[] = ['jobcode', 'user', 'group'];

function dimensionOf(ctx: ToolContext, term: string): Dimension {
  const dimension = DIMENSIONS[term.trim().toLowerCase()] ?? DIMENSIONS[ctx.vocabulary.toServiceTerm(term)];
  if (!dimension) {
    throw new ValidationError(`Cannot total by "${term}". Use employee, jobcode or group (or client, project, department).`);
  }
  return dimension;
}

function entityTypeOf(ctx: ToolContext, term: string): EntityType {
  const candidate = ctx.vocabulary.toServiceTerm(term);
  const type = ENTITY_TYPES.find((entityType) => entityType === candidate);
  if (!type) {
    throw new ValidationError(`"${term}" is not something that can be looked up. Use jobcode, user or group (or client, employee, department).`);
  }
  return type;
}

export function engineTools(ctx: ToolContext): ToolDefinition[] {
  const { client } = ctx;

  return [
    defineTool({
      name: 'resolve_date_range',
      description:
        'Turn a date expression ("last month", "Q3 2024", "year to date", "12/31/2024") into an inclusive start_date and end_date',
      schema: {
        expression: z.string().describe('Date expression'),
        anchor_date: z.string().optional().describe('Resolve relative to this date (YYYY-MM-DD, default: today)'),
      },
      run: ({ expression, anchor_date }) => {
        const anchor = anchor_date ? ctx.dates.resolve(anchor_date, today(ctx)).start_date : today(ctx);
        return { expression, anchor_date: anchor, ...ctx.dates.resolve(expression, anchor) };
      },
    }),

    defineTool({
      name: 'translate_terms',
      description:
        'Translate between accounting words ("employee", "vacation", "time card") and QuickBooks Time terms ("user", "pto", "timesheet")',
      schema: {
        terms: z.array(z.string()).optional().describe('Single terms to translate'),
        text: z.string().optional().describe('Free text in which every known phrase is translated'),
        direction: z
          .enum(['to_service', 'to_accounting'])
          .optional()
          .describe('to_service (default): accounting → QuickBooks Time; to_accounting: the reverse'),
      },
      run: ({ terms, text, direction }) => {
        if (!terms && text === undefined) {
          throw new ValidationError('Provide terms or text to translate.');
        }
        const translate = (term: string) =>
          direction === 'to_accounting' ? ctx.vocabulary.toAccountingTerm(term) : ctx.vocabulary.toServiceTerm(term);
        return {
          direction: direction ?? 'to_service',
          ...(terms ? { translations: Object.fromEntries(terms.map((term) => [term, translate(term)])) } : {}),
          // Free text is only translated toward the service vocabulary
          ...(text !== undefined ? { text: ctx.vocabulary.translateText(text) } : {}),
        };
      },
    }),

    defineTool({
      name: 'resolve_entities',
      description:
        'Find jobcodes (clients, projects, tasks), employees and departments by approximate name. Returns IDs with confidence scores.',
      schema: {
        query: z.string().describe('Name or partial name to look for'),
        types: z
          .array(z.string())
          .optional()
          .describe('Entity types: jobcode, user, group, or client, project, employee, department (default: all)'),
        min_confidence: z.number().min(0).max(1).optional().describe('Minimum confidence 0-1 (default: 0.5)'),
        limit: z.number().int().min(1).max(20).optional().describe('Maximum results per type (default: 5)'),
        include_inactive: z.boolean().optional().describe('Also match inactive records'),
      },
      run: async ({ query, types, min_confidence, limit, include_inactive }, signal) => {
        const searchTypes = types ? [...new Set(types.map((type) => entityTypeOf(ctx, type)))] : [...ENTITY_TYPES];
        const active = include_inactive ? 'both' : 'yes';
        const none = Promise.resolve([]);

        const [jobcodes, users, groups] = await Promise.all([
          searchTypes.includes('jobcode')
            ? client.listJobcodes({ active: 'both', type: 'all' }, { signal }).toArray()
            : none,
          searchTypes.includes('user') ? client.listUsers({ active }, { signal }).toArray() : none,
          searchTypes.includes('group') ? client.listGroups({ active }, { signal }).toArray() : none,
        ]);

        return new EntityResolver({ jobcodes, users, groups }).resolve({
          query,
          types: searchTypes,
          min_confidence,
          limit,
          active_only: !include_inactive,
        });
      },
    }),

    defineTool({
      name: 'aggregate_time',
      description:
        'Total tracked time into regular, overtime (over 40h per ISO week), double-time and PTO seconds by employee, jobcode or group, optionally with labor costs',
      schema: {
        ...rangeParams,
        dimension: z.string().describe('employee, jobcode or group (client, project and department work too)'),
        user_ids: ids('user'),
        group_ids: ids('group'),
        jobcode_ids: ids('jobcode'),
        jobcode_type: jobcodeTypeParam,
        include_zero_time: z.boolean().optional().describe('List every employee, jobcode or group, even without time'),
        include_costs: z.boolean().optional().describe('Add labor costs from hourly rates'),
      },
      run: async (params, signal) => {
        const dimension = dimensionOf(ctx, params.dimension);
        const type = jobcodeType(ctx, params.jobcode_type);
        const range = dateFilters(ctx, params);
        if (!range.start_date || !range.end_date) {
          throw new ValidationError('Provide a period (like "last month") or both a start date and an end date.');
        }
        const date_range = { start_date: range.start_date, end_date: range.end_date };

        const noGroups: Promise<Group[]> = Promise.resolve([]);
        // Whole weeks on every jobcode: overtime depends on all of an employee's hours in a week
        const [users, jobcodes, groups, weekTimesheets] = await Promise.all([
          client.listUsers({ active: 'both' }, { signal }).toArray(),
          client.listJobcodes({ active: 'both', type: 'all' }, { signal }).toArray(),
          dimension === 'group' ? client.listGroups({ active: 'both' }, { signal }).toArray() : noGroups,
          client
            .listTimesheets(
              {
                start_date: startOfIsoWeek(date_range.start_date),
                end_date: date_range.end_date,
                user_ids: params.user_ids,
                group_ids: params.group_ids,
                on_the_clock: 'both',
              },
              { signal }
            )
            .toArray(),
        ]);

        const aggregator = new ReportAggregator({ users, jobcodes, groups, weekEntries: weekTimesheets });
        const jobcodeIds = params.jobcode_ids
          ? new Set(params.jobcode_ids.flatMap((id) => aggregator.tree.descendants(id)))
          : undefined;
        const timesheets = weekTimesheets.filter(
          (entry) =>
            entry.date >= date_range.start_date &&
            entry.date <= date_range.end_date &&
            (!jobcodeIds || jobcodeIds.has(entry.jobcode_id))
        );
        const classified = aggregator
          .classify(timesheets)
          .filter((item) => !type || aggregator.tree.matchesType(item.entry.jobcode_id, type));

        const hourlyRates = params.include_costs
          ? hourlyRateMap(aggregator, timesheets, await ctx.rates.load(users, jobcodes))
          : undefined;
        const totals = aggregator.aggregateClassified(classified, dimension, {
          hourlyRates,
          includeZeroTime: params.include_zero_time,
        });

        const nameOf = (key: string): string => {
          const id = Number(key);
          if (dimension === 'employee') return aggregator.userName(id);
          if (dimension === 'group') return aggregator.groupName(id);
          return aggregator.tree.path(id);
        };

        const rows: Record<string, AggregateRow & { name: string }> = {};
        for (const [key, row] of Object.entries(totals)) {
          rows[key] = { name: nameOf(key), ...row };
        }
        return { date_range, dimension, rows };
      },
    }),

    defineTool({
      name: 'get_rates',
      description:
        "Hourly pay rates per employee and billable rates per jobcode, with where each came from (QuickBooks Time, rates.json or DEFAULT_HOURLY_RATE)",
      schema: {
        user_ids: ids('user'),
        jobcode_ids: ids('jobcode'),
        include_inactive: z.boolean().optional().describe('Include inactive employees and jobcodes'),
      },
      run: async ({ user_ids, jobcode_ids, include_inactive }, signal) => {
        const active = include_inactive ? 'both' : 'yes';
        const [users, jobcodes]: [User[], Jobcode[]] = await Promise.all([
          client.listUsers({ ids: user_ids, active }, { signal }).toArray(),
          client.listJobcodes({ ids: jobcode_ids, active, type: 'all' }, { signal }).toArray(),
        ]);
        const book = await ctx.rates.load(users, jobcodes);
        if (book.warnings.length > 0) {
          ctx.logger.warn('Rate resolution warnings:', book.warnings);
        }
        return book.toResponse();
      },
    }),

    defineTool({
      name: 'get_schema',
      description:
        'Field types, enum values and descriptions for QuickBooks Time records and the report shapes. Needs no API access.',
      schema: {
        category: z.string().optional().describe('time_tracking, people, jobcodes, reports or resolution'),
        entity: z.string().optional().describe('Entity name, e.g. Timesheet or Jobcode'),
        enum: z.string().optional().describe('Enum name, e.g. jobcode_type'),
      },
      run: (params) => getSchema(params),
    }),
  ];
}
