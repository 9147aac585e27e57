import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FakeTransport, listResponse, matchesIdFilter, pagedHandler } from '../testing/fake-transport.js';
import { makeTimesheet, makeUser, overtimeWeek, referenceData } from '../testing/fixtures.js';
import { fakeToolContext } from '../testing/services.js';
import { engineTools } from './engine-tools.js';
import type { ToolDefinition } from './shared.js';

describe('engine tools', () => {
  const reference = referenceData();
  const users = [
    makeUser({ id: 1, first_name: 'Ada', last_name: 'Lovelace', group_id: 7, pay_rate: 20, pay_interval: 'hour' }),
    ...reference.users.slice(1),
  ];

  let ratesDir: string;
  let transport: FakeTransport;
  let tools: ToolDefinition[];

  function tool(name: string): ToolDefinition {
    const match = tools.find((candidate) => candidate.name === name);
    if (!match) throw new Error(`No tool named ${name}`);
    return match;
  }

  beforeEach(async () => {
    ratesDir = await mkdtemp(join(tmpdir(), 'engine-rates-'));
    transport = new FakeTransport()
      .on('users', pagedHandler('users', users))
      .on('jobcodes', pagedHandler('jobcodes', reference.jobcodes))
      .on('groups', pagedHandler('groups', reference.groups));
    tools = engineTools(fakeToolContext(transport, new Date('2025-01-15T12:00:00Z'), ratesDir));
  });

  afterEach(async () => {
    await rm(ratesDir, { recursive: true, force: true });
  });

  describe('resolve_date_range', () => {
    it('should resolve against the given anchor', async () => {
      await expect(tool('resolve_date_range').call({ expression: 'last week', anchor_date: '2024-12-31' })).resolves.toEqual({
        expression: 'last week',
        anchor_date: '2024-12-31',
        start_date: '2024-12-23',
        end_date: '2024-12-29',
      });
    });

    it('should default the anchor to today', async () => {
      await expect(tool('resolve_date_range').call({ expression: 'last month' })).resolves.toMatchObject({
        anchor_date: '2025-01-15',
        start_date: '2024-12-01',
        end_date: '2024-12-31',
      });
    });

    it('should reject an expression it cannot read', async () => {
      await expect(tool('resolve_date_range').call({ expression: 'whenever' })).rejects.toMatchObject({
        code: 'UNPARSEABLE_DATE',
      });
    });
  });

  describe('translate_terms', () => {
    it('should translate accounting words and leave unknown ones alone', async () => {
      await expect(tool('translate_terms').call({ terms: ['employee', 'Vacation', 'widget'] })).resolves.toEqual({
        direction: 'to_service',
        translations: { employee: 'user', Vacation: 'pto', widget: 'widget' },
      });
    });

    it('should translate back to accounting words', async () => {
      await expect(
        tool('translate_terms').call({ terms: ['user', 'timesheet'], direction: 'to_accounting' })
      ).resolves.toEqual({
        direction: 'to_accounting',
        translations: { user: 'employee', timesheet: 'time card' },
      });
    });

    it('should translate phrases inside text', async () => {
      await expect(tool('translate_terms').call({ text: 'vacation hours for each employee' })).resolves.toEqual({
        direction: 'to_service',
        text: 'pto hours for each user',
      });
    });

    it('should need terms or text', async () => {
      await expect(tool('translate_terms').call({})).rejects.toThrow('Provide terms or text to translate.');
    });
  });

  describe('resolve_entities', () => {
    it('should fetch only the catalogs the requested types need', async () => {
      const result = await tool('resolve_entities').call({ query: 'acme', types: ['client'], min_confidence: 0.9 });

      expect(result).toMatchObject({
        query: 'acme',
        search_types: ['jobcode'],
        results: [{ type: 'jobcode', id: 10, name: 'Acme', confidence: 1, match_type: 'exact', depth: 0 }],
      });
      expect(transport.requestsTo('users')).toHaveLength(0);
      expect(transport.requestsTo('groups')).toHaveLength(0);
    });

    it('should find employees by approximate name', async () => {
      const result = await tool('resolve_entities').call({ query: 'ada lovelace', types: ['employee'], min_confidence: 0.9 });

      expect(result).toMatchObject({ results: [{ type: 'user', id: 1, name: 'Ada Lovelace', match_type: 'exact' }] });
    });

    it('should reject a type that cannot be looked up', async () => {
      await expect(tool('resolve_entities').call({ query: 'acme', types: ['invoice'] })).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
      });
    });
  });

  describe('aggregate_time', () => {
    beforeEach(() => {
      transport.on('timesheets', pagedHandler('timesheets', [...overtimeWeek(), makeTimesheet(6, 1, 21, '2024-12-09', 8)]));
    });

    it('should total by department with overtime split out', async () => {
      const result = await tool('aggregate_time').call({ period: 'last month', dimension: 'department' });

      expect(result).toEqual({
        date_range: { start_date: '2024-12-01', end_date: '2024-12-31' },
        dimension: 'group',
        rows: {
          '7': {
            name: 'Engineering',
            regular_seconds: 144000,
            overtime_seconds: 18000,
            doubletime_seconds: 0,
            pto_seconds: 28800,
            entry_count: 6,
          },
        },
      });
      expect(transport.requestsTo('timesheets')[0].query).toMatchObject({
        start_date: '2024-11-25',
        end_date: '2024-12-31',
        on_the_clock: 'both',
      });
    });

    it('should count the earlier days of the first week toward overtime', async () => {
      const result = await tool('aggregate_time').call({
        start_date: '2024-12-05',
        end_date: '2024-12-06',
        dimension: 'employee',
      });

      expect(result).toMatchObject({
        rows: { '1': { regular_seconds: 46800, overtime_seconds: 18000, entry_count: 2 } },
      });
      expect(transport.requestsTo('timesheets')[0].query.start_date).toBe('2024-12-02');
    });

    it('should keep only the requested jobcode type', async () => {
      const result = await tool('aggregate_time').call({
        period: 'last month',
        dimension: 'project',
        jobcode_type: 'vacation',
      });

      expect(result).toMatchObject({
        dimension: 'jobcode',
        rows: { '21': { name: 'Time Off › Vacation', pto_seconds: 28800, entry_count: 1 } },
      });
    });

    it('should add labor costs from the hourly rates', async () => {
      const result = await tool('aggregate_time').call({
        start_date: '2024-12-02',
        end_date: '2024-12-06',
        dimension: 'employee',
        include_costs: true,
      });

      expect(result).toMatchObject({
        rows: { '1': { name: 'Ada Lovelace', regular_cost: 800, overtime_cost: 150, total_cost: 950 } },
      });
      expect(transport.requestsTo('groups')).toHaveLength(0);
    });

    it('should reject an unknown dimension', async () => {
      await expect(tool('aggregate_time').call({ period: 'last month', dimension: 'colour' })).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
      });
    });

    it('should need a whole range', async () => {
      await expect(tool('aggregate_time').call({ start_date: '2024-12-01', dimension: 'employee' })).rejects.toThrow(
        'Provide a period (like "last month") or both a start date and an end date.'
      );
    });
  });

  describe('get_rates', () => {
    it('should say where each rate came from', async () => {
      transport.on('users', (request) =>
        listResponse('users', users.filter((user) => matchesIdFilter(user.id, request.query.ids)))
      );

      const result = await tool('get_rates').call({ user_ids: [1] });

      expect(result).toMatchObject({
        users: [
          {
            user_id: 1,
            user_name: 'Ada Lovelace',
            hourly_rate: { rate: 20, source: 'qbtime_api', source_detail: 'user.pay_rate' },
          },
        ],
        config_loaded: false,
      });
    });
  });

  describe('get_schema', () => {
    it('should describe an enum', async () => {
      const result = await tool('get_schema').call({ enum: 'workflow_status' });

      expect(result).toMatchObject({
        enum: { name: 'workflow_status', values: [{ value: 'Done' }, { value: 'PartiallyFailed' }] },
      });
    });
  });
});
