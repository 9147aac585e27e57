import { CancelledError, ValidationError } from '../errors.js';
import { fakeServices } from '../testing/services.js';
import { WorkflowOrchestrator, fetchStep } from './orchestrator.js';
import type { WorkflowDefinition, WorkflowStep } from './types.js';

interface Data {
  numbers: number[];
  words: string[];
  total: number;
}

const numbersStep = fetchStep<unknown, Data, 'numbers'>({ key: 'numbers', run: () => [1, 2, 3] });

function definition(name: string, steps: Array<WorkflowStep<unknown, Data>>): WorkflowDefinition<unknown, Data> {
  return {
    name,
    description: 'test workflow',
    resolveRange: (_params, { anchor }) => ({ start_date: anchor, end_date: anchor }),
    steps,
  };
}

describe('WorkflowOrchestrator', () => {
  let orchestrator: WorkflowOrchestrator;

  beforeEach(() => {
    orchestrator = new WorkflowOrchestrator({
      services: fakeServices(),
      timezone: 'UTC',
      now: () => new Date('2024-12-31T12:00:00Z'),
    });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should keep the other reports when one of three fails', async () => {
    const result = await orchestrator.run(
      definition('three_reports', [
        numbersStep,
        { kind: 'report', key: 'first', requires: ['numbers'], build: ({ get }) => get('numbers').length },
        {
          kind: 'report',
          key: 'second',
          requires: ['numbers'],
          build: () => {
            throw new Error('boom');
          },
        },
        {
          kind: 'report',
          key: 'third',
          requires: ['numbers'],
          build: ({ get }) => get('numbers').reduce((sum, n) => sum + n, 0),
        },
      ]),
      {}
    );

    expect(result).toEqual({
      name: 'three_reports',
      status: 'PartiallyFailed',
      date_range: { start_date: '2024-12-31', end_date: '2024-12-31' },
      reports: { first: 3, third: 6 },
      errors: [
        {
          source: 'second',
          code: 'INTERNAL_ERROR',
          message: 'Something went wrong while preparing this information: boom',
        },
      ],
    });
  });

  it('should finish as Done when every step succeeds', async () => {
    const result = await orchestrator.run(
      definition('all_good', [
        numbersStep,
        fetchStep<unknown, Data, 'total'>({
          key: 'total',
          requires: ['numbers'],
          run: ({ get }) => get('numbers').reduce((sum, n) => sum + n, 0),
        }),
        { kind: 'report', key: 'summary', requires: ['total'], build: ({ get }) => ({ total: get('total') }) },
      ]),
      {}
    );

    expect(result.status).toBe('Done');
    expect(result.errors).toEqual([]);
    expect(result.reports).toEqual({ summary: { total: 6 } });
  });

  it('should fail the whole run when a mandatory step fails', async () => {
    const run = orchestrator.run(
      definition('mandatory', [
        fetchStep<unknown, Data, 'numbers'>({
          key: 'numbers',
          mandatory: true,
          run: () => {
            throw new ValidationError('No numbers today.');
          },
        }),
        { kind: 'report', key: 'first', requires: ['numbers'], build: ({ get }) => get('numbers').length },
      ]),
      {}
    );

    await expect(run).rejects.toThrow(ValidationError);
    await expect(run).rejects.toThrow('No numbers today.');
  });

  it('should fail the run when a mandatory step depends on a failed one', async () => {
    const run = orchestrator.run(
      definition('stranded', [
        fetchStep<unknown, Data, 'words'>({
          key: 'words',
          run: () => Promise.reject(new ValidationError('No words today.')),
        }),
        fetchStep<unknown, Data, 'total'>({
          key: 'total',
          requires: ['words'],
          mandatory: true,
          run: ({ get }) => get('words').length,
        }),
      ]),
      {}
    );

    await expect(run).rejects.toThrow('No words today.');
  });

  it('should skip everything downstream of a failed step', async () => {
    const result = await orchestrator.run(
      definition('downstream', [
        numbersStep,
        fetchStep<unknown, Data, 'words'>({
          key: 'words',
          run: () => Promise.reject(new ValidationError('The word list is unavailable.')),
        }),
        fetchStep<unknown, Data, 'total'>({
          key: 'total',
          requires: ['words'],
          run: ({ get }) => get('words').length,
        }),
        { kind: 'report', key: 'count', requires: ['total'], build: ({ get }) => get('total') },
        { kind: 'report', key: 'numbers_count', requires: ['numbers'], build: ({ get }) => get('numbers').length },
      ]),
      {}
    );

    expect(result.status).toBe('PartiallyFailed');
    expect(result.reports).toEqual({ numbers_count: 3 });
    expect(result.errors).toEqual([
      { source: 'words', code: 'VALIDATION_ERROR', message: 'The word list is unavailable.' },
      { source: 'total', code: 'SKIPPED', message: 'Skipped because words could not be loaded.' },
      { source: 'count', code: 'SKIPPED', message: 'Skipped because total could not be loaded.' },
    ]);
  });

  it('should wait for an after step but carry on without it', async () => {
    const result = await orchestrator.run(
      definition('after', [
        fetchStep<unknown, Data, 'words'>({
          key: 'words',
          run: () => Promise.reject(new ValidationError('The word list is unavailable.')),
        }),
        fetchStep<unknown, Data, 'total'>({
          key: 'total',
          after: ['words'],
          run: ({ find }) => find('words')?.length ?? -1,
        }),
        { kind: 'report', key: 'total', requires: ['total'], build: ({ get }) => get('total') },
      ]),
      {}
    );

    expect(result.reports).toEqual({ total: -1 });
    expect(result.errors.map((error) => error.source)).toEqual(['words']);
  });

  it('should not wait on an after step the workflow does not have', async () => {
    const result = await orchestrator.run(
      definition('no_words', [
        fetchStep<unknown, Data, 'total'>({ key: 'total', after: ['words'], run: () => 7 }),
        { kind: 'report', key: 'total', requires: ['total'], build: ({ get }) => get('total') },
      ]),
      {}
    );

    expect(result.status).toBe('Done');
    expect(result.reports).toEqual({ total: 7 });
  });

  it('should run independent steps in the same wave', async () => {
    const started: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const run = orchestrator.run(
      definition('wave', [
        fetchStep<unknown, Data, 'numbers'>({
          key: 'numbers',
          run: async () => {
            started.push('numbers');
            await gate;
            return [1];
          },
        }),
        fetchStep<unknown, Data, 'words'>({
          key: 'words',
          run: async () => {
            started.push('words');
            await gate;
            return ['a'];
          },
        }),
      ]),
      {}
    );

    await Promise.resolve();
    expect(started).toEqual(['numbers', 'words']);
    release();
    await expect(run).resolves.toMatchObject({ status: 'Done' });
  });

  it('should refuse to start when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(orchestrator.run(definition('cancelled', [numbersStep]), {}, { signal: controller.signal })).rejects.toThrow(
      CancelledError
    );
  });

  it('should discard partial results when cancelled mid-run', async () => {
    const controller = new AbortController();
    let built = false;

    const run = orchestrator.run(
      definition('mid_run', [
        fetchStep<unknown, Data, 'numbers'>({
          key: 'numbers',
          run: ({ signal }) => {
            controller.abort();
            expect(signal.aborted).toBe(true);
            return [1, 2];
          },
        }),
        {
          kind: 'report',
          key: 'first',
          requires: ['numbers'],
          build: () => {
            built = true;
            return 1;
          },
        },
      ]),
      {},
      { signal: controller.signal }
    );

    await expect(run).rejects.toThrow(CancelledError);
    expect(built).toBe(false);
  });

  it('should time out a slow run', async () => {
    jest.useFakeTimers();

    const run = orchestrator.run(
      definition('slow', [
        fetchStep<unknown, Data, 'numbers'>({
          key: 'numbers',
          run: ({ signal }) =>
            new Promise<number[]>((_resolve, reject) => {
              signal.addEventListener('abort', () => reject(new CancelledError()));
            }),
        }),
      ]),
      {},
      { timeoutMs: 2000 }
    );
    jest.advanceTimersByTime(2000);

    await expect(run).rejects.toThrow('The slow workflow did not finish within 2 seconds.');
  });

  it('should fail on an unresolvable range before fetching anything', async () => {
    let fetched = false;
    const run = orchestrator.run(
      {
        ...definition('bad_range', [
          fetchStep<unknown, Data, 'numbers'>({
            key: 'numbers',
            run: () => {
              fetched = true;
              return [];
            },
          }),
        ]),
        resolveRange: () => {
          throw new ValidationError('Bad range.');
        },
      },
      {}
    );

    await expect(run).rejects.toThrow('Bad range.');
    expect(fetched).toBe(false);
  });
});
