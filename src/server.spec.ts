import { loadConfig } from './config.js';
import { silentLogger } from './logger.js';
import { createMcpServer, createToolContext } from './server.js';
import { FakeTransport, listResponse, pagedHandler } from './testing/fake-transport.js';
import { makeUser, referenceData } from './testing/fixtures.js';

describe('createToolContext', () => {
  it('should apply the configuration to the services', async () => {
    const transport = new FakeTransport()
      .on('current_user', () => listResponse('users', [makeUser({ id: 5, first_name: 'Ada' })]))
      .on('jobcodes', pagedHandler('jobcodes', referenceData().jobcodes));
    const config = loadConfig({
      QB_TIME_ACCESS_TOKEN: 'test-secret',
      QB_TIME_PAGE_SIZE: '20',
      REPORT_TIMEZONE: 'America/Denver',
    });

    const ctx = createToolContext(config, silentLogger, transport);

    expect(ctx.timezone).toBe('America/Denver');
    await expect(ctx.client.getCurrentUser()).resolves.toMatchObject({ id: 5, first_name: 'Ada' });
    expect(transport.requestsTo('current_user')[0].query).toEqual({});

    await ctx.client.listJobcodes().toArray();
    expect(transport.requestsTo('jobcodes')[0].query).toEqual({ limit: '20', page: '1' });
  });

  it('should build a server with the tools registered', () => {
    const ctx = createToolContext(loadConfig({ QB_TIME_ACCESS_TOKEN: 'test-secret' }), silentLogger, new FakeTransport());

    expect(() => createMcpServer(ctx)).not.toThrow();
  });
});
