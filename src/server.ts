/**
 * Wiring: one set of services per process, one MCP server per connection
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Config } from './config.js';
import { DateRangeResolver } from './dates/index.js';
import type { Logger } from './logger.js';
import { FetchTransport, QbTimeClient, RateLimitedFetcher, TokenBucket, type HttpTransport } from './qbtime/index.js';
import { RatesService } from './rates/index.js';
import { registerTools, type ToolContext } from './tools/index.js';
import { VocabularyMapper } from './vocabulary/index.js';
import { WorkflowOrchestrator } from './workflows/index.js';

export const SERVER_NAME = 'qbtime-accounting-mcp';
export const SERVER_VERSION = '0.1.0';

/**
 * Build the tool context. The token bucket created here is shared by every
 * request this process makes.
 */
export function createToolContext(config: Config, logger: Logger, transport?: HttpTransport): ToolContext {
  const fetcher = new RateLimitedFetcher({
    transport:
      transport ??
      new FetchTransport({
        baseUrl: config.qbtime.apiBaseUrl,
        accessToken: config.qbtime.accessToken,
        userAgent: config.qbtime.userAgent,
      }),
    bucket: new TokenBucket({
      requestsPerSecond: config.upstream.requestsPerSecond,
      requestsPerMinute: config.upstream.requestsPerMinute,
    }),
    logger: logger.child('fetcher'),
    pageSize: config.upstream.pageSize,
    retry: {
      maxRetries: config.upstream.maxRetries,
      baseDelayMs: config.upstream.retryBaseMs,
      maxDelayMs: config.upstream.retryMaxMs,
      jitterMs: config.upstream.retryJitterMs,
    },
  });

  const client = new QbTimeClient(fetcher);
  const dates = new DateRangeResolver({ fiscalYearStartMonth: config.reporting.fiscalYearStartMonth });
  const rates = new RatesService({
    configDir: config.rates.configDir,
    defaultHourlyRate: config.rates.defaultHourlyRate,
    logger: logger.child('rates'),
  });

  return {
    client,
    dates,
    rates,
    vocabulary: new VocabularyMapper(),
    orchestrator: new WorkflowOrchestrator({
      services: { client, dates, rates },
      timezone: config.reporting.timezone,
      timeoutMs: config.reporting.workflowTimeoutMs,
      logger: logger.child('workflow'),
    }),
    timezone: config.reporting.timezone,
    logger: logger.child('tools'),
  };
}

export function createMcpServer(ctx: ToolContext): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerTools(server, ctx);

  return server;
}
