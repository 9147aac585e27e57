#!/usr/bin/env node
/**
 * QuickBooks Time Accounting MCP Server - Entry Point
 *
 * Serves the QuickBooks Time tools over stdio (the default) or Streamable
 * HTTP. The API access token comes from the environment.
 */

import express from 'express';
import type { Request, Response } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { randomUUID } from 'node:crypto';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';

import { loadConfig, type Config } from './config.js';
import { createLogger, type Logger } from './logger.js';
import { SERVER_NAME, SERVER_VERSION, createMcpServer, createToolContext } from './server.js';
import type { ToolContext } from './tools/index.js';

function sessionIdOf(req: Request): string | undefined {
  const header = req.headers['mcp-session-id'];
  return typeof header === 'string' ? header : undefined;
}

function jsonRpcError(res: Response, status: number, message: string): void {
  res.status(status).json({
    jsonrpc: '2.0',
    error: { code: -32000, message },
    id: null,
  });
}

async function startStdio(ctx: ToolContext, logger: Logger): Promise<void> {
  const server = createMcpServer(ctx);
  await server.connect(new StdioServerTransport());
  logger.info(`${SERVER_NAME} ${SERVER_VERSION} listening on stdio`);
}

function startHttp(config: Config, ctx: ToolContext, logger: Logger): void {
  // Track active transports by session ID
  const transports: Record<string, StreamableHTTPServerTransport> = {};

  const app = express();

  // ============================================
  // MIDDLEWARE SETUP
  // ============================================

  app.use(express.json());

  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      // Allow requests with no origin (like curl or same-origin)
      if (!origin) {
        callback(null, true);
        return;
      }
      if (config.security.allowedOrigins.includes(origin) || config.security.allowedOrigins.includes('*')) {
        callback(null, true);
      } else {
        callback(new Error('Not allowed by CORS'));
      }
    },
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'mcp-session-id', 'Authorization'],
    exposedHeaders: ['mcp-session-id'],
    maxAge: 86400, // Cache preflight for 24 hours
  };
  app.use(cors(corsOptions));

  const limiter = rateLimit({
    windowMs: config.rateLimit.windowMs,
    max: config.rateLimit.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Too many requests, please try again later' },
      id: null,
    },
    skip: (req) => req.path === '/health',
  });
  app.use(limiter);

  const httpLogger = logger.child('http');
  app.use((req, res, next) => {
    const start = Date.now();

    res.on('finish', () => {
      const message = `${req.method} ${req.path} ${res.statusCode} ${Date.now() - start}ms`;
      if (res.statusCode >= 400) {
        httpLogger.warn(message);
      } else {
        httpLogger.debug(message, req.ip);
      }
    });

    next();
  });

  /**
   * MCP Endpoint - POST /mcp
   * Handles JSON-RPC requests, notifications, and responses
   */
  app.post('/mcp', async (req, res) => {
    try {
      const sessionId = sessionIdOf(req);
      let transport = sessionId ? transports[sessionId] : undefined;

      if (!transport) {
        if (sessionId || !isInitializeRequest(req.body)) {
          jsonRpcError(res, 400, 'Invalid session or missing MCP-Session-Id header');
          return;
        }

        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (id) => {
            transports[id] = created;
            httpLogger.info(`Session initialized: ${id}`);
          },
        });
        created.onclose = () => {
          if (created.sessionId) {
            delete transports[created.sessionId];
            httpLogger.info(`Session closed: ${created.sessionId}`);
          }
        };

        await createMcpServer(ctx).connect(created);
        transport = created;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      httpLogger.error('Failed to handle MCP request', error);
      if (!res.headersSent) {
        jsonRpcError(res, 500, 'Internal server error');
      }
    }
  });

  /**
   * GET opens the SSE stream for server-initiated messages; DELETE ends the
   * session
   */
  const handleSessionRequest = async (req: Request, res: Response): Promise<void> => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? transports[sessionId] : undefined;

    if (!transport) {
      jsonRpcError(res, 400, 'Invalid session');
      return;
    }

    try {
      await transport.handleRequest(req, res);
    } catch (error) {
      httpLogger.error(`Failed to handle ${req.method} /mcp`, error);
      if (!res.headersSent) {
        jsonRpcError(res, 500, 'Internal server error');
      }
    }
  };
  app.get('/mcp', handleSessionRequest);
  app.delete('/mcp', handleSessionRequest);

  /**
   * Health check endpoint
   */
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: SERVER_VERSION,
      activeSessions: Object.keys(transports).length,
    });
  });

  const { port, host } = config.server;
  app.listen(port, host, () => {
    logger.info(`${SERVER_NAME} running at http://${host}:${port}`);
    logger.info(`MCP endpoint: http://${host}:${port}/mcp`);
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logging.level);
  const ctx = createToolContext(config, logger);

  if (config.server.transport === 'http') {
    startHttp(config, ctx, logger);
  } else {
    await startStdio(ctx, logger);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
