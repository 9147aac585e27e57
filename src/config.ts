/**
 * Configuration management for the QuickBooks Time accounting MCP server
 */

import 'dotenv/config';
import type { LogLevel } from './logger.js';

export interface Config {
  server: {
    transport: 'stdio' | 'http';
    port: number;
    host: string;
    nodeEnv: 'development' | 'production' | 'test';
  };
  qbtime: {
    accessToken: string;
    apiBaseUrl: string;
    userAgent: string;
  };
  security: {
    allowedOrigins: string[];
  };
  rateLimit: {
    windowMs: number;
    maxRequests: number;
  };
  upstream: {
    requestsPerSecond: number;
    requestsPerMinute: number;
    pageSize: number;
    maxRetries: number;
    retryBaseMs: number;
    retryMaxMs: number;
    retryJitterMs: number;
  };
  reporting: {
    timezone: string;
    fiscalYearStartMonth?: number;
    workflowTimeoutMs: number;
  };
  rates: {
    configDir: string;
    defaultHourlyRate?: number;
  };
  logging: {
    level: LogLevel;
  };
}

type Env = Record<string, string | undefined>;

function getEnvOrThrow(env: Env, key: string): string {
  const value = env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvOrDefault(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

function getEnvInt(env: Env, key: string, defaultValue: number): number {
  const raw = env[key];
  if (!raw) return defaultValue;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`Environment variable ${key} must be a whole number, got "${raw}"`);
  }
  return value;
}

function getEnvOneOf<T extends string>(env: Env, key: string, allowed: readonly T[], defaultValue: T): T {
  const raw = getEnvOrDefault(env, key, defaultValue);
  const match = allowed.find((value) => value === raw);
  if (!match) {
    throw new Error(`Environment variable ${key} must be one of ${allowed.join(', ')}, got "${raw}"`);
  }
  return match;
}

function getOptionalNumber(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (!raw) return undefined;
  const value = parseFloat(raw);
  if (Number.isNaN(value)) {
    throw new Error(`Environment variable ${key} must be a number, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): Config {
  const fiscalYearStartMonth = getOptionalNumber(env, 'FISCAL_YEAR_START_MONTH');
  if (fiscalYearStartMonth !== undefined && (!Number.isInteger(fiscalYearStartMonth) || fiscalYearStartMonth < 1 || fiscalYearStartMonth > 12)) {
    throw new Error('FISCAL_YEAR_START_MONTH must be a month number between 1 and 12');
  }

  return {
    server: {
      transport: getEnvOneOf(env, 'MCP_TRANSPORT', ['stdio', 'http'] as const, 'stdio'),
      port: getEnvInt(env, 'PORT', 3000),
      host: getEnvOrDefault(env, 'HOST', 'localhost'),
      nodeEnv: getEnvOneOf(env, 'NODE_ENV', ['development', 'production', 'test'] as const, 'development'),
    },
    qbtime: {
      accessToken: getEnvOrThrow(env, 'QB_TIME_ACCESS_TOKEN'),
      apiBaseUrl: getEnvOrDefault(env, 'QB_TIME_API_BASE_URL', 'https://rest.tsheets.com/api/v1'),
      userAgent: 'QbTimeAccountingMCP/0.1.0',
    },
    security: {
      allowedOrigins: getEnvOrDefault(env, 'ALLOWED_ORIGINS', 'http://localhost:3000').split(','),
    },
    rateLimit: {
      windowMs: getEnvInt(env, 'RATE_LIMIT_WINDOW_MS', 900000), // 15 minutes
      maxRequests: getEnvInt(env, 'RATE_LIMIT_MAX', 1000),
    },
    upstream: {
      requestsPerSecond: getEnvInt(env, 'QB_TIME_REQUESTS_PER_SECOND', 3),
      requestsPerMinute: getEnvInt(env, 'QB_TIME_REQUESTS_PER_MINUTE', 300),
      pageSize: Math.min(getEnvInt(env, 'QB_TIME_PAGE_SIZE', 50), 200),
      maxRetries: getEnvInt(env, 'QB_TIME_MAX_RETRIES', 4),
      retryBaseMs: getEnvInt(env, 'QB_TIME_RETRY_BASE_MS', 500),
      retryMaxMs: getEnvInt(env, 'QB_TIME_RETRY_MAX_MS', 8000),
      retryJitterMs: getEnvInt(env, 'QB_TIME_RETRY_JITTER_MS', 250),
    },
    reporting: {
      timezone: getEnvOrDefault(env, 'REPORT_TIMEZONE', 'UTC'),
      fiscalYearStartMonth,
      workflowTimeoutMs: getEnvInt(env, 'WORKFLOW_TIMEOUT_MS', 120000),
    },
    rates: {
      configDir: getEnvOrDefault(env, 'RATES_CONFIG_DIR', process.cwd()),
      defaultHourlyRate: getOptionalNumber(env, 'DEFAULT_HOURLY_RATE'),
    },
    logging: {
      level: getEnvOneOf(env, 'LOG_LEVEL', ['debug', 'info', 'warn', 'error'] as const, 'info'),
    },
  };
}
