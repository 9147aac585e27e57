/**
 * Error taxonomy for the accounting engine
 *
 * Every error carries a machine-readable `code` and a plain-language message
 * that can be shown to the person asking for the report.
 */

export type ErrorCode =
  | 'UNPARSEABLE_DATE'
  | 'AMBIGUOUS_DATE'
  | 'MISSING_REQUIRED_FILTER'
  | 'VALIDATION_ERROR'
  | 'AUTH_ERROR'
  | 'RATE_LIMIT_EXCEEDED'
  | 'SERVER_ERROR'
  | 'CLIENT_REQUEST_ERROR'
  | 'CANCELLED'
  | 'INTERNAL_ERROR';

export class AccountingError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'AccountingError';
  }
}

export class UnparseableDateError extends AccountingError {
  constructor(public readonly expression: string) {
    super(
      'UNPARSEABLE_DATE',
      `"${expression}" is not a date I understand. Try a date like 12/31/2024, "December 31, 2024", or a phrase like "last month".`
    );
    this.name = 'UnparseableDateError';
  }
}

export class AmbiguousDateError extends AccountingError {
  constructor(
    public readonly expression: string,
    detail: string
  ) {
    super('AMBIGUOUS_DATE', `"${expression}" could mean more than one period: ${detail}`);
    this.name = 'AmbiguousDateError';
  }
}

export class MissingRequiredFilterError extends AccountingError {
  constructor(
    public readonly endpoint: string,
    public readonly anyOf: readonly string[]
  ) {
    super(
      'MISSING_REQUIRED_FILTER',
      anyOf.length === 1
        ? `This report needs ${anyOf[0]} to be provided.`
        : `This report needs at least one of: ${anyOf.join(', ')}.`
    );
    this.name = 'MissingRequiredFilterError';
  }
}

export class ValidationError extends AccountingError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
  }
}

export class CancelledError extends AccountingError {
  constructor(message = 'The request was cancelled before it finished.') {
    super('CANCELLED', message);
    this.name = 'CancelledError';
  }
}

export interface RequestContext {
  endpoint: string;
  page?: number;
  filters?: Record<string, unknown>;
}

/**
 * Failure reported by (or while talking to) the QuickBooks Time API
 */
export class UpstreamApiError extends AccountingError {
  public readonly endpoint: string;
  public readonly page?: number;
  public readonly filters?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    public readonly statusCode: number,
    context: RequestContext,
    public readonly errorBody?: string
  ) {
    super(code, message);
    this.name = 'UpstreamApiError';
    this.endpoint = context.endpoint;
    this.page = context.page;
    this.filters = context.filters;
  }
}

export class AuthError extends UpstreamApiError {
  constructor(statusCode: number, context: RequestContext, errorBody?: string) {
    super(
      'AUTH_ERROR',
      statusCode === 401
        ? 'Your QuickBooks Time connection has expired or the access token is invalid. Please reconnect your account.'
        : "You don't have permission to access this information. Please contact your QuickBooks Time administrator.",
      statusCode,
      context,
      errorBody
    );
    this.name = 'AuthError';
  }
}

export class RateLimitExceededError extends UpstreamApiError {
  constructor(context: RequestContext, attempts: number) {
    super(
      'RATE_LIMIT_EXCEEDED',
      `QuickBooks Time is receiving too many requests and still refused after ${attempts} attempts. Please wait a moment and try again.`,
      429,
      context
    );
    this.name = 'RateLimitExceededError';
  }
}

export class ServerError extends UpstreamApiError {
  constructor(statusCode: number, context: RequestContext, attempts: number, errorBody?: string) {
    super(
      'SERVER_ERROR',
      statusCode === 0
        ? `QuickBooks Time did not respond after ${attempts} attempts. Please try again later.`
        : `QuickBooks Time had a problem answering (status ${statusCode}) after ${attempts} attempts. Please try again later.`,
      statusCode,
      context,
      errorBody
    );
    this.name = 'ServerError';
  }
}

export class ClientRequestError extends UpstreamApiError {
  constructor(statusCode: number, context: RequestContext, upstreamMessage?: string, errorBody?: string) {
    const where = context.page !== undefined ? ` (page ${context.page})` : '';
    const filters = context.filters && Object.keys(context.filters).length > 0
      ? ` Filters used: ${JSON.stringify(context.filters)}.`
      : '';
    super(
      'CLIENT_REQUEST_ERROR',
      statusCode === 404
        ? `The requested information was not found at ${context.endpoint}${where}.${filters}`
        : `QuickBooks Time rejected the request to ${context.endpoint}${where}: ${upstreamMessage ?? `status ${statusCode}`}.${filters}`,
      statusCode,
      context,
      errorBody
    );
    this.name = 'ClientRequestError';
  }
}

/**
 * The API answered 2xx but the body is not what the endpoint promises
 */
export class MalformedResponseError extends UpstreamApiError {
  constructor(statusCode: number, context: RequestContext, detail: string) {
    super(
      'SERVER_ERROR',
      `QuickBooks Time sent data for ${context.endpoint} in an unexpected format (${detail}).`,
      statusCode,
      context
    );
    this.name = 'MalformedResponseError';
  }
}

export interface ToolError {
  code: ErrorCode;
  message: string;
}

/**
 * Convert any thrown value into the structured error returned to tool callers
 */
export function toToolError(error: unknown): ToolError {
  if (error instanceof AccountingError) {
    return { code: error.code, message: error.message };
  }
  const detail = error instanceof Error ? error.message : String(error);
  return {
    code: 'INTERNAL_ERROR',
    message: `Something went wrong while preparing this information: ${detail}`,
  };
}

export function isCancellation(error: unknown): boolean {
  return error instanceof CancelledError;
}
