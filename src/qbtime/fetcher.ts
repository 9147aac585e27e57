/**
 * Rate-limited, paginated fetcher for the QuickBooks Time API
 *
 * Every request first takes a permit from the shared TokenBucket. 429s, 5xx
 * responses and requests that got no response are retried for the same page
 * with exponential backoff; the retry reuses the permit of the first attempt.
 */

import {
  AuthError,
  CancelledError,
  ClientRequestError,
  MalformedResponseError,
  RateLimitExceededError,
  ServerError,
  type RequestContext,
} from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { systemClock, type Clock } from './clock.js';
import {
  DEFAULT_PAGE_SIZE,
  checkRequiredFilters,
  clampPageSize,
  serializeBody,
  serializeQuery,
  type Endpoint,
} from './endpoints.js';
import type { TokenBucket } from './rate-limiter.js';
import { envelopeSchema, errorBodySchema } from './schemas.js';
import type { HttpTransport, TransportRequest, TransportResponse } from './transport.js';
import type { Filters, Page } from './types.js';

export interface RetryPolicy {
  maxRetries: number;  // default: 4
  baseDelayMs: number; // default: 500
  maxDelayMs: number;  // default: 8000
  jitterMs: number;    // default: 250
}

export interface RateLimitedFetcherOptions {
  transport: HttpTransport;
  bucket: TokenBucket;
  clock?: Clock;
  logger?: Logger;
  retry?: Partial<RetryPolicy>;
  pageSize?: number;
  /** Source of jitter, in [0, 1) */
  random?: () => number;
}

export interface FetchOptions {
  signal?: AbortSignal;
  pageSize?: number;
}

/**
 * Everything a list endpoint returned, across pages
 */
export interface CollectedPages<T> {
  records: T[];
  supplemental_data: Record<string, unknown>;
  pages_fetched: number;
}

const DEFAULT_RETRY: RetryPolicy = {
  maxRetries: 4,
  baseDelayMs: 500,
  maxDelayMs: 8000,
  jitterMs: 250,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function bodyText(body: unknown): string | undefined {
  if (body === undefined) return undefined;
  return typeof body === 'string' ? body : JSON.stringify(body);
}

function upstreamMessage(body: unknown): string | undefined {
  const parsed = errorBodySchema.safeParse(body);
  return parsed.success ? parsed.data.error.message : undefined;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Delay before retry number `attempt + 1`: exponential, capped, jittered,
 * and never shorter than the server's Retry-After
 */
export function computeBackoff(
  policy: RetryPolicy,
  attempt: number,
  retryAfterSeconds: number | undefined,
  random: () => number
): number {
  const exponential = Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);
  const jittered = exponential + Math.floor(random() * policy.jitterMs);
  return Math.max(jittered, (retryAfterSeconds ?? 0) * 1000);
}

/**
 * Supplemental data maps each entity type to records keyed by id; pages are
 * merged per type
 */
function mergeSupplemental(target: Record<string, unknown>, source: Record<string, unknown>): void {
  for (const [key, value] of Object.entries(source)) {
    const existing = target[key];
    target[key] = isRecord(existing) && isRecord(value) ? { ...existing, ...value } : value;
  }
}

/**
 * Restartable, finite sequence of records from a list endpoint. Every
 * iteration starts again at page 1; breaking out early stops the requests.
 *
 * Pages arrive keyed by record id, and JavaScript objects enumerate integer
 * keys in ascending order, so records within a page come out sorted by id
 * whatever order the response body listed them in. Pages keep request order.
 */
export class PagedSequence<T> implements AsyncIterable<T> {
  constructor(private readonly loadPage: (page: number) => Promise<Page<T>>) {}

  /** One page, for callers paging by hand */
  page(page: number): Promise<Page<T>> {
    return this.loadPage(page);
  }

  async *pages(): AsyncGenerator<Page<T>, void, undefined> {
    for (let page = 1; ; page++) {
      const result = await this.loadPage(page);
      yield result;
      if (!result.more) return;
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for await (const page of this.pages()) {
      yield* page.records;
    }
  }

  async toArray(): Promise<T[]> {
    const records: T[] = [];
    for await (const record of this) {
      records.push(record);
    }
    return records;
  }

  async collect(): Promise<CollectedPages<T>> {
    const collected: CollectedPages<T> = { records: [], supplemental_data: {}, pages_fetched: 0 };
    for await (const page of this.pages()) {
      collected.records.push(...page.records);
      mergeSupplemental(collected.supplemental_data, page.supplemental_data);
      collected.pages_fetched++;
    }
    return collected;
  }
}

export class RateLimitedFetcher {
  private transport: HttpTransport;
  private bucket: TokenBucket;
  private clock: Clock;
  private logger: Logger;
  private retry: RetryPolicy;
  private pageSize: number;
  private random: () => number;

  constructor(options: RateLimitedFetcherOptions) {
    this.transport = options.transport;
    this.bucket = options.bucket;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.retry = { ...DEFAULT_RETRY, ...options.retry };
    this.pageSize = clampPageSize(options.pageSize ?? DEFAULT_PAGE_SIZE);
    this.random = options.random ?? Math.random;
  }

  /**
   * Lazily page through an endpoint. Required filters are checked now, before
   * any request is made.
   */
  fetchAll<T>(endpoint: Endpoint<T>, filters: Filters = {}, options: FetchOptions = {}): PagedSequence<T> {
    checkRequiredFilters(endpoint, filters);
    return new PagedSequence((page) => this.requestPage(endpoint, filters, page, options));
  }

  fetchPage<T>(endpoint: Endpoint<T>, filters: Filters = {}, page = 1, options: FetchOptions = {}): Promise<Page<T>> {
    checkRequiredFilters(endpoint, filters);
    return this.requestPage(endpoint, filters, page, options);
  }

  /**
   * First record of the first page, if any
   */
  async fetchOne<T>(endpoint: Endpoint<T>, filters: Filters = {}, options: FetchOptions = {}): Promise<T | undefined> {
    const page = await this.fetchPage(endpoint, filters, 1, options);
    return page.records[0];
  }

  /**
   * The endpoint's results object with its keys kept (for responses keyed by
   * something other than record id, such as entity type)
   */
  async fetchKeyed<T>(endpoint: Endpoint<T>, filters: Filters = {}, options: FetchOptions = {}): Promise<Record<string, T>> {
    checkRequiredFilters(endpoint, filters);
    const { entries } = await this.requestEntries(endpoint, filters, 1, options);
    return Object.fromEntries(entries);
  }

  private async requestPage<T>(endpoint: Endpoint<T>, filters: Filters, page: number, options: FetchOptions): Promise<Page<T>> {
    const { entries, more, supplemental } = await this.requestEntries(endpoint, filters, page, options);
    return {
      page,
      records: entries.map(([, record]) => record),
      more,
      supplemental_data: supplemental,
    };
  }

  private async requestEntries<T>(
    endpoint: Endpoint<T>,
    filters: Filters,
    page: number,
    options: FetchOptions
  ): Promise<{ entries: Array<[string, T]>; more: boolean; supplemental: Record<string, unknown> }> {
    const context: RequestContext = {
      endpoint: endpoint.name,
      page: endpoint.paginated ? page : undefined,
      filters: { ...filters },
    };

    const request = this.buildRequest(endpoint, filters, page, options);
    this.logger.debug(`${request.method} ${request.path}${endpoint.paginated ? ` page ${page}` : ''}`, this.bucket.getStatus());

    const response = await this.send(request, context, options.signal);

    const envelope = envelopeSchema.safeParse(response.body);
    if (!envelope.success) {
      throw new MalformedResponseError(response.status, context, 'no results object');
    }

    const raw = envelope.data.results[endpoint.resultsKey];
    let rawEntries: Array<[string, unknown]>;
    if (raw === undefined || raw === null) {
      rawEntries = [];
    } else if (Array.isArray(raw)) {
      rawEntries = raw.map((value, index): [string, unknown] => [String(index), value]);
    } else if (isRecord(raw)) {
      // Integer keys enumerate in ascending order
      rawEntries = Object.entries(raw);
    } else {
      throw new MalformedResponseError(response.status, context, `results.${endpoint.resultsKey} is not a collection`);
    }

    const entries = rawEntries.map(([key, value]): [string, T] => {
      const parsed = endpoint.schema.safeParse(value);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new MalformedResponseError(
          response.status,
          context,
          `record ${key}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`
        );
      }
      return [key, parsed.data];
    });

    return {
      entries,
      more: endpoint.paginated && envelope.data.more === true,
      supplemental: envelope.data.supplemental_data ?? {},
    };
  }

  private buildRequest<T>(endpoint: Endpoint<T>, filters: Filters, page: number, options: FetchOptions): TransportRequest {
    if (endpoint.method === 'POST') {
      return { method: 'POST', path: endpoint.path, query: {}, body: serializeBody(filters) };
    }

    const query = serializeQuery(filters);
    if (endpoint.paginated) {
      const requested = options.pageSize ?? (query.limit !== undefined ? Number(query.limit) : this.pageSize);
      query.limit = String(clampPageSize(requested));
      query.page = String(page);
    }
    return { method: 'GET', path: endpoint.path, query };
  }

  private async send(request: TransportRequest, context: RequestContext, signal?: AbortSignal): Promise<TransportResponse> {
    for (let attempt = 0; ; attempt++) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      // Every attempt, retries included, spends a permit
      await this.bucket.acquire(signal);

      let response: TransportResponse;
      try {
        response = await this.transport.send(request, signal);
      } catch (error) {
        if (signal?.aborted || error instanceof CancelledError) {
          throw new CancelledError();
        }
        if (attempt >= this.retry.maxRetries) {
          this.logger.error(`${request.method} ${request.path}: no response after ${attempt + 1} attempts`, describe(error));
          throw new ServerError(0, context, attempt + 1);
        }
        this.logger.warn(`${request.method} ${request.path}: no response (${describe(error)}), retrying`);
        await this.clock.sleep(computeBackoff(this.retry, attempt, undefined, this.random), signal);
        continue;
      }

      const { status } = response;
      if (status >= 200 && status < 300) {
        return response;
      }

      if (status === 401 || status === 403) {
        throw new AuthError(status, context, bodyText(response.body));
      }

      if (status === 429 || status >= 500) {
        if (response.retryAfterSeconds !== undefined) {
          this.bucket.pause(response.retryAfterSeconds * 1000);
        }
        if (attempt >= this.retry.maxRetries) {
          this.logger.error(`${request.method} ${request.path}: status ${status} after ${attempt + 1} attempts`);
          throw status === 429
            ? new RateLimitExceededError(context, attempt + 1)
            : new ServerError(status, context, attempt + 1, bodyText(response.body));
        }
        const delayMs = computeBackoff(this.retry, attempt, response.retryAfterSeconds, this.random);
        this.logger.warn(`${request.method} ${request.path}: status ${status}, retrying in ${delayMs}ms`);
        await this.clock.sleep(delayMs, signal);
        continue;
      }

      throw new ClientRequestError(status, context, upstreamMessage(response.body), bodyText(response.body));
    }
  }
}
