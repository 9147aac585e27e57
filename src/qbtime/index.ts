/**
 * QuickBooks Time Module
 */

export { QbTimeClient } from './client.js';
export { RateLimitedFetcher, PagedSequence, computeBackoff } from './fetcher.js';
export type { FetchOptions, RetryPolicy, RateLimitedFetcherOptions, CollectedPages } from './fetcher.js';
export { TokenBucket } from './rate-limiter.js';
export type { TokenBucketConfig, TokenBucketStatus } from './rate-limiter.js';
export { FetchTransport } from './transport.js';
export type { HttpTransport, TransportRequest, TransportResponse, HttpMethod } from './transport.js';
export { systemClock } from './clock.js';
export type { Clock } from './clock.js';
export { ENDPOINTS, MAX_PAGE_SIZE, DEFAULT_PAGE_SIZE, serializeQuery, serializeBody, checkRequiredFilters } from './endpoints.js';
export type { Endpoint } from './endpoints.js';
export * from './types.js';
