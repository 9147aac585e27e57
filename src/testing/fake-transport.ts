/**
 * In-process stand-in for the QuickBooks Time API
 */

import type { HttpTransport, TransportRequest, TransportResponse } from '../qbtime/transport.js';

export type FakeHandler = (request: TransportRequest, call: number) => TransportResponse | Promise<TransportResponse>;

export class FakeTransport implements HttpTransport {
  readonly requests: TransportRequest[] = [];
  private routes = new Map<string, FakeHandler>();

  /**
   * Answer requests to `path` with the handler; `call` counts from 0 per path
   */
  on(path: string, handler: FakeHandler): this {
    this.routes.set(path, handler);
    return this;
  }

  requestsTo(path: string): TransportRequest[] {
    return this.requests.filter((request) => request.path === path);
  }

  async send(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse> {
    if (signal?.aborted) {
      throw new Error('aborted');
    }
    const call = this.requestsTo(request.path).length;
    this.requests.push(request);
    const handler = this.routes.get(request.path);
    if (!handler) {
      return { status: 404, body: { error: { code: 404, message: `No route for ${request.path}` } } };
    }
    return handler(request, call);
  }
}

/**
 * A successful list response with records keyed by id
 */
export function listResponse<T extends { id: number }>(
  key: string,
  records: readonly T[],
  more = false,
  supplemental_data: Record<string, unknown> = {}
): TransportResponse {
  return {
    status: 200,
    body: {
      results: { [key]: Object.fromEntries(records.map((record) => [String(record.id), record])) },
      more,
      supplemental_data,
    },
  };
}

/**
 * Serve records in pages, following the `page` and `limit` query params
 */
export function pagedHandler<T extends { id: number }>(key: string, records: readonly T[]): FakeHandler {
  return (request) => {
    const page = Number(request.query.page ?? '1');
    const limit = Number(request.query.limit ?? '50');
    const slice = records.slice((page - 1) * limit, page * limit);
    return listResponse(key, slice, page * limit < records.length);
  };
}

/**
 * Filter a record set by the comma-joined id filters a timesheet query uses
 */
export function matchesIdFilter(value: number, filter: string | undefined): boolean {
  if (filter === undefined) return true;
  return filter.split(',').map(Number).includes(value);
}
