/**
 * HTTP transport for the QuickBooks Time API
 *
 * The fetcher talks to the API only through `HttpTransport`, so tests can
 * swap in an in-process fake.
 */

export type HttpMethod = 'GET' | 'POST';

export interface TransportRequest {
  method: HttpMethod;
  path: string;
  query: Record<string, string>;
  body?: unknown;
}

export interface TransportResponse {
  status: number;
  /** Parsed Retry-After header, in seconds */
  retryAfterSeconds?: number;
  /** Parsed JSON body, or the raw text when it is not JSON */
  body: unknown;
}

export interface HttpTransport {
  /**
   * Send one request. Rejects only when no response arrived (network
   * failure or abort).
   */
  send(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse>;
}

export interface FetchTransportOptions {
  baseUrl: string;
  accessToken: string;
  userAgent?: string;
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds;
  }
  const date = Date.parse(header);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, Math.ceil((date - Date.now()) / 1000));
}

function parseBody(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export class FetchTransport implements HttpTransport {
  private baseUrl: string;
  private accessToken: string;
  private userAgent: string;

  constructor(options: FetchTransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.accessToken = options.accessToken;
    this.userAgent = options.userAgent ?? 'QbTimeAccountingMCP';
  }

  async send(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse> {
    const url = new URL(`${this.baseUrl}/${request.path}`);
    Object.entries(request.query).forEach(([key, value]) => {
      url.searchParams.set(key, value);
    });

    const headers: Record<string, string> = {
      'Authorization': `Bearer ${this.accessToken}`,
      'User-Agent': this.userAgent,
      'Accept': 'application/json',
    };

    const init: RequestInit = { method: request.method, headers, signal };
    if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(request.body);
    }

    const response = await fetch(url.toString(), init);
    const text = await response.text();

    return {
      status: response.status,
      retryAfterSeconds: parseRetryAfter(response.headers.get('Retry-After')),
      body: parseBody(text),
    };
  }
}
