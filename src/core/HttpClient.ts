/**
 * Shared outbound HTTP client
 * Basic auth, per-request timeout and retry with exponential backoff on top of fetch
 */
import type { Logger } from 'pino';
import { createChildLogger } from './Logger.js';
import { HttpStatusError, ResponseFormatError, TransportError } from './errors.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export const RETRY_STATUS_CODES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);
const RETRY_METHODS: ReadonlySet<HttpMethod> = new Set(['GET', 'POST', 'PUT', 'DELETE']);

export interface HttpCredentials {
  username: string;
  password: string;
  /** Only requests to this origin carry the Authorization header */
  origin: string;
}

export interface HttpClientOptions {
  credentials?: HttpCredentials;
  timeoutMs?: number;
  maxAttempts?: number;
  backoffMs?: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Status and fully read body of one exchange
 */
export interface HttpResponse {
  status: number;
  ok: boolean;
  body: string;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class HttpClient {
  private readonly logger: Logger;
  private readonly credentials?: HttpCredentials;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly backoffMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: HttpClientOptions = {}) {
    this.logger = createChildLogger({ service: 'HttpClient' });
    this.credentials = options.credentials;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.backoffMs = options.backoffMs ?? 1000;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Issue a request, retrying transient failures.
   * The body is read within the same attempt, so a stalled or dropped body counts as a
   * connection failure. Resolves with the final response whatever its status; throws
   * TransportError when every attempt failed.
   */
  async request(method: HttpMethod, url: string, body?: unknown): Promise<HttpResponse> {
    const retryable = RETRY_METHODS.has(method);
    const headers = this.buildHeaders(url, body !== undefined);
    const payload = body === undefined ? undefined : JSON.stringify(body);

    for (let attemptNo = 1; ; attemptNo++) {
      const canRetry = retryable && attemptNo < this.maxAttempts;

      let response: HttpResponse;
      try {
        const raw = await this.fetchImpl(url, {
          method,
          headers,
          body: payload,
          signal: AbortSignal.timeout(this.timeoutMs),
        });
        response = { status: raw.status, ok: raw.ok, body: await raw.text() };
      } catch (error) {
        const failure = toTransportError(error, url);
        if (!canRetry) {
          throw failure;
        }
        await this.backoff(attemptNo, { method, url, reason: failure.reason });
        continue;
      }

      if (RETRY_STATUS_CODES.has(response.status) && canRetry) {
        await this.backoff(attemptNo, { method, url, status: response.status });
        continue;
      }

      return response;
    }
  }

  async getText(url: string): Promise<string> {
    const response = await this.request('GET', url);
    assertOk(response, url);
    return response.body;
  }

  async getJson(url: string): Promise<unknown> {
    const text = await this.getText(url);
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      throw new ResponseFormatError(url, 'body is not valid JSON');
    }
  }

  async sendJson(method: Exclude<HttpMethod, 'GET'>, url: string, body: unknown): Promise<void> {
    const response = await this.request(method, url, body);
    assertOk(response, url);
  }

  private async backoff(attemptNo: number, context: Record<string, unknown>): Promise<void> {
    const delay = this.backoffMs * Math.pow(2, attemptNo - 1);
    this.logger.debug({ ...context, attempt: attemptNo, delay }, 'Retrying request');
    await this.sleep(delay);
  }

  private buildHeaders(url: string, hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {};
    if (hasBody) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.credentials && new URL(url).origin === this.credentials.origin) {
      const auth = Buffer.from(`${this.credentials.username}:${this.credentials.password}`).toString('base64');
      headers['Authorization'] = `Basic ${auth}`;
    }
    return headers;
  }
}

function assertOk(response: HttpResponse, url: string): void {
  if (!response.ok) {
    throw new HttpStatusError(response.status, url, response.body);
  }
}

function toTransportError(error: unknown, url: string): TransportError {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return new TransportError('timeout', url, { cause: error });
  }
  return new TransportError('network', url, { cause: error });
}
