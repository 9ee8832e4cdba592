/**
 * In-process stand-ins for AdGuard Home and the domain-list host, served through an injected fetch
 */
import type { RewriteEntry } from '../../src/types/index.js';

export interface RecordedRequest {
  method: string;
  url: string;
  path: string;
  headers: Headers;
  body: unknown;
}

export type RouteHandler = (request: RecordedRequest) => Response | Promise<Response>;

export interface FakeFetch {
  fetch: typeof fetch;
  requests: RecordedRequest[];
}

function toUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

export function jsonResponse(data: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(body: string, status: number = 200): Response {
  return new Response(body, { status });
}

/**
 * Response whose body stream fails mid-read, as when the connection drops
 */
export function brokenBodyResponse(status: number = 200): Response {
  const body = new ReadableStream<Uint8Array>({
    pull(controller) {
      controller.error(new TypeError('terminated'));
    },
  });
  return new Response(body, { status });
}

/**
 * Route every request to the handler registered for its origin
 */
export function createFakeFetch(routes: Record<string, RouteHandler>): FakeFetch {
  const requests: RecordedRequest[] = [];

  const fakeFetch: typeof fetch = async (input, init) => {
    const url = new URL(toUrl(input));
    const rawBody = init?.body;
    const request: RecordedRequest = {
      method: init?.method ?? 'GET',
      url: url.href,
      path: url.pathname,
      headers: new Headers(init?.headers),
      body: typeof rawBody === 'string' ? JSON.parse(rawBody) : undefined,
    };
    requests.push(request);

    const handler = routes[url.origin];
    if (!handler) {
      throw new TypeError('fetch failed');
    }
    return handler(request);
  };

  return { fetch: fakeFetch, requests };
}

function asEntry(value: unknown): RewriteEntry | null {
  if (typeof value !== 'object' || value === null) return null;
  if (!('domain' in value) || typeof value.domain !== 'string') return null;
  const answer = 'answer' in value && typeof value.answer === 'string' ? value.answer : '';
  return { domain: value.domain, answer };
}

export interface FakeAdGuardOptions {
  username?: string;
  password?: string;
  rewrites?: RewriteEntry[];
}

/**
 * Minimal AdGuard Home /control/rewrite API backed by an array, so duplicates are possible
 */
export class FakeAdGuard {
  rewrites: RewriteEntry[];
  readonly writes: RecordedRequest[] = [];
  /** Domains whose writes answer 500 */
  readonly failingDomains = new Set<string>();
  listStatus = 200;
  statusCode = 200;
  private readonly expectedAuth?: string;

  constructor(options: FakeAdGuardOptions = {}) {
    this.rewrites = [...(options.rewrites ?? [])];
    if (options.username !== undefined && options.password !== undefined) {
      this.expectedAuth = `Basic ${Buffer.from(`${options.username}:${options.password}`).toString('base64')}`;
    }
  }

  table(): Map<string, string> {
    return new Map(this.rewrites.map((entry) => [entry.domain, entry.answer]));
  }

  readonly handle: RouteHandler = (request) => {
    if (this.expectedAuth && request.headers.get('Authorization') !== this.expectedAuth) {
      return textResponse('Unauthorized', 401);
    }

    const key = `${request.method} ${request.path}`;
    if (key === 'GET /control/status') {
      return jsonResponse({ running: true }, this.statusCode);
    }
    if (key === 'GET /control/rewrite/list') {
      if (this.listStatus !== 200) return textResponse('unavailable', this.listStatus);
      return jsonResponse(this.rewrites);
    }

    this.writes.push(request);

    if (key === 'POST /control/rewrite/add') {
      const entry = asEntry(request.body);
      if (!entry) return textResponse('bad body', 400);
      if (this.failingDomains.has(entry.domain)) return textResponse('boom', 500);
      this.rewrites.push(entry);
      return textResponse('OK');
    }

    if (key === 'PUT /control/rewrite/update') {
      const body = request.body;
      if (typeof body !== 'object' || body === null || !('target' in body) || !('update' in body)) {
        return textResponse('bad body', 400);
      }
      const target = asEntry(body.target);
      const update = asEntry(body.update);
      if (!target || !update) return textResponse('bad body', 400);
      if (this.failingDomains.has(update.domain)) return textResponse('boom', 500);
      const index = this.rewrites.findIndex((r) => r.domain === target.domain && r.answer === target.answer);
      if (index === -1) return textResponse('rewrite not found', 400);
      this.rewrites[index] = update;
      return textResponse('OK');
    }

    if (key === 'DELETE /control/rewrite/delete') {
      const entry = asEntry(request.body);
      if (!entry) return textResponse('bad body', 400);
      if (this.failingDomains.has(entry.domain)) return textResponse('boom', 500);
      this.rewrites = this.rewrites.filter((r) => !(r.domain === entry.domain && r.answer === entry.answer));
      return textResponse('OK');
    }

    return textResponse('not found', 404);
  };
}

/**
 * Static file host: path -> body, or a status code for a failing file
 */
export function createListHost(files: Record<string, string | number>): RouteHandler {
  return (request) => {
    const file = files[request.path];
    if (file === undefined) return textResponse('not found', 404);
    if (typeof file === 'number') return textResponse('error', file);
    return textResponse(file);
  };
}

export const noSleep = async (): Promise<void> => {};
