/**
 * Error taxonomy
 *
 * Transport-level errors (HttpStatusError, TransportError, ResponseFormatError) are raised by
 * the HTTP client and schema checks. Components wrap them into a SyncError subclass that says
 * whether the run can continue.
 */

export type SyncErrorKind = 'config' | 'catalog' | 'file_fetch' | 'baseline_fetch' | 'write';

export abstract class SyncError extends Error {
  abstract readonly kind: SyncErrorKind;
  abstract readonly fatal: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing or invalid setting. Raised before any network activity.
 */
export class ConfigError extends SyncError {
  readonly kind = 'config';
  readonly fatal = true;

  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
  }
}

/**
 * Catalog unreachable or malformed; service resolution is impossible
 */
export class CatalogError extends SyncError {
  readonly kind = 'catalog';
  readonly fatal = true;

  constructor(public readonly url: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to load service catalog from ${url}: ${reason}`, options);
  }
}

/**
 * One domain-list file unreachable or invalid; its domains are dropped
 */
export class FileFetchError extends SyncError {
  readonly kind = 'file_fetch';
  readonly fatal = false;

  constructor(public readonly url: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to fetch domain list ${url}: ${reason}`, options);
  }
}

/**
 * Current rewrite table unreachable; diffing against unknown state is unsafe
 */
export class BaselineFetchError extends SyncError {
  readonly kind = 'baseline_fetch';
  readonly fatal = true;

  constructor(public readonly url: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to fetch current rewrites from ${url}: ${reason}`, options);
  }
}

export type WriteOperation = 'add' | 'update' | 'delete';

/**
 * A single add/update call failed; counted and skipped
 */
export class WriteError extends SyncError {
  readonly kind = 'write';
  readonly fatal = false;

  constructor(
    public readonly domain: string,
    public readonly operation: WriteOperation,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to ${operation} rewrite for ${domain}: ${reason}`, options);
  }
}

/**
 * Non-2xx response after retries were exhausted
 */
export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
    public readonly body: string = ''
  ) {
    super(body ? `HTTP ${status}: ${body.slice(0, 200)}` : `HTTP ${status}`);
    this.name = 'HttpStatusError';
  }
}

export type TransportFailure = 'network' | 'timeout';

/**
 * Connection failure or timeout after retries were exhausted
 */
export class TransportError extends Error {
  constructor(
    public readonly reason: TransportFailure,
    public readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(reason === 'timeout' ? 'request timed out' : `network error${describeCause(options?.cause)}`, options);
    this.name = 'TransportError';
  }
}

/**
 * Response body did not have the expected shape
 */
export class ResponseFormatError extends Error {
  constructor(public readonly url: string, detail: string) {
    super(`unexpected response format: ${detail}`);
    this.name = 'ResponseFormatError';
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    const inner: unknown = cause.cause;
    if (inner instanceof Error) return ` (${inner.message})`;
    return ` (${cause.message})`;
  }
  return '';
}

/**
 * Failures that come from the outside world rather than from a bug
 */
export function isTransportFailure(
  error: unknown
): error is HttpStatusError | TransportError | ResponseFormatError {
  return (
    error instanceof HttpStatusError ||
    error instanceof TransportError ||
    error instanceof ResponseFormatError
  );
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Run an operation and map transport failures into a typed error result.
 * Anything else (a bug, a TypeError) is rethrown rather than folded into an empty result.
 */
export async function attempt<T, E extends SyncError>(
  fn: () => Promise<T>,
  wrap: (error: HttpStatusError | TransportError | ResponseFormatError) => E
): Promise<Result<T, E>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    if (isTransportFailure(error)) {
      return { ok: false, error: wrap(error) };
    }
    throw error;
  }
}
