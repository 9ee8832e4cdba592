/**
 * AdGuard Home rewrite client
 * Reads and writes DNS rewrites via the /control/rewrite API using HTTP Basic Auth
 */
import { z } from 'zod';
import type { Logger } from 'pino';
import { createChildLogger } from '../../core/Logger.js';
import type { HttpClient } from '../../core/HttpClient.js';
import {
  BaselineFetchError,
  ResponseFormatError,
  WriteError,
  attempt,
  isTransportFailure,
  type WriteOperation,
} from '../../core/errors.js';
import type { CurrentRewriteTable, RewriteEntry, RewriteStore, UpdateMode } from '../../types/index.js';

export interface AdGuardRewriteClientOptions {
  apiUrl: string;
  updateMode?: UpdateMode;
}

const rewriteListSchema = z.array(
  z.object({
    domain: z.string(),
    answer: z.string(),
  })
);

/**
 * Normalize URL - add http:// if no protocol specified, strip trailing slashes
 */
export function normalizeApiUrl(apiUrl: string): string {
  let url = apiUrl.trim();
  if (!url.match(/^https?:\/\//i)) {
    url = `http://${url}`;
  }
  return url.replace(/\/+$/, '');
}

export class AdGuardRewriteClient implements RewriteStore {
  private readonly logger: Logger;
  private readonly baseUrl: string;
  private readonly updateMode: UpdateMode;

  constructor(
    private readonly http: HttpClient,
    options: AdGuardRewriteClientOptions
  ) {
    this.logger = createChildLogger({ service: 'AdGuard' });
    this.baseUrl = normalizeApiUrl(options.apiUrl);
    this.updateMode = options.updateMode ?? 'update';
  }

  get endpoint(): string {
    return `${this.baseUrl}/control/rewrite`;
  }

  get origin(): string {
    return new URL(this.baseUrl).origin;
  }

  /**
   * Status code of GET /control/status, or null when the server could not be reached
   */
  async checkStatus(): Promise<number | null> {
    try {
      const response = await this.http.request('GET', `${this.baseUrl}/control/status`);
      return response.status;
    } catch (error) {
      if (isTransportFailure(error)) {
        this.logger.debug({ error }, 'Status check failed');
        return null;
      }
      throw error;
    }
  }

  async fetchCurrent(): Promise<CurrentRewriteTable> {
    const url = `${this.endpoint}/list`;
    this.logger.info({ url }, 'Fetching current rewrites');

    const result = await attempt(
      async () => {
        const parsed = rewriteListSchema.safeParse(await this.http.getJson(url));
        if (!parsed.success) {
          throw new ResponseFormatError(url, 'expected an array of { domain, answer }');
        }
        return parsed.data;
      },
      (error) => new BaselineFetchError(url, error.message, { cause: error })
    );

    if (!result.ok) {
      throw result.error;
    }

    const table = new Map<string, string>();
    for (const entry of result.value) {
      table.set(entry.domain, entry.answer);
    }

    this.logger.debug({ count: table.size }, 'Current rewrites loaded');
    return table;
  }

  async addRewrite(domain: string, answer: string): Promise<void> {
    this.logger.debug({ domain, answer }, 'Adding DNS rewrite');
    const body: RewriteEntry = { domain, answer };
    await this.write(domain, 'add', () => this.http.sendJson('POST', `${this.endpoint}/add`, body));
  }

  async updateRewrite(domain: string, answer: string, previousAnswer: string): Promise<void> {
    this.logger.debug({ domain, answer, previousAnswer, mode: this.updateMode }, 'Updating DNS rewrite');

    const target: RewriteEntry = { domain, answer: previousAnswer };
    const update: RewriteEntry = { domain, answer };

    if (this.updateMode === 'update') {
      await this.write(domain, 'update', () =>
        this.http.sendJson('PUT', `${this.endpoint}/update`, { target, update })
      );
      return;
    }

    // Servers without an update verb: remove then re-add
    await this.write(domain, 'delete', () => this.http.sendJson('DELETE', `${this.endpoint}/delete`, target));
    await this.write(domain, 'add', () => this.http.sendJson('POST', `${this.endpoint}/add`, update));
  }

  private async write(domain: string, operation: WriteOperation, send: () => Promise<void>): Promise<void> {
    const result = await attempt(send, (error) => new WriteError(domain, operation, error.message, { cause: error }));
    if (!result.ok) {
      throw result.error;
    }
  }
}
