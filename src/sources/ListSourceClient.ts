/**
 * List Source Client
 * Fetches the service catalog and individual domain-list files
 */
import { z } from 'zod';
import type { Logger } from 'pino';
import { createChildLogger } from '../core/Logger.js';
import type { HttpClient } from '../core/HttpClient.js';
import {
  CatalogError,
  FileFetchError,
  ResponseFormatError,
  attempt,
} from '../core/errors.js';
import type { DomainListSource, ServiceCatalogEntry } from '../types/index.js';

const catalogSchema = z.object({
  cache_domains: z.array(
    z.object({
      name: z.string(),
      domain_files: z.array(z.string()),
    })
  ),
});

/**
 * Split a domain-list body into domains, dropping blanks and # comments
 */
export function parseDomainList(body: string): string[] {
  const domains: string[] = [];
  for (const rawLine of body.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) {
      continue;
    }
    domains.push(line);
  }
  return domains;
}

export class ListSourceClient implements DomainListSource {
  private readonly logger: Logger;

  constructor(private readonly http: HttpClient) {
    this.logger = createChildLogger({ service: 'ListSource' });
  }

  async fetchCatalog(catalogUrl: string): Promise<ServiceCatalogEntry[]> {
    this.logger.info({ url: catalogUrl }, 'Fetching service catalog');

    const result = await attempt(
      async () => {
        const data = await this.http.getJson(catalogUrl);
        const parsed = catalogSchema.safeParse(data);
        if (!parsed.success) {
          const detail = parsed.error.errors[0];
          throw new ResponseFormatError(
            catalogUrl,
            detail ? `${detail.path.join('.') || 'root'}: ${detail.message}` : 'missing cache_domains'
          );
        }
        return parsed.data.cache_domains;
      },
      (error) => new CatalogError(catalogUrl, error.message, { cause: error })
    );

    if (!result.ok) {
      throw result.error;
    }

    const catalog = result.value.map((item) => ({
      name: item.name,
      domainFiles: item.domain_files,
    }));
    this.logger.debug({ count: catalog.length }, 'Service catalog loaded');
    return catalog;
  }

  async listServiceNames(catalogUrl: string): Promise<string[]> {
    const catalog = await this.fetchCatalog(catalogUrl);
    return catalog.map((entry) => entry.name);
  }

  async fetchDomainList(fileUrl: string): Promise<string[]> {
    this.logger.debug({ url: fileUrl }, 'Downloading domain list');

    const result = await attempt(
      () => this.http.getText(fileUrl),
      (error) => new FileFetchError(fileUrl, error.message, { cause: error })
    );

    if (!result.ok) {
      throw result.error;
    }

    const domains = parseDomainList(result.value);
    this.logger.debug({ url: fileUrl, count: domains.length }, 'Domain list downloaded');
    return domains;
  }
}
