/**
 * Desired-State Aggregator
 * Resolves selected services to list files and folds their domains into one domain -> answer map
 */
import type { Logger } from 'pino';
import { createChildLogger, symbols } from '../core/Logger.js';
import { runWorkerPool } from '../core/WorkerPool.js';
import { FileFetchError } from '../core/errors.js';
import type {
  DesiredState,
  DomainListSource,
  ServiceCatalogEntry,
  ServiceSelection,
} from '../types/index.js';

export class DesiredStateAggregator {
  private readonly logger: Logger;

  constructor(private readonly source: DomainListSource) {
    this.logger = createChildLogger({ service: 'Aggregator' });
  }

  /**
   * File paths of the selected services, in catalog order
   */
  resolveFilePaths(catalog: readonly ServiceCatalogEntry[], selection: ServiceSelection): string[] {
    if (selection === 'all') {
      return catalog.flatMap((entry) => entry.domainFiles);
    }

    const wanted = new Set(selection);
    const known = new Set(catalog.map((entry) => entry.name));
    const unknown = selection.filter((name) => !known.has(name));
    if (unknown.length > 0) {
      this.logger.warn({ services: unknown }, 'Selected services not found in catalog');
    }

    return catalog
      .filter((entry) => wanted.has(entry.name))
      .flatMap((entry) => entry.domainFiles);
  }

  /**
   * Download every file through a pool of `concurrency` workers.
   *
   * A file that fails to download, or whose path does not form a URL, is logged and left out. When the same domain appears in
   * several files the last fold wins; with one answer per run the result does not depend on
   * worker timing.
   */
  async aggregate(
    filePaths: readonly string[],
    baseUrl: string,
    targetAnswer: string,
    concurrency: number
  ): Promise<DesiredState> {
    const desired: DesiredState = new Map();
    const failed: string[] = [];

    this.logger.info(
      { count: filePaths.length, workers: concurrency },
      `${symbols.download} Downloading domain lists`
    );

    await runWorkerPool(filePaths, concurrency, async (filePath) => {
      const url = resolveFileUrl(filePath, baseUrl);
      if (url === null) {
        failed.push(filePath);
        this.logger.warn({ url: filePath }, 'Skipping domain list with an invalid path');
        return;
      }

      let domains: string[];
      try {
        domains = await this.source.fetchDomainList(url);
      } catch (error) {
        if (error instanceof FileFetchError) {
          failed.push(url);
          this.logger.warn({ url, error }, 'Skipping domain list');
          return;
        }
        throw error;
      }

      // No await between here and the end of the loop: one worker writes at a time
      for (const domain of domains) {
        desired.set(domain, targetAnswer);
      }
    });

    this.logger.info(
      { count: desired.size, files: filePaths.length, failed: failed.length },
      'Domain lists aggregated'
    );

    return desired;
  }
}

function resolveFileUrl(filePath: string, baseUrl: string): string | null {
  try {
    return new URL(filePath, baseUrl).toString();
  } catch {
    return null;
  }
}
