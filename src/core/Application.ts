/**
 * Run orchestrator
 * Catalog -> file paths -> desired state -> reconcile, mapped to a process exit code
 */
import type { Logger } from 'pino';
import { createChildLogger, symbols } from './Logger.js';
import { HttpClient } from './HttpClient.js';
import { CatalogError, BaselineFetchError } from './errors.js';
import { ListSourceClient } from '../sources/ListSourceClient.js';
import { DesiredStateAggregator } from '../services/DesiredStateAggregator.js';
import { Reconciler } from '../services/Reconciler.js';
import { CacheStore } from '../services/CacheStore.js';
import { AdGuardRewriteClient, normalizeApiUrl } from '../providers/adguard/AdGuardRewriteClient.js';
import type { AppConfig, ReconcileProgress, ReconcileSummary, ServiceSelection } from '../types/index.js';

export type ExitCode = 0 | 1;

export interface RunOutcome {
  exitCode: ExitCode;
  summary?: ReconcileSummary;
}

export interface ApplicationOptions {
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  onProgress?: (progress: ReconcileProgress) => void;
}

export class Application {
  private readonly logger: Logger;
  private readonly listSource: ListSourceClient;
  private readonly adguard: AdGuardRewriteClient;
  private readonly aggregator: DesiredStateAggregator;
  private readonly reconciler: Reconciler;
  private readonly cacheStore: CacheStore | null;

  constructor(
    private readonly config: Readonly<AppConfig>,
    options: ApplicationOptions = {}
  ) {
    this.logger = createChildLogger({ service: 'Application' });

    const http = new HttpClient({
      credentials: {
        username: config.adguard.username,
        password: config.adguard.password,
        origin: new URL(normalizeApiUrl(config.adguard.apiUrl)).origin,
      },
      timeoutMs: config.http.requestTimeoutMs,
      fetchImpl: options.fetchImpl,
      sleep: options.sleep,
    });

    this.listSource = new ListSourceClient(http);
    this.adguard = new AdGuardRewriteClient(http, {
      apiUrl: config.adguard.apiUrl,
      updateMode: config.adguard.updateMode,
    });
    this.aggregator = new DesiredStateAggregator(this.listSource);
    this.reconciler = new Reconciler(this.adguard, {
      batchSize: config.sync.batchSize,
      onProgress: options.onProgress,
    });
    this.cacheStore = config.sync.cacheFile ? new CacheStore(config.sync.cacheFile) : null;
  }

  private get selection(): ServiceSelection | null {
    const { allServices, serviceNames } = this.config.sync;
    if (allServices) return 'all';
    return serviceNames.length > 0 ? serviceNames : null;
  }

  async run(): Promise<RunOutcome> {
    const { sync } = this.config;
    this.logger.info(
      { services: sync.allServices ? 'all' : sync.serviceNames, answer: sync.lancacheServer },
      `${symbols.startup} Sync started`
    );

    const selection = this.selection;
    if (!selection) {
      return this.listAvailableServices();
    }

    try {
      const catalog = await this.listSource.fetchCatalog(sync.catalogUrl);

      const filePaths = this.aggregator.resolveFilePaths(catalog, selection);
      if (filePaths.length === 0) {
        this.logger.error({ services: selection }, 'No domain list files found for the selected services');
        return { exitCode: 1 };
      }

      const desired = await this.aggregator.aggregate(
        filePaths,
        sync.catalogUrl,
        sync.lancacheServer,
        sync.maxWorkers
      );
      if (desired.size === 0) {
        this.logger.error('No domains collected from the selected lists');
        return { exitCode: 1 };
      }

      if (this.cacheStore) {
        await this.cacheStore.writeSnapshot(desired);
      }

      const summary = await this.reconciler.reconcile(desired);
      this.logger.info({ ...summary }, `${symbols.success} Sync finished`);
      return { exitCode: 0, summary };
    } catch (error) {
      if (error instanceof CatalogError || error instanceof BaselineFetchError) {
        this.logger.error({ error }, 'Sync aborted');
        return { exitCode: 1 };
      }
      throw error;
    }
  }

  /**
   * Container healthcheck: selection configured and AdGuard Home answering
   */
  async healthcheck(): Promise<ExitCode> {
    if (!this.selection) {
      this.logger.error('Either ALL_SERVICES=true or SERVICE_NAMES must be specified');
      return 1;
    }

    const status = await this.adguard.checkStatus();
    if (status === null) {
      this.logger.warn('Cannot reach AdGuard Home API (may be temporary)');
      return 0;
    }
    if (status !== 200) {
      this.logger.error({ status }, 'AdGuard Home API returned an unexpected status');
      return 1;
    }

    this.logger.info('Configuration and AdGuard Home API OK');
    return 0;
  }

  private async listAvailableServices(): Promise<RunOutcome> {
    this.logger.warn('Neither ALL_SERVICES is true nor SERVICE_NAMES is set, fetching available services');

    let names: string[];
    try {
      names = await this.listSource.listServiceNames(this.config.sync.catalogUrl);
    } catch (error) {
      if (error instanceof CatalogError) {
        this.logger.error({ error }, 'Failed to fetch available service names');
        return { exitCode: 1 };
      }
      throw error;
    }

    if (names.length === 0) {
      this.logger.error('Catalog lists no services');
      return { exitCode: 1 };
    }

    this.logger.info(`Available services: ${names.join(', ')}`);
    this.logger.info('Set SERVICE_NAMES to one or more of these, or ALL_SERVICES=true, to proceed');
    return { exitCode: 0 };
  }
}
