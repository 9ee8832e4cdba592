/**
 * Core type definitions
 */

/**
 * One domain-to-answer instruction understood by the DNS server
 */
export interface RewriteEntry {
  domain: string;
  answer: string;
}

/**
 * A named group of domain-list files from the catalog
 */
export interface ServiceCatalogEntry {
  name: string;
  domainFiles: readonly string[];
}

/**
 * Rewrite table as observed on the server at the start of a run
 */
export type CurrentRewriteTable = ReadonlyMap<string, string>;

/**
 * domain -> answer the server is expected to reflect. Iteration order is processing order.
 */
export type DesiredState = Map<string, string>;

export type ServiceSelection = 'all' | readonly string[];

export type UpdateMode = 'update' | 'replace';

export type ReconcilePhase = 'init' | 'fetch_current' | 'diff_apply' | 'done' | 'failed';

export interface ReconcileSummary {
  total: number;
  added: number;
  updated: number;
  skipped: number;
  failed: number;
}

export interface ReconcileProgress extends ReconcileSummary {
  processed: number;
}

/**
 * Source of domain lists, implemented by ListSourceClient
 */
export interface DomainListSource {
  fetchCatalog(catalogUrl: string): Promise<ServiceCatalogEntry[]>;
  fetchDomainList(fileUrl: string): Promise<string[]>;
}

/**
 * Server-side rewrite table, implemented by AdGuardRewriteClient
 */
export interface RewriteStore {
  fetchCurrent(): Promise<CurrentRewriteTable>;
  addRewrite(domain: string, answer: string): Promise<void>;
  updateRewrite(domain: string, answer: string, previousAnswer: string): Promise<void>;
}

// Application configuration
export interface AdGuardConfig {
  apiUrl: string;
  username: string;
  password: string;
  updateMode: UpdateMode;
}

export interface SyncConfig {
  allServices: boolean;
  serviceNames: readonly string[];
  lancacheServer: string;
  catalogUrl: string;
  maxWorkers: number;
  batchSize: number;
  cacheFile?: string;
  /** Re-run every this many ms; unset means a single run */
  syncIntervalMs?: number;
}

export interface HttpConfig {
  requestTimeoutMs: number;
}

export interface LoggingConfig {
  level: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
  pretty: boolean;
}

export interface AppConfig {
  adguard: AdGuardConfig;
  sync: SyncConfig;
  http: HttpConfig;
  logging: LoggingConfig;
}
