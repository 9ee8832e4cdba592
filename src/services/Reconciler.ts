/**
 * Reconciler
 * Diffs desired rewrites against one snapshot of the server table and applies the minimal writes
 */
import type { Logger } from 'pino';
import { createChildLogger, symbols } from '../core/Logger.js';
import { BaselineFetchError, WriteError } from '../core/errors.js';
import type {
  CurrentRewriteTable,
  DesiredState,
  ReconcilePhase,
  ReconcileProgress,
  ReconcileSummary,
  RewriteStore,
} from '../types/index.js';

export interface ReconcilerOptions {
  batchSize?: number;
  onProgress?: (progress: ReconcileProgress) => void;
}

export type ReconcileAction = 'add' | 'update' | 'skip';

/**
 * Decide what one desired entry needs given the baseline
 */
export function planAction(current: CurrentRewriteTable, domain: string, answer: string): ReconcileAction {
  const existing = current.get(domain);
  if (existing === undefined) return 'add';
  return existing === answer ? 'skip' : 'update';
}

export class Reconciler {
  private readonly logger: Logger;
  private readonly batchSize: number;
  private readonly onProgress?: (progress: ReconcileProgress) => void;
  private _phase: ReconcilePhase = 'init';

  constructor(
    private readonly store: RewriteStore,
    options: ReconcilerOptions = {}
  ) {
    this.logger = createChildLogger({ service: 'Reconciler' });
    this.batchSize = Math.max(1, options.batchSize ?? 100);
    this.onProgress = options.onProgress;
  }

  get phase(): ReconcilePhase {
    return this._phase;
  }

  /**
   * Apply desired state. Domains present only on the server are left untouched.
   * Throws BaselineFetchError (phase 'failed') when the server table cannot be read.
   */
  async reconcile(desired: DesiredState): Promise<ReconcileSummary> {
    this._phase = 'fetch_current';

    let current: CurrentRewriteTable;
    try {
      current = await this.store.fetchCurrent();
    } catch (error) {
      this._phase = 'failed';
      if (error instanceof BaselineFetchError) {
        this.logger.error({ error }, 'Cannot read current rewrites, aborting');
      }
      throw error;
    }

    this._phase = 'diff_apply';

    const summary: ReconcileSummary = {
      total: desired.size,
      added: 0,
      updated: 0,
      skipped: 0,
      failed: 0,
    };
    let processed = 0;

    this.logger.info(
      { total: summary.total, count: current.size, batchSize: this.batchSize },
      `${symbols.sync} Reconciling DNS rewrites`
    );

    for (const [domain, answer] of desired) {
      const action = planAction(current, domain, answer);

      try {
        switch (action) {
          case 'add':
            await this.store.addRewrite(domain, answer);
            summary.added++;
            break;
          case 'update': {
            const previous = current.get(domain) ?? '';
            await this.store.updateRewrite(domain, answer, previous);
            summary.updated++;
            break;
          }
          case 'skip':
            summary.skipped++;
            break;
        }
      } catch (error) {
        if (!(error instanceof WriteError)) {
          throw error;
        }
        summary.failed++;
        this.logger.error({ domain, answer, error }, 'DNS rewrite write failed');
      }

      processed++;
      if (processed % this.batchSize === 0 || processed === summary.total) {
        this.reportProgress({ ...summary, processed });
      }
    }

    this._phase = 'done';

    const parts: string[] = [];
    if (summary.added > 0) parts.push(`+${summary.added} added`);
    if (summary.updated > 0) parts.push(`~${summary.updated} updated`);
    if (summary.failed > 0) parts.push(`!${summary.failed} failed`);
    if (parts.length > 0) {
      this.logger.info({ skipped: summary.skipped }, `DNS rewrites: ${parts.join(', ')}`);
    } else {
      this.logger.info({ skipped: summary.skipped }, `${symbols.success} DNS rewrites already in sync`);
    }

    return summary;
  }

  private reportProgress(progress: ReconcileProgress): void {
    this.logger.info(
      {
        processed: `${progress.processed}/${progress.total}`,
        added: progress.added,
        updated: progress.updated,
        skipped: progress.skipped,
        failed: progress.failed,
      },
      'Batch processed'
    );
    this.onProgress?.(progress);
  }
}
