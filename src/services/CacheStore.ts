/**
 * Snapshot of the last computed desired state, for external inspection.
 * Reconciliation never reads it.
 */
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import type { Logger } from 'pino';
import { createChildLogger } from '../core/Logger.js';
import type { DesiredState, RewriteEntry } from '../types/index.js';

const snapshotSchema = z.array(z.object({ domain: z.string(), answer: z.string() }));

export class CacheStore {
  private readonly logger: Logger;

  constructor(private readonly filePath: string) {
    this.logger = createChildLogger({ service: 'CacheStore' });
  }

  /**
   * Overwrite the snapshot. Returns false (and logs) if the file could not be written.
   */
  async writeSnapshot(desired: DesiredState): Promise<boolean> {
    const entries: RewriteEntry[] = [...desired].map(([domain, answer]) => ({ domain, answer }));
    const tmpPath = `${this.filePath}.tmp`;

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tmpPath, JSON.stringify(entries, null, 2), 'utf-8');
      await rename(tmpPath, this.filePath);
    } catch (error) {
      this.logger.warn({ path: this.filePath, error }, 'Failed to write cache snapshot');
      return false;
    }

    this.logger.debug({ path: this.filePath, count: entries.length }, 'Cache snapshot written');
    return true;
  }

  /**
   * Read the snapshot back; null when the file does not exist
   */
  async readSnapshot(): Promise<RewriteEntry[] | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
    return snapshotSchema.parse(JSON.parse(raw));
  }
}
