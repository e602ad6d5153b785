import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { DurableStage, STAGED_SUFFIX, TEMP_SUFFIX } from './durable-stage';
import type { StagedJob } from './staged-job.types';

function isMissing(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

/**
 * Collects the jobs a previous run staged but never finished.
 */
export class RecoverySweep {
  constructor(
    private readonly stage: DurableStage,
    private readonly logger: Logger,
  ) {}

  /**
   * Returns staged jobs in arrival order. Unparseable files are renamed to
   * `.bad` and left for an operator; half-written `.tmp` files are removed
   * because their delivery was never acknowledged.
   */
  async sweep(): Promise<StagedJob[]> {
    const directory = this.stage.directory;
    let entries: string[];
    try {
      entries = await fs.readdir(directory);
    } catch (error) {
      if (!isMissing(error)) {
        this.logger.error({ dir: directory, error }, 'staging dir unreadable, recovery skipped');
      }
      return [];
    }

    for (const name of entries.filter((entry) => entry.endsWith(TEMP_SUFFIX))) {
      const tmpPath = path.join(directory, name);
      try {
        await fs.rm(tmpPath, { force: true });
        this.logger.warn({ path: tmpPath }, 'stale temp file removed');
      } catch (error) {
        this.logger.error({ path: tmpPath, error }, 'stale temp file could not be removed');
      }
    }

    const staged = entries.filter((entry) => entry.endsWith(STAGED_SUFFIX)).sort();
    if (staged.length === 0) {
      return [];
    }
    this.logger.info({ dir: directory, count: staged.length }, 'processing pending queue');

    const jobs: StagedJob[] = [];
    for (const name of staged) {
      const filePath = path.join(directory, name);
      const loaded = await this.stage.load(filePath);
      if (loaded.ok) {
        jobs.push(loaded.job);
        continue;
      }

      try {
        const badPath = await this.stage.quarantine(filePath);
        this.logger.warn(
          { path: badPath, reason: loaded.error.reason },
          'staged file invalid, quarantined',
        );
      } catch (error) {
        this.logger.error(
          { path: filePath, reason: loaded.error.reason, error },
          'staged file invalid and could not be quarantined',
        );
      }
    }
    return jobs;
  }
}
