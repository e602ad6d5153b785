import { randomBytes } from 'node:crypto';
import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { MalformedStagedFileError, StageError, describeCause } from '../errors';
import { fromStagedFile, stagedFileSchema, toStagedFile } from './staged-job.codec';
import type { LoadResult, StageResult, StagedJob } from './staged-job.types';

export const STAGED_SUFFIX = '.json';
export const TEMP_SUFFIX = '.tmp';
export const QUARANTINE_SUFFIX = '.bad';

/**
 * Strips everything except ASCII letters, digits, `-` and `_` so a bus
 * message id can never escape the staging directory.
 */
export function sanitizeMessageId(id: string): string {
  return id.replace(/[^A-Za-z0-9_-]/g, '');
}

/**
 * File-backed staging area for one subscription. A job file is written to
 * `<name>.tmp` and renamed into place, so readers only ever see complete
 * files.
 */
export class DurableStage {
  private lastTimestamp = 0;

  constructor(
    readonly directory: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Builds `<ms timestamp>_<sanitized id>_<random>.json`. Timestamps issued
   * by one instance never go backwards, so lexical order is arrival order.
   */
  fileNameFor(id: string): string {
    const timestamp = Math.max(this.now().getTime(), this.lastTimestamp + 1);
    this.lastTimestamp = timestamp;
    const suffix = randomBytes(4).toString('hex');
    return `${String(timestamp).padStart(13, '0')}_${sanitizeMessageId(id)}_${suffix}${STAGED_SUFFIX}`;
  }

  async stage(
    id: string,
    body: Buffer,
    attributes: Record<string, string>,
  ): Promise<StageResult<StageError>> {
    const job: StagedJob = {
      id,
      body,
      attributes: { ...attributes },
      receivedAt: this.now(),
      attempts: 0,
      lastAttemptAt: null,
      lastError: null,
      lastErrorAt: null,
      path: path.join(this.directory, this.fileNameFor(id)),
    };

    try {
      await fs.mkdir(this.directory, { recursive: true });
      await this.write(job);
      return { ok: true, job };
    } catch (error) {
      return { ok: false, error: new StageError(id, this.directory, error) };
    }
  }

  /**
   * Persists attempts + 1 before an execution starts, so a crash during the
   * run shows up as a higher count on recovery.
   */
  async markAttempt(job: StagedJob): Promise<StagedJob> {
    const updated: StagedJob = {
      ...job,
      attempts: job.attempts + 1,
      lastAttemptAt: this.now(),
    };
    await this.write(updated);
    return updated;
  }

  async recordFailure(job: StagedJob, lastError: string): Promise<StagedJob> {
    const updated: StagedJob = {
      ...job,
      lastError,
      lastErrorAt: this.now(),
    };
    await this.write(updated);
    return updated;
  }

  async remove(job: StagedJob): Promise<void> {
    await fs.rm(job.path, { force: true });
  }

  async load(filePath: string): Promise<LoadResult<MalformedStagedFileError>> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      return {
        ok: false,
        error: new MalformedStagedFileError(filePath, `unreadable: ${describeCause(error)}`),
      };
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      return {
        ok: false,
        error: new MalformedStagedFileError(filePath, `invalid JSON: ${describeCause(error)}`),
      };
    }

    const parsed = stagedFileSchema.safeParse(json);
    if (!parsed.success) {
      const reason = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || issue.code}: ${issue.message}`)
        .join('; ');
      return { ok: false, error: new MalformedStagedFileError(filePath, reason) };
    }

    return { ok: true, job: fromStagedFile(parsed.data, filePath) };
  }

  /**
   * Moves a file out of the recovery set by appending `.bad`.
   * Returns the new path.
   */
  async quarantine(filePath: string): Promise<string> {
    const badPath = `${filePath}${QUARANTINE_SUFFIX}`;
    await fs.rename(filePath, badPath);
    return badPath;
  }

  private async write(job: StagedJob): Promise<void> {
    const tmp = `${job.path}${TEMP_SUFFIX}`;
    try {
      const handle = await fs.open(tmp, 'w');
      try {
        await handle.writeFile(JSON.stringify(toStagedFile(job)), 'utf-8');
        await handle.datasync();
      } finally {
        await handle.close();
      }
      await fs.rename(tmp, job.path);
      await syncDirectory(this.directory);
    } catch (error) {
      await fs.rm(tmp, { force: true }).catch(() => {
        // the original error is the one worth reporting
      });
      throw error;
    }
  }
}

// Filesystems that cannot sync a directory handle report one of these.
const DIRECTORY_SYNC_UNSUPPORTED = new Set(['EINVAL', 'EPERM', 'EISDIR', 'EROFS']);

/** Persists the directory entry a rename created. */
async function syncDirectory(directory: string): Promise<void> {
  const handle = await fs.open(directory, 'r');
  try {
    await handle.datasync();
  } catch (error) {
    if (!DIRECTORY_SYNC_UNSUPPORTED.has(errorCode(error))) {
      throw error;
    }
  } finally {
    await handle.close();
  }
}

function errorCode(error: unknown): string {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : '';
}
