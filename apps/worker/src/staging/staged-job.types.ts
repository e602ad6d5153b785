export type StagedJob = {
  id: string;
  body: Buffer;
  attributes: Record<string, string>;
  receivedAt: Date;
  attempts: number;
  lastAttemptAt: Date | null;
  lastError: string | null;
  lastErrorAt: Date | null;
  path: string;
};

/**
 * Outcome of writing a delivery to the staging directory.
 */
export type StageResult<E> = { ok: true; job: StagedJob } | { ok: false; error: E };

export type LoadResult<E> = StageResult<E>;
