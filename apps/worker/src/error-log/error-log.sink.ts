import type { ErrorGenre } from '../retry/failure-classifier';

/**
 * Bookkeeping for classified job failures. Implementations are best
 * effort: `record` never throws and resolves `false` when nothing was
 * written.
 */
export interface ErrorLogSink {
  record(subscription: string, genre: ErrorGenre, at: Date): Promise<boolean>;
  close(): Promise<void>;
}

export const ERROR_LOG_SINK = Symbol('ERROR_LOG_SINK');

export class NoopErrorLogSink implements ErrorLogSink {
  async record(): Promise<boolean> {
    return false;
  }

  async close(): Promise<void> {}
}
