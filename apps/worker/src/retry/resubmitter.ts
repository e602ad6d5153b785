import { isAbortError, type Sleep } from '@dispatch/shared';
import type { Logger } from 'pino';
import type { MessageBus } from '../bus/bus.types';
import { RetryPublishError } from '../errors';
import type { StagedJob } from '../staging/staged-job.types';
import type { ErrorGenre } from './failure-classifier';
import { buildRetryAttributes, decideRetry } from './retry.policy';

/**
 * `published` and `exhausted` release the staged file; `publish_failed`
 * and `cancelled` keep it for the next recovery sweep.
 */
export type ResubmitOutcome =
  | { status: 'published'; publishId: string; retryCount: number }
  | { status: 'exhausted'; reason: 'no_retry_topic' | 'max_reached' }
  | { status: 'publish_failed'; error: RetryPublishError }
  | { status: 'cancelled' };

export type ResubmitterOptions = {
  subscription: string;
  retryTopic: string | null;
  maxRetries: number;
};

export class Resubmitter {
  constructor(
    private readonly bus: MessageBus,
    private readonly options: ResubmitterOptions,
    private readonly sleep: Sleep,
    private readonly logger: Logger,
  ) {}

  /**
   * Sends the job back through the retry topic when the policy allows it.
   * A cooldown blocks the caller, which holds the subscription's only slot.
   */
  async resubmit(
    job: StagedJob,
    genre: ErrorGenre | null,
    retryCount: number,
    reason: string,
    signal?: AbortSignal,
  ): Promise<ResubmitOutcome> {
    const { retryTopic, maxRetries, subscription } = this.options;
    const context = { message_id: job.id, retry_count: retryCount, reason, error_genre: genre };

    if (!retryTopic || maxRetries <= 0) {
      this.logger.warn(context, 'retry skipped (publisher not configured)');
      return { status: 'exhausted', reason: 'no_retry_topic' };
    }

    const decision = decideRetry(genre, retryCount, maxRetries);
    if (!decision.allowed) {
      this.logger.warn(
        { ...context, max_retries: decision.effectiveMaxRetries },
        'retry skipped (max reached)',
      );
      return { status: 'exhausted', reason: 'max_reached' };
    }

    const attributes = buildRetryAttributes(job, genre, retryCount, subscription);
    if (decision.delaySeconds > 0) {
      this.logger.warn({ ...context, delay_sec: decision.delaySeconds }, 'retry delayed');
      try {
        await this.sleep(decision.delaySeconds * 1000, signal);
      } catch (error) {
        if (isAbortError(error)) {
          this.logger.warn(context, 'retry cooldown interrupted, job left staged');
          return { status: 'cancelled' };
        }
        throw error;
      }
    }

    const nextCount = retryCount + 1;
    try {
      const publishId = await this.bus.publish(retryTopic, job.body, attributes);
      this.logger.info(
        { ...context, retry_count: nextCount, publish_id: publishId, topic: retryTopic },
        'retry published',
      );
      return { status: 'published', publishId, retryCount: nextCount };
    } catch (cause) {
      const error = new RetryPublishError(job.id, retryTopic, cause);
      this.logger.error({ ...context, retry_count: nextCount, error }, 'retry publish failed');
      return { status: 'publish_failed', error };
    }
  }
}
