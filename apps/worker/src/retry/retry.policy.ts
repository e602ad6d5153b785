import type { StagedJob } from '../staging/staged-job.types';
import type { ErrorGenre } from './failure-classifier';

export const PROXY_BLOCK_RETRY_DELAY_SEC = 300;

export type RetryDecision = {
  allowed: boolean;
  delaySeconds: number;
  effectiveMaxRetries: number;
};

/**
 * Determines whether a failed job may go back to the retry topic.
 *
 * Only `proxy_block` gets the configured number of retries, each after a
 * cooldown: it signals an upstream rate limit. Every other outcome gets a
 * single immediate retry.
 */
export function decideRetry(
  genre: ErrorGenre | null,
  retryCount: number,
  maxRetries: number,
): RetryDecision {
  if (maxRetries <= 0) {
    return { allowed: false, delaySeconds: 0, effectiveMaxRetries: 0 };
  }
  if (genre === 'proxy_block') {
    return {
      allowed: retryCount < maxRetries,
      delaySeconds: PROXY_BLOCK_RETRY_DELAY_SEC,
      effectiveMaxRetries: maxRetries,
    };
  }
  return { allowed: retryCount < 1, delaySeconds: 0, effectiveMaxRetries: 1 };
}

/**
 * Attributes for the resubmitted message. Provenance keys are only set
 * when absent so the first hop's origin survives later retries.
 */
export function buildRetryAttributes(
  job: StagedJob,
  genre: ErrorGenre | null,
  retryCount: number,
  subscription: string,
): Record<string, string> {
  const attributes: Record<string, string> = {
    ...job.attributes,
    retry_count: String(retryCount + 1),
  };
  attributes.origin_message_id ??= job.id;
  attributes.origin_subscription ??= subscription;
  if (genre) {
    attributes.error_genre ??= genre;
  }
  return attributes;
}
