import type { Logger } from 'pino';

const INTEGER = /^\s*[+-]?\d+\s*$/;

/**
 * Reads the `retry_count` attribute. Absent or empty means 0; anything
 * that is not an integer is logged and treated as 0.
 */
export function parseRetryCount(
  attributes: Record<string, string>,
  logger: Logger,
): number {
  const raw = attributes.retry_count;
  if (raw === undefined || raw === '') {
    return 0;
  }
  if (!INTEGER.test(raw)) {
    logger.warn({ retry_count: raw }, 'invalid retry_count attribute');
    return 0;
  }
  return Number.parseInt(raw, 10);
}
