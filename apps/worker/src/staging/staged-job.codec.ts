import { z } from 'zod';
import type { StagedJob } from './staged-job.types';

const isoDate = z
  .string()
  .datetime({ offset: true, message: 'must be an ISO-8601 timestamp' });

/**
 * On-disk representation of a pending job. Keys are part of the recovery
 * contract with files written by earlier runs.
 */
export const stagedFileSchema = z.object({
  message_id: z.string().min(1, 'message_id must be a non-empty string'),
  received_at: isoDate,
  attributes: z.record(z.string()).default({}),
  data_b64: z
    .string()
    .regex(/^[A-Za-z0-9+/]*={0,2}$/, 'data_b64 must be base64')
    .default(''),
  attempts: z.number().int().nonnegative().default(0),
  last_attempt_at: isoDate.nullable().default(null),
  last_error: z.string().nullable().default(null),
  last_error_at: isoDate.nullable().default(null),
});

export type StagedFile = z.infer<typeof stagedFileSchema>;

export function toStagedFile(job: StagedJob): StagedFile {
  return {
    message_id: job.id,
    received_at: job.receivedAt.toISOString(),
    attributes: job.attributes,
    data_b64: job.body.toString('base64'),
    attempts: job.attempts,
    last_attempt_at: job.lastAttemptAt?.toISOString() ?? null,
    last_error: job.lastError,
    last_error_at: job.lastErrorAt?.toISOString() ?? null,
  };
}

export function fromStagedFile(file: StagedFile, path: string): StagedJob {
  return {
    id: file.message_id,
    body: Buffer.from(file.data_b64, 'base64'),
    attributes: file.attributes,
    receivedAt: new Date(file.received_at),
    attempts: file.attempts,
    lastAttemptAt: file.last_attempt_at ? new Date(file.last_attempt_at) : null,
    lastError: file.last_error,
    lastErrorAt: file.last_error_at ? new Date(file.last_error_at) : null,
    path,
  };
}
