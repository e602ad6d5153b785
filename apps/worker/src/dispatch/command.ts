import type { Logger } from 'pino';
import { z } from 'zod';
import type { WorkerConfig } from '../config/agent-config';

export type Command = {
  file: string;
  args: string[];
};

export const jobBodySchema = z
  .object({
    args: z.array(z.union([z.string(), z.number()]).transform(String)).default([]),
  })
  .passthrough();

export type JobBody = z.infer<typeof jobBodySchema>;

/**
 * Decodes a delivery body. A body that is not a JSON object with an
 * `args` array is logged and treated as carrying no arguments.
 */
export function parseJobBody(body: Buffer, messageId: string, logger: Logger): JobBody {
  if (body.length === 0) {
    return { args: [] };
  }
  const raw = body.toString('utf-8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    logger.warn({ message_id: messageId, raw }, 'JSON decode failed');
    return { args: [] };
  }

  const parsed = jobBodySchema.safeParse(json);
  if (!parsed.success) {
    logger.warn(
      { message_id: messageId, raw, issues: parsed.error.issues.map((issue) => issue.message) },
      'job body ignored',
    );
    return { args: [] };
  }
  return parsed.data;
}

export function buildCommand(
  config: Pick<WorkerConfig, 'executablePath' | 'baseArgs' | 'extraArgs'>,
  body: JobBody,
): Command {
  return {
    file: config.executablePath,
    args: [...config.baseArgs, ...body.args, ...config.extraArgs],
  };
}

export function formatCommand(command: Command): string {
  return [command.file, ...command.args]
    .map((part) => (part.includes(' ') ? `"${part}"` : part))
    .join(' ');
}
