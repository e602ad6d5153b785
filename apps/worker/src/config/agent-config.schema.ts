import { z } from 'zod';

const nonEmpty = (field: string) =>
  z.string().trim().min(1, `${field} must be a non-empty string`);

const argsSchema = z.array(z.union([z.string(), z.number()]).transform(String));

const maxRetriesSchema = z.coerce
  .number()
  .int('max_retries must be an integer')
  .min(0, 'max_retries must be at least 0');

const jobTimeoutSchema = z.coerce
  .number()
  .positive('job_timeout_sec must be positive');

/**
 * Keys that may be given once at the top level and overridden per
 * subscription.
 */
const sharedKeys = {
  executable_path: nonEmpty('executable_path').optional(),
  base_args: argsSchema.optional(),
  retry_topic: nonEmpty('retry_topic').nullish(),
  max_retries: maxRetriesSchema.nullish(),
  staging_dir: nonEmpty('staging_dir').nullish(),
  log_dir: nonEmpty('log_dir').nullish(),
  job_timeout_sec: jobTimeoutSchema.nullish(),
};

export const subscriptionEntrySchema = z.object({
  subscription_name: nonEmpty('subscription_name'),
  working_dir: nonEmpty('working_dir'),
  extra_args: argsSchema.default([]),
  ...sharedKeys,
});

export const databaseSchema = z.object({
  host: z.string().default(''),
  port: z.coerce.number().int().positive().default(5432),
  user: z.string().default(''),
  password: z.string().default(''),
  database: z.string().default(''),
});

export const agentConfigFileSchema = z
  .object({
    project_id: nonEmpty('project_id'),
    credentials_path: nonEmpty('credentials_path').nullish(),
    database: databaseSchema.partial().optional(),
    subscriptions: z.array(subscriptionEntrySchema).min(1).optional(),
    // single-subscription layout
    subscription_name: nonEmpty('subscription_name').optional(),
    working_dir: nonEmpty('working_dir').optional(),
    extra_args: argsSchema.optional(),
    ...sharedKeys,
  })
  .refine(
    (cfg) =>
      cfg.subscriptions !== undefined ||
      (cfg.subscription_name !== undefined && cfg.working_dir !== undefined),
    {
      message:
        'either subscriptions or subscription_name and working_dir must be set',
      path: ['subscriptions'],
    },
  );

export type AgentConfigFile = z.infer<typeof agentConfigFileSchema>;
export type SubscriptionEntry = z.infer<typeof subscriptionEntrySchema>;
