import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import type { ZodError } from 'zod';
import { ConfigError, type ConfigIssue, describeCause } from '../errors';
import {
  agentConfigFileSchema,
  databaseSchema,
  type AgentConfigFile,
  type SubscriptionEntry,
} from './agent-config.schema';

export const DEFAULT_CONFIG_FILE = 'agent_config.json';

export const AGENT_CONFIG = Symbol('AGENT_CONFIG');

export type WorkerConfig = {
  subscriptionName: string;
  workingDir: string;
  executablePath: string;
  baseArgs: string[];
  extraArgs: string[];
  /** Directory owned by this subscription alone. */
  stagingDir: string;
  logDir: string;
  retryTopic: string | null;
  maxRetries: number;
  jobTimeoutSec: number | null;
};

export type DatabaseConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
};

export type AgentConfig = {
  projectId: string;
  credentialsPath: string | null;
  /** Null when the error log table is not configured. */
  database: DatabaseConfig | null;
  missingDatabaseFields: string[];
  subscriptions: WorkerConfig[];
};

type DatabaseEnv = Partial<Record<'PGHOST' | 'PGPORT' | 'PGUSER' | 'PGPASSWORD' | 'PGDATABASE', string>>;

/**
 * Formats Zod errors into a stable, deterministic array of field errors.
 */
export function formatZodIssues(error: ZodError): ConfigIssue[] {
  const issues = error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : issue.code,
    message: issue.message,
  }));

  issues.sort((a, b) => {
    if (a.path !== b.path) {
      return a.path.localeCompare(b.path);
    }
    return a.message.localeCompare(b.message);
  });

  return issues;
}

function toWorkerConfig(
  entry: SubscriptionEntry,
  defaults: AgentConfigFile,
  source: string,
): WorkerConfig {
  const workingDir = entry.working_dir;
  const executablePath = entry.executable_path ?? defaults.executable_path;
  if (!executablePath) {
    throw new ConfigError(source, [
      {
        path: `subscriptions.${entry.subscription_name}.executable_path`,
        message: 'executable_path must be set per subscription or at the top level',
      },
    ]);
  }
  const stagingRoot = entry.staging_dir ?? defaults.staging_dir ?? path.join(workingDir, 'queue');

  return {
    subscriptionName: entry.subscription_name,
    workingDir,
    executablePath,
    baseArgs: entry.base_args ?? defaults.base_args ?? [],
    extraArgs: entry.extra_args,
    stagingDir: path.join(stagingRoot, entry.subscription_name),
    logDir: entry.log_dir ?? defaults.log_dir ?? path.join(workingDir, 'logs'),
    retryTopic: entry.retry_topic ?? defaults.retry_topic ?? null,
    maxRetries: entry.max_retries ?? defaults.max_retries ?? 0,
    jobTimeoutSec: entry.job_timeout_sec ?? defaults.job_timeout_sec ?? null,
  };
}

function resolveDatabase(
  file: AgentConfigFile,
  env: DatabaseEnv,
  source: string,
): Pick<AgentConfig, 'database' | 'missingDatabaseFields'> {
  const result = databaseSchema.safeParse({
    host: file.database?.host ?? env.PGHOST,
    port: file.database?.port ?? env.PGPORT,
    user: file.database?.user ?? env.PGUSER,
    password: file.database?.password ?? env.PGPASSWORD,
    database: file.database?.database ?? env.PGDATABASE,
  });
  if (!result.success) {
    throw new ConfigError(
      source,
      formatZodIssues(result.error).map((issue) => ({
        ...issue,
        path: `database.${issue.path}`,
      })),
    );
  }
  const database = result.data;
  const missing = (['host', 'user', 'password', 'database'] as const).filter(
    (key) => database[key] === '',
  );
  return missing.length === 0
    ? { database, missingDatabaseFields: [] }
    : { database: null, missingDatabaseFields: [...missing] };
}

/**
 * Validates a parsed config document and merges top-level defaults into
 * every subscription. Subscription-level keys take precedence.
 */
export function parseAgentConfig(
  input: unknown,
  source: string,
  env: DatabaseEnv = {},
): AgentConfig {
  const result = agentConfigFileSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(source, formatZodIssues(result.error));
  }
  const file = result.data;

  const entries: SubscriptionEntry[] = file.subscriptions ?? [
    {
      subscription_name: file.subscription_name ?? '',
      working_dir: file.working_dir ?? '',
      extra_args: file.extra_args ?? [],
    },
  ];

  const names = new Set<string>();
  for (const entry of entries) {
    if (names.has(entry.subscription_name)) {
      throw new ConfigError(source, [
        {
          path: 'subscriptions',
          message: `duplicate subscription_name ${entry.subscription_name}`,
        },
      ]);
    }
    names.add(entry.subscription_name);
  }

  return {
    projectId: file.project_id,
    credentialsPath: file.credentials_path ?? null,
    ...resolveDatabase(file, env, source),
    subscriptions: entries.map((entry) => toWorkerConfig(entry, file, source)),
  };
}

/**
 * Reads the agent configuration once at startup. The path comes from the
 * first CLI argument, then `AGENT_CONFIG`, then `./agent_config.json`.
 */
export async function loadAgentConfig(
  configPath: string = process.argv[2] ?? process.env.AGENT_CONFIG ?? DEFAULT_CONFIG_FILE,
): Promise<AgentConfig> {
  const resolved = path.resolve(configPath);
  let raw: string;
  try {
    raw = await fs.readFile(resolved, 'utf-8');
  } catch (error) {
    throw new ConfigError(resolved, [{ path: 'file', message: describeCause(error) }]);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(resolved, [{ path: 'file', message: describeCause(error) }]);
  }

  return parseAgentConfig(json, resolved, process.env);
}
