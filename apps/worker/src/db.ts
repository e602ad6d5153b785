import { Pool, type PoolConfig } from 'pg';
import type { DatabaseConfig } from './config/agent-config';

/** Bounds both the connect and each query, so a stalled server cannot hold a worker. */
export const DB_TIMEOUT_MS = 5_000;

export function poolConfig(config: DatabaseConfig): PoolConfig {
  return {
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    max: 2,
    connectionTimeoutMillis: DB_TIMEOUT_MS,
    query_timeout: DB_TIMEOUT_MS,
  };
}

export function db(config: DatabaseConfig): Pool {
  return new Pool(poolConfig(config));
}
