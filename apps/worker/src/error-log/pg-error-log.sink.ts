import type { Pool } from 'pg';
import type { Logger } from 'pino';
import type { ErrorGenre } from '../retry/failure-classifier';
import type { ErrorLogSink } from './error-log.sink';

export class PgErrorLogSink implements ErrorLogSink {
  constructor(
    private readonly db: Pool,
    private readonly logger: Logger,
  ) {}

  /**
   * Inserts one row into crawler_error_logs. Failures are logged and
   * reported as `false`, never thrown.
   */
  async record(subscription: string, genre: ErrorGenre, at: Date): Promise<boolean> {
    try {
      const client = await this.db.connect();
      try {
        await client.query(
          `
          INSERT INTO crawler_error_logs (subscription_name, error_genre, created_at)
          VALUES ($1, $2, $3)
          `,
          [subscription, genre, at],
        );
      } finally {
        client.release();
      }
      this.logger.info(
        { service: 'worker', subscription, error_genre: genre },
        'error log saved',
      );
      return true;
    } catch (error) {
      this.logger.error(
        { service: 'worker', subscription, error_genre: genre, error },
        'error log insert failed',
      );
      return false;
    }
  }

  async close(): Promise<void> {
    await this.db.end();
  }
}
