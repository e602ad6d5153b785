import type { Logger } from 'pino';
import type { WorkerConfig } from '../config/agent-config';
import { describeCause } from '../errors';
import type { DurableStage } from '../staging/durable-stage';
import type { StagedJob } from '../staging/staged-job.types';
import { buildCommand, type Command, formatCommand, parseJobBody } from './command';
import type { CommandRunner, ExecutionResult } from './command-runner';

export type JobSource = 'subscription' | 'queue';

export type DispatchOutcome =
  | { status: 'succeeded'; job: StagedJob; result: ExecutionResult }
  | {
      status: 'failed';
      job: StagedJob;
      result: ExecutionResult;
      reason: 'subprocess_failed' | 'unexpected_error';
    };

export class Dispatcher {
  constructor(
    private readonly stage: DurableStage,
    private readonly runner: CommandRunner,
    private readonly config: WorkerConfig,
    private readonly logger: Logger,
  ) {}

  /**
   * Runs one attempt of a staged job. The attempt is persisted before the
   * process starts; the staged file is removed only on exit status 0.
   */
  async execute(staged: StagedJob, source: JobSource): Promise<DispatchOutcome> {
    const job = await this.markAttempt(staged);
    const command = buildCommand(this.config, parseJobBody(job.body, job.id, this.logger));
    const context = { message_id: job.id, source, attempts: job.attempts };

    this.logger.info({ ...context, cmd: formatCommand(command) }, 'subprocess starting');
    const result = await this.run(command);
    const elapsedSec = Number((result.durationMs / 1000).toFixed(2));

    if (result.exitStatus === 0) {
      this.logger.info({ ...context, returncode: 0, elapsed_sec: elapsedSec }, 'subprocess finished');
      this.logOutput(result, 'warn');
      try {
        await this.stage.remove(job);
        this.logger.info({ message_id: job.id, path: job.path }, 'queue file removed');
      } catch (error) {
        this.logger.error({ message_id: job.id, path: job.path, error }, 'queue file could not be removed');
      }
      return { status: 'succeeded', job, result };
    }

    this.logger.error(
      {
        ...context,
        returncode: result.exitStatus,
        failure: result.failure,
        elapsed_sec: elapsedSec,
      },
      'subprocess failed',
    );
    this.logOutput(result, 'error');

    const reason = result.exitStatus === null ? 'unexpected_error' : 'subprocess_failed';
    const lastError =
      result.exitStatus === null
        ? `unexpected_error:${result.failure ?? 'unknown'}`
        : `subprocess_failed:${result.exitStatus}`;
    let failed: StagedJob = { ...job, lastError };
    try {
      failed = await this.stage.recordFailure(job, lastError);
    } catch (error) {
      this.logger.error({ message_id: job.id, path: job.path, error }, 'failure could not be persisted');
    }
    return { status: 'failed', job: failed, result, reason };
  }

  private async markAttempt(job: StagedJob): Promise<StagedJob> {
    try {
      return await this.stage.markAttempt(job);
    } catch (error) {
      this.logger.error({ message_id: job.id, path: job.path, error }, 'attempt could not be persisted');
      return { ...job, attempts: job.attempts + 1, lastAttemptAt: new Date() };
    }
  }

  private async run(command: Command): Promise<ExecutionResult> {
    const start = Date.now();
    try {
      return await this.runner.run(command, {
        cwd: this.config.workingDir,
        ...(this.config.jobTimeoutSec ? { timeoutMs: this.config.jobTimeoutSec * 1000 } : {}),
      });
    } catch (error) {
      return {
        exitStatus: null,
        stdout: '',
        stderr: '',
        durationMs: Date.now() - start,
        failure: describeCause(error),
      };
    }
  }

  private logOutput(result: ExecutionResult, stderrLevel: 'warn' | 'error'): void {
    if (result.stdout) {
      this.logger.info({ stdout: result.stdout.trimEnd() }, 'subprocess stdout');
    }
    if (result.stderr) {
      this.logger[stderrLevel]({ stderr: result.stderr.trimEnd() }, 'subprocess stderr');
    }
  }
}
