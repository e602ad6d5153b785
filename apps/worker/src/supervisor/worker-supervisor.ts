import { sleep as defaultSleep, type Sleep } from '@dispatch/shared';
import type { Logger } from 'pino';
import type { BusMessage, BusSubscription, MessageBus } from '../bus/bus.types';
import type { WorkerConfig } from '../config/agent-config';
import type { CommandRunner } from '../dispatch/command-runner';
import { Dispatcher, type JobSource } from '../dispatch/dispatcher';
import type { ErrorLogSink } from '../error-log/error-log.sink';
import { classifyExitStatus, type ErrorGenre } from '../retry/failure-classifier';
import { Resubmitter } from '../retry/resubmitter';
import { parseRetryCount } from '../retry/retry-count';
import { DurableStage } from '../staging/durable-stage';
import { RecoverySweep } from '../staging/recovery-sweep';
import type { StagedJob } from '../staging/staged-job.types';

export type SupervisorState =
  | 'starting'
  | 'draining_backlog'
  | 'listening'
  | 'staging'
  | 'dispatching'
  | 'retry_decision'
  | 'complete'
  | 'stopping'
  | 'stopped';

export type SupervisorDeps = {
  bus: MessageBus;
  errorLog: ErrorLogSink;
  runner: CommandRunner;
  logger: Logger;
  sleep?: Sleep;
  now?: () => Date;
};

/**
 * Owns one subscription: recovers the backlog, then consumes deliveries
 * one at a time. Every delivery is staged to disk before it is acked.
 */
export class WorkerSupervisor {
  readonly stage: DurableStage;
  private readonly recovery: RecoverySweep;
  private readonly dispatcher: Dispatcher;
  private readonly resubmitter: Resubmitter;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private current: SupervisorState = 'starting';
  private stopping = false;
  private slot: Promise<void> = Promise.resolve();
  private subscription: BusSubscription | null = null;
  private readonly shutdown = new AbortController();

  constructor(
    readonly config: WorkerConfig,
    private readonly deps: SupervisorDeps,
  ) {
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
    this.stage = new DurableStage(config.stagingDir, this.now);
    this.recovery = new RecoverySweep(this.stage, this.logger);
    this.dispatcher = new Dispatcher(this.stage, deps.runner, config, this.logger);
    this.resubmitter = new Resubmitter(
      deps.bus,
      {
        subscription: config.subscriptionName,
        retryTopic: config.retryTopic,
        maxRetries: config.maxRetries,
      },
      deps.sleep ?? defaultSleep,
      this.logger,
    );
  }

  get state(): SupervisorState {
    return this.current;
  }

  /**
   * Drains whatever a previous run left staged, then subscribes.
   * Resolves once the subscription is open (or the supervisor was stopped
   * while draining).
   */
  async start(): Promise<void> {
    const { subscriptionName, workingDir, executablePath, stagingDir } = this.config;
    this.logger.info(
      { working_dir: workingDir, executable_path: executablePath, staging_dir: stagingDir },
      'worker initialized',
    );

    this.transition('draining_backlog');
    const backlog = await this.recovery.sweep();
    this.enqueue(async () => {
      for (const job of backlog) {
        if (this.stopping) {
          return;
        }
        await this.processJob(job, 'queue', parseRetryCount(job.attributes, this.logger));
      }
    });
    await this.slot;
    if (this.stopping) {
      return;
    }

    this.subscription = this.deps.bus.subscribe(
      subscriptionName,
      {
        maxInFlight: 1,
        onError: (error) => this.logger.error({ error }, 'stream error'),
      },
      (message) => this.enqueue(() => this.handleDelivery(message)),
    );
    this.transition('listening');
    this.logger.info({ subscription: subscriptionName }, 'listening');
  }

  /**
   * Stops taking deliveries, interrupts a retry cooldown and waits for the
   * job in flight to finish. The job process itself is never killed.
   */
  async stop(): Promise<void> {
    if (this.stopping) {
      await this.slot;
      return;
    }
    this.stopping = true;
    this.current = 'stopping';
    this.shutdown.abort();

    if (this.subscription) {
      try {
        await this.subscription.close();
      } catch (error) {
        this.logger.error({ error }, 'subscription close failed');
      }
      this.subscription = null;
    }

    await this.slot;
    this.current = 'stopped';
    this.logger.info('worker stopped');
  }

  /** Resolves when every delivery received so far has been handled. */
  whenIdle(): Promise<void> {
    return this.slot;
  }

  private enqueue(task: () => Promise<void>): void {
    this.slot = this.slot.then(task).catch((error: unknown) => {
      this.logger.error({ error }, 'unexpected error in worker slot');
    });
  }

  private transition(next: SupervisorState): void {
    if (!this.stopping) {
      this.current = next;
    }
  }

  private async handleDelivery(message: BusMessage): Promise<void> {
    const context = { message_id: message.id };
    if (this.stopping) {
      message.nack();
      this.logger.info(context, 'worker stopping, NACK');
      return;
    }

    const retryCount = parseRetryCount(message.attributes, this.logger);
    this.logger.info(
      {
        ...context,
        retry_count: retryCount,
        attributes: message.attributes,
        data_len: message.body.length,
      },
      'message received',
    );

    this.transition('staging');
    const staged = await this.stage.stage(message.id, message.body, message.attributes);
    if (!staged.ok) {
      this.logger.error({ ...context, error: staged.error }, 'queue save failed, NACK');
      message.nack();
      this.transition('listening');
      return;
    }
    this.logger.info({ ...context, path: staged.job.path }, 'queue saved');

    message.ack();
    this.logger.info(context, 'ACKed early');

    await this.processJob(staged.job, 'subscription', retryCount);
    this.transition('listening');
  }

  private async processJob(job: StagedJob, source: JobSource, retryCount: number): Promise<void> {
    this.transition('dispatching');
    try {
      const outcome = await this.dispatcher.execute(job, source);
      if (outcome.status === 'succeeded') {
        this.transition('complete');
        this.logger.info(
          { message_id: job.id, elapsed_sec: Number((outcome.result.durationMs / 1000).toFixed(2)) },
          'done',
        );
        return;
      }

      this.transition('retry_decision');
      const genre = classifyExitStatus(outcome.result.exitStatus);
      if (genre) {
        // not awaited: the retry path never waits on the error log
        void this.recordError(genre);
      }

      const resubmit = await this.resubmitter.resubmit(
        outcome.job,
        genre,
        retryCount,
        outcome.reason,
        this.shutdown.signal,
      );
      if (resubmit.status === 'published' || resubmit.status === 'exhausted') {
        await this.release(outcome.job, resubmit.status);
      } else {
        this.logger.warn(
          { message_id: job.id, path: job.path, outcome: resubmit.status },
          'queue file kept for recovery',
        );
      }
    } catch (error) {
      this.logger.error({ message_id: job.id, source, error }, 'unexpected error');
    }
  }

  private async recordError(genre: ErrorGenre): Promise<void> {
    try {
      await this.deps.errorLog.record(this.config.subscriptionName, genre, this.now());
    } catch (error) {
      this.logger.error({ error_genre: genre, error }, 'error log sink failed');
    }
  }

  private async release(job: StagedJob, status: 'published' | 'exhausted'): Promise<void> {
    try {
      await this.stage.remove(job);
      this.logger.info(
        { message_id: job.id, path: job.path },
        status === 'published'
          ? 'queue file removed after retry publish'
          : 'queue file removed, retries exhausted',
      );
    } catch (error) {
      this.logger.error({ message_id: job.id, path: job.path, error }, 'queue file could not be removed');
    }
  }
}
