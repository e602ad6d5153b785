import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import { logger } from '@dispatch/shared';
import { MESSAGE_BUS, type MessageBus } from './bus/bus.types';
import { AGENT_CONFIG, type AgentConfig, type WorkerConfig } from './config/agent-config';
import { ERROR_LOG_SINK, type ErrorLogSink } from './error-log/error-log.sink';

export type Supervisor = {
  readonly config: WorkerConfig;
  start(): Promise<void>;
  stop(): Promise<void>;
};

export type SupervisorFactory = (config: WorkerConfig) => Supervisor;

export const SUPERVISOR_FACTORY = Symbol('SUPERVISOR_FACTORY');

/**
 * Runs one supervisor per configured subscription, concurrently.
 */
@Injectable()
export class WorkerService implements OnModuleInit {
  private supervisors: Supervisor[] = [];
  private running: Promise<void> = Promise.resolve();

  constructor(
    @Inject(AGENT_CONFIG) private readonly config: AgentConfig,
    @Inject(SUPERVISOR_FACTORY) private readonly createSupervisor: SupervisorFactory,
    @Inject(MESSAGE_BUS) private readonly bus: MessageBus,
    @Inject(ERROR_LOG_SINK) private readonly errorLog: ErrorLogSink,
  ) {}

  onModuleInit() {
    this.supervisors = this.config.subscriptions.map((sub) => this.createSupervisor(sub));
    logger.info(
      { service: 'worker', workers: this.supervisors.length },
      'worker started',
    );
    this.running = Promise.all(
      this.supervisors.map((supervisor) =>
        supervisor.start().catch((error: unknown) => {
          logger.error(
            { service: 'worker', subscription: supervisor.config.subscriptionName, error },
            'supervisor failed to start',
          );
        }),
      ),
    ).then(() => undefined);
  }

  /** Resolves once every supervisor has drained its backlog and subscribed. */
  started(): Promise<void> {
    return this.running;
  }

  async stop() {
    await Promise.all(this.supervisors.map((supervisor) => supervisor.stop()));
    await this.running;
    const results = await Promise.allSettled([this.bus.close(), this.errorLog.close()]);
    for (const result of results) {
      if (result.status === 'rejected') {
        logger.error({ service: 'worker', error: result.reason }, 'client close failed');
      }
    }
  }
}
