import { DynamicModule, Module } from '@nestjs/common';
import { getNamedLogger, logger } from '@dispatch/shared';
import { MESSAGE_BUS, type MessageBus } from './bus/bus.types';
import { PubSubMessageBus } from './bus/pubsub.bus';
import { AGENT_CONFIG, type AgentConfig, type WorkerConfig } from './config/agent-config';
import { db } from './db';
import { COMMAND_RUNNER, type CommandRunner, ExecaCommandRunner } from './dispatch/command-runner';
import { ERROR_LOG_SINK, type ErrorLogSink, NoopErrorLogSink } from './error-log/error-log.sink';
import { PgErrorLogSink } from './error-log/pg-error-log.sink';
import { WorkerSupervisor } from './supervisor/worker-supervisor';
import { SUPERVISOR_FACTORY, WorkerService } from './worker.service';

export function createErrorLogSink(config: AgentConfig): ErrorLogSink {
  if (!config.database) {
    logger.warn(
      { service: 'worker', missing: config.missingDatabaseFields },
      'DB config missing, error log disabled',
    );
    return new NoopErrorLogSink();
  }
  return new PgErrorLogSink(db(config.database), logger);
}

@Module({})
export class AppModule {
  static register(config: AgentConfig): DynamicModule {
    return {
      module: AppModule,
      providers: [
        { provide: AGENT_CONFIG, useValue: config },
        {
          provide: MESSAGE_BUS,
          useFactory: () =>
            new PubSubMessageBus({
              projectId: config.projectId,
              credentialsPath: config.credentialsPath,
            }),
        },
        { provide: ERROR_LOG_SINK, useFactory: () => createErrorLogSink(config) },
        { provide: COMMAND_RUNNER, useClass: ExecaCommandRunner },
        {
          provide: SUPERVISOR_FACTORY,
          inject: [MESSAGE_BUS, ERROR_LOG_SINK, COMMAND_RUNNER],
          useFactory:
            (bus: MessageBus, errorLog: ErrorLogSink, runner: CommandRunner) =>
            (worker: WorkerConfig) =>
              new WorkerSupervisor(worker, {
                bus,
                errorLog,
                runner,
                logger: getNamedLogger(`worker-${worker.subscriptionName}`, {
                  logDir: worker.logDir,
                  bindings: { service: 'worker', subscription: worker.subscriptionName },
                }),
              }),
        },
        WorkerService,
      ],
    };
  }
}
