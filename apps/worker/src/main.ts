import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { logger, onShutdown } from '@dispatch/shared';
import { AppModule } from './app.module';
import { loadAgentConfig } from './config/agent-config';
import { WorkerService } from './worker.service';

async function bootstrap() {
  const config = await loadAgentConfig();
  const app = await NestFactory.createApplicationContext(AppModule.register(config), {
    logger: false,
  });

  const workerService = app.get(WorkerService);

  onShutdown(async (signal) => {
    logger.info({ service: 'worker', signal }, 'worker stopping');
    await workerService.stop();
    await app.close();
    logger.info({ service: 'worker' }, 'worker stopped');
  });
}

bootstrap().catch((err) => {
  console.error(err);
  process.exit(1);
});
