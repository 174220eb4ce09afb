import 'reflect-metadata';
import 'dotenv/config';
import { NestFactory } from '@nestjs/core';
import { createLogger } from './logger/create-logger';
import { WorkerModule } from './worker.module';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(WorkerModule, {
    bufferLogs: true,
  });
  const logger = createLogger();
  app.useLogger(logger);

  // SIGTERM stops the poll interval and waits for the batch in flight.
  app.enableShutdownHooks();

  logger.log('Task worker started', 'Worker');
}

bootstrap().catch((err: unknown) => {
  console.error('Error during worker bootstrap:', err);
  process.exit(1);
});
