import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { LOGGER } from '@shared/infrastructure/shared.module';
import { Logger } from '@shared/ports/Logger';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, { logger: ['error', 'warn'] });
  const logger = app.get<Logger>(LOGGER);

  logger.info('Round engine started', { operatorId: process.env.OPERATOR_ID });

  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info('Shutting down', { signal });
    await app.close();
    logger.info('Shutdown complete');
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((err: unknown) => {
      logger.error('Shutdown failed', { error: err instanceof Error ? err.message : String(err) });
      process.exitCode = 1;
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

bootstrap().catch((err) => {
  console.error('[RoundEngine] Fatal bootstrap error:', err);
  process.exit(1);
});
