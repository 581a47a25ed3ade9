import { Global, Module } from '@nestjs/common';
import { GameConfigModule } from '@config/config.module';
import { LOGGER_OPTIONS } from '@config/env-config.provider';
import { Logger } from '@shared/ports/Logger';
import { Clock } from '@shared/ports/Clock';
import { PromiseTracker } from '@engine/application/PromiseTracker';
import { LoggerOptions, PinoLogger, createPinoInstance } from './PinoLogger';
import { SystemClock } from './SystemClock';

export const LOGGER = 'LOGGER';
export const CLOCK = 'CLOCK';
export const EVENT_TASKS = 'EVENT_TASKS';

const EVENT_HIGH_WATER_MARK = 1_000;

@Global()
@Module({
  imports: [GameConfigModule],
  providers: [
    {
      provide: LOGGER,
      useFactory: (options: LoggerOptions): Logger =>
        new PinoLogger(createPinoInstance(options)),
      inject: [LOGGER_OPTIONS],
    },
    {
      provide: CLOCK,
      useFactory: (): Clock => new SystemClock(),
    },
    {
      provide: EVENT_TASKS,
      useFactory: (logger: Logger): PromiseTracker =>
        new PromiseTracker('events', EVENT_HIGH_WATER_MARK, logger),
      inject: [LOGGER],
    },
  ],
  exports: [LOGGER, CLOCK, EVENT_TASKS],
})
export class SharedModule {}
