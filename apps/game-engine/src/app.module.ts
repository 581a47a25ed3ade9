import {
  BeforeApplicationShutdown,
  Inject,
  Module,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { GameConfigModule } from '@config/config.module';
import { SharedModule, LOGGER } from '@shared/infrastructure/shared.module';
import { Logger } from '@shared/ports/Logger';
import { MessagingModule } from '@messaging/messaging.module';
import { CommandGatewayModule } from '@messaging/command-gateway.module';
import { RngModule } from '@rng/infrastructure/rng.module';
import {
  BettingModule,
  ACCOUNT_LEDGER,
  CREDIT_DISPATCHER,
} from '@betting/infrastructure/betting.module';
import { HistoryModule } from '@history/infrastructure/history.module';
import { EngineModule, ROUND_SCHEDULER } from '@engine/infrastructure/engine.module';
import { RoundScheduler } from '@engine/application/RoundScheduler';
import { CreditDispatcher } from '@betting/application/CreditDispatcher';
import { AccountLedger } from '@betting/application/ports/AccountLedger';

@Module({
  imports: [
    GameConfigModule,
    SharedModule,
    MessagingModule,
    RngModule,
    BettingModule,
    HistoryModule,
    EngineModule,
    CommandGatewayModule,
  ],
})
export class AppModule
  implements OnApplicationBootstrap, BeforeApplicationShutdown, OnApplicationShutdown
{
  constructor(
    @Inject(ROUND_SCHEDULER) private readonly scheduler: RoundScheduler,
    @Inject(CREDIT_DISPATCHER) private readonly credits: CreditDispatcher,
    @Inject(ACCOUNT_LEDGER) private readonly ledger: AccountLedger,
    @Inject(LOGGER) private readonly logger: Logger,
  ) {}

  onApplicationBootstrap(): void {
    this.credits.resumeUnresolved();
    this.scheduler.start();
    this.logger.info('Round scheduler started');
  }

  // Runs before MessagingModule drains NATS.
  async beforeApplicationShutdown(): Promise<void> {
    this.scheduler.stop();
    await this.scheduler.drain();
    this.credits.stop();
    await this.credits.drain();
  }

  async onApplicationShutdown(): Promise<void> {
    await this.ledger.close?.();
    this.logger.info('Round engine stopped');
  }
}
