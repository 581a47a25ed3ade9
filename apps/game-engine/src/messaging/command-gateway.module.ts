import { Inject, Module, OnApplicationBootstrap, OnApplicationShutdown } from '@nestjs/common';
import { NatsConnection } from 'nats';
import { GameConfigModule } from '@config/config.module';
import { NATS_TOPICS } from '@config/env-config.provider';
import { LOGGER } from '@shared/infrastructure/shared.module';
import { Logger } from '@shared/ports/Logger';
import {
  BettingModule,
  CASHOUT_USE_CASE,
  GET_BET_USE_CASE,
  PLACE_BET_USE_CASE,
} from '@betting/infrastructure/betting.module';
import { EngineModule, GET_ROUND_STATE_USE_CASE } from '@engine/infrastructure/engine.module';
import {
  HistoryModule,
  GET_RECENT_ROUNDS_USE_CASE,
  VERIFY_ROUND_USE_CASE,
} from '@history/infrastructure/history.module';
import { PlaceBetUseCase } from '@betting/application/PlaceBetUseCase';
import { CashoutUseCase } from '@betting/application/CashoutUseCase';
import { GetBetUseCase } from '@betting/application/GetBetUseCase';
import { GetRoundStateUseCase } from '@engine/application/GetRoundStateUseCase';
import { GetRecentRoundsUseCase } from '@history/application/GetRecentRoundsUseCase';
import { VerifyRoundUseCase } from '@history/application/VerifyRoundUseCase';
import { MessagingModule } from './messaging.module';
import { NatsCommandHandler } from './NatsCommandHandler';
import { GameTopics } from './topics';
import { COMMAND_HANDLER, NATS_CONNECTION } from './tokens';

@Module({
  imports: [GameConfigModule, MessagingModule, BettingModule, EngineModule, HistoryModule],
  providers: [
    {
      provide: COMMAND_HANDLER,
      useFactory: (
        nats: NatsConnection,
        topics: GameTopics,
        placeBet: PlaceBetUseCase,
        cashout: CashoutUseCase,
        getRoundState: GetRoundStateUseCase,
        getRecentRounds: GetRecentRoundsUseCase,
        verifyRound: VerifyRoundUseCase,
        getBet: GetBetUseCase,
        logger: Logger,
      ): NatsCommandHandler =>
        new NatsCommandHandler(
          nats,
          topics,
          { placeBet, cashout, getRoundState, getRecentRounds, verifyRound, getBet },
          logger,
        ),
      inject: [
        NATS_CONNECTION,
        NATS_TOPICS,
        PLACE_BET_USE_CASE,
        CASHOUT_USE_CASE,
        GET_ROUND_STATE_USE_CASE,
        GET_RECENT_ROUNDS_USE_CASE,
        VERIFY_ROUND_USE_CASE,
        GET_BET_USE_CASE,
        LOGGER,
      ],
    },
  ],
  exports: [COMMAND_HANDLER],
})
export class CommandGatewayModule implements OnApplicationBootstrap, OnApplicationShutdown {
  constructor(@Inject(COMMAND_HANDLER) private readonly handler: NatsCommandHandler) {}

  onApplicationBootstrap(): void {
    this.handler.listen();
  }

  async onApplicationShutdown(): Promise<void> {
    await this.handler.close();
  }
}
