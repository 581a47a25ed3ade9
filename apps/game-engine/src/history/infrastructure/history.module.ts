import { Module } from '@nestjs/common';
import { GameConfigModule } from '@config/config.module';
import { VALIDATED_ENV } from '@config/env-config.provider';
import { RawGameConfig } from '@config/game-config.schema';
import { BettingModule, ROUND_REGISTRY } from '@betting/infrastructure/betting.module';
import { RoundRegistry } from '@betting/application/ports/RoundRegistry';
import { RoundHistoryStore } from '@history/application/ports/RoundHistoryStore';
import { GetRecentRoundsUseCase } from '@history/application/GetRecentRoundsUseCase';
import { VerifyRoundUseCase } from '@history/application/VerifyRoundUseCase';
import { InMemoryRoundHistoryStore } from '@history/infrastructure/InMemoryRoundHistoryStore';

export const ROUND_HISTORY_STORE = 'RoundHistoryStore';
export const GET_RECENT_ROUNDS_USE_CASE = 'GetRecentRoundsUseCase';
export const VERIFY_ROUND_USE_CASE = 'VerifyRoundUseCase';

@Module({
  imports: [GameConfigModule, BettingModule],
  providers: [
    {
      provide: ROUND_HISTORY_STORE,
      useFactory: (env: RawGameConfig): RoundHistoryStore =>
        new InMemoryRoundHistoryStore(env.HISTORY_CAPACITY),
      inject: [VALIDATED_ENV],
    },
    {
      provide: GET_RECENT_ROUNDS_USE_CASE,
      useFactory: (store: RoundHistoryStore): GetRecentRoundsUseCase =>
        new GetRecentRoundsUseCase(store),
      inject: [ROUND_HISTORY_STORE],
    },
    {
      provide: VERIFY_ROUND_USE_CASE,
      useFactory: (store: RoundHistoryStore, registry: RoundRegistry): VerifyRoundUseCase =>
        new VerifyRoundUseCase(store, registry),
      inject: [ROUND_HISTORY_STORE, ROUND_REGISTRY],
    },
  ],
  exports: [ROUND_HISTORY_STORE, GET_RECENT_ROUNDS_USE_CASE, VERIFY_ROUND_USE_CASE],
})
export class HistoryModule {}
