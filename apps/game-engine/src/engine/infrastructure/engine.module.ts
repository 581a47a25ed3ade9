import { Module } from '@nestjs/common';
import { GameConfigModule } from '@config/config.module';
import { GAME_CONFIG } from '@config/env-config.provider';
import { MessagingModule } from '@messaging/messaging.module';
import { EVENT_PUBLISHER } from '@messaging/tokens';
import { CLOCK, EVENT_TASKS, LOGGER } from '@shared/infrastructure/shared.module';
import {
  BettingModule,
  CASHOUT_USE_CASE,
  PLACE_BET_USE_CASE,
  ROUND_REGISTRY,
  SETTLE_ROUND_USE_CASE,
} from '@betting/infrastructure/betting.module';
import { RngModule, CLIENT_SEED_PROVIDER, FAIRNESS_COMMITTER } from '@rng/infrastructure/rng.module';
import { HistoryModule, ROUND_HISTORY_STORE } from '@history/infrastructure/history.module';
import { GameConfig } from '@shared/kernel/GameConfig';
import { Clock } from '@shared/ports/Clock';
import { Logger } from '@shared/ports/Logger';
import { EventPublisher } from '@engine/application/ports/EventPublisher';
import { TickScheduler } from '@engine/application/ports/TickScheduler';
import { Timer } from '@engine/application/ports/Timer';
import { PromiseTracker } from '@engine/application/PromiseTracker';
import { AutoCashoutMonitor } from '@engine/application/AutoCashoutMonitor';
import { RoundScheduler } from '@engine/application/RoundScheduler';
import { GetRoundStateUseCase } from '@engine/application/GetRoundStateUseCase';
import { SetIntervalTickScheduler } from '@engine/infrastructure/SetIntervalTickScheduler';
import { SetTimeoutTimer } from '@engine/infrastructure/SetTimeoutTimer';
import { FairnessCommitter } from '@rng/application/FairnessCommitter';
import { ClientSeedProvider } from '@rng/application/ports/ClientSeedProvider';
import { RoundRegistry } from '@betting/application/ports/RoundRegistry';
import { PlaceBetUseCase } from '@betting/application/PlaceBetUseCase';
import { CashoutUseCase } from '@betting/application/CashoutUseCase';
import { SettleRoundUseCase } from '@betting/application/SettleRoundUseCase';
import { RoundHistoryStore } from '@history/application/ports/RoundHistoryStore';

export const TICK_SCHEDULER = 'TickScheduler';
export const TIMER = 'Timer';
export const AUTO_CASHOUT_MONITOR = 'AutoCashoutMonitor';
export const ROUND_SCHEDULER = 'RoundScheduler';
export const GET_ROUND_STATE_USE_CASE = 'GetRoundStateUseCase';

@Module({
  imports: [GameConfigModule, MessagingModule, BettingModule, RngModule, HistoryModule],
  providers: [
    // ── Port → Implementation mappings ──────────────────
    {
      provide: TICK_SCHEDULER,
      useFactory: (config: GameConfig): TickScheduler =>
        new SetIntervalTickScheduler(config.tickIntervalMs),
      inject: [GAME_CONFIG],
    },
    {
      provide: TIMER,
      useFactory: (clock: Clock): Timer => new SetTimeoutTimer(clock),
      inject: [CLOCK],
    },

    // ── Application services ────────────────────────────
    {
      provide: AUTO_CASHOUT_MONITOR,
      useFactory: (cashoutUseCase: CashoutUseCase): AutoCashoutMonitor =>
        new AutoCashoutMonitor(cashoutUseCase),
      inject: [CASHOUT_USE_CASE],
    },
    {
      provide: ROUND_SCHEDULER,
      useFactory: (
        config: GameConfig,
        committer: FairnessCommitter,
        clientSeedProvider: ClientSeedProvider,
        registry: RoundRegistry,
        placeBetUseCase: PlaceBetUseCase,
        settleRoundUseCase: SettleRoundUseCase,
        autoCashoutMonitor: AutoCashoutMonitor,
        historyStore: RoundHistoryStore,
        eventPublisher: EventPublisher,
        tickScheduler: TickScheduler,
        timer: Timer,
        clock: Clock,
        events: PromiseTracker,
        logger: Logger,
      ): RoundScheduler =>
        new RoundScheduler(
          config,
          committer,
          clientSeedProvider,
          registry,
          placeBetUseCase,
          settleRoundUseCase,
          autoCashoutMonitor,
          historyStore,
          eventPublisher,
          tickScheduler,
          timer,
          clock,
          events,
          logger,
        ),
      inject: [
        GAME_CONFIG,
        FAIRNESS_COMMITTER,
        CLIENT_SEED_PROVIDER,
        ROUND_REGISTRY,
        PLACE_BET_USE_CASE,
        SETTLE_ROUND_USE_CASE,
        AUTO_CASHOUT_MONITOR,
        ROUND_HISTORY_STORE,
        EVENT_PUBLISHER,
        TICK_SCHEDULER,
        TIMER,
        CLOCK,
        EVENT_TASKS,
        LOGGER,
      ],
    },

    // ── Use cases ───────────────────────────────────────
    {
      provide: GET_ROUND_STATE_USE_CASE,
      useFactory: (registry: RoundRegistry, clock: Clock): GetRoundStateUseCase =>
        new GetRoundStateUseCase(registry, clock),
      inject: [ROUND_REGISTRY, CLOCK],
    },
  ],
  exports: [ROUND_SCHEDULER, GET_ROUND_STATE_USE_CASE],
})
export class EngineModule {}
