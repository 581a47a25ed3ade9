import { Module } from '@nestjs/common';
import { GameConfigModule } from '@config/config.module';
import {
  CREDIT_RETRY_POLICY,
  GAME_CONFIG,
  LEDGER_CONFIG,
  LedgerConfig,
} from '@config/env-config.provider';
import { MessagingModule } from '@messaging/messaging.module';
import { EVENT_PUBLISHER } from '@messaging/tokens';
import { CLOCK, EVENT_TASKS, LOGGER } from '@shared/infrastructure/shared.module';
import { GameConfig } from '@shared/kernel/GameConfig';
import { Money } from '@shared/kernel/Money';
import { Clock } from '@shared/ports/Clock';
import { Logger } from '@shared/ports/Logger';
import { EventPublisher } from '@engine/application/ports/EventPublisher';
import { PromiseTracker } from '@engine/application/PromiseTracker';
import { AccountLedger } from '@betting/application/ports/AccountLedger';
import { PendingCreditStore } from '@betting/application/ports/PendingCreditStore';
import { RoundRegistry } from '@betting/application/ports/RoundRegistry';
import { CreditDispatcher, CreditRetryPolicy } from '@betting/application/CreditDispatcher';
import { PlaceBetUseCase } from '@betting/application/PlaceBetUseCase';
import { CashoutUseCase } from '@betting/application/CashoutUseCase';
import { SettleRoundUseCase } from '@betting/application/SettleRoundUseCase';
import { GetBetUseCase } from '@betting/application/GetBetUseCase';
import { InMemoryRoundRegistry } from '@betting/infrastructure/InMemoryRoundRegistry';
import { InMemoryPendingCreditStore } from '@betting/infrastructure/InMemoryPendingCreditStore';
import { InMemoryAccountLedger } from '@betting/infrastructure/InMemoryAccountLedger';
import { HttpAccountLedgerAdapter } from '@betting/infrastructure/HttpAccountLedgerAdapter';
import { TimeoutAccountLedger } from '@betting/infrastructure/TimeoutAccountLedger';

export const ROUND_REGISTRY = 'RoundRegistry';
export const ACCOUNT_LEDGER = 'AccountLedger';
export const PENDING_CREDIT_STORE = 'PendingCreditStore';
export const CREDIT_DISPATCHER = 'CreditDispatcher';
export const PLACE_BET_USE_CASE = 'PlaceBetUseCase';
export const CASHOUT_USE_CASE = 'CashoutUseCase';
export const SETTLE_ROUND_USE_CASE = 'SettleRoundUseCase';
export const GET_BET_USE_CASE = 'GetBetUseCase';

// Opening balance for accounts on the in-process ledger.
const DEV_OPENING_BALANCE = Money.fromCents(1_000_000);

@Module({
  imports: [GameConfigModule, MessagingModule],
  providers: [
    // ── Port → Implementation mappings ──────────────────
    {
      provide: ROUND_REGISTRY,
      useFactory: (): RoundRegistry => new InMemoryRoundRegistry(),
    },
    {
      provide: ACCOUNT_LEDGER,
      useFactory: (config: LedgerConfig, logger: Logger): AccountLedger => {
        if (!config.baseUrl) {
          logger.warn('ACCOUNT_LEDGER_URL not set; using the in-process account ledger');
          return new InMemoryAccountLedger(DEV_OPENING_BALANCE);
        }
        const http = new HttpAccountLedgerAdapter(
          { baseUrl: config.baseUrl, timeoutMs: config.timeoutMs },
          logger,
        );
        return new TimeoutAccountLedger(http, config.timeoutMs, logger);
      },
      inject: [LEDGER_CONFIG, LOGGER],
    },
    {
      provide: PENDING_CREDIT_STORE,
      useFactory: (): PendingCreditStore => new InMemoryPendingCreditStore(),
    },

    // ── Application services ────────────────────────────
    {
      provide: CREDIT_DISPATCHER,
      useFactory: (
        ledger: AccountLedger,
        store: PendingCreditStore,
        publisher: EventPublisher,
        policy: CreditRetryPolicy,
        clock: Clock,
        logger: Logger,
      ): CreditDispatcher => new CreditDispatcher(ledger, store, publisher, policy, clock, logger),
      inject: [ACCOUNT_LEDGER, PENDING_CREDIT_STORE, EVENT_PUBLISHER, CREDIT_RETRY_POLICY, CLOCK, LOGGER],
    },

    // ── Use cases ───────────────────────────────────────
    {
      provide: PLACE_BET_USE_CASE,
      useFactory: (
        config: GameConfig,
        registry: RoundRegistry,
        ledger: AccountLedger,
        credits: CreditDispatcher,
        publisher: EventPublisher,
        events: PromiseTracker,
        logger: Logger,
      ): PlaceBetUseCase =>
        new PlaceBetUseCase(config, registry, ledger, credits, publisher, events, logger),
      inject: [
        GAME_CONFIG,
        ROUND_REGISTRY,
        ACCOUNT_LEDGER,
        CREDIT_DISPATCHER,
        EVENT_PUBLISHER,
        EVENT_TASKS,
        LOGGER,
      ],
    },
    {
      provide: CASHOUT_USE_CASE,
      useFactory: (
        registry: RoundRegistry,
        credits: CreditDispatcher,
        publisher: EventPublisher,
        events: PromiseTracker,
        clock: Clock,
      ): CashoutUseCase => new CashoutUseCase(registry, credits, publisher, events, clock),
      inject: [ROUND_REGISTRY, CREDIT_DISPATCHER, EVENT_PUBLISHER, EVENT_TASKS, CLOCK],
    },
    {
      provide: SETTLE_ROUND_USE_CASE,
      useFactory: (
        credits: CreditDispatcher,
        publisher: EventPublisher,
        events: PromiseTracker,
      ): SettleRoundUseCase => new SettleRoundUseCase(credits, publisher, events),
      inject: [CREDIT_DISPATCHER, EVENT_PUBLISHER, EVENT_TASKS],
    },
    {
      provide: GET_BET_USE_CASE,
      useFactory: (registry: RoundRegistry): GetBetUseCase => new GetBetUseCase(registry),
      inject: [ROUND_REGISTRY],
    },
  ],
  exports: [
    ROUND_REGISTRY,
    ACCOUNT_LEDGER,
    CREDIT_DISPATCHER,
    PLACE_BET_USE_CASE,
    CASHOUT_USE_CASE,
    SETTLE_ROUND_USE_CASE,
    GET_BET_USE_CASE,
  ],
})
export class BettingModule {}
