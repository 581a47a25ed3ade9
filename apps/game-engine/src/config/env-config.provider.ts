import { Provider } from '@nestjs/common';
import { GameConfig } from '@shared/kernel/GameConfig';
import { LoggerOptions } from '@shared/infrastructure/PinoLogger';
import { GameTopics, createTopics } from '@messaging/topics';
import { FairnessParams, FAIRNESS_VERSION } from '@rng/domain/ProvablyFair';
import { CreditRetryPolicy } from '@betting/application/CreditDispatcher';
import { gameConfigSchema, RawGameConfig } from './game-config.schema';

export const VALIDATED_ENV = 'VALIDATED_ENV';
export const GAME_CONFIG = 'GAME_CONFIG';
export const NATS_TOPICS = 'NATS_TOPICS';
export const FAIRNESS_PARAMS = 'FAIRNESS_PARAMS';
export const LEDGER_CONFIG = 'LEDGER_CONFIG';
export const CREDIT_RETRY_POLICY = 'CREDIT_RETRY_POLICY';
export const LOGGER_OPTIONS = 'LOGGER_OPTIONS';

export interface LedgerConfig {
  /** Absent: use the in-process ledger. */
  baseUrl?: string;
  timeoutMs: number;
}

export function parseEnv(env: NodeJS.ProcessEnv): RawGameConfig {
  const result = gameConfigSchema.safeParse(env);

  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`[GameConfig] Invalid environment variables:\n${messages}`);
  }

  return result.data;
}

/**
 * Runs Zod validation once at boot. All other providers
 * derive their values from this single source of truth.
 */
export const validatedEnvProvider: Provider<RawGameConfig> = {
  provide: VALIDATED_ENV,
  useFactory: (): RawGameConfig => parseEnv(process.env),
};

export const gameConfigProvider: Provider<GameConfig> = {
  provide: GAME_CONFIG,
  useFactory: (env: RawGameConfig): GameConfig => ({
    houseEdgePercent: env.HOUSE_EDGE_PERCENT,
    maxMultiplier: env.MAX_MULTIPLIER,
    minBetCents: env.MIN_BET_CENTS,
    maxBetCents: env.MAX_BET_CENTS,
    bettingWindowMs: env.BETTING_WINDOW_MS,
    tickIntervalMs: env.TICK_INTERVAL_MS,
    growthRate: env.GROWTH_RATE,
  }),
  inject: [VALIDATED_ENV],
};

export const fairnessParamsProvider: Provider<FairnessParams> = {
  provide: FAIRNESS_PARAMS,
  useFactory: (config: GameConfig): FairnessParams => ({
    version: FAIRNESS_VERSION,
    houseEdgePercent: config.houseEdgePercent,
    maxMultiplier: config.maxMultiplier,
  }),
  inject: [GAME_CONFIG],
};

/**
 * Infrastructure-only: operator-scoped NATS subjects.
 */
export const natsTopicsProvider: Provider<GameTopics> = {
  provide: NATS_TOPICS,
  useFactory: (env: RawGameConfig): GameTopics => createTopics(env.OPERATOR_ID),
  inject: [VALIDATED_ENV],
};

export const ledgerConfigProvider: Provider<LedgerConfig> = {
  provide: LEDGER_CONFIG,
  useFactory: (env: RawGameConfig): LedgerConfig => ({
    baseUrl: env.ACCOUNT_LEDGER_URL,
    timeoutMs: env.LEDGER_TIMEOUT_MS,
  }),
  inject: [VALIDATED_ENV],
};

export const creditRetryPolicyProvider: Provider<CreditRetryPolicy> = {
  provide: CREDIT_RETRY_POLICY,
  useFactory: (env: RawGameConfig): CreditRetryPolicy => ({
    baseDelayMs: env.CREDIT_RETRY_BASE_MS,
    maxDelayMs: env.CREDIT_RETRY_MAX_MS,
    alertAfterAttempts: env.CREDIT_ALERT_AFTER_ATTEMPTS,
  }),
  inject: [VALIDATED_ENV],
};

export const loggerOptionsProvider: Provider<LoggerOptions> = {
  provide: LOGGER_OPTIONS,
  useFactory: (env: RawGameConfig): LoggerOptions => ({
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  }),
  inject: [VALIDATED_ENV],
};
