import { RawGameConfig } from '@config/game-config.schema';
import { GameConfig } from '@shared/kernel/GameConfig';
import { FairnessParams, FAIRNESS_VERSION } from '@rng/domain/ProvablyFair';
import { CreditRetryPolicy } from '@betting/application/CreditDispatcher';
import { createTopics } from '@messaging/topics';

export const TEST_RAW_CONFIG: RawGameConfig = {
  OPERATOR_ID: 'test-op',
  HOUSE_EDGE_PERCENT: 1,
  MAX_MULTIPLIER: 1000,
  MIN_BET_CENTS: 10,
  MAX_BET_CENTS: 100_000,
  BETTING_WINDOW_MS: 5000,
  TICK_INTERVAL_MS: 50,
  GROWTH_RATE: 0.00006,
  LEDGER_TIMEOUT_MS: 2000,
  CREDIT_RETRY_BASE_MS: 250,
  CREDIT_RETRY_MAX_MS: 30_000,
  CREDIT_ALERT_AFTER_ATTEMPTS: 5,
  HISTORY_CAPACITY: 1000,
  NATS_URL: 'nats://localhost:4222',
  LOG_LEVEL: 'silent',
  NODE_ENV: 'test',
};

export function toGameConfig(raw: RawGameConfig): GameConfig {
  return {
    houseEdgePercent: raw.HOUSE_EDGE_PERCENT,
    maxMultiplier: raw.MAX_MULTIPLIER,
    minBetCents: raw.MIN_BET_CENTS,
    maxBetCents: raw.MAX_BET_CENTS,
    bettingWindowMs: raw.BETTING_WINDOW_MS,
    tickIntervalMs: raw.TICK_INTERVAL_MS,
    growthRate: raw.GROWTH_RATE,
  };
}

export const TEST_GAME_CONFIG = toGameConfig(TEST_RAW_CONFIG);

export const TEST_FAIRNESS: FairnessParams = {
  version: FAIRNESS_VERSION,
  houseEdgePercent: TEST_RAW_CONFIG.HOUSE_EDGE_PERCENT,
  maxMultiplier: TEST_RAW_CONFIG.MAX_MULTIPLIER,
};

export const TEST_RETRY_POLICY: CreditRetryPolicy = {
  baseDelayMs: 250,
  maxDelayMs: 30_000,
  alertAfterAttempts: 5,
};

export const TEST_TOPICS = createTopics(TEST_RAW_CONFIG.OPERATOR_ID);
