/**
 * Round tuning shared by the engine and betting contexts.
 * Fairness parameters are published and stored with every round.
 */
export interface GameConfig {
  houseEdgePercent: number;
  maxMultiplier: number;
  minBetCents: number;
  maxBetCents: number;
  bettingWindowMs: number;
  tickIntervalMs: number;
  growthRate: number;
}
