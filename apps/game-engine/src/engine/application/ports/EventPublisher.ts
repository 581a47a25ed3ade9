import { BetSnapshot } from '@shared/kernel/BetSnapshot';
import { CreditFailedNotifier } from '@betting/application/ports/CreditFailedNotifier';
import { RoundHistoryEntry } from '@history/domain/RoundHistoryEntry';

export interface RoundBettingEvent {
  roundId: number;
  commitHash: string;
  clientSeed: string;
  nonce: number;
  bettingWindowEndsAt: number;
}

export interface EventPublisher extends CreditFailedNotifier {
  roundBetting(event: RoundBettingEvent): Promise<void>;
  roundStarted(roundId: number, startOfFlightTime: number): Promise<void>;
  tick(roundId: number, multiplier: number, elapsedMs: number): Promise<void>;
  roundCrashed(entry: RoundHistoryEntry): Promise<void>;
  roundVoided(entry: RoundHistoryEntry): Promise<void>;
  betPlaced(bet: BetSnapshot): Promise<void>;
  betCashedOut(bet: BetSnapshot): Promise<void>;
  betLost(bet: BetSnapshot): Promise<void>;
  betVoided(bet: BetSnapshot): Promise<void>;
}
