import { Injectable, Inject } from '@nestjs/common';
import { NatsConnection } from 'nats';
import { EventPublisher, RoundBettingEvent } from '@engine/application/ports/EventPublisher';
import { PendingCredit } from '@betting/application/commands/PendingCredit';
import { Multiplier } from '@engine/domain/Multiplier';
import { RoundHistoryEntry } from '@history/domain/RoundHistoryEntry';
import { BetSnapshot } from '@shared/kernel/BetSnapshot';
import { Logger } from '@shared/ports/Logger';
import { LOGGER } from '@shared/infrastructure/shared.module';
import { NATS_TOPICS } from '@config/env-config.provider';
import { GameTopics } from './topics';
import { NATS_CONNECTION } from './tokens';

@Injectable()
export class NatsEventPublisher implements EventPublisher {
  private readonly encoder = new TextEncoder();

  constructor(
    @Inject(NATS_CONNECTION) private readonly nats: NatsConnection,
    @Inject(NATS_TOPICS) private readonly topics: GameTopics,
    @Inject(LOGGER) private readonly logger: Logger,
  ) {}

  async roundBetting(event: RoundBettingEvent): Promise<void> {
    this.safePublish(this.topics.ROUND_BETTING, event);
  }

  async roundStarted(roundId: number, startOfFlightTime: number): Promise<void> {
    this.safePublish(this.topics.ROUND_STARTED, { roundId, startOfFlightTime });
  }

  async tick(roundId: number, multiplier: number, elapsedMs: number): Promise<void> {
    this.safePublish(this.topics.TICK, {
      roundId,
      multiplier: Multiplier.toHundredths(multiplier) / 100,
      elapsedMs: Math.round(elapsedMs),
    });
  }

  async roundCrashed(entry: RoundHistoryEntry): Promise<void> {
    this.safePublish(this.topics.ROUND_CRASHED, entry);
  }

  async roundVoided(entry: RoundHistoryEntry): Promise<void> {
    this.safePublish(this.topics.ROUND_VOIDED, entry);
  }

  async betPlaced(bet: BetSnapshot): Promise<void> {
    this.safePublish(this.topics.BET_PLACED, bet);
  }

  async betCashedOut(bet: BetSnapshot): Promise<void> {
    this.safePublish(this.topics.BET_CASHED_OUT, bet);
  }

  async betLost(bet: BetSnapshot): Promise<void> {
    this.safePublish(this.topics.BET_LOST, bet);
  }

  async betVoided(bet: BetSnapshot): Promise<void> {
    this.safePublish(this.topics.BET_VOIDED, bet);
  }

  async creditFailed(record: PendingCredit): Promise<void> {
    this.safePublish(this.topics.CREDIT_FAILED, {
      creditId: record.id,
      kind: record.kind,
      accountId: record.accountId,
      roundId: record.roundId,
      betId: record.betId,
      amountCents: record.amountCents,
      attempts: record.attempts,
      reason: record.lastError,
    });
  }

  /**
   * Publishes a JSON payload to the given NATS subject.
   * Catches and logs any error without re-throwing;
   * a publish failure must never stop the round.
   */
  private safePublish(subject: string, payload: unknown): void {
    try {
      this.nats.publish(subject, this.encoder.encode(JSON.stringify(payload)));
    } catch (err) {
      this.logger.error('NATS publish failed', {
        subject,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
