import { Round } from '@engine/domain/Round';
import { RoundPhase } from '@engine/domain/RoundPhase';
import { FairnessParams } from '@rng/domain/ProvablyFair';
import { InvalidStateTransition } from '@shared/kernel/DomainError';

export type RoundOutcome = 'SETTLED' | 'VOIDED';

export interface RoundHistoryEntry {
  readonly roundId: number;
  readonly outcome: RoundOutcome;
  readonly voidReason: string | null;
  readonly commitHash: string;
  /** Null only when a voided round's seed could not be revealed. */
  readonly serverSeed: string | null;
  readonly clientSeed: string;
  readonly nonce: number;
  readonly fairness: FairnessParams;
  /** Null when the round was voided before the crash point was derived. */
  readonly crashMultiplier: number | null;
  readonly betCount: number;
  readonly totalWageredCents: number;
  readonly totalPaidOutCents: number;
  readonly totalRefundedCents: number;
  readonly startOfFlightTime: number | null;
  readonly crashTime: number | null;
  readonly recordedAt: number;
}

export function createHistoryEntry(
  round: Round,
  serverSeed: string | null,
  recordedAt: number,
): RoundHistoryEntry {
  if (round.phase !== RoundPhase.SETTLED && round.phase !== RoundPhase.VOIDED) {
    throw new InvalidStateTransition(
      `Round ${round.id} cannot be archived in phase ${round.phase}`,
    );
  }

  const totals = round.bets.totals();
  const { commitment } = round;
  const outcome: RoundOutcome = round.phase === RoundPhase.SETTLED ? 'SETTLED' : 'VOIDED';

  return Object.freeze({
    roundId: round.id,
    outcome,
    voidReason: round.voidReason,
    commitHash: commitment.commitHash,
    serverSeed,
    clientSeed: commitment.clientSeed,
    nonce: commitment.nonce,
    fairness: Object.freeze({ ...commitment.fairness }),
    crashMultiplier: round.revealedCrashPoint?.value ?? null,
    betCount: round.bets.size,
    totalWageredCents: totals.wageredCents,
    totalPaidOutCents: totals.paidOutCents,
    totalRefundedCents: totals.refundedCents,
    startOfFlightTime: round.startOfFlightTime,
    crashTime: round.crashTime,
    recordedAt,
  });
}
