import { Clock } from '@shared/ports/Clock';
import { RoundRegistry } from '@betting/application/ports/RoundRegistry';
import { Multiplier } from '@engine/domain/Multiplier';
import { RoundPhase } from '@engine/domain/RoundPhase';

export interface RoundView {
  roundId: number;
  phase: RoundPhase;
  /** Full precision; clients render `displayMultiplier`. */
  currentMultiplier: number;
  displayMultiplier: string;
  commitHash: string;
  clientSeed: string;
  nonce: number;
  bettingWindowEndsAt: number;
  startOfFlightTime: number | null;
  /** Only once the round has crashed. */
  crashMultiplier: number | null;
  betCount: number;
}

export class GetRoundStateUseCase {
  constructor(
    private readonly registry: RoundRegistry,
    private readonly clock: Clock,
  ) {}

  execute(): RoundView | null {
    const round = this.registry.current();
    if (!round) {
      return null;
    }

    const multiplier = round.multiplierAt(this.clock.now());

    return {
      roundId: round.id,
      phase: round.phase,
      currentMultiplier: multiplier,
      displayMultiplier: (Multiplier.toHundredths(multiplier) / 100).toFixed(2),
      commitHash: round.commitment.commitHash,
      clientSeed: round.commitment.clientSeed,
      nonce: round.commitment.nonce,
      bettingWindowEndsAt: round.bettingWindowEndsAt,
      startOfFlightTime: round.startOfFlightTime,
      crashMultiplier: round.revealedCrashPoint?.value ?? null,
      betCount: round.bets.size,
    };
  }
}
