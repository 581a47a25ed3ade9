import { Money } from '@shared/kernel/Money';
import { CrashPoint } from '@shared/kernel/CrashPoint';
import { Bet } from '@betting/domain/Bet';
import { Round } from '@engine/domain/Round';
import { ProvablyFair } from '@rng/domain/ProvablyFair';
import { SeedCommitment } from '@rng/domain/SeedCommitment';
import { TEST_FAIRNESS, TEST_GAME_CONFIG } from './test-config';

export const OPENED_AT = 1_000_000;

export function makeCommitment(overrides: Partial<SeedCommitment> = {}): SeedCommitment {
  const nonce = overrides.nonce ?? 0;
  const clientSeed = overrides.clientSeed ?? 'test-client-seed';
  return {
    id: 'commitment-1',
    commitHash: ProvablyFair.commitHash('test-server-seed', clientSeed, nonce),
    clientSeed,
    nonce,
    fairness: TEST_FAIRNESS,
    ...overrides,
  };
}

export function makeRound(id = 1, commitment: SeedCommitment = makeCommitment()): Round {
  return new Round(
    id,
    commitment,
    OPENED_AT,
    OPENED_AT + TEST_GAME_CONFIG.bettingWindowMs,
    TEST_GAME_CONFIG.growthRate,
  );
}

export function makeBet(
  id: string,
  stakeCents: number,
  opts: { roundId?: number; accountId?: string; autoCashoutTarget?: number } = {},
): Bet {
  return new Bet(
    id,
    opts.accountId ?? `acc-${id}`,
    opts.roundId ?? 1,
    Money.fromCents(stakeCents),
    opts.autoCashoutTarget,
  );
}

/** Puts a round into FLIGHT at `startAt` with the given crash point; returns the deadline. */
export function launch(round: Round, crashPoint: number, startAt = round.bettingWindowEndsAt): number {
  round.closeAdmissions();
  return round.startFlight(CrashPoint.of(crashPoint), startAt);
}
