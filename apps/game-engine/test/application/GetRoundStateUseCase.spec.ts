import { GetRoundStateUseCase } from '@engine/application/GetRoundStateUseCase';
import { RoundPhase } from '@engine/domain/RoundPhase';
import { Multiplier } from '@engine/domain/Multiplier';
import { InMemoryRoundRegistry } from '@betting/infrastructure/InMemoryRoundRegistry';
import { ManualClock } from '../integration/helpers/fakes';
import { launch, makeBet, makeCommitment, makeRound } from '../integration/helpers/fixtures';

describe('GetRoundStateUseCase', () => {
  let clock: ManualClock;
  let registry: InMemoryRoundRegistry;
  let useCase: GetRoundStateUseCase;

  beforeEach(() => {
    clock = new ManualClock();
    registry = new InMemoryRoundRegistry();
    useCase = new GetRoundStateUseCase(registry, clock);
  });

  it('returns null before the first round', () => {
    expect(useCase.execute()).toBeNull();
  });

  it('describes a round taking bets', () => {
    const commitment = makeCommitment({ nonce: 3 });
    const round = makeRound(4, commitment);
    round.addBet(makeBet('b', 100, { roundId: 4 }));
    registry.open(round);

    expect(useCase.execute()).toEqual({
      roundId: 4,
      phase: RoundPhase.BETTING,
      currentMultiplier: 1,
      displayMultiplier: '1.00',
      commitHash: commitment.commitHash,
      clientSeed: 'test-client-seed',
      nonce: 3,
      bettingWindowEndsAt: round.bettingWindowEndsAt,
      startOfFlightTime: null,
      crashMultiplier: null,
      betCount: 1,
    });
  });

  it('reports the live multiplier without revealing the crash point', () => {
    const round = makeRound(1);
    registry.open(round);
    const start = round.bettingWindowEndsAt;
    launch(round, 5, start);
    clock.set(start + Multiplier.timeFor(1.234, 0.00006));

    const view = useCase.execute();

    expect(view?.phase).toBe(RoundPhase.FLIGHT);
    expect(view?.displayMultiplier).toBe('1.23');
    expect(view?.currentMultiplier).toBeCloseTo(1.234, 9);
    expect(view?.crashMultiplier).toBeNull();
    expect(view?.startOfFlightTime).toBe(start);
  });

  it('shows the crash point once crashed', () => {
    const round = makeRound(1);
    registry.open(round);
    const deadline = launch(round, 2.35);
    round.crash(deadline);
    clock.set(deadline + 100);

    const view = useCase.execute();

    expect(view?.crashMultiplier).toBe(2.35);
    expect(view?.displayMultiplier).toBe('2.35');
  });
});
