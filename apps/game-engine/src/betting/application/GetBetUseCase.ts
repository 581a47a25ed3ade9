import { BetSnapshot } from '@shared/kernel/BetSnapshot';
import { RoundRegistry } from '@betting/application/ports/RoundRegistry';
import { toBetSnapshot } from '@betting/application/mappers/toBetSnapshot';

export class GetBetUseCase {
  constructor(private readonly registry: RoundRegistry) {}

  execute(betId: string): BetSnapshot | null {
    const bet = this.registry.findBet(betId);
    return bet ? toBetSnapshot(bet) : null;
  }
}
