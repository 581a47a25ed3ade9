import { RoundHistoryStore } from '@history/application/ports/RoundHistoryStore';
import { RoundRegistry } from '@betting/application/ports/RoundRegistry';
import { ProvablyFair } from '@rng/domain/ProvablyFair';

export type VerifyRoundResult =
  | {
      success: true;
      roundId: number;
      verified: boolean;
      commitHash: string;
      serverSeed: string;
      clientSeed: string;
      nonce: number;
      crashMultiplier: number | null;
    }
  | { success: false; error: 'ROUND_NOT_FOUND' | 'ROUND_NOT_REVEALED' };

/**
 * Recomputes a finished round's commit hash and crash point from its
 * revealed seed and the fairness parameters stored with it.
 */
export class VerifyRoundUseCase {
  constructor(
    private readonly historyStore: RoundHistoryStore,
    private readonly registry: RoundRegistry,
  ) {}

  execute(roundId: number): VerifyRoundResult {
    const entry = this.historyStore.findById(roundId);
    if (!entry) {
      const current = this.registry.current();
      if (current && current.id === roundId) {
        return { success: false, error: 'ROUND_NOT_REVEALED' };
      }
      return { success: false, error: 'ROUND_NOT_FOUND' };
    }
    if (entry.serverSeed === null) {
      return { success: false, error: 'ROUND_NOT_REVEALED' };
    }

    let verified: boolean;
    try {
      verified = ProvablyFair.verify({
        serverSeed: entry.serverSeed,
        clientSeed: entry.clientSeed,
        nonce: entry.nonce,
        commitHash: entry.commitHash,
        fairness: entry.fairness,
        crashMultiplier: entry.crashMultiplier,
      });
    } catch {
      verified = false;
    }

    return {
      success: true,
      roundId,
      verified,
      commitHash: entry.commitHash,
      serverSeed: entry.serverSeed,
      clientSeed: entry.clientSeed,
      nonce: entry.nonce,
      crashMultiplier: entry.crashMultiplier,
    };
  }
}
