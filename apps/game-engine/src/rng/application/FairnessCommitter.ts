import { randomUUID } from 'crypto';
import { CrashPoint } from '@shared/kernel/CrashPoint';
import {
  FairnessDerivationFailedError,
  SeedNotRevealableError,
} from '@shared/kernel/DomainError';
import { FairnessParams, ProvablyFair } from '@rng/domain/ProvablyFair';
import { SeedCommitment } from '@rng/domain/SeedCommitment';
import { SeedVault } from './ports/SeedVault';
import { ServerSeedProvider } from './ports/ServerSeedProvider';

/**
 * Owns the commit/derive/reveal lifecycle of each round's server seed.
 *
 * A commitment is published while bets are open; the crash point is
 * derived from it once, after the window closes, and the seed is only
 * handed out once the round has been closed.
 */
export class FairnessCommitter {
  private readonly derived = new Map<string, CrashPoint>();
  private readonly closed = new Set<string>();

  constructor(
    private readonly vault: SeedVault,
    private readonly serverSeedProvider: ServerSeedProvider,
    private readonly fairness: FairnessParams,
    private nonce = 0,
  ) {}

  commit(clientSeed: string): SeedCommitment {
    const serverSeed = this.serverSeedProvider.next();
    const nonce = this.nonce++;
    const commitment: SeedCommitment = Object.freeze({
      id: randomUUID(),
      commitHash: ProvablyFair.commitHash(serverSeed, clientSeed, nonce),
      clientSeed,
      nonce,
      fairness: Object.freeze({ ...this.fairness }),
    });

    this.vault.store(commitment.id, serverSeed);
    return commitment;
  }

  /**
   * Idempotent: repeated calls return the point computed the first time.
   * Any failure is reported as FairnessDerivationFailedError.
   */
  deriveCrashPoint(commitment: SeedCommitment): CrashPoint {
    const cached = this.derived.get(commitment.id);
    if (cached) return cached;

    try {
      const serverSeed = this.vault.get(commitment.id);
      const hash = ProvablyFair.commitHash(
        serverSeed,
        commitment.clientSeed,
        commitment.nonce,
      );
      if (hash !== commitment.commitHash) {
        throw new Error('Stored server seed does not match the published commit hash');
      }

      const point = ProvablyFair.calculateCrashPoint(
        serverSeed,
        commitment.clientSeed,
        commitment.nonce,
        commitment.fairness,
      );
      this.derived.set(commitment.id, point);
      return point;
    } catch (err) {
      if (err instanceof FairnessDerivationFailedError) throw err;
      throw new FairnessDerivationFailedError(
        `Crash point derivation failed for commitment ${commitment.id}: ${
          err instanceof Error ? err.message : String(err)
        }`,
      );
    }
  }

  close(commitment: SeedCommitment): void {
    this.closed.add(commitment.id);
  }

  reveal(commitment: SeedCommitment): string {
    if (!this.closed.has(commitment.id)) {
      throw new SeedNotRevealableError(
        `Server seed for commitment ${commitment.id} is not revealable before the round closes`,
      );
    }
    return this.vault.get(commitment.id);
  }

  /** Drops all state for a commitment once its round is archived. */
  release(commitment: SeedCommitment): void {
    this.derived.delete(commitment.id);
    this.closed.delete(commitment.id);
    this.vault.delete(commitment.id);
  }
}
