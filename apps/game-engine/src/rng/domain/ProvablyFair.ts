import { createHmac, createHash, randomBytes } from 'crypto';
import { CrashPoint } from '@shared/kernel/CrashPoint';
import { InvalidSeedError } from '@shared/kernel/DomainError';

export const FAIRNESS_VERSION = 1;

/** Published per round so the crash point can be re-derived later. */
export interface FairnessParams {
  readonly version: number;
  readonly houseEdgePercent: number;
  readonly maxMultiplier: number;
}

export interface RevealedRound {
  serverSeed: string;
  clientSeed: string;
  nonce: number;
  commitHash: string;
  fairness: FairnessParams;
  crashMultiplier: number | null;
}

const HASH_SLICE = 13;
const E = 2 ** 52;

export class ProvablyFair {
  static generateSeed(): string {
    return randomBytes(32).toString('hex');
  }

  static commitHash(serverSeed: string, clientSeed: string, nonce: number): string {
    return createHash('sha256')
      .update(`${serverSeed}:${clientSeed}:${nonce}`)
      .digest('hex');
  }

  static calculateCrashPoint(
    serverSeed: string,
    clientSeed: string,
    nonce: number,
    fairness: FairnessParams,
  ): CrashPoint {
    if (serverSeed.length === 0) {
      throw new InvalidSeedError('Server seed must not be empty');
    }
    const hmac = createHmac('sha256', serverSeed)
      .update(`${clientSeed}:${nonce}`)
      .digest('hex');
    return ProvablyFair.crashPointFromHash(hmac, fairness);
  }

  /**
   * Maps the first 52 bits of an HMAC digest onto the crash distribution:
   * floor((100 - edge) * 2^52 / (2^52 - h)) / 100, clamped to [1.00, max].
   */
  static crashPointFromHash(hex: string, fairness: FairnessParams): CrashPoint {
    if (fairness.version !== FAIRNESS_VERSION) {
      throw new InvalidSeedError(`Unsupported fairness version ${fairness.version}`);
    }
    if (!/^[0-9a-f]+$/i.test(hex) || hex.length < HASH_SLICE) {
      throw new InvalidSeedError('Digest must be at least 13 hex characters');
    }
    const edge = fairness.houseEdgePercent;
    if (!(edge >= 0 && edge < 100)) {
      throw new InvalidSeedError(`House edge out of range: ${edge}`);
    }

    const h = parseInt(hex.substring(0, HASH_SLICE), 16);
    const raw = Math.floor(((100 - edge) * E) / (E - h)) / 100;

    return CrashPoint.of(Math.min(fairness.maxMultiplier, Math.max(1.0, raw)));
  }

  static verify(round: RevealedRound): boolean {
    const expectedHash = ProvablyFair.commitHash(
      round.serverSeed,
      round.clientSeed,
      round.nonce,
    );
    if (expectedHash !== round.commitHash) return false;
    if (round.crashMultiplier === null) return true;

    const calculated = ProvablyFair.calculateCrashPoint(
      round.serverSeed,
      round.clientSeed,
      round.nonce,
      round.fairness,
    );
    return calculated.value === round.crashMultiplier;
  }
}
