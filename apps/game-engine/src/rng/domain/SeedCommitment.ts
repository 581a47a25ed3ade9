import { FairnessParams } from './ProvablyFair';

/**
 * Public half of a round's fairness commitment. The server seed
 * stays in the vault until the round closes.
 */
export interface SeedCommitment {
  readonly id: string;
  readonly commitHash: string;
  readonly clientSeed: string;
  readonly nonce: number;
  readonly fairness: FairnessParams;
}
