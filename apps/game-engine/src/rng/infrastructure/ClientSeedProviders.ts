import { randomBytes } from 'crypto';
import { ClientSeedProvider } from '@rng/application/ports/ClientSeedProvider';

export class RandomClientSeedProvider implements ClientSeedProvider {
  next(): string {
    return randomBytes(16).toString('hex');
  }
}

/**
 * Uses one operator-published seed for every round, e.g. a public
 * block hash announced before the seed chain started.
 */
export class FixedClientSeedProvider implements ClientSeedProvider {
  constructor(private readonly seed: string) {
    if (seed.length === 0) throw new Error('Client seed must not be empty');
  }

  next(): string {
    return this.seed;
  }
}
