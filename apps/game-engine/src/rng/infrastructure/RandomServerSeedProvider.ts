import { ServerSeedProvider } from '@rng/application/ports/ServerSeedProvider';
import { ProvablyFair } from '@rng/domain/ProvablyFair';

export class RandomServerSeedProvider implements ServerSeedProvider {
  next(): string {
    return ProvablyFair.generateSeed();
  }
}
