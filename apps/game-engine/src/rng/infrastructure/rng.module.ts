import { Module } from '@nestjs/common';
import { GameConfigModule } from '@config/config.module';
import { FAIRNESS_PARAMS, VALIDATED_ENV } from '@config/env-config.provider';
import { RawGameConfig } from '@config/game-config.schema';
import { FairnessParams } from '@rng/domain/ProvablyFair';
import { FairnessCommitter } from '@rng/application/FairnessCommitter';
import { SeedVault } from '@rng/application/ports/SeedVault';
import { ServerSeedProvider } from '@rng/application/ports/ServerSeedProvider';
import { ClientSeedProvider } from '@rng/application/ports/ClientSeedProvider';
import { InMemorySeedVault } from '@rng/infrastructure/InMemorySeedVault';
import { RandomServerSeedProvider } from '@rng/infrastructure/RandomServerSeedProvider';
import {
  FixedClientSeedProvider,
  RandomClientSeedProvider,
} from '@rng/infrastructure/ClientSeedProviders';

export const SEED_VAULT = 'SeedVault';
export const SERVER_SEED_PROVIDER = 'ServerSeedProvider';
export const CLIENT_SEED_PROVIDER = 'ClientSeedProvider';
export const FAIRNESS_COMMITTER = 'FairnessCommitter';

@Module({
  imports: [GameConfigModule],
  providers: [
    // ── Port → Implementation mappings ──────────────────
    {
      provide: SEED_VAULT,
      useFactory: (): SeedVault => new InMemorySeedVault(),
    },
    {
      provide: SERVER_SEED_PROVIDER,
      useFactory: (): ServerSeedProvider => new RandomServerSeedProvider(),
    },
    {
      provide: CLIENT_SEED_PROVIDER,
      useFactory: (env: RawGameConfig): ClientSeedProvider =>
        env.CLIENT_SEED
          ? new FixedClientSeedProvider(env.CLIENT_SEED)
          : new RandomClientSeedProvider(),
      inject: [VALIDATED_ENV],
    },

    // ── Application services ────────────────────────────
    {
      provide: FAIRNESS_COMMITTER,
      useFactory: (
        vault: SeedVault,
        serverSeedProvider: ServerSeedProvider,
        fairness: FairnessParams,
      ): FairnessCommitter => new FairnessCommitter(vault, serverSeedProvider, fairness),
      inject: [SEED_VAULT, SERVER_SEED_PROVIDER, FAIRNESS_PARAMS],
    },
  ],
  exports: [FAIRNESS_COMMITTER, CLIENT_SEED_PROVIDER],
})
export class RngModule {}
