import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import {
  validatedEnvProvider,
  gameConfigProvider,
  fairnessParamsProvider,
  natsTopicsProvider,
  ledgerConfigProvider,
  creditRetryPolicyProvider,
  loggerOptionsProvider,
  VALIDATED_ENV,
  GAME_CONFIG,
  FAIRNESS_PARAMS,
  NATS_TOPICS,
  LEDGER_CONFIG,
  CREDIT_RETRY_POLICY,
  LOGGER_OPTIONS,
} from './env-config.provider';

@Module({
  imports: [
    ConfigModule.forRoot({
      envFilePath: ['.env.local', '.env'],
    }),
  ],
  providers: [
    validatedEnvProvider,
    gameConfigProvider,
    fairnessParamsProvider,
    natsTopicsProvider,
    ledgerConfigProvider,
    creditRetryPolicyProvider,
    loggerOptionsProvider,
  ],
  exports: [
    VALIDATED_ENV,
    GAME_CONFIG,
    FAIRNESS_PARAMS,
    NATS_TOPICS,
    LEDGER_CONFIG,
    CREDIT_RETRY_POLICY,
    LOGGER_OPTIONS,
  ],
})
export class GameConfigModule {}
