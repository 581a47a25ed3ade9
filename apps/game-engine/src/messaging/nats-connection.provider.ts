import { Provider } from '@nestjs/common';
import { connect, DebugEvents, Events, NatsConnection, Status } from 'nats';
import { VALIDATED_ENV } from '@config/env-config.provider';
import { RawGameConfig } from '@config/game-config.schema';
import { Logger } from '@shared/ports/Logger';
import { LOGGER } from '@shared/infrastructure/shared.module';
import { NATS_CONNECTION } from './tokens';

type StatusLevel = 'warn' | 'error';

const STATUS_LOG: Partial<Record<Status['type'], { level: StatusLevel; message: string }>> = {
  [Events.Disconnect]: { level: 'warn', message: 'NATS disconnected' },
  [Events.Reconnect]: { level: 'warn', message: 'NATS reconnected' },
  [Events.Error]: { level: 'error', message: 'NATS error' },
  [Events.LDM]: { level: 'warn', message: 'NATS server entering lame duck mode' },
  [DebugEvents.Reconnecting]: { level: 'warn', message: 'NATS reconnecting' },
};

/**
 * One connection per process, named after the operator so server-side
 * monitoring can tell engines apart. Reconnects forever.
 */
export const natsConnectionProvider: Provider<NatsConnection> = {
  provide: NATS_CONNECTION,
  useFactory: async (env: RawGameConfig, logger: Logger): Promise<NatsConnection> => {
    const nc = await connect({
      servers: env.NATS_URL,
      name: `crash-round-engine:${env.OPERATOR_ID}`,
      maxReconnectAttempts: -1,
      reconnectTimeWait: 2_000,
      waitOnFirstConnect: true,
    });

    logger.info('NATS connected', { server: nc.getServer(), operatorId: env.OPERATOR_ID });
    watchStatus(nc, logger).catch((err: unknown) => {
      logger.error('NATS status monitor crashed', {
        error: err instanceof Error ? err.message : String(err),
      });
    });

    return nc;
  },
  inject: [VALIDATED_ENV, LOGGER],
};

async function watchStatus(nc: NatsConnection, logger: Logger): Promise<void> {
  for await (const status of nc.status()) {
    const entry = STATUS_LOG[status.type];
    if (entry) {
      logger[entry.level](entry.message, { data: String(status.data) });
    }
  }
}
