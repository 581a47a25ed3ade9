import { Module, OnApplicationShutdown, Inject } from '@nestjs/common';
import { NatsConnection } from 'nats';
import { GameConfigModule } from '@config/config.module';
import { NatsEventPublisher } from './NatsEventPublisher';
import { natsConnectionProvider } from './nats-connection.provider';
import { NATS_CONNECTION, EVENT_PUBLISHER } from './tokens';

@Module({
  imports: [GameConfigModule],
  providers: [natsConnectionProvider, { provide: EVENT_PUBLISHER, useClass: NatsEventPublisher }],
  exports: [NATS_CONNECTION, EVENT_PUBLISHER],
})
export class MessagingModule implements OnApplicationShutdown {
  constructor(@Inject(NATS_CONNECTION) private readonly nats: NatsConnection) {}

  async onApplicationShutdown(): Promise<void> {
    if (!this.nats.isClosed() && !this.nats.isDraining()) {
      await this.nats.drain();
    }
  }
}
