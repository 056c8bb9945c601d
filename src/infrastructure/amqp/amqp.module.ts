import { Global, Module } from '@nestjs/common';
import { AMQP_CONNECTOR, AmqpConnector, connectAmqp } from './amqp-client';

@Global()
@Module({
  providers: [
    {
      provide: AMQP_CONNECTOR,
      useFactory: (): AmqpConnector => connectAmqp,
    },
  ],
  exports: [AMQP_CONNECTOR],
})
export class AmqpModule {}
