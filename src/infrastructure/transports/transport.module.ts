import { Module } from '@nestjs/common';
import { BROKER_TRANSPORT, IBrokerTransport } from '../../application/ports/broker-transport.port';
import { ProtocolCodec } from '../../domain/services/protocol-codec.service';
import { AMQP_CONNECTOR, AmqpConnector } from '../amqp/amqp-client';
import { AmqpModule } from '../amqp/amqp.module';
import brokerConfig, { BrokerConfig, BrokerConfigType } from '../config/broker.config';
import { REDIS_CLIENT_FACTORY, RedisClientFactory } from '../redis/redis-client';
import { RedisModule } from '../redis/redis.module';
import { AmqpExchangeTransport } from './amqp-exchange.transport';
import { RedisPubSubTransport } from './redis-pubsub.transport';

export function createBrokerTransport(
  config: BrokerConfig,
  createRedisClient: RedisClientFactory,
  connectAmqp: AmqpConnector,
  codec: ProtocolCodec = new ProtocolCodec(),
): IBrokerTransport {
  switch (config.type) {
    case 'amqp':
      return new AmqpExchangeTransport(config, connectAmqp, { codec });
    case 'redis':
      return new RedisPubSubTransport(config, createRedisClient, { codec });
  }
}

@Module({
  imports: [RedisModule, AmqpModule],
  providers: [
    {
      provide: ProtocolCodec,
      useFactory: () => new ProtocolCodec(),
    },
    {
      provide: BROKER_TRANSPORT,
      useFactory: (
        config: BrokerConfigType,
        createRedisClient: RedisClientFactory,
        connectAmqp: AmqpConnector,
        codec: ProtocolCodec,
      ) => createBrokerTransport(config, createRedisClient, connectAmqp, codec),
      inject: [brokerConfig.KEY, REDIS_CLIENT_FACTORY, AMQP_CONNECTOR, ProtocolCodec],
    },
  ],
  exports: [BROKER_TRANSPORT],
})
export class TransportModule {}
