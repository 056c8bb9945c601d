import { Global, Module } from '@nestjs/common';
import { createRedisClient, REDIS_CLIENT_FACTORY, RedisClientFactory } from './redis-client';

@Global()
@Module({
  providers: [
    {
      provide: REDIS_CLIENT_FACTORY,
      useFactory: (): RedisClientFactory => createRedisClient,
    },
  ],
  exports: [REDIS_CLIENT_FACTORY],
})
export class RedisModule {}
