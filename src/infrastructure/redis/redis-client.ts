import { Logger } from '@nestjs/common';
import Redis, { RedisOptions } from 'ioredis';
import { BrokerConfig } from '../config/broker.config';

/** The Redis commands the pidbox transport issues. */
export interface PidboxRedisClient {
  connect(): Promise<void>;
  ping(): Promise<string>;
  publish(channel: string, message: string): Promise<number>;
  sadd(key: string, member: string): Promise<number>;
  srem(key: string, member: string): Promise<number>;
  del(keys: readonly string[]): Promise<number>;
  /** Resolves `[key, payload]`, or `null` once `timeoutSeconds` pass with nothing to pop. */
  brpop(keys: readonly string[], timeoutSeconds: number): Promise<[string, string] | null>;
  quit(): Promise<void>;
  disconnect(): void;
}

export type RedisClientFactory = (config: BrokerConfig) => PidboxRedisClient;

export const REDIS_CLIENT_FACTORY = 'REDIS_CLIENT_FACTORY';

export class IoRedisPidboxClient implements PidboxRedisClient {
  private readonly logger = new Logger(IoRedisPidboxClient.name);

  constructor(private readonly client: Redis) {
    client.on('error', (error: Error) => {
      this.logger.debug(`Redis client error: ${error.message}`);
    });
  }

  connect(): Promise<void> {
    return this.client.connect();
  }

  ping(): Promise<string> {
    return this.client.ping();
  }

  publish(channel: string, message: string): Promise<number> {
    return this.client.publish(channel, message);
  }

  sadd(key: string, member: string): Promise<number> {
    return this.client.sadd(key, member);
  }

  srem(key: string, member: string): Promise<number> {
    return this.client.srem(key, member);
  }

  del(keys: readonly string[]): Promise<number> {
    if (keys.length === 0) return Promise.resolve(0);
    return this.client.del(...keys);
  }

  brpop(keys: readonly string[], timeoutSeconds: number): Promise<[string, string] | null> {
    return this.client.brpop([...keys], timeoutSeconds);
  }

  async quit(): Promise<void> {
    await this.client.quit();
  }

  disconnect(): void {
    this.client.disconnect();
  }
}

export function buildRedisOptions(config: BrokerConfig): RedisOptions {
  const options: RedisOptions = {
    lazyConnect: true,
    maxRetriesPerRequest: 1,
    retryStrategy: (times) => {
      if (times > config.connectRetries) {
        return null;
      }
      return Math.min(times * 50, 2000);
    },
  };
  if (config.database !== undefined) {
    options.db = config.database;
  }
  if (config.username) {
    options.username = config.username;
  }
  if (config.password) {
    options.password = config.password;
  }
  return options;
}

export const createRedisClient: RedisClientFactory = (config) =>
  new IoRedisPidboxClient(new Redis(config.url, buildRedisOptions(config)));
