import { Logger } from '@nestjs/common';
import { setTimeout as sleep } from 'timers/promises';
import {
  BrokerTransportKind,
  IBrokerTransport,
  PingResult,
} from '../../application/ports/broker-transport.port';
import { getErrorInfo } from '../../common/error-assertions';
import { BINDING_REGISTRY_KEY, PIDBOX_EXCHANGE } from '../../domain/constants/pidbox.constants';
import {
  ConfigurationError,
  ConnectError,
  DeclareError,
  PublishError,
} from '../../domain/errors/broker.errors';
import { ProtocolCodec } from '../../domain/services/protocol-codec.service';
import { ResponseCollector, StopReason } from '../../domain/services/response-collector';
import { WireFormat } from '../../domain/types/control-message.types';
import { IdGenerator, ReplyChannel, generateId } from '../../domain/value-objects/reply-channel';
import { BrokerConfig } from '../config/broker.config';
import { redactUrl } from '../logging/utils/redaction.util';
import { PidboxRedisClient, RedisClientFactory } from '../redis/redis-client';
import { logIngestOutcome } from './ingest-logging';

/** BRPOP cannot usefully block for less than this. */
export const MIN_BLOCK_MS = 100;

export interface RedisTransportDeps {
  codec?: ProtocolCodec;
  generateToken?: IdGenerator;
  now?: () => number;
  delay?: (ms: number) => Promise<unknown>;
}

/** Database index from the config override, else the URL path, else 0. */
export function resolveDatabase(config: Pick<BrokerConfig, 'url' | 'database'>): number {
  if (config.database !== undefined) {
    return config.database;
  }
  try {
    const index = Number.parseInt(new URL(config.url).pathname.replace(/^\//, ''), 10);
    return Number.isNaN(index) ? 0 : index;
  } catch {
    return 0;
  }
}

export function toBlockSeconds(waitMs: number): number {
  return Math.max(MIN_BLOCK_MS, Math.round(waitMs)) / 1000;
}

/**
 * Pidbox over Redis: the ping goes out on the fanout pub/sub channel and
 * replies are popped from per-call list keys registered in the kombu
 * binding set.
 */
export class RedisPubSubTransport implements IBrokerTransport {
  readonly kind: BrokerTransportKind = 'redis';
  private readonly logger = new Logger(RedisPubSubTransport.name);
  private readonly codec: ProtocolCodec;
  private readonly generateToken: IdGenerator;
  private readonly now: () => number;
  private readonly delay: (ms: number) => Promise<unknown>;
  private client: PidboxRedisClient | null = null;

  constructor(
    private readonly config: BrokerConfig,
    private readonly createClient: RedisClientFactory,
    deps: RedisTransportDeps = {},
  ) {
    this.codec = deps.codec ?? new ProtocolCodec();
    this.generateToken = deps.generateToken ?? generateId;
    this.now = deps.now ?? Date.now;
    this.delay = deps.delay ?? ((ms) => sleep(ms));
  }

  get broadcastChannel(): string {
    return `/${resolveDatabase(this.config)}.${PIDBOX_EXCHANGE}`;
  }

  async connect(): Promise<void> {
    if (this.client) return;

    let client: PidboxRedisClient;
    try {
      client = this.createClient(this.config);
    } catch (error) {
      throw new ConnectError(
        `Invalid Redis URL ${redactUrl(this.config.url)}: ${getErrorInfo(error).message}`,
        { cause: error },
      );
    }

    try {
      await client.connect();
    } catch (error) {
      client.disconnect();
      throw new ConnectError(`Failed to connect to Redis at ${redactUrl(this.config.url)}`, {
        cause: error,
      });
    }

    this.client = client;
    try {
      await this.health();
    } catch (error) {
      await this.close();
      throw error;
    }
    this.logger.debug(`Connected to Redis at ${redactUrl(this.config.url)}`);
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (!client) return;
    try {
      await client.quit();
    } catch (error) {
      this.logger.debug(`Redis quit failed, disconnecting: ${getErrorInfo(error).message}`);
      client.disconnect();
    }
  }

  async health(): Promise<void> {
    const client = this.requireClient();
    try {
      await client.ping();
    } catch (error) {
      throw new ConnectError('Redis health check failed', { cause: error });
    }
  }

  async ping(
    timeoutMs: number,
    destinations: readonly string[] = [],
    signal?: AbortSignal,
  ): Promise<PingResult> {
    const client = this.requireClient();
    const collector = new ResponseCollector(this.codec, {
      earlyQuietStop: false,
      minWaitMs: MIN_BLOCK_MS,
    });
    if (signal?.aborted) {
      return { responses: collector.snapshot(), stopReason: 'aborted' };
    }

    const replyChannel = ReplyChannel.create(this.generateToken);
    const listenKeys = replyChannel.listenAddresses();
    const member = replyChannel.bindingMember();

    try {
      await this.registerBinding(client, member, listenKeys);
      // Workers look the binding up when they reply; give it time to land.
      await this.delay(this.config.bindingSettleMs);
      const startedAt = this.now();
      await this.publishPing(client, replyChannel, destinations, timeoutMs);
      const stopReason = await this.collect(
        client,
        listenKeys,
        collector,
        startedAt,
        timeoutMs,
        signal,
      );
      return { responses: collector.snapshot(), stopReason };
    } finally {
      await this.releaseBinding(client, member, listenKeys);
    }
  }

  private async registerBinding(
    client: PidboxRedisClient,
    member: string,
    listenKeys: readonly string[],
  ): Promise<void> {
    try {
      await client.sadd(BINDING_REGISTRY_KEY, member);
      await client.del(listenKeys);
    } catch (error) {
      throw new DeclareError('Failed to register reply binding', { cause: error });
    }
  }

  private async publishPing(
    client: PidboxRedisClient,
    replyChannel: ReplyChannel,
    destinations: readonly string[],
    timeoutMs: number,
  ): Promise<void> {
    const payload = this.codec.encodePing({
      replyChannel: replyChannel.routingKey,
      destinations,
      format: WireFormat.ENVELOPED,
      timeoutMs,
    });
    let receivers: number;
    try {
      receivers = await client.publish(this.broadcastChannel, payload.toString('utf8'));
    } catch (error) {
      throw new PublishError('Failed to publish ping', { cause: error });
    }
    this.logger.debug(`Ping published on ${this.broadcastChannel} to ${receivers} subscriber(s)`);
  }

  private async collect(
    client: PidboxRedisClient,
    listenKeys: readonly string[],
    collector: ResponseCollector,
    startedAt: number,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<StopReason> {
    for (;;) {
      const elapsedMs = this.now() - startedAt;
      const stop = collector.decide({
        elapsedMs,
        deadlineMs: timeoutMs,
        quietPeriodElapsed: false,
        aborted: signal?.aborted ?? false,
      });
      if (stop) {
        return stop;
      }

      const waitMs = Math.min(this.config.pollIntervalMs, timeoutMs - elapsedMs);
      let popped: [string, string] | null;
      try {
        popped = await client.brpop(listenKeys, toBlockSeconds(waitMs));
      } catch (error) {
        if (collector.size > 0) {
          const reason = getErrorInfo(error).message;
          this.logger.warn(
            `Redis connection lost while collecting replies, keeping ${collector.size} response(s): ${reason}`,
          );
          return 'connection-lost';
        }
        throw new ConnectError('Redis connection lost while collecting replies', { cause: error });
      }

      if (popped) {
        logIngestOutcome(this.logger, collector.ingest(popped[1]));
      }
    }
  }

  private async releaseBinding(
    client: PidboxRedisClient,
    member: string,
    listenKeys: readonly string[],
  ): Promise<void> {
    try {
      await client.srem(BINDING_REGISTRY_KEY, member);
      await client.del(listenKeys);
    } catch (error) {
      this.logger.warn(`Failed to release reply binding: ${getErrorInfo(error).message}`);
    }
  }

  private requireClient(): PidboxRedisClient {
    if (!this.client) {
      throw new ConfigurationError('Redis client not initialized');
    }
    return this.client;
  }
}
