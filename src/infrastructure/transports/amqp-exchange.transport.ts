import { Logger } from '@nestjs/common';
import {
  BrokerTransportKind,
  IBrokerTransport,
  PingResult,
} from '../../application/ports/broker-transport.port';
import { getErrorInfo } from '../../common/error-assertions';
import {
  CONTENT_ENCODING_UTF8,
  CONTENT_TYPE_JSON,
  PERSISTENT_DELIVERY_MODE,
  PIDBOX_EXCHANGE,
  REPLY_EXCHANGE,
} from '../../domain/constants/pidbox.constants';
import {
  ConfigurationError,
  ConnectError,
  DeclareError,
  PublishError,
  isBrokerError,
} from '../../domain/errors/broker.errors';
import { ProtocolCodec } from '../../domain/services/protocol-codec.service';
import { ResponseCollector, StopReason } from '../../domain/services/response-collector';
import { WireFormat } from '../../domain/types/control-message.types';
import {
  IdGenerator,
  ReplyChannel,
  generateId,
} from '../../domain/value-objects/reply-channel';
import {
  AmqpConnector,
  PidboxAmqpChannel,
  PidboxAmqpConnection,
  withCredentials,
} from '../amqp/amqp-client';
import { BrokerConfig } from '../config/broker.config';
import { redactUrl } from '../logging/utils/redaction.util';
import { logIngestOutcome } from './ingest-logging';
import { ReplyInbox } from './reply-inbox';

const CONTROL_EXCHANGES: ReadonlyArray<readonly [string, 'fanout' | 'direct']> = [
  [PIDBOX_EXCHANGE, 'fanout'],
  [REPLY_EXCHANGE, 'direct'],
];

export interface AmqpTransportDeps {
  codec?: ProtocolCodec;
  generateToken?: IdGenerator;
  now?: () => number;
}

/**
 * Pidbox over AMQP: the ping fans out through `celery.pidbox` and replies
 * come back on an exclusive queue bound to the reply exchange.
 */
export class AmqpExchangeTransport implements IBrokerTransport {
  readonly kind: BrokerTransportKind = 'amqp';
  private readonly logger = new Logger(AmqpExchangeTransport.name);
  private readonly codec: ProtocolCodec;
  private readonly generateToken: IdGenerator;
  private readonly now: () => number;
  private connection: PidboxAmqpConnection | null = null;
  private channel: PidboxAmqpChannel | null = null;
  private connectionClosed = false;
  private channelClosed = false;
  private inbox: ReplyInbox | null = null;

  constructor(
    private readonly config: BrokerConfig,
    private readonly connectToBroker: AmqpConnector,
    deps: AmqpTransportDeps = {},
  ) {
    this.codec = deps.codec ?? new ProtocolCodec();
    this.generateToken = deps.generateToken ?? generateId;
    this.now = deps.now ?? Date.now;
  }

  async connect(): Promise<void> {
    if (this.connection) return;

    const { username, password } = this.config;
    const url = withCredentials(this.config.url, username, password);
    let connection: PidboxAmqpConnection;
    try {
      connection = await this.connectToBroker(url);
    } catch (error) {
      throw new ConnectError(`Failed to connect to AMQP broker at ${redactUrl(url)}`, {
        cause: error,
      });
    }

    this.connection = connection;
    this.connectionClosed = false;
    connection.on('close', () => {
      if (this.connection !== connection) return;
      this.connectionClosed = true;
      this.inbox?.close('lost');
    });
    connection.on('error', (error) => {
      this.logger.warn(`AMQP connection error: ${getErrorInfo(error).message}`);
    });

    try {
      await this.openChannel();
      for (const [name, type] of CONTROL_EXCHANGES) {
        await this.declareExchange(name, type);
      }
      await this.health();
    } catch (error) {
      await this.close();
      if (isBrokerError(error)) throw error;
      throw new ConnectError('Failed to open AMQP channel', { cause: error });
    }
    this.logger.debug(`Connected to AMQP broker at ${redactUrl(url)}`);
  }

  async close(): Promise<void> {
    const { channel, connection } = this;
    this.channel = null;
    this.connection = null;

    if (channel && !this.channelClosed) {
      try {
        await channel.close();
      } catch (error) {
        this.logger.debug(`AMQP channel close failed: ${getErrorInfo(error).message}`);
      }
    }
    if (connection && !this.connectionClosed) {
      try {
        await connection.close();
      } catch (error) {
        this.logger.debug(`AMQP connection close failed: ${getErrorInfo(error).message}`);
      }
    }
  }

  async health(): Promise<void> {
    if (!this.connection) {
      throw new ConfigurationError('AMQP connection not initialized');
    }
    if (this.connectionClosed) {
      throw new ConnectError('AMQP connection is closed');
    }
    if (!this.channel) {
      throw new ConfigurationError('AMQP channel not initialized');
    }
    if (this.channelClosed) {
      throw new ConnectError('AMQP channel is closed');
    }
  }

  async ping(
    timeoutMs: number,
    destinations: readonly string[] = [],
    signal?: AbortSignal,
  ): Promise<PingResult> {
    const channel = this.requireChannel();
    const collector = new ResponseCollector(this.codec, {
      earlyQuietStop: this.config.quietPeriodMs > 0,
      minWaitMs: 0,
    });
    if (signal?.aborted) {
      return { responses: collector.snapshot(), stopReason: 'aborted' };
    }

    const replyChannel = ReplyChannel.create(this.generateToken);
    const queue = replyChannel.routingKey;
    try {
      await channel.assertQueue(queue, { exclusive: true, autoDelete: true, durable: false });
      await channel.bindQueue(queue, REPLY_EXCHANGE, replyChannel.routingKey);
    } catch (error) {
      throw new DeclareError(`Failed to declare reply queue ${queue}`, { cause: error });
    }

    this.publishPing(channel, replyChannel, destinations, timeoutMs);

    const inbox = new ReplyInbox();
    this.inbox = inbox;
    let consumerTag: string | undefined;
    try {
      try {
        const reply = await channel.consume(
          queue,
          (message) => (message === null ? inbox.close() : inbox.push(message.content)),
          { noAck: true },
        );
        consumerTag = reply.consumerTag;
      } catch (error) {
        throw new DeclareError(`Failed to consume from reply queue ${queue}`, { cause: error });
      }

      const stopReason = await this.collect(inbox, collector, timeoutMs, signal);
      return { responses: collector.snapshot(), stopReason };
    } finally {
      this.inbox = null;
      inbox.close();
      if (consumerTag !== undefined) {
        await this.cancelConsumer(channel, consumerTag);
      }
    }
  }

  private publishPing(
    channel: PidboxAmqpChannel,
    replyChannel: ReplyChannel,
    destinations: readonly string[],
    timeoutMs: number,
  ): void {
    const payload = this.codec.encodePing({
      replyChannel: replyChannel.routingKey,
      destinations,
      format: WireFormat.RAW,
      timeoutMs,
    });
    let written: boolean;
    try {
      written = channel.publish(PIDBOX_EXCHANGE, '', payload, {
        contentType: CONTENT_TYPE_JSON,
        contentEncoding: CONTENT_ENCODING_UTF8,
        deliveryMode: PERSISTENT_DELIVERY_MODE,
      });
    } catch (error) {
      throw new PublishError('Failed to publish ping', { cause: error });
    }
    if (!written) {
      this.logger.debug('AMQP write buffer full, ping queued for delivery');
    }
  }

  private async collect(
    inbox: ReplyInbox,
    collector: ResponseCollector,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<StopReason> {
    const quietMs = this.config.quietPeriodMs;
    const startedAt = this.now();
    const deadlineAt = startedAt + timeoutMs;
    let quietAt = startedAt + quietMs;

    for (;;) {
      const now = this.now();
      const stop = collector.decide({
        elapsedMs: now - startedAt,
        deadlineMs: timeoutMs,
        quietPeriodElapsed: quietMs > 0 && now >= quietAt,
        aborted: signal?.aborted ?? false,
      });
      if (stop) {
        return stop;
      }

      const wakeAt = quietMs > 0 && quietAt > now ? Math.min(deadlineAt, quietAt) : deadlineAt;
      const event = await inbox.next(wakeAt - now, signal);
      switch (event.kind) {
        case 'message':
          quietAt = this.now() + quietMs;
          logIngestOutcome(this.logger, collector.ingest(event.payload));
          break;
        case 'closed':
          this.logger.warn('Reply consumer was cancelled by the broker');
          return 'stream-closed';
        case 'lost':
          if (collector.size > 0) {
            this.logger.warn(
              `AMQP connection lost while collecting replies, keeping ${collector.size} response(s)`,
            );
            return 'connection-lost';
          }
          throw new ConnectError('AMQP connection lost while collecting replies');
        case 'timeout':
        case 'aborted':
          break;
      }
    }
  }

  private async cancelConsumer(channel: PidboxAmqpChannel, consumerTag: string): Promise<void> {
    if (this.channelClosed || channel !== this.channel) return;
    try {
      await channel.cancel(consumerTag);
    } catch (error) {
      this.logger.warn(`Failed to cancel reply consumer: ${getErrorInfo(error).message}`);
    }
  }

  private async declareExchange(name: string, type: 'fanout' | 'direct'): Promise<void> {
    try {
      await this.requireChannel().checkExchange(name);
      return;
    } catch (error) {
      const reason = getErrorInfo(error).message;
      this.logger.debug(`Exchange ${name} not found (${reason}), declaring it`);
    }

    // A failed passive declare closes the channel on the broker side.
    const channel = await this.reopenChannel();
    try {
      await channel.assertExchange(name, type, {
        durable: true,
        autoDelete: false,
        internal: false,
      });
    } catch (error) {
      throw new DeclareError(`Failed to declare ${name} exchange`, { cause: error });
    }
  }

  private async reopenChannel(): Promise<PidboxAmqpChannel> {
    const stale = this.channel;
    if (stale && !this.channelClosed) {
      try {
        await stale.close();
      } catch (error) {
        this.logger.debug(`Stale AMQP channel close failed: ${getErrorInfo(error).message}`);
      }
    }
    return this.openChannel();
  }

  private async openChannel(): Promise<PidboxAmqpChannel> {
    if (!this.connection) {
      throw new ConfigurationError('AMQP connection not initialized');
    }
    const channel = await this.connection.createChannel();
    this.channel = channel;
    this.channelClosed = false;
    channel.on('close', () => {
      if (this.channel !== channel) return;
      this.channelClosed = true;
      this.inbox?.close('lost');
    });
    channel.on('error', (error) => {
      this.logger.debug(`AMQP channel error: ${getErrorInfo(error).message}`);
    });
    return channel;
  }

  private requireChannel(): PidboxAmqpChannel {
    if (!this.channel || !this.connection) {
      throw new ConfigurationError('AMQP channel not initialized');
    }
    return this.channel;
  }
}
