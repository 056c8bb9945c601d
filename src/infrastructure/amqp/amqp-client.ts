import * as amqp from 'amqplib';
import type { ConsumeMessage, Options, Replies } from 'amqplib';

/** What the transport reads from a delivered reply. */
export type ReplyDelivery = Pick<ConsumeMessage, 'content'>;

/** The slice of an amqplib channel the pidbox transport uses. */
export interface PidboxAmqpChannel {
  checkExchange(exchange: string): Promise<Replies.Empty>;
  assertExchange(
    exchange: string,
    type: string,
    options?: Options.AssertExchange,
  ): Promise<Replies.AssertExchange>;
  assertQueue(queue: string, options?: Options.AssertQueue): Promise<Replies.AssertQueue>;
  bindQueue(queue: string, source: string, pattern: string): Promise<Replies.Empty>;
  publish(
    exchange: string,
    routingKey: string,
    content: Buffer,
    options?: Options.Publish,
  ): boolean;
  consume(
    queue: string,
    onMessage: (msg: ReplyDelivery | null) => void,
    options?: Options.Consume,
  ): Promise<Replies.Consume>;
  cancel(consumerTag: string): Promise<Replies.Empty>;
  close(): Promise<void>;
  on(event: 'close' | 'error', listener: (...args: unknown[]) => void): unknown;
}

export interface PidboxAmqpConnection {
  createChannel(): Promise<PidboxAmqpChannel>;
  close(): Promise<void>;
  on(event: 'close' | 'error', listener: (...args: unknown[]) => void): unknown;
}

export type AmqpConnector = (url: string) => Promise<PidboxAmqpConnection>;

export const AMQP_CONNECTOR = 'AMQP_CONNECTOR';

export const connectAmqp: AmqpConnector = (url) => amqp.connect(url);

/** Puts configured credentials into the URL, replacing any already there. */
export function withCredentials(url: string, username?: string, password?: string): string {
  if (!username && !password) {
    return url;
  }
  const parsed = new URL(url);
  if (username) parsed.username = encodeURIComponent(username);
  if (password) parsed.password = encodeURIComponent(password);
  return parsed.toString();
}
