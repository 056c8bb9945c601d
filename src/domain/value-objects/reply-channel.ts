import { v4 as uuidv4 } from 'uuid';
import {
  PRIORITY_SEPARATOR,
  PRIORITY_STEPS,
  REPLY_ADDRESS_SUFFIX,
} from '../constants/pidbox.constants';

export type IdGenerator = () => string;

export const generateId: IdGenerator = () => uuidv4();

/**
 * Per-request reply address. The token doubles as the routing key workers
 * reply with, so it must never be shared between two pings.
 */
export class ReplyChannel {
  private constructor(private readonly token: string) {}

  static create(generate: IdGenerator = generateId): ReplyChannel {
    return ReplyChannel.fromString(generate());
  }

  static fromString(value: string): ReplyChannel {
    if (!value || typeof value !== 'string') {
      throw new Error('Invalid reply channel token');
    }
    return new ReplyChannel(value);
  }

  get routingKey(): string {
    return this.token;
  }

  /** `<token>.reply.celery.pidbox` */
  baseAddress(): string {
    return `${this.token}${REPLY_ADDRESS_SUFFIX}`;
  }

  /** The base address followed by every priority-tagged variant. */
  listenAddresses(): string[] {
    const base = this.baseAddress();
    return [base, ...PRIORITY_STEPS.map((step) => `${base}${PRIORITY_SEPARATOR}${step}`)];
  }

  /** Binding-registry member: routing key, empty pattern, reply address. */
  bindingMember(): string {
    return [this.token, '', this.baseAddress()].join(PRIORITY_SEPARATOR);
  }

  toString(): string {
    return this.token;
  }
}
