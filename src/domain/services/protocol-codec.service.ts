import {
  CONTENT_ENCODING_UTF8,
  CONTENT_TYPE_JSON,
  MIN_MESSAGE_TTL_SECONDS,
  PERSISTENT_DELIVERY_MODE,
  PIDBOX_EXCHANGE,
  REPLY_EXCHANGE,
} from '../constants/pidbox.constants';
import { DecodeError } from '../errors/broker.errors';
import {
  ControlMessage,
  EncodePingOptions,
  Envelope,
  JsonValue,
  ResponseDocument,
  WireFormat,
} from '../types/control-message.types';
import { IdGenerator, generateId } from '../value-objects/reply-channel';
import {
  EVIDENCE_MATCHERS,
  IDENTITY_MATCHERS,
  firstMatch,
  isJsonObject,
  isWorkerEvidence,
} from './identity-matchers';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Stateless translation between control messages and the bytes a transport
 * puts on the wire. Only the ticket, the delivery tag and the expiry depend
 * on the injected id generator and clock.
 */
export class ProtocolCodec {
  constructor(
    private readonly generate: IdGenerator = generateId,
    private readonly now: () => number = Date.now,
  ) {}

  buildPing(replyChannel: string, destinations?: readonly string[] | null): ControlMessage {
    return {
      method: 'ping',
      arguments: {},
      destination: destinations && destinations.length > 0 ? [...destinations] : null,
      pattern: null,
      matcher: null,
      ticket: this.generate(),
      reply_to: {
        exchange: REPLY_EXCHANGE,
        routing_key: replyChannel,
      },
    };
  }

  encodePing(options: EncodePingOptions): Buffer {
    const message = this.buildPing(options.replyChannel, options.destinations);
    const raw = JSON.stringify(message);

    switch (options.format) {
      case WireFormat.RAW:
        return Buffer.from(raw, 'utf8');
      case WireFormat.ENVELOPED:
        return Buffer.from(JSON.stringify(this.envelope(raw, options.timeoutMs)), 'utf8');
    }
  }

  private envelope(body: string, timeoutMs: number): Envelope {
    const nowSeconds = Math.floor(this.now() / 1000);
    const ttlSeconds = Math.max(MIN_MESSAGE_TTL_SECONDS, Math.ceil(timeoutMs / 1000) + 1);

    return {
      body: Buffer.from(body, 'utf8').toString('base64'),
      'content-encoding': CONTENT_ENCODING_UTF8,
      'content-type': CONTENT_TYPE_JSON,
      headers: {
        clock: 1,
        expires: nowSeconds + ttlSeconds,
      },
      properties: {
        delivery_mode: PERSISTENT_DELIVERY_MODE,
        delivery_info: {
          exchange: PIDBOX_EXCHANGE,
          routing_key: '',
        },
        priority: 0,
        body_encoding: 'base64',
        delivery_tag: this.generate(),
      },
    };
  }

  /**
   * Parses a reply, unwrapping one level of base64 `body` enveloping.
   * @throws DecodeError when neither layer is a JSON object
   */
  decodeResponse(payload: Buffer | string): ResponseDocument {
    const outer = parseDocument(
      typeof payload === 'string' ? payload : payload.toString('utf8'),
      'response envelope',
    );

    const body = outer.body;
    if (typeof body !== 'string') {
      return outer;
    }

    const compact = body.replace(/\s+/g, '');
    if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
      throw new DecodeError('Failed to decode base64 body: invalid base64 text');
    }
    return parseDocument(Buffer.from(compact, 'base64').toString('utf8'), 'decoded body');
  }

  validateResponse(document: ResponseDocument): boolean {
    for (const matcher of EVIDENCE_MATCHERS) {
      const match = matcher.match(document);
      if (match && isWorkerEvidence(match)) {
        return true;
      }
    }
    return false;
  }

  extractIdentity(document: ResponseDocument): string {
    return firstMatch(document, IDENTITY_MATCHERS)?.identity ?? '';
  }
}

function parseDocument(text: string, what: string): ResponseDocument {
  let parsed: JsonValue;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new DecodeError(`Failed to parse ${what}`, { cause: error });
  }
  if (!isJsonObject(parsed)) {
    throw new DecodeError(`Failed to parse ${what}: expected a JSON object`);
  }
  return parsed;
}
