export enum WireFormat {
  /** Structured JSON carried as-is (exchange broker). */
  RAW = 'raw',
  /** Base64 body wrapped in a transport envelope (key-value broker). */
  ENVELOPED = 'enveloped',
}

export interface ReplyTo {
  exchange: string;
  routing_key: string;
}

export interface ControlMessage {
  method: 'ping';
  arguments: Record<string, never>;
  destination: string[] | null;
  pattern: null;
  matcher: null;
  ticket: string;
  reply_to: ReplyTo;
}

export interface EnvelopeHeaders {
  clock: number;
  /** Absolute cutoff in unix seconds. */
  expires: number;
}

export interface EnvelopeProperties {
  delivery_mode: number;
  delivery_info: {
    exchange: string;
    routing_key: string;
  };
  priority: number;
  body_encoding: 'base64';
  delivery_tag: string;
}

export interface Envelope {
  body: string;
  'content-encoding': string;
  'content-type': string;
  headers: EnvelopeHeaders;
  properties: EnvelopeProperties;
}

export interface EncodePingOptions {
  replyChannel: string;
  destinations?: readonly string[] | null;
  format: WireFormat;
  /** Collection window; enveloped messages must outlive it. */
  timeoutMs: number;
}

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type ResponseDocument = { [key: string]: JsonValue };
