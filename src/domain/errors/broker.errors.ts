export type BrokerErrorCode =
  | 'CONFIGURATION'
  | 'CONNECT'
  | 'DECLARE'
  | 'PUBLISH'
  | 'DECODE';

export abstract class BrokerError extends Error {
  abstract readonly code: BrokerErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The transport was used before it was connected. Not retried. */
export class ConfigurationError extends BrokerError {
  readonly code = 'CONFIGURATION';
}

export class ConnectError extends BrokerError {
  readonly code = 'CONNECT';
}

/** Exchange, queue or binding setup failed. */
export class DeclareError extends BrokerError {
  readonly code = 'DECLARE';
}

export class PublishError extends BrokerError {
  readonly code = 'PUBLISH';
}

/** A single reply payload could not be parsed; callers skip it. */
export class DecodeError extends BrokerError {
  readonly code = 'DECODE';
}

export function isBrokerError(error: unknown): error is BrokerError {
  return error instanceof BrokerError;
}
