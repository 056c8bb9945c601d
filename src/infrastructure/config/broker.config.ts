import { ConfigType, registerAs } from '@nestjs/config';
import { durationOrDefault } from './duration.util';

export type BrokerType = 'redis' | 'amqp';
export type OutputFormat = 'text' | 'json';

export interface BrokerConfig {
  readonly type: BrokerType;
  readonly url: string;
  /** Redis database index; `undefined` keeps the one in the URL. */
  readonly database?: number;
  readonly username?: string;
  readonly password?: string;
  readonly timeoutMs: number;
  readonly destinations: readonly string[];
  readonly outputFormat: OutputFormat;
  readonly pollIntervalMs: number;
  /** `0` turns the early quiet-period stop off. */
  readonly quietPeriodMs: number;
  readonly bindingSettleMs: number;
  readonly connectRetries: number;
}

export const DEFAULT_BROKER_URL = 'redis://localhost:6379/0';
export const DEFAULT_TIMEOUT_MS = 1_500;
export const DEFAULT_POLL_INTERVAL_MS = 1_000;
export const DEFAULT_QUIET_PERIOD_MS = 100;
export const DEFAULT_BINDING_SETTLE_MS = 20;
export const DEFAULT_CONNECT_RETRIES = 3;

export function detectBrokerType(url: string): BrokerType {
  let scheme: string;
  try {
    scheme = new URL(url).protocol.replace(/:$/, '').toLowerCase();
  } catch {
    return 'redis';
  }
  return scheme === 'amqp' || scheme === 'amqps' ? 'amqp' : 'redis';
}

export function splitDestinations(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((destination) => destination.trim())
    .filter((destination) => destination !== '');
}

export function isTruthyFlag(raw: string | undefined): boolean {
  return raw === 'true' || raw === '1';
}

function optionalInt(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number.parseInt(raw, 10);
  return Number.isNaN(value) ? undefined : value;
}

function optionalString(raw: string | undefined): string | undefined {
  return raw === undefined || raw === '' ? undefined : raw;
}

export function buildBrokerConfig(env: NodeJS.ProcessEnv): BrokerConfig {
  const url = optionalString(env.BROKER_URL) ?? DEFAULT_BROKER_URL;
  const requestedType = env.BROKER_TYPE;
  const explicitType =
    requestedType === 'redis' || requestedType === 'amqp' ? requestedType : undefined;

  const config: BrokerConfig = {
    type: explicitType ?? detectBrokerType(url),
    url,
    database: optionalInt(env.BROKER_DB),
    username: optionalString(env.BROKER_USERNAME),
    password: optionalString(env.BROKER_PASSWORD),
    timeoutMs: durationOrDefault(env.BROKER_TIMEOUT, DEFAULT_TIMEOUT_MS),
    destinations: Object.freeze(splitDestinations(env.PING_DESTINATION)),
    outputFormat: env.OUTPUT_FORMAT === 'json' ? 'json' : 'text',
    pollIntervalMs: durationOrDefault(env.PING_POLL_INTERVAL, DEFAULT_POLL_INTERVAL_MS),
    quietPeriodMs: durationOrDefault(env.PING_QUIET_PERIOD, DEFAULT_QUIET_PERIOD_MS),
    bindingSettleMs: DEFAULT_BINDING_SETTLE_MS,
    connectRetries: optionalInt(env.BROKER_CONNECT_RETRIES) ?? DEFAULT_CONNECT_RETRIES,
  };
  return Object.freeze(config);
}

const brokerConfig = registerAs('broker', (): BrokerConfig => buildBrokerConfig(process.env));

export type BrokerConfigType = ConfigType<typeof brokerConfig>;

export default brokerConfig;
