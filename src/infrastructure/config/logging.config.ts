import { registerAs } from '@nestjs/config';
import { isTruthyFlag } from './broker.config';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'verbose';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'verbose'];

export interface LoggingConfig {
  level: LogLevel;
  dir: string;
  appName: string;
  enableConsole: boolean;
  enableFiles: boolean;
  maxSize: string;
  maxFiles: string;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function buildLoggingConfig(env: NodeJS.ProcessEnv): LoggingConfig {
  const requested = env.LOG_LEVEL;
  const configured: LogLevel = isLogLevel(requested) ? requested : 'warn';
  return {
    level: isTruthyFlag(env.VERBOSE) ? 'debug' : configured,
    dir: env.LOG_DIR || 'logs',
    appName: env.APP_NAME || 'pidbox-ping',
    enableConsole: (env.LOG_ENABLE_CONSOLE ?? 'true') === 'true',
    enableFiles: (env.LOG_ENABLE_FILES ?? 'false') === 'true',
    maxSize: env.LOG_MAX_SIZE || '20m',
    maxFiles: env.LOG_MAX_FILES || '14d',
  };
}

export default registerAs('logging', (): LoggingConfig => buildLoggingConfig(process.env));
