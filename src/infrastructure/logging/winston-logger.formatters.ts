import * as winston from 'winston';
import { deepRedact, shouldRedact } from './utils/redaction.util';

const levelIcon: Record<string, string> = {
  error: '⛔',
  warn: '⚠',
  info: 'ℹ',
  verbose: '🔍',
  debug: '🐞',
};

const RESERVED_KEYS = new Set(['timestamp', 'level', 'message', 'context', 'trace']);

function humanizeValueInline(value: unknown): string {
  if (value == null) return String(value);
  if (Array.isArray(value)) return value.map(humanizeValueInline).join(', ');
  if (typeof value === 'object') return humanizeObjectInline(value);
  return String(value);
}

function humanizeObjectInline(obj: object): string {
  const parts: string[] = [];
  for (const [k, v] of Object.entries(obj)) {
    parts.push(`${k}=${humanizeValueInline(v)}`);
  }
  return parts.join(' ');
}

const redactFormat = winston.format((info) => {
  for (const [key, value] of Object.entries(info)) {
    if (key === 'level' || key === 'message') continue;
    info[key] = shouldRedact(key) ? '[REDACTED]' : deepRedact(value);
  }
  if (typeof info.message === 'string') {
    const redacted = deepRedact(info.message);
    info.message = typeof redacted === 'string' ? redacted : info.message;
  }
  return info;
});

function stringField(info: winston.Logform.TransformableInfo, key: string): string | undefined {
  const value = info[key];
  return typeof value === 'string' ? value : undefined;
}

export function makePrettyConsoleFormat() {
  return winston.format.combine(
    redactFormat(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.printf((info) => {
      const timestamp = stringField(info, 'timestamp') ?? '';
      const context = stringField(info, 'context');
      const trace = stringField(info, 'trace');
      const contextLabel = context ? ` [${context}]` : '';
      const icon = levelIcon[info.level] || '•';

      const extra: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(info)) {
        if (!RESERVED_KEYS.has(key)) extra[key] = value;
      }
      const restPart = Object.keys(extra).length ? ` ${humanizeObjectInline(extra)}` : '';
      const level = info.level.toUpperCase().padEnd(7);
      const body = `${String(info.message)}${restPart}`.trim();
      const line = `${timestamp} ${icon} ${level}${contextLabel}: ${body}`;
      return `${line}${trace ? `\n${trace}` : ''}`.trimEnd();
    }),
  );
}

export function makeJsonFileFormat() {
  return winston.format.combine(
    redactFormat(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  );
}
