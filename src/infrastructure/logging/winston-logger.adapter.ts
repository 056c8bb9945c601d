import { Inject, Injectable, LoggerService } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as fs from 'fs';
import * as path from 'path';
import loggingConfig, { LogLevel } from '../config/logging.config';
import { makeJsonFileFormat, makePrettyConsoleFormat } from './winston-logger.formatters';

const ALL_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

interface SplitParams {
  context?: string;
  meta: Record<string, unknown>;
}

/**
 * Nest `Logger` calls append the caller's context as the last string
 * argument; an `Error` or a stack string may precede it.
 */
function splitParams(optionalParams: unknown[], withTrace: boolean): SplitParams {
  const params = [...optionalParams];
  const meta: Record<string, unknown> = {};
  let context: string | undefined;

  if (params.length > 0 && typeof params[params.length - 1] === 'string') {
    const last = params.pop();
    context = typeof last === 'string' ? last : undefined;
  }

  for (const param of params) {
    if (param instanceof Error) {
      meta.trace = param.stack;
      meta.error = { name: param.name, message: param.message };
    } else if (typeof param === 'string' && withTrace) {
      meta.trace = param;
    } else if (typeof param === 'object' && param !== null) {
      Object.assign(meta, param);
    } else if (param !== undefined) {
      meta.detail = param;
    }
  }
  return { context, meta };
}

@Injectable()
export class WinstonLoggerAdapter implements LoggerService {
  private readonly logger: winston.Logger;

  constructor(
    @Inject(loggingConfig.KEY)
    private readonly config: ConfigType<typeof loggingConfig>,
  ) {
    let enableFiles = config.enableFiles;
    if (enableFiles) {
      try {
        const absDir = path.isAbsolute(config.dir)
          ? config.dir
          : path.join(process.cwd(), config.dir);
        if (!fs.existsSync(absDir)) {
          fs.mkdirSync(absDir, { recursive: true });
        }
      } catch (error) {
        enableFiles = false;
        process.stderr.write(`Log directory unavailable, file logging disabled: ${String(error)}\n`);
      }
    }

    const transports: winston.transport[] = [
      new winston.transports.Console({
        level: config.level,
        format: makePrettyConsoleFormat(),
        silent: !config.enableConsole,
        // stdout carries the ping report.
        stderrLevels: ALL_LEVELS,
      }),
    ];

    if (enableFiles) {
      const rotateFile = (filename: string, level?: LogLevel) =>
        new DailyRotateFile({
          dirname: config.dir,
          filename: `${config.appName}-%DATE%-${filename}.log`,
          datePattern: 'YYYY-MM-DD',
          zippedArchive: true,
          maxSize: config.maxSize,
          maxFiles: config.maxFiles,
          level: level ?? config.level,
          format: makeJsonFileFormat(),
        });
      transports.push(rotateFile('combined'), rotateFile('error', 'error'));
    }

    this.logger = winston.createLogger({
      level: config.level,
      transports,
      exitOnError: false,
    });
  }

  log(message: unknown, ...optionalParams: unknown[]): void {
    this.write('info', message, optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    this.write('error', message, optionalParams, true);
  }

  fatal(message: unknown, ...optionalParams: unknown[]): void {
    this.write('error', message, optionalParams, true);
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.write('warn', message, optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.write('debug', message, optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.write('verbose', message, optionalParams);
  }

  private write(
    level: LogLevel,
    message: unknown,
    optionalParams: unknown[],
    withTrace = false,
  ): void {
    const { context, meta } = splitParams(optionalParams, withTrace);
    const text = typeof message === 'string' ? message : JSON.stringify(message);
    this.logger.log(level, text, context ? { context, ...meta } : meta);
  }
}
