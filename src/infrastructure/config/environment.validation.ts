import { plainToInstance, Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsOptional,
  Matches,
  Min,
  registerDecorator,
  ValidationArguments,
  ValidationError,
  ValidationOptions,
  validateSync,
} from 'class-validator';
import { parseDuration } from './duration.util';
import { LOG_LEVELS } from './logging.config';

export function IsDuration(
  options: { positive?: boolean } = {},
  validationOptions?: ValidationOptions,
) {
  return function (object: object, propertyName: string) {
    registerDecorator({
      name: 'isDuration',
      target: object.constructor,
      propertyName,
      constraints: [options.positive === true],
      options: validationOptions,
      validator: {
        validate(value: unknown, args: ValidationArguments) {
          if (typeof value !== 'string') return false;
          const ms = parseDuration(value);
          if (ms === null) return false;
          return args.constraints[0] === true ? ms > 0 : ms >= 0;
        },
        defaultMessage(args: ValidationArguments) {
          const positive = args.constraints[0] === true ? 'positive ' : '';
          return `${args.property} must be a ${positive}duration such as 1500ms, 1.5s or 2m`;
        },
      },
    });
  };
}

export class EnvironmentVariables {
  @IsOptional()
  @Matches(/^[a-z][a-z0-9+.-]*:\/\/\S+$/i, {
    message: 'BROKER_URL must be a URL such as redis://localhost:6379/0 or amqp://guest@localhost//',
  })
  BROKER_URL?: string;

  @IsOptional()
  @IsIn(['redis', 'amqp'])
  BROKER_TYPE?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  BROKER_DB?: number;

  @IsOptional()
  @IsDuration({ positive: true })
  BROKER_TIMEOUT?: string;

  @IsOptional()
  @IsIn(['text', 'json'])
  OUTPUT_FORMAT?: string;

  @IsOptional()
  @IsIn(['true', 'false', '1', '0'])
  VERBOSE?: string;

  @IsOptional()
  @IsDuration({ positive: true })
  PING_POLL_INTERVAL?: string;

  @IsOptional()
  @IsDuration()
  PING_QUIET_PERIOD?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  BROKER_CONNECT_RETRIES?: number;

  @IsOptional()
  @IsIn([...LOG_LEVELS])
  LOG_LEVEL?: string;
}

function flattenMessages(errors: ValidationError[]): string[] {
  return errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}),
    ...flattenMessages(error.children ?? []),
  ]);
}

/** `ConfigModule.forRoot({ validate })` hook: rejects the whole environment at once. */
export function validateEnvironment(config: Record<string, unknown>): Record<string, unknown> {
  const present = Object.fromEntries(
    Object.entries(config).filter(([, value]) => value !== ''),
  );
  const candidate = plainToInstance(EnvironmentVariables, present);
  const errors = validateSync(candidate, { skipMissingProperties: false });
  if (errors.length > 0) {
    throw new Error(`Configuration error: ${flattenMessages(errors).join('; ')}`);
  }
  return config;
}
