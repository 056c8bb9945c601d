import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import loggingConfig from '../config/logging.config';
import { WinstonLoggerAdapter } from './winston-logger.adapter';

@Global()
@Module({
  imports: [ConfigModule.forFeature(loggingConfig)],
  providers: [WinstonLoggerAdapter],
  exports: [WinstonLoggerAdapter],
})
export class LoggerModule {}
