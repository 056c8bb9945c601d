import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ApplicationModule } from './application/application.module';
import brokerConfig from './infrastructure/config/broker.config';
import { validateEnvironment } from './infrastructure/config/environment.validation';
import loggingConfig from './infrastructure/config/logging.config';
import { LoggerModule } from './infrastructure/logging/logger.module';

@Module({})
export class AppModule {
  /** Built on demand so configuration errors reject inside bootstrap. */
  static forRoot(): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          envFilePath: ['.env.local', '.env'],
          load: [brokerConfig, loggingConfig],
          validate: validateEnvironment,
        }),
        LoggerModule,
        ApplicationModule,
      ],
    };
  }
}
