import { Module } from '@nestjs/common';
import { TransportModule } from '../infrastructure/transports/transport.module';
import { PingResultFormatter } from './services/ping-result-formatter.service';
import { PingWorkersUseCase } from './use-cases/ping-workers.use-case';

@Module({
  imports: [TransportModule],
  providers: [PingWorkersUseCase, PingResultFormatter],
  exports: [PingWorkersUseCase, PingResultFormatter],
})
export class ApplicationModule {}
