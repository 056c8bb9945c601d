import { Inject, Injectable, Logger } from '@nestjs/common';
import { WorkerResponse } from '../../domain/entities/worker-response.entity';
import brokerConfig, { BrokerConfigType } from '../../infrastructure/config/broker.config';
import { redactUrl } from '../../infrastructure/logging/utils/redaction.util';
import { PingReport, PingRequest } from '../dto/ping-report.dto';
import { BROKER_TRANSPORT, IBrokerTransport } from '../ports/broker-transport.port';

function byIdentity(a: WorkerResponse, b: WorkerResponse): number {
  if (a.identity === b.identity) return 0;
  return a.identity < b.identity ? -1 : 1;
}

@Injectable()
export class PingWorkersUseCase {
  private readonly logger = new Logger(PingWorkersUseCase.name);

  constructor(
    @Inject(BROKER_TRANSPORT)
    private readonly transport: IBrokerTransport,
    @Inject(brokerConfig.KEY)
    private readonly config: BrokerConfigType,
  ) {}

  /**
   * Connects, broadcasts one ping and always closes the transport again.
   * Broker failures surface as `BrokerError` subclasses.
   */
  async execute(request: PingRequest = {}): Promise<PingReport> {
    const timeoutMs = request.timeoutMs ?? this.config.timeoutMs;
    const destinations = request.destinations ?? this.config.destinations;
    const broker = redactUrl(this.config.url);
    const startedAt = Date.now();

    try {
      this.logger.debug(`Connecting to ${this.transport.kind} broker at ${broker}`);
      await this.transport.connect();

      if (destinations.length > 0) {
        this.logger.debug(
          `Pinging ${destinations.join(', ')} (timeout ${timeoutMs}ms)`,
        );
      } else {
        this.logger.debug(`Pinging all workers (timeout ${timeoutMs}ms)`);
      }

      const result = await this.transport.ping(timeoutMs, destinations, request.signal);
      const workers = [...result.responses.values()].sort(byIdentity);
      this.logger.log(`${workers.length} worker(s) replied, stopped on ${result.stopReason}`);

      return {
        workers,
        stopReason: result.stopReason,
        elapsedMs: Date.now() - startedAt,
        transport: this.transport.kind,
        broker,
      };
    } finally {
      await this.transport.close();
    }
  }
}
