import { WorkerResponse } from '../../domain/entities/worker-response.entity';
import { StopReason } from '../../domain/services/response-collector';
import { BrokerTransportKind } from '../ports/broker-transport.port';

export interface PingRequest {
  timeoutMs?: number;
  destinations?: readonly string[];
  signal?: AbortSignal;
}

export interface PingReport {
  /** Sorted by identity. */
  workers: WorkerResponse[];
  stopReason: StopReason;
  elapsedMs: number;
  transport: BrokerTransportKind;
  /** Broker URL with the password masked. */
  broker: string;
}
