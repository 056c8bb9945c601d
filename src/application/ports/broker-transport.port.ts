import { WorkerResponse } from '../../domain/entities/worker-response.entity';
import { StopReason } from '../../domain/services/response-collector';

export type BrokerTransportKind = 'redis' | 'amqp';

export interface PingResult {
  responses: ReadonlyMap<string, WorkerResponse>;
  stopReason: StopReason;
}

/**
 * Broker capability used by the ping use case: one connection, one
 * broadcast-and-collect per `ping` call.
 */
export interface IBrokerTransport {
  readonly kind: BrokerTransportKind;

  /**
   * Opens the broker connection and verifies it.
   * @throws ConnectError when the broker cannot be reached
   * @throws DeclareError when the control exchanges cannot be set up
   */
  connect(): Promise<void>;

  /** Safe to call repeatedly, and before `connect`. */
  close(): Promise<void>;

  /**
   * @throws ConfigurationError when called before `connect`
   * @throws ConnectError when the broker does not answer
   */
  health(): Promise<void>;

  /**
   * Broadcasts a ping and collects replies until the deadline, the abort
   * signal, or a transport-specific early stop. An empty map is a valid
   * result. Reply resources are released on every path.
   */
  ping(
    timeoutMs: number,
    destinations?: readonly string[],
    signal?: AbortSignal,
  ): Promise<PingResult>;
}

export const BROKER_TRANSPORT = 'IBrokerTransport';
