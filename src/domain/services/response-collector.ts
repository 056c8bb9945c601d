import { WorkerResponse } from '../entities/worker-response.entity';
import { DecodeError } from '../errors/broker.errors';
import { ResponseDocument } from '../types/control-message.types';
import { ProtocolCodec } from './protocol-codec.service';

export type StopReason =
  | 'deadline'
  | 'quiet-period'
  | 'aborted'
  | 'connection-lost'
  | 'stream-closed';

export type IngestOutcome =
  | { kind: 'accepted'; identity: string; replaced: boolean }
  | { kind: 'malformed'; error: DecodeError }
  | { kind: 'invalid' };

export interface CollectorPolicy {
  /** Stop once replies have gone quiet, provided at least one arrived. */
  earlyQuietStop: boolean;
  /** Smallest wait the transport can issue; less remaining time ends the loop. */
  minWaitMs: number;
}

export interface WaitState {
  elapsedMs: number;
  deadlineMs: number;
  responseCount: number;
  quietPeriodElapsed: boolean;
  aborted?: boolean;
}

/** Why the loop should stop now, or `null` to keep waiting. */
export function decideStop(state: WaitState, policy: CollectorPolicy): StopReason | null {
  if (state.aborted) {
    return 'aborted';
  }
  const remaining = state.deadlineMs - state.elapsedMs;
  if (remaining <= 0 || remaining < policy.minWaitMs) {
    return 'deadline';
  }
  if (policy.earlyQuietStop && state.quietPeriodElapsed && state.responseCount > 0) {
    return 'quiet-period';
  }
  return null;
}

export function shouldKeepWaiting(state: WaitState, policy: CollectorPolicy): boolean {
  return decideStop(state, policy) === null;
}

/**
 * Deduplicating sink for one ping. Keyed by worker identity, last write wins.
 */
export class ResponseCollector {
  private readonly responses = new Map<string, WorkerResponse>();

  constructor(
    private readonly codec: ProtocolCodec,
    readonly policy: CollectorPolicy,
  ) {}

  ingest(payload: Buffer | string, receivedAt: Date = new Date()): IngestOutcome {
    let parsed: ResponseDocument;
    try {
      parsed = this.codec.decodeResponse(payload);
    } catch (error) {
      if (error instanceof DecodeError) {
        return { kind: 'malformed', error };
      }
      throw error;
    }

    if (!this.codec.validateResponse(parsed)) {
      return { kind: 'invalid' };
    }
    const identity = this.codec.extractIdentity(parsed);
    if (!identity) {
      return { kind: 'invalid' };
    }

    const replaced = this.responses.has(identity);
    this.responses.set(identity, WorkerResponse.pong(identity, receivedAt));
    return { kind: 'accepted', identity, replaced };
  }

  decide(state: Omit<WaitState, 'responseCount'>): StopReason | null {
    return decideStop({ ...state, responseCount: this.responses.size }, this.policy);
  }

  get size(): number {
    return this.responses.size;
  }

  snapshot(): ReadonlyMap<string, WorkerResponse> {
    return new Map(this.responses);
  }
}
