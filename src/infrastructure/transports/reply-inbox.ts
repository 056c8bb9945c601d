export type InboxEvent =
  | { kind: 'message'; payload: Buffer }
  | { kind: 'timeout' }
  | { kind: 'closed' }
  | { kind: 'lost' }
  | { kind: 'aborted' };

/** `closed`: the consumer ended. `lost`: the channel or connection went away. */
export type InboxCloseKind = 'closed' | 'lost';

/**
 * Buffers pushed reply payloads and hands them to a single awaiting reader.
 * Queued messages are drained before a close is reported.
 */
export class ReplyInbox {
  private readonly queue: Buffer[] = [];
  private closedAs: InboxCloseKind | null = null;
  private waiter: ((event: InboxEvent) => void) | null = null;

  push(payload: Buffer): void {
    if (this.closedAs) return;
    if (this.waiter) {
      this.waiter({ kind: 'message', payload });
      return;
    }
    this.queue.push(payload);
  }

  close(kind: InboxCloseKind = 'closed'): void {
    if (this.closedAs) return;
    this.closedAs = kind;
    if (this.waiter) {
      this.waiter({ kind });
    }
  }

  next(timeoutMs: number, signal?: AbortSignal): Promise<InboxEvent> {
    const queued = this.queue.shift();
    if (queued !== undefined) {
      return Promise.resolve({ kind: 'message', payload: queued });
    }
    if (this.closedAs) {
      return Promise.resolve<InboxEvent>({ kind: this.closedAs });
    }
    if (signal?.aborted) {
      return Promise.resolve({ kind: 'aborted' });
    }

    return new Promise<InboxEvent>((resolve) => {
      const finish = (event: InboxEvent): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.waiter = null;
        resolve(event);
      };
      const onAbort = (): void => finish({ kind: 'aborted' });
      const timer = setTimeout(() => finish({ kind: 'timeout' }), Math.max(0, timeoutMs));
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiter = finish;
    });
  }
}
