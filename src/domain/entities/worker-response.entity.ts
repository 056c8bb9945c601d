import { PONG_STATUS } from '../constants/pidbox.constants';

export class WorkerResponse {
  constructor(
    public readonly identity: string,
    public readonly status: string,
    public readonly receivedAt: Date,
  ) {
    if (!identity) {
      throw new Error('Worker identity must not be empty');
    }
  }

  static pong(identity: string, receivedAt: Date = new Date()): WorkerResponse {
    return new WorkerResponse(identity, PONG_STATUS, receivedAt);
  }

  toJSON(): { status: string; observed_at: string } {
    return { status: this.status, observed_at: this.receivedAt.toISOString() };
  }
}
