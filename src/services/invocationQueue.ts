import Bottleneck from 'bottleneck';

/**
 * Runs oracle invocations one at a time, in arrival order.
 * The oracle loads and saves its whole state per call, so overlapping calls
 * would lose writes.
 */
export class InvocationQueue {
  private limiter: Bottleneck;

  constructor() {
    this.limiter = new Bottleneck({ maxConcurrent: 1 });
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return this.limiter.schedule(task);
  }

  get pending(): number {
    const { QUEUED, RUNNING } = this.limiter.counts();
    return QUEUED + RUNNING;
  }

  async close(): Promise<void> {
    await this.limiter.stop({ dropWaitingJobs: false });
  }
}
