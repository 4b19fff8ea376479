import type { ProgressEvent } from '../../core/entities/ProgressEvent.js';

/**
 * A single subscriber's view of one job's events.
 * Iterate it to receive events in publish order; iteration ends when the
 * job's channel closes or the subscriber calls close().
 */
export class ProgressSubscription implements AsyncIterableIterator<ProgressEvent> {
  private queue: ProgressEvent[] = [];
  private waiting: ((result: IteratorResult<ProgressEvent>) => void) | null = null;
  private ended = false;

  constructor(
    readonly jobId: string,
    private onClose: (subscription: ProgressSubscription) => void
  ) {}

  /** @internal */
  push(event: ProgressEvent): void {
    if (this.ended) return;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: event, done: false });
      return;
    }
    this.queue.push(event);
  }

  /** @internal Queued events are still delivered before iteration ends. */
  end(): void {
    if (this.ended) return;
    this.ended = true;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: undefined, done: true });
    }
  }

  get isEnded(): boolean {
    return this.ended && this.queue.length === 0;
  }

  next(): Promise<IteratorResult<ProgressEvent>> {
    const event = this.queue.shift();
    if (event) return Promise.resolve({ value: event, done: false });
    if (this.ended) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  return(): Promise<IteratorResult<ProgressEvent>> {
    this.close();
    return Promise.resolve({ value: undefined, done: true });
  }

  /**
   * Unsubscribe. Safe to call at any time, including while events are being published.
   */
  close(): void {
    this.queue = [];
    this.end();
    this.onClose(this);
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<ProgressEvent> {
    return this;
  }
}

/**
 * Per-job broadcast of progress events.
 *
 * A topic closes once its job reaches a terminal state; the closing event
 * is kept so that late subscribers still learn how the job ended.
 */
export class ProgressChannel {
  private topics: Map<string, Set<ProgressSubscription>> = new Map();
  private closed: Map<string, ProgressEvent | null> = new Map();

  publish(event: ProgressEvent): void {
    if (this.closed.has(event.jobId)) return;
    const subscribers = this.topics.get(event.jobId);
    if (!subscribers) return;

    // Snapshot, so subscribers may leave while we deliver
    for (const subscription of [...subscribers]) {
      subscription.push(event);
    }
  }

  /**
   * Deliver the closing event and end every subscription for the job
   */
  close(jobId: string, closingEvent: ProgressEvent | null): void {
    if (this.closed.has(jobId)) return;
    this.closed.set(jobId, closingEvent);

    const subscribers = this.topics.get(jobId);
    this.topics.delete(jobId);
    if (!subscribers) return;

    for (const subscription of subscribers) {
      if (closingEvent) subscription.push(closingEvent);
      subscription.end();
    }
  }

  subscribe(jobId: string): ProgressSubscription {
    const subscription = new ProgressSubscription(jobId, (sub) => this.unsubscribe(sub));

    if (this.closed.has(jobId)) {
      const closingEvent = this.closed.get(jobId);
      if (closingEvent) subscription.push(closingEvent);
      subscription.end();
      return subscription;
    }

    let subscribers = this.topics.get(jobId);
    if (!subscribers) {
      subscribers = new Set();
      this.topics.set(jobId, subscribers);
    }
    subscribers.add(subscription);
    return subscription;
  }

  isClosed(jobId: string): boolean {
    return this.closed.has(jobId);
  }

  subscriberCount(jobId: string): number {
    return this.topics.get(jobId)?.size ?? 0;
  }

  /**
   * Drop all state for a retired job
   */
  forget(jobId: string): void {
    const subscribers = this.topics.get(jobId);
    this.topics.delete(jobId);
    this.closed.delete(jobId);
    subscribers?.forEach((subscription) => subscription.end());
  }

  private unsubscribe(subscription: ProgressSubscription): void {
    const subscribers = this.topics.get(subscription.jobId);
    if (!subscribers) return;
    subscribers.delete(subscription);
    if (subscribers.size === 0) {
      this.topics.delete(subscription.jobId);
    }
  }
}
