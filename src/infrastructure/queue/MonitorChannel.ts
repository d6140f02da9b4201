/**
 * Ordered multi-consumer event channel.
 *
 * The producer only publishes; every consumer owns a subscription and drains it
 * on its own schedule. Nothing is ever invoked on a consumer from publish().
 */
export class MonitorChannel<T> {
  private readonly subscriptions = new Set<ChannelSubscription<T>>();
  private closed = false;

  subscribe(): ChannelSubscription<T> {
    const subscription = new ChannelSubscription<T>((sub) => this.subscriptions.delete(sub));
    if (this.closed) {
      subscription.complete();
    } else {
      this.subscriptions.add(subscription);
    }
    return subscription;
  }

  /**
   * Returns false when the channel is already closed
   */
  publish(event: T): boolean {
    if (this.closed) return false;
    for (const subscription of this.subscriptions) {
      subscription.deliver(event);
    }
    return true;
  }

  /**
   * Pending events stay drainable; subscriptions end once emptied
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const subscription of this.subscriptions) {
      subscription.complete();
    }
    this.subscriptions.clear();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get subscriberCount(): number {
    return this.subscriptions.size;
  }
}

interface PendingRead<T> {
  resolve: (value: T | null) => void;
  timer: NodeJS.Timeout | null;
}

export class ChannelSubscription<T> {
  private buffer: T[] = [];
  private readers: PendingRead<T>[] = [];
  private ended = false;

  constructor(private readonly onUnsubscribe: (subscription: ChannelSubscription<T>) => void) {}

  /** Called by the channel */
  deliver(event: T): void {
    if (this.ended) return;
    const reader = this.readers.shift();
    if (reader) {
      if (reader.timer) clearTimeout(reader.timer);
      reader.resolve(event);
      return;
    }
    this.buffer.push(event);
  }

  /** Called by the channel */
  complete(): void {
    this.ended = true;
    for (const reader of this.readers) {
      if (reader.timer) clearTimeout(reader.timer);
      reader.resolve(null);
    }
    this.readers = [];
  }

  /**
   * Take every buffered event in publish order
   */
  drain(): T[] {
    const events = this.buffer;
    this.buffer = [];
    return events;
  }

  /**
   * Next event, or null on timeout or once the channel has closed and the buffer is empty
   */
  next(timeoutMs?: number): Promise<T | null> {
    const buffered = this.buffer.shift();
    if (buffered !== undefined) return Promise.resolve(buffered);
    if (this.ended) return Promise.resolve(null);

    return new Promise<T | null>((resolve) => {
      const reader: PendingRead<T> = { resolve, timer: null };
      if (timeoutMs !== undefined) {
        reader.timer = setTimeout(() => {
          this.readers = this.readers.filter((r) => r !== reader);
          resolve(null);
        }, timeoutMs);
      }
      this.readers.push(reader);
    });
  }

  get pending(): number {
    return this.buffer.length;
  }

  /**
   * Closed and fully drained
   */
  get isClosed(): boolean {
    return this.ended && this.buffer.length === 0;
  }

  unsubscribe(): void {
    this.onUnsubscribe(this);
    this.complete();
    this.buffer = [];
  }
}
