export const DEFAULT_CHANNEL_CAPACITY = 64;

/**
 * Bounded FIFO between a producer and one asynchronous consumer.
 *
 * `send` waits while the queue is full, so a slow consumer slows the
 * producer down. Events are delivered one at a time in send order. Once the
 * consumer throws, queued and later events are dropped and `close` rejects
 * with that error.
 */
export class EventChannel<T> {
  private readonly queue: T[] = [];
  private spaceWaiters: Array<() => void> = [];
  private draining: Promise<void> | undefined;
  private failure: { error: unknown } | undefined;
  private closed = false;

  constructor(
    private readonly deliver: (event: T) => void | Promise<void>,
    private readonly capacity: number = DEFAULT_CHANNEL_CAPACITY
  ) {
    if (capacity < 1) {
      throw new RangeError("Channel capacity must be at least 1");
    }
  }

  async send(event: T): Promise<void> {
    if (this.closed) {
      throw new Error("Cannot send on a closed channel");
    }
    while (!this.failure && this.queue.length >= this.capacity) {
      await new Promise<void>((resolve) => {
        this.spaceWaiters.push(resolve);
      });
    }
    if (this.failure) return;

    this.queue.push(event);
    if (!this.draining) {
      this.draining = this.drain();
    }
  }

  /**
   * Stop accepting events and resolve once every queued event was delivered.
   */
  async close(): Promise<void> {
    this.closed = true;
    while (this.draining) {
      await this.draining;
    }
    if (this.failure) {
      throw this.failure.error;
    }
  }

  // Every pass awaits the consumer, so `draining` is assigned before this
  // function clears it.
  private async drain(): Promise<void> {
    while (this.queue.length > 0) {
      const [event] = this.queue.splice(0, 1);
      this.spaceWaiters.shift()?.();
      try {
        await this.deliver(event);
      } catch (error) {
        this.failure = { error };
        this.queue.length = 0;
        const waiters = this.spaceWaiters;
        this.spaceWaiters = [];
        waiters.forEach((wake) => wake());
      }
    }
    this.draining = undefined;
  }
}
