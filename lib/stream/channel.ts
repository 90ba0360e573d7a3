/**
 * Bounded async queue between one producer and one consumer.
 *
 * `push` waits while the buffer is full; `take` waits while it is empty.
 * `close(final)` ends the channel, optionally appending one last item that
 * bypasses the capacity check, so a terminal message is never dropped.
 */
export class BoundedChannel<T> {
  private readonly buffer: T[] = [];
  private readonly putters: Array<() => void> = [];
  private taker: ((r: IteratorResult<T, undefined>) => void) | null = null;
  private closed = false;

  constructor(private readonly capacity: number) {
    if (capacity < 1) throw new RangeError('channel capacity must be at least 1');
  }

  get length(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Enqueue `item`, waiting for room. Resolves false without enqueueing when the
   * channel is closed or `signal` fires first.
   */
  async push(item: T, signal?: AbortSignal): Promise<boolean> {
    while (!this.closed && this.buffer.length >= this.capacity) {
      if (signal?.aborted) return false;
      await this.waitForRoom(signal);
    }
    if (this.closed || signal?.aborted) return false;
    this.deliver(item);
    return true;
  }

  private waitForRoom(signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve) => {
      const wake = () => {
        signal?.removeEventListener('abort', wake);
        const idx = this.putters.indexOf(wake);
        if (idx >= 0) this.putters.splice(idx, 1);
        resolve();
      };
      this.putters.push(wake);
      signal?.addEventListener('abort', wake, { once: true });
    });
  }

  private deliver(item: T): void {
    if (this.taker) {
      const take = this.taker;
      this.taker = null;
      take({ value: item, done: false });
      return;
    }
    this.buffer.push(item);
  }

  /** Next item, or `done` once the channel is closed and drained. */
  take(): Promise<IteratorResult<T, undefined>> {
    const item = this.buffer.shift();
    if (item !== undefined) {
      this.putters[0]?.();
      return Promise.resolve({ value: item, done: false });
    }
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => {
      this.taker = resolve;
    });
  }

  close(final?: T): void {
    if (this.closed) return;
    if (final !== undefined) this.deliver(final);
    this.closed = true;
    for (const wake of [...this.putters]) wake();
    if (this.taker) {
      const take = this.taker;
      this.taker = null;
      take({ value: undefined, done: true });
    }
  }

  /** Close and drop everything still buffered. */
  discard(): void {
    this.buffer.length = 0;
    this.close();
  }
}

export default BoundedChannel;
