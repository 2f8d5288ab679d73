/**
 * Unbounded single-consumer channel
 *
 * Producers push from any task; the consumer awaits `next()` and then takes
 * whatever else is already buffered with `drain()`. Values from one producer
 * come out in the order they were pushed.
 */

export class AsyncChannel<T extends object> {
  private buffer: T[] = [];
  private waiters: Array<(value: T | null) => void> = [];
  private closed = false;

  /**
   * @returns false when the channel is closed and the value was dropped
   */
  push(value: T): boolean {
    if (this.closed) {
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(value);
    } else {
      this.buffer.push(value);
    }
    return true;
  }

  /**
   * Wait for the next value. Resolves to null once the channel is closed and empty.
   */
  next(): Promise<T | null> {
    const value = this.buffer.shift();
    if (value !== undefined) {
      return Promise.resolve(value);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Take everything buffered without waiting
   */
  drain(): T[] {
    const values = this.buffer;
    this.buffer = [];
    return values;
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}

/**
 * Issues monotonically increasing sequence numbers, shared by every task
 * that starts a remote request
 */
export class Sequencer {
  private last = 0;

  next(): number {
    this.last += 1;
    return this.last;
  }

  get current(): number {
    return this.last;
  }
}
