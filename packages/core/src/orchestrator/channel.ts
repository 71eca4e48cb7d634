/**
 * Many-producer, single-consumer async queue. Producers `push`; the consumer
 * iterates until `close`, or until `fail` rethrows in the consumer.
 */
export class OutcomeChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private waiting: ((result: IteratorResult<T>) => void) | undefined;
  private rejectWaiting: ((error: unknown) => void) | undefined;
  private closed = false;
  private failure: { error: unknown } | undefined;
  private consumed = false;

  push(value: T): void {
    if (this.closed) {
      throw new Error('Cannot push to a closed channel');
    }
    const waiting = this.waiting;
    if (waiting) {
      this.clearWaiting();
      waiting({ value, done: false });
    } else {
      this.buffer.push(value);
    }
  }

  close(): void {
    this.closed = true;
    const waiting = this.waiting;
    if (waiting) {
      this.clearWaiting();
      waiting({ value: undefined, done: true });
    }
  }

  fail(error: unknown): void {
    this.failure = { error };
    this.closed = true;
    const reject = this.rejectWaiting;
    if (reject) {
      this.clearWaiting();
      reject(error);
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.consumed) {
      throw new Error('Channel already has a consumer');
    }
    this.consumed = true;
    return { next: () => this.next() };
  }

  private next(): Promise<IteratorResult<T>> {
    const value = this.buffer.shift();
    if (value !== undefined) {
      return Promise.resolve({ value, done: false });
    }
    if (this.failure) {
      return Promise.reject(this.failure.error);
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => {
      this.waiting = resolve;
      this.rejectWaiting = reject;
    });
  }

  private clearWaiting(): void {
    this.waiting = undefined;
    this.rejectWaiting = undefined;
  }
}
