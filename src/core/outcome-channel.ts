/**
 * Outcome Channel
 *
 * Many-producer, single-consumer async queue. Workers push outcomes;
 * exactly one consumer drains them with `for await`, so the collection
 * it appends to is never touched by a worker.
 */

export class OutcomeChannel<T> implements AsyncIterable<T> {
  private values: T[] = [];
  private readonly pendingResolvers: Array<(value: IteratorResult<T, undefined>) => void> = [];
  private closed = false;
  private failure: Error | null = null;
  private consumerAttached = false;

  /**
   * Enqueue a value. Pushing after close() is a programming error: the
   * consumer would never see the value.
   */
  public push(value: T): void {
    if (this.closed) {
      throw new Error('Cannot push to a closed channel');
    }

    const resolve = this.pendingResolvers.shift();
    if (resolve) {
      resolve({ value, done: false });
      return;
    }

    this.values.push(value);
  }

  public async shift(): Promise<IteratorResult<T, undefined>> {
    if (this.failure) {
      throw this.failure;
    }

    const value = this.values.shift();
    if (value !== undefined) {
      return { value, done: false };
    }

    if (this.closed) {
      return { value: undefined, done: true };
    }

    return new Promise<IteratorResult<T, undefined>>((resolve, reject) => {
      this.pendingResolvers.push((result) => {
        if (this.failure) {
          reject(this.failure);
        } else {
          resolve(result);
        }
      });
    });
  }

  /**
   * No more values. Queued values are still delivered before `done`.
   */
  public close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;

    for (const resolve of this.pendingResolvers.splice(0)) {
      resolve({ value: undefined, done: true });
    }
  }

  /**
   * Abort the consumer: the pending and next shift() reject with `error`
   */
  public fail(error: Error): void {
    if (this.failure) {
      return;
    }

    this.failure = error;
    this.closed = true;
    this.values = [];

    for (const resolve of this.pendingResolvers.splice(0)) {
      resolve({ value: undefined, done: true });
    }
  }

  public [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    if (this.consumerAttached) {
      throw new Error('OutcomeChannel supports a single consumer');
    }
    this.consumerAttached = true;

    return {
      next: () => this.shift(),
    };
  }
}
