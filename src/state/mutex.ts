/**
 * FIFO async lock. Callers queue behind the previous holder's promise.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = this.tail;
    this.tail = previous.then(() => held);

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
