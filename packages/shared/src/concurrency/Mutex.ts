/**
 * Promise-chained mutual exclusion. Callers queue in arrival order and each
 * critical section runs only after the previous one has settled.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(criticalSection: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await previous;
      return await criticalSection();
    } finally {
      release();
    }
  }
}
