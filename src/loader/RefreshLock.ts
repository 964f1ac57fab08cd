/**
 * Promise-based mutual exclusion: callers run one at a time, in arrival order.
 */
export class RefreshLock {
  private tail: Promise<void> = Promise.resolve();
  private held = false;

  public isLocked(): boolean {
    return this.held;
  }

  public async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>(resolve => {
      release = resolve;
    });

    await previous;
    this.held = true;
    try {
      return await task();
    } finally {
      this.held = false;
      release();
    }
  }
}
