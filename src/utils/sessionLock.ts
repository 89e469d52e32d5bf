/**
 * Keyed mutex: tasks for the same session id run one after another in
 * arrival order, tasks for different ids run independently.
 */
export class SessionLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(sessionId) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(sessionId, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(sessionId) === tail) {
        this.tails.delete(sessionId);
      }
    }
  }

  /** Number of session ids with queued or running work. */
  get activeKeys() {
    return this.tails.size;
  }
}
