// ============================================================================
// PER-USER LOCKS
// ============================================================================
// A promise chain per key. Work for one key runs strictly in arrival order;
// different keys never wait on each other.

export class UserLocks {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run `work` once every earlier task for `key` has settled
   */
  async run<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Keys with work queued or running */
  get size(): number {
    return this.tails.size;
  }
}
