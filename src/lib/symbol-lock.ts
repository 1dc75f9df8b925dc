/**
 * Keyed exclusive section.
 *
 * Tasks sharing a key run one at a time in arrival order; tasks with different
 * keys do not wait on each other. A failed task releases the key like a
 * successful one.
 */
export class SymbolLock {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
