const settled = (promise: Promise<unknown>): Promise<void> =>
  promise.then(
    () => undefined,
    () => undefined,
  );

/**
 * Runs tasks that share a key one after another, in call order.
 * Tasks under different keys are not ordered against each other, except
 * around an exclusive task, which waits for all queued work and holds back
 * everything queued after it.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();
  private barrier: Promise<void> = Promise.resolve();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = Promise.all([this.barrier, this.tails.get(key) ?? Promise.resolve()]);
    const result = previous.then(() => task());
    const tail = settled(result);
    this.tails.set(key, tail);

    try {
      return await result;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = Promise.all([this.barrier, ...this.tails.values()]);
    const result = previous.then(() => task());
    const tail = settled(result);
    this.barrier = tail;

    try {
      return await result;
    } finally {
      if (this.barrier === tail) {
        this.barrier = Promise.resolve();
      }
    }
  }

  /** Number of keys with queued or running work. */
  get pending(): number {
    return this.tails.size;
  }
}

export default KeyedLock;
