const noop = () => undefined;

/**
 * Runs async tasks one at a time in submission order. A failing task rejects
 * its own promise only; the queue moves on to the next one.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail
      .then(() => task())
      .finally(() => {
        this.pending -= 1;
      });
    this.tail = result.then(noop, noop);
    return result;
  }

  get size(): number {
    return this.pending;
  }

  get idle(): boolean {
    return this.pending === 0;
  }
}

/** One SerialQueue per key, dropped once the key has nothing queued. */
export class KeyedLock<K> {
  private readonly queues = new Map<K, SerialQueue>();

  async runExclusive<T>(key: K, task: () => T | Promise<T>): Promise<T> {
    let queue = this.queues.get(key);
    if (!queue) {
      queue = new SerialQueue();
      this.queues.set(key, queue);
    }
    try {
      return await queue.run(task);
    } finally {
      if (queue.idle && this.queues.get(key) === queue) {
        this.queues.delete(key);
      }
    }
  }

  isLocked(key: K): boolean {
    return this.queues.has(key);
  }
}
