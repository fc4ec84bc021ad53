/**
 * Per-key async mutex.
 *
 * Work for one key runs strictly one at a time in call order; different
 * keys never wait on each other. A key is released (and forgotten) once
 * its queue drains, so the map only holds keys with work in flight.
 */
export class KeyedMutex<K> {
  private readonly tails = new Map<K, Promise<void>>();

  /** True while work for `key` is running or queued. */
  isLocked(key: K): boolean {
    return this.tails.has(key);
  }

  async run<T>(key: K, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(work);
    const tail = current.then(noop, noop);
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}

function noop(): void {}
