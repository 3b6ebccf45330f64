/**
 * Serializes async tasks per key. Tasks under different keys run freely;
 * tasks under one key run one at a time, in arrival order.
 */
export class KeyedMutex {
  readonly #tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.#tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    const tail: Promise<void> = result.then(
      () => this.#release(key, tail),
      () => this.#release(key, tail),
    );
    this.#tails.set(key, tail);

    return result;
  }

  #release(key: string, tail: Promise<void>): void {
    if (this.#tails.get(key) === tail) {
      this.#tails.delete(key);
    }
  }
}
