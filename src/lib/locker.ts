/**
 * Keyed single-flight registry. While a task for a key is pending, every other
 * caller for that key joins it and receives the same result or the same
 * rejection. Different keys never wait on each other.
 */
export class Locker<T> {
  private pending = new Map<string, Promise<T>>()

  run = (key: string, task: () => Promise<T>): Promise<T> => {
    const running = this.pending.get(key)
    if (running) return running

    const promise = Promise.resolve()
      .then(task)
      .finally(() => {
        this.pending.delete(key)
      })
    this.pending.set(key, promise)
    return promise
  }

  isLocked = (key: string) => this.pending.has(key)

  get size() {
    return this.pending.size
  }
}
