/**
 * One exclusive lane per key
 *
 * Jobs for the same key run one after the other, jobs for different keys
 * don't wait on each other. Lanes are dropped once they drain.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  public async run<A>(key: string, job: () => Promise<A>): Promise<A> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release = () => {};
    const tail = new Promise<void>(ok => { release = () => ok(); });
    this.tails.set(key, tail);

    await previous;
    try {
      return await job();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Number of keys with queued or running jobs
   */
  public get activeKeys() {
    return this.tails.size;
  }
}
