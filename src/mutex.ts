export class Mutex {
  private chain: Promise<void> = Promise.resolve();
  private queued = 0;

  // Callers currently holding or waiting for the lock.
  get pending(): number {
    return this.queued;
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    this.queued++;
    const release = () => {
      this.queued--;
    };
    const next = this.chain.then(fn, fn);
    this.chain = next.then(release, release);
    return next;
  }
}
