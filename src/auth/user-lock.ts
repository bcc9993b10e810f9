/**
 * Per-user mutual exclusion
 *
 * Work queued for the same user runs one at a time in arrival order;
 * different users never wait on each other.
 */
export class UserLock {
  private tails: Map<string, Promise<void>>;

  constructor() {
    this.tails = new Map();
  }

  async run<T>(user: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(user) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(user, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(user) === tail) {
        this.tails.delete(user);
      }
    }
  }

  isLocked(user: string): boolean {
    return this.tails.has(user);
  }
}
