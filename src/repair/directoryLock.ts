import { resolve } from "node:path";

/**
 * Per-directory mutual exclusion. Work for the same resolved path runs one
 * after another in arrival order; different paths do not wait on each other.
 */
export class DirectoryLock {
  private readonly tails = new Map<string, Promise<void>>();

  isLocked(dir: string): boolean {
    return this.tails.has(resolve(dir));
  }

  async run<T>(dir: string, fn: () => Promise<T>): Promise<T> {
    const key = resolve(dir);
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const held = new Promise<void>((done) => {
      release = done;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}

export const sessionLocks = new DirectoryLock();
