import { Mutex } from 'async-mutex';

interface LockEntry {
  mutex: Mutex;
  holders: number;
}

/**
 * One mutex per key, created on demand and dropped once nobody holds or
 * waits for it. Not reentrant: work running under a key must not ask for
 * the same key again.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, LockEntry>();

  async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
    const entry = this.acquireEntry(key);
    try {
      return await entry.mutex.runExclusive(work);
    } finally {
      entry.holders -= 1;
      if (entry.holders === 0) {
        this.locks.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.locks.get(key)?.mutex.isLocked() ?? false;
  }

  get size(): number {
    return this.locks.size;
  }

  private acquireEntry(key: string): LockEntry {
    const existing = this.locks.get(key);
    if (existing) {
      existing.holders += 1;
      return existing;
    }
    const created: LockEntry = { mutex: new Mutex(), holders: 1 };
    this.locks.set(key, created);
    return created;
  }
}
