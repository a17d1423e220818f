/**
 * Per-collection reader/writer exclusion
 *
 * Reads of a collection may overlap each other; a write excludes every
 * other read and write of the same collection. Waiters are granted in
 * arrival order, so a queued writer is never starved by later readers.
 * Different collections never wait on each other.
 */

type LockMode = 'read' | 'write';

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

class ReadWriteLock {
  private activeReaders = 0;
  private writerActive = false;
  private waiters: Waiter[] = [];

  get idle(): boolean {
    return this.activeReaders === 0 && !this.writerActive && this.waiters.length === 0;
  }

  acquire(mode: LockMode): Promise<void> {
    if (this.waiters.length === 0 && this.canGrant(mode)) {
      this.take(mode);
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.waiters.push({ mode, grant: resolve });
    });
  }

  release(mode: LockMode): void {
    if (mode === 'write') {
      this.writerActive = false;
    } else {
      this.activeReaders--;
    }
    this.drain();
  }

  private canGrant(mode: LockMode): boolean {
    return mode === 'read'
      ? !this.writerActive
      : !this.writerActive && this.activeReaders === 0;
  }

  private take(mode: LockMode): void {
    if (mode === 'write') {
      this.writerActive = true;
    } else {
      this.activeReaders++;
    }
  }

  private drain(): void {
    let next = this.waiters[0];
    while (next && this.canGrant(next.mode)) {
      this.waiters.shift();
      this.take(next.mode);
      next.grant();
      next = this.waiters[0];
    }
  }
}

/**
 * Registry of one reader/writer lock per collection
 */
export class CollectionLocks {
  private locks: Map<string, ReadWriteLock> = new Map();

  /**
   * Run `fn` while holding shared access to `collection`
   */
  read<T>(collection: string, fn: () => Promise<T>): Promise<T> {
    return this.withLock(collection, 'read', fn);
  }

  /**
   * Run `fn` while holding exclusive access to `collection`
   */
  write<T>(collection: string, fn: () => Promise<T>): Promise<T> {
    return this.withLock(collection, 'write', fn);
  }

  /**
   * Number of collections with a live lock (held or awaited)
   */
  get activeCollections(): number {
    return this.locks.size;
  }

  private async withLock<T>(collection: string, mode: LockMode, fn: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(collection);
    if (!lock) {
      lock = new ReadWriteLock();
      this.locks.set(collection, lock);
    }

    await lock.acquire(mode);
    try {
      return await fn();
    } finally {
      lock.release(mode);
      if (lock.idle && this.locks.get(collection) === lock) {
        this.locks.delete(collection);
      }
    }
  }
}
