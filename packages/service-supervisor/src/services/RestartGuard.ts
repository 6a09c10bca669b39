import { RestartAlreadyInProgress } from '../errors.js';

export interface RestartLease {
  readonly released: boolean;
  release(): void;
}

/**
 * Single-acquire flag for the restart sequence. A second acquirer is
 * refused, never queued.
 */
export class RestartGuard {
  private current: RestartLease | null = null;

  get inProgress(): boolean {
    return this.current !== null;
  }

  tryAcquire(): RestartLease | null {
    if (this.current) {
      return null;
    }

    let released = false;
    const lease: RestartLease = {
      get released() {
        return released;
      },
      release: () => {
        if (released) {
          return;
        }
        released = true;
        if (this.current === lease) {
          this.current = null;
        }
      },
    };

    this.current = lease;
    return lease;
  }

  holds(lease: RestartLease): boolean {
    return this.current === lease && !lease.released;
  }

  /**
   * Runs `task` while holding the lease; the lease is released however the
   * task settles.
   */
  async runExclusive<T>(task: (lease: RestartLease) => Promise<T>): Promise<T> {
    const lease = this.tryAcquire();
    if (!lease) {
      throw new RestartAlreadyInProgress();
    }

    try {
      return await task(lease);
    } finally {
      lease.release();
    }
  }
}
