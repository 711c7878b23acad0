export type ReleaseFn = () => void;

/**
 * Non-queuing mutual exclusion: a caller either gets the lock right away or
 * is told it is taken. The returned release function is idempotent.
 */
export class SingleFlightLock {
  private token: symbol | null = null;

  get busy(): boolean {
    return this.token !== null;
  }

  tryAcquire(): ReleaseFn | null {
    if (this.token) {
      return null;
    }
    const token = Symbol('run');
    this.token = token;
    return () => {
      if (this.token === token) {
        this.token = null;
      }
    };
  }
}
