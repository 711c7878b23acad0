import { SingleFlightLock } from './single-flight.util';

describe('SingleFlightLock', () => {
  it('rejects a second holder until the first releases', () => {
    const lock = new SingleFlightLock();

    const release = lock.tryAcquire();
    expect(release).not.toBeNull();
    expect(lock.busy).toBe(true);
    expect(lock.tryAcquire()).toBeNull();

    release?.();
    expect(lock.busy).toBe(false);
    expect(lock.tryAcquire()).not.toBeNull();
  });

  it('ignores a stale release after the lock was re-acquired', () => {
    const lock = new SingleFlightLock();
    const first = lock.tryAcquire();
    first?.();
    const second = lock.tryAcquire();

    first?.();

    expect(lock.busy).toBe(true);
    second?.();
    expect(lock.busy).toBe(false);
  });
});
