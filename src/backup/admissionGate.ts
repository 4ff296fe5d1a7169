/**
 * Counting limiter for concurrent downloads.
 *
 * `acquire()` resolves true once a slot is held, or false when the signal is
 * aborted first. Every successful acquire must be paired with `release()`.
 */
export class AdmissionGate {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
  }

  get inUse(): number {
    return this.active;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  acquire(signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) {
      return Promise.resolve(false);
    }

    if (this.active < this.capacity) {
      this.active++;
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const grant = () => {
        signal?.removeEventListener('abort', onAbort);
        this.active++;
        resolve(true);
      };

      const onAbort = () => {
        const index = this.waiters.indexOf(grant);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        resolve(false);
      };

      this.waiters.push(grant);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  release(): void {
    if (this.active === 0) {
      throw new Error('release() called without a matching acquire()');
    }
    this.active--;

    const next = this.waiters.shift();
    if (next) {
      next();
    }
  }
}
