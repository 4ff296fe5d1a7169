export type BackupEvent = { type: 'config-changed' } | { type: 'run-now' };

/**
 * Bounded single-consumer queue. Producers never wait: `trySend()` drops the
 * value and returns false when the buffer is full or the channel is closed.
 */
export class EventChannel<T = BackupEvent> {
  private readonly buffer: T[] = [];
  private closed = false;
  private ready: Promise<void> | null = null;
  private signalReady: (() => void) | null = null;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  trySend(value: T): boolean {
    if (this.closed || this.buffer.length >= this.capacity) {
      return false;
    }
    this.buffer.push(value);
    this.wake();
    return true;
  }

  tryReceive(): T | undefined {
    return this.buffer.shift();
  }

  /**
   * Resolves when a value is buffered or the channel is closed. Repeated calls
   * while waiting share one promise.
   */
  readable(): Promise<void> {
    if (this.buffer.length > 0 || this.closed) {
      return Promise.resolve();
    }
    if (!this.ready) {
      this.ready = new Promise<void>((resolve) => {
        this.signalReady = resolve;
      });
    }
    return this.ready;
  }

  close(): void {
    this.closed = true;
    this.wake();
  }

  private wake(): void {
    const resolve = this.signalReady;
    this.ready = null;
    this.signalReady = null;
    resolve?.();
  }
}
