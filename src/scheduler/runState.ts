/**
 * "A backup pass is in progress" flag. Only changed through compare-and-set,
 * so at most one caller can move it from idle to running.
 */
export class RunState {
  private running = false;

  get isRunning(): boolean {
    return this.running;
  }

  compareAndSet(expected: boolean, next: boolean): boolean {
    if (this.running !== expected) {
      return false;
    }
    this.running = next;
    return true;
  }

  tryBegin(): boolean {
    return this.compareAndSet(false, true);
  }

  finish(): void {
    this.compareAndSet(true, false);
  }
}
