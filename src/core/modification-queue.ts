// setTimeout fires immediately for delays above this.
export const MAX_TIMER_DELAY = 2 ** 31 - 1;

/**
 * Paths reported by the directory watcher, waiting for the main loop.
 */
export class ModificationQueue {
  private readonly pending: string[] = [];
  private waiter: (() => void) | undefined;

  get size(): number {
    return this.pending.length;
  }

  push(filePath: string): void {
    if (!this.pending.includes(filePath)) this.pending.push(filePath);
    this.wake();
  }

  /**
   * Remove and return every queued path, oldest first.
   */
  drain(): string[] {
    return this.pending.splice(0);
  }

  /**
   * Resolve after `milliseconds`, or earlier when a path is queued or
   * `wake()` is called.
   */
  wait(milliseconds: number): Promise<void> {
    if (this.pending.length > 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      const done = () => {
        clearTimeout(timer);
        if (this.waiter === done) this.waiter = undefined;
        resolve();
      };
      const timer = setTimeout(done, Math.max(0, Math.min(milliseconds, MAX_TIMER_DELAY)));
      this.waiter = done;
    });
  }

  wake(): void {
    this.waiter?.();
  }
}
