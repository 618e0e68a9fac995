/**
 * Completion barrier for concurrently running observer sessions.
 *
 * The runner adds one slot per started session; each session calls
 * `done()` exactly once when it returns. `wait()` resolves when the count
 * reaches zero.
 */
export class CompletionBarrier {
  private pending = 0;
  private waiters: Array<() => void> = [];

  add(count = 1): void {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`CompletionBarrier.add: invalid count ${count}`);
    }
    this.pending += count;
  }

  done(): void {
    if (this.pending === 0) {
      throw new Error('CompletionBarrier.done called more times than add');
    }
    this.pending -= 1;
    if (this.pending === 0) {
      for (const resolve of this.waiters.splice(0)) resolve();
    }
  }

  get count(): number {
    return this.pending;
  }

  /**
   * Wait until every slot is released. With a timeout, resolves `false`
   * if slots are still held when it elapses.
   */
  wait(timeoutMs?: number): Promise<boolean> {
    if (this.pending === 0) return Promise.resolve(true);
    return new Promise<boolean>((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const release = () => {
        if (timer) clearTimeout(timer);
        resolve(true);
      };
      this.waiters.push(release);
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== release);
          resolve(false);
        }, timeoutMs);
      }
    });
  }
}
