/**
 * Coalescing update signal
 *
 * A level-triggered flag: any producer may raise it, the consumer drains
 * it. Raises before a drain collapse into one pending wake-up; nothing is
 * queued or counted.
 */

export class UpdateSignal {
  private raised: boolean;
  private waiters = new Set<() => void>();

  constructor(initiallyRaised = false) {
    this.raised = initiallyRaised;
  }

  /**
   * Raise the flag and wake every waiter
   */
  raise(): void {
    this.raised = true;
    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const wake of waiters) {
      wake();
    }
  }

  /**
   * Clear the flag, returning whether it was raised
   */
  drain(): boolean {
    const wasRaised = this.raised;
    this.raised = false;
    return wasRaised;
  }

  isRaised(): boolean {
    return this.raised;
  }

  /**
   * Wait until the flag is raised, the timeout elapses or `signal` aborts.
   * Resolves true when raised (immediately if already raised), false
   * otherwise. Does not clear the flag.
   */
  wait(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    if (this.raised) {
      return Promise.resolve(true);
    }
    if (signal?.aborted) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      const settle = (raised: boolean) => {
        clearTimeout(timer);
        this.waiters.delete(wake);
        signal?.removeEventListener("abort", onAbort);
        resolve(raised);
      };
      const wake = () => settle(true);
      const onAbort = () => settle(this.raised);
      const timer = setTimeout(() => settle(this.raised), timeoutMs);
      this.waiters.add(wake);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
