/**
 * Failed login timestamps per identifier (card id or manual login name),
 * counted over a rolling lockout window.
 */
export class LoginAttemptTracker {
  private failures = new Map<string, number[]>();
  private windowMs: number;
  private sweepAt: number;

  /**
   * @param sweepAt - tracked identifiers at which a failure first drops every expired one
   */
  constructor(windowMs: number, sweepAt = 1000) {
    this.windowMs = windowMs;
    this.sweepAt = sweepAt;
  }

  get size(): number {
    return this.failures.size;
  }

  /**
   * Drops failures that left the window and returns how many remain.
   */
  prune(identifier: string, now: Date): number {
    const entries = this.failures.get(identifier);
    if (!entries) return 0;

    const cutoff = now.getTime() - this.windowMs;
    const kept = entries.filter((at) => at > cutoff);
    if (kept.length === 0) {
      this.failures.delete(identifier);
    } else {
      this.failures.set(identifier, kept);
    }
    return kept.length;
  }

  count(identifier: string, now: Date): number {
    return this.prune(identifier, now);
  }

  recordFailure(identifier: string, now: Date): number {
    if (this.failures.size >= this.sweepAt) {
      this.sweep(now);
    }
    const kept = this.prune(identifier, now);
    const entries = this.failures.get(identifier) ?? [];
    entries.push(now.getTime());
    this.failures.set(identifier, entries);
    return kept + 1;
  }

  sweep(now: Date): void {
    for (const identifier of [...this.failures.keys()]) {
      this.prune(identifier, now);
    }
  }

  clear(identifier: string): boolean {
    return this.failures.delete(identifier);
  }

  /**
   * Time until the oldest retained failure leaves the window.
   */
  remainingLockoutMs(identifier: string, now: Date): number {
    this.prune(identifier, now);
    const entries = this.failures.get(identifier);
    if (!entries || entries.length === 0) return 0;

    const oldest = Math.min(...entries);
    return Math.max(0, oldest + this.windowMs - now.getTime());
  }

  lockedIdentifiers(threshold: number, now: Date): string[] {
    const locked: string[] = [];
    for (const identifier of [...this.failures.keys()]) {
      if (this.prune(identifier, now) >= threshold) {
        locked.push(identifier);
      }
    }
    return locked;
  }

  failuresSince(since: Date, now: Date): number {
    let total = 0;
    for (const identifier of [...this.failures.keys()]) {
      this.prune(identifier, now);
      const entries = this.failures.get(identifier) ?? [];
      total += entries.filter((at) => at >= since.getTime()).length;
    }
    return total;
  }
}
