export const DEFAULT_SUPPRESSION_WINDOW_MS = 2000;

/**
 * A card held against the reader repeats its id for as long as it stays there.
 * Only the first read of a run becomes a scan event.
 */
export class DuplicateSuppressor {
  private lastToken: string | null = null;
  private lastTime = 0;
  private windowMs: number;

  constructor(windowMs: number = DEFAULT_SUPPRESSION_WINDOW_MS) {
    this.windowMs = windowMs;
  }

  accept(token: string, now: Date): boolean {
    const at = now.getTime();
    if (token === this.lastToken && at - this.lastTime < this.windowMs) {
      return false;
    }
    this.lastToken = token;
    this.lastTime = at;
    return true;
  }

  reset(): void {
    this.lastToken = null;
    this.lastTime = 0;
  }
}
