import { logWarn } from '../utils';

const TAG = 'ratelimit';

/**
 * Sliding-window limiter keyed by caller (remote address).
 * A limit of 0 disables it.
 */
export class RateLimiter {
  private windows: Map<string, number[]> = new Map(); // key → request timestamps
  private maxPerWindow: number;
  private windowMs: number;
  private now: () => number;

  constructor(maxPerWindow: number, windowMs: number, now: () => number = Date.now) {
    this.maxPerWindow = maxPerWindow;
    this.windowMs = windowMs;
    this.now = now;
  }

  isEnabled(): boolean {
    return this.maxPerWindow > 0;
  }

  /**
   * Record one request for `key`. False when the key is over its allowance.
   */
  allow(key: string): boolean {
    if (!this.isEnabled()) return true;
    const now = this.now();
    const timestamps = this.recent(key, now);

    if (timestamps.length >= this.maxPerWindow) {
      logWarn(TAG, `Rate limited: ${key} (${timestamps.length}/${this.maxPerWindow} in window)`);
      this.windows.set(key, timestamps);
      return false;
    }

    timestamps.push(now);
    this.windows.set(key, timestamps);
    return true;
  }

  remaining(key: string): number {
    if (!this.isEnabled()) return Infinity;
    return Math.max(0, this.maxPerWindow - this.recent(key, this.now()).length);
  }

  /**
   * Drop keys with no requests left in the window.
   */
  cleanup(): void {
    const now = this.now();
    for (const key of Array.from(this.windows.keys())) {
      const fresh = this.recent(key, now);
      if (fresh.length === 0) {
        this.windows.delete(key);
      } else {
        this.windows.set(key, fresh);
      }
    }
  }

  trackedKeys(): number {
    return this.windows.size;
  }

  private recent(key: string, now: number): number[] {
    const cutoff = now - this.windowMs;
    return (this.windows.get(key) || []).filter(t => t > cutoff);
  }
}
