/**
 * Lifetime Tracker
 *
 * Turns the remaining lifetime reported at acquisition time into an absolute
 * expiry timestamp. It is the only writer of that timestamp.
 */

import { SystemClock, type Clock } from '../utils/clock.js';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Render a Date as "YYYY-MM-DD HH:mm:ss" in local time
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export class LifetimeTracker {
  private expiry: Date | null = null;

  constructor(private readonly clock: Clock = new SystemClock()) {}

  /**
   * Record the remaining lifetime of freshly acquired credentials
   *
   * A non-negative integer sets the expiry to now + seconds (second
   * precision); anything else clears it.
   */
  recordLifetime(seconds: number | null | undefined): void {
    if (typeof seconds === 'number' && Number.isInteger(seconds) && seconds >= 0) {
      const nowSeconds = Math.floor(this.clock.now().getTime() / 1000);
      this.expiry = new Date((nowSeconds + seconds) * 1000);
    } else {
      this.expiry = null;
    }
  }

  get expiresAt(): Date | null {
    return this.expiry === null ? null : new Date(this.expiry.getTime());
  }

  /**
   * Expiry as "YYYY-MM-DD HH:mm:ss", or null when absent
   */
  get lifetime(): string | null {
    return this.expiry === null ? null : formatTimestamp(this.expiry);
  }

  /**
   * Seconds left according to the recorded expiry (may be negative)
   */
  remainingSeconds(): number | null {
    if (this.expiry === null) {
      return null;
    }
    return Math.floor((this.expiry.getTime() - this.clock.now().getTime()) / 1000);
  }
}
