/**
 * Clock abstraction
 *
 * Lifetime tracking and the in-process GSS-API stand-in read time through
 * this interface so tests can pin it.
 */
export interface Clock {
  now(): Date;
}

/** Wall clock backed by `Date.now()`. */
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}

/** Clock frozen at an instant, movable with `advance()`. */
export class FixedClock implements Clock {
  private current: number;

  constructor(now: Date) {
    this.current = now.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(seconds: number): void {
    this.current += seconds * 1000;
  }
}
