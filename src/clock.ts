/**
 * Clock abstraction.
 *
 * - `now()` returns the current instant as a `Date`.
 * - `timestamp()` returns the current local time as a "YYYY-MM-DD HH:MM:SS"
 *   string, the form stored in key records.
 */
export interface Clock {
  now(): Date;
  timestamp(): string;
}

function pad2(n: number): string {
  return n.toString().padStart(2, '0');
}

/**
 * Render a date as local wall-clock time with second precision.
 * Sub-second components are dropped, not rounded.
 */
export function formatTimestamp(date: Date): string {
  const ymd = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const hms = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${ymd} ${hms}`;
}

/** Real wall-clock backed by `Date.now()`. */
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  timestamp(): string {
    return formatTimestamp(this.now());
  }
}

/** Clock frozen at a specific instant. Useful for deterministic tests. */
export class FixedClock implements Clock {
  private _now: Date;

  constructor(now: Date) {
    this._now = new Date(now.getTime());
  }

  now(): Date {
    return new Date(this._now.getTime());
  }

  timestamp(): string {
    return formatTimestamp(this._now);
  }

  /** Move the frozen instant forward by `ms` milliseconds. */
  advance(ms: number): void {
    this._now = new Date(this._now.getTime() + ms);
  }
}
