import { ArgumentError } from '../errors.js';
import { CompositeValue } from './composite.js';
import type { ValueBinding } from './base.js';

/** A time of day without a date. */
export interface CalendarTime {
  hour: number;
  minute: number;
  second: number;
  millisecond?: number;
}

function isCalendarTime(value: unknown): value is CalendarTime {
  return (
    typeof value === 'object' &&
    value !== null &&
    'hour' in value &&
    'minute' in value &&
    'second' in value &&
    typeof value.hour === 'number' &&
    typeof value.minute === 'number' &&
    typeof value.second === 'number'
  );
}

/**
 * A date and time in UTC, sent as a unix timestamp in seconds. Calendar fields
 * are computed once at construction.
 *
 * Equal to another DateTime, to `[timestamp]`, or to a `Date` at the same instant.
 */
export class DateTime extends CompositeValue {
  readonly kind = 'datetime';
  readonly year: number;
  /** 1-12 */
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  private readonly cachedDate: Date;

  constructor(components: readonly unknown[], binding?: ValueBinding) {
    super('DateTime', 1, components, binding);
    this.cachedDate = new Date(this.timestamp * 1000);
    if (Number.isNaN(this.cachedDate.getTime())) {
      throw new ArgumentError(`DateTime timestamp ${this.timestamp} is out of range`);
    }
    this.year = this.cachedDate.getUTCFullYear();
    this.month = this.cachedDate.getUTCMonth() + 1;
    this.day = this.cachedDate.getUTCDate();
    this.hour = this.cachedDate.getUTCHours();
    this.minute = this.cachedDate.getUTCMinutes();
    this.second = this.cachedDate.getUTCSeconds();
  }

  get timestamp(): number {
    return this.component(0);
  }

  /** A copy of the cached instant. */
  get date(): Date {
    return new Date(this.cachedDate.getTime());
  }

  override equals(other: unknown): boolean {
    if (other instanceof Date) {
      return other.getTime() === this.cachedDate.getTime();
    }
    return super.equals(other);
  }

  override describe(): string {
    return `DateTime(${this.cachedDate.toISOString()})`;
  }
}

const TIME_LIMITS: ReadonlyArray<readonly [field: string, max: number]> = [
  ['hour', 23],
  ['minute', 59],
  ['second', 59],
  ['millisecond', 999],
];

/**
 * A time of day: hours, minutes, seconds and milliseconds. Each field must be an
 * integer within its range.
 *
 * Equal to another Time, to `[h, m, s, ms]`, or to a {@link CalendarTime}.
 */
export class Time extends CompositeValue {
  readonly kind = 'time';
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly millisecond: number;

  constructor(components: readonly unknown[], binding?: ValueBinding) {
    super('Time', 4, components, binding);
    TIME_LIMITS.forEach(([field, max], i) => {
      const value = this.component(i);
      if (!Number.isInteger(value) || value < 0 || value > max) {
        throw new ArgumentError(`Time ${field} must be an integer between 0 and ${max}, got ${value}`);
      }
    });
    this.hour = this.component(0);
    this.minute = this.component(1);
    this.second = this.component(2);
    this.millisecond = this.component(3);
  }

  override equals(other: unknown): boolean {
    if (!(other instanceof CompositeValue) && isCalendarTime(other)) {
      return (
        other.hour === this.hour &&
        other.minute === this.minute &&
        other.second === this.second &&
        (other.millisecond ?? 0) === this.millisecond
      );
    }
    return super.equals(other);
  }

  override describe(): string {
    const pad = (n: number, width = 2): string => String(n).padStart(width, '0');
    return `Time(${pad(this.hour)}:${pad(this.minute)}:${pad(this.second)}.${pad(this.millisecond, 3)})`;
  }
}
