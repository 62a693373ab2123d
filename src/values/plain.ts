import { TypedValue } from './base.js';
import type { ValueBinding } from './base.js';

export type PlainScalar = string | number | boolean;

/**
 * Whatever a plain property carries: usually a scalar, but lists, maps and null
 * arrive too. Also the untouched payload of a value whose type id is not known.
 */
export type PlainData = unknown;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sameData(a: unknown, b: unknown): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => sameData(item, b[i]));
  }
  if (isRecord(a) && isRecord(b)) {
    const keys = Object.keys(a);
    return keys.length === Object.keys(b).length && keys.every((key) => key in b && sameData(a[key], b[key]));
  }
  return a === b;
}

/**
 * A property without a richer type, most often a string, number or boolean.
 * `valueOf()` yields the data, so arithmetic and relational operators work on
 * scalars directly.
 */
export class PlainValue<T extends PlainData = PlainData> extends TypedValue<T> {
  readonly kind = 'plain';

  /**
   * @param typeId - the wire tag the value was decoded from; 0 unless the tag
   *   was not recognised
   */
  constructor(
    data: T,
    binding?: ValueBinding,
    readonly typeId: number = 0,
  ) {
    super(data, binding);
  }

  override valueOf(): T {
    return this.data;
  }

  equals(other: unknown): boolean {
    if (other instanceof PlainValue) return sameData(this.data, other.data);
    return sameData(this.data, other);
  }

  describe(): string {
    return typeof this.data === 'string' || typeof this.data === 'object'
      ? JSON.stringify(this.data)
      : String(this.data);
  }

  override toString(): string {
    return typeof this.data === 'object' ? JSON.stringify(this.data) : String(this.data);
  }

  toJSON(): T {
    return this.data;
  }
}
