import type { WaitOptions } from '../types.js';
import { waitForValue } from './wait.js';

export type ValueKind = 'plain' | 'rectangle' | 'point' | 'size' | 'color' | 'datetime' | 'time';

/** A freshly fetched copy of one property, not yet installed on its owner. */
export interface PolledProperty {
  value: TypedValue<unknown>;
  /** Replace the owner's snapshot with the one this value was read from. */
  commit(): void;
}

/**
 * What a value needs from the object it was read from in order to poll for a
 * new value. Implemented by StateObject.
 */
export interface ValueOwner {
  readonly typeName: string;
  readonly waitDefaults: Readonly<Required<WaitOptions>>;
  pollProperty(name: string): Promise<PolledProperty>;
}

export interface ValueBinding {
  owner: ValueOwner;
  name: string;
}

/**
 * Compares an observed value. Returns a description of the mismatch, or
 * undefined when the value matches.
 */
export interface Matcher {
  match(actual: TypedValue<unknown>): string | undefined;
}

export type Predicate = (actual: TypedValue<unknown>) => boolean;

/**
 * Base of every decoded property value. Holds the decoded data and, for values
 * read from a StateObject, the owner and property name that waitFor polls.
 */
export abstract class TypedValue<T> {
  abstract readonly kind: ValueKind;

  protected constructor(
    readonly data: T,
    readonly binding: ValueBinding | undefined,
  ) {}

  get owner(): ValueOwner | undefined {
    return this.binding?.owner;
  }

  get name(): string | undefined {
    return this.binding?.name;
  }

  /** True when `other` is an equal value of the same kind, or a raw equivalent. */
  abstract equals(other: unknown): boolean;

  /** Human-readable rendering used in mismatch descriptions. */
  abstract describe(): string;

  toString(): string {
    return this.describe();
  }

  /**
   * Wait for this property to take the expected value, polling the owner.
   *
   * `expected` is compared with {@link equals} unless it is a {@link Matcher}
   * or a {@link Predicate}. Returns at once, without polling, when the current
   * value already matches.
   *
   * @throws WaitTimeoutError when the value is still different after the timeout
   * @throws UnboundValueError when the value does not belong to an object
   */
  waitFor(expected: unknown, options?: WaitOptions): Promise<void> {
    return waitForValue(this, expected, options);
  }
}
