import { ArgumentError } from '../errors.js';
import { TypedValue } from './base.js';
import type { ValueBinding, ValueKind } from './base.js';

function checkComponents(label: string, arity: number, components: readonly unknown[]): readonly number[] {
  if (components.length !== arity) {
    throw new ArgumentError(
      `${label} must be constructed with ${arity} argument${arity === 1 ? '' : 's'}, not ${components.length}`,
    );
  }
  const numbers: number[] = [];
  for (const component of components) {
    if (typeof component !== 'number' || !Number.isFinite(component)) {
      throw new ArgumentError(`${label} components must be finite numbers, got ${String(component)}`);
    }
    numbers.push(component);
  }
  return Object.freeze(numbers);
}

/**
 * A fixed number of numeric components sent as one tagged value. Construction
 * with the wrong number of components throws rather than truncating or padding.
 */
export abstract class CompositeValue extends TypedValue<readonly number[]> {
  abstract override readonly kind: Exclude<ValueKind, 'plain'>;

  protected constructor(
    private readonly label: string,
    arity: number,
    components: readonly unknown[],
    binding: ValueBinding | undefined,
  ) {
    super(checkComponents(label, arity, components), binding);
  }

  get length(): number {
    return this.data.length;
  }

  toArray(): number[] {
    return [...this.data];
  }

  /** Equal to a composite of the same kind, or an array of the same components. */
  equals(other: unknown): boolean {
    if (other instanceof CompositeValue) {
      return other.kind === this.kind && this.sameComponents(other.data);
    }
    if (Array.isArray(other)) {
      return this.sameComponents(other);
    }
    return false;
  }

  describe(): string {
    return `${this.label}(${this.data.join(', ')})`;
  }

  toJSON(): number[] {
    return this.toArray();
  }

  protected component(index: number): number {
    const value = this.data[index];
    if (value === undefined) {
      throw new ArgumentError(`${this.label} has no component ${index}`);
    }
    return value;
  }

  private sameComponents(other: readonly unknown[]): boolean {
    return other.length === this.data.length && this.data.every((value, i) => value === other[i]);
  }
}

/**
 * A rectangle in cartesian space.
 *
 * @example
 * const rect = new Rectangle([12, 13, 100, 150]);
 * rect.width === rect.w; // 100
 * rect.equals([12, 13, 100, 150]); // true
 */
export class Rectangle extends CompositeValue {
  readonly kind = 'rectangle';

  constructor(components: readonly unknown[], binding?: ValueBinding) {
    super('Rectangle', 4, components, binding);
  }

  get x(): number { return this.component(0); }
  get y(): number { return this.component(1); }
  get w(): number { return this.component(2); }
  get width(): number { return this.component(2); }
  get h(): number { return this.component(3); }
  get height(): number { return this.component(3); }
}

export class Point extends CompositeValue {
  readonly kind = 'point';

  constructor(components: readonly unknown[], binding?: ValueBinding) {
    super('Point', 2, components, binding);
  }

  get x(): number { return this.component(0); }
  get y(): number { return this.component(1); }
}

export class Size extends CompositeValue {
  readonly kind = 'size';

  constructor(components: readonly unknown[], binding?: ValueBinding) {
    super('Size', 2, components, binding);
  }

  get w(): number { return this.component(0); }
  get width(): number { return this.component(0); }
  get h(): number { return this.component(1); }
  get height(): number { return this.component(1); }
}

/** An RGBA color. */
export class Color extends CompositeValue {
  readonly kind = 'color';

  constructor(components: readonly unknown[], binding?: ValueBinding) {
    super('Color', 4, components, binding);
  }

  get red(): number { return this.component(0); }
  get green(): number { return this.component(1); }
  get blue(): number { return this.component(2); }
  get alpha(): number { return this.component(3); }
}
