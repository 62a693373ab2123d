import type { Matcher, TypedValue } from './base.js';
import { PlainValue } from './plain.js';
import { describeExpected } from './wait.js';

function ordered(actual: TypedValue<unknown>): number | string | undefined {
  if (actual instanceof PlainValue && (typeof actual.data === 'number' || typeof actual.data === 'string')) {
    return actual.data;
  }
  return undefined;
}

export function equalTo(expected: unknown): Matcher {
  return {
    match: (actual) =>
      actual.equals(expected) ? undefined : `${actual.describe()} != ${describeExpected(expected)}`,
  };
}

export function notEqualTo(unexpected: unknown): Matcher {
  return {
    match: (actual) =>
      actual.equals(unexpected) ? `${actual.describe()} == ${describeExpected(unexpected)}` : undefined,
  };
}

export function lessThan(limit: number | string): Matcher {
  return {
    match: (actual) => {
      const value = ordered(actual);
      if (value === undefined || typeof value !== typeof limit) {
        return `${actual.describe()} is not comparable with ${describeExpected(limit)}`;
      }
      return value < limit ? undefined : `${actual.describe()} is not < ${describeExpected(limit)}`;
    },
  };
}

export function greaterThan(limit: number | string): Matcher {
  return {
    match: (actual) => {
      const value = ordered(actual);
      if (value === undefined || typeof value !== typeof limit) {
        return `${actual.describe()} is not comparable with ${describeExpected(limit)}`;
      }
      return value > limit ? undefined : `${actual.describe()} is not > ${describeExpected(limit)}`;
    },
  };
}

export function containsString(fragment: string): Matcher {
  return {
    match: (actual) => {
      if (actual instanceof PlainValue && typeof actual.data === 'string' && actual.data.includes(fragment)) {
        return undefined;
      }
      return `${actual.describe()} does not contain ${JSON.stringify(fragment)}`;
    },
  };
}
