import type { WaitOptions } from '../types.js';
import { ArgumentError, UnboundValueError, WaitTimeoutError } from '../errors.js';
import type { Matcher, Predicate, TypedValue } from './base.js';

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Merge per-call overrides into the defaults.
 *
 * @throws ArgumentError for a negative timeout or a non-positive poll interval
 */
export function resolveWaitOptions(
  defaults: Readonly<Required<WaitOptions>>,
  overrides: WaitOptions = {},
): Readonly<Required<WaitOptions>> {
  const timeoutMs = overrides.timeoutMs ?? defaults.timeoutMs;
  const pollIntervalMs = overrides.pollIntervalMs ?? defaults.pollIntervalMs;
  if (!(timeoutMs >= 0)) {
    throw new ArgumentError(`timeoutMs must be zero or more, got ${timeoutMs}`);
  }
  if (!(pollIntervalMs > 0)) {
    throw new ArgumentError(`pollIntervalMs must be greater than zero, got ${pollIntervalMs}`);
  }
  return { timeoutMs, pollIntervalMs };
}

export function isMatcher(expected: unknown): expected is Matcher {
  return (
    typeof expected === 'object' &&
    expected !== null &&
    'match' in expected &&
    typeof expected.match === 'function'
  );
}

function isPredicate(expected: unknown): expected is Predicate {
  return typeof expected === 'function';
}

export function describeExpected(expected: unknown): string {
  if (expected instanceof Date) return expected.toISOString();
  if (typeof expected === 'object' && expected !== null && 'describe' in expected && typeof expected.describe === 'function') {
    return String(expected.describe());
  }
  if (typeof expected === 'string') return JSON.stringify(expected);
  if (typeof expected === 'object' && expected !== null) return JSON.stringify(expected);
  return String(expected);
}

/** Returns the mismatch description, or undefined when `actual` satisfies `expected`. */
export function checkExpectation(actual: TypedValue<unknown>, expected: unknown): string | undefined {
  if (isMatcher(expected)) {
    return expected.match(actual);
  }
  if (isPredicate(expected)) {
    return expected(actual)
      ? undefined
      : `${actual.describe()} did not satisfy ${expected.name || 'predicate'}`;
  }
  return actual.equals(expected)
    ? undefined
    : `expected ${describeExpected(expected)}, got ${actual.describe()}`;
}

/**
 * Poll the owner of `value` until the property matches `expected`.
 *
 * Sleeps up to `pollIntervalMs` between polls and stops once the timeout
 * budget is spent. On success the owner's snapshot is replaced with the one
 * that matched.
 */
export async function waitForValue(
  value: TypedValue<unknown>,
  expected: unknown,
  options: WaitOptions = {},
): Promise<void> {
  if (checkExpectation(value, expected) === undefined) return;

  const binding = value.binding;
  if (binding === undefined) {
    throw new UnboundValueError();
  }
  const { owner, name } = binding;
  const { timeoutMs, pollIntervalMs } = resolveWaitOptions(owner.waitDefaults, options);

  let timeLeft = timeoutMs;
  let mismatch = '';
  while (true) {
    const polled = await owner.pollProperty(name);
    const result = checkExpectation(polled.value, expected);
    if (result === undefined) {
      polled.commit();
      return;
    }
    mismatch = result;

    if (timeLeft >= pollIntervalMs) {
      await sleep(pollIntervalMs);
      timeLeft -= pollIntervalMs;
    } else {
      await sleep(timeLeft);
      break;
    }
  }

  throw new WaitTimeoutError(owner.typeName, name, timeoutMs, mismatch);
}
