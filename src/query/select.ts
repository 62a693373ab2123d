import type { ProxyClass, StateObject } from '../proxy/state-object.js';
import type { StateEntry, WaitOptions } from '../types.js';
import { InvalidQueryError, StateNotFoundError, TooManyResultsError } from '../errors.js';
import { sleep } from '../values/wait.js';
import { WILDCARD, compileSelectPath } from './compiler.js';
import type { PropertyFilters } from './filters.js';

export interface Selection<T extends StateObject> {
  path: string;
  results: T[];
}

/**
 * True when `instance` has every filtered property with an equal value. All
 * properties are read from the current snapshot, without a refresh per read.
 */
export function objectPassesFilters(instance: StateObject, filters: PropertyFilters): Promise<boolean> {
  return instance.withoutAutomaticRefresh(async () => {
    for (const [name, expected] of Object.entries(filters)) {
      if (!instance.hasProperty(name)) return false;
      const value = await instance.getProperty(name);
      if (!value.equals(expected)) return false;
    }
    return true;
  });
}

export function selectorTypeName(proxy: ProxyClass<StateObject>): string {
  if (proxy.typeName === undefined) {
    throw new InvalidQueryError(`${proxy.name} has no typeName and cannot be used to select nodes`);
  }
  return proxy.typeName;
}

async function collect<T extends StateObject>(
  origin: StateObject,
  typeName: string,
  filters: PropertyFilters,
  make: (entry: StateEntry) => T,
): Promise<Selection<T>> {
  const { path, serverFilter } = compileSelectPath(origin.queryPath, typeName, filters);
  origin.context.logger.debug(
    { query: path, filters: Object.keys(filters), serverFilter },
    `Selecting objects of ${typeName === WILDCARD ? 'any type' : `type ${typeName}`}`,
  );

  const entries = await origin.queryBackend(path);
  const results: T[] = [];
  for (const entry of entries) {
    const instance = make(entry);
    // The backend may ignore the embedded predicate, so it is checked again here.
    if (await objectPassesFilters(instance, filters)) {
      results.push(instance);
    }
  }
  return { path, results };
}

/** Recursive selection by type name; nodes are built through the registry. */
export function selectByName(
  origin: StateObject,
  typeName: string,
  filters: PropertyFilters,
): Promise<Selection<StateObject>> {
  return collect(origin, typeName, filters, (entry) => origin.materialize(entry));
}

/** Recursive selection of a proxy class's type; nodes are built as that class. */
export function selectByClass<T extends StateObject>(
  origin: StateObject,
  proxy: ProxyClass<T>,
  filters: PropertyFilters,
): Promise<Selection<T>> {
  return collect(origin, selectorTypeName(proxy), filters, (entry) => new proxy(origin.context, entry));
}

/**
 * The only result of a selection, or null when there is none.
 *
 * @throws TooManyResultsError when more than one node matched
 */
export function singleResult<T extends StateObject>(selection: Selection<T>): T | null {
  if (selection.results.length > 1) {
    throw new TooManyResultsError(selection.path, selection.results.length);
  }
  return selection.results[0] ?? null;
}

/**
 * Repeat `select` until it finds a node, sleeping between attempts.
 *
 * @throws StateNotFoundError when nothing was found before the timeout
 */
export async function pollForSingle<T extends StateObject>(
  select: () => Promise<T | null>,
  typeName: string,
  filters: PropertyFilters,
  options: Readonly<Required<WaitOptions>>,
): Promise<T> {
  let timeLeft = options.timeoutMs;
  while (true) {
    const found = await select();
    if (found !== null) return found;
    if (timeLeft <= 0) break;

    const delay = Math.min(options.pollIntervalMs, timeLeft);
    await sleep(delay);
    timeLeft -= delay;
  }
  throw new StateNotFoundError(typeName, { filters });
}
