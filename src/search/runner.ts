import type { SearchCriteria } from '../types.js';
import { ArgumentError, UnknownSearchParameterError } from '../errors.js';
import type { ConnectionFilter, FilterLookup } from './filters.js';

/**
 * The filters needed to evaluate `criteria`, one per key and each at most
 * once, in criteria order.
 *
 * @throws UnknownSearchParameterError when a key has no filter
 */
export function buildFilterList<C>(criteria: SearchCriteria, lookup: FilterLookup<C>): ConnectionFilter<C>[] {
  const filters: ConnectionFilter<C>[] = [];
  for (const key of Object.keys(criteria)) {
    const filter = Object.prototype.hasOwnProperty.call(lookup, key) ? lookup[key] : undefined;
    if (filter === undefined) {
      throw new UnknownSearchParameterError(key, Object.keys(lookup));
    }
    if (!filters.includes(filter)) {
      filters.push(filter);
    }
  }
  return filters;
}

/** Highest priority first; filters of equal priority keep their order. */
export function sortFiltersByPriority<C>(filters: readonly ConnectionFilter<C>[]): ConnectionFilter<C>[] {
  return [...filters].sort((a, b) => b.priority() - a.priority());
}

/** Runs filters in order and stops at the first one that fails. */
export class FilterRunner<C> {
  private readonly filters: readonly ConnectionFilter<C>[];

  constructor(filters: readonly ConnectionFilter<C>[]) {
    if (filters.length === 0) {
      throw new ArgumentError('Filter list must not be empty');
    }
    this.filters = [...filters];
  }

  async matches(connection: C, criteria: SearchCriteria): Promise<boolean> {
    for (const filter of this.filters) {
      if (!(await filter.matches(connection, criteria))) return false;
    }
    return true;
  }
}

/** Build, sort and wrap the filters for `criteria`. */
export function createFilterRunner<C>(criteria: SearchCriteria, lookup: FilterLookup<C>): FilterRunner<C> {
  return new FilterRunner(sortFiltersByPriority(buildFilterList(criteria, lookup)));
}
