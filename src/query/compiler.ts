import { InvalidQueryError } from '../errors.js';
import { firstServerSideFilter, formatFilter } from './filters.js';
import type { PropertyFilters } from './filters.js';

export const ROOT_PATH = '/';
export const WILDCARD = '*';

const TYPE_NAME_PATTERN = /^[^\s/[\]"'=]+$/;

export interface CompiledSelection {
  path: string;
  /** The predicate embedded in `path`, if any filter could be sent. */
  serverFilter: string | null;
}

/** The type name of a node is the last segment of its path. */
export function typeNameFromPath(path: string): string {
  const segments = path.split('/');
  return segments[segments.length - 1] ?? path;
}

export function assertTypeName(typeName: string): void {
  if (typeName !== WILDCARD && !TYPE_NAME_PATTERN.test(typeName)) {
    throw new InvalidQueryError(`'${typeName}' is not a valid type name`);
  }
}

/** `path[id=N]`, the query that re-addresses one node. */
export function compileIdentityPath(path: string, identity: number | undefined): string {
  return identity === undefined ? path : `${path}[id=${identity}]`;
}

export function compileChildrenPath(queryPath: string): string {
  return `${queryPath}/*`;
}

/** `//TypeName`: every node of a type, anywhere in the tree. */
export function compileInstancesPath(typeName: string): string {
  assertTypeName(typeName);
  if (typeName === WILDCARD) {
    throw new InvalidQueryError('An instance scan needs a concrete type name');
  }
  return `//${typeName}`;
}

/**
 * Compile a recursive selection below `queryPath`.
 *
 * @example
 * compileSelectPath('/App[id=1]', 'QPushButton', { objectName: 'ok', width: 1.5 })
 * // { path: '/App[id=1]//QPushButton[objectName="ok"]', serverFilter: 'objectName="ok"' }
 *
 * @throws InvalidQueryError when neither a type name nor a filter is given
 */
export function compileSelectPath(
  queryPath: string,
  typeName: string,
  filters: PropertyFilters,
): CompiledSelection {
  if (typeName === WILDCARD && Object.keys(filters).length === 0) {
    throw new InvalidQueryError('You must specify either a type name or a filter');
  }
  assertTypeName(typeName);

  const first = firstServerSideFilter(filters);
  const serverFilter = first === undefined ? null : formatFilter(first[0], first[1]);
  const predicate = serverFilter === null ? '' : `[${serverFilter}]`;
  return { path: `${queryPath}//${typeName}${predicate}`, serverFilter };
}
