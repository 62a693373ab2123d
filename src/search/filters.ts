import type { BusConnection, SearchCriteria } from '../types.js';

/**
 * One test a candidate connection must pass. Filters with a higher priority
 * run first, so cheap and selective checks should rank above expensive ones.
 */
export interface ConnectionFilter<C> {
  readonly name: string;
  priority(): number;
  matches(connection: C, criteria: SearchCriteria): Promise<boolean>;
}

/** Search criteria key → the filter that evaluates it. */
export type FilterLookup<C> = Readonly<Record<string, ConnectionFilter<C>>>;

export const connectionNameFilter: ConnectionFilter<BusConnection> = {
  name: 'connectionName',
  priority: () => 13,
  matches: async (connection, criteria) => connection.connectionName === criteria['connectionName'],
};

export const processIdFilter: ConnectionFilter<BusConnection> = {
  name: 'pid',
  priority: () => 9,
  matches: async (connection, criteria) => {
    const pid = await connection.processId();
    return pid !== undefined && pid === criteria['pid'];
  },
};

export const objectPathFilter: ConnectionFilter<BusConnection> = {
  name: 'objectPath',
  priority: () => 8,
  matches: async (connection, criteria) => {
    const objectPath = criteria['objectPath'];
    return typeof objectPath === 'string' && connection.hasIntrospectionInterface(objectPath);
  },
};

export const busConnectionFilters: FilterLookup<BusConnection> = {
  connectionName: connectionNameFilter,
  pid: processIdFilter,
  objectPath: objectPathFilter,
};
