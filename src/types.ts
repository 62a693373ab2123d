/**
 * A property value as it travels over the wire: a numeric type tag followed by
 * one or more payload elements.
 */
export type WireValue = readonly [typeId: number, ...payload: unknown[]];

/** Property name → tagged value, as returned by the backend for one node. */
export type WireState = Readonly<Record<string, WireValue>>;

/** One node returned by a state query. */
export type StateEntry = readonly [path: string, state: WireState];

/**
 * The request/reply channel to the introspection service of one application.
 *
 * Implementations resolve with an empty array when nothing matches and reject
 * when the path expression is malformed.
 */
export interface StateBackend {
  /** Identifies the backend in a ProxyRegistry. */
  readonly key: string;
  getState(pathExpression: string): Promise<StateEntry[]>;
}

export type SearchCriteria = Readonly<Record<string, unknown>>;

/**
 * Enumerates candidate connections and opens a backend on the one selected by
 * a connection search.
 */
export interface ConnectionDiscovery<C> {
  listConnections(): Promise<C[]>;
  openBackend(connection: C, criteria: SearchCriteria): Promise<StateBackend>;
}

/** A connection on a message bus that may expose the introspection interface. */
export interface BusConnection {
  readonly bus: string;
  readonly connectionName: string;
  processId(): Promise<number | undefined>;
  hasIntrospectionInterface(objectPath: string): Promise<boolean>;
}

export interface WaitOptions {
  timeoutMs?: number;
  pollIntervalMs?: number;
}
