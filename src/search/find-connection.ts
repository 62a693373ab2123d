import type { Logger } from 'pino';
import type { ConnectionDiscovery, SearchCriteria, StateBackend } from '../types.js';
import { BackendError, ConnectionSearchError, StateNotFoundError } from '../errors.js';
import { defaultLogger } from '../logger.js';
import { createProxyContext } from '../proxy/context.js';
import type { ProxyContextConfig } from '../proxy/context.js';
import { StateObject } from '../proxy/state-object.js';
import type { FilterLookup } from './filters.js';
import { createFilterRunner } from './runner.js';

export interface FindConnectionOptions<C> {
  discovery: ConnectionDiscovery<C>;
  filters: FilterLookup<C>;
  logger?: Logger;
}

/**
 * Select the one connection matching `criteria` and open a backend on it.
 *
 * @throws UnknownSearchParameterError when a criteria key has no filter
 * @throws ArgumentError when `criteria` is empty
 * @throws ConnectionSearchError when no connection or several connections match
 */
export async function findConnection<C>(
  criteria: SearchCriteria,
  options: FindConnectionOptions<C>,
): Promise<StateBackend> {
  const logger = options.logger ?? defaultLogger();
  const runner = createFilterRunner(criteria, options.filters);

  let connections: C[];
  try {
    connections = await options.discovery.listConnections();
  } catch (err) {
    throw new BackendError(`Failed to list connections: ${String(err)}`, err);
  }

  const matching: C[] = [];
  for (const connection of connections) {
    if (await runner.matches(connection, criteria)) {
      matching.push(connection);
    }
  }
  logger.debug({ criteria, candidates: connections.length, matches: matching.length }, 'Connection search');

  const [match] = matching;
  if (matching.length !== 1 || match === undefined) {
    throw new ConnectionSearchError(criteria, matching.length);
  }

  try {
    return await options.discovery.openBackend(match, criteria);
  } catch (err) {
    throw new BackendError(`Failed to open backend: ${String(err)}`, err);
  }
}

export type GetProxyObjectOptions<C> = FindConnectionOptions<C> & Omit<ProxyContextConfig, 'backend'>;

/**
 * Find the connection matching `criteria` and return the root proxy of its
 * state tree.
 *
 * @throws StateNotFoundError when the backend does not report a single root
 */
export async function getProxyObject<C>(
  criteria: SearchCriteria,
  options: GetProxyObjectOptions<C>,
): Promise<StateObject> {
  const { discovery, filters, ...contextConfig } = options;
  const backend = await findConnection(criteria, {
    discovery,
    filters,
    ...(contextConfig.logger !== undefined ? { logger: contextConfig.logger } : {}),
  });
  const context = createProxyContext({ ...contextConfig, backend });
  const root = await StateObject.getRootInstance(context);
  if (root === null) {
    throw new StateNotFoundError('root', {}, `Backend '${backend.key}' did not report a single root object`);
  }
  return root;
}
