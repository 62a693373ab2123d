import type { Logger } from 'pino';
import type { StateBackend, WaitOptions } from '../types.js';
import { defaultLogger } from '../logger.js';
import { resolveWaitOptions } from '../values/wait.js';
import { ProxyRegistry } from './registry.js';
import { StateObject } from './state-object.js';
import type { ProxyClass } from './state-object.js';

export const DEFAULT_WAIT_TIMEOUT_MS = 10_000;
export const DEFAULT_POLL_INTERVAL_MS = 1_000;

export interface ProxyContextConfig {
  backend: StateBackend;
  /** Defaults to a new, empty registry. */
  registry?: ProxyRegistry;
  logger?: Logger;
  /** Base class of generated proxies for unregistered types. */
  base?: ProxyClass;
  waitTimeoutMs?: number;
  pollIntervalMs?: number;
}

/** Everything the proxies of one backend share. */
export interface ProxyContext {
  readonly backend: StateBackend;
  readonly registry: ProxyRegistry;
  readonly logger: Logger;
  readonly base: ProxyClass;
  readonly waitDefaults: Readonly<Required<WaitOptions>>;
}

/**
 * Resolve a {@link ProxyContextConfig} into a context.
 *
 * @throws ArgumentError for a negative timeout or a non-positive poll interval
 */
export function createProxyContext(config: ProxyContextConfig): ProxyContext {
  const logger = config.logger ?? defaultLogger();
  return {
    backend: config.backend,
    registry: config.registry ?? new ProxyRegistry([], { logger }),
    logger,
    base: config.base ?? StateObject,
    waitDefaults: resolveWaitOptions(
      { timeoutMs: DEFAULT_WAIT_TIMEOUT_MS, pollIntervalMs: DEFAULT_POLL_INTERVAL_MS },
      {
        ...(config.waitTimeoutMs !== undefined ? { timeoutMs: config.waitTimeoutMs } : {}),
        ...(config.pollIntervalMs !== undefined ? { pollIntervalMs: config.pollIntervalMs } : {}),
      },
    ),
  };
}
