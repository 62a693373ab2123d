import { vi } from 'vitest';
import { pino } from 'pino';
import { createProxyContext } from '../../src/proxy/context.js';
import type { ProxyContext, ProxyContextConfig } from '../../src/proxy/context.js';
import type { StateBackend, StateEntry } from '../../src/types.js';

export const BACKEND_KEY = 'test-app';

export function silentLogger() {
  return pino({ level: 'silent' });
}

/** A backend whose `getState` mock answers from `responses`, or with nothing. */
export function scriptedBackend(responses: Record<string, StateEntry[] | (() => StateEntry[])> = {}) {
  const getState = vi.fn(async (path: string): Promise<StateEntry[]> => {
    const response = responses[path];
    if (response === undefined) return [];
    return typeof response === 'function' ? response() : response;
  });
  const backend: StateBackend = { key: BACKEND_KEY, getState };
  return { backend, getState };
}

export function makeContext(
  backend: StateBackend,
  config: Omit<ProxyContextConfig, 'backend'> = {},
): ProxyContext {
  return createProxyContext({ backend, logger: silentLogger(), ...config });
}
