import { describe, it, expect, vi, afterEach } from 'vitest';
import { createProxyContext, DEFAULT_POLL_INTERVAL_MS, DEFAULT_WAIT_TIMEOUT_MS } from '../../src/proxy/context.js';
import { ProxyRegistry } from '../../src/proxy/registry.js';
import { StateObject } from '../../src/proxy/state-object.js';
import { createLogger, LOG_LEVEL_ENV } from '../../src/logger.js';
import { ArgumentError } from '../../src/errors.js';
import { scriptedBackend, silentLogger } from './helpers.js';

describe('createProxyContext()', () => {
  it('fills in defaults', () => {
    const { backend } = scriptedBackend();
    const context = createProxyContext({ backend, logger: silentLogger() });
    expect(context.backend).toBe(backend);
    expect(context.registry).toBeInstanceOf(ProxyRegistry);
    expect(context.base).toBe(StateObject);
    expect(context.waitDefaults).toEqual({ timeoutMs: 10_000, pollIntervalMs: 1_000 });
    expect(DEFAULT_WAIT_TIMEOUT_MS).toBe(10_000);
    expect(DEFAULT_POLL_INTERVAL_MS).toBe(1_000);
  });

  it('keeps the given registry, base and timings', () => {
    const { backend } = scriptedBackend();
    const registry = new ProxyRegistry([], { logger: silentLogger() });
    class AppObject extends StateObject {}
    const context = createProxyContext({
      backend,
      registry,
      base: AppObject,
      logger: silentLogger(),
      waitTimeoutMs: 250,
      pollIntervalMs: 50,
    });
    expect(context.registry).toBe(registry);
    expect(context.base).toBe(AppObject);
    expect(context.waitDefaults).toEqual({ timeoutMs: 250, pollIntervalMs: 50 });
  });

  it('rejects a negative timeout', () => {
    const { backend } = scriptedBackend();
    expect(() => createProxyContext({ backend, logger: silentLogger(), waitTimeoutMs: -1 })).toThrow(
      'timeoutMs must be zero or more, got -1',
    );
  });

  it('rejects a zero poll interval', () => {
    const { backend } = scriptedBackend();
    expect(() => createProxyContext({ backend, logger: silentLogger(), pollIntervalMs: 0 })).toThrow(ArgumentError);
  });
});

describe('createLogger()', () => {
  const saved = process.env[LOG_LEVEL_ENV];

  afterEach(() => {
    vi.unstubAllEnvs();
    if (saved === undefined) delete process.env[LOG_LEVEL_ENV];
    else process.env[LOG_LEVEL_ENV] = saved;
  });

  it('defaults to warn', () => {
    delete process.env[LOG_LEVEL_ENV];
    expect(createLogger().level).toBe('warn');
  });

  it('reads the level from the environment', () => {
    vi.stubEnv(LOG_LEVEL_ENV, 'debug');
    expect(createLogger().level).toBe('debug');
  });

  it('takes an explicit level', () => {
    expect(createLogger('error').level).toBe('error');
  });
});
