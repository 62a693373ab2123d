import type { Logger } from 'pino';
import { ProxyRegistrationError } from '../errors.js';
import { defaultLogger } from '../logger.js';
import type { ProxyClass } from './state-object.js';

/** Proxy classes that serve the nodes of one backend. */
export interface ProxyDeclaration {
  backend: string;
  proxies: readonly ProxyClass[];
}

export interface ProxyRegistryOptions {
  logger?: Logger;
}

function ownTypeName(proxy: ProxyClass): string | undefined {
  return Object.prototype.hasOwnProperty.call(proxy, 'typeName') ? proxy.typeName : undefined;
}

function synthesizeProxyClass(base: ProxyClass, typeName: string): ProxyClass {
  const generic = class extends base {};
  Object.defineProperty(generic, 'typeName', { value: typeName });
  Object.defineProperty(generic, 'name', { value: typeName });
  return generic;
}

/**
 * Maps `(backend key, type name)` to the proxy class that represents nodes of
 * that type. Backends are isolated from each other: clearing one never touches
 * another's classes.
 *
 * @example
 * const registry = new ProxyRegistry([{ backend: 'com.example.Editor', proxies: [Toolbar, Document] }]);
 */
export class ProxyRegistry {
  private readonly registered = new Map<string, Map<string, ProxyClass>>();
  private readonly synthesized = new Map<string, Map<ProxyClass, Map<string, ProxyClass>>>();
  private readonly logger: Logger;

  constructor(declarations: Iterable<ProxyDeclaration> = [], options: ProxyRegistryOptions = {}) {
    this.logger = options.logger ?? defaultLogger();
    for (const declaration of declarations) {
      this.register(declaration.backend, ...declaration.proxies);
    }
  }

  /**
   * Register proxy classes for a backend. Classes that do not declare their
   * own static `typeName` are base classes and are skipped.
   *
   * @throws ProxyRegistrationError when another class already serves the type
   */
  register(backendKey: string, ...proxies: ProxyClass[]): this {
    let table = this.registered.get(backendKey);
    if (table === undefined) {
      table = new Map();
      this.registered.set(backendKey, table);
    }
    for (const proxy of proxies) {
      const typeName = ownTypeName(proxy);
      if (typeName === undefined) {
        this.logger.debug({ backend: backendKey, proxy: proxy.name }, 'Skipping proxy base class');
        continue;
      }
      const existing = table.get(typeName);
      if (existing !== undefined && existing !== proxy) {
        throw new ProxyRegistrationError(backendKey, typeName);
      }
      table.set(typeName, proxy);
    }
    return this;
  }

  lookup(backendKey: string, typeName: string): ProxyClass | undefined {
    return this.registered.get(backendKey)?.get(typeName);
  }

  has(backendKey: string, typeName: string): boolean {
    return this.lookup(backendKey, typeName) !== undefined;
  }

  /**
   * The class for a node type. A type without a registered class gets a
   * generic subclass of `base`, created once and cached.
   */
  resolve(backendKey: string, typeName: string, base: ProxyClass): ProxyClass {
    const registered = this.lookup(backendKey, typeName);
    if (registered !== undefined) return registered;

    let byBase = this.synthesized.get(backendKey);
    if (byBase === undefined) {
      byBase = new Map();
      this.synthesized.set(backendKey, byBase);
    }
    let cache = byBase.get(base);
    if (cache === undefined) {
      cache = new Map();
      byBase.set(base, cache);
    }
    const cached = cache.get(typeName);
    if (cached !== undefined) return cached;

    this.logger.warn(
      { backend: backendKey, typeName },
      `Generating introspection instance for type '${typeName}' based on generic class`,
    );
    const generic = synthesizeProxyClass(base, typeName);
    cache.set(typeName, generic);
    return generic;
  }

  /** Forget every class registered or generated for one backend. */
  clear(backendKey: string): void {
    this.registered.delete(backendKey);
    this.synthesized.delete(backendKey);
  }

  backends(): string[] {
    return [...new Set([...this.registered.keys(), ...this.synthesized.keys()])];
  }
}
