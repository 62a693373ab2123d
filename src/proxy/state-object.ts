import type { StateEntry, WaitOptions, WireState, WireValue } from '../types.js';
import {
  AttributeNotFoundError,
  BackendError,
  InvalidQueryError,
  PropertyTypeError,
  StateNotFoundError,
} from '../errors.js';
import { decodeValue } from '../values/codec.js';
import type { Value } from '../values/codec.js';
import type { PolledProperty, ValueOwner } from '../values/base.js';
import { PlainValue } from '../values/plain.js';
import { resolveWaitOptions } from '../values/wait.js';
import {
  ROOT_PATH,
  WILDCARD,
  compileChildrenPath,
  compileIdentityPath,
  compileInstancesPath,
  typeNameFromPath,
} from '../query/compiler.js';
import type { PropertyFilters } from '../query/filters.js';
import {
  objectPassesFilters,
  pollForSingle,
  selectByClass,
  selectByName,
  selectorTypeName,
  singleResult,
} from '../query/select.js';
import type { ProxyContext } from './context.js';

/**
 * A constructor of proxy objects. Subclasses of StateObject set a static
 * `typeName` to be registered for nodes of that type.
 */
export interface ProxyClass<T extends StateObject = StateObject> {
  new (context: ProxyContext, entry: StateEntry): T;
  readonly typeName: string | undefined;
}

export type ValueClass<V extends Value> = abstract new (...args: never[]) => V;

/** Wire property names use dashes; proxies expose them with underscores. */
export function translateStateKeys(state: WireState): Record<string, WireValue> {
  const translated: Record<string, WireValue> = {};
  for (const [key, value] of Object.entries(state)) {
    translated[key.replace(/-/g, '_')] = value;
  }
  return translated;
}

/** Run one state query, logging it and wrapping transport failures. */
export async function queryState(context: ProxyContext, path: string): Promise<StateEntry[]> {
  const started = Date.now();
  let entries: StateEntry[];
  try {
    entries = await context.backend.getState(path);
  } catch (err) {
    throw new BackendError(`Failed to get state for '${path}': ${String(err)}`, err);
  }
  context.logger.debug(
    { backend: context.backend.key, query: path, matches: entries.length, elapsedMs: Date.now() - started },
    'GetState',
  );
  return entries;
}

/** Build the proxy for a node, choosing its class through the registry. */
export function materialize(context: ProxyContext, entry: StateEntry): StateObject {
  const ProxyType = context.registry.resolve(context.backend.key, typeNameFromPath(entry[0]), context.base);
  return new ProxyType(context, entry);
}

/**
 * A live node of the remote state tree.
 *
 * Properties are read from a snapshot that is replaced wholesale on every
 * refresh. By default each {@link getProperty} call refreshes first; use
 * {@link withoutAutomaticRefresh} to read many properties from one snapshot.
 *
 * @example
 * class Button extends StateObject {
 *   static override readonly typeName = 'QPushButton';
 * }
 * const ok = await window.selectSingle(Button, { objectName: 'ok' });
 * await (await ok?.getProperty('enabled'))?.waitFor(true);
 */
export class StateObject implements ValueOwner {
  /** Node type served by this class; undefined on base classes. */
  static readonly typeName: string | undefined = undefined;

  readonly path: string;
  readonly typeName: string;
  private properties: ReadonlyMap<string, Value> = new Map();
  private identityValue: number | undefined;
  private refreshOnRead = true;

  constructor(
    readonly context: ProxyContext,
    entry: StateEntry,
  ) {
    const [path, state] = entry;
    this.path = path;
    this.typeName = typeNameFromPath(path);
    this.setProperties(state);
  }

  /** The node's `id` property, when it has one. */
  get identity(): number | undefined {
    return this.identityValue;
  }

  /** The query that addresses exactly this node. */
  get queryPath(): string {
    return compileIdentityPath(this.path, this.identityValue);
  }

  get waitDefaults(): Readonly<Required<WaitOptions>> {
    return this.context.waitDefaults;
  }

  get propertyNames(): string[] {
    return [...this.properties.keys()];
  }

  get automaticRefresh(): boolean {
    return this.refreshOnRead;
  }

  hasProperty(name: string): boolean {
    return this.properties.has(name);
  }

  /** Read a property from the current snapshot without refreshing. */
  peekProperty(name: string): Value {
    const value = this.properties.get(name);
    if (value === undefined) {
      throw new AttributeNotFoundError(this.typeName, name);
    }
    return value;
  }

  /**
   * Read a property, refreshing the snapshot first unless automatic refresh
   * is switched off.
   *
   * @throws AttributeNotFoundError when the node has no such property
   * @throws StateNotFoundError when the node no longer exists
   */
  async getProperty(name: string): Promise<Value> {
    if (!this.properties.has(name)) {
      throw new AttributeNotFoundError(this.typeName, name);
    }
    if (this.refreshOnRead) {
      await this.refreshState();
    }
    return this.peekProperty(name);
  }

  /**
   * {@link getProperty}, narrowed to one value class.
   *
   * @throws PropertyTypeError when the property holds a different kind of value
   */
  async getPropertyOf<V extends Value>(name: string, kind: ValueClass<V>): Promise<V> {
    const value = await this.getProperty(name);
    if (!(value instanceof kind)) {
      throw new PropertyTypeError(this.typeName, name, kind.name, value.kind);
    }
    return value;
  }

  /** Refresh, then return every property by name. */
  async getProperties(): Promise<Record<string, Value>> {
    await this.refreshState();
    return Object.fromEntries(this.properties);
  }

  /**
   * Re-read this node from the backend and replace the snapshot.
   *
   * @throws StateNotFoundError when the backend returns no node or several nodes
   */
  async refreshState(): Promise<void> {
    this.setProperties(await this.fetchState());
  }

  /**
   * Run `fn` with refresh-on-read switched off. The previous setting is put
   * back however `fn` exits.
   */
  async withoutAutomaticRefresh<R>(fn: () => R | Promise<R>): Promise<R> {
    const previous = this.refreshOnRead;
    this.refreshOnRead = false;
    try {
      return await fn();
    } finally {
      this.refreshOnRead = previous;
    }
  }

  /** Refresh, then fetch the direct children of this node. */
  async getChildren(): Promise<StateObject[]> {
    await this.refreshState();
    const entries = await this.queryBackend(compileChildrenPath(this.queryPath));
    return entries.map((entry) => this.materialize(entry));
  }

  /**
   * Direct children of one type that pass every filter. A string selects by
   * type name, a class by instance.
   */
  getChildrenByType<T extends StateObject>(selector: ProxyClass<T>, filters?: PropertyFilters): Promise<T[]>;
  getChildrenByType(selector: string, filters?: PropertyFilters): Promise<StateObject[]>;
  async getChildrenByType(
    selector: string | ProxyClass,
    filters: PropertyFilters = {},
  ): Promise<StateObject[]> {
    const children = await this.getChildren();
    const result: StateObject[] = [];
    for (const child of children) {
      const matchesType = typeof selector === 'string'
        ? child.typeName === selector
        : child instanceof selector;
      if (matchesType && (await objectPassesFilters(child, filters))) {
        result.push(child);
      }
    }
    return result;
  }

  /**
   * Every node below this one, at any depth, of the given type and passing
   * every filter, in backend order. At least a type name or one filter is
   * required.
   *
   * @throws InvalidQueryError for `'*'` without filters
   */
  selectMany<T extends StateObject>(type: ProxyClass<T>, filters?: PropertyFilters): Promise<T[]>;
  selectMany(type?: string, filters?: PropertyFilters): Promise<StateObject[]>;
  async selectMany(type: string | ProxyClass = WILDCARD, filters: PropertyFilters = {}): Promise<StateObject[]> {
    const selection = typeof type === 'string'
      ? await selectByName(this, type, filters)
      : await selectByClass(this, type, filters);
    return selection.results;
  }

  /**
   * The one node below this one matching the type and filters, or null.
   *
   * @throws TooManyResultsError when several nodes match
   * @throws InvalidQueryError for `'*'` without filters
   */
  selectSingle<T extends StateObject>(type: ProxyClass<T>, filters?: PropertyFilters): Promise<T | null>;
  selectSingle(type?: string, filters?: PropertyFilters): Promise<StateObject | null>;
  async selectSingle(type: string | ProxyClass = WILDCARD, filters: PropertyFilters = {}): Promise<StateObject | null> {
    const selection = typeof type === 'string'
      ? await selectByName(this, type, filters)
      : await selectByClass(this, type, filters);
    return singleResult(selection);
  }

  /**
   * {@link selectSingle}, retried until a node appears.
   *
   * @throws StateNotFoundError when nothing matched before the timeout
   */
  waitSelectSingle<T extends StateObject>(
    type: ProxyClass<T>,
    filters?: PropertyFilters,
    options?: WaitOptions,
  ): Promise<T>;
  waitSelectSingle(type: string, filters?: PropertyFilters, options?: WaitOptions): Promise<StateObject>;
  async waitSelectSingle(
    type: string | ProxyClass,
    filters: PropertyFilters = {},
    options: WaitOptions = {},
  ): Promise<StateObject> {
    const resolved = resolveWaitOptions(this.waitDefaults, options);
    if (typeof type === 'string') {
      const typeName = type;
      return pollForSingle(() => this.selectSingle(typeName, filters), typeName, filters, resolved);
    }
    const proxy = type;
    return pollForSingle(() => this.selectSingle(proxy, filters), selectorTypeName(proxy), filters, resolved);
  }

  /** Fetch a fresh copy of one property for {@link TypedValue.waitFor}. */
  async pollProperty(name: string): Promise<PolledProperty> {
    const state = await this.fetchState();
    const wire = translateStateKeys(state)[name];
    if (wire === undefined) {
      throw new AttributeNotFoundError(this.typeName, name);
    }
    return {
      value: decodeValue(wire, { owner: this, name }, this.context.logger),
      commit: () => this.setProperties(state),
    };
  }

  /** Run a state query against this object's backend. */
  queryBackend(path: string): Promise<StateEntry[]> {
    return queryState(this.context, path);
  }

  /** Build a proxy for a node returned by one of this object's queries. */
  materialize(entry: StateEntry): StateObject {
    return materialize(this.context, entry);
  }

  /**
   * Every node of this class's type anywhere in the tree. This scans the whole
   * tree; prefer {@link selectMany} from a nearby node.
   *
   * @throws InvalidQueryError when called on a class without a typeName
   */
  static async getAllInstances<T extends StateObject>(this: ProxyClass<T>, context: ProxyContext): Promise<T[]> {
    if (this.typeName === undefined) {
      throw new InvalidQueryError('getAllInstances needs a proxy class with a typeName');
    }
    const entries = await queryState(context, compileInstancesPath(this.typeName));
    return entries.map((entry) => new this(context, entry));
  }

  /** The root node of the tree, or null if the backend does not report exactly one. */
  static async getRootInstance(context: ProxyContext): Promise<StateObject | null> {
    const entries = await queryState(context, ROOT_PATH);
    const [root] = entries;
    if (entries.length !== 1 || root === undefined) {
      context.logger.error(
        { backend: context.backend.key, matches: entries.length },
        'Could not retrieve root object',
      );
      return null;
    }
    return materialize(context, root);
  }

  private async fetchState(): Promise<WireState> {
    const entries = await this.queryBackend(this.queryPath);
    const [entry] = entries;
    if (entries.length !== 1 || entry === undefined) {
      throw new StateNotFoundError(this.typeName, {
        ...(this.identityValue !== undefined ? { identity: this.identityValue } : {}),
        matchCount: entries.length,
      });
    }
    return entry[1];
  }

  private setProperties(state: WireState): void {
    const properties = new Map<string, Value>();
    for (const [name, wire] of Object.entries(translateStateKeys(state))) {
      properties.set(name, decodeValue(wire, { owner: this, name }, this.context.logger));
    }
    const id = properties.get('id');
    this.identityValue = id instanceof PlainValue && typeof id.data === 'number' ? id.data : undefined;
    this.properties = properties;
  }
}
