export { StateObject } from './proxy/state-object.js';
export type { ProxyClass, ValueClass } from './proxy/state-object.js';
export { ProxyRegistry } from './proxy/registry.js';
export type { ProxyDeclaration, ProxyRegistryOptions } from './proxy/registry.js';
export {
  createProxyContext,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_WAIT_TIMEOUT_MS,
} from './proxy/context.js';
export type { ProxyContext, ProxyContextConfig } from './proxy/context.js';

export { TypedValue } from './values/base.js';
export type { Matcher, Predicate, ValueKind, ValueOwner, ValueBinding } from './values/base.js';
export { PlainValue } from './values/plain.js';
export type { PlainData, PlainScalar } from './values/plain.js';
export { Rectangle, Point, Size, Color } from './values/composite.js';
export { DateTime, Time } from './values/temporal.js';
export type { CalendarTime } from './values/temporal.js';
export { decodeValue, encodeValue, ValueType } from './values/codec.js';
export type { Value } from './values/codec.js';
export { equalTo, notEqualTo, lessThan, greaterThan, containsString } from './values/matchers.js';

export { compileSelectPath } from './query/compiler.js';
export { escapeFilterString, formatFilter, isServerSideFilter } from './query/filters.js';
export type { PropertyFilters } from './query/filters.js';

export {
  busConnectionFilters,
  connectionNameFilter,
  objectPathFilter,
  processIdFilter,
} from './search/filters.js';
export type { ConnectionFilter, FilterLookup } from './search/filters.js';
export { buildFilterList, createFilterRunner, FilterRunner, sortFiltersByPriority } from './search/runner.js';
export { findConnection, getProxyObject } from './search/find-connection.js';
export type { FindConnectionOptions, GetProxyObjectOptions } from './search/find-connection.js';

export { createLogger, LOG_LEVEL_ENV } from './logger.js';
export type { Logger } from './logger.js';

export type {
  BusConnection,
  ConnectionDiscovery,
  SearchCriteria,
  StateBackend,
  StateEntry,
  WaitOptions,
  WireState,
  WireValue,
} from './types.js';
export {
  ArgumentError,
  AttributeNotFoundError,
  BackendError,
  ConnectionSearchError,
  InvalidQueryError,
  PropertyTypeError,
  ProxyRegistrationError,
  StateNotFoundError,
  TooManyResultsError,
  UnboundValueError,
  UnknownSearchParameterError,
  WaitTimeoutError,
} from './errors.js';
