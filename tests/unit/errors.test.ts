import { describe, it, expect } from 'vitest';
import {
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
} from '../../src/errors.js';

describe('StateNotFoundError', () => {
  it('has correct name', () => {
    expect(new StateNotFoundError('Window').name).toBe('StateNotFoundError');
  });

  it('is instanceof StateNotFoundError and Error', () => {
    const err = new StateNotFoundError('Window');
    expect(err).toBeInstanceOf(StateNotFoundError);
    expect(err).toBeInstanceOf(Error);
  });

  it('names the type and identity in the default message', () => {
    const err = new StateNotFoundError('Window', { identity: 7, matchCount: 0 });
    expect(err.message).toBe("State not found for class 'Window' with id 7 (backend returned 0 matches)");
    expect(err.details.identity).toBe(7);
  });

  it('says "no id" when the node has no identity', () => {
    const err = new StateNotFoundError('Window');
    expect(err.message).toBe("State not found for class 'Window' with no id");
  });

  it('names the filters when a selection timed out', () => {
    const err = new StateNotFoundError('Button', { filters: { objectName: 'ok' } });
    expect(err.message).toBe('Object not found with name \'Button\' and properties {"objectName":"ok"}');
  });

  it('uses custom message when provided', () => {
    expect(new StateNotFoundError('Window', {}, 'gone').message).toBe('gone');
  });
});

describe('WaitTimeoutError', () => {
  it('reports timeout in seconds with the mismatch', () => {
    const err = new WaitTimeoutError('Label', 'text', 2500, 'expected "b", got "a"');
    expect(err.message).toBe('After 2.5 seconds test on Label.text failed: expected "b", got "a"');
    expect(err.typeName).toBe('Label');
    expect(err.propertyName).toBe('text');
    expect(err.timeoutMs).toBe(2500);
  });

  it('has correct name', () => {
    expect(new WaitTimeoutError('A', 'b', 0, '').name).toBe('WaitTimeoutError');
  });
});

describe('AttributeNotFoundError', () => {
  it('names class and attribute', () => {
    const err = new AttributeNotFoundError('Window', 'title');
    expect(err.message).toBe("Class 'Window' has no attribute 'title'");
    expect(err.attributeName).toBe('title');
    expect(err).toBeInstanceOf(AttributeNotFoundError);
  });
});

describe('PropertyTypeError', () => {
  it('names both kinds', () => {
    const err = new PropertyTypeError('Window', 'geometry', 'Point', 'rectangle');
    expect(err.message).toBe("Attribute 'geometry' of 'Window' is a rectangle, not a Point");
  });
});

describe('TooManyResultsError', () => {
  it('includes the query and count', () => {
    const err = new TooManyResultsError('/App//Button', 3);
    expect(err.message).toBe("More than one item was returned for query '/App//Button' (3 items)");
    expect(err.count).toBe(3);
  });
});

describe('UnknownSearchParameterError', () => {
  it('lists the known parameters', () => {
    const err = new UnknownSearchParameterError('colour', ['pid', 'objectPath']);
    expect(err.message).toBe("Search parameter 'colour' doesn't have a corresponding filter in [pid, objectPath]");
    expect(err.parameter).toBe('colour');
  });
});

describe('ConnectionSearchError', () => {
  it('reports no results', () => {
    const err = new ConnectionSearchError({ pid: 42 }, 0);
    expect(err.message).toBe('Search criteria {"pid":42} returned no results');
  });

  it('reports several results', () => {
    const err = new ConnectionSearchError({ pid: 42 }, 2);
    expect(err.message).toBe('Search criteria {"pid":42} returned 2 results, expected exactly one');
    expect(err.matchCount).toBe(2);
  });
});

describe('BackendError', () => {
  it('keeps the cause', () => {
    const cause = new Error('bus closed');
    const err = new BackendError('failed', cause);
    expect(err.cause).toBe(cause);
    expect(err.name).toBe('BackendError');
    expect(err).toBeInstanceOf(BackendError);
  });

  it('allows cause to be omitted', () => {
    expect(new BackendError('failed').cause).toBeUndefined();
  });
});

describe('simple errors', () => {
  it.each([
    [new ArgumentError('x'), 'ArgumentError'],
    [new InvalidQueryError('x'), 'InvalidQueryError'],
    [new UnboundValueError(), 'UnboundValueError'],
    [new ProxyRegistrationError('app', 'Button'), 'ProxyRegistrationError'],
  ])('%s has name %s', (err, name) => {
    expect(err.name).toBe(name);
    expect(err).toBeInstanceOf(Error);
  });

  it('ProxyRegistrationError names backend and type', () => {
    expect(new ProxyRegistrationError('app', 'Button').message).toBe(
      "A different proxy class is already registered for 'Button' on backend 'app'",
    );
  });
});
