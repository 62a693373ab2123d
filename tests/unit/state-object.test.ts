import { describe, it, expect, vi } from 'vitest';
import { StateObject } from '../../src/proxy/state-object.js';
import { ProxyRegistry } from '../../src/proxy/registry.js';
import { Rectangle } from '../../src/values/composite.js';
import {
  AttributeNotFoundError,
  BackendError,
  InvalidQueryError,
  PropertyTypeError,
  StateNotFoundError,
} from '../../src/errors.js';
import type { StateEntry } from '../../src/types.js';
import { BACKEND_KEY, makeContext, scriptedBackend, silentLogger } from './helpers.js';

class Button extends StateObject {
  static override readonly typeName = 'QPushButton';
}

const WINDOW: StateEntry = [
  '/App/Window',
  { id: [0, 7], 'object-name': [0, 'main'], geometry: [1, 0, 0, 100, 50] },
];

function windowWith(objectName: string): StateEntry {
  return ['/App/Window', { id: [0, 7], 'object-name': [0, objectName], geometry: [1, 0, 0, 100, 50] }];
}

describe('StateObject construction', () => {
  it('takes type name and identity from the entry', () => {
    const { backend } = scriptedBackend();
    const window = new StateObject(makeContext(backend), WINDOW);
    expect(window.path).toBe('/App/Window');
    expect(window.typeName).toBe('Window');
    expect(window.identity).toBe(7);
    expect(window.queryPath).toBe('/App/Window[id=7]');
  });

  it('translates dashes in property names to underscores', () => {
    const { backend } = scriptedBackend();
    const window = new StateObject(makeContext(backend), WINDOW);
    expect(window.propertyNames).toEqual(['id', 'object_name', 'geometry']);
    expect(window.hasProperty('object_name')).toBe(true);
    expect(window.hasProperty('object-name')).toBe(false);
  });

  it('addresses a node without an id by its path alone', () => {
    const { backend } = scriptedBackend();
    const root = new StateObject(makeContext(backend), ['/App', { name: [0, 'app'] }]);
    expect(root.identity).toBeUndefined();
    expect(root.queryPath).toBe('/App');
  });
});

describe('StateObject.getProperty()', () => {
  it('refreshes before reading', async () => {
    const { backend, getState } = scriptedBackend({ '/App/Window[id=7]': [windowWith('changed')] });
    const window = new StateObject(makeContext(backend), WINDOW);

    const value = await window.getProperty('object_name');

    expect(value.data).toBe('changed');
    expect(getState).toHaveBeenCalledTimes(1);
    expect(getState).toHaveBeenCalledWith('/App/Window[id=7]');
  });

  it('binds the value to its owner and property', async () => {
    const { backend } = scriptedBackend({ '/App/Window[id=7]': [WINDOW] });
    const window = new StateObject(makeContext(backend), WINDOW);
    const value = await window.getProperty('object_name');
    expect(value.owner).toBe(window);
    expect(value.name).toBe('object_name');
  });

  it('throws AttributeNotFoundError without calling the backend', async () => {
    const { backend, getState } = scriptedBackend();
    const window = new StateObject(makeContext(backend), WINDOW);
    await expect(window.getProperty('title')).rejects.toThrow("Class 'Window' has no attribute 'title'");
    expect(getState).not.toHaveBeenCalled();
  });

  it('narrows with getPropertyOf', async () => {
    const { backend } = scriptedBackend({ '/App/Window[id=7]': [WINDOW] });
    const window = new StateObject(makeContext(backend), WINDOW);
    const geometry = await window.getPropertyOf('geometry', Rectangle);
    expect(geometry.width).toBe(100);
  });

  it('throws PropertyTypeError when the kind differs', async () => {
    const { backend } = scriptedBackend({ '/App/Window[id=7]': [WINDOW] });
    const window = new StateObject(makeContext(backend), WINDOW);
    const reading = window.getPropertyOf('object_name', Rectangle);
    await expect(reading).rejects.toBeInstanceOf(PropertyTypeError);
    await expect(window.getPropertyOf('object_name', Rectangle)).rejects.toThrow(
      "Attribute 'object_name' of 'Window' is a plain, not a Rectangle",
    );
  });

  it('returns all properties from getProperties', async () => {
    const { backend } = scriptedBackend({ '/App/Window[id=7]': [windowWith('other')] });
    const window = new StateObject(makeContext(backend), WINDOW);
    const properties = await window.getProperties();
    expect(Object.keys(properties)).toEqual(['id', 'object_name', 'geometry']);
    expect(properties['object_name']?.data).toBe('other');
  });

  it('reads the snapshot with peekProperty', () => {
    const { backend, getState } = scriptedBackend();
    const window = new StateObject(makeContext(backend), WINDOW);
    expect(window.peekProperty('object_name').data).toBe('main');
    expect(() => window.peekProperty('title')).toThrow(AttributeNotFoundError);
    expect(getState).not.toHaveBeenCalled();
  });
});

describe('StateObject.refreshState()', () => {
  it('replaces the properties wholesale', async () => {
    const { backend } = scriptedBackend({ '/App/Window[id=7]': [['/App/Window', { id: [0, 7], title: [0, 'T'] }]] });
    const window = new StateObject(makeContext(backend), WINDOW);
    await window.refreshState();
    expect(window.propertyNames).toEqual(['id', 'title']);
    expect(window.hasProperty('geometry')).toBe(false);
  });

  it('throws StateNotFoundError when the node is gone', async () => {
    const { backend } = scriptedBackend();
    const window = new StateObject(makeContext(backend), WINDOW);
    await expect(window.refreshState()).rejects.toThrow(
      "State not found for class 'Window' with id 7 (backend returned 0 matches)",
    );
  });

  it('throws StateNotFoundError when several nodes answer', async () => {
    const { backend } = scriptedBackend({ '/App/Window[id=7]': [WINDOW, WINDOW] });
    const window = new StateObject(makeContext(backend), WINDOW);
    const error = await window.refreshState().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(StateNotFoundError);
    expect((error as StateNotFoundError).details).toEqual({ identity: 7, matchCount: 2 });
  });

  it('wraps backend failures in BackendError', async () => {
    const { backend, getState } = scriptedBackend();
    const cause = new Error('boom');
    getState.mockRejectedValueOnce(cause);
    const window = new StateObject(makeContext(backend), WINDOW);

    const error = await window.refreshState().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(BackendError);
    expect((error as BackendError).message).toBe("Failed to get state for '/App/Window[id=7]': Error: boom");
    expect((error as BackendError).cause).toBe(cause);
  });
});

describe('StateObject.withoutAutomaticRefresh()', () => {
  it('reads every property from one snapshot', async () => {
    const { backend, getState } = scriptedBackend({ '/App/Window[id=7]': [WINDOW] });
    const window = new StateObject(makeContext(backend), WINDOW);

    await window.withoutAutomaticRefresh(async () => {
      await window.getProperty('id');
      await window.getProperty('object_name');
      await window.getProperty('geometry');
    });
    expect(getState).not.toHaveBeenCalled();

    await window.getProperty('id');
    expect(getState).toHaveBeenCalledTimes(1);
  });

  it('returns the result of the callback', async () => {
    const { backend } = scriptedBackend();
    const window = new StateObject(makeContext(backend), WINDOW);
    await expect(window.withoutAutomaticRefresh(() => 42)).resolves.toBe(42);
  });

  it('restores refresh after the callback throws', async () => {
    const { backend } = scriptedBackend();
    const window = new StateObject(makeContext(backend), WINDOW);

    await expect(
      window.withoutAutomaticRefresh(() => {
        throw new Error('inside');
      }),
    ).rejects.toThrow('inside');
    expect(window.automaticRefresh).toBe(true);
  });

  it('restores the outer setting when nested', async () => {
    const { backend } = scriptedBackend();
    const window = new StateObject(makeContext(backend), WINDOW);

    await window.withoutAutomaticRefresh(async () => {
      await window.withoutAutomaticRefresh(() => undefined);
      expect(window.automaticRefresh).toBe(false);
    });
    expect(window.automaticRefresh).toBe(true);
  });
});

describe('StateObject.getChildren()', () => {
  const CHILDREN: StateEntry[] = [
    ['/App/Window/QPushButton', { id: [0, 8], objectName: [0, 'ok'] }],
    ['/App/Window/QLabel', { id: [0, 9], objectName: [0, 'caption'] }],
    ['/App/Window/QPushButton', { id: [0, 10], objectName: [0, 'cancel'] }],
  ];

  function windowWithChildren() {
    const scripted = scriptedBackend({
      '/App/Window[id=7]': [WINDOW],
      '/App/Window[id=7]/*': CHILDREN,
    });
    const registry = new ProxyRegistry([{ backend: BACKEND_KEY, proxies: [Button] }], { logger: silentLogger() });
    const window = new StateObject(makeContext(scripted.backend, { registry }), WINDOW);
    return { ...scripted, window };
  }

  it('refreshes, then queries the direct children', async () => {
    const { window, getState } = windowWithChildren();
    const children = await window.getChildren();
    expect(getState.mock.calls).toEqual([['/App/Window[id=7]'], ['/App/Window[id=7]/*']]);
    expect(children.map((child) => child.identity)).toEqual([8, 9, 10]);
  });

  it('builds registered classes and generic ones for the rest', async () => {
    const { window } = windowWithChildren();
    const [ok, caption] = await window.getChildren();
    expect(ok).toBeInstanceOf(Button);
    expect(caption).toBeInstanceOf(StateObject);
    expect(caption).not.toBeInstanceOf(Button);
    expect(caption?.constructor.name).toBe('QLabel');
  });

  it('filters children by type name', async () => {
    const { window } = windowWithChildren();
    const buttons = await window.getChildrenByType('QPushButton');
    expect(buttons.map((b) => b.identity)).toEqual([8, 10]);
  });

  it('filters children by class and properties', async () => {
    const { window } = windowWithChildren();
    const buttons = await window.getChildrenByType(Button, { objectName: 'cancel' });
    expect(buttons).toHaveLength(1);
    expect(buttons[0]).toBeInstanceOf(Button);
    expect(buttons[0]?.identity).toBe(10);
  });
});

describe('StateObject.getRootInstance()', () => {
  it('returns the single root', async () => {
    const { backend, getState } = scriptedBackend({ '/': [['/App', { id: [0, 1] }]] });
    const root = await StateObject.getRootInstance(makeContext(backend));
    expect(getState).toHaveBeenCalledWith('/');
    expect(root?.path).toBe('/App');
    expect(root?.typeName).toBe('App');
  });

  it('logs an error and returns null without a single root', async () => {
    const { backend } = scriptedBackend();
    const logger = silentLogger();
    const error = vi.spyOn(logger, 'error');
    const root = await StateObject.getRootInstance(makeContext(backend, { logger }));
    expect(root).toBeNull();
    expect(error).toHaveBeenCalledWith({ backend: BACKEND_KEY, matches: 0 }, 'Could not retrieve root object');
  });
});

describe('StateObject.getAllInstances()', () => {
  it('scans the tree for the class type and builds that class', async () => {
    const { backend, getState } = scriptedBackend({
      '//QPushButton': [
        ['/App/Window/QPushButton', { id: [0, 8] }],
        ['/App/Dialog/QPushButton', { id: [0, 20] }],
      ],
    });
    const buttons = await Button.getAllInstances(makeContext(backend));
    expect(getState).toHaveBeenCalledWith('//QPushButton');
    expect(buttons).toHaveLength(2);
    expect(buttons[1]).toBeInstanceOf(Button);
    expect(buttons[1]?.identity).toBe(20);
  });

  it('requires a class with a type name', async () => {
    const { backend } = scriptedBackend();
    await expect(StateObject.getAllInstances(makeContext(backend))).rejects.toBeInstanceOf(InvalidQueryError);
  });
});

describe('StateObject logging', () => {
  it('logs each backend query at debug level', async () => {
    const { backend } = scriptedBackend({ '/App/Window[id=7]': [WINDOW] });
    const logger = silentLogger();
    const debug = vi.spyOn(logger, 'debug');
    const window = new StateObject(makeContext(backend, { logger }), WINDOW);
    await window.refreshState();
    expect(debug).toHaveBeenCalledWith(
      expect.objectContaining({ backend: BACKEND_KEY, query: '/App/Window[id=7]', matches: 1 }),
      'GetState',
    );
  });
});
