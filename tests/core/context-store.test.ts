/**
 * Tests for ContextStore
 * Covers the integer fallback, merging, cloning and template views
 */
import { ContextStore, normaliseKey } from '../../src/core/context-store.js';
import { ConfigurationError } from '../../src/core/errors.js';

describe('normaliseKey', () => {
  it('should turn canonical numeric strings into numbers', () => {
    expect(normaliseKey('3')).toBe(3);
    expect(normaliseKey('-1')).toBe(-1);
    expect(normaliseKey('2.5')).toBe(2.5);
  });

  it('should keep other strings as they are', () => {
    expect(normaliseKey('03')).toBe('03');
    expect(normaliseKey('1.0')).toBe('1.0');
    expect(normaliseKey('fg')).toBe('fg');
  });
});

describe('ContextStore', () => {
  describe('integer fallback', () => {
    it('should resolve a missing numeric key to the highest numeric key', () => {
      const store = new ContextStore({ 1: 'primary', 2: 'secondary', name: 'x' });

      expect(store.get(1)).toBe('primary');
      expect(store.get(2)).toBe('secondary');
      expect(store.get(7)).toBe('secondary');
      expect(store.get(-4)).toBe('secondary');
      expect(store.get('5')).toBe('secondary');
    });

    it('should hold for keys inserted out of order and interleaved with string keys', () => {
      const store = new ContextStore();
      store.set(5, 'five').set('label', 'text').set(2, 'two').set(9, 'nine').set('other', 'o');

      expect(store.get(3)).toBe('nine');
      expect(store.get(100)).toBe('nine');
    });

    it('should never fall back for string keys', () => {
      const store = new ContextStore({ 1: 'one' });

      expect(store.get('missing')).toBeUndefined();
    });

    it('should have nothing to fall back to without numeric keys', () => {
      const store = new ContextStore({ a: 1 });

      expect(store.get(0)).toBeUndefined();
    });

    it('should apply at nested levels', () => {
      const store = new ContextStore({ fonts: { 1: 'Iosevka' } });
      const fonts = store.get('fonts');

      expect(fonts).toBeInstanceOf(ContextStore);
      expect(fonts instanceof ContextStore && fonts.get(3)).toBe('Iosevka');
    });

    it('should recompute the fallback target after deleting the highest key', () => {
      const store = new ContextStore({ 1: 'one', 4: 'four' });
      store.delete(4);

      expect(store.get(10)).toBe('one');
    });

    it('should report exact membership only through has()', () => {
      const store = new ContextStore({ 1: 'one' });

      expect(store.has(1)).toBe(true);
      expect(store.has('1')).toBe(true);
      expect(store.has(2)).toBe(false);
    });
  });

  describe('mergeOverwrite', () => {
    it('should overwrite shared keys and merge nested mappings', () => {
      const store = new ContextStore({ colors: { fg: 'white', bg: 'black' }, font: 'mono' });
      store.mergeOverwrite({ colors: { fg: 'red' }, size: 12 });

      expect(store.toObject()).toEqual({
        colors: { fg: 'red', bg: 'black' },
        font: 'mono',
        size: 12,
      });
    });

    it('should replace a scalar with a mapping', () => {
      const store = new ContextStore({ colors: 'none' });
      store.update({ colors: { fg: 'red' } });

      expect(store.toObject()).toEqual({ colors: { fg: 'red' } });
    });

    it('should not share nested stores with the merged store', () => {
      const other = new ContextStore({ nested: { value: 1 } });
      const store = new ContextStore();
      store.mergeOverwrite(other);

      const nested = other.get('nested');
      if (nested instanceof ContextStore) nested.set('value', 2);

      expect(store.toObject()).toEqual({ nested: { value: 1 } });
    });
  });

  describe('mergePreserve', () => {
    it('should keep present keys and add missing ones, recursively', () => {
      const store = new ContextStore({ colors: { fg: 'white' }, font: 'mono' });
      store.mergePreserve({ colors: { fg: 'red', bg: 'black' }, font: 'serif', size: 12 });

      expect(store.toObject()).toEqual({
        colors: { fg: 'white', bg: 'black' },
        font: 'mono',
        size: 12,
      });
    });

    it('should be available as reverseUpdate', () => {
      const store = new ContextStore({ a: 1 });
      store.reverseUpdate({ a: 2, b: 3 });

      expect(store.toObject()).toEqual({ a: 1, b: 3 });
    });
  });

  describe('equals', () => {
    it('should compare structurally against stores and plain objects', () => {
      const store = new ContextStore({ a: { b: [1, 2] }, 3: 'x' });

      expect(store.equals({ a: { b: [1, 2] }, 3: 'x' })).toBe(true);
      expect(store.equals(new ContextStore({ 3: 'x', a: { b: [1, 2] } }))).toBe(true);
      expect(store.equals({ a: { b: [1, 2] } })).toBe(false);
      expect(store.equals({ a: { b: [2, 1] }, 3: 'x' })).toBe(false);
      expect(store.equals('a')).toBe(false);
    });
  });

  describe('clone', () => {
    it('should copy deeply', () => {
      const store = new ContextStore({ nested: { value: 1 } });
      const copy = store.clone();

      const nested = copy.get('nested');
      if (nested instanceof ContextStore) nested.set('value', 2);

      expect(store.toObject()).toEqual({ nested: { value: 1 } });
      expect(copy.toObject()).toEqual({ nested: { value: 2 } });
    });
  });

  describe('construction', () => {
    it('should wrap Maps and keep arrays with wrapped elements', () => {
      const store = new ContextStore(new Map<string, unknown>([['list', [{ a: 1 }, 'b']]]));
      const list = store.get('list');

      expect(Array.isArray(list)).toBe(true);
      expect(Array.isArray(list) && list[0] instanceof ContextStore).toBe(true);
      expect(store.toObject()).toEqual({ list: [{ a: 1 }, 'b'] });
    });

    it('should reject values that are not mappings', () => {
      expect(() => new ContextStore(['a'])).toThrow(TypeError);
    });
  });

  describe('templateView', () => {
    it('should expose values through property access with the fallback at every level', () => {
      const store = new ContextStore({ colors: { 1: { fg: 'white' } } });
      const view = store.templateView();
      const colors = view.colors;

      expect(typeof colors === 'object' && colors !== null && Reflect.get(colors, '2')).toEqual(
        expect.objectContaining({ fg: 'white' }),
      );
    });

    it('should report missing keys', () => {
      const missing: string[] = [];
      const view = new ContextStore({ a: 1 }).templateView((key) => missing.push(key));

      expect(view.b).toBeUndefined();
      expect(view.a).toBe(1);
      expect(missing).toEqual(['b']);
    });

    it('should consult extras for names the store does not define', () => {
      const view = new ContextStore({ env: 'own' }).templateView(undefined, {
        env: 'extra',
        home: '/home/test',
      });

      expect(view.env).toBe('own');
      expect(view.home).toBe('/home/test');
    });

    it('should be read-only', () => {
      const view = new ContextStore({ a: 1 }).templateView();

      expect(Reflect.set(view, 'a', 2)).toBe(false);
      expect(Object.keys(view)).toEqual(['a']);
    });
  });

  describe('importContext', () => {
    const fileContent = { colors: { fg: 'red' }, fonts: { 1: 'mono' } };
    const load = jest.fn(() => fileContent);

    beforeEach(() => {
      load.mockClear();
    });

    it('should merge every section of the file', () => {
      const store = new ContextStore({ colors: { bg: 'black' } });
      store.importContext({ fromPath: '/ctx.yml' }, load);

      expect(load).toHaveBeenCalledWith('/ctx.yml', store);
      expect(store.toObject()).toEqual({ colors: { fg: 'red', bg: 'black' }, fonts: { 1: 'mono' } });
    });

    it('should import one section under a new name', () => {
      const store = new ContextStore();
      store.importContext({ fromPath: '/ctx.yml', fromSection: 'colors', toSection: 'palette' }, load);

      expect(store.toObject()).toEqual({ palette: { fg: 'red' } });
    });

    it('should nest the whole file under toSection when no fromSection is given', () => {
      const store = new ContextStore();
      store.importContext({ fromPath: '/ctx.yml', toSection: 'theme' }, load);

      expect(store.toObject()).toEqual({ theme: fileContent });
    });

    it('should throw when the section does not exist', () => {
      const store = new ContextStore();

      expect(() => store.importContext({ fromPath: '/ctx.yml', fromSection: 'nope' }, load)).toThrow(
        ConfigurationError,
      );
    });
  });
});
