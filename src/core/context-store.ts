import { ConfigurationError } from './errors.js';

export type ContextKey = string | number;

export type ContextScalar = string | number | boolean | null;

export type ContextValue = ContextScalar | ContextStore | ContextValue[];

/**
 * Reads a context file, rendering it against `context` first.
 */
export type ContextLoader = (filePath: string, context: ContextStore) => unknown;

export interface ImportContextOptions {
  fromPath: string;
  fromSection?: string;
  toSection?: string;
}

const CANONICAL_NUMBER = /^-?\d+(\.\d+)?$/;

// Keys probed by runtimes and template engines rather than by template authors.
const UNREPORTED_KEYS = new Set(['then', 'toJSON', 'constructor', 'toString', 'valueOf', '__proto__']);

/**
 * Numeric-looking strings address the same entry as the number they spell.
 */
export function normaliseKey(key: ContextKey): ContextKey {
  if (typeof key === 'number' || !CANONICAL_NUMBER.test(key)) return key;
  const numeric = Number(key);
  return String(numeric) === key ? numeric : key;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function mappingEntries(value: unknown): Array<[ContextKey, unknown]> | undefined {
  if (value instanceof ContextStore) return value.entries();
  if (value instanceof Map) {
    const entries: Array<[ContextKey, unknown]> = [];
    for (const [key, entry] of value) {
      if (typeof key === 'string' || typeof key === 'number') entries.push([key, entry]);
    }
    return entries;
  }
  if (isPlainObject(value)) return Object.entries(value);
  return undefined;
}

function toContextValue(value: unknown, copyStores: boolean): ContextValue {
  if (value instanceof ContextStore) return copyStores ? value.clone() : value;
  if (Array.isArray(value)) return value.map((element: unknown) => toContextValue(element, copyStores));
  const entries = mappingEntries(value);
  if (entries) return ContextStore.from(entries);
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return String(value);
}

function valuesEqual(own: ContextValue, other: unknown): boolean {
  if (own instanceof ContextStore) return own.equals(other);
  if (Array.isArray(own)) {
    return (
      Array.isArray(other) &&
      own.length === other.length &&
      own.every((element, index) => valuesEqual(element, other[index]))
    );
  }
  return own === other;
}

function plainValue(value: ContextValue): unknown {
  if (value instanceof ContextStore) return value.toObject();
  if (Array.isArray(value)) return value.map(plainValue);
  return value;
}

/**
 * Nested key-value store used as template data.
 *
 * A lookup of an absent numeric key resolves to the entry under the highest
 * numeric key at that level, so `colors.3` yields `colors.1` when only `0` and
 * `1` are defined. String keys never fall back. Mappings stored as values are
 * wrapped into stores, so the rule holds at every depth.
 */
export class ContextStore {
  private readonly data = new Map<ContextKey, ContextValue>();
  private maxNumericKey: number | undefined;

  constructor(initial?: unknown) {
    if (initial === undefined) return;
    const entries = mappingEntries(initial);
    if (!entries) {
      throw new TypeError('A context store can only be created from a mapping');
    }
    for (const [key, value] of entries) this.set(key, value);
  }

  static from(entries: Iterable<[ContextKey, unknown]>): ContextStore {
    const store = new ContextStore();
    for (const [key, value] of entries) store.set(key, value);
    return store;
  }

  get size(): number {
    return this.data.size;
  }

  /**
   * Exact match first, then the integer fallback.
   */
  get(key: ContextKey): ContextValue | undefined {
    const normalised = normaliseKey(key);
    if (this.data.has(normalised)) return this.data.get(normalised);
    if (typeof normalised === 'number' && this.maxNumericKey !== undefined) {
      return this.data.get(this.maxNumericKey);
    }
    return undefined;
  }

  /**
   * Exact membership, without fallback.
   */
  has(key: ContextKey): boolean {
    return this.data.has(normaliseKey(key));
  }

  set(key: ContextKey, value: unknown): this {
    const normalised = normaliseKey(key);
    this.data.set(normalised, toContextValue(value, false));
    if (
      typeof normalised === 'number' &&
      (this.maxNumericKey === undefined || normalised > this.maxNumericKey)
    ) {
      this.maxNumericKey = normalised;
    }
    return this;
  }

  delete(key: ContextKey): boolean {
    const normalised = normaliseKey(key);
    const deleted = this.data.delete(normalised);
    if (deleted && normalised === this.maxNumericKey) {
      this.maxNumericKey = undefined;
      for (const remaining of this.data.keys()) {
        if (
          typeof remaining === 'number' &&
          (this.maxNumericKey === undefined || remaining > this.maxNumericKey)
        ) {
          this.maxNumericKey = remaining;
        }
      }
    }
    return deleted;
  }

  keys(): ContextKey[] {
    return [...this.data.keys()];
  }

  entries(): Array<[ContextKey, ContextValue]> {
    return [...this.data.entries()];
  }

  /**
   * Every key of `other` overwrites the same key here. Where both sides hold
   * a mapping, the two are merged by the same rule instead of replaced.
   */
  mergeOverwrite(other: unknown): this {
    for (const [key, value] of mappingEntries(other) ?? []) {
      const own = this.data.get(normaliseKey(key));
      if (own instanceof ContextStore && mappingEntries(value)) {
        own.mergeOverwrite(value);
      } else {
        this.set(key, toContextValue(value, true));
      }
    }
    return this;
  }

  update(other: unknown): this {
    return this.mergeOverwrite(other);
  }

  /**
   * Keys already present win; missing keys are copied from `other`.
   */
  mergePreserve(other: unknown): this {
    for (const [key, value] of mappingEntries(other) ?? []) {
      const own = this.data.get(normaliseKey(key));
      if (own === undefined) {
        this.set(key, toContextValue(value, true));
      } else if (own instanceof ContextStore && mappingEntries(value)) {
        own.mergePreserve(value);
      }
    }
    return this;
  }

  reverseUpdate(other: unknown): this {
    return this.mergePreserve(other);
  }

  /**
   * Structural equality against another store or a plain mapping.
   */
  equals(other: unknown): boolean {
    const entries = mappingEntries(other);
    if (!entries || entries.length !== this.data.size) return false;
    return entries.every(([key, value]) => {
      const normalised = normaliseKey(key);
      const own = this.data.get(normalised);
      return own !== undefined && this.data.has(normalised) && valuesEqual(own, value);
    });
  }

  /**
   * Deep copy; nested stores are never shared with the original.
   */
  clone(): ContextStore {
    const copy = new ContextStore();
    for (const [key, value] of this.data) copy.set(key, toContextValue(value, true));
    return copy;
  }

  toObject(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of this.data) result[String(key)] = plainValue(value);
    return result;
  }

  /**
   * Read-only object view for template engines. Property reads go through
   * `get()`, so the fallback applies at every level. `extras` are consulted
   * for top-level names the store does not define.
   */
  templateView(
    onMissing?: (key: string) => void,
    extras: Record<string, unknown> = {},
  ): Record<string, unknown> {
    return createView(this, onMissing, extras);
  }

  /**
   * Merge sections of a context file into this store: all of them, or
   * `fromSection` alone, stored under `toSection` when given.
   */
  importContext(options: ImportContextOptions, load: ContextLoader): void {
    const loaded = new ContextStore(load(options.fromPath, this) ?? {});
    if (options.fromSection === undefined) {
      if (options.toSection !== undefined) {
        this.mergeOverwrite({ [options.toSection]: loaded });
      } else {
        this.mergeOverwrite(loaded);
      }
      return;
    }

    if (!loaded.has(options.fromSection)) {
      throw new ConfigurationError(
        `Section "${options.fromSection}" not found in context file ${options.fromPath}`,
      );
    }
    this.mergeOverwrite({ [options.toSection ?? options.fromSection]: loaded.get(options.fromSection) });
  }
}

function viewValue(value: unknown, onMissing: ((key: string) => void) | undefined): unknown {
  if (value instanceof ContextStore) return createView(value, onMissing, {});
  if (Array.isArray(value)) return value.map((element: unknown) => viewValue(element, onMissing));
  return value;
}

function createView(
  store: ContextStore,
  onMissing: ((key: string) => void) | undefined,
  extras: Record<string, unknown>,
): Record<string, unknown> {
  const target: Record<string, unknown> = {};

  const lookup = (property: string): unknown => {
    const value = store.get(property);
    if (value !== undefined) return viewValue(value, onMissing);
    if (Object.prototype.hasOwnProperty.call(extras, property)) return extras[property];
    return undefined;
  };

  return new Proxy(target, {
    get(_target, property) {
      if (typeof property === 'symbol') return undefined;
      const value = lookup(property);
      if (value === undefined && !UNREPORTED_KEYS.has(property)) onMissing?.(property);
      return value;
    },
    has(_target, property) {
      return typeof property === 'string' && lookup(property) !== undefined;
    },
    ownKeys() {
      return store.keys().map(String);
    },
    getOwnPropertyDescriptor(_target, property) {
      if (typeof property === 'symbol') return undefined;
      const value = lookup(property);
      if (value === undefined) return undefined;
      return { value, writable: false, enumerable: true, configurable: true };
    },
    set() {
      return false;
    },
    deleteProperty() {
      return false;
    },
  });
}
