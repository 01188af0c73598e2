import { UnsupportedOperationError } from "./errors.js";

function reject(what: string): never {
  throw new UnsupportedOperationError(`Cannot modify ${what}: the view is read-only`, { view: what });
}

/**
 * Live read-only view over an array owned by someone else. Reads go to the
 * backing array; any write, delete, property definition or attempt to seal
 * or freeze the view throws.
 */
export function readonlyArrayView<T>(backing: T[], what: string): readonly T[] {
  return new Proxy(backing, {
    set: () => reject(what),
    deleteProperty: () => reject(what),
    defineProperty: () => reject(what),
    setPrototypeOf: () => reject(what),
    preventExtensions: () => reject(what),
  });
}

/**
 * Live read-only view over a map. The mutators exist so that untyped callers
 * get an error instead of a silent no-op.
 */
export class ReadonlyMapView<K, V> implements ReadonlyMap<K, V> {
  constructor(
    private readonly backing: Map<K, V>,
    private readonly what: string,
  ) {}

  get size(): number {
    return this.backing.size;
  }

  get(key: K): V | undefined {
    return this.backing.get(key);
  }

  has(key: K): boolean {
    return this.backing.has(key);
  }

  forEach(callback: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown): void {
    this.backing.forEach((value, key) => callback.call(thisArg, value, key, this));
  }

  entries() {
    return this.backing.entries();
  }

  keys() {
    return this.backing.keys();
  }

  values() {
    return this.backing.values();
  }

  [Symbol.iterator]() {
    return this.backing[Symbol.iterator]();
  }

  set(): never {
    return reject(this.what);
  }

  delete(): never {
    return reject(this.what);
  }

  clear(): never {
    return reject(this.what);
  }
}
