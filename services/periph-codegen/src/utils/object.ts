export function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function getProperty(target: unknown, property: PropertyKey): unknown {
  return target && typeof target === 'object'
    ? Reflect.get(target, property)
    : undefined;
}

/**
 * Walk a path of keys/indices into an untyped document.
 */
export function getPath(target: unknown, path: readonly PropertyKey[]): unknown {
  let current = target;
  for (const key of path) {
    current = getProperty(current, key);
    if (current === undefined) {
      return undefined;
    }
  }
  return current;
}

export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export function formatPath(path: readonly PropertyKey[]): string {
  return path.reduce<string>((acc, key) => {
    if (typeof key === 'number') return `${acc}[${key}]`;
    return acc ? `${acc}.${String(key)}` : String(key);
  }, '');
}

export function toHex(value: number, width = 0): string {
  return `0x${value.toString(16).toUpperCase().padStart(width, '0')}`;
}
