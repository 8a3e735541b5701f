/**
 * Canonical keys for value-equality lookups.
 *
 * Plain data (primitives, arrays, plain objects) serializes by value with
 * sorted object keys, so two structurally equal parameter sets share a key.
 * Anything else (functions, class instances, symbols) is keyed by identity.
 */

const identities = new WeakMap<object, number>();
const symbols = new Map<symbol, number>();
let nextIdentity = 0;

function identityOf(value: object | symbol): number {
  if (typeof value === 'symbol') {
    let id = symbols.get(value);
    if (id === undefined) {
      id = ++nextIdentity;
      symbols.set(value, id);
    }
    return id;
  }
  let id = identities.get(value);
  if (id === undefined) {
    id = ++nextIdentity;
    identities.set(value, id);
  }
  return id;
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function canonicalKey(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number') return Object.is(value, -0) ? '0' : String(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'bigint') return `${value}n`;
  if (typeof value === 'symbol' || typeof value === 'function') {
    return `#${identityOf(value)}`;
  }
  if (typeof value !== 'object') return String(value);

  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => canonicalKey(item)).join(',')}]`;
  }
  if (isPlainObject(value)) {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalKey(value[key])}`);
    return `{${entries.join(',')}}`;
  }
  return `#${identityOf(value)}`;
}
