import { describe, it, expect } from 'vitest';
import { canonicalKey } from '../../../src/utils/canonical-key.js';

describe('canonicalKey', () => {
  it('should sort object keys', () => {
    expect(canonicalKey({ b: 1, a: 'x' })).toBe('{"a":"x","b":1}');
    expect(canonicalKey({ a: 'x', b: 1 })).toBe(canonicalKey({ b: 1, a: 'x' }));
  });

  it('should compare arrays element-wise', () => {
    expect(canonicalKey(['a', 'b'])).toBe('["a","b"]');
    expect(canonicalKey(Object.freeze(['a', 'b']))).toBe(canonicalKey(['a', 'b']));
    expect(canonicalKey(['a', 'b'])).not.toBe(canonicalKey(['b', 'a']));
  });

  it('should distinguish null from undefined', () => {
    expect(canonicalKey(null)).toBe('null');
    expect(canonicalKey(undefined)).toBe('undefined');
  });

  it('should distinguish strings from numbers', () => {
    expect(canonicalKey('1')).not.toBe(canonicalKey(1));
  });

  it('should treat -0 and 0 as equal', () => {
    expect(canonicalKey(-0)).toBe(canonicalKey(0));
  });

  it('should key functions by identity', () => {
    const first = () => 1;
    const second = () => 1;

    expect(canonicalKey(first)).toBe(canonicalKey(first));
    expect(canonicalKey(first)).not.toBe(canonicalKey(second));
  });

  it('should key class instances by identity', () => {
    const date = new Date(0);

    expect(canonicalKey({ when: date })).toBe(canonicalKey({ when: date }));
    expect(canonicalKey({ when: date })).not.toBe(canonicalKey({ when: new Date(0) }));
  });

  it('should serialize nested plain data by value', () => {
    expect(canonicalKey({ control: { mode: 'local', ids: [1, 2] } })).toBe(
      canonicalKey({ control: { ids: [1, 2], mode: 'local' } })
    );
  });
});
