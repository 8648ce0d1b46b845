import { describe, it, expect } from 'vitest';
import { canonicalize, encodeCanonical } from './canonical.js';

describe('canonicalize', () => {
  it('sorts object keys and drops whitespace', () => {
    expect(canonicalize({ b: 1, a: [true, null, 'x'], c: { z: 0, y: -1.5 } }))
      .toBe('{"a":[true,null,"x"],"b":1,"c":{"y":-1.5,"z":0}}');
  });

  it('sorts keys by code unit, uppercase before lowercase', () => {
    expect(canonicalize({ b: 1, B: 2, a: 3 })).toBe('{"B":2,"a":3,"b":1}');
  });

  it('produces identical text regardless of insertion order', () => {
    expect(canonicalize({ x: 1, y: { p: 1, q: 2 } })).toBe(canonicalize({ y: { q: 2, p: 1 }, x: 1 }));
  });

  it('normalizes strings to NFC', () => {
    const decomposed = 'Cafe\u0301';
    expect(canonicalize({ name: decomposed })).toBe('{"name":"Caf\u00e9"}');
  });

  it('omits undefined members', () => {
    expect(canonicalize({ a: 1, b: undefined })).toBe('{"a":1}');
  });

  it('rejects non-finite numbers', () => {
    expect(() => canonicalize({ n: Number.POSITIVE_INFINITY })).toThrow(TypeError);
    expect(() => canonicalize([Number.NaN])).toThrow(/non-finite number at \$\[0\]/);
  });

  it('rejects values that are not plain data', () => {
    expect(() => canonicalize({ when: new Date(0) })).toThrow(TypeError);
    expect(() => canonicalize(new Map())).toThrow(TypeError);
    expect(() => canonicalize({ f: () => 1 })).toThrow(/function at \$\.f/);
    expect(() => canonicalize([undefined])).toThrow(TypeError);
  });

  it('accepts frozen objects', () => {
    expect(canonicalize(Object.freeze({ a: Object.freeze([1]) }))).toBe('{"a":[1]}');
  });
});

describe('encodeCanonical', () => {
  it('encodes as UTF-8', () => {
    expect(Array.from(encodeCanonical('é'))).toEqual([0x22, 0xc3, 0xa9, 0x22]);
  });
});
