import { describe, it, expect } from 'vitest';
import { murmurHash3x64_128 } from './murmurHash3';

const encoder = new TextEncoder();

describe('murmurHash3x64_128', () => {
  it('hashes empty input with seed 0 to zero', () => {
    expect(murmurHash3x64_128(new Uint8Array(0), 0)).toEqual({ h1: 0n, h2: 0n });
  });

  it('matches the reference digest of a pangram', () => {
    const { h1, h2 } = murmurHash3x64_128(encoder.encode('The quick brown fox jumps over the lazy dog'), 0);
    expect(h1).toBe(0xe34bbc7bbc071b6cn);
    expect(h2).toBe(0x7a433ca9c49a9347n);
  });

  it('uses seed 47 by default', () => {
    const data = encoder.encode('a,5,0,0;');
    expect(murmurHash3x64_128(data)).toEqual(murmurHash3x64_128(data, 47));
    expect(murmurHash3x64_128(data)).not.toEqual(murmurHash3x64_128(data, 0));
  });

  it('returns unsigned 64-bit words', () => {
    for (const text of ['', 'x', 'exactly sixteen!', 'a longer input that spans two blocks']) {
      const { h1, h2 } = murmurHash3x64_128(encoder.encode(text));
      expect(h1 >= 0n && h1 < 1n << 64n).toBe(true);
      expect(h2 >= 0n && h2 < 1n << 64n).toBe(true);
    }
  });

  it('reads a subarray from its own offset', () => {
    const backing = encoder.encode('__hello');
    expect(murmurHash3x64_128(backing.subarray(2))).toEqual(murmurHash3x64_128(encoder.encode('hello')));
  });
});
