import { describe, it, expect, vi, afterEach } from 'vitest';
import { Reader, int64ToNumber } from './reader';
import { Writer } from './writer';
import { BufferUnderflowError, InvalidDataError } from './errors';

describe('Reader', () => {
  describe('varuint32', () => {
    it('decodes multi-byte values', () => {
      const reader = new Reader(new Uint8Array([0xac, 0x02]));
      expect(reader.readVarUint32()).toBe(300);
      expect(reader.hasMore).toBe(false);
    });

    it('decodes the largest uint32', () => {
      const reader = new Reader(new Uint8Array([0xff, 0xff, 0xff, 0xff, 0x0f]));
      expect(reader.readVarUint32()).toBe(0xffffffff);
    });

    it('rejects a fifth byte with more than 4 bits', () => {
      const reader = new Reader(new Uint8Array([0xff, 0xff, 0xff, 0xff, 0x1f]));
      expect(() => reader.readVarUint32()).toThrow(InvalidDataError);
    });

    it('fails on a truncated varint', () => {
      const reader = new Reader(new Uint8Array([0x80]));
      expect(() => reader.readVarUint32()).toThrow(BufferUnderflowError);
    });
  });

  describe('varuint64', () => {
    it('reads the ninth byte as 8 full bits', () => {
      const reader = new Reader(new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff]));
      expect(reader.readVarUint64()).toBe(0xffffffffffffffffn);
      expect(reader.hasMore).toBe(false);
    });

    it('decodes zigzag int64 extremes', () => {
      const writer = new Writer();
      writer.writeVarInt64(9223372036854775807n);
      writer.writeVarInt64(-9223372036854775808n);
      const reader = new Reader(writer.bytes());
      expect(reader.readVarInt64()).toBe(9223372036854775807n);
      expect(reader.readVarInt64()).toBe(-9223372036854775808n);
    });
  });

  describe('fixed width', () => {
    it('reads little-endian values', () => {
      const reader = new Reader(new Uint8Array([0xfe, 0xff, 0x04, 0x03, 0x02, 0x01]));
      expect(reader.readInt16()).toBe(-2);
      expect(reader.readInt32()).toBe(0x01020304);
    });

    it('reports the missing byte count on underflow', () => {
      const reader = new Reader(new Uint8Array([1, 2]));
      expect(() => reader.readInt32()).toThrow('Buffer underflow');
    });

    it('honours the byte offset of a subarray', () => {
      const backing = new Uint8Array([0xaa, 0x2a, 0x00, 0x00, 0x00]);
      const reader = new Reader(backing.subarray(1));
      expect(reader.readInt32()).toBe(42);
    });
  });

  describe('string', () => {
    it('decodes Latin-1 bytes above 0x7f as code points', () => {
      const reader = new Reader(new Uint8Array([(2 << 2) | 0, 0x80, 0xff]));
      expect(reader.readString()).toBe('\u0080ÿ');
    });

    it('decodes UTF-16 with surrogate pairs', () => {
      const reader = new Reader(new Uint8Array([(4 << 2) | 1, 0x3d, 0xd8, 0x00, 0xde]));
      expect(reader.readString()).toBe('😀');
    });

    it('decodes UTF-8', () => {
      const reader = new Reader(new Uint8Array([(3 << 2) | 2, 0xe4, 0xb8, 0xad]));
      expect(reader.readString()).toBe('中');
    });

    it('rejects UTF-16 payloads of odd length', () => {
      const reader = new Reader(new Uint8Array([(3 << 2) | 1, 1, 2, 3]));
      expect(() => reader.readString()).toThrow(InvalidDataError);
    });

    it('rejects encoding tag 3', () => {
      const reader = new Reader(new Uint8Array([(1 << 2) | 3, 0x41]));
      expect(() => reader.readString()).toThrow('Unknown string encoding 3');
    });

    it('round-trips long Latin-1 strings', () => {
      const text = 'x'.repeat(10000);
      const writer = new Writer();
      writer.writeString(text);
      expect(new Reader(writer.bytes()).readString()).toBe(text);
    });
  });

  describe('bytes', () => {
    it('returns a view of the requested length', () => {
      const reader = new Reader(new Uint8Array([3, 1, 2, 3, 4]));
      expect(reader.readLengthPrefixedBytes()).toEqual(new Uint8Array([1, 2, 3]));
      expect(reader.remaining).toBe(1);
    });

    it('skips bytes', () => {
      const reader = new Reader(new Uint8Array([1, 2, 3]));
      reader.skip(2);
      expect(reader.readUint8()).toBe(3);
    });
  });
});

describe('int64ToNumber', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('converts safe values silently', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(int64ToNumber(123n)).toBe(123);
    expect(warn).not.toHaveBeenCalled();
  });

  it('warns when precision is lost', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    int64ToNumber(9007199254740993n);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('stays quiet when warnings are off', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    int64ToNumber(9007199254740993n, false);
    expect(warn).not.toHaveBeenCalled();
  });
});
