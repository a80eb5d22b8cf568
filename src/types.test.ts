import { describe, it, expect } from 'vitest';
import {
  zigzagEncode,
  zigzagDecode,
  zigzagEncode64,
  zigzagDecode64,
  MinInt64,
  MaxInt64,
  TypeId,
  isCompressedTypeId,
  isInt64TypeId,
  isNamedTypeId,
  isNumericTypeId,
  isSupportedPrimitiveTypeId,
  isUserDefinedTypeId,
  needsUserTypeId,
  primitiveTypeSize,
  typeIdName,
} from './types';

describe('zigzag encoding (32-bit)', () => {
  it('encodes 0 to 0', () => {
    expect(zigzagEncode(0)).toBe(0);
  });

  it('encodes -1 to 1', () => {
    expect(zigzagEncode(-1)).toBe(1);
  });

  it('encodes 1 to 2', () => {
    expect(zigzagEncode(1)).toBe(2);
  });

  it('encodes -2 to 3', () => {
    expect(zigzagEncode(-2)).toBe(3);
  });

  it('roundtrips positive values', () => {
    for (const n of [0, 1, 127, 128, 255, 256, 65535, 2147483647]) {
      expect(zigzagDecode(zigzagEncode(n))).toBe(n);
    }
  });

  it('roundtrips negative values', () => {
    for (const n of [-1, -127, -128, -255, -256, -65535, -2147483648]) {
      expect(zigzagDecode(zigzagEncode(n))).toBe(n);
    }
  });
});

describe('zigzag encoding (64-bit)', () => {
  it('encodes 0n to 0n', () => {
    expect(zigzagEncode64(0n)).toBe(0n);
  });

  it('encodes -1n to 1n', () => {
    expect(zigzagEncode64(-1n)).toBe(1n);
  });

  it('encodes 1n to 2n', () => {
    expect(zigzagEncode64(1n)).toBe(2n);
  });

  it('encodes -2n to 3n', () => {
    expect(zigzagEncode64(-2n)).toBe(3n);
  });

  it('roundtrips positive values', () => {
    for (const n of [0n, 1n, 127n, 128n, 255n, 256n, 65535n, 2147483647n, MaxInt64]) {
      expect(zigzagDecode64(zigzagEncode64(n))).toBe(n);
    }
  });

  it('roundtrips negative values', () => {
    for (const n of [-1n, -127n, -128n, -255n, -256n, -65535n, -2147483648n, MinInt64]) {
      expect(zigzagDecode64(zigzagEncode64(n))).toBe(n);
    }
  });

  it('handles boundary values', () => {
    // Maximum positive 64-bit signed integer
    expect(zigzagEncode64(MaxInt64)).toBeDefined();
    expect(zigzagDecode64(zigzagEncode64(MaxInt64))).toBe(MaxInt64);

    // Minimum negative 64-bit signed integer
    expect(zigzagEncode64(MinInt64)).toBeDefined();
    expect(zigzagDecode64(zigzagEncode64(MinInt64))).toBe(MinInt64);
  });

  describe('bounds validation', () => {
    it('throws RangeError for values larger than MaxInt64', () => {
      const tooBig = MaxInt64 + 1n;
      expect(() => zigzagEncode64(tooBig)).toThrow(RangeError);
      expect(() => zigzagEncode64(tooBig)).toThrow(/outside valid 64-bit signed integer range/);
    });

    it('throws RangeError for values smaller than MinInt64', () => {
      const tooSmall = MinInt64 - 1n;
      expect(() => zigzagEncode64(tooSmall)).toThrow(RangeError);
      expect(() => zigzagEncode64(tooSmall)).toThrow(/outside valid 64-bit signed integer range/);
    });

    it('throws RangeError for very large positive values', () => {
      const veryBig = BigInt("0x10000000000000000"); // 2^64
      expect(() => zigzagEncode64(veryBig)).toThrow(RangeError);
    });

    it('throws RangeError for very large negative values', () => {
      const verySmall = -(BigInt("0x10000000000000000")); // -2^64
      expect(() => zigzagEncode64(verySmall)).toThrow(RangeError);
    });
  });
});

describe('type ids', () => {
  it('keeps the protocol numbering', () => {
    expect(TypeId.BOOL).toBe(1);
    expect(TypeId.VARINT32).toBe(5);
    expect(TypeId.STRING).toBe(21);
    expect(TypeId.STRUCT).toBe(27);
    expect(TypeId.NAMED_COMPATIBLE_STRUCT).toBe(30);
    expect(TypeId.BINARY).toBe(41);
  });

  it('names type ids for messages', () => {
    expect(typeIdName(TypeId.VAR_UINT64)).toBe('VAR_UINT64');
    expect(typeIdName(200)).toBe('TYPE_200');
  });

  it('rejects tagged integers and small floats as unsupported', () => {
    expect(isSupportedPrimitiveTypeId(TypeId.VARINT64)).toBe(true);
    expect(isSupportedPrimitiveTypeId(TypeId.TAGGED_INT64)).toBe(false);
    expect(isSupportedPrimitiveTypeId(TypeId.FLOAT16)).toBe(false);
    expect(isSupportedPrimitiveTypeId(TypeId.STRING)).toBe(false);
  });

  it('treats bool as non-numeric', () => {
    expect(isNumericTypeId(TypeId.BOOL)).toBe(false);
    expect(isNumericTypeId(TypeId.FLOAT32)).toBe(true);
  });

  it('classifies 64-bit integers', () => {
    expect(isInt64TypeId(TypeId.VAR_UINT64)).toBe(true);
    expect(isInt64TypeId(TypeId.INT32)).toBe(false);
  });

  it('classifies varint encodings', () => {
    expect(isCompressedTypeId(TypeId.VARINT32)).toBe(true);
    expect(isCompressedTypeId(TypeId.INT32)).toBe(false);
  });

  it('classifies user-defined type ids', () => {
    for (const id of [TypeId.ENUM, TypeId.NAMED_STRUCT, TypeId.EXT, TypeId.UNION, TypeId.TYPED_UNION]) {
      expect(isUserDefinedTypeId(id)).toBe(true);
    }
    expect(isUserDefinedTypeId(TypeId.LIST)).toBe(false);
    expect(isNamedTypeId(TypeId.NAMED_ENUM)).toBe(true);
    expect(needsUserTypeId(TypeId.TYPED_UNION)).toBe(true);
    expect(needsUserTypeId(TypeId.UNION)).toBe(false);
  });

  it('reports primitive sizes', () => {
    expect(primitiveTypeSize(TypeId.INT8)).toBe(1);
    expect(primitiveTypeSize(TypeId.VARINT32)).toBe(4);
    expect(primitiveTypeSize(TypeId.FLOAT64)).toBe(8);
    expect(primitiveTypeSize(TypeId.STRING)).toBe(0);
  });
});
