import { describe, it, expect } from 'vitest';
import {
  fieldFlagMode,
  isMonomorphic,
  pickReadType,
  readData,
  readSharedMeta,
  readSlot,
  readTypeInfo,
  writeSharedMeta,
  writeSlot,
  writeTypeInfo,
} from './codec';
import { parseConfig } from './config';
import type { ForyConfigInput } from './config';
import { ReadContext, WriteContext } from './context';
import { EncodeError, InvalidDataError } from './errors';
import { Reader } from './reader';
import { TypeRegistry } from './registry';
import { ORDINAL_ENUM, Type, fieldsOf } from './typeInfo';
import { TypeMeta } from './typeMeta';
import { TypeId } from './types';
import { Writer } from './writer';

function writeContext(options: ForyConfigInput = {}): WriteContext {
  const config = parseConfig(options);
  return new WriteContext(new Writer(), new TypeRegistry(config), config);
}

function readContext(bytes: number[] | Uint8Array, options: ForyConfigInput = {}): ReadContext {
  const config = parseConfig(options);
  const data = bytes instanceof Uint8Array ? bytes : new Uint8Array(bytes);
  return new ReadContext(new Reader(data), new TypeRegistry(config), config);
}

describe('writeSlot', () => {
  it('writes no flag in mode none', () => {
    const ctx = writeContext();
    writeSlot(ctx, 42, Type.int32(), 'none', false);
    expect(ctx.writer.bytes()).toEqual(new Uint8Array([0x54]));
  });

  it('writes a not-null flag in mode null', () => {
    const ctx = writeContext();
    writeSlot(ctx, 'a', Type.string(), 'null', false);
    expect(ctx.writer.bytes()).toEqual(new Uint8Array([0xff, 0x04, 0x61]));
  });

  it('writes type info when asked', () => {
    const ctx = writeContext();
    writeSlot(ctx, 42, Type.int32(), 'none', true);
    expect(ctx.writer.bytes()).toEqual(new Uint8Array([TypeId.VARINT32, 0x54]));
  });

  it('always writes type info for any', () => {
    const ctx = writeContext();
    writeSlot(ctx, 'x', Type.any(), 'none', false);
    expect(ctx.writer.bytes()).toEqual(new Uint8Array([TypeId.STRING, 0x04, 0x78]));
  });

  it('writes only the flag for null', () => {
    const ctx = writeContext();
    writeSlot(ctx, null, Type.nullable(Type.string()), 'ref', true);
    expect(ctx.writer.bytes()).toEqual(new Uint8Array([0xfd]));
  });

  it('rejects null in mode none', () => {
    const ctx = writeContext();
    expect(() => writeSlot(ctx, null, Type.string(), 'none', false)).toThrow(
      'Missing value for non-nullable STRING'
    );
  });

  it('writes enums without values as ordinals', () => {
    const ctx = writeContext();
    writeSlot(ctx, 3, ORDINAL_ENUM, 'none', false);
    expect(ctx.writer.bytes()).toEqual(new Uint8Array([0x03]));
    expect(() => writeSlot(writeContext(), -1, ORDINAL_ENUM, 'none', false)).toThrow(EncodeError);
  });

  it('range-checks integers', () => {
    const ctx = writeContext();
    expect(() => writeSlot(ctx, 128, Type.int8(), 'none', false)).toThrow('Value 128 is not a valid INT8');
    expect(() => writeSlot(ctx, 1.5, Type.int32(), 'none', false)).toThrow(EncodeError);
    expect(() => writeSlot(ctx, -1n, Type.uint64(), 'none', false)).toThrow(EncodeError);
    expect(() => writeSlot(ctx, 1, Type.bool(), 'none', false)).toThrow('Value 1 is not a valid BOOL');
  });

  it('accepts numbers for 64-bit fields', () => {
    const ctx = writeContext();
    writeSlot(ctx, 5, Type.fixedInt64(), 'none', false);
    expect(ctx.writer.bytes()).toEqual(new Uint8Array([5, 0, 0, 0, 0, 0, 0, 0]));
  });
});

describe('writeTypeInfo', () => {
  it('refuses any', () => {
    expect(() => writeTypeInfo(writeContext(), Type.any())).toThrow(EncodeError);
  });

  it('writes the user type id of id-registered types', () => {
    const ctx = writeContext();
    writeTypeInfo(ctx, Type.enum(300, ['a']));
    expect(ctx.writer.bytes()).toEqual(new Uint8Array([TypeId.ENUM, 0xac, 0x02]));
  });

  it('writes a bare id for anonymous unions', () => {
    const ctx = writeContext();
    writeTypeInfo(ctx, Type.union(undefined, { 0: Type.string() }));
    expect(ctx.writer.bytes()).toEqual(new Uint8Array([TypeId.UNION]));
  });

  it('writes names once and then their index', () => {
    const ctx = writeContext();
    const color = Type.enum({ namespace: 'demo', typeName: 'Item' }, ['a']);
    writeTypeInfo(ctx, color);
    writeTypeInfo(ctx, color);
    expect(ctx.writer.bytes()).toEqual(
      new Uint8Array([
        TypeId.NAMED_ENUM,
        // "demo" as ALL_TO_LOWER_SPECIAL
        6, 4, 0x0c, 0x8c, 0x70,
        // "Item" as FIRST_TO_LOWER_SPECIAL
        6, 3, 0x22, 0x64, 0x60,
        TypeId.NAMED_ENUM,
        3,
        5,
      ])
    );
  });
});

describe('shared TypeMeta', () => {
  const meta = TypeMeta.fromStruct(Type.struct(1, { x: Type.int32() }), TypeId.COMPATIBLE_STRUCT, true);

  it('writes a TypeMeta once and its index after', () => {
    const ctx = writeContext();
    writeSharedMeta(ctx, meta);
    writeSharedMeta(ctx, meta);
    const body = meta.toBytes();
    const bytes = ctx.writer.bytes();
    expect(bytes[0]).toBe(0);
    expect(bytes.subarray(1, 1 + body.length)).toEqual(body);
    expect(bytes[1 + body.length]).toBe(1);
    expect(bytes.length).toBe(body.length + 2);
  });

  it('reads what it wrote', () => {
    const ctx = writeContext();
    writeSharedMeta(ctx, meta);
    writeSharedMeta(ctx, meta);
    const read = readContext(ctx.writer.bytes().slice());
    const first = readSharedMeta(read);
    expect(readSharedMeta(read)).toBe(first);
    expect(first.headerValue).toBe(meta.headerValue);
  });

  it('rejects an index out of sequence', () => {
    expect(() => readSharedMeta(readContext([0x02]))).toThrow('Expected TypeMeta index 0, got 1');
  });

  it('rejects a reference to an unread index', () => {
    expect(() => readSharedMeta(readContext([0x03]))).toThrow('Unknown TypeMeta index 1');
  });
});

describe('readTypeInfo', () => {
  it('resolves built-in type ids', () => {
    expect(readTypeInfo(readContext([TypeId.FLOAT64])).descriptor.typeId).toBe(TypeId.FLOAT64);
    expect(readTypeInfo(readContext([TypeId.MAP])).descriptor.kind).toBe('map');
  });

  it('rejects tagged integers', () => {
    expect(() => readTypeInfo(readContext([TypeId.TAGGED_INT64]))).toThrow('Unsupported type id TAGGED_INT64');
  });

  it('rejects unregistered user types', () => {
    expect(() => readTypeInfo(readContext([TypeId.STRUCT, 0x07]))).toThrow('Unknown type: STRUCT #7');
  });

  it('skips unregistered enums while skipping', () => {
    const ctx = readContext([TypeId.ENUM, 0x07, 0x02]);
    ctx.skipping = 1;
    const type = readTypeInfo(ctx);
    expect(readData(ctx, type)).toBe(2);
  });

  it('reads unregistered enums as ordinals inside unknown structs', () => {
    const ctx = readContext([TypeId.ENUM, 0x07, 0x09]);
    ctx.unresolved = 1;
    expect(readData(ctx, readTypeInfo(ctx))).toBe(9);
  });
});

describe('readSlot', () => {
  it('reads null from a null flag', () => {
    expect(readSlot(readContext([0xfd]), Type.string(), 'ref', false)).toBe(null);
  });

  it('reads a value after a not-null flag', () => {
    expect(readSlot(readContext([0xff, 0x04, 0x61]), Type.string(), 'ref', false)).toBe('a');
  });

  it('reads enums without values as ordinals', () => {
    expect(readData(readContext([0x03]), { descriptor: ORDINAL_ENUM })).toBe(3);
  });

  it('rejects enum ordinals out of range', () => {
    const ctx = readContext([0x05]);
    expect(() => readData(ctx, { descriptor: Type.enum(1, ['a', 'b']) })).toThrow('Enum ordinal 5 out of range');
  });

  it('rejects invalid flags', () => {
    expect(() => readSlot(readContext([0x01]), Type.string(), 'ref', false)).toThrow(InvalidDataError);
  });
});

describe('pickReadType', () => {
  it('keeps the declared container type', () => {
    const declared = Type.list(Type.int32());
    const wire = readTypeInfo(readContext([TypeId.LIST]));
    expect(pickReadType(wire, declared).descriptor).toBe(declared);
  });

  it('uses the wire type when kinds differ', () => {
    const wire = readTypeInfo(readContext([TypeId.STRING]));
    expect(pickReadType(wire, Type.list(Type.int32())).descriptor.kind).toBe('string');
  });
});

describe('flag modes', () => {
  it('treats structs as polymorphic only in compatible mode', () => {
    const struct = Type.struct(1, { x: Type.int32() });
    expect(isMonomorphic(writeContext(), struct)).toBe(true);
    expect(isMonomorphic(writeContext({ compatible: true }), struct)).toBe(false);
    expect(isMonomorphic(writeContext(), Type.any())).toBe(false);
  });

  it('derives field flags from ref tracking and nullability', () => {
    const [list, name, count] = fieldsOf({
      list: Type.list(Type.int32()),
      name: Type.nullable(Type.string()),
      count: Type.int32(),
    });
    expect(fieldFlagMode(writeContext(), list)).toBe('ref');
    expect(fieldFlagMode(writeContext({ refTracking: false }), list)).toBe('none');
    expect(fieldFlagMode(writeContext(), name)).toBe('null');
    expect(fieldFlagMode(writeContext(), count)).toBe('none');
  });
});
