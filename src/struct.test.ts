import { describe, it, expect } from 'vitest';
import { Fory } from './fory';
import { Type, UnknownStruct } from './typeInfo';
import { computeStructHash } from './typeMeta';
import { TypeId } from './types';
import { Writer } from './writer';
import { EncodeError, SchemaHashMismatchError } from './errors';

class Point {
  x = 0;
  y = 0;
}

class Node {
  value = 0;
  next: Node | null = null;
}

describe('schema-consistent structs', () => {
  it('writes the hash and the fields in wire order', () => {
    const fory = new Fory();
    const descriptor = fory.register(Type.struct(100, { x: Type.int32(), y: Type.int32() }, Point));
    const point = new Point();
    point.x = 3;
    point.y = 4;

    const expected = new Writer();
    expected.writeUint8(0x00);
    expected.writeUint8(TypeId.STRUCT);
    expected.writeUint8(100);
    expected.writeInt32(computeStructHash(descriptor.fields ?? [], true));
    expected.writeUint8(0x06);
    expected.writeUint8(0x08);

    const bytes = fory.serialize(point);
    expect(bytes).toEqual(expected.bytes());

    const copy = fory.deserialize(bytes);
    expect(copy).toBeInstanceOf(Point);
    expect(copy).toEqual(point);
  });

  it('reads plain objects when no class is registered', () => {
    const fory = new Fory();
    const descriptor = fory.register(Type.struct(101, { name: Type.string(), tags: Type.list(Type.string()) }));
    const value = { name: 'box', tags: ['a', 'b'] };
    const copy = fory.deserialize(fory.serialize(value, descriptor), descriptor);
    expect(copy).toEqual(value);
    // the decoded object remembers its type
    expect(fory.deserialize(fory.serialize(copy))).toEqual(value);
  });

  it('fails on a hash mismatch', () => {
    const writer = new Fory();
    const reader = new Fory();
    const written = writer.register(Type.struct(300, { x: Type.int32() }));
    const expected = reader.register(Type.struct(300, { x: Type.int64() }));
    const bytes = writer.serialize({ x: 1 }, written);
    expect(() => reader.deserialize(bytes, expected)).toThrow(SchemaHashMismatchError);
  });

  it('rejects a missing non-nullable field', () => {
    const fory = new Fory();
    const descriptor = fory.register(Type.struct(102, { count: Type.int32() }));
    expect(() => fory.serialize({}, descriptor)).toThrow(EncodeError);
    expect(() => fory.serialize({}, descriptor)).toThrow('Missing value for non-nullable field');
  });

  it('writes null into nullable fields', () => {
    const fory = new Fory();
    const descriptor = fory.register(Type.struct(103, { label: Type.nullable(Type.string()) }));
    expect(fory.deserialize(fory.serialize({ label: null }, descriptor), descriptor)).toEqual({ label: null });
  });

  it('restores cycles through struct fields', () => {
    const fory = new Fory();
    fory.register(Type.struct(1, { value: Type.int32(), next: Type.nullable(Type.struct(1)) }, Node));
    const a = new Node();
    const b = new Node();
    a.value = 1;
    b.value = 2;
    a.next = b;
    b.next = a;

    const copy = fory.deserialize(fory.serialize(a));
    expect(copy).toBeInstanceOf(Node);
    if (copy instanceof Node) {
      expect(copy.value).toBe(1);
      expect(copy.next?.value).toBe(2);
      expect(copy.next?.next).toBe(copy);
    }
  });
});

describe('compatible structs', () => {
  it('writes the TypeMeta once per pass', () => {
    const fory = new Fory({ compatible: true });
    const descriptor = fory.register(Type.struct(110, { x: Type.int32() }));
    const one = fory.serialize([{ x: 1 }], Type.list(descriptor));
    const two = fory.serialize([{ x: 1 }, { x: 2 }], Type.list(descriptor));
    // no second TypeMeta, only the element itself
    expect(two.length - one.length).toBe(3);
    expect(fory.deserialize(two, Type.list(descriptor))).toEqual([{ x: 1 }, { x: 2 }]);
  });

  it('refuses to write unknown structs in schema-consistent mode', () => {
    const compatible = new Fory({ compatible: true });
    const descriptor = compatible.register(Type.struct(111, { x: Type.int32() }));
    const bytes = compatible.serialize({ x: 5 }, descriptor);

    const unknown = new Fory({ compatible: true }).deserialize(bytes);
    expect(unknown).toBeInstanceOf(UnknownStruct);
    expect(() => new Fory().serialize(unknown)).toThrow('Unknown structs can only be written in compatible mode');
  });
});
