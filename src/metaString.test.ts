import { describe, it, expect } from 'vitest';
import {
  FIELD_NAME_ENCODINGS,
  MetaStringCodec,
  MetaStringEncoding,
  NAMESPACE_ENCODINGS,
  TYPE_NAME_ENCODINGS,
  toCamelCase,
  toSnakeCase,
} from './metaString';
import { InvalidDataError } from './errors';

describe('MetaStringCodec', () => {
  const codec = MetaStringCodec.fieldName;

  it('packs lower-case text at 5 bits per char', () => {
    const encoded = codec.encode('abc');
    expect(encoded.encoding).toBe(MetaStringEncoding.LOWER_SPECIAL);
    expect(encoded.bytes).toEqual(new Uint8Array([0x00, 0x22]));
  });

  it('sets the strip flag when the padding could hold another char', () => {
    const encoded = codec.encode('ab');
    expect(encoded.bytes).toEqual(new Uint8Array([0x80, 0x20]));
    expect(codec.decode(encoded.bytes, encoded.encoding)).toBe('ab');
  });

  it('falls back to ALL_TO_LOWER_SPECIAL where LOWER_SPECIAL is not allowed', () => {
    const encoded = codec.encode('abc', FIELD_NAME_ENCODINGS);
    expect(encoded.encoding).toBe(MetaStringEncoding.ALL_TO_LOWER_SPECIAL);
    expect(encoded.bytes).toEqual(new Uint8Array([0x00, 0x22]));
  });

  it('uses FIRST_TO_LOWER_SPECIAL for capitalized type names', () => {
    const typeName = MetaStringCodec.typeName;
    const encoded = typeName.encode('Foo', TYPE_NAME_ENCODINGS);
    expect(encoded.encoding).toBe(MetaStringEncoding.FIRST_TO_LOWER_SPECIAL);
    expect(typeName.decode(encoded.bytes, encoded.encoding)).toBe('Foo');
  });

  it('uses LOWER_UPPER_DIGIT_SPECIAL for names with digits', () => {
    const typeName = MetaStringCodec.typeName;
    const encoded = typeName.encode('Vec3', TYPE_NAME_ENCODINGS);
    expect(encoded.encoding).toBe(MetaStringEncoding.LOWER_UPPER_DIGIT_SPECIAL);
    expect(typeName.decode(encoded.bytes, encoded.encoding)).toBe('Vec3');
  });

  it('escapes upper-case chars in ALL_TO_LOWER_SPECIAL', () => {
    const typeName = MetaStringCodec.typeName;
    const encoded = typeName.encodeWith('aBc', MetaStringEncoding.ALL_TO_LOWER_SPECIAL);
    expect(typeName.decode(encoded.bytes, encoded.encoding)).toBe('aBc');
  });

  it('uses the namespace separator as a special char', () => {
    const namespace = MetaStringCodec.namespace;
    const encoded = namespace.encode('org.Example9', NAMESPACE_ENCODINGS);
    expect(encoded.encoding).toBe(MetaStringEncoding.LOWER_UPPER_DIGIT_SPECIAL);
    expect(namespace.decode(encoded.bytes, encoded.encoding)).toBe('org.Example9');
  });

  it('falls back to UTF-8 for other characters', () => {
    const encoded = codec.encode('naïve', FIELD_NAME_ENCODINGS);
    expect(encoded.encoding).toBe(MetaStringEncoding.UTF_8);
    expect(codec.decode(encoded.bytes, encoded.encoding)).toBe('naïve');
  });

  it('encodes the empty string as no bytes', () => {
    const encoded = codec.encode('');
    expect(encoded.encoding).toBe(MetaStringEncoding.UTF_8);
    expect(encoded.bytes.length).toBe(0);
  });

  it('rejects LOWER_SPECIAL values that map to no char', () => {
    // 11111 in the first char slot
    expect(() => codec.decode(new Uint8Array([0x7c, 0x00]), MetaStringEncoding.LOWER_SPECIAL)).toThrow(
      InvalidDataError
    );
  });
});

describe('name case conversion', () => {
  it('converts camelCase to snake_case', () => {
    expect(toSnakeCase('firstName')).toBe('first_name');
    expect(toSnakeCase('userID')).toBe('user_id');
    expect(toSnakeCase('x')).toBe('x');
  });

  it('converts snake_case to camelCase', () => {
    expect(toCamelCase('first_name')).toBe('firstName');
    expect(toCamelCase('plain')).toBe('plain');
  });
});
