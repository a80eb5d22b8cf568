/**
 * Type identifiers used in the Fory wire format.
 *
 * The numeric values are shared by every implementation of the protocol, so
 * they must never be renumbered.
 */
export enum TypeId {
  /** Unknown/polymorphic type marker ("any"). */
  UNKNOWN = 0,
  BOOL = 1,
  INT8 = 2,
  INT16 = 3,
  INT32 = 4,
  VARINT32 = 5,
  INT64 = 6,
  VARINT64 = 7,
  TAGGED_INT64 = 8,
  UINT8 = 9,
  UINT16 = 10,
  UINT32 = 11,
  VAR_UINT32 = 12,
  UINT64 = 13,
  VAR_UINT64 = 14,
  TAGGED_UINT64 = 15,
  FLOAT8 = 16,
  FLOAT16 = 17,
  BFLOAT16 = 18,
  FLOAT32 = 19,
  FLOAT64 = 20,
  STRING = 21,
  LIST = 22,
  SET = 23,
  MAP = 24,
  ENUM = 25,
  NAMED_ENUM = 26,
  STRUCT = 27,
  COMPATIBLE_STRUCT = 28,
  NAMED_STRUCT = 29,
  NAMED_COMPATIBLE_STRUCT = 30,
  EXT = 31,
  NAMED_EXT = 32,
  /** A union value whose schema identity is not embedded. */
  UNION = 33,
  /** A union value with an embedded numeric union type ID. */
  TYPED_UNION = 34,
  /** A union value with an embedded union type name. */
  NAMED_UNION = 35,
  NONE = 36,
  DURATION = 37,
  TIMESTAMP = 38,
  DATE = 39,
  DECIMAL = 40,
  BINARY = 41,
}

/**
 * Reference/null flag written before a value.
 */
export enum RefFlag {
  /** The value is null. */
  Null = -3,
  /** Back-reference; a varint ref id follows. */
  Ref = -2,
  /** Non-null value written without reference bookkeeping. */
  NotNullValue = -1,
  /** First occurrence of a tracked value; its id is the next sequential id. */
  RefValue = 0,
}

/**
 * Collection header bits.
 */
export const CollectionFlags = {
  TRACKING_REF: 0b0001,
  HAS_NULL: 0b0010,
  DECL_ELEMENT_TYPE: 0b0100,
  IS_SAME_TYPE: 0b1000,
} as const;

/**
 * Map chunk header bits. Key flags occupy bits 0-2, value flags bits 3-5.
 */
export const MapFlags = {
  TRACKING_REF: 0b001,
  HAS_NULL: 0b010,
  DECL_TYPE: 0b100,
  VALUE_SHIFT: 3,
} as const;

/** Maximum number of entries in one map chunk. */
export const MAX_CHUNK_SIZE = 255;

/**
 * String payload encodings, stored in the low two bits of the string header.
 */
export enum StringEncoding {
  LATIN1 = 0,
  UTF16 = 1,
  UTF8 = 2,
}

/**
 * Integer bounds.
 */
export const MinInt32 = -2147483648;
export const MaxInt32 = 2147483647;
export const MaxUint32 = 0xffffffff;
export const MaxUint64 = BigInt("0xffffffffffffffff");
export const MinInt64 = BigInt("-9223372036854775808"); // -2^63
export const MaxInt64 = BigInt("9223372036854775807"); // 2^63 - 1

const PRIMITIVE_TYPE_IDS: ReadonlySet<TypeId> = new Set([
  TypeId.BOOL,
  TypeId.INT8,
  TypeId.INT16,
  TypeId.INT32,
  TypeId.VARINT32,
  TypeId.INT64,
  TypeId.VARINT64,
  TypeId.TAGGED_INT64,
  TypeId.UINT8,
  TypeId.UINT16,
  TypeId.UINT32,
  TypeId.VAR_UINT32,
  TypeId.UINT64,
  TypeId.VAR_UINT64,
  TypeId.TAGGED_UINT64,
  TypeId.FLOAT8,
  TypeId.FLOAT16,
  TypeId.BFLOAT16,
  TypeId.FLOAT32,
  TypeId.FLOAT64,
]);

const UNSUPPORTED_PRIMITIVE_TYPE_IDS: ReadonlySet<TypeId> = new Set([
  TypeId.TAGGED_INT64,
  TypeId.TAGGED_UINT64,
  TypeId.FLOAT8,
  TypeId.FLOAT16,
  TypeId.BFLOAT16,
]);

const COMPRESSED_TYPE_IDS: ReadonlySet<TypeId> = new Set([
  TypeId.VARINT32,
  TypeId.VARINT64,
  TypeId.TAGGED_INT64,
  TypeId.VAR_UINT32,
  TypeId.VAR_UINT64,
  TypeId.TAGGED_UINT64,
]);

export function isPrimitiveTypeId(typeId: number): boolean {
  return PRIMITIVE_TYPE_IDS.has(typeId);
}

/**
 * Primitive type ids this runtime reads and writes. Tagged integers and the
 * small floats are recognised but rejected.
 */
export function isSupportedPrimitiveTypeId(typeId: number): boolean {
  return isPrimitiveTypeId(typeId) && !UNSUPPORTED_PRIMITIVE_TYPE_IDS.has(typeId);
}

/**
 * Primitive type ids holding a number.
 */
export function isNumericTypeId(typeId: number): boolean {
  return isSupportedPrimitiveTypeId(typeId) && typeId !== TypeId.BOOL;
}

/**
 * Integer types wider than a JavaScript number holds exactly.
 */
export function isInt64TypeId(typeId: number): boolean {
  return (
    typeId === TypeId.INT64 ||
    typeId === TypeId.VARINT64 ||
    typeId === TypeId.UINT64 ||
    typeId === TypeId.VAR_UINT64
  );
}

/**
 * Varint-encoded integer types sort after the fixed-width ones.
 */
export function isCompressedTypeId(typeId: number): boolean {
  return COMPRESSED_TYPE_IDS.has(typeId);
}

export function isStructTypeId(typeId: number): boolean {
  return (
    typeId === TypeId.STRUCT ||
    typeId === TypeId.COMPATIBLE_STRUCT ||
    typeId === TypeId.NAMED_STRUCT ||
    typeId === TypeId.NAMED_COMPATIBLE_STRUCT
  );
}

export function isEnumTypeId(typeId: number): boolean {
  return typeId === TypeId.ENUM || typeId === TypeId.NAMED_ENUM;
}

export function isUnionTypeId(typeId: number): boolean {
  return typeId === TypeId.UNION || typeId === TypeId.TYPED_UNION || typeId === TypeId.NAMED_UNION;
}

export function isExtTypeId(typeId: number): boolean {
  return typeId === TypeId.EXT || typeId === TypeId.NAMED_EXT;
}

/**
 * Type ids registered by the application rather than built into the protocol.
 */
export function isUserDefinedTypeId(typeId: number): boolean {
  return isStructTypeId(typeId) || isEnumTypeId(typeId) || isUnionTypeId(typeId) || isExtTypeId(typeId);
}

/**
 * Type ids whose type info carries a namespace and type name.
 */
export function isNamedTypeId(typeId: number): boolean {
  return (
    typeId === TypeId.NAMED_STRUCT ||
    typeId === TypeId.NAMED_COMPATIBLE_STRUCT ||
    typeId === TypeId.NAMED_ENUM ||
    typeId === TypeId.NAMED_EXT ||
    typeId === TypeId.NAMED_UNION
  );
}

/**
 * Type ids whose type info carries a varint user type id.
 */
export function needsUserTypeId(typeId: number): boolean {
  return (
    typeId === TypeId.STRUCT ||
    typeId === TypeId.ENUM ||
    typeId === TypeId.EXT ||
    typeId === TypeId.TYPED_UNION
  );
}

/**
 * Returns the fixed size in bytes of a primitive type, or 0.
 * Varint types report the size of the value they carry.
 */
export function primitiveTypeSize(typeId: number): number {
  switch (typeId) {
    case TypeId.BOOL:
    case TypeId.INT8:
    case TypeId.UINT8:
    case TypeId.FLOAT8:
      return 1;
    case TypeId.INT16:
    case TypeId.UINT16:
    case TypeId.FLOAT16:
    case TypeId.BFLOAT16:
      return 2;
    case TypeId.INT32:
    case TypeId.VARINT32:
    case TypeId.UINT32:
    case TypeId.VAR_UINT32:
    case TypeId.FLOAT32:
      return 4;
    case TypeId.INT64:
    case TypeId.VARINT64:
    case TypeId.TAGGED_INT64:
    case TypeId.UINT64:
    case TypeId.VAR_UINT64:
    case TypeId.TAGGED_UINT64:
    case TypeId.FLOAT64:
      return 8;
    default:
      return 0;
  }
}

/**
 * Returns a readable name for a type id, for error messages.
 */
export function typeIdName(typeId: number): string {
  return TypeId[typeId] ?? `TYPE_${typeId}`;
}

/**
 * Encode a signed 32-bit integer using ZigZag encoding.
 * The result is an unsigned 32-bit value.
 */
export function zigzagEncode(n: number): number {
  return ((n << 1) ^ (n >> 31)) >>> 0;
}

/**
 * Encode a signed bigint using ZigZag encoding.
 * @throws RangeError if n is outside the valid 64-bit signed integer range
 */
export function zigzagEncode64(n: bigint): bigint {
  if (n < MinInt64 || n > MaxInt64) {
    throw new RangeError(
      `BigInt value ${n} is outside valid 64-bit signed integer range [${MinInt64}, ${MaxInt64}]`
    );
  }
  return BigInt.asUintN(64, (n << 1n) ^ (n >> 63n));
}

/**
 * Decode a ZigZag encoded 32-bit integer.
 */
export function zigzagDecode(n: number): number {
  return (n >>> 1) ^ -(n & 1);
}

/**
 * Decode a ZigZag encoded bigint.
 */
export function zigzagDecode64(n: bigint): bigint {
  return (n >> 1n) ^ -(n & 1n);
}
