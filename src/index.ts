/**
 * fory-wire - Fory cross-language serialization runtime for TypeScript
 *
 * Writes and reads the Fory binary wire format: primitives, strings,
 * collections, chunked maps, enums, unions and structs, with reference
 * tracking and schema-consistent or compatible struct encoding.
 *
 * @example
 * ```typescript
 * import { Fory, Type } from 'fory-wire';
 *
 * class Point {
 *   x = 0;
 *   y = 0;
 * }
 *
 * const fory = new Fory();
 * fory.register(Type.struct(100, { x: Type.int32(), y: Type.int32() }, Point));
 *
 * const point = new Point();
 * point.x = 3;
 * const bytes = fory.serialize(point);
 * const copy = fory.deserialize(bytes) as Point;
 * ```
 */

// Core types
export {
  TypeId,
  RefFlag,
  CollectionFlags,
  MapFlags,
  MAX_CHUNK_SIZE,
  StringEncoding,
  MinInt32,
  MaxInt32,
  MaxUint32,
  MinInt64,
  MaxInt64,
  MaxUint64,
  typeIdName,
  zigzagEncode,
  zigzagEncode64,
  zigzagDecode,
  zigzagDecode64,
} from "./types";

// Errors
export type { ErrorContext } from "./errors";
export {
  ForyError,
  EncodeError,
  DecodeError,
  InvalidDataError,
  BufferUnderflowError,
  DepthLimitExceededError,
  SchemaHashMismatchError,
  UnknownTypeError,
  DanglingReferenceError,
  DuplicateRegistrationError,
  InvalidEnumValueError,
  ConfigError,
} from "./errors";

// Configuration
export type { ForyConfig, ForyConfigInput } from "./config";
export { ForyConfigSchema, parseConfig } from "./config";

// Type descriptors
export { Type, Union, UnknownStruct } from "./typeInfo";
export type {
  TypeDescriptor,
  PrimitiveDescriptor,
  StringDescriptor,
  BinaryDescriptor,
  ListDescriptor,
  SetDescriptor,
  MapDescriptor,
  StructDescriptor,
  EnumDescriptor,
  UnionDescriptor,
  ExtDescriptor,
  AnyDescriptor,
  UserDescriptor,
  FieldInfo,
  EnumValue,
  ExtSerializer,
  StructCreator,
  TypeIdentity,
} from "./typeInfo";

// Type metadata
export { TypeMeta, computeStructHash, groupFieldsByType } from "./typeMeta";
export type { FieldMeta, FieldTypeMeta } from "./typeMeta";
export { MetaStringCodec, MetaStringEncoding, toCamelCase, toSnakeCase } from "./metaString";
export { murmurHash3x64_128 } from "./murmurHash3";
export type { Hash128 } from "./murmurHash3";

// Registry
export { TypeRegistry } from "./registry";
export type { Constructor } from "./registry";

// Writer
import { Writer } from "./writer";
export { Writer };

// Reader
import { Reader } from "./reader";
export { Reader };

export { Fory } from "./fory";

/**
 * Library version.
 */
export const VERSION = "0.1.0";
