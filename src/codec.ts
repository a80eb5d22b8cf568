import { readList, readSet, writeList } from "./collection";
import type { ReadContext, WriteContext } from "./context";
import { EncodeError, InvalidDataError, InvalidEnumValueError, UnknownTypeError } from "./errors";
import { readMap, writeMap } from "./map";
import {
  MetaStringCodec,
  MetaStringEncoding,
  NAMESPACE_ENCODINGS,
  TYPE_NAME_ENCODINGS,
} from "./metaString";
import { murmurHash3x64_128 } from "./murmurHash3";
import { int64ToNumber } from "./reader";
import type { RemoteStructPlan } from "./registry";
import { readCompatibleStruct, readStruct, writeStruct } from "./struct";
import {
  type EnumDescriptor,
  type FieldInfo,
  type PrimitiveDescriptor,
  type TypeDescriptor,
  type UnionDescriptor,
  type UserDescriptor,
  ORDINAL_ENUM,
  Type,
  Union,
  displayName,
  primitive,
} from "./typeInfo";
import { TypeMeta } from "./typeMeta";
import {
  MaxInt32,
  MaxInt64,
  MaxUint32,
  MaxUint64,
  MinInt32,
  MinInt64,
  RefFlag,
  TypeId,
  isEnumTypeId,
  isNamedTypeId,
  isSupportedPrimitiveTypeId,
  needsUserTypeId,
  typeIdName,
} from "./types";

/**
 * What precedes a value on the wire: nothing, a null flag, or a full ref
 * flag. Readers only care whether a flag is there.
 */
export type FlagMode = "none" | "null" | "ref";

/**
 * The type a value is read as, with the read plan of a compatible struct.
 */
export interface ReadType {
  readonly descriptor: TypeDescriptor;
  readonly plan?: RemoteStructPlan;
}

/** Meta strings longer than this carry a hash instead of an encoding byte. */
const SMALL_META_STRING = 16;

const ANY = Type.any();
const STRING = Type.string();
const BINARY = Type.binary();
const DYNAMIC_LIST = Type.list(ANY);
const DYNAMIC_SET = Type.set(ANY);
const DYNAMIC_MAP = Type.map(ANY, ANY);
const DYNAMIC_UNION = Type.union(undefined, {});

const primitives = new Map<number, PrimitiveDescriptor>();

function primitiveDescriptor(typeId: TypeId): PrimitiveDescriptor {
  let descriptor = primitives.get(typeId);
  if (descriptor === undefined) {
    descriptor = primitive(typeId);
    primitives.set(typeId, descriptor);
  }
  return descriptor;
}

/**
 * Whether values of a declared type are written without type info.
 * Structs and ext types in compatible mode always carry theirs.
 */
export function isMonomorphic(ctx: WriteContext | ReadContext, descriptor: TypeDescriptor): boolean {
  if (descriptor.kind === "any") {
    return false;
  }
  return !(ctx.config.compatible && (descriptor.kind === "struct" || descriptor.kind === "ext"));
}

/**
 * The flag written before a struct field in schema-consistent mode.
 */
export function fieldFlagMode(ctx: WriteContext | ReadContext, field: FieldInfo): FlagMode {
  if (ctx.config.refTracking && field.trackingRef) {
    return "ref";
  }
  return field.nullable ? "null" : "none";
}

/**
 * The wire type of a value in a slot declared as `declared`.
 */
export function runtimeType(ctx: WriteContext, declared: TypeDescriptor, value: unknown): TypeDescriptor {
  return declared.kind === "any" ? ctx.registry.descriptorOf(value) : declared;
}

// ---------------------------------------------------------------------------
// Writing
// ---------------------------------------------------------------------------

/**
 * Writes one value with its flag and, when asked or when the declared
 * type is `any`, its type info.
 */
export function writeSlot(
  ctx: WriteContext,
  value: unknown,
  descriptor: TypeDescriptor,
  mode: FlagMode,
  withTypeInfo: boolean
): void {
  const writer = ctx.writer;
  switch (mode) {
    case "none":
      if (value === null || value === undefined) {
        throw new EncodeError(`Missing value for non-nullable ${displayName(descriptor)}`);
      }
      break;
    case "null":
      if (ctx.refs.writeNullFlag(writer, value)) {
        return;
      }
      break;
    case "ref":
      if (ctx.refs.writeRefOrNull(writer, value)) {
        return;
      }
      break;
  }

  const actual = runtimeType(ctx, descriptor, value);
  if (withTypeInfo || descriptor.kind === "any") {
    writeTypeInfo(ctx, actual);
  }
  writeData(ctx, value, actual);
}

/**
 * Writes the type id of a value and whatever identifies its user type.
 */
export function writeTypeInfo(ctx: WriteContext, descriptor: TypeDescriptor): void {
  const writer = ctx.writer;
  switch (descriptor.kind) {
    case "struct":
      if (ctx.config.compatible) {
        const meta = ctx.registry.getOrBuildTypeMeta(ctx.registry.resolveStruct(descriptor));
        writer.writeUint8(meta.registerByName ? TypeId.NAMED_COMPATIBLE_STRUCT : TypeId.COMPATIBLE_STRUCT);
        writeSharedMeta(ctx, meta);
      } else {
        writeUserTypeInfo(ctx, descriptor);
      }
      return;
    case "union":
      if (descriptor.typeId === TypeId.UNION) {
        writer.writeUint8(TypeId.UNION);
      } else {
        writeUserTypeInfo(ctx, descriptor);
      }
      return;
    case "enum":
    case "ext":
      writeUserTypeInfo(ctx, descriptor);
      return;
    case "any":
      throw new EncodeError("Type info needs a concrete type");
    default:
      writer.writeUint8(descriptor.typeId);
  }
}

function writeUserTypeInfo(ctx: WriteContext, descriptor: UserDescriptor): void {
  const writer = ctx.writer;
  writer.writeUint8(descriptor.typeId);
  if (descriptor.typeName !== undefined) {
    writeMetaString(ctx, MetaStringCodec.namespace, descriptor.namespace ?? "", NAMESPACE_ENCODINGS);
    writeMetaString(ctx, MetaStringCodec.typeName, descriptor.typeName, TYPE_NAME_ENCODINGS);
  } else if (descriptor.userTypeId !== undefined) {
    writer.writeVarUint32(descriptor.userTypeId);
  } else {
    throw new EncodeError(`${descriptor.kind} has neither a type id nor a type name`);
  }
}

/**
 * Writes the payload of a non-null value.
 */
export function writeData(ctx: WriteContext, value: unknown, descriptor: TypeDescriptor): void {
  const writer = ctx.writer;
  switch (descriptor.kind) {
    case "primitive":
      writePrimitive(ctx, value, descriptor.typeId);
      return;
    case "string":
      if (typeof value !== "string") {
        throw new EncodeError(`Expected a string, got ${typeof value}`);
      }
      writer.writeString(value);
      return;
    case "binary":
      if (!(value instanceof Uint8Array)) {
        throw new EncodeError(`Expected a Uint8Array, got ${typeof value}`);
      }
      writer.writeLengthPrefixedBytes(value);
      return;
    case "list":
    case "set":
      writeList(ctx, value, descriptor);
      return;
    case "map":
      writeMap(ctx, value, descriptor);
      return;
    case "struct":
      writeStruct(ctx, value, descriptor);
      return;
    case "enum":
      writeEnum(ctx, value, descriptor);
      return;
    case "union":
      writeUnion(ctx, value, descriptor);
      return;
    case "ext":
      ctx.registry.extSerializer(descriptor).write(writer, value);
      return;
    case "any":
      throw new EncodeError("Cannot write a value of type any without type info");
  }
}

function expectInteger(value: unknown, typeId: TypeId, min: number, max: number): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) {
    throw new EncodeError(`Value ${String(value)} is not a valid ${typeIdName(typeId)}`);
  }
  return value;
}

function expectBigInt(value: unknown, typeId: TypeId, min: bigint, max: bigint): bigint {
  let n: bigint | undefined;
  if (typeof value === "bigint") {
    n = value;
  } else if (typeof value === "number" && Number.isInteger(value)) {
    n = BigInt(value);
  }
  if (n === undefined || n < min || n > max) {
    throw new EncodeError(`Value ${String(value)} is not a valid ${typeIdName(typeId)}`);
  }
  return n;
}

function expectNumber(value: unknown, typeId: TypeId): number {
  if (typeof value !== "number") {
    throw new EncodeError(`Value ${String(value)} is not a valid ${typeIdName(typeId)}`);
  }
  return value;
}

function writePrimitive(ctx: WriteContext, value: unknown, typeId: TypeId): void {
  const writer = ctx.writer;
  switch (typeId) {
    case TypeId.BOOL:
      if (typeof value !== "boolean") {
        throw new EncodeError(`Value ${String(value)} is not a valid BOOL`);
      }
      writer.writeBool(value);
      return;
    case TypeId.INT8:
      writer.writeInt8(expectInteger(value, typeId, -128, 127));
      return;
    case TypeId.INT16:
      writer.writeInt16(expectInteger(value, typeId, -32768, 32767));
      return;
    case TypeId.INT32:
      writer.writeInt32(expectInteger(value, typeId, MinInt32, MaxInt32));
      return;
    case TypeId.VARINT32:
      writer.writeVarInt32(expectInteger(value, typeId, MinInt32, MaxInt32));
      return;
    case TypeId.UINT8:
      writer.writeUint8(expectInteger(value, typeId, 0, 0xff));
      return;
    case TypeId.UINT16:
      writer.writeUint16(expectInteger(value, typeId, 0, 0xffff));
      return;
    case TypeId.UINT32:
      writer.writeUint32(expectInteger(value, typeId, 0, MaxUint32));
      return;
    case TypeId.VAR_UINT32:
      writer.writeVarUint32(expectInteger(value, typeId, 0, MaxUint32));
      return;
    case TypeId.INT64:
      writer.writeInt64(expectBigInt(value, typeId, MinInt64, MaxInt64));
      return;
    case TypeId.VARINT64:
      writer.writeVarInt64(expectBigInt(value, typeId, MinInt64, MaxInt64));
      return;
    case TypeId.UINT64:
      writer.writeUint64(expectBigInt(value, typeId, 0n, MaxUint64));
      return;
    case TypeId.VAR_UINT64:
      writer.writeVarUint64(expectBigInt(value, typeId, 0n, MaxUint64));
      return;
    case TypeId.FLOAT32:
      writer.writeFloat32(expectNumber(value, typeId));
      return;
    case TypeId.FLOAT64:
      writer.writeFloat64(expectNumber(value, typeId));
      return;
    default:
      throw new EncodeError(`Unsupported primitive type ${typeIdName(typeId)}`);
  }
}

function writeEnum(ctx: WriteContext, value: unknown, descriptor: EnumDescriptor): void {
  if (descriptor.values.length === 0) {
    ctx.writer.writeVarUint32(expectInteger(value, TypeId.VAR_UINT32, 0, MaxUint32));
    return;
  }
  const ordinal = descriptor.values.findIndex((candidate) => candidate === value);
  if (ordinal < 0) {
    throw new InvalidEnumValueError(value, displayName(descriptor));
  }
  ctx.writer.writeVarUint32(ordinal);
}

function writeUnion(ctx: WriteContext, value: unknown, descriptor: UnionDescriptor): void {
  if (!(value instanceof Union)) {
    throw new EncodeError("Expected a Union value", { typeName: displayName(descriptor) });
  }
  const caseType = descriptor.cases.size === 0 ? ANY : descriptor.cases.get(value.caseId);
  if (caseType === undefined) {
    throw new EncodeError(`Unknown union case ${value.caseId}`, { typeName: displayName(descriptor) });
  }
  ctx.writer.writeVarUint32(value.caseId);
  writeSlot(ctx, value.value, caseType, ctx.config.refTracking ? "ref" : "null", true);
}

/**
 * Writes a TypeMeta the first time this pass sees it, and its index after.
 */
export function writeSharedMeta(ctx: WriteContext, meta: TypeMeta): void {
  const writer = ctx.writer;
  const index = ctx.metaIndex.get(meta);
  if (index !== undefined) {
    writer.writeVarUint32((index << 1) | 1);
    return;
  }
  const next = ctx.metaIndex.size;
  ctx.metaIndex.set(meta, next);
  writer.writeVarUint32(next << 1);
  writer.writeBytes(meta.toBytes());
}

function metaStringHash(bytes: Uint8Array, encoding: MetaStringEncoding): bigint {
  let hash = BigInt.asIntN(64, murmurHash3x64_128(bytes, 47).h1);
  if (hash < 0n) {
    hash = BigInt.asIntN(64, -hash);
  }
  let result = BigInt.asUintN(64, hash);
  if (result === 0n) {
    result = 256n;
  }
  return BigInt.asIntN(64, (result & 0xffffffffffffff00n) | BigInt(encoding));
}

/**
 * Writes a namespace or type name, or the index of one written before.
 */
function writeMetaString(
  ctx: WriteContext,
  codec: MetaStringCodec,
  value: string,
  encodings: readonly MetaStringEncoding[]
): void {
  const writer = ctx.writer;
  const key = codec.specialChar1 + value;
  const index = ctx.metaStringIndex.get(key);
  if (index !== undefined) {
    writer.writeVarUint32(((index + 1) << 1) | 1);
    return;
  }
  ctx.metaStringIndex.set(key, ctx.metaStringIndex.size);

  const encoded = codec.encode(value, encodings);
  const bytes = encoded.bytes;
  writer.writeVarUint32(bytes.length << 1);
  if (bytes.length > SMALL_META_STRING) {
    writer.writeInt64(metaStringHash(bytes, encoded.encoding));
  } else if (bytes.length > 0) {
    writer.writeUint8(encoded.encoding);
  }
  writer.writeBytes(bytes);
}

// ---------------------------------------------------------------------------
// Reading
// ---------------------------------------------------------------------------

/**
 * Reads the flag of a slot, then the value through `read` unless the flag
 * says null or names an earlier value.
 */
function readFlagged(ctx: ReadContext, mode: FlagMode, read: (refId: number | undefined) => unknown): unknown {
  if (mode === "none") {
    return read(undefined);
  }
  const flag = ctx.refs.readRefFlag(ctx.reader);
  switch (flag) {
    case RefFlag.Null:
      return null;
    case RefFlag.Ref:
      return ctx.refs.readRef(ctx.reader);
    case RefFlag.NotNullValue:
      return read(undefined);
    case RefFlag.RefValue: {
      const refId = ctx.refs.preserveRefId();
      const value = read(refId);
      ctx.refs.setReadObject(refId, value);
      return value;
    }
  }
}

/**
 * Reads one value written by writeSlot.
 */
export function readSlot(ctx: ReadContext, descriptor: TypeDescriptor, mode: FlagMode, withTypeInfo: boolean): unknown {
  return readFlagged(ctx, mode, (refId) => {
    const type =
      withTypeInfo || descriptor.kind === "any" ? pickReadType(readTypeInfo(ctx), descriptor) : { descriptor };
    return readData(ctx, type, refId);
  });
}

/**
 * Reads one value whose type info was read already.
 */
export function readTyped(ctx: ReadContext, type: ReadType, mode: FlagMode): unknown {
  return readFlagged(ctx, mode, (refId) => readData(ctx, type, refId));
}

/**
 * Reads and discards one value.
 */
export function skipValue(ctx: ReadContext, descriptor: TypeDescriptor, mode: FlagMode, withTypeInfo: boolean): void {
  ctx.skipping++;
  try {
    readSlot(ctx, descriptor, mode, withTypeInfo);
  } finally {
    ctx.skipping--;
  }
}

/**
 * Reads type info and resolves it to a descriptor.
 */
export function readTypeInfo(ctx: ReadContext): ReadType {
  const reader = ctx.reader;
  const registry = ctx.registry;
  const offset = reader.position;
  const typeId = reader.readUint8();
  if (isSupportedPrimitiveTypeId(typeId)) {
    return { descriptor: primitiveDescriptor(typeId) };
  }
  switch (typeId) {
    case TypeId.STRING:
      return { descriptor: STRING };
    case TypeId.BINARY:
      return { descriptor: BINARY };
    case TypeId.LIST:
      return { descriptor: DYNAMIC_LIST };
    case TypeId.SET:
      return { descriptor: DYNAMIC_SET };
    case TypeId.MAP:
      return { descriptor: DYNAMIC_MAP };
    case TypeId.UNION:
      return { descriptor: DYNAMIC_UNION };
    case TypeId.COMPATIBLE_STRUCT:
    case TypeId.NAMED_COMPATIBLE_STRUCT: {
      const plan = registry.resolveRemoteMeta(readSharedMeta(ctx));
      return { descriptor: plan.local ?? plan.remoteDescriptor, plan };
    }
    default:
      break;
  }
  if (needsUserTypeId(typeId)) {
    const userTypeId = reader.readVarUint32();
    return { descriptor: resolveUser(ctx, typeId, () => registry.resolveByWireId(typeId, userTypeId)) };
  }
  if (isNamedTypeId(typeId)) {
    const namespace = readMetaString(ctx, MetaStringCodec.namespace, NAMESPACE_ENCODINGS);
    const typeName = readMetaString(ctx, MetaStringCodec.typeName, TYPE_NAME_ENCODINGS);
    return { descriptor: resolveUser(ctx, typeId, () => registry.resolveByWireName(typeId, namespace, typeName)) };
  }
  throw new InvalidDataError(`Unsupported type id ${typeIdName(typeId)}`, { offset });
}

/**
 * An enum payload is a bare ordinal, so an unregistered enum can still be
 * skipped or kept in an UnknownStruct.
 */
function resolveUser(ctx: ReadContext, typeId: number, lookup: () => UserDescriptor): UserDescriptor {
  if (!ctx.tolerant || !isEnumTypeId(typeId)) {
    return lookup();
  }
  try {
    return lookup();
  } catch (err) {
    if (err instanceof UnknownTypeError) {
      return ORDINAL_ENUM;
    }
    throw err;
  }
}

/**
 * Prefers the declared container type over the dynamic one type info
 * resolves to, so declared element types are kept.
 */
export function pickReadType(wire: ReadType, declared: TypeDescriptor): ReadType {
  switch (declared.kind) {
    case "list":
    case "set":
    case "map":
      return wire.descriptor.typeId === declared.typeId ? { descriptor: declared } : wire;
    case "union":
      return declared.typeId === TypeId.UNION && wire.descriptor.typeId === TypeId.UNION
        ? { descriptor: declared }
        : wire;
    default:
      return wire;
  }
}

function nested<T>(ctx: ReadContext, read: () => T): T {
  ctx.enter();
  try {
    return read();
  } finally {
    ctx.leave();
  }
}

/**
 * Reads the payload of a value of a known type. Containers bind `refId`
 * before reading their children.
 */
export function readData(ctx: ReadContext, type: ReadType, refId?: number): unknown {
  const reader = ctx.reader;
  const descriptor = type.descriptor;
  switch (descriptor.kind) {
    case "primitive":
      return readPrimitive(ctx, descriptor.typeId);
    case "string":
      return reader.readString();
    case "binary":
      return reader.readLengthPrefixedBytes().slice();
    case "list":
      return nested(ctx, () => readList(ctx, descriptor, refId));
    case "set":
      return nested(ctx, () => readSet(ctx, descriptor, refId));
    case "map":
      return nested(ctx, () => readMap(ctx, descriptor, refId));
    case "struct": {
      const plan = type.plan;
      return nested(ctx, () =>
        plan !== undefined ? readCompatibleStruct(ctx, plan, refId) : readStruct(ctx, descriptor, refId)
      );
    }
    case "enum":
      return readEnum(ctx, descriptor);
    case "union":
      return nested(ctx, () => readUnion(ctx, descriptor));
    case "ext":
      return ctx.registry.extSerializer(descriptor).read(reader);
    case "any":
      throw new InvalidDataError("Cannot read a value of type any without type info", { offset: reader.position });
  }
}

function int64Value(ctx: ReadContext, value: bigint): number | bigint {
  return ctx.config.useBigInt64 ? value : int64ToNumber(value, ctx.config.warnOnPrecisionLoss);
}

function readPrimitive(ctx: ReadContext, typeId: TypeId): boolean | number | bigint {
  const reader = ctx.reader;
  switch (typeId) {
    case TypeId.BOOL:
      return reader.readBool();
    case TypeId.INT8:
      return reader.readInt8();
    case TypeId.INT16:
      return reader.readInt16();
    case TypeId.INT32:
      return reader.readInt32();
    case TypeId.VARINT32:
      return reader.readVarInt32();
    case TypeId.UINT8:
      return reader.readUint8();
    case TypeId.UINT16:
      return reader.readUint16();
    case TypeId.UINT32:
      return reader.readUint32();
    case TypeId.VAR_UINT32:
      return reader.readVarUint32();
    case TypeId.INT64:
      return int64Value(ctx, reader.readInt64());
    case TypeId.VARINT64:
      return int64Value(ctx, reader.readVarInt64());
    case TypeId.UINT64:
      return int64Value(ctx, reader.readUint64());
    case TypeId.VAR_UINT64:
      return int64Value(ctx, reader.readVarUint64());
    case TypeId.FLOAT32:
      return reader.readFloat32();
    case TypeId.FLOAT64:
      return reader.readFloat64();
    default:
      throw new InvalidDataError(`Unsupported primitive type ${typeIdName(typeId)}`, { offset: reader.position });
  }
}

function readEnum(ctx: ReadContext, descriptor: EnumDescriptor): unknown {
  const offset = ctx.reader.position;
  const ordinal = ctx.reader.readVarUint32();
  if (ordinal < descriptor.values.length) {
    return descriptor.values[ordinal];
  }
  if (descriptor.values.length === 0 || ctx.tolerant) {
    return ordinal;
  }
  throw new InvalidDataError(`Enum ordinal ${ordinal} out of range`, { typeName: displayName(descriptor), offset });
}

function readUnion(ctx: ReadContext, descriptor: UnionDescriptor): Union {
  const offset = ctx.reader.position;
  const caseId = ctx.reader.readVarUint32();
  let caseType = descriptor.cases.size === 0 ? ANY : descriptor.cases.get(caseId);
  if (caseType === undefined) {
    if (!ctx.tolerant) {
      throw new InvalidDataError(`Unknown union case ${caseId}`, { typeName: displayName(descriptor), offset });
    }
    caseType = ANY;
  }
  return new Union(caseId, readSlot(ctx, caseType, "ref", true));
}

/**
 * Reads a TypeMeta or the index of one read before in this pass.
 */
export function readSharedMeta(ctx: ReadContext): TypeMeta {
  const reader = ctx.reader;
  const offset = reader.position;
  const header = reader.readVarUint32();
  const index = header >>> 1;
  if ((header & 1) !== 0) {
    const meta = ctx.metas[index];
    if (meta === undefined) {
      throw new InvalidDataError(`Unknown TypeMeta index ${index}`, { offset });
    }
    return meta;
  }
  if (index !== ctx.metas.length) {
    throw new InvalidDataError(`Expected TypeMeta index ${ctx.metas.length}, got ${index}`, { offset });
  }
  const meta = TypeMeta.fromBytes(reader);
  ctx.metas.push(meta);
  return meta;
}

function readMetaString(ctx: ReadContext, codec: MetaStringCodec, encodings: readonly MetaStringEncoding[]): string {
  const reader = ctx.reader;
  const offset = reader.position;
  const header = reader.readVarUint32();
  const length = header >>> 1;
  if ((header & 1) !== 0) {
    const value = ctx.metaStrings[length - 1];
    if (value === undefined) {
      throw new InvalidDataError(`Unknown meta string index ${length - 1}`, { offset });
    }
    return value;
  }

  let value = "";
  if (length > 0) {
    const raw = length > SMALL_META_STRING ? Number(reader.readInt64() & 0xffn) : reader.readUint8();
    const encoding = encodings.find((candidate) => candidate === raw);
    if (encoding === undefined) {
      throw new InvalidDataError(`Meta string encoding ${raw} is not allowed here`, { offset });
    }
    value = codec.decode(reader.readBytes(length), encoding);
  }
  ctx.metaStrings.push(value);
  return value;
}
