import { fieldFlagMode, isMonomorphic, readSlot, skipValue, writeSlot } from "./codec";
import type { ReadContext, WriteContext } from "./context";
import { EncodeError, InvalidDataError, SchemaHashMismatchError } from "./errors";
import { int64ToNumber } from "./reader";
import type { RemoteStructPlan } from "./registry";
import {
  type FieldInfo,
  type StructDescriptor,
  type TypeDescriptor,
  UnknownStruct,
  displayName,
  typeKey,
} from "./typeInfo";
import { carriesTypeInfo } from "./typeMeta";
import {
  MaxInt32,
  MaxInt64,
  MaxUint32,
  MaxUint64,
  MinInt32,
  MinInt64,
  TypeId,
  isInt64TypeId,
  typeIdName,
} from "./types";

/**
 * Writes the fields of a struct value: the structural hash and the fields
 * in wire order in schema-consistent mode, or every field with its own flag
 * in compatible mode.
 */
export function writeStruct(ctx: WriteContext, value: unknown, descriptor: StructDescriptor): void {
  if (typeof value !== "object" || value === null) {
    throw new EncodeError(`Expected an object, got ${typeof value}`, { typeName: displayName(descriptor) });
  }
  const registry = ctx.registry;

  if (value instanceof UnknownStruct) {
    if (!ctx.config.compatible) {
      throw new EncodeError("Unknown structs can only be written in compatible mode", {
        typeName: displayName(value.descriptor),
      });
    }
    writeCompatibleFields(ctx, value.descriptor, (field) => value.values[field.name]);
    return;
  }

  const struct = registry.resolveStruct(descriptor);
  if (ctx.config.compatible) {
    writeCompatibleFields(ctx, struct, (field) => Reflect.get(value, field.name));
    return;
  }

  ctx.writer.writeInt32(registry.getStructHash(struct, ctx.config.refTracking));
  for (const field of registry.wireFields(struct)) {
    const fieldValue: unknown = Reflect.get(value, field.name);
    const mode = fieldFlagMode(ctx, field);
    if (mode === "none" && (fieldValue === null || fieldValue === undefined)) {
      throw new EncodeError("Missing value for non-nullable field", {
        typeName: displayName(struct),
        fieldName: field.name,
      });
    }
    writeSlot(ctx, fieldValue, field.fieldType, mode, !isMonomorphic(ctx, field.fieldType));
  }
}

function writeCompatibleFields(
  ctx: WriteContext,
  struct: StructDescriptor,
  get: (field: FieldInfo) => unknown
): void {
  for (const field of ctx.registry.wireFields(struct)) {
    const mode = ctx.config.refTracking && field.trackingRef ? "ref" : "null";
    writeSlot(ctx, get(field), field.fieldType, mode, carriesTypeInfo(field.fieldType.typeId));
  }
}

function instantiate(ctx: ReadContext, struct: StructDescriptor): object {
  if (struct.creator !== undefined) {
    return new struct.creator();
  }
  const target = {};
  ctx.registry.rememberDecoded(target, struct);
  return target;
}

/**
 * Reads a struct written in schema-consistent mode.
 */
export function readStruct(ctx: ReadContext, descriptor: StructDescriptor, refId?: number): object {
  const registry = ctx.registry;
  const struct = registry.resolveStruct(descriptor);
  const expected = registry.getStructHash(struct, ctx.config.refTracking);
  const actual = ctx.reader.readInt32();
  if (actual !== expected) {
    throw new SchemaHashMismatchError(displayName(struct), expected, actual);
  }

  const target = instantiate(ctx, struct);
  if (refId !== undefined) {
    ctx.refs.setReadObject(refId, target);
  }
  for (const field of registry.wireFields(struct)) {
    const value = readSlot(ctx, field.fieldType, fieldFlagMode(ctx, field), !isMonomorphic(ctx, field.fieldType));
    Reflect.set(target, field.name, value);
  }
  return target;
}

/**
 * The value a local field gets when the writer did not send it.
 */
function defaultValue(ctx: ReadContext, field: FieldInfo): unknown {
  if (field.nullable) {
    return null;
  }
  const type = field.fieldType;
  switch (type.kind) {
    case "primitive":
      if (type.typeId === TypeId.BOOL) {
        return false;
      }
      return ctx.config.useBigInt64 && isInt64TypeId(type.typeId) ? 0n : 0;
    case "string":
      return "";
    case "binary":
      return new Uint8Array(0);
    case "list":
      return [];
    case "set":
      return new Set();
    case "map":
      return new Map();
    case "enum":
      return type.values[0] ?? null;
    default:
      return null;
  }
}

function integerBounds(typeId: TypeId): readonly [bigint, bigint] | undefined {
  switch (typeId) {
    case TypeId.INT8:
      return [-128n, 127n];
    case TypeId.INT16:
      return [-32768n, 32767n];
    case TypeId.INT32:
    case TypeId.VARINT32:
      return [BigInt(MinInt32), BigInt(MaxInt32)];
    case TypeId.UINT8:
      return [0n, 0xffn];
    case TypeId.UINT16:
      return [0n, 0xffffn];
    case TypeId.UINT32:
    case TypeId.VAR_UINT32:
      return [0n, BigInt(MaxUint32)];
    case TypeId.INT64:
    case TypeId.VARINT64:
      return [MinInt64, MaxInt64];
    case TypeId.UINT64:
    case TypeId.VAR_UINT64:
      return [0n, MaxUint64];
    default:
      return undefined;
  }
}

function checkInteger(value: unknown, field: FieldInfo): void {
  const bounds = integerBounds(field.fieldType.typeId);
  if (bounds === undefined) {
    return;
  }
  let n: bigint | undefined;
  if (typeof value === "bigint") {
    n = value;
  } else if (typeof value === "number" && Number.isInteger(value)) {
    n = BigInt(value);
  }
  if (n === undefined || n < bounds[0] || n > bounds[1]) {
    throw new InvalidDataError(`Value ${String(value)} does not fit ${typeIdName(field.fieldType.typeId)}`, {
      fieldName: field.name,
    });
  }
}

/**
 * Converts a value read with the writer's field type to the local field
 * type. Returns undefined to leave the field at its default.
 */
function coerce(ctx: ReadContext, value: unknown, field: FieldInfo): unknown {
  if (value === null || value === undefined) {
    return field.nullable ? null : undefined;
  }
  const type = field.fieldType;
  switch (type.kind) {
    case "primitive":
      checkInteger(value, field);
      if (ctx.config.useBigInt64 && isInt64TypeId(type.typeId)) {
        return typeof value === "number" ? BigInt(value) : value;
      }
      return typeof value === "bigint" ? int64ToNumber(value, ctx.config.warnOnPrecisionLoss) : value;
    case "list":
      return value instanceof Set ? [...value] : value;
    case "set":
      return Array.isArray(value) ? new Set(value) : value;
    case "struct": {
      let actual: TypeDescriptor | undefined;
      if (value instanceof UnknownStruct) {
        actual = value.descriptor;
      } else if (typeof value === "object") {
        actual = ctx.registry.descriptorOf(value);
      }
      if (actual === undefined || typeKey(actual) !== typeKey(type)) {
        throw new InvalidDataError(`Value is not a ${displayName(type)}`, { fieldName: field.name });
      }
      return value;
    }
    default:
      return value;
  }
}

/**
 * Reads a struct written in compatible mode. Remote fields fill the local
 * fields they match; the rest are skipped. Without a local struct the
 * values are kept in an UnknownStruct.
 */
export function readCompatibleStruct(ctx: ReadContext, plan: RemoteStructPlan, refId?: number): object {
  if (plan.local === undefined) {
    const unknown = new UnknownStruct(plan.remoteDescriptor, plan.meta);
    if (refId !== undefined) {
      ctx.refs.setReadObject(refId, unknown);
    }
    ctx.unresolved++;
    try {
      for (const field of plan.fields) {
        const withTypeInfo = carriesTypeInfo(field.remoteType.typeId);
        unknown.values[field.remote.name] = readSlot(ctx, field.remote.fieldType, "ref", withTypeInfo);
      }
    } finally {
      ctx.unresolved--;
    }
    return unknown;
  }

  const local = ctx.registry.resolveStruct(plan.local);
  const target = instantiate(ctx, local);
  if (refId !== undefined) {
    ctx.refs.setReadObject(refId, target);
  }
  for (const field of plan.fields) {
    const withTypeInfo = carriesTypeInfo(field.remoteType.typeId);
    if (field.local === undefined) {
      skipValue(ctx, field.remote.fieldType, "ref", withTypeInfo);
      continue;
    }
    const value = coerce(ctx, readSlot(ctx, field.remote.fieldType, "ref", withTypeInfo), field.local);
    if (value !== undefined) {
      Reflect.set(target, field.local.name, value);
    }
  }
  for (const field of local.fields ?? []) {
    if (Reflect.get(target, field.name) === undefined) {
      Reflect.set(target, field.name, defaultValue(ctx, field));
    }
  }
  return target;
}
