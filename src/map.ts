import {
  type FlagMode,
  type ReadType,
  isMonomorphic,
  pickReadType,
  readSlot,
  readTypeInfo,
  readTyped,
  runtimeType,
  writeSlot,
  writeTypeInfo,
} from "./codec";
import type { ReadContext, WriteContext } from "./context";
import { EncodeError, InvalidDataError } from "./errors";
import { type MapDescriptor, type TypeDescriptor, displayName, typeKey } from "./typeInfo";
import { tracksRef } from "./typeMeta";
import { MAX_CHUNK_SIZE, MapFlags } from "./types";

const SIDE_MASK = 0b111;

function isNull(value: unknown): boolean {
  return value === null || value === undefined;
}

/**
 * How one side (keys or values) of a map is written.
 */
interface Side {
  readonly declared: TypeDescriptor;
  readonly decl: boolean;
  readonly trackRef: boolean;
}

function sideOf(ctx: WriteContext, declared: TypeDescriptor): Side {
  return {
    declared,
    decl: isMonomorphic(ctx, declared),
    trackRef: ctx.config.refTracking && tracksRef(declared),
  };
}

function sideFlags(side: Side): number {
  let flags = 0;
  if (side.trackRef) {
    flags |= MapFlags.TRACKING_REF;
  }
  if (side.decl) {
    flags |= MapFlags.DECL_TYPE;
  }
  return flags;
}

function nullEntrySideFlags(item: unknown, side: Side): number {
  const tracking = side.trackRef ? MapFlags.TRACKING_REF : 0;
  return tracking | (isNull(item) ? MapFlags.HAS_NULL : sideFlags(side));
}

function writeNullEntry(ctx: WriteContext, key: unknown, value: unknown, keys: Side, values: Side): void {
  const keyFlags = nullEntrySideFlags(key, keys);
  const valueFlags = nullEntrySideFlags(value, values);
  ctx.writer.writeUint8(keyFlags | (valueFlags << MapFlags.VALUE_SHIFT));
  if (!isNull(key)) {
    writeSlot(ctx, key, keys.declared, keys.trackRef ? "ref" : "none", !keys.decl);
  }
  if (!isNull(value)) {
    writeSlot(ctx, value, values.declared, values.trackRef ? "ref" : "none", !values.decl);
  }
}

/**
 * Writes a map as chunks of up to 255 entries whose keys share one type and
 * whose values share one type. An entry with a null key or value is a chunk
 * of its own and has no size byte.
 */
export function writeMap(ctx: WriteContext, value: unknown, descriptor: MapDescriptor): void {
  if (!(value instanceof Map)) {
    throw new EncodeError(`Expected a Map for ${displayName(descriptor)}`);
  }
  const writer = ctx.writer;
  writer.writeVarUint32(value.size);
  if (value.size === 0) {
    return;
  }

  const keys = sideOf(ctx, descriptor.key);
  const values = sideOf(ctx, descriptor.value);
  const header = sideFlags(keys) | (sideFlags(values) << MapFlags.VALUE_SHIFT);
  const entries = [...value.entries()];

  let i = 0;
  while (i < entries.length) {
    const [firstKey, firstValue] = entries[i];
    if (isNull(firstKey) || isNull(firstValue)) {
      writeNullEntry(ctx, firstKey, firstValue, keys, values);
      i++;
      continue;
    }

    const keyType = runtimeType(ctx, keys.declared, firstKey);
    const valueType = runtimeType(ctx, values.declared, firstValue);
    const keyTypeKey = typeKey(keyType);
    const valueTypeKey = typeKey(valueType);

    writer.writeUint8(header);
    const sizeOffset = writer.position;
    writer.writeUint8(0);
    if (!keys.decl) {
      writeTypeInfo(ctx, keyType);
    }
    if (!values.decl) {
      writeTypeInfo(ctx, valueType);
    }

    let size = 0;
    while (i < entries.length && size < MAX_CHUNK_SIZE) {
      const [key, item] = entries[i];
      if (isNull(key) || isNull(item)) {
        break;
      }
      if (!keys.decl && typeKey(runtimeType(ctx, keys.declared, key)) !== keyTypeKey) {
        break;
      }
      if (!values.decl && typeKey(runtimeType(ctx, values.declared, item)) !== valueTypeKey) {
        break;
      }
      writeSlot(ctx, key, keyType, keys.trackRef ? "ref" : "none", false);
      writeSlot(ctx, item, valueType, values.trackRef ? "ref" : "none", false);
      size++;
      i++;
    }
    writer.setUint8At(sizeOffset, size);
  }
}

function chunkMode(flags: number): FlagMode {
  return (flags & MapFlags.TRACKING_REF) !== 0 ? "ref" : "none";
}

function chunkType(ctx: ReadContext, declared: TypeDescriptor, flags: number, offset: number): ReadType {
  if ((flags & MapFlags.DECL_TYPE) === 0) {
    return pickReadType(readTypeInfo(ctx), declared);
  }
  if (declared.kind === "any") {
    throw new InvalidDataError("Map chunk declares a type the reader does not know", { offset });
  }
  return { descriptor: declared };
}

function readNullEntrySide(ctx: ReadContext, declared: TypeDescriptor, flags: number, offset: number): unknown {
  if ((flags & MapFlags.HAS_NULL) !== 0) {
    return null;
  }
  if ((flags & MapFlags.DECL_TYPE) !== 0 && declared.kind === "any") {
    throw new InvalidDataError("Map entry declares a type the reader does not know", { offset });
  }
  return readSlot(ctx, declared, chunkMode(flags), (flags & MapFlags.DECL_TYPE) === 0);
}

/**
 * Reads a map written by writeMap.
 */
export function readMap(ctx: ReadContext, descriptor: MapDescriptor, refId?: number): Map<unknown, unknown> {
  const reader = ctx.reader;
  const result = new Map<unknown, unknown>();
  if (refId !== undefined) {
    ctx.refs.setReadObject(refId, result);
  }

  let remaining = reader.readVarUint32();
  while (remaining > 0) {
    const offset = reader.position;
    const header = reader.readUint8();
    const keyFlags = header & SIDE_MASK;
    const valueFlags = (header >> MapFlags.VALUE_SHIFT) & SIDE_MASK;

    if (((keyFlags | valueFlags) & MapFlags.HAS_NULL) !== 0) {
      const key = readNullEntrySide(ctx, descriptor.key, keyFlags, offset);
      const value = readNullEntrySide(ctx, descriptor.value, valueFlags, offset);
      result.set(key, value);
      remaining--;
      continue;
    }

    const size = reader.readUint8();
    if (size === 0 || size > remaining) {
      throw new InvalidDataError(`Invalid map chunk size ${size} with ${remaining} entries left`, { offset });
    }
    const keyType = chunkType(ctx, descriptor.key, keyFlags, offset);
    const valueType = chunkType(ctx, descriptor.value, valueFlags, offset);
    for (let i = 0; i < size; i++) {
      const key = readTyped(ctx, keyType, chunkMode(keyFlags));
      const value = readTyped(ctx, valueType, chunkMode(valueFlags));
      result.set(key, value);
    }
    remaining -= size;
  }
  return result;
}
