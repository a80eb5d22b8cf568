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
import { type ListDescriptor, type SetDescriptor, type TypeDescriptor, displayName, typeKey } from "./typeInfo";
import { tracksRef } from "./typeMeta";
import { CollectionFlags } from "./types";

function isNull(value: unknown): boolean {
  return value === null || value === undefined;
}

/**
 * The one type every non-null element has, if there is one.
 */
function sharedType(ctx: WriteContext, element: TypeDescriptor, items: readonly unknown[]): TypeDescriptor | undefined {
  let shared: TypeDescriptor | undefined;
  let sharedKey: string | undefined;
  for (const item of items) {
    if (isNull(item)) {
      continue;
    }
    const type = runtimeType(ctx, element, item);
    const key = typeKey(type);
    if (sharedKey === undefined) {
      shared = type;
      sharedKey = key;
    } else if (key !== sharedKey) {
      return undefined;
    }
  }
  return shared;
}

/**
 * Writes a list or set. Either may be given as an array or a Set.
 *
 * Layout: varuint32 count, then (unless empty) a flag byte and either the
 * elements of one shared type, with that type's info at most once, or each
 * element with its own type info.
 */
export function writeList(ctx: WriteContext, value: unknown, descriptor: ListDescriptor | SetDescriptor): void {
  let items: readonly unknown[];
  if (Array.isArray(value)) {
    items = value;
  } else if (value instanceof Set) {
    items = [...value];
  } else {
    throw new EncodeError(`Expected an array or Set for ${displayName(descriptor)}`);
  }

  const writer = ctx.writer;
  writer.writeVarUint32(items.length);
  if (items.length === 0) {
    return;
  }

  const element = descriptor.element;
  const trackRef = ctx.config.refTracking && tracksRef(element);
  const hasNull = items.some(isNull);
  let flags = 0;
  if (trackRef) {
    flags |= CollectionFlags.TRACKING_REF;
  }
  if (hasNull) {
    flags |= CollectionFlags.HAS_NULL;
  }
  const mode: FlagMode = trackRef ? "ref" : hasNull ? "null" : "none";

  if (isMonomorphic(ctx, element)) {
    writer.writeUint8(flags | CollectionFlags.DECL_ELEMENT_TYPE | CollectionFlags.IS_SAME_TYPE);
    for (const item of items) {
      writeSlot(ctx, item, element, mode, false);
    }
    return;
  }

  const shared = sharedType(ctx, element, items);
  if (shared !== undefined) {
    writer.writeUint8(flags | CollectionFlags.IS_SAME_TYPE);
    writeTypeInfo(ctx, shared);
    for (const item of items) {
      writeSlot(ctx, item, shared, mode, false);
    }
    return;
  }

  writer.writeUint8(flags);
  for (const item of items) {
    writeSlot(ctx, item, element, mode, true);
  }
}

function readElements(ctx: ReadContext, element: TypeDescriptor, add: (item: unknown) => void): void {
  const reader = ctx.reader;
  const offset = reader.position;
  const length = reader.readVarUint32();
  if (length === 0) {
    return;
  }
  // every element takes at least one byte
  if (length > reader.remaining) {
    throw new InvalidDataError(`Collection length ${length} exceeds the ${reader.remaining} bytes left`, { offset });
  }

  const flags = reader.readUint8();
  const mode: FlagMode =
    (flags & (CollectionFlags.TRACKING_REF | CollectionFlags.HAS_NULL)) !== 0 ? "ref" : "none";

  if ((flags & CollectionFlags.IS_SAME_TYPE) === 0) {
    for (let i = 0; i < length; i++) {
      add(readSlot(ctx, element, mode, true));
    }
    return;
  }

  let type: ReadType;
  if ((flags & CollectionFlags.DECL_ELEMENT_TYPE) !== 0) {
    if (element.kind === "any") {
      throw new InvalidDataError("Collection declares an element type the reader does not know", { offset });
    }
    type = { descriptor: element };
  } else {
    type = pickReadType(readTypeInfo(ctx), element);
  }
  for (let i = 0; i < length; i++) {
    add(readTyped(ctx, type, mode));
  }
}

/**
 * Reads a list into an array.
 */
export function readList(ctx: ReadContext, descriptor: ListDescriptor, refId?: number): unknown[] {
  const result: unknown[] = [];
  if (refId !== undefined) {
    ctx.refs.setReadObject(refId, result);
  }
  readElements(ctx, descriptor.element, (item) => result.push(item));
  return result;
}

/**
 * Reads a set into a Set.
 */
export function readSet(ctx: ReadContext, descriptor: SetDescriptor, refId?: number): Set<unknown> {
  const result = new Set<unknown>();
  if (refId !== undefined) {
    ctx.refs.setReadObject(refId, result);
  }
  readElements(ctx, descriptor.element, (item) => result.add(item));
  return result;
}
