import { EncodeError, InvalidDataError } from "./errors";
import {
  FIELD_NAME_ENCODINGS,
  MetaStringCodec,
  MetaStringEncoding,
  NAMESPACE_ENCODINGS,
  TYPE_NAME_ENCODINGS,
  toSnakeCase,
} from "./metaString";
import { murmurHash3x64_128 } from "./murmurHash3";
import { Reader } from "./reader";
import { type FieldInfo, type StructDescriptor, type TypeDescriptor, displayName, isTrackableKind } from "./typeInfo";
import {
  TypeId,
  isCompressedTypeId,
  isEnumTypeId,
  isExtTypeId,
  isStructTypeId,
  isUnionTypeId,
  isUserDefinedTypeId,
  primitiveTypeSize,
} from "./types";
import { Writer } from "./writer";

const MASK64 = 0xffffffffffffffffn;
const META_SIZE_MASK = 0xff;
const HAS_FIELDS_META_FLAG = 1n << 8n;
const COMPRESSED_FLAG = 1n << 9n;
// the hash keeps its top 50 bits
const NUM_HASH_SHIFT = 14n;
const SMALL_NUM_FIELDS = 0b1_1111;
const REGISTER_BY_NAME_FLAG = 0b10_0000;
const FIELD_NAME_SIZE_THRESHOLD = 0b1111;
const BIG_NAME_THRESHOLD = 0b11_1111;
const TAG_ID_ENCODING = 3;
const HASH_SEED = 47;

const textEncoder = new TextEncoder();

/**
 * The type of a field as written in TypeMeta.
 */
export interface FieldTypeMeta {
  readonly typeId: number;
  readonly nullable: boolean;
  readonly trackingRef: boolean;
  /** Element type of LIST/SET, key and value types of MAP. */
  readonly generics: readonly FieldTypeMeta[];
}

/**
 * A field as written in TypeMeta. `name` is snake_case; tag-id fields
 * have no name of their own.
 */
export interface FieldMeta {
  readonly name: string;
  readonly tagId?: number;
  readonly fieldType: FieldTypeMeta;
}

interface TypeMetaInit {
  typeId: number;
  userTypeId?: number;
  namespace: string;
  typeName: string;
  registerByName: boolean;
  fields: readonly FieldMeta[];
}

/**
 * Maps a type id to the one used inside field types.
 */
function fieldTypeId(typeId: number): number {
  if (isEnumTypeId(typeId)) {
    return TypeId.ENUM;
  }
  if (isUnionTypeId(typeId)) {
    return TypeId.UNION;
  }
  return typeId;
}

/**
 * Whether a descriptor tracks references when the config allows it.
 */
export function tracksRef(descriptor: TypeDescriptor): boolean {
  return descriptor.trackingRef ?? isTrackableKind(descriptor.kind);
}

function nestedTypeMeta(descriptor: TypeDescriptor, trackRef: boolean): FieldTypeMeta {
  return {
    typeId: fieldTypeId(descriptor.typeId),
    nullable: descriptor.nullable,
    trackingRef: trackRef && tracksRef(descriptor),
    generics: genericsOf(descriptor, trackRef),
  };
}

function genericsOf(descriptor: TypeDescriptor, trackRef: boolean): FieldTypeMeta[] {
  switch (descriptor.kind) {
    case "list":
    case "set":
      return [nestedTypeMeta(descriptor.element, trackRef)];
    case "map":
      return [nestedTypeMeta(descriptor.key, trackRef), nestedTypeMeta(descriptor.value, trackRef)];
    default:
      return [];
  }
}

/**
 * The identifier used for hashing and matching: the tag id if the field has
 * one, else its snake_case name.
 */
export function fieldIdentifier(field: { name: string; tagId?: number }): string {
  return field.tagId !== undefined ? String(field.tagId) : toSnakeCase(field.name);
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

enum FieldGroup {
  Primitive,
  NullablePrimitive,
  BuiltIn,
  List,
  Set,
  Map,
  Other,
}

function groupOf(field: FieldInfo): FieldGroup {
  const type = field.fieldType;
  switch (type.kind) {
    case "primitive":
      return field.nullable ? FieldGroup.NullablePrimitive : FieldGroup.Primitive;
    case "string":
    case "binary":
      return FieldGroup.BuiltIn;
    case "list":
      return FieldGroup.List;
    case "set":
      return FieldGroup.Set;
    case "map":
      return FieldGroup.Map;
    default:
      return FieldGroup.Other;
  }
}

function comparePrimitives(a: FieldInfo, b: FieldInfo): number {
  const ta = a.fieldType.typeId;
  const tb = b.fieldType.typeId;
  const ca = isCompressedTypeId(ta) ? 1 : 0;
  const cb = isCompressedTypeId(tb) ? 1 : 0;
  if (ca !== cb) {
    return ca - cb;
  }
  const sizeDiff = primitiveTypeSize(tb) - primitiveTypeSize(ta);
  if (sizeDiff !== 0) {
    return sizeDiff;
  }
  if (ta !== tb) {
    return tb - ta;
  }
  return compareStrings(fieldIdentifier(a), fieldIdentifier(b));
}

function compareByTypeIdThenName(a: FieldInfo, b: FieldInfo): number {
  const diff = a.fieldType.typeId - b.fieldType.typeId;
  return diff !== 0 ? diff : compareStrings(fieldIdentifier(a), fieldIdentifier(b));
}

/**
 * Sorts fields into wire order: non-nullable primitives, nullable
 * primitives, other built-ins, lists, sets, maps, then user and `any` types.
 */
export function groupFieldsByType(fields: readonly FieldInfo[]): FieldInfo[] {
  const groups: FieldInfo[][] = [[], [], [], [], [], [], []];
  for (const field of fields) {
    groups[groupOf(field)].push(field);
  }
  groups[FieldGroup.Primitive].sort(comparePrimitives);
  groups[FieldGroup.NullablePrimitive].sort(comparePrimitives);
  for (const group of [FieldGroup.BuiltIn, FieldGroup.List, FieldGroup.Set, FieldGroup.Map]) {
    groups[group].sort(compareByTypeIdThenName);
  }
  groups[FieldGroup.Other].sort((a, b) => compareStrings(fieldIdentifier(a), fieldIdentifier(b)));
  return groups.flat();
}

function hashTypeId(typeId: number): number {
  if (isUserDefinedTypeId(typeId)) {
    return 0;
  }
  switch (typeId) {
    case TypeId.INT32:
      return TypeId.VARINT32;
    case TypeId.INT64:
      return TypeId.VARINT64;
    case TypeId.UINT32:
      return TypeId.VAR_UINT32;
    case TypeId.UINT64:
      return TypeId.VAR_UINT64;
    default:
      return typeId;
  }
}

/**
 * Computes the 32-bit structural hash checked in schema-consistent mode.
 *
 * Each field contributes `"<id>,<typeId>,<ref>,<nullable>;"`. Integer
 * widths and user type identities are normalized away.
 */
export function computeStructHash(fields: readonly FieldInfo[], trackRef: boolean): number {
  if (fields.length === 0) {
    return HASH_SEED;
  }
  const entries = fields.map((field) => {
    const id = fieldIdentifier(field);
    const ref = trackRef && field.trackingRef ? 1 : 0;
    return {
      tagged: field.tagId !== undefined,
      id,
      text: `${id},${hashTypeId(field.fieldType.typeId)},${ref},${field.nullable ? 1 : 0};`,
    };
  });
  entries.sort((a, b) => {
    if (a.tagged !== b.tagged) {
      return a.tagged ? -1 : 1;
    }
    return compareStrings(a.id, b.id);
  });
  const bytes = textEncoder.encode(entries.map((e) => e.text).join(""));
  const { h1 } = murmurHash3x64_128(bytes, HASH_SEED);
  return Number(BigInt.asIntN(32, h1));
}

function writeName(
  writer: Writer,
  codec: MetaStringCodec,
  value: string,
  encodings: readonly MetaStringEncoding[]
): void {
  const encoded = codec.encode(value, encodings);
  const index = encodings.indexOf(encoded.encoding);
  const size = encoded.bytes.length;
  if (size >= BIG_NAME_THRESHOLD) {
    writer.writeUint8((BIG_NAME_THRESHOLD << 2) | index);
    writer.writeVarUint32(size - BIG_NAME_THRESHOLD);
  } else {
    writer.writeUint8((size << 2) | index);
  }
  writer.writeBytes(encoded.bytes);
}

function readName(reader: Reader, codec: MetaStringCodec, encodings: readonly MetaStringEncoding[]): string {
  const header = reader.readUint8();
  const index = header & 0b11;
  if (index >= encodings.length) {
    throw new InvalidDataError(`Invalid meta string encoding index ${index}`);
  }
  let size = header >> 2;
  if (size >= BIG_NAME_THRESHOLD) {
    size = BIG_NAME_THRESHOLD + reader.readVarUint32();
  }
  return codec.decode(reader.readBytes(size), encodings[index]);
}

function writeNestedType(writer: Writer, type: FieldTypeMeta): void {
  writer.writeVarUint32((type.typeId << 2) | (type.nullable ? 0b10 : 0) | (type.trackingRef ? 0b1 : 0));
  for (const generic of type.generics) {
    writeNestedType(writer, generic);
  }
}

function genericsCount(typeId: number): number {
  switch (typeId) {
    case TypeId.LIST:
    case TypeId.SET:
      return 1;
    case TypeId.MAP:
      return 2;
    default:
      return 0;
  }
}

function readGenerics(reader: Reader, typeId: number): FieldTypeMeta[] {
  const generics: FieldTypeMeta[] = [];
  for (let i = 0; i < genericsCount(typeId); i++) {
    const header = reader.readVarUint32();
    const nestedId = header >>> 2;
    generics.push({
      typeId: nestedId,
      nullable: (header & 0b10) !== 0,
      trackingRef: (header & 0b1) !== 0,
      generics: readGenerics(reader, nestedId),
    });
  }
  return generics;
}

function writeField(writer: Writer, field: FieldMeta): void {
  let header = 0;
  if (field.fieldType.trackingRef) {
    header |= 0b1;
  }
  if (field.fieldType.nullable) {
    header |= 0b10;
  }

  let size: number;
  let nameBytes: Uint8Array | undefined;
  if (field.tagId !== undefined) {
    header |= TAG_ID_ENCODING << 6;
    size = field.tagId;
  } else {
    const encoded = MetaStringCodec.fieldName.encode(field.name, FIELD_NAME_ENCODINGS);
    header |= FIELD_NAME_ENCODINGS.indexOf(encoded.encoding) << 6;
    nameBytes = encoded.bytes;
    size = nameBytes.length - 1;
  }

  if (size >= FIELD_NAME_SIZE_THRESHOLD) {
    writer.writeUint8(header | (FIELD_NAME_SIZE_THRESHOLD << 2));
    writer.writeVarUint32(size - FIELD_NAME_SIZE_THRESHOLD);
  } else {
    writer.writeUint8(header | (size << 2));
  }

  writer.writeUint8(field.fieldType.typeId);
  for (const generic of field.fieldType.generics) {
    writeNestedType(writer, generic);
  }
  if (nameBytes) {
    writer.writeBytes(nameBytes);
  }
}

function readField(reader: Reader): FieldMeta {
  const header = reader.readUint8();
  const encodingFlags = (header >> 6) & 0b11;
  let size = (header >> 2) & 0b1111;
  if (size === FIELD_NAME_SIZE_THRESHOLD) {
    size += reader.readVarUint32();
  }
  const typeId = reader.readUint8();
  const fieldType: FieldTypeMeta = {
    typeId,
    nullable: (header & 0b10) !== 0,
    trackingRef: (header & 0b1) !== 0,
    generics: readGenerics(reader, typeId),
  };

  if (encodingFlags === TAG_ID_ENCODING) {
    return { name: `$tag${size}`, tagId: size, fieldType };
  }
  const name = MetaStringCodec.fieldName.decode(reader.readBytes(size + 1), FIELD_NAME_ENCODINGS[encodingFlags]);
  return { name, fieldType };
}

/**
 * The hash bits of a TypeMeta header: the body hash shifted left, as the
 * absolute value of a signed 64-bit integer.
 */
function headerHash(body: Uint8Array): bigint {
  const { h1 } = murmurHash3x64_128(body, HASH_SEED);
  const signed = BigInt.asIntN(64, (h1 << NUM_HASH_SHIFT) & MASK64);
  return BigInt.asUintN(64, signed < 0n ? -signed : signed);
}

/**
 * Field metadata of one struct type, as written in compatible mode.
 */
export class TypeMeta {
  readonly typeId: number;
  readonly userTypeId?: number;
  readonly namespace: string;
  readonly typeName: string;
  readonly registerByName: boolean;
  readonly fields: readonly FieldMeta[];
  readonly hasFieldsMeta = true;

  private encoded?: Uint8Array;
  private header?: bigint;

  constructor(init: TypeMetaInit) {
    this.typeId = init.typeId;
    this.userTypeId = init.userTypeId;
    this.namespace = init.namespace;
    this.typeName = init.typeName;
    this.registerByName = init.registerByName;
    this.fields = init.fields;
  }

  /**
   * Builds the metadata of a struct, with fields in wire order. Ref bits
   * are only set when `trackRef` is.
   */
  static fromStruct(descriptor: StructDescriptor, typeId: number, trackRef: boolean): TypeMeta {
    const fields = groupFieldsByType(descriptor.fields ?? []).map(
      (field): FieldMeta => ({
        name: toSnakeCase(field.name),
        tagId: field.tagId,
        fieldType: {
          typeId: fieldTypeId(field.fieldType.typeId),
          nullable: field.nullable,
          trackingRef: trackRef && field.trackingRef,
          generics: genericsOf(field.fieldType, trackRef),
        },
      })
    );
    const registerByName = descriptor.typeName !== undefined;
    if (!registerByName && descriptor.userTypeId === undefined) {
      throw new EncodeError("Struct has neither a type id nor a type name", {
        typeName: displayName(descriptor),
      });
    }
    return new TypeMeta({
      typeId,
      userTypeId: registerByName ? undefined : descriptor.userTypeId,
      namespace: descriptor.namespace ?? "",
      typeName: descriptor.typeName ?? "",
      registerByName,
      fields,
    });
  }

  /**
   * The 64-bit header: size, flags and body hash.
   */
  get headerValue(): bigint {
    if (this.header === undefined) {
      this.toBytes();
    }
    return this.header ?? 0n;
  }

  /**
   * Encodes header and body. The result is cached.
   */
  toBytes(): Uint8Array {
    if (this.encoded) {
      return this.encoded;
    }
    const body = this.encodeBody();
    let header = headerHash(body);
    if (this.hasFieldsMeta) {
      header |= HAS_FIELDS_META_FLAG;
    }
    header |= BigInt(Math.min(body.length, META_SIZE_MASK));

    const writer = new Writer(body.length + 16);
    writer.writeUint64(header);
    if (body.length >= META_SIZE_MASK) {
      writer.writeVarUint32(body.length - META_SIZE_MASK);
    }
    writer.writeBytes(body);
    this.header = header;
    this.encoded = writer.bytes().slice();
    return this.encoded;
  }

  /**
   * Decodes a TypeMeta written by toBytes.
   */
  static fromBytes(reader: Reader): TypeMeta {
    const offset = reader.position;
    const header = reader.readUint64();
    if ((header & COMPRESSED_FLAG) !== 0n) {
      throw new InvalidDataError("Compressed TypeMeta is not supported", { offset });
    }
    let size = Number(header & BigInt(META_SIZE_MASK));
    const extended = size === META_SIZE_MASK ? reader.readVarUint32() : undefined;
    if (extended !== undefined) {
      size += extended;
    }
    const body = reader.readBytes(size);

    const bodyReader = new Reader(body);
    const classHeader = bodyReader.readUint8();
    let numFields = classHeader & SMALL_NUM_FIELDS;
    if (numFields === SMALL_NUM_FIELDS) {
      numFields += bodyReader.readVarUint32();
    }
    const registerByName = (classHeader & REGISTER_BY_NAME_FLAG) !== 0;

    let typeId: number = TypeId.NAMED_COMPATIBLE_STRUCT;
    let userTypeId: number | undefined;
    let namespace = "";
    let typeName = "";
    if (registerByName) {
      namespace = readName(bodyReader, MetaStringCodec.namespace, NAMESPACE_ENCODINGS);
      typeName = readName(bodyReader, MetaStringCodec.typeName, TYPE_NAME_ENCODINGS);
    } else {
      typeId = bodyReader.readUint8();
      userTypeId = bodyReader.readVarUint32();
    }

    const fields: FieldMeta[] = [];
    for (let i = 0; i < numFields; i++) {
      fields.push(readField(bodyReader));
    }
    if (bodyReader.hasMore) {
      throw new InvalidDataError(`Unexpected ${bodyReader.remaining} trailing bytes in TypeMeta body`, { offset });
    }

    const meta = new TypeMeta({ typeId, userTypeId, namespace, typeName, registerByName, fields });
    const copy = new Writer(size + 16);
    copy.writeUint64(header);
    if (extended !== undefined) {
      copy.writeVarUint32(extended);
    }
    copy.writeBytes(body);
    meta.header = header;
    meta.encoded = copy.bytes().slice();
    return meta;
  }

  /**
   * Readable type name for error messages.
   */
  get displayName(): string {
    if (this.registerByName) {
      return this.namespace ? `${this.namespace}.${this.typeName}` : this.typeName;
    }
    return `struct#${this.userTypeId ?? "?"}`;
  }

  private encodeBody(): Uint8Array {
    const writer = new Writer(128);
    let classHeader = Math.min(this.fields.length, SMALL_NUM_FIELDS);
    if (this.registerByName) {
      classHeader |= REGISTER_BY_NAME_FLAG;
    }
    writer.writeUint8(classHeader);
    if (this.fields.length >= SMALL_NUM_FIELDS) {
      writer.writeVarUint32(this.fields.length - SMALL_NUM_FIELDS);
    }

    if (this.registerByName) {
      writeName(writer, MetaStringCodec.namespace, this.namespace, NAMESPACE_ENCODINGS);
      writeName(writer, MetaStringCodec.typeName, this.typeName, TYPE_NAME_ENCODINGS);
    } else {
      writer.writeUint8(this.typeId);
      writer.writeVarUint32(this.userTypeId ?? 0);
    }

    for (const field of this.fields) {
      writeField(writer, field);
    }
    return writer.bytes().slice();
  }
}

/**
 * Whether values of a field type are written with their own type info in
 * compatible mode. Enum and union payloads are read without it.
 */
export function carriesTypeInfo(typeId: number): boolean {
  return typeId === TypeId.UNKNOWN || isStructTypeId(typeId) || isExtTypeId(typeId);
}
