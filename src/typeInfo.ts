import type { Reader } from "./reader";
import type { TypeMeta } from "./typeMeta";
import { TypeId, typeIdName } from "./types";
import type { Writer } from "./writer";

/**
 * A value an enum descriptor can hold.
 */
export type EnumValue = string | number;

/**
 * User codec for an extension type.
 */
export interface ExtSerializer<T = unknown> {
  write(writer: Writer, value: T): void;
  read(reader: Reader): T;
}

/**
 * Class instantiated when a struct is decoded. Its constructor must take no
 * arguments; the initial field values it sets act as defaults.
 */
export type StructCreator = new () => object;

/**
 * How a user type is registered: a numeric id, or a namespace and name.
 */
export type TypeIdentity = number | { namespace?: string; typeName: string };

interface BaseDescriptor {
  readonly typeId: TypeId;
  readonly nullable: boolean;
  readonly trackingRef?: boolean;
  readonly tagId?: number;
}

interface UserTypeDescriptor extends BaseDescriptor {
  readonly userTypeId?: number;
  readonly namespace?: string;
  readonly typeName?: string;
}

export interface PrimitiveDescriptor extends BaseDescriptor {
  readonly kind: "primitive";
}

export interface StringDescriptor extends BaseDescriptor {
  readonly kind: "string";
}

export interface BinaryDescriptor extends BaseDescriptor {
  readonly kind: "binary";
}

export interface ListDescriptor extends BaseDescriptor {
  readonly kind: "list";
  readonly element: TypeDescriptor;
}

export interface SetDescriptor extends BaseDescriptor {
  readonly kind: "set";
  readonly element: TypeDescriptor;
}

export interface MapDescriptor extends BaseDescriptor {
  readonly kind: "map";
  readonly key: TypeDescriptor;
  readonly value: TypeDescriptor;
}

/**
 * A struct. Without `fields` the descriptor only names a struct that is
 * registered elsewhere, which is how recursive structs refer to themselves.
 */
export interface StructDescriptor extends UserTypeDescriptor {
  readonly kind: "struct";
  readonly fields?: readonly FieldInfo[];
  readonly creator?: StructCreator;
}

export interface EnumDescriptor extends UserTypeDescriptor {
  readonly kind: "enum";
  readonly values: readonly EnumValue[];
}

export interface UnionDescriptor extends UserTypeDescriptor {
  readonly kind: "union";
  readonly cases: ReadonlyMap<number, TypeDescriptor>;
}

export interface ExtDescriptor extends UserTypeDescriptor {
  readonly kind: "ext";
  readonly serializer?: ExtSerializer;
}

export interface AnyDescriptor extends BaseDescriptor {
  readonly kind: "any";
}

/**
 * The shape of a value on the wire.
 */
export type TypeDescriptor =
  | PrimitiveDescriptor
  | StringDescriptor
  | BinaryDescriptor
  | ListDescriptor
  | SetDescriptor
  | MapDescriptor
  | StructDescriptor
  | EnumDescriptor
  | UnionDescriptor
  | ExtDescriptor
  | AnyDescriptor;

export type UserDescriptor = StructDescriptor | EnumDescriptor | UnionDescriptor | ExtDescriptor;

/**
 * One struct field.
 */
export interface FieldInfo {
  readonly name: string;
  readonly fieldType: TypeDescriptor;
  readonly nullable: boolean;
  readonly trackingRef: boolean;
  readonly tagId?: number;
}

/**
 * A value of a tagged union: the case id and the value of that case.
 */
export class Union<T = unknown> {
  constructor(
    readonly caseId: number,
    readonly value: T
  ) {}
}

/**
 * A struct read in compatible mode whose type is not registered locally.
 * Its values are keyed by the field names of the writer's metadata, and it
 * is written back with that same metadata.
 */
export class UnknownStruct {
  constructor(
    readonly descriptor: StructDescriptor,
    readonly meta: TypeMeta,
    readonly values: Record<string, unknown> = {}
  ) {}
}

export function isUserDescriptor(descriptor: TypeDescriptor): descriptor is UserDescriptor {
  switch (descriptor.kind) {
    case "struct":
    case "enum":
    case "union":
    case "ext":
      return true;
    default:
      return false;
  }
}

/**
 * Kinds whose values have an identity worth tracking.
 */
export function isTrackableKind(kind: TypeDescriptor["kind"]): boolean {
  switch (kind) {
    case "struct":
    case "list":
    case "set":
    case "map":
    case "ext":
    case "union":
    case "any":
    case "binary":
      return true;
    default:
      return false;
  }
}

/**
 * A key that is equal for two descriptors exactly when values of the two
 * share one wire type.
 */
export function typeKey(descriptor: TypeDescriptor): string {
  if (isUserDescriptor(descriptor)) {
    if (descriptor.userTypeId !== undefined) {
      return `${descriptor.kind}#${descriptor.userTypeId}`;
    }
    if (descriptor.typeName !== undefined) {
      return `${descriptor.kind}:${descriptor.namespace ?? ""}.${descriptor.typeName}`;
    }
  }
  return String(descriptor.typeId);
}

/**
 * A readable name for error messages.
 */
export function displayName(descriptor: TypeDescriptor): string {
  if (isUserDescriptor(descriptor)) {
    if (descriptor.typeName !== undefined) {
      return descriptor.namespace ? `${descriptor.namespace}.${descriptor.typeName}` : descriptor.typeName;
    }
    if (descriptor.userTypeId !== undefined) {
      return `${descriptor.kind}#${descriptor.userTypeId}`;
    }
  }
  return typeIdName(descriptor.typeId);
}

/**
 * Builds the field list of a struct from its props in declaration order.
 */
export function fieldsOf(props: Readonly<Record<string, TypeDescriptor>>): FieldInfo[] {
  return Object.entries(props).map(([name, fieldType]) =>
    Object.freeze({
      name,
      fieldType,
      nullable: fieldType.nullable,
      trackingRef: fieldType.trackingRef ?? isTrackableKind(fieldType.kind),
      tagId: fieldType.tagId,
    })
  );
}

function identityProps(identity: TypeIdentity | undefined): {
  userTypeId?: number;
  namespace?: string;
  typeName?: string;
} {
  if (identity === undefined) {
    return {};
  }
  if (typeof identity === "number") {
    return { userTypeId: identity };
  }
  return { namespace: identity.namespace ?? "", typeName: identity.typeName };
}

function isNamed(identity: TypeIdentity | undefined): boolean {
  return identity !== undefined && typeof identity !== "number";
}

function frozenCopy<T extends TypeDescriptor>(descriptor: T, patch: Partial<BaseDescriptor>): T {
  const copy = { ...descriptor, ...patch };
  Object.freeze(copy);
  return copy;
}

export function primitive(typeId: TypeId): PrimitiveDescriptor {
  return Object.freeze({ kind: "primitive", typeId, nullable: false });
}

function isValueList(
  values: readonly EnumValue[] | Readonly<Record<string, EnumValue>>
): values is readonly EnumValue[] {
  return Array.isArray(values);
}

function enumValues(values: readonly EnumValue[] | Readonly<Record<string, EnumValue>>): EnumValue[] {
  if (isValueList(values)) {
    return [...values];
  }
  // numeric TypeScript enums also map each value back to its name
  return Object.entries(values)
    .filter(([key]) => Number.isNaN(Number(key)))
    .map(([, value]) => value);
}

/**
 * Descriptor builders.
 */
export const Type = {
  bool: (): PrimitiveDescriptor => primitive(TypeId.BOOL),
  int8: (): PrimitiveDescriptor => primitive(TypeId.INT8),
  int16: (): PrimitiveDescriptor => primitive(TypeId.INT16),
  /** Zigzag varint. */
  int32: (): PrimitiveDescriptor => primitive(TypeId.VARINT32),
  /** Zigzag varint. */
  int64: (): PrimitiveDescriptor => primitive(TypeId.VARINT64),
  fixedInt32: (): PrimitiveDescriptor => primitive(TypeId.INT32),
  fixedInt64: (): PrimitiveDescriptor => primitive(TypeId.INT64),
  uint8: (): PrimitiveDescriptor => primitive(TypeId.UINT8),
  uint16: (): PrimitiveDescriptor => primitive(TypeId.UINT16),
  uint32: (): PrimitiveDescriptor => primitive(TypeId.UINT32),
  uint64: (): PrimitiveDescriptor => primitive(TypeId.UINT64),
  varUint32: (): PrimitiveDescriptor => primitive(TypeId.VAR_UINT32),
  varUint64: (): PrimitiveDescriptor => primitive(TypeId.VAR_UINT64),
  float32: (): PrimitiveDescriptor => primitive(TypeId.FLOAT32),
  float64: (): PrimitiveDescriptor => primitive(TypeId.FLOAT64),

  string: (): StringDescriptor => Object.freeze({ kind: "string", typeId: TypeId.STRING, nullable: false }),
  binary: (): BinaryDescriptor => Object.freeze({ kind: "binary", typeId: TypeId.BINARY, nullable: false }),
  any: (): AnyDescriptor => Object.freeze({ kind: "any", typeId: TypeId.UNKNOWN, nullable: true }),

  list: (element: TypeDescriptor): ListDescriptor =>
    Object.freeze({ kind: "list", typeId: TypeId.LIST, nullable: false, element }),
  set: (element: TypeDescriptor): SetDescriptor =>
    Object.freeze({ kind: "set", typeId: TypeId.SET, nullable: false, element }),
  map: (key: TypeDescriptor, value: TypeDescriptor): MapDescriptor =>
    Object.freeze({ kind: "map", typeId: TypeId.MAP, nullable: false, key, value }),

  /**
   * A struct. Leave out `props` to refer to a struct registered under the
   * same identity.
   */
  struct(
    identity?: TypeIdentity,
    props?: Readonly<Record<string, TypeDescriptor>>,
    creator?: StructCreator
  ): StructDescriptor {
    return Object.freeze({
      kind: "struct",
      typeId: isNamed(identity) ? TypeId.NAMED_STRUCT : TypeId.STRUCT,
      nullable: false,
      ...identityProps(identity),
      fields: props === undefined ? undefined : Object.freeze(fieldsOf(props)),
      creator,
    });
  },

  enum(
    identity: TypeIdentity | undefined,
    values: readonly EnumValue[] | Readonly<Record<string, EnumValue>>
  ): EnumDescriptor {
    return Object.freeze({
      kind: "enum",
      typeId: isNamed(identity) ? TypeId.NAMED_ENUM : TypeId.ENUM,
      nullable: false,
      ...identityProps(identity),
      values: Object.freeze(enumValues(values)),
    });
  },

  /**
   * A tagged union. Without an identity its values are written as an
   * anonymous UNION.
   */
  union(identity: TypeIdentity | undefined, cases: Readonly<Record<number, TypeDescriptor>>): UnionDescriptor {
    const typeId =
      identity === undefined ? TypeId.UNION : isNamed(identity) ? TypeId.NAMED_UNION : TypeId.TYPED_UNION;
    return Object.freeze({
      kind: "union",
      typeId,
      nullable: false,
      ...identityProps(identity),
      cases: new Map(
        Object.entries(cases).map(([caseId, descriptor]): [number, TypeDescriptor] => [Number(caseId), descriptor])
      ),
    });
  },

  ext(identity?: TypeIdentity, serializer?: ExtSerializer): ExtDescriptor {
    return Object.freeze({
      kind: "ext",
      typeId: isNamed(identity) ? TypeId.NAMED_EXT : TypeId.EXT,
      nullable: false,
      ...identityProps(identity),
      serializer,
    });
  },

  /** Returns a copy that may hold null. */
  nullable<T extends TypeDescriptor>(descriptor: T): T {
    return frozenCopy(descriptor, { nullable: true });
  },

  /** Returns a copy with reference tracking switched on or off. */
  trackingRef<T extends TypeDescriptor>(descriptor: T, enabled: boolean = true): T {
    return frozenCopy(descriptor, { trackingRef: enabled });
  },

  /** Returns a copy identified by a numeric tag instead of its field name. */
  tag<T extends TypeDescriptor>(descriptor: T, tagId: number): T {
    return frozenCopy(descriptor, { tagId });
  },
};

/**
 * An enum whose values the reader does not know. Its values are bare
 * ordinals.
 */
export const ORDINAL_ENUM: EnumDescriptor = Type.enum(undefined, []);
