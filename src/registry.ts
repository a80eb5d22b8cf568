import type { ForyConfig } from "./config";
import { DuplicateRegistrationError, ForyError, InvalidDataError, UnknownTypeError } from "./errors";
import {
  type ExtDescriptor,
  type ExtSerializer,
  type FieldInfo,
  type StructDescriptor,
  type TypeDescriptor,
  type UserDescriptor,
  ORDINAL_ENUM,
  Type,
  Union,
  UnknownStruct,
  displayName,
  primitive,
  typeKey,
} from "./typeInfo";
import {
  type FieldTypeMeta,
  TypeMeta,
  carriesTypeInfo,
  computeStructHash,
  fieldIdentifier,
  groupFieldsByType,
} from "./typeMeta";
import {
  MaxInt32,
  MinInt32,
  TypeId,
  isEnumTypeId,
  isExtTypeId,
  isNumericTypeId,
  isStructTypeId,
  isSupportedPrimitiveTypeId,
  isUnionTypeId,
  typeIdName,
} from "./types";

/**
 * A class whose instances are written as a registered type.
 */
export type Constructor = abstract new (...args: never[]) => object;

/**
 * One field of a struct as the writer declared it.
 */
export interface RemoteField {
  /** Decides how the field's bytes are read. */
  readonly remote: FieldInfo;
  readonly remoteType: FieldTypeMeta;
  /** The local field it fills, if any. */
  readonly local?: FieldInfo;
}

/**
 * How to read a struct written with a given TypeMeta.
 */
export interface RemoteStructPlan {
  readonly meta: TypeMeta;
  /** The registered struct, when there is one. */
  readonly local?: StructDescriptor;
  /** Carried by UnknownStruct values read with this meta. */
  readonly remoteDescriptor: StructDescriptor;
  readonly fields: readonly RemoteField[];
}

const BOOL = Type.bool();
const INT32 = Type.int32();
const INT64 = Type.int64();
const FLOAT64 = Type.float64();
const STRING = Type.string();
const BINARY = Type.binary();
const ANY = Type.any();
const DYNAMIC_LIST = Type.list(ANY);
const DYNAMIC_SET = Type.set(ANY);
const DYNAMIC_MAP = Type.map(ANY, ANY);
const DYNAMIC_UNION = Type.union(undefined, {});

function kindOfWireTypeId(typeId: number): UserDescriptor["kind"] | undefined {
  if (isStructTypeId(typeId)) {
    return "struct";
  }
  if (isEnumTypeId(typeId)) {
    return "enum";
  }
  if (isExtTypeId(typeId)) {
    return "ext";
  }
  if (isUnionTypeId(typeId)) {
    return "union";
  }
  return undefined;
}

function idTypeId(kind: UserDescriptor["kind"]): TypeId {
  switch (kind) {
    case "struct":
      return TypeId.STRUCT;
    case "enum":
      return TypeId.ENUM;
    case "ext":
      return TypeId.EXT;
    case "union":
      return TypeId.TYPED_UNION;
  }
}

function nameTypeId(kind: UserDescriptor["kind"]): TypeId {
  switch (kind) {
    case "struct":
      return TypeId.NAMED_STRUCT;
    case "enum":
      return TypeId.NAMED_ENUM;
    case "ext":
      return TypeId.NAMED_EXT;
    case "union":
      return TypeId.NAMED_UNION;
  }
}

function elementOf(local: TypeDescriptor | undefined): TypeDescriptor | undefined {
  return local?.kind === "list" || local?.kind === "set" ? local.element : undefined;
}

/**
 * Builds the descriptor a field type written in TypeMeta is read with.
 * Structs, ext types and `any` carry their own type info, so they read as
 * `any`. Enums and unions are read as the local field's type where it has
 * one, else as ordinals and dynamic unions.
 */
export function remoteDescriptorOf(type: FieldTypeMeta, local?: TypeDescriptor): TypeDescriptor {
  const id = type.typeId;
  let descriptor: TypeDescriptor;
  if (carriesTypeInfo(id)) {
    descriptor = ANY;
  } else if (isSupportedPrimitiveTypeId(id)) {
    descriptor = primitive(id);
  } else if (isEnumTypeId(id)) {
    descriptor = local?.kind === "enum" ? local : ORDINAL_ENUM;
  } else if (isUnionTypeId(id)) {
    descriptor = local?.kind === "union" ? local : DYNAMIC_UNION;
  } else {
    const [first, second] = type.generics;
    switch (id) {
      case TypeId.STRING:
        descriptor = STRING;
        break;
      case TypeId.BINARY:
        descriptor = BINARY;
        break;
      case TypeId.LIST:
        descriptor = Type.list(first ? remoteDescriptorOf(first, elementOf(local)) : ANY);
        break;
      case TypeId.SET:
        descriptor = Type.set(first ? remoteDescriptorOf(first, elementOf(local)) : ANY);
        break;
      case TypeId.MAP: {
        const map = local?.kind === "map" ? local : undefined;
        descriptor = Type.map(
          first ? remoteDescriptorOf(first, map?.key) : ANY,
          second ? remoteDescriptorOf(second, map?.value) : ANY
        );
        break;
      }
      default:
        throw new InvalidDataError(`Unsupported type id ${typeIdName(id)} in TypeMeta`);
    }
  }
  return Type.trackingRef(type.nullable ? Type.nullable(descriptor) : descriptor, type.trackingRef);
}

/**
 * Whether a value written as `remote` can be stored in a local field.
 * Struct identities are only known once a value is read.
 */
function isAssignable(remote: FieldTypeMeta, local: TypeDescriptor): boolean {
  if (local.kind === "any") {
    return true;
  }
  const id = remote.typeId;
  const [first, second] = remote.generics;
  if (isNumericTypeId(id)) {
    return local.kind === "primitive" && isNumericTypeId(local.typeId);
  }
  if (id === TypeId.BOOL) {
    return local.kind === "primitive" && local.typeId === TypeId.BOOL;
  }
  if (id === TypeId.LIST || id === TypeId.SET) {
    if (local.kind !== "list" && local.kind !== "set") {
      return false;
    }
    return first === undefined || isAssignable(first, local.element);
  }
  if (id === TypeId.MAP) {
    if (local.kind !== "map") {
      return false;
    }
    return (
      (first === undefined || isAssignable(first, local.key)) &&
      (second === undefined || isAssignable(second, local.value))
    );
  }
  if (isStructTypeId(id) || isEnumTypeId(id) || isExtTypeId(id) || isUnionTypeId(id)) {
    return local.kind === kindOfWireTypeId(id);
  }
  switch (id) {
    case TypeId.STRING:
      return local.kind === "string";
    case TypeId.BINARY:
      return local.kind === "binary";
    default:
      return false;
  }
}

/**
 * Registered user types and the caches derived from them.
 *
 * Caches are filled on first use. A pass runs synchronously, so no other
 * pass can observe an entry while it is being built.
 */
export class TypeRegistry {
  private readonly byKey = new Map<string, UserDescriptor>();
  private readonly byClass = new Map<Function, UserDescriptor>();
  private readonly decoded = new WeakMap<object, StructDescriptor>();
  private readonly metas = new WeakMap<StructDescriptor, TypeMeta>();
  private readonly orderedFields = new WeakMap<StructDescriptor, readonly FieldInfo[]>();
  private readonly hashes = new WeakMap<StructDescriptor, [number | undefined, number | undefined]>();
  private readonly remotePlans = new Map<bigint, RemoteStructPlan>();

  constructor(private readonly config: ForyConfig) {}

  /**
   * Binds a struct, enum, union or ext descriptor by its id or name.
   * Registering the same descriptor again is a no-op.
   */
  register<T extends UserDescriptor>(descriptor: T, cls?: Constructor): T {
    const user: UserDescriptor = descriptor;
    if (user.userTypeId === undefined && user.typeName === undefined) {
      throw new ForyError(`Cannot register ${user.kind} without a type id or name`);
    }
    if (user.kind === "struct" && user.fields === undefined) {
      throw new ForyError("Cannot register a struct without fields", { typeName: displayName(user) });
    }
    if (user.kind === "ext" && user.serializer === undefined) {
      throw new ForyError("Cannot register an ext type without a serializer", { typeName: displayName(user) });
    }

    const key = typeKey(user);
    const existing = this.byKey.get(key);
    if (existing !== undefined && existing !== user) {
      throw new DuplicateRegistrationError(displayName(user));
    }

    const owner = cls ?? (user.kind === "struct" ? user.creator : undefined);
    if (owner !== undefined) {
      const bound = this.byClass.get(owner);
      if (bound !== undefined && bound !== user) {
        throw new DuplicateRegistrationError(owner.name || displayName(user));
      }
      this.byClass.set(owner, user);
    }

    this.byKey.set(key, user);
    this.remotePlans.clear();
    return descriptor;
  }

  /**
   * Registers a copy of the descriptor bound to a numeric id.
   */
  registerById<T extends UserDescriptor>(descriptor: T, userTypeId: number, cls?: Constructor): T {
    const copy = {
      ...descriptor,
      typeId: idTypeId(descriptor.kind),
      userTypeId,
      namespace: undefined,
      typeName: undefined,
    };
    Object.freeze(copy);
    return this.register(copy, cls);
  }

  /**
   * Registers a copy of the descriptor bound to a namespace and name.
   */
  registerByName<T extends UserDescriptor>(descriptor: T, namespace: string, typeName: string, cls?: Constructor): T {
    const copy = {
      ...descriptor,
      typeId: nameTypeId(descriptor.kind),
      userTypeId: undefined,
      namespace,
      typeName,
    };
    Object.freeze(copy);
    return this.register(copy, cls);
  }

  /**
   * Looks up a type written with a numeric user type id.
   */
  resolveByWireId(typeId: number, userTypeId: number): UserDescriptor {
    const kind = kindOfWireTypeId(typeId);
    const found = kind && this.byKey.get(`${kind}#${userTypeId}`);
    if (!found) {
      throw new UnknownTypeError(`${typeIdName(typeId)} #${userTypeId}`);
    }
    return found;
  }

  /**
   * Looks up a type written with a namespace and type name.
   */
  resolveByWireName(typeId: number, namespace: string, typeName: string): UserDescriptor {
    const kind = kindOfWireTypeId(typeId);
    const found = kind && this.byKey.get(`${kind}:${namespace}.${typeName}`);
    if (!found) {
      throw new UnknownTypeError(`${typeIdName(typeId)} ${namespace ? namespace + "." : ""}${typeName}`);
    }
    return found;
  }

  /**
   * Returns the registered struct a field-less reference names.
   */
  resolveStruct(descriptor: StructDescriptor): StructDescriptor {
    if (descriptor.fields !== undefined) {
      return descriptor;
    }
    const found = this.byKey.get(typeKey(descriptor));
    if (found === undefined || found.kind !== "struct") {
      throw new UnknownTypeError(displayName(descriptor));
    }
    return found;
  }

  /**
   * Returns the registered ext type a serializer-less reference names.
   */
  resolveExt(descriptor: ExtDescriptor): ExtDescriptor {
    if (descriptor.serializer !== undefined) {
      return descriptor;
    }
    const found = this.byKey.get(typeKey(descriptor));
    if (found === undefined || found.kind !== "ext") {
      throw new UnknownTypeError(displayName(descriptor));
    }
    return found;
  }

  /**
   * The serializer of an ext descriptor or of the ext type it names.
   */
  extSerializer(descriptor: ExtDescriptor): ExtSerializer {
    const serializer = this.resolveExt(descriptor).serializer;
    if (serializer === undefined) {
      throw new UnknownTypeError(`serializer for ${displayName(descriptor)}`);
    }
    return serializer;
  }

  /**
   * Fields of a struct in the order they are written.
   */
  wireFields(descriptor: StructDescriptor): readonly FieldInfo[] {
    let fields = this.orderedFields.get(descriptor);
    if (fields === undefined) {
      fields = groupFieldsByType(descriptor.fields ?? []);
      this.orderedFields.set(descriptor, fields);
    }
    return fields;
  }

  /**
   * The TypeMeta a struct is written with in compatible mode.
   */
  getOrBuildTypeMeta(descriptor: StructDescriptor): TypeMeta {
    let meta = this.metas.get(descriptor);
    if (meta === undefined) {
      const typeId = descriptor.typeName !== undefined ? TypeId.NAMED_COMPATIBLE_STRUCT : TypeId.COMPATIBLE_STRUCT;
      meta = TypeMeta.fromStruct(descriptor, typeId, this.config.refTracking);
      this.metas.set(descriptor, meta);
    }
    return meta;
  }

  /**
   * The structural hash of a struct, cached per ref-tracking mode.
   */
  getStructHash(descriptor: StructDescriptor, trackRef: boolean): number {
    let entry = this.hashes.get(descriptor);
    if (entry === undefined) {
      entry = [undefined, undefined];
      this.hashes.set(descriptor, entry);
    }
    const slot = trackRef ? 1 : 0;
    let hash = entry[slot];
    if (hash === undefined) {
      hash = computeStructHash(descriptor.fields ?? [], trackRef);
      entry[slot] = hash;
    }
    return hash;
  }

  /**
   * Maps the fields of a writer's TypeMeta onto the local struct.
   */
  resolveRemoteMeta(meta: TypeMeta): RemoteStructPlan {
    const cacheKey = meta.headerValue;
    const cached = this.remotePlans.get(cacheKey);
    if (cached !== undefined) {
      return cached;
    }

    const key = meta.registerByName ? `struct:${meta.namespace}.${meta.typeName}` : `struct#${meta.userTypeId ?? -1}`;
    const registered = this.byKey.get(key);
    const local = registered?.kind === "struct" ? registered : undefined;

    const localFields = new Map<string, FieldInfo>();
    for (const field of local?.fields ?? []) {
      localFields.set(fieldIdentifier(field), field);
    }

    const fields = meta.fields.map((fieldMeta): RemoteField => {
      const match = localFields.get(fieldMeta.tagId !== undefined ? String(fieldMeta.tagId) : fieldMeta.name);
      if (match !== undefined && !isAssignable(fieldMeta.fieldType, match.fieldType)) {
        throw new InvalidDataError(
          `Field type ${typeIdName(fieldMeta.fieldType.typeId)} cannot be read into ${displayName(match.fieldType)}`,
          { typeName: meta.displayName, fieldName: match.name }
        );
      }
      const remote: FieldInfo = Object.freeze({
        name: fieldMeta.name,
        fieldType: remoteDescriptorOf(fieldMeta.fieldType, match?.fieldType),
        nullable: fieldMeta.fieldType.nullable,
        trackingRef: fieldMeta.fieldType.trackingRef,
        tagId: fieldMeta.tagId,
      });
      return { remote, remoteType: fieldMeta.fieldType, local: match };
    });

    const remoteFields = fields.map((field) => field.remote);
    const remoteDescriptor: StructDescriptor = Object.freeze({
      kind: "struct",
      typeId: meta.registerByName ? TypeId.NAMED_STRUCT : TypeId.STRUCT,
      nullable: false,
      userTypeId: meta.registerByName ? undefined : meta.userTypeId,
      namespace: meta.registerByName ? meta.namespace : undefined,
      typeName: meta.registerByName ? meta.typeName : undefined,
      fields: Object.freeze(remoteFields),
    });
    this.metas.set(remoteDescriptor, meta);
    this.orderedFields.set(remoteDescriptor, remoteFields);

    const plan: RemoteStructPlan = { meta, local, remoteDescriptor, fields };
    this.remotePlans.set(cacheKey, plan);
    return plan;
  }

  /**
   * Remembers the struct a plain object was decoded as, so it can be
   * written back without a class.
   */
  rememberDecoded(value: object, descriptor: StructDescriptor): void {
    this.decoded.set(value, descriptor);
  }

  /**
   * Picks the wire type of a value written where any type is allowed.
   */
  descriptorOf(value: unknown): TypeDescriptor {
    switch (typeof value) {
      case "boolean":
        return BOOL;
      case "number":
        if (Number.isInteger(value) && value >= MinInt32 && value <= MaxInt32) {
          return INT32;
        }
        return Number.isSafeInteger(value) ? INT64 : FLOAT64;
      case "bigint":
        return INT64;
      case "string":
        return STRING;
      case "object":
        if (value === null) {
          break;
        }
        if (value instanceof Uint8Array) {
          return BINARY;
        }
        if (Array.isArray(value)) {
          return DYNAMIC_LIST;
        }
        if (value instanceof Set) {
          return DYNAMIC_SET;
        }
        if (value instanceof Map) {
          return DYNAMIC_MAP;
        }
        if (value instanceof Union) {
          return DYNAMIC_UNION;
        }
        if (value instanceof UnknownStruct) {
          this.adoptUnknown(value);
          return value.descriptor;
        }
        return this.byClass.get(value.constructor) ?? this.decoded.get(value) ?? this.unknownObject(value);
      default:
        break;
    }
    throw new UnknownTypeError(`no wire type for ${typeof value} value`);
  }

  /**
   * Makes an UnknownStruct read by another registry writable with its meta.
   */
  private adoptUnknown(value: UnknownStruct): void {
    if (!this.metas.has(value.descriptor)) {
      this.metas.set(value.descriptor, value.meta);
      this.orderedFields.set(value.descriptor, value.descriptor.fields ?? []);
    }
  }

  private unknownObject(value: object): never {
    throw new UnknownTypeError(`class ${value.constructor.name || "Object"} is not registered`);
  }
}
