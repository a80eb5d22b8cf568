import { readSlot, writeSlot } from "./codec";
import { type ForyConfig, type ForyConfigInput, parseConfig } from "./config";
import { ReadContext, WriteContext } from "./context";
import { InvalidDataError } from "./errors";
import { Reader } from "./reader";
import { type Constructor, TypeRegistry } from "./registry";
import {
  type ExtDescriptor,
  type ExtSerializer,
  type TypeDescriptor,
  type TypeIdentity,
  type UserDescriptor,
  Type,
} from "./typeInfo";
import { Writer } from "./writer";

const ANY = Type.any();

/**
 * Serializes values in the Fory wire format.
 *
 * @example
 * ```typescript
 * const fory = new Fory({ compatible: true });
 * const Point = fory.register(Type.struct(100, { x: Type.int32(), y: Type.int32() }));
 * const bytes = fory.serialize({ x: 3, y: 4 }, Point);
 * const point = fory.deserialize(bytes, Point);
 * ```
 */
export class Fory {
  readonly config: ForyConfig;
  private readonly registry: TypeRegistry;

  constructor(config?: ForyConfigInput) {
    this.config = parseConfig(config);
    this.registry = new TypeRegistry(this.config);
  }

  /**
   * Registers a descriptor under the id or name it carries. Instances of
   * `cls` (or of the struct's creator) are then written as this type.
   */
  register<T extends UserDescriptor>(descriptor: T, cls?: Constructor): T {
    return this.registry.register(descriptor, cls);
  }

  registerById<T extends UserDescriptor>(descriptor: T, userTypeId: number, cls?: Constructor): T {
    return this.registry.registerById(descriptor, userTypeId, cls);
  }

  registerByName<T extends UserDescriptor>(descriptor: T, namespace: string, typeName: string, cls?: Constructor): T {
    return this.registry.registerByName(descriptor, namespace, typeName, cls);
  }

  /**
   * Registers a user codec for values of `cls`. The codec writes and
   * reads the payload only; flags and type info are handled here.
   */
  registerExt<T>(identity: TypeIdentity, serializer: ExtSerializer<T>, cls?: Constructor): ExtDescriptor {
    return this.registry.register(Type.ext(identity, serializer), cls);
  }

  /**
   * Serializes a value. Without a descriptor its type is taken from the
   * value itself.
   */
  serialize(value: unknown, descriptor: TypeDescriptor = ANY): Uint8Array {
    const writer = new Writer();
    const ctx = new WriteContext(writer, this.registry, this.config);
    writeSlot(ctx, value, descriptor, this.config.refTracking ? "ref" : "null", true);
    return writer.bytes().slice();
  }

  /**
   * Deserializes one value. Trailing bytes are an error.
   */
  deserialize(data: Uint8Array, descriptor: TypeDescriptor = ANY): unknown {
    const reader = new Reader(data);
    const ctx = new ReadContext(reader, this.registry, this.config);
    const value = readSlot(ctx, descriptor, "ref", true);
    if (reader.hasMore) {
      throw new InvalidDataError(`Unexpected ${reader.remaining} trailing bytes`, { offset: reader.position });
    }
    return value;
  }
}
