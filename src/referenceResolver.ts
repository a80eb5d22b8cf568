import { DanglingReferenceError, InvalidDataError } from "./errors";
import type { Reader } from "./reader";
import { RefFlag } from "./types";
import type { Writer } from "./writer";

/**
 * Assigns ids to the objects written in one pass.
 */
export class RefWriter {
  private readonly ids = new Map<object, number>();
  private nextId = 0;

  /**
   * Writes the flag for a value whose identity is tracked. Returns true when
   * nothing else needs writing: the value is null or was written before.
   * Only objects get an id; other values are written as NotNullValue.
   */
  writeRefOrNull(writer: Writer, value: unknown): boolean {
    if (value === null || value === undefined) {
      writer.writeInt8(RefFlag.Null);
      return true;
    }
    if (typeof value !== "object") {
      writer.writeInt8(RefFlag.NotNullValue);
      return false;
    }
    const id = this.ids.get(value);
    if (id !== undefined) {
      writer.writeInt8(RefFlag.Ref);
      writer.writeVarUint32(id);
      return true;
    }
    this.ids.set(value, this.nextId++);
    writer.writeInt8(RefFlag.RefValue);
    return false;
  }

  /**
   * Writes the flag for a value whose identity is not tracked.
   */
  writeNullFlag(writer: Writer, value: unknown): boolean {
    if (value === null || value === undefined) {
      writer.writeInt8(RefFlag.Null);
      return true;
    }
    writer.writeInt8(RefFlag.NotNullValue);
    return false;
  }
}

/**
 * Resolves back-references while reading one pass.
 */
export class RefReader {
  private readonly objects: unknown[] = [];
  private readonly filled: boolean[] = [];

  /**
   * Reads and validates a ref flag.
   */
  readRefFlag(reader: Reader): RefFlag {
    const offset = reader.position;
    const flag = reader.readInt8();
    switch (flag) {
      case RefFlag.Null:
      case RefFlag.Ref:
      case RefFlag.NotNullValue:
      case RefFlag.RefValue:
        return flag;
      default:
        throw new InvalidDataError(`Invalid ref flag ${flag}`, { offset });
    }
  }

  /**
   * Reserves the id of a value that is about to be read.
   */
  preserveRefId(): number {
    this.objects.push(undefined);
    this.filled.push(false);
    return this.objects.length - 1;
  }

  /**
   * Binds a reserved id to its value. Containers call this before reading
   * their children so that cycles resolve.
   */
  setReadObject(id: number, value: unknown): void {
    if (id < 0 || id >= this.objects.length) {
      throw new DanglingReferenceError(id);
    }
    this.objects[id] = value;
    this.filled[id] = true;
  }

  getReadObject(id: number, offset?: number): unknown {
    if (id < 0 || id >= this.objects.length || !this.filled[id]) {
      throw new DanglingReferenceError(id, offset);
    }
    return this.objects[id];
  }

  /**
   * Reads the id following a Ref flag and returns the value it names.
   */
  readRef(reader: Reader): unknown {
    const offset = reader.position;
    return this.getReadObject(reader.readVarUint32(), offset);
  }
}
