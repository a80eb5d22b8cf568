import type { ForyConfig } from "./config";
import { DepthLimitExceededError } from "./errors";
import type { Reader } from "./reader";
import { RefReader, RefWriter } from "./referenceResolver";
import type { TypeRegistry } from "./registry";
import type { TypeMeta } from "./typeMeta";
import type { Writer } from "./writer";

/**
 * State of one serialize call.
 */
export class WriteContext {
  readonly refs = new RefWriter();
  /** Index of each TypeMeta already written in this pass. */
  readonly metaIndex = new Map<TypeMeta, number>();
  /** Index of each namespace or type name already written in this pass. */
  readonly metaStringIndex = new Map<string, number>();

  constructor(
    readonly writer: Writer,
    readonly registry: TypeRegistry,
    readonly config: ForyConfig
  ) {}
}

/**
 * State of one deserialize call.
 */
export class ReadContext {
  readonly refs = new RefReader();
  readonly metas: TypeMeta[] = [];
  readonly metaStrings: string[] = [];
  /** Greater than zero while reading a value only to discard it. */
  skipping = 0;
  /** Greater than zero while reading the fields of an UnknownStruct. */
  unresolved = 0;
  private depth = 0;

  constructor(
    readonly reader: Reader,
    readonly registry: TypeRegistry,
    readonly config: ForyConfig
  ) {}

  /**
   * Whether unregistered enums and unknown union cases are read as raw
   * values instead of failing.
   */
  get tolerant(): boolean {
    return this.skipping > 0 || this.unresolved > 0;
  }

  /**
   * Enters a nested value.
   */
  enter(): void {
    this.depth++;
    if (this.depth > this.config.maxDepth) {
      throw new DepthLimitExceededError(this.depth, this.config.maxDepth);
    }
  }

  leave(): void {
    this.depth--;
  }
}
