/**
 * Where an error happened, when known.
 */
export interface ErrorContext {
  typeName?: string;
  fieldName?: string;
  offset?: number;
}

function describe(message: string, context?: ErrorContext): string {
  if (!context) {
    return message;
  }
  const parts: string[] = [];
  if (context.typeName !== undefined) {
    parts.push(`type ${context.typeName}`);
  }
  if (context.fieldName !== undefined) {
    parts.push(`field ${context.fieldName}`);
  }
  if (context.offset !== undefined) {
    parts.push(`offset ${context.offset}`);
  }
  return parts.length > 0 ? `${message} (${parts.join(", ")})` : message;
}

/**
 * Base error class for Fory errors.
 */
export class ForyError extends Error {
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}) {
    super(describe(message, context));
    this.name = "ForyError";
    this.context = context;
  }
}

/**
 * Error thrown when encoding fails.
 */
export class EncodeError extends ForyError {
  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = "EncodeError";
  }
}

/**
 * Error thrown when decoding fails.
 */
export class DecodeError extends ForyError {
  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = "DecodeError";
  }
}

/**
 * Malformed or truncated input: bad varints, encoding tags, type ids.
 */
export class InvalidDataError extends DecodeError {
  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = "InvalidDataError";
  }
}

/**
 * Error thrown when buffer is exhausted during decoding.
 */
export class BufferUnderflowError extends InvalidDataError {
  constructor(needed: number, available: number, offset?: number) {
    super(`Buffer underflow: needed ${needed} bytes, only ${available} available`, { offset });
    this.name = "BufferUnderflowError";
  }
}

/**
 * Error thrown when nested values exceed the configured depth.
 */
export class DepthLimitExceededError extends InvalidDataError {
  constructor(depth: number, maxDepth: number) {
    super(
      `Deserialization depth limit exceeded: ${depth} > ${maxDepth}, ` +
        `the data may be malicious, increase maxDepth if needed`
    );
    this.name = "DepthLimitExceededError";
  }
}

/**
 * Error thrown when the struct hash read from the stream differs from the local one.
 */
export class SchemaHashMismatchError extends DecodeError {
  constructor(typeName: string, expected: number, actual: number) {
    super(`Struct hash mismatch: expected ${expected}, got ${actual}`, { typeName });
    this.name = "SchemaHashMismatchError";
  }
}

/**
 * Error thrown when a type id or name does not resolve to a registered type.
 */
export class UnknownTypeError extends ForyError {
  constructor(what: string, context?: ErrorContext) {
    super(`Unknown type: ${what}`, context);
    this.name = "UnknownTypeError";
  }
}

/**
 * Error thrown when a back-reference points at an id that was never registered.
 */
export class DanglingReferenceError extends DecodeError {
  constructor(refId: number, offset?: number) {
    super(`Dangling reference: ref id ${refId} has not been read`, { offset });
    this.name = "DanglingReferenceError";
  }
}

/**
 * Error thrown when an id or name is already bound to another type.
 */
export class DuplicateRegistrationError extends ForyError {
  constructor(key: string) {
    super(`Duplicate registration: ${key} is already bound to another type`);
    this.name = "DuplicateRegistrationError";
  }
}

/**
 * Error thrown when an enum value is not one of the declared cases.
 */
export class InvalidEnumValueError extends EncodeError {
  constructor(value: unknown, typeName: string) {
    super(`Invalid enum value: ${String(value)}`, { typeName });
    this.name = "InvalidEnumValueError";
  }
}

/**
 * Error thrown for invalid configuration options.
 */
export class ConfigError extends ForyError {
  constructor(message: string) {
    super(`Invalid config: ${message}`);
    this.name = "ConfigError";
  }
}
