import { BufferUnderflowError, InvalidDataError } from "./errors";
import { StringEncoding, zigzagDecode, zigzagDecode64 } from "./types";

// Module-level singletons to avoid repeated instantiation
const utf8Decoder = new TextDecoder();
const utf16Decoder = new TextDecoder("utf-16le");

// String.fromCharCode takes its arguments on the stack
const CHAR_CHUNK = 4096;

/**
 * Converts a 64-bit integer to a JavaScript number.
 *
 * JavaScript numbers can only safely represent integers up to
 * Number.MAX_SAFE_INTEGER (2^53-1); larger values lose precision.
 */
export function int64ToNumber(value: bigint, warnOnPrecisionLoss: boolean = true): number {
  if (warnOnPrecisionLoss) {
    if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
      console.warn(
        `fory: int64 value ${value} exceeds safe integer range ` +
          `(${Number.MIN_SAFE_INTEGER} to ${Number.MAX_SAFE_INTEGER}), ` +
          `precision may be lost. Set useBigInt64 for full precision.`
      );
    }
  }
  return Number(value);
}

/**
 * Reader decodes Fory data from a binary buffer.
 */
export class Reader {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;
  private end: number;

  constructor(data: Uint8Array) {
    this.buffer = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.pos = 0;
    this.end = data.length;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.end - this.pos;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.pos < this.end;
  }

  /**
   * Checks if there are enough bytes available.
   */
  private checkAvailable(needed: number): void {
    if (this.pos + needed > this.end) {
      throw new BufferUnderflowError(needed, this.remaining, this.pos);
    }
  }

  /**
   * Reads an unsigned byte.
   */
  readUint8(): number {
    this.checkAvailable(1);
    return this.buffer[this.pos++];
  }

  /**
   * Reads a signed byte.
   */
  readInt8(): number {
    this.checkAvailable(1);
    return this.view.getInt8(this.pos++);
  }

  /**
   * Reads raw bytes. The result is a view into the input.
   */
  readBytes(length: number): Uint8Array {
    this.checkAvailable(length);
    const bytes = this.buffer.subarray(this.pos, this.pos + length);
    this.pos += length;
    return bytes;
  }

  /**
   * Advances past bytes without reading them.
   */
  skip(length: number): void {
    this.checkAvailable(length);
    this.pos += length;
  }

  /**
   * Reads a boolean.
   */
  readBool(): boolean {
    return this.readUint8() !== 0;
  }

  readInt16(): number {
    this.checkAvailable(2);
    const value = this.view.getInt16(this.pos, true);
    this.pos += 2;
    return value;
  }

  readUint16(): number {
    this.checkAvailable(2);
    const value = this.view.getUint16(this.pos, true);
    this.pos += 2;
    return value;
  }

  readInt32(): number {
    this.checkAvailable(4);
    const value = this.view.getInt32(this.pos, true);
    this.pos += 4;
    return value;
  }

  readUint32(): number {
    this.checkAvailable(4);
    const value = this.view.getUint32(this.pos, true);
    this.pos += 4;
    return value;
  }

  readInt64(): bigint {
    this.checkAvailable(8);
    const value = this.view.getBigInt64(this.pos, true);
    this.pos += 8;
    return value;
  }

  readUint64(): bigint {
    this.checkAvailable(8);
    const value = this.view.getBigUint64(this.pos, true);
    this.pos += 8;
    return value;
  }

  /**
   * Reads a 32-bit float (IEEE 754).
   */
  readFloat32(): number {
    this.checkAvailable(4);
    const value = this.view.getFloat32(this.pos, true);
    this.pos += 4;
    return value;
  }

  /**
   * Reads a 64-bit float (IEEE 754).
   */
  readFloat64(): number {
    this.checkAvailable(8);
    const value = this.view.getFloat64(this.pos, true);
    this.pos += 8;
    return value;
  }

  /**
   * Reads an unsigned 32-bit varint. At most 5 bytes; the fifth byte
   * may only carry the top 4 bits.
   */
  readVarUint32(): number {
    let result = 0;
    let shift = 0;

    for (let i = 0; i < 5; i++) {
      const start = this.pos;
      const b = this.readUint8();

      if (i === 4 && (b & 0xf0) !== 0) {
        throw new InvalidDataError("Varint overflow: value exceeds 32 bits", { offset: start });
      }

      result |= (b & 0x7f) << shift;
      if ((b & 0x80) === 0) {
        return result >>> 0;
      }
      shift += 7;
    }

    // unreachable: the fifth byte never has its continuation bit set
    throw new InvalidDataError("Varint overflow: exceeded 5 bytes", { offset: this.pos });
  }

  /**
   * Reads a signed 32-bit varint using ZigZag decoding.
   */
  readVarInt32(): number {
    return zigzagDecode(this.readVarUint32());
  }

  /**
   * Reads an unsigned 64-bit varint: up to eight 7-bit groups, then a
   * ninth byte whose 8 bits are all value bits.
   */
  readVarUint64(): bigint {
    let result = 0n;
    for (let i = 0; i < 8; i++) {
      const b = this.readUint8();
      result |= BigInt(b & 0x7f) << BigInt(7 * i);
      if ((b & 0x80) === 0) {
        return result;
      }
    }
    const last = this.readUint8();
    return result | (BigInt(last) << 56n);
  }

  /**
   * Reads a signed 64-bit varint using ZigZag decoding.
   */
  readVarInt64(): bigint {
    return zigzagDecode64(this.readVarUint64());
  }

  /**
   * Reads a string written by Writer.writeString.
   */
  readString(): string {
    const offset = this.pos;
    const header = this.readVarUint32();
    const encoding = header & 0b11;
    const byteLength = Math.floor(header / 4);
    const bytes = this.readBytes(byteLength);

    switch (encoding) {
      case StringEncoding.LATIN1:
        return decodeLatin1(bytes);
      case StringEncoding.UTF16:
        if (byteLength % 2 !== 0) {
          throw new InvalidDataError(`UTF-16 payload has odd length ${byteLength}`, { offset });
        }
        return decodeUtf16(bytes);
      case StringEncoding.UTF8:
        return utf8Decoder.decode(bytes);
      default:
        throw new InvalidDataError(`Unknown string encoding ${encoding}`, { offset });
    }
  }

  /**
   * Reads length-prefixed bytes.
   */
  readLengthPrefixedBytes(): Uint8Array {
    const length = this.readVarUint32();
    return this.readBytes(length);
  }
}

function decodeLatin1(bytes: Uint8Array): string {
  // TextDecoder("latin1") is windows-1252, which remaps 0x80-0x9f
  let out = "";
  for (let i = 0; i < bytes.length; i += CHAR_CHUNK) {
    out += String.fromCharCode(...bytes.subarray(i, i + CHAR_CHUNK));
  }
  return out;
}

function decodeUtf16(bytes: Uint8Array): string {
  const units: number[] = [];
  let hasSurrogate = false;
  for (let i = 0; i < bytes.length; i += 2) {
    const unit = bytes[i] | (bytes[i + 1] << 8);
    if (unit >= 0xd800 && unit <= 0xdfff) {
      hasSurrogate = true;
      break;
    }
    units.push(unit);
  }
  if (hasSurrogate) {
    return utf16Decoder.decode(bytes);
  }
  let out = "";
  for (let i = 0; i < units.length; i += CHAR_CHUNK) {
    out += String.fromCharCode(...units.slice(i, i + CHAR_CHUNK));
  }
  return out;
}
