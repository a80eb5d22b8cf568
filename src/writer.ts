import { EncodeError } from "./errors";
import { MaxUint32, StringEncoding, zigzagEncode, zigzagEncode64 } from "./types";

const INITIAL_CAPACITY = 256;
const GROWTH_FACTOR = 2;

// Module-level singleton to avoid repeated instantiation
const textEncoder = new TextEncoder();

/**
 * Writer encodes Fory data into a binary buffer.
 *
 * All fixed-width values are little-endian.
 */
export class Writer {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(Math.max(initialCapacity, 1));
    this.view = new DataView(this.buffer.buffer);
    this.pos = 0;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the encoded bytes.
   */
  bytes(): Uint8Array {
    return this.buffer.subarray(0, this.pos);
  }

  /**
   * Resets the writer for reuse.
   */
  reset(): void {
    this.pos = 0;
  }

  /**
   * Ensures the buffer has at least the specified capacity.
   */
  private ensureCapacity(needed: number): void {
    const required = this.pos + needed;
    if (required <= this.buffer.length) {
      return;
    }

    let newCapacity = this.buffer.length * GROWTH_FACTOR;
    while (newCapacity < required) {
      newCapacity *= GROWTH_FACTOR;
    }

    const newBuffer = new Uint8Array(newCapacity);
    newBuffer.set(this.buffer);
    this.buffer = newBuffer;
    this.view = new DataView(this.buffer.buffer);
  }

  /**
   * Writes an unsigned byte.
   */
  writeUint8(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.pos++] = value & 0xff;
  }

  /**
   * Writes a signed byte.
   */
  writeInt8(value: number): void {
    this.writeUint8(value);
  }

  /**
   * Overwrites a byte that was already written, e.g. a chunk size placeholder.
   */
  setUint8At(offset: number, value: number): void {
    if (offset < 0 || offset >= this.pos) {
      throw new EncodeError(`Cannot patch byte at ${offset}, only ${this.pos} written`);
    }
    this.buffer[offset] = value & 0xff;
  }

  /**
   * Writes raw bytes.
   */
  writeBytes(data: Uint8Array): void {
    this.ensureCapacity(data.length);
    this.buffer.set(data, this.pos);
    this.pos += data.length;
  }

  /**
   * Writes a boolean.
   */
  writeBool(value: boolean): void {
    this.writeUint8(value ? 1 : 0);
  }

  writeInt16(value: number): void {
    this.ensureCapacity(2);
    this.view.setInt16(this.pos, value, true);
    this.pos += 2;
  }

  writeUint16(value: number): void {
    this.ensureCapacity(2);
    this.view.setUint16(this.pos, value, true);
    this.pos += 2;
  }

  writeInt32(value: number): void {
    this.ensureCapacity(4);
    this.view.setInt32(this.pos, value, true);
    this.pos += 4;
  }

  writeUint32(value: number): void {
    this.ensureCapacity(4);
    this.view.setUint32(this.pos, value, true);
    this.pos += 4;
  }

  writeInt64(value: bigint): void {
    this.ensureCapacity(8);
    this.view.setBigInt64(this.pos, value, true);
    this.pos += 8;
  }

  writeUint64(value: bigint): void {
    this.ensureCapacity(8);
    this.view.setBigUint64(this.pos, value, true);
    this.pos += 8;
  }

  /**
   * Writes a 32-bit float (IEEE 754).
   */
  writeFloat32(value: number): void {
    this.ensureCapacity(4);
    this.view.setFloat32(this.pos, value, true);
    this.pos += 4;
  }

  /**
   * Writes a 64-bit float (IEEE 754).
   */
  writeFloat64(value: number): void {
    this.ensureCapacity(8);
    this.view.setFloat64(this.pos, value, true);
    this.pos += 8;
  }

  /**
   * Writes an unsigned 32-bit varint: 7-bit groups, low group first,
   * bit 7 set on every byte but the last. At most 5 bytes.
   */
  writeVarUint32(value: number): void {
    this.ensureCapacity(5);
    while (value > 0x7f) {
      this.buffer[this.pos++] = (value & 0x7f) | 0x80;
      value >>>= 7;
    }
    this.buffer[this.pos++] = value;
  }

  /**
   * Writes a signed 32-bit varint using ZigZag encoding.
   */
  writeVarInt32(value: number): void {
    this.writeVarUint32(zigzagEncode(value));
  }

  /**
   * Writes an unsigned 64-bit varint.
   *
   * Eight 7-bit groups cover 56 bits; a ninth byte, if needed, carries the
   * remaining 8 bits whole and has no continuation bit. At most 9 bytes.
   */
  writeVarUint64(value: bigint): void {
    this.ensureCapacity(9);
    for (let i = 0; i < 8; i++) {
      if (value < 0x80n) {
        this.buffer[this.pos++] = Number(value);
        return;
      }
      this.buffer[this.pos++] = Number(value & 0x7fn) | 0x80;
      value >>= 7n;
    }
    this.buffer[this.pos++] = Number(value & 0xffn);
  }

  /**
   * Writes a signed 64-bit varint using ZigZag encoding.
   */
  writeVarInt64(value: bigint): void {
    this.writeVarUint64(zigzagEncode64(value));
  }

  /**
   * Writes a string as `varuint32 (byteLength << 2) | encoding` followed by
   * the payload, using the narrowest of Latin-1, UTF-16LE and UTF-8.
   */
  writeString(value: string): void {
    let latin1 = true;
    let hasSurrogate = false;
    for (let i = 0; i < value.length; i++) {
      const c = value.charCodeAt(i);
      if (c > 0xff) {
        latin1 = false;
        if (c >= 0xd800 && c <= 0xdfff) {
          hasSurrogate = true;
          break;
        }
      }
    }

    if (latin1) {
      this.writeStringHeader(value.length, StringEncoding.LATIN1);
      this.ensureCapacity(value.length);
      for (let i = 0; i < value.length; i++) {
        this.buffer[this.pos++] = value.charCodeAt(i);
      }
      return;
    }

    if (!hasSurrogate) {
      this.writeStringHeader(value.length * 2, StringEncoding.UTF16);
      this.ensureCapacity(value.length * 2);
      for (let i = 0; i < value.length; i++) {
        this.view.setUint16(this.pos, value.charCodeAt(i), true);
        this.pos += 2;
      }
      return;
    }

    const bytes = textEncoder.encode(value);
    this.writeStringHeader(bytes.length, StringEncoding.UTF8);
    this.writeBytes(bytes);
  }

  private writeStringHeader(byteLength: number, encoding: StringEncoding): void {
    const header = byteLength * 4 + encoding;
    if (header > MaxUint32) {
      throw new EncodeError(`String of ${byteLength} bytes is too long`);
    }
    this.writeVarUint32(header);
  }

  /**
   * Writes length-prefixed bytes.
   */
  writeLengthPrefixedBytes(data: Uint8Array): void {
    this.writeVarUint32(data.length);
    this.writeBytes(data);
  }
}
