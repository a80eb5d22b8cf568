import { EncodeError, InvalidDataError } from "./errors";

// Module-level singletons to avoid repeated instantiation
const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

/**
 * Compact encodings for type names, namespaces and field names.
 */
export enum MetaStringEncoding {
  UTF_8 = 0,
  /** 5 bits per char: a-z . _ $ | */
  LOWER_SPECIAL = 1,
  /** 6 bits per char: a-z A-Z 0-9 and two special chars. */
  LOWER_UPPER_DIGIT_SPECIAL = 2,
  /** LOWER_SPECIAL with the first char lowercased. */
  FIRST_TO_LOWER_SPECIAL = 3,
  /** LOWER_SPECIAL with each upper-case char written as '|' + lower-case. */
  ALL_TO_LOWER_SPECIAL = 4,
}

export const NAMESPACE_ENCODINGS: readonly MetaStringEncoding[] = [
  MetaStringEncoding.UTF_8,
  MetaStringEncoding.ALL_TO_LOWER_SPECIAL,
  MetaStringEncoding.LOWER_UPPER_DIGIT_SPECIAL,
];

export const TYPE_NAME_ENCODINGS: readonly MetaStringEncoding[] = [
  MetaStringEncoding.UTF_8,
  MetaStringEncoding.ALL_TO_LOWER_SPECIAL,
  MetaStringEncoding.LOWER_UPPER_DIGIT_SPECIAL,
  MetaStringEncoding.FIRST_TO_LOWER_SPECIAL,
];

export const FIELD_NAME_ENCODINGS: readonly MetaStringEncoding[] = [
  MetaStringEncoding.UTF_8,
  MetaStringEncoding.ALL_TO_LOWER_SPECIAL,
  MetaStringEncoding.LOWER_UPPER_DIGIT_SPECIAL,
];

export interface MetaString {
  readonly value: string;
  readonly encoding: MetaStringEncoding;
  readonly bytes: Uint8Array;
}

function isLower(c: string): boolean {
  return c >= "a" && c <= "z";
}

function isUpper(c: string): boolean {
  return c >= "A" && c <= "Z";
}

function isDigit(c: string): boolean {
  return c >= "0" && c <= "9";
}

function lowerSpecialValue(c: string): number {
  if (isLower(c)) {
    return c.charCodeAt(0) - 97;
  }
  switch (c) {
    case ".":
      return 26;
    case "_":
      return 27;
    case "$":
      return 28;
    case "|":
      return 29;
    default:
      throw new EncodeError(`Unsupported character '${c}' for LOWER_SPECIAL`);
  }
}

function lowerSpecialChar(value: number): string {
  if (value <= 25) {
    return String.fromCharCode(97 + value);
  }
  switch (value) {
    case 26:
      return ".";
    case 27:
      return "_";
    case 28:
      return "$";
    case 29:
      return "|";
    default:
      throw new InvalidDataError(`Invalid LOWER_SPECIAL value ${value}`);
  }
}

/**
 * Packs chars MSB-first starting at bit 1. Bit 0 of the first byte is set
 * when the padding is wide enough to hold one more char, telling the decoder
 * to drop the last decoded char.
 */
function packBits(values: number[], bitsPerChar: number): Uint8Array {
  const totalBits = values.length * bitsPerChar + 1;
  const byteLength = Math.ceil(totalBits / 8);
  const bytes = new Uint8Array(byteLength);
  let bit = 1;
  for (const value of values) {
    for (let i = bitsPerChar - 1; i >= 0; i--) {
      if ((value >> i) & 1) {
        bytes[bit >> 3] |= 1 << (7 - (bit & 7));
      }
      bit++;
    }
  }
  if (byteLength * 8 >= totalBits + bitsPerChar) {
    bytes[0] |= 0x80;
  }
  return bytes;
}

function unpackBits(bytes: Uint8Array, bitsPerChar: number): number[] {
  if (bytes.length === 0) {
    return [];
  }
  const stripLast = (bytes[0] & 0x80) !== 0;
  const totalBits = bytes.length * 8;
  const values: number[] = [];
  let bit = 1;
  while (bit + bitsPerChar <= totalBits && !(stripLast && bit + 2 * bitsPerChar > totalBits)) {
    let value = 0;
    for (let i = 0; i < bitsPerChar; i++) {
      value = (value << 1) | ((bytes[bit >> 3] >> (7 - (bit & 7))) & 1);
      bit++;
    }
    values.push(value);
  }
  return values;
}

function escapeAllUpper(input: string): string {
  let out = "";
  for (const c of input) {
    out += isUpper(c) ? "|" + c.toLowerCase() : c;
  }
  return out;
}

function unescapeAllUpper(input: string): string {
  let out = "";
  for (let i = 0; i < input.length; i++) {
    if (input[i] === "|" && i + 1 < input.length) {
      i++;
      out += input[i].toUpperCase();
    } else {
      out += input[i];
    }
  }
  return out;
}

/**
 * Encodes and decodes meta strings. The two special chars are the ones
 * LOWER_UPPER_DIGIT_SPECIAL maps to 62 and 63.
 */
export class MetaStringCodec {
  static readonly namespace = new MetaStringCodec(".", "_");
  static readonly typeName = new MetaStringCodec("$", "_");
  static readonly fieldName = new MetaStringCodec("$", "_");

  constructor(
    readonly specialChar1: string,
    readonly specialChar2: string
  ) {}

  /**
   * Encodes with the most compact encoding allowed.
   */
  encode(input: string, allowed?: readonly MetaStringEncoding[]): MetaString {
    if (input.length === 0) {
      return { value: input, encoding: MetaStringEncoding.UTF_8, bytes: new Uint8Array(0) };
    }
    return this.encodeWith(input, this.chooseEncoding(input, allowed));
  }

  /**
   * Encodes with the given encoding.
   */
  encodeWith(input: string, encoding: MetaStringEncoding): MetaString {
    let bytes: Uint8Array;
    switch (encoding) {
      case MetaStringEncoding.UTF_8:
        bytes = textEncoder.encode(input);
        break;
      case MetaStringEncoding.LOWER_SPECIAL:
        bytes = packBits(Array.from(input, lowerSpecialValue), 5);
        break;
      case MetaStringEncoding.LOWER_UPPER_DIGIT_SPECIAL:
        bytes = packBits(
          Array.from(input, (c) => this.ludsValue(c)),
          6
        );
        break;
      case MetaStringEncoding.FIRST_TO_LOWER_SPECIAL:
        bytes = packBits(Array.from(input[0].toLowerCase() + input.slice(1), lowerSpecialValue), 5);
        break;
      case MetaStringEncoding.ALL_TO_LOWER_SPECIAL:
        bytes = packBits(Array.from(escapeAllUpper(input), lowerSpecialValue), 5);
        break;
      default:
        throw new EncodeError(`Unknown meta string encoding ${String(encoding)}`);
    }
    return { value: input, encoding, bytes };
  }

  /**
   * Decodes bytes written with the given encoding.
   */
  decode(bytes: Uint8Array, encoding: MetaStringEncoding): string {
    switch (encoding) {
      case MetaStringEncoding.UTF_8:
        return textDecoder.decode(bytes);
      case MetaStringEncoding.LOWER_SPECIAL:
        return unpackBits(bytes, 5).map(lowerSpecialChar).join("");
      case MetaStringEncoding.LOWER_UPPER_DIGIT_SPECIAL:
        return unpackBits(bytes, 6)
          .map((v) => this.ludsChar(v))
          .join("");
      case MetaStringEncoding.FIRST_TO_LOWER_SPECIAL: {
        const decoded = unpackBits(bytes, 5).map(lowerSpecialChar).join("");
        return decoded.length === 0 ? decoded : decoded[0].toUpperCase() + decoded.slice(1);
      }
      case MetaStringEncoding.ALL_TO_LOWER_SPECIAL:
        return unescapeAllUpper(unpackBits(bytes, 5).map(lowerSpecialChar).join(""));
      default:
        throw new InvalidDataError(`Unknown meta string encoding ${String(encoding)}`);
    }
  }

  chooseEncoding(input: string, allowed?: readonly MetaStringEncoding[]): MetaStringEncoding {
    const allow = (encoding: MetaStringEncoding): boolean => !allowed || allowed.includes(encoding);

    let digits = 0;
    let uppers = 0;
    let lowerSpecial = true;
    let luds = true;
    for (const c of input) {
      if (lowerSpecial && !(isLower(c) || c === "." || c === "_" || c === "$" || c === "|")) {
        lowerSpecial = false;
      }
      if (luds && !(isLower(c) || isUpper(c) || isDigit(c) || c === this.specialChar1 || c === this.specialChar2)) {
        luds = false;
      }
      if (isDigit(c)) {
        digits++;
      }
      if (isUpper(c)) {
        uppers++;
      }
    }

    if (lowerSpecial && allow(MetaStringEncoding.LOWER_SPECIAL)) {
      return MetaStringEncoding.LOWER_SPECIAL;
    }
    if (luds) {
      if (digits !== 0 && allow(MetaStringEncoding.LOWER_UPPER_DIGIT_SPECIAL)) {
        return MetaStringEncoding.LOWER_UPPER_DIGIT_SPECIAL;
      }
      if (uppers === 1 && isUpper(input[0]) && allow(MetaStringEncoding.FIRST_TO_LOWER_SPECIAL)) {
        return MetaStringEncoding.FIRST_TO_LOWER_SPECIAL;
      }
      if ((input.length + uppers) * 5 < input.length * 6 && allow(MetaStringEncoding.ALL_TO_LOWER_SPECIAL)) {
        return MetaStringEncoding.ALL_TO_LOWER_SPECIAL;
      }
      if (allow(MetaStringEncoding.LOWER_UPPER_DIGIT_SPECIAL)) {
        return MetaStringEncoding.LOWER_UPPER_DIGIT_SPECIAL;
      }
    }
    return MetaStringEncoding.UTF_8;
  }

  private ludsValue(c: string): number {
    if (isLower(c)) {
      return c.charCodeAt(0) - 97;
    }
    if (isUpper(c)) {
      return 26 + c.charCodeAt(0) - 65;
    }
    if (isDigit(c)) {
      return 52 + c.charCodeAt(0) - 48;
    }
    if (c === this.specialChar1) {
      return 62;
    }
    if (c === this.specialChar2) {
      return 63;
    }
    throw new EncodeError(`Unsupported character '${c}' for LOWER_UPPER_DIGIT_SPECIAL`);
  }

  private ludsChar(value: number): string {
    if (value <= 25) {
      return String.fromCharCode(97 + value);
    }
    if (value <= 51) {
      return String.fromCharCode(65 + value - 26);
    }
    if (value <= 61) {
      return String.fromCharCode(48 + value - 52);
    }
    return value === 62 ? this.specialChar1 : this.specialChar2;
  }
}

/**
 * Converts lowerCamelCase to snake_case. Runs of capitals stay together,
 * so "userID" becomes "user_id".
 */
export function toSnakeCase(name: string): string {
  let out = "";
  for (let i = 0; i < name.length; i++) {
    const c = name[i];
    if (isUpper(c)) {
      if (i > 0) {
        const prevUpper = isUpper(name[i - 1]);
        const nextUpperOrEnd = i + 1 >= name.length || isUpper(name[i + 1]);
        if (!prevUpper || !nextUpperOrEnd) {
          out += "_";
        }
      }
      out += c.toLowerCase();
    } else {
      out += c;
    }
  }
  return out;
}

/**
 * Converts snake_case to lowerCamelCase.
 */
export function toCamelCase(name: string): string {
  return name.replace(/_([a-z0-9])/g, (_match, c: string) => c.toUpperCase());
}
