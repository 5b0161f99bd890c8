/**
 * Integer helpers shared by the compiler and the value container.
 *
 * All bit arithmetic is done on bigint so widths are not limited to 53 bits.
 */

import { BitfieldTypeError, BitfieldValueError } from "./errors.js";

/**
 * Number of bits needed to represent |value| (0 for 0)
 */
export function bitLength(value: bigint): number {
  const magnitude = value < 0n ? -value : value;
  return magnitude === 0n ? 0 : magnitude.toString(2).length;
}

/**
 * All-ones mask of the given width
 */
export function onesMask(width: number): bigint {
  return (1n << BigInt(width)) - 1n;
}

/**
 * Mask covering bits [start, end)
 */
export function spanMask(start: number, end: number): bigint {
  return (1n << BigInt(end)) - (1n << BigInt(start));
}

/**
 * Coerce an integer-typed value to bigint.
 *
 * @param what - Used in the error message ("value", "operand", ...)
 * @throws BitfieldTypeError for anything but a safe integer number or a bigint
 */
export function toBigInt(value: unknown, what: string): bigint {
  if (typeof value === "bigint") {
    return value;
  }
  if (typeof value === "number" && Number.isSafeInteger(value)) {
    return BigInt(value);
  }
  throw new BitfieldTypeError(`Bitfield ${what} must be an integer, got ${describeValue(value)}`);
}

/**
 * Short description of an arbitrary value for error messages
 */
export function describeValue(value: unknown): string {
  if (typeof value === "bigint") return `${value}n`;
  if (typeof value === "string") return JSON.stringify(value);
  if (value === null) return "null";
  if (Array.isArray(value)) return `array(${value.length})`;
  if (value instanceof Uint8Array) return `Uint8Array(${value.length})`;
  if (typeof value === "object") return "object";
  return String(value);
}

const PREFIXES: Record<string, number> = {
  "0x": 16,
  "0o": 8,
  "0b": 2,
};

/**
 * Parse a numeral string in the given base.
 *
 * Accepts surrounding whitespace, an optional sign, a `0x`/`0o`/`0b` prefix
 * matching the base (base 0 picks the base from the prefix, decimal without
 * one), and single underscores between digits.
 *
 * @throws BitfieldValueError for an unsupported base or a malformed numeral
 */
export function parseInteger(text: string, base: number = 10): bigint {
  if (!Number.isInteger(base) || base === 1 || base < 0 || base > 36) {
    throw new BitfieldValueError(`Base must be 0 or between 2 and 36, got ${base}`);
  }

  let body = text.trim().toLowerCase();
  let negative = false;
  if (body.startsWith("-") || body.startsWith("+")) {
    negative = body.startsWith("-");
    body = body.slice(1);
  }

  const prefixBase = PREFIXES[body.slice(0, 2)];
  if (prefixBase !== undefined && (base === 0 || base === prefixBase)) {
    base = prefixBase;
    body = body.slice(2);
  } else if (base === 0) {
    base = 10;
  }

  if (!/^[0-9a-z]+(_[0-9a-z]+)*$/.test(body)) {
    throw new BitfieldValueError(`Invalid numeral for base ${base}: ${JSON.stringify(text)}`);
  }

  const radix = BigInt(base);
  let result = 0n;
  for (const char of body) {
    if (char === "_") continue;
    const digit = parseInt(char, 36);
    if (digit >= base) {
      throw new BitfieldValueError(`Invalid numeral for base ${base}: ${JSON.stringify(text)}`);
    }
    result = result * radix + BigInt(digit);
  }

  return negative ? -result : result;
}

/**
 * Read a byte sequence as one big-endian unsigned integer (no reordering)
 */
export function bytesToBigInt(bytes: Uint8Array): bigint {
  let result = 0n;
  for (const byte of bytes) {
    result = (result << 8n) | BigInt(byte);
  }
  return result;
}

/**
 * Zero-padded hexadecimal digits of a non-negative value
 */
export function toHex(value: bigint, digits: number): string {
  return value.toString(16).toUpperCase().padStart(digits, "0");
}

/**
 * Zero-padded binary digits of a non-negative value
 */
export function toBinary(value: bigint, digits: number): string {
  return value.toString(2).padStart(digits, "0");
}
