import { WIRE_SCALAR_PREFIX } from '../protocol/constants';
import { DecodePolicy } from '../types';

const HEX_DIGITS = /^\+?[0-9a-fA-F]+$/;
const U8_MAX = 0xffn;
const U32_MAX = 0xffff_ffffn;
const U64_MAX = 0xffff_ffff_ffff_ffffn;
const NUL = '\0';

export class FieldDecodeError extends Error {
  constructor(readonly index: number, readonly scalar: unknown) {
    super(`Malformed field element at index ${index}: ${JSON.stringify(scalar) ?? String(scalar)}`);
    this.name = 'FieldDecodeError';
  }
}

/**
 * Parse the digits after the first two characters of a scalar.
 * Numeric decoding does not check what those two characters are;
 * only character decoding insists on the `0x` prefix.
 */
function parseDigits(scalar: unknown, max: bigint): bigint | null {
  if (typeof scalar !== 'string' || scalar.length < 2) return null;
  const digits = scalar.substring(2);
  if (!HEX_DIGITS.test(digits)) return null;
  const value = BigInt(`0x${digits.replace(/^\+/, '')}`);
  return value <= max ? value : null;
}

function parseU8(scalar: unknown): number | null {
  const value = parseDigits(scalar, U8_MAX);
  return value === null ? null : Number(value);
}

function parseU64(scalar: unknown): bigint | null {
  return parseDigits(scalar, U64_MAX);
}

function parseChar(scalar: unknown): string | null {
  if (typeof scalar !== 'string' || !scalar.startsWith(WIRE_SCALAR_PREFIX)) return null;
  const value = parseDigits(scalar, U32_MAX);
  if (value === null) return null;
  const codePoint = Number(value);
  // Surrogate halves and values past U+10FFFF are not characters.
  if (codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) return null;
  return String.fromCodePoint(codePoint);
}

export function hexToU8(scalar: unknown): number {
  return parseU8(scalar) ?? 0;
}

export function hexToU64(scalar: unknown): bigint {
  return parseU64(scalar) ?? 0n;
}

export function hexToChar(scalar: unknown): string {
  return parseChar(scalar) ?? NUL;
}

/**
 * Inverse of string decoding: one wire scalar per code point.
 * Used by the CLI to build foreign-call inputs by hand.
 */
export function encodeString(text: string): string[] {
  return Array.from(text, ch => `${WIRE_SCALAR_PREFIX}${(ch.codePointAt(0) ?? 0).toString(16)}`);
}

/**
 * Decodes arrays of wire scalars element by element.
 * Output length always equals input length.
 */
export class FieldDecoder {
  constructor(private readonly policy: DecodePolicy = 'lenient') {}

  getPolicy(): DecodePolicy {
    return this.policy;
  }

  /** Each scalar is one code point; the results are concatenated in order. */
  decodeString(scalars: readonly unknown[]): string {
    return this.decodeAll(scalars, parseChar, NUL).join('');
  }

  decodeBytes(scalars: readonly unknown[]): number[] {
    return this.decodeAll(scalars, parseU8, 0);
  }

  decodeU64s(scalars: readonly unknown[]): bigint[] {
    return this.decodeAll(scalars, parseU64, 0n);
  }

  private decodeAll<T>(scalars: readonly unknown[], parse: (scalar: unknown) => T | null, sentinel: T): T[] {
    return scalars.map((scalar, index) => {
      const value = parse(scalar);
      if (value !== null) return value;
      if (this.policy === 'strict') throw new FieldDecodeError(index, scalar);
      return sentinel;
    });
  }
}
