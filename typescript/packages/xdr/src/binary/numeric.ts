// Fixed-width big-endian numerics.

import { XdrError, XdrErrorCode } from "../errors.ts";
import type { Width } from "../schema.ts";

interface Bounds {
  min: bigint;
  max: bigint;
}

function boundsOf(width: Width, signed: boolean): Bounds {
  const bits = BigInt(width * 8);
  if (signed) {
    return { min: -(1n << (bits - 1n)), max: (1n << (bits - 1n)) - 1n };
  }
  return { min: 0n, max: (1n << bits) - 1n };
}

function typeName(width: Width, signed: boolean): string {
  return `${signed ? "i" : "u"}${width * 8}`;
}

/**
 * Encode an integer as `width` big-endian bytes.
 *
 * Widths 1, 2 and 4 take a `number`; width 8 takes a `bigint` or a safe
 * integer `number`.
 *
 * @throws XdrError TYPE_MISMATCH for a non-integer, OUT_OF_RANGE when the
 *   value does not fit
 */
export function encodeInteger(width: Width, signed: boolean, value: number | bigint): Uint8Array {
  const name = typeName(width, signed);
  let big: bigint;
  if (typeof value === "bigint") {
    if (width !== 8) {
      throw new XdrError(XdrErrorCode.TYPE_MISMATCH, `${name}: expected a number, got bigint`);
    }
    big = value;
  } else {
    if (!Number.isSafeInteger(value)) {
      throw new XdrError(XdrErrorCode.TYPE_MISMATCH, `${name}: expected an integer, got ${value}`);
    }
    big = BigInt(value);
  }

  const { min, max } = boundsOf(width, signed);
  if (big < min || big > max) {
    throw new XdrError(XdrErrorCode.OUT_OF_RANGE, `${name}: ${big} is outside ${min}..${max}`);
  }

  const out = new Uint8Array(width);
  const view = new DataView(out.buffer);
  const n = Number(big);
  switch (width) {
    case 1:
      if (signed) view.setInt8(0, n);
      else view.setUint8(0, n);
      break;
    case 2:
      if (signed) view.setInt16(0, n);
      else view.setUint16(0, n);
      break;
    case 4:
      if (signed) view.setInt32(0, n);
      else view.setUint32(0, n);
      break;
    case 8:
      if (signed) view.setBigInt64(0, big);
      else view.setBigUint64(0, big);
      break;
  }
  return out;
}

/** Decode `bytes.length` big-endian bytes. Width 8 yields a bigint. */
export function decodeInteger(bytes: Uint8Array, width: Width, signed: boolean): number | bigint {
  const view = new DataView(bytes.buffer, bytes.byteOffset, width);
  switch (width) {
    case 1:
      return signed ? view.getInt8(0) : view.getUint8(0);
    case 2:
      return signed ? view.getInt16(0) : view.getUint16(0);
    case 4:
      return signed ? view.getInt32(0) : view.getUint32(0);
    case 8:
      return signed ? view.getBigInt64(0) : view.getBigUint64(0);
  }
}

/** Encode an IEEE-754 float (4 bytes) or double (8 bytes). */
export function encodeFloat(width: 4 | 8, value: number): Uint8Array {
  const out = new Uint8Array(width);
  const view = new DataView(out.buffer);
  if (width === 4) view.setFloat32(0, value);
  else view.setFloat64(0, value);
  return out;
}

export function decodeFloat(bytes: Uint8Array, width: 4 | 8): number {
  const view = new DataView(bytes.buffer, bytes.byteOffset, width);
  return width === 4 ? view.getFloat32(0) : view.getFloat64(0);
}
