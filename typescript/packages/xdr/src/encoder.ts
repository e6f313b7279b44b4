/**
 * XDR encoder.
 *
 * Encoding rules:
 * - Integers: big-endian, 1/2/4/8 bytes, no padding
 * - Floats/Doubles: big-endian IEEE 754 (4/8 bytes)
 * - Booleans and chars: 1 byte
 * - Text: u32 length + one byte per character + zero padding
 * - Sequences: u32 count + elements
 * - Structs and tuples: elements in order, no framing
 * - Enums: i32 declared value
 * - Unions: u32 arm selector + arm payload
 */

import type { ByteSink } from "./binary/bytes.ts";
import { encodeFloat, encodeInteger } from "./binary/numeric.ts";
import { paddingFor, zeroPad } from "./binary/padding.ts";
import { encodeSingleByteText } from "./binary/text.ts";
import { DiscriminantTable, EnumTable } from "./discriminant.ts";
import { XdrError, XdrErrorCode, ioError } from "./errors.ts";
import { resolveOptions, type CodecOptions, type ResolvedCodecOptions } from "./options.ts";
import { TraversalPath } from "./path.ts";
import {
  INTEGER_LAYOUTS,
  describeShape,
  resolveShape,
  type EnumShape,
  type Shape,
  type UnionShape,
  type UnionValue,
  type Width,
} from "./schema.ts";

const U32_MAX = 0xffffffff;

/**
 * Writes one top-level value to a sink. Create one per encode session.
 */
export class XdrEncoder {
  readonly options: ResolvedCodecOptions;
  private written = 0;
  private readonly path = new TraversalPath();

  constructor(
    private readonly sink: ByteSink,
    options: CodecOptions = {},
  ) {
    this.options = resolveOptions(options);
  }

  /** Bytes handed to the sink so far. */
  get bytesWritten(): number {
    return this.written;
  }

  // --- Primitive Types ---

  /** Write a fixed-width big-endian integer. */
  writeInteger(width: Width, signed: boolean, value: number | bigint): void {
    this.push(encodeInteger(width, signed, value));
  }

  /** Write a 4-byte float or 8-byte double. */
  writeFloat(width: 4 | 8, value: number): void {
    this.push(encodeFloat(width, value));
  }

  /** Write a boolean as a single byte, 1 or 0. */
  writeBool(value: boolean): void {
    this.push(Uint8Array.of(value ? 1 : 0));
  }

  /** Write a single one-byte character. */
  writeChar(value: string): void {
    if (value.length !== 1) {
      throw new XdrError(XdrErrorCode.TYPE_MISMATCH, `char: expected one character, got ${value.length}`);
    }
    this.push(encodeSingleByteText(value));
  }

  // --- Text ---

  /** Write u32 length, one byte per character, then zero padding. */
  writeText(value: string): void {
    const bytes = encodeSingleByteText(value);
    this.writeLength(bytes.length);
    this.push(bytes);
    const pad = paddingFor(bytes.length, this.options.padding);
    if (pad > 0) this.push(zeroPad(pad));
  }

  // --- Compound Types ---

  /** Write a u32 count, then call `writeElement` once per element. */
  writeSequence(length: number, writeElement: (index: number) => void): void {
    this.writeLength(length);
    for (let i = 0; i < length; i++) {
      writeElement(i);
    }
  }

  /** Call each field writer in order. Structs carry no framing of their own. */
  writeStruct(...writeFields: Array<() => void>): void {
    for (const writeField of writeFields) {
      writeField();
    }
  }

  /** Write an enum ordinal as a signed 32-bit integer. */
  writeEnum(ordinal: number): void {
    this.writeInteger(4, true, ordinal);
  }

  /** Write a u32 arm selector, then the arm's payload if it has one. */
  writeUnion(selector: number, writePayload: (() => void) | null): void {
    this.writeInteger(4, false, selector);
    writePayload?.();
  }

  // --- Unsupported ---

  writeOption(_value: unknown): never {
    throw unsupported("option");
  }

  writeOpaque(_value: Uint8Array): never {
    throw unsupported("opaque");
  }

  writeMap(_value: Map<unknown, unknown>): never {
    throw unsupported("map");
  }

  // --- Shape-driven Encoding ---

  /**
   * Encode `value` as described by `shape`.
   *
   * The value is checked against the shape as it is walked; a mismatch
   * fails with TYPE_MISMATCH located at the offending path.
   */
  encode(value: unknown, shape: Shape): void {
    try {
      this.encodeResolved(value, resolveShape(shape, this.options.registry));
    } catch (e) {
      if (e instanceof XdrError) throw e.located(this.path.toString(), this.written);
      throw e;
    }
  }

  private encodeResolved(value: unknown, shape: Shape): void {
    switch (shape.kind) {
      case "bool":
        return this.writeBool(expectBoolean(value));
      case "f32":
        return this.writeFloat(4, expectNumber(value, "f32"));
      case "f64":
        return this.writeFloat(8, expectNumber(value, "f64"));
      case "char":
        return this.writeChar(expectString(value, "char"));
      case "void":
        if (value !== null && value !== undefined) {
          throw new XdrError(XdrErrorCode.TYPE_MISMATCH, `void: expected null, got ${typeof value}`);
        }
        return;
      case "string":
        return this.writeText(expectString(value, "string"));
      case "vec": {
        const items = expectArray(value, "vec");
        return this.writeSequence(items.length, (i) => this.child(`[${i}]`, items[i], shape.element));
      }
      case "struct": {
        const obj = expectRecord(value, "struct");
        for (const [name, fieldShape] of Object.entries(shape.fields)) {
          this.child(name, obj[name], fieldShape);
        }
        return;
      }
      case "tuple": {
        const items = expectArray(value, "tuple");
        if (items.length !== shape.elements.length) {
          throw new XdrError(
            XdrErrorCode.TYPE_MISMATCH,
            `tuple length mismatch: got ${items.length}, expected ${shape.elements.length}`,
          );
        }
        shape.elements.forEach((element, i) => this.child(`${i}`, items[i], element));
        return;
      }
      case "enum":
        return this.writeEnum(enumOrdinal(value, shape));
      case "union":
        return this.encodeUnion(value, shape);
      case "option":
      case "opaque":
      case "map":
        throw unsupported(describeShape(shape));
      case "ref":
        throw new XdrError(XdrErrorCode.UNKNOWN_REF, `unresolved shape ref: ${shape.name}`);
      case "u8":
      case "i8":
      case "u16":
      case "i16":
      case "u32":
      case "i32":
      case "u64":
      case "i64": {
        const { width, signed } = INTEGER_LAYOUTS[shape.kind];
        return this.writeInteger(width, signed, expectInteger(value, shape.kind));
      }
      default:
        throw new XdrError(XdrErrorCode.UNSUPPORTED_SHAPE, `unknown shape: ${JSON.stringify(shape)}`);
    }
  }

  private encodeUnion(value: unknown, shape: UnionShape): void {
    const union = expectUnionValue(value);
    const table = DiscriminantTable.for(shape);
    const selector = table.selectorFor(union.tag, union.selector);
    const index = table.indexOf(union.tag);
    const payload = index === undefined ? shape.default?.payload : shape.arms[index].payload;

    if (!payload || payload.kind === "void") {
      this.writeUnion(selector, null);
      return;
    }
    this.writeUnion(selector, () => this.child(union.tag, union.value, payload));
  }

  private child(segment: string, value: unknown, shape: Shape): void {
    this.path.push(segment);
    this.encode(value, shape);
    this.path.pop();
  }

  private writeLength(length: number): void {
    if (length > U32_MAX) {
      throw new XdrError(XdrErrorCode.OUT_OF_RANGE, `length ${length} does not fit in a u32 prefix`);
    }
    this.writeInteger(4, false, length);
  }

  private push(bytes: Uint8Array): void {
    try {
      this.sink.write(bytes);
    } catch (e) {
      throw ioError("write", e);
    }
    this.written += bytes.length;
  }
}

// ============================================================================
// Value narrowing
// ============================================================================

function mismatch(expected: string, value: unknown): XdrError {
  const got = value === null ? "null" : Array.isArray(value) ? "array" : typeof value;
  return new XdrError(XdrErrorCode.TYPE_MISMATCH, `expected ${expected}, got ${got}`);
}

function expectBoolean(value: unknown): boolean {
  if (typeof value !== "boolean") throw mismatch("bool", value);
  return value;
}

function expectNumber(value: unknown, kind: string): number {
  if (typeof value !== "number") throw mismatch(kind, value);
  return value;
}

function expectInteger(value: unknown, kind: string): number | bigint {
  if (typeof value !== "number" && typeof value !== "bigint") throw mismatch(kind, value);
  return value;
}

function expectString(value: unknown, kind: string): string {
  if (typeof value !== "string") throw mismatch(kind, value);
  return value;
}

function expectArray(value: unknown, kind: string): unknown[] {
  if (!Array.isArray(value)) throw mismatch(kind, value);
  return value;
}

function expectRecord(value: unknown, kind: string): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) throw mismatch(kind, value);
  return Object.fromEntries(Object.entries(value));
}

function expectUnionValue(value: unknown): UnionValue {
  const obj = expectRecord(value, "union { tag }");
  const { tag, selector } = obj;
  if (typeof tag !== "string") throw mismatch("union tag string", tag);
  if (selector !== undefined && typeof selector !== "number") throw mismatch("union selector number", selector);
  return { tag, value: obj.value, selector };
}

function enumOrdinal(value: unknown, shape: EnumShape): number {
  const table = EnumTable.for(shape);
  const label = shape.name ?? "enum";
  if (typeof value === "string") {
    const variant = table.variantForName(value);
    if (!variant) {
      throw new XdrError(XdrErrorCode.UNKNOWN_ENUM, `unknown ${label} variant: ${value} (valid: ${table.describe()})`);
    }
    return variant.value;
  }
  if (typeof value === "number") {
    if (!table.variantForOrdinal(value)) {
      throw new XdrError(XdrErrorCode.UNKNOWN_ENUM, `unknown ${label} value: ${value} (valid: ${table.describe()})`);
    }
    return value;
  }
  throw mismatch(`${label} variant name`, value);
}

function unsupported(what: string): XdrError {
  return new XdrError(
    XdrErrorCode.UNSUPPORTED_SHAPE,
    `XDR encode not implemented for ${what}; encode it manually`,
  );
}

// ============================================================================
// Hand-written types
// ============================================================================

/**
 * Interface for types that encode themselves instead of supplying a shape.
 */
export interface XdrEncodable {
  encodeXdr(encoder: XdrEncoder): void;
}
