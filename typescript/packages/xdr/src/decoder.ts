/**
 * XDR decoder.
 *
 * Mirror of the encoder: pulls framed bytes from a source and rebuilds the
 * value the caller's shape describes, counting every byte it consumes.
 */

import type { ByteSource } from "./binary/bytes.ts";
import { decodeFloat, decodeInteger } from "./binary/numeric.ts";
import { paddingFor } from "./binary/padding.ts";
import { decodeSingleByteText } from "./binary/text.ts";
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

// ============================================================================
// Sequence countdown
// ============================================================================

type SequenceState =
  | { kind: "unstarted" }
  | { kind: "remaining"; length: number; left: number }
  | { kind: "done"; length: number };

export type SequenceStep<T> = { done: false; value: T; index: number } | { done: true; length: number };

/**
 * Pulls the elements of one sequence, one call at a time.
 *
 * The u32 count is read on the first `next()`; each later call decrements
 * it, and once it reaches zero every call reports the end of the sequence.
 */
export class SequenceCursor {
  private state: SequenceState = { kind: "unstarted" };

  constructor(private readonly decoder: XdrDecoder) {}

  /** Elements still to read, or undefined before the count is read. */
  get remaining(): number | undefined {
    switch (this.state.kind) {
      case "unstarted":
        return undefined;
      case "remaining":
        return this.state.left;
      case "done":
        return 0;
    }
  }

  get done(): boolean {
    return this.state.kind === "done";
  }

  next<T>(readElement: (index: number) => T): SequenceStep<T> {
    if (this.state.kind === "unstarted") {
      const length = this.decoder.readLength();
      this.state = length === 0 ? { kind: "done", length } : { kind: "remaining", length, left: length };
    }
    if (this.state.kind === "done") {
      return { done: true, length: this.state.length };
    }

    const { length, left } = this.state;
    const index = length - left;
    this.state = left === 1 ? { kind: "done", length } : { kind: "remaining", length, left: left - 1 };
    return { done: false, value: readElement(index), index };
  }
}

// ============================================================================
// Decoder
// ============================================================================

/**
 * Reads one top-level value from a source. Create one per decode session.
 */
export class XdrDecoder {
  readonly options: ResolvedCodecOptions;
  private consumed = 0;
  private readonly path = new TraversalPath();

  constructor(
    private readonly source: ByteSource,
    options: CodecOptions = {},
  ) {
    this.options = resolveOptions(options);
  }

  /** Bytes pulled from the source so far, padding included. */
  get bytesConsumed(): number {
    return this.consumed;
  }

  // --- Primitive Types ---

  /** Read a fixed-width big-endian integer. Width 8 yields a bigint. */
  readInteger(width: 8, signed: boolean): bigint;
  readInteger(width: 1 | 2 | 4, signed: boolean): number;
  readInteger(width: Width, signed: boolean): number | bigint;
  readInteger(width: Width, signed: boolean): number | bigint {
    return decodeInteger(this.pull(width), width, signed);
  }

  /** Read a 4-byte float or 8-byte double. */
  readFloat(width: 4 | 8): number {
    return decodeFloat(this.pull(width), width);
  }

  /**
   * Read a one-byte boolean.
   *
   * @throws XdrError INVALID_BOOL for any byte other than 0 or 1
   */
  readBool(): boolean {
    const byte = this.readInteger(1, false);
    if (byte === 0) return false;
    if (byte === 1) return true;
    throw new XdrError(XdrErrorCode.INVALID_BOOL, `invalid u8 ${byte} when decoding bool, 0 or 1 needed`);
  }

  /** Read a single one-byte character. */
  readChar(): string {
    return String.fromCharCode(this.readInteger(1, false));
  }

  /**
   * Read a u32 length or count prefix.
   *
   * @throws XdrError LENGTH_LIMIT when above the configured maxLength
   */
  readLength(): number {
    const length = this.readInteger(4, false);
    const max = this.options.maxLength;
    if (max !== undefined && length > max) {
      throw new XdrError(XdrErrorCode.LENGTH_LIMIT, `length prefix ${length} exceeds maxLength ${max}`);
    }
    return length;
  }

  // --- Text ---

  /** Read u32 length, that many one-byte characters, then skip the padding. */
  readText(): string {
    const length = this.readLength();
    const text = decodeSingleByteText(this.pull(length));
    const pad = this.pull(paddingFor(length, this.options.padding));
    if (this.options.strictPadding && pad.some((b) => b !== 0)) {
      throw new XdrError(XdrErrorCode.NON_ZERO_PADDING, `non-zero padding after text of length ${length}`);
    }
    return text;
  }

  // --- Compound Types ---

  /** Start pulling a sequence element by element. */
  beginSequence(): SequenceCursor {
    return new SequenceCursor(this);
  }

  /** Read a whole sequence. */
  readSequence<T>(readElement: (index: number) => T): T[] {
    const cursor = this.beginSequence();
    const items: T[] = [];
    for (let step = cursor.next(readElement); !step.done; step = cursor.next(readElement)) {
      items.push(step.value);
    }
    return items;
  }

  /**
   * Call each field reader in order. The field list comes from the
   * caller's type, never from the wire.
   */
  readStruct(readFields: Record<string, () => unknown>): Record<string, unknown> {
    const obj: Record<string, unknown> = {};
    for (const [name, readField] of Object.entries(readFields)) {
      obj[name] = readField();
    }
    return obj;
  }

  /**
   * Read an i32 ordinal and map it to a declared variant.
   *
   * @returns The variant name
   * @throws XdrError UNKNOWN_ENUM for an undeclared ordinal
   */
  readEnum(shape: EnumShape): string {
    const ordinal = this.readInteger(4, true);
    const table = EnumTable.for(shape);
    const variant = table.variantForOrdinal(ordinal);
    if (!variant) {
      throw new XdrError(
        XdrErrorCode.UNKNOWN_ENUM,
        `unknown ${shape.name ?? "enum"} value: ${ordinal} (valid: ${table.describe()})`,
      );
    }
    return variant.name;
  }

  /**
   * Read a u32 arm selector, resolve it through the union's discriminant
   * table and decode the chosen arm's payload.
   *
   * @throws XdrError BAD_UNION_INDEX when no arm matches and there is no
   *   default arm
   */
  readUnion(shape: UnionShape): UnionValue {
    const selector = this.readInteger(4, false);
    const resolution = DiscriminantTable.for(shape).resolve(selector);

    const { arm } = resolution;
    const result: UnionValue = { tag: arm.name };
    if (resolution.kind === "default") {
      result.selector = resolution.selector;
    }
    if (arm.payload && arm.payload.kind !== "void") {
      result.value = this.child(arm.name, arm.payload);
    }
    return result;
  }

  // --- Unsupported ---

  readOption(_inner: Shape): never {
    throw unsupported("option");
  }

  readOpaque(): never {
    throw unsupported("opaque");
  }

  readMap(_key: Shape, _value: Shape): never {
    throw unsupported("map");
  }

  /** XDR carries no type tags, so there is nothing to decode without a shape. */
  decodeAny(): never {
    throw new XdrError(
      XdrErrorCode.SELF_DESCRIBING,
      "generic decode not implemented since XDR is not self describing; supply a shape",
    );
  }

  // --- Shape-driven Decoding ---

  /**
   * Decode a value described by `shape`.
   */
  decode(shape: Shape): unknown {
    try {
      return this.decodeResolved(resolveShape(shape, this.options.registry));
    } catch (e) {
      if (e instanceof XdrError) throw e.located(this.path.toString(), this.consumed);
      throw e;
    }
  }

  private decodeResolved(shape: Shape): unknown {
    switch (shape.kind) {
      case "bool":
        return this.readBool();
      case "f32":
        return this.readFloat(4);
      case "f64":
        return this.readFloat(8);
      case "char":
        return this.readChar();
      case "void":
        return null;
      case "string":
        return this.readText();
      case "vec":
        return this.readSequence((i) => this.child(`[${i}]`, shape.element));
      case "struct": {
        const readers: Record<string, () => unknown> = {};
        for (const [name, fieldShape] of Object.entries(shape.fields)) {
          readers[name] = () => this.child(name, fieldShape);
        }
        return this.readStruct(readers);
      }
      case "tuple":
        return shape.elements.map((element, i) => this.child(`${i}`, element));
      case "enum":
        return this.readEnum(shape);
      case "union":
        return this.readUnion(shape);
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
        return this.readInteger(width, signed);
      }
      default:
        throw new XdrError(XdrErrorCode.UNSUPPORTED_SHAPE, `unknown shape: ${JSON.stringify(shape)}`);
    }
  }

  private child(segment: string, shape: Shape): unknown {
    this.path.push(segment);
    const value = this.decode(shape);
    this.path.pop();
    return value;
  }

  private pull(length: number): Uint8Array {
    if (length === 0) return new Uint8Array(0);
    let bytes: Uint8Array;
    try {
      bytes = this.source.read(length);
    } catch (e) {
      throw ioError("read", e);
    }
    if (bytes.length !== length) {
      throw new XdrError(XdrErrorCode.IO, `short read: wanted ${length} bytes, got ${bytes.length}`);
    }
    this.consumed += length;
    return bytes;
  }
}

function unsupported(what: string): XdrError {
  return new XdrError(
    XdrErrorCode.UNSUPPORTED_SHAPE,
    `XDR decode not implemented for ${what}; decode it manually`,
  );
}

// ============================================================================
// Hand-written types
// ============================================================================

/**
 * Interface for types that decode themselves instead of supplying a shape.
 */
export interface XdrDecodable<T> {
  decodeXdr(decoder: XdrDecoder): T;
}
