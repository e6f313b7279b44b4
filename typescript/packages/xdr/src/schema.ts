// Shape types: the runtime description of a value's structure.
//
// XDR is not self-describing, so every encode and decode is driven by a
// shape supplied by the caller. Shapes cover:
// - Primitive types (bool, fixed-width integers, floats, char, void)
// - Text (length-prefixed, zero-padded)
// - Sequences (count-prefixed)
// - Composite types (struct, tuple, enum, union)
// - Type references (ref) for sharing and recursive types
// - Shapes the format admits but this engine refuses (option, opaque, map)

import { XdrError, XdrErrorCode } from "./errors.ts";

// ============================================================================
// Primitive Shapes
// ============================================================================

/** Fixed-width integer kinds. */
export type IntegerKind = "u8" | "i8" | "u16" | "i16" | "u32" | "i32" | "u64" | "i64";

/** Primitive kinds that map to a fixed number of wire bytes. */
export type PrimitiveKind = IntegerKind | "bool" | "f32" | "f64" | "char" | "void";

export interface PrimitiveShape {
  kind: PrimitiveKind;
}

/** Byte width of an integer or float on the wire. */
export type Width = 1 | 2 | 4 | 8;

export interface IntegerLayout {
  width: Width;
  signed: boolean;
}

export const INTEGER_LAYOUTS: Readonly<Record<IntegerKind, IntegerLayout>> = {
  u8: { width: 1, signed: false },
  i8: { width: 1, signed: true },
  u16: { width: 2, signed: false },
  i16: { width: 2, signed: true },
  u32: { width: 4, signed: false },
  i32: { width: 4, signed: true },
  u64: { width: 8, signed: false },
  i64: { width: 8, signed: true },
};

// ============================================================================
// Text and Sequences
// ============================================================================

/** Text: u32 length, one byte per character, zero padding to 4 bytes. */
export interface StringShape {
  kind: "string";
}

/** Variable-length sequence: u32 count followed by the elements. */
export interface VecShape {
  kind: "vec";
  element: Shape;
}

// ============================================================================
// Composite Shapes
// ============================================================================

/** Struct with named fields. */
export interface StructShape {
  kind: "struct";
  /** Fields in declaration order. Order is significant for encoding! */
  fields: Record<string, Shape>;
}

/**
 * Fixed-size group of unnamed elements.
 *
 * Encoded by concatenating elements in order (no count prefix).
 */
export interface TupleShape {
  kind: "tuple";
  elements: Shape[];
}

/** A named enum variant and its declared wire value. */
export interface EnumVariant {
  name: string;
  value: number;
}

/**
 * Enum without payloads. The wire value is a signed 32-bit integer equal to
 * the variant's declared value, not its position.
 */
export interface EnumShape {
  kind: "enum";
  /** Used in error messages */
  name?: string;
  variants: EnumVariant[];
}

/** One arm of a discriminated union. */
export interface UnionArm {
  name: string;

  /**
   * Wire selector for this arm. When omitted, the name itself must be an
   * unsigned decimal integer ("0", "7", ...) and is parsed as the selector.
   */
  discriminant?: number;

  /** Payload carried by this arm; null or omitted for a void arm. */
  payload?: Shape | null;
}

/** The catch-all arm of a union, taken for any selector no arm claims. */
export interface UnionDefaultArm {
  name: string;
  payload?: Shape | null;
}

/**
 * Discriminated union: u32 arm selector, then the selected arm's payload.
 *
 * Decoded values look like `{ tag: "Ok", value: ... }`. A value decoded
 * through the default arm also carries the `selector` seen on the wire.
 */
export interface UnionShape {
  kind: "union";
  name?: string;
  arms: UnionArm[];
  default?: UnionDefaultArm;
}

/** In-memory form of a union value. */
export interface UnionValue {
  tag: string;
  value?: unknown;
  selector?: number;
}

// ============================================================================
// Reference Shape
// ============================================================================

/**
 * Reference to a named shape defined in a {@link ShapeRegistry}.
 *
 * Used to share a struct between several parents and to describe
 * recursive types (a tree whose children are a `vec` of itself).
 */
export interface RefShape {
  kind: "ref";
  name: string;
}

// ============================================================================
// Unsupported Shapes
// ============================================================================

// XDR has optional-data, opaque and map-like encodings, but this engine
// does not implement them. The kinds exist so that asking for one fails
// with a clear error instead of being silently misread.

export interface OptionShape {
  kind: "option";
  inner: Shape;
}

export interface OpaqueShape {
  kind: "opaque";
}

export interface MapShape {
  kind: "map";
  key: Shape;
  value: Shape;
}

// ============================================================================
// Union Type
// ============================================================================

export type Shape =
  | PrimitiveShape
  | StringShape
  | VecShape
  | StructShape
  | TupleShape
  | EnumShape
  | UnionShape
  | RefShape
  | OptionShape
  | OpaqueShape
  | MapShape;

export type ShapeKind = Shape["kind"];

// ============================================================================
// Shape Registry
// ============================================================================

/** Named shapes, used to resolve {@link RefShape}. */
export type ShapeRegistry = Map<string, Shape>;

/**
 * Resolve a shape, following a ref one level.
 *
 * The resolved shape may itself contain refs; those are resolved when the
 * walk reaches them.
 */
export function resolveShape(shape: Shape, registry: ShapeRegistry): Shape {
  if (shape.kind !== "ref") return shape;
  const resolved = registry.get(shape.name);
  if (!resolved) {
    throw new XdrError(XdrErrorCode.UNKNOWN_REF, `unknown shape ref: ${shape.name}`);
  }
  if (resolved.kind === "ref") {
    throw new XdrError(XdrErrorCode.UNKNOWN_REF, `shape ref ${shape.name} points at another ref`);
  }
  return resolved;
}

/** Short human-readable form of a shape for logs and errors. */
export function describeShape(shape: Shape): string {
  switch (shape.kind) {
    case "struct":
      return `struct { ${Object.keys(shape.fields).join(", ")} }`;
    case "tuple":
      return `tuple(${shape.elements.length} elements)`;
    case "enum":
      return shape.name ?? `enum { ${shape.variants.map((v) => v.name).join(" | ")} }`;
    case "union":
      return shape.name ?? `union { ${shape.arms.map((a) => a.name).join(" | ")} }`;
    case "vec":
      return `vec<${describeShape(shape.element)}>`;
    case "option":
      return `option<${describeShape(shape.inner)}>`;
    case "map":
      return `map<${describeShape(shape.key)}, ${describeShape(shape.value)}>`;
    case "ref":
      return shape.name;
    default:
      return shape.kind;
  }
}
