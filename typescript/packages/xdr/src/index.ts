// XDR (External Data Representation) codec.
//
// Shape-driven encoding and decoding of fixed-width big-endian numerics,
// padded text, counted sequences, structs, enums and discriminated unions.

export type { ByteSink, ByteSource } from "./binary/bytes.ts";
export { BufferSink, BufferSource } from "./binary/bytes.ts";
export type { PaddingPolicy } from "./binary/padding.ts";
export { framedLength, paddingFor } from "./binary/padding.ts";

export type {
  EnumShape,
  EnumVariant,
  IntegerKind,
  MapShape,
  OpaqueShape,
  OptionShape,
  PrimitiveKind,
  PrimitiveShape,
  RefShape,
  Shape,
  ShapeKind,
  ShapeRegistry,
  StringShape,
  StructShape,
  TupleShape,
  UnionArm,
  UnionDefaultArm,
  UnionShape,
  UnionValue,
  VecShape,
  Width,
} from "./schema.ts";
export { INTEGER_LAYOUTS, describeShape, resolveShape } from "./schema.ts";

export type { ArmResolution } from "./discriminant.ts";
export { DiscriminantTable, EnumTable, parseNumericName } from "./discriminant.ts";
export { defineEnum } from "./enum.ts";

export type { XdrErrorKind, XdrErrorOptions, XdrResult } from "./errors.ts";
export { XdrError, XdrErrorCode, ioError } from "./errors.ts";

export type { Logger } from "./logging.ts";
export { createLogger, isEnabled, silentLogger } from "./logging.ts";

export type { CodecOptions, ResolvedCodecOptions } from "./options.ts";
export { DEFAULT_CODEC_OPTIONS, resolveOptions } from "./options.ts";

export type { XdrEncodable } from "./encoder.ts";
export { XdrEncoder } from "./encoder.ts";
export type { SequenceStep, XdrDecodable } from "./decoder.ts";
export { SequenceCursor, XdrDecoder } from "./decoder.ts";

export type { Decoded } from "./codec.ts";
export {
  decodeAny,
  decodeDecodable,
  decodeFrom,
  decodeFromBytes,
  encodeEncodable,
  encodeTo,
  encodeToBytes,
  tryDecodeFromBytes,
} from "./codec.ts";
