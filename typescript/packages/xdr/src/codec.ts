// Top-level entry points: one encoder or decoder session per call.

import { BufferSink, BufferSource, type ByteSink, type ByteSource } from "./binary/bytes.ts";
import { XdrDecoder, type XdrDecodable } from "./decoder.ts";
import { XdrEncoder, type XdrEncodable } from "./encoder.ts";
import { XdrError, XdrErrorCode, type XdrResult } from "./errors.ts";
import type { Logger } from "./logging.ts";
import { resolveOptions, type CodecOptions } from "./options.ts";
import { describeShape, type Shape } from "./schema.ts";

export interface Decoded<T> {
  value: T;
  bytesConsumed: number;
}

/**
 * Encode `value` into `sink`.
 *
 * @returns Number of bytes written
 */
export function encodeTo(value: unknown, shape: Shape, sink: ByteSink, options: CodecOptions = {}): number {
  const resolved = resolveOptions(options);
  const encoder = new XdrEncoder(sink, resolved);
  return traced(resolved.logger, "encode", describeShape(shape), () => {
    encoder.encode(value, shape);
    return encoder.bytesWritten;
  });
}

/** Encode `value` into a new byte array. */
export function encodeToBytes(value: unknown, shape: Shape, options: CodecOptions = {}): Uint8Array {
  const sink = new BufferSink();
  encodeTo(value, shape, sink, options);
  return sink.toBytes();
}

/** Encode a value that writes itself. */
export function encodeEncodable(value: XdrEncodable, options: CodecOptions = {}): Uint8Array {
  const resolved = resolveOptions(options);
  const sink = new BufferSink();
  const encoder = new XdrEncoder(sink, resolved);
  traced(resolved.logger, "encode", value.constructor.name, () => {
    value.encodeXdr(encoder);
    return encoder.bytesWritten;
  });
  return sink.toBytes();
}

/**
 * Decode one value of `shape` from `source`.
 *
 * `bytesConsumed` counts everything pulled from the source, padding
 * included, so callers can check it against an outer frame length.
 */
export function decodeFrom(source: ByteSource, shape: Shape, options: CodecOptions = {}): Decoded<unknown> {
  const resolved = resolveOptions(options);
  const decoder = new XdrDecoder(source, resolved);
  const value = traced(resolved.logger, "decode", describeShape(shape), () => decoder.decode(shape), () => decoder.bytesConsumed);
  return { value, bytesConsumed: decoder.bytesConsumed };
}

/**
 * Decode one value of `shape` from a byte array.
 *
 * @throws XdrError TRAILING_BYTES when `exact` is set and bytes are left over
 */
export function decodeFromBytes(bytes: Uint8Array, shape: Shape, options: CodecOptions = {}): Decoded<unknown> {
  const decoded = decodeFrom(new BufferSource(bytes), shape, options);
  if ((options.exact ?? false) && decoded.bytesConsumed !== bytes.length) {
    throw new XdrError(
      XdrErrorCode.TRAILING_BYTES,
      `${bytes.length - decoded.bytesConsumed} trailing bytes after ${describeShape(shape)}`,
      { offset: decoded.bytesConsumed },
    );
  }
  return decoded;
}

/**
 * Like {@link decodeFromBytes}, but returns failures instead of throwing.
 *
 * Only XdrErrors are captured; anything else (a bug, not bad bytes) is
 * rethrown.
 */
export function tryDecodeFromBytes(bytes: Uint8Array, shape: Shape, options: CodecOptions = {}): XdrResult<unknown> {
  try {
    const { value, bytesConsumed } = decodeFromBytes(bytes, shape, options);
    return { ok: true, value, bytesConsumed };
  } catch (e) {
    if (e instanceof XdrError) return { ok: false, error: e };
    throw e;
  }
}

/** Decode a type that reads itself. */
export function decodeDecodable<T>(type: XdrDecodable<T>, bytes: Uint8Array, options: CodecOptions = {}): Decoded<T> {
  const resolved = resolveOptions(options);
  const decoder = new XdrDecoder(new BufferSource(bytes), resolved);
  const value = traced(resolved.logger, "decode", "decodable", () => type.decodeXdr(decoder), () => decoder.bytesConsumed);
  return { value, bytesConsumed: decoder.bytesConsumed };
}

/**
 * Decode without a shape. Always fails: XDR carries no type information.
 */
export function decodeAny(source: ByteSource, options: CodecOptions = {}): never {
  return new XdrDecoder(source, options).decodeAny();
}

// ============================================================================
// Tracing
// ============================================================================

/**
 * Run one session, logging start and outcome with timing.
 *
 * `bytes` reports the byte count for a successful session; without it the
 * session's own result is taken as the count.
 */
function traced<T>(logger: Logger, op: string, shape: string, run: () => T, bytes?: () => number): T {
  if (!logger.enabled()) return run();

  const start = performance.now();
  logger.log(`→ ${op} ${shape}`, { type: "request", op, shape });
  try {
    const result = run();
    const duration = performance.now() - start;
    const count = bytes ? bytes() : result;
    logger.log(`← ${op}: ✓ ${duration.toFixed(2)}ms`, { type: "response", op, ok: true, bytes: count });
    return result;
  } catch (e) {
    const duration = performance.now() - start;
    const logObj: Record<string, unknown> = { type: "response", op, ok: false };
    if (e instanceof XdrError) {
      logObj.errorCode = e.code;
      logObj.error = e.message;
    } else if (e instanceof Error) {
      logObj.error = { name: e.name, message: e.message };
    } else {
      logObj.error = e;
    }
    logger.log(`← ${op}: ✗ ${duration.toFixed(2)}ms`, logObj);
    throw e;
  }
}
