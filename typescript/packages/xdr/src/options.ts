// Codec configuration.

import { PADDING_POLICIES, type PaddingPolicy } from "./binary/padding.ts";
import { createLogger, type Logger } from "./logging.ts";
import type { ShapeRegistry } from "./schema.ts";

export interface CodecOptions {
  /**
   * Padding after text. Defaults to "rfc4506" (no pad when the payload is
   * already a multiple of 4 bytes).
   */
  padding?: PaddingPolicy;

  /**
   * Reject non-zero padding bytes when decoding. Defaults to true.
   */
  strictPadding?: boolean;

  /**
   * Largest length or count prefix the decoder accepts. A prefix above it
   * fails before any of its payload is read. Defaults to no limit.
   */
  maxLength?: number;

  /**
   * Named shapes for `ref` lookups.
   */
  registry?: ShapeRegistry;

  /**
   * Require the decode entry points to consume the whole input. Defaults
   * to false; `bytesConsumed` is reported either way.
   */
  exact?: boolean;

  /**
   * Logger for entry point tracing. Defaults to the "xdr:codec" namespace.
   */
  logger?: Logger;
}

export interface ResolvedCodecOptions {
  padding: PaddingPolicy;
  strictPadding: boolean;
  maxLength: number | undefined;
  registry: ShapeRegistry;
  exact: boolean;
  logger: Logger;
}

export const DEFAULT_CODEC_OPTIONS = {
  padding: "rfc4506",
  strictPadding: true,
  exact: false,
} as const satisfies Partial<ResolvedCodecOptions>;

const defaultLogger = createLogger("xdr:codec");

/**
 * Fill in defaults and validate.
 *
 * @throws TypeError on an unknown padding policy or a bad maxLength
 */
export function resolveOptions(options: CodecOptions = {}): ResolvedCodecOptions {
  const padding = options.padding ?? DEFAULT_CODEC_OPTIONS.padding;
  if (!PADDING_POLICIES.includes(padding)) {
    throw new TypeError(`unknown padding policy: ${String(padding)}`);
  }

  const maxLength = options.maxLength;
  if (maxLength !== undefined && (!Number.isSafeInteger(maxLength) || maxLength < 0)) {
    throw new TypeError(`maxLength must be a non-negative integer, got ${maxLength}`);
  }

  return {
    padding,
    strictPadding: options.strictPadding ?? DEFAULT_CODEC_OPTIONS.strictPadding,
    maxLength,
    registry: options.registry ?? new Map(),
    exact: options.exact ?? DEFAULT_CODEC_OPTIONS.exact,
    logger: options.logger ?? defaultLogger,
  };
}
