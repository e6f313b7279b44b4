// Error model shared by the encoder and decoder.
//
// A single error class carries a code; the code determines whether the
// failure came from the byte sink/source, from bytes or values that violate
// the format, or from a shape this engine does not implement.

/** Error codes. */
export const XdrErrorCode = {
  /** The underlying sink or source failed */
  IO: "IO",
  /** Boolean byte other than 0 or 1 */
  INVALID_BOOL: "INVALID_BOOL",
  /** Enum ordinal not present in the declared variants */
  UNKNOWN_ENUM: "UNKNOWN_ENUM",
  /** Union selector not matched by any declared arm */
  BAD_UNION_INDEX: "BAD_UNION_INDEX",
  /** Numeric value does not fit the wire width */
  OUT_OF_RANGE: "OUT_OF_RANGE",
  /** Value does not have the type its shape asks for */
  TYPE_MISMATCH: "TYPE_MISMATCH",
  /** Padding after text contains a non-zero byte */
  NON_ZERO_PADDING: "NON_ZERO_PADDING",
  /** Length prefix exceeds the configured maximum */
  LENGTH_LIMIT: "LENGTH_LIMIT",
  /** Bytes left over after an exact decode */
  TRAILING_BYTES: "TRAILING_BYTES",
  /** Enum or union table cannot be built from its declaration */
  INCONSISTENT_TABLE: "INCONSISTENT_TABLE",
  /** Ref shape names a type missing from the registry */
  UNKNOWN_REF: "UNKNOWN_REF",
  /** Option, opaque or map shapes */
  UNSUPPORTED_SHAPE: "UNSUPPORTED_SHAPE",
  /** Decoding without a target shape */
  SELF_DESCRIBING: "SELF_DESCRIBING",
} as const;

export type XdrErrorCode = (typeof XdrErrorCode)[keyof typeof XdrErrorCode];

export type XdrErrorKind = "io" | "domain" | "unsupported";

export interface XdrErrorOptions {
  cause?: unknown;
  path?: string;
  offset?: number;
}

/**
 * Failure raised by any encode or decode operation.
 *
 * The whole top-level operation is aborted; there is no partial value.
 */
export class XdrError extends Error {
  readonly code: XdrErrorCode;
  /** Message without location suffix */
  readonly detail: string;
  /** Traversal path where the failure happened, e.g. `header.entries[2]` */
  readonly path: string | undefined;
  /** Bytes written or consumed when the failure happened */
  readonly offset: number | undefined;

  constructor(code: XdrErrorCode, detail: string, options: XdrErrorOptions = {}) {
    super(XdrError.format(detail, options.path, options.offset), { cause: options.cause });
    this.name = "XdrError";
    this.code = code;
    this.detail = detail;
    this.path = options.path;
    this.offset = options.offset;
  }

  get kind(): XdrErrorKind {
    return XdrError.kindOf(this.code);
  }

  /** The sink or source failed; the original error is in `cause` */
  isIoError(): boolean {
    return this.kind === "io";
  }

  /** The bytes or the value break the format rules */
  isDomainViolation(): boolean {
    return this.kind === "domain";
  }

  /** The shape asks for something this engine does not implement */
  isUnsupported(): boolean {
    return this.kind === "unsupported";
  }

  /** Copy of this error located at `path` and `offset`. Already-located errors are returned as is. */
  located(path: string, offset: number): XdrError {
    if (this.path !== undefined) return this;
    return new XdrError(this.code, this.detail, { cause: this.cause, path, offset });
  }

  static kindOf(code: XdrErrorCode): XdrErrorKind {
    switch (code) {
      case XdrErrorCode.IO:
        return "io";
      case XdrErrorCode.UNSUPPORTED_SHAPE:
      case XdrErrorCode.SELF_DESCRIBING:
        return "unsupported";
      default:
        return "domain";
    }
  }

  private static format(detail: string, path?: string, offset?: number): string {
    if (path === undefined) return detail;
    const at = offset === undefined ? path : `${path}, offset ${offset}`;
    return `${detail} (at ${at})`;
  }
}

/** Wrap whatever a sink or source threw as an I/O failure. */
export function ioError(operation: string, cause: unknown): XdrError {
  if (cause instanceof XdrError) return cause;
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new XdrError(XdrErrorCode.IO, `${operation} failed: ${reason}`, { cause });
}

/**
 * Outcome of a non-throwing entry point.
 */
export type XdrResult<T> = { ok: true; value: T; bytesConsumed: number } | { ok: false; error: XdrError };
