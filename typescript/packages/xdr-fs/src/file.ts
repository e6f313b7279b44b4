// File-descriptor sinks and sources.
//
// Synchronous, so a file can be handed to the same encode and decode
// entry points as an in-memory buffer.

import fs from "node:fs";
import {
  XdrError,
  XdrErrorCode,
  createLogger,
  decodeFrom,
  encodeTo,
  type ByteSink,
  type ByteSource,
  type CodecOptions,
  type Decoded,
  type Shape,
} from "@xdrkit/xdr";

const logger = createLogger("xdr:fs");

/**
 * Writes encoded bytes to an open file descriptor.
 *
 * Partial writes are retried until every byte is on its way; the
 * descriptor is not closed.
 */
export class FileSink implements ByteSink {
  private written = 0;

  constructor(private readonly fd: number) {}

  /** Bytes written through this sink. */
  get bytesWritten(): number {
    return this.written;
  }

  write(bytes: Uint8Array): void {
    let offset = 0;
    while (offset < bytes.length) {
      offset += fs.writeSync(this.fd, bytes, offset, bytes.length - offset);
    }
    this.written += bytes.length;
  }
}

/**
 * Reads encoded bytes from an open file descriptor, from its current
 * position onwards.
 */
export class FileSource implements ByteSource {
  private position = 0;

  constructor(private readonly fd: number) {}

  /** Bytes read through this source. */
  get bytesRead(): number {
    return this.position;
  }

  /**
   * Read exactly `length` bytes.
   *
   * @throws Error when the file ends first
   */
  read(length: number): Uint8Array {
    const out = new Uint8Array(length);
    let filled = 0;
    while (filled < length) {
      const n = fs.readSync(this.fd, out, filled, length - filled, null);
      if (n === 0) {
        throw new Error(`unexpected end of file: need ${length} bytes, have ${filled}`);
      }
      filled += n;
    }
    this.position += length;
    return out;
  }
}

/**
 * Encode `value` into the file at `path`, replacing its contents.
 *
 * @returns Number of bytes written
 */
export function encodeToFile(path: string, value: unknown, shape: Shape, options: CodecOptions = {}): number {
  const fd = openFile(path, "w");
  try {
    const written = encodeTo(value, shape, new FileSink(fd), options);
    logger.log(`wrote ${written} bytes to ${path}`, { path, bytes: written });
    return written;
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Decode one value of `shape` from the start of the file at `path`.
 *
 * With `exact` set, bytes left after the value fail with TRAILING_BYTES.
 */
export function decodeFromFile(path: string, shape: Shape, options: CodecOptions = {}): Decoded<unknown> {
  const fd = openFile(path, "r");
  try {
    const decoded = decodeFrom(new FileSource(fd), shape, options);
    if (options.exact ?? false) {
      const size = fs.fstatSync(fd).size;
      if (size !== decoded.bytesConsumed) {
        const trailing = size - decoded.bytesConsumed;
        throw new XdrError(XdrErrorCode.TRAILING_BYTES, `${trailing} trailing bytes in ${path}`, {
          offset: decoded.bytesConsumed,
        });
      }
    }
    logger.log(`read ${decoded.bytesConsumed} bytes from ${path}`, { path, bytes: decoded.bytesConsumed });
    return decoded;
  } finally {
    fs.closeSync(fd);
  }
}

function openFile(path: string, flags: "r" | "w"): number {
  try {
    return fs.openSync(path, flags);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new XdrError(XdrErrorCode.IO, `open ${path} failed: ${reason}`, { cause: e });
  }
}
