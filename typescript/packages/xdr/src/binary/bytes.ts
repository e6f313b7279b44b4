// In-memory byte sinks and sources.

/** Append-only destination for encoded bytes. May throw; the engine reports it as an I/O failure. */
export interface ByteSink {
  write(bytes: Uint8Array): void;
}

/**
 * Sequential origin of encoded bytes.
 *
 * `read(n)` returns exactly `n` bytes or throws. A shorter result is
 * treated by the engine as an I/O failure.
 */
export interface ByteSource {
  read(length: number): Uint8Array;
}

/** Growable in-memory sink. */
export class BufferSink implements ByteSink {
  private buffer: Uint8Array;
  private position = 0;

  constructor(initialSize = 256) {
    this.buffer = new Uint8Array(Math.max(initialSize, 1));
  }

  get length(): number {
    return this.position;
  }

  write(bytes: Uint8Array): void {
    this.grow(bytes.length);
    this.buffer.set(bytes, this.position);
    this.position += bytes.length;
  }

  /** Copy of everything written so far. */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.position);
  }

  private grow(n: number): void {
    if (this.position + n <= this.buffer.length) return;
    let capacity = this.buffer.length;
    while (capacity < this.position + n) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.buffer.subarray(0, this.position));
    this.buffer = next;
  }
}

/** Source over a byte array. */
export class BufferSource implements ByteSource {
  private offset = 0;

  constructor(private readonly buffer: Uint8Array) {}

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  read(length: number): Uint8Array {
    if (length > this.remaining) {
      throw new Error(`unexpected end of input: need ${length} bytes, have ${this.remaining}`);
    }
    const out = this.buffer.subarray(this.offset, this.offset + length);
    this.offset += length;
    return out;
  }
}
