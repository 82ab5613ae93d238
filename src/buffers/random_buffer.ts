import {
  assertValidOffset,
  InvalidOffsetError,
  ShortReadError,
} from "./buffer_errors.ts";

/**
 * Byte buffer with independent read and write offsets.
 *
 * Unlike {@link SeekBuffer}, writes land at the write offset and may overwrite
 * existing bytes, growing the buffer only when they run past its end. Reads are
 * strict: the read offset can never leave the content, and a read that cannot
 * be satisfied in full throws instead of returning a short count.
 *
 * @example
 * ```typescript
 * const buffer = RandomBuffer.withCapacity(16);
 * buffer.write(encode("header"));
 * buffer.seekWrite(0);
 * buffer.write(encode("H")); // content is now "Header"
 * ```
 */
export class RandomBuffer {
  #view: Uint8Array;
  #length = 0;
  #readOffset = 0;
  #writeOffset = 0;

  /**
   * Creates a buffer holding a copy of `initial`, with the write offset at its
   * end and the read offset at zero.
   */
  public constructor(initial?: Uint8Array) {
    this.#view = initial ? initial.slice() : new Uint8Array(0);
    this.#length = this.#view.length;
    this.#writeOffset = this.#length;
  }

  /** Creates an empty buffer with `capacity` bytes preallocated. */
  public static withCapacity(capacity: number): RandomBuffer {
    if (!Number.isSafeInteger(capacity) || capacity < 0) {
      throw new RangeError(
        `Capacity must be a non-negative integer. Got ${capacity}`,
      );
    }
    const buffer = new RandomBuffer();
    buffer.#view = new Uint8Array(capacity);
    return buffer;
  }

  /**
   * Adds `data` after the last byte and moves the write offset to the new
   * end.
   */
  public append(data: Uint8Array): void {
    this.#writeOffset = this.#length;
    this.write(data);
  }

  /**
   * Copies `data` at the write offset and advances it. Bytes already there are
   * overwritten; the buffer grows when the write runs past its end.
   */
  public write(data: Uint8Array): void {
    const end = this.#writeOffset + data.length;
    this.#ensureCapacity(end);
    this.#view.set(data, this.#writeOffset);
    this.#writeOffset = end;
    this.#length = Math.max(this.#length, end);
  }

  /**
   * Fills `target` completely from the read offset and advances it.
   *
   * @throws ShortReadError if fewer than `target.length` bytes remain. The
   * read offset does not move in that case.
   */
  public read(target: Uint8Array): void {
    const available = this.#length - this.#readOffset;
    if (target.length > available) {
      throw new ShortReadError(
        `Not enough bytes to read: need ${target.length} bytes but only ${available} available`,
        target.length,
        available,
      );
    }
    target.set(
      this.#view.subarray(this.#readOffset, this.#readOffset + target.length),
    );
    this.#readOffset += target.length;
  }

  /**
   * Moves the read offset. `offset` may equal the length but not exceed it.
   *
   * @throws InvalidOffsetError
   */
  public seek(offset: number): void {
    this.#assertInContent(offset);
    this.#readOffset = offset;
  }

  /**
   * Moves the write offset. `offset` may equal the length but not exceed it.
   *
   * @throws InvalidOffsetError
   */
  public seekWrite(offset: number): void {
    this.#assertInContent(offset);
    this.#writeOffset = offset;
  }

  public rewind(): void {
    this.#readOffset = 0;
  }

  /** Total number of content bytes. */
  public absLength(): number {
    return this.#length;
  }

  /** Bytes between the read offset and the end. */
  public unreadLength(): number {
    return this.#length - this.#readOffset;
  }

  public readOffset(): number {
    return this.#readOffset;
  }

  public writeOffset(): number {
    return this.#writeOffset;
  }

  /** Copy of the bytes from the read offset to the end. */
  public unreadBytes(): Uint8Array {
    return this.#view.slice(this.#readOffset, this.#length);
  }

  /** Allocated size of the backing storage. */
  public capacity(): number {
    return this.#view.length;
  }

  #assertInContent(offset: number): void {
    assertValidOffset(offset);
    if (offset > this.#length) {
      throw new InvalidOffsetError(
        `Offset ${offset} exceeds buffer length ${this.#length}`,
        offset,
      );
    }
  }

  #ensureCapacity(required: number): void {
    if (required <= this.#view.length) {
      return;
    }
    const grown = new Uint8Array(Math.max(required, this.#view.length * 2));
    grown.set(this.#view.subarray(0, this.#length));
    this.#view = grown;
  }
}
