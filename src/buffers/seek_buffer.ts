import { assertByte, assertValidOffset } from "./buffer_errors.ts";
import type {
  ISeekableBuffer,
  ReadResult,
  ReadUntilResult,
} from "./seekable_buffer.ts";

const INITIAL_CAPACITY = 64;
const textEncoder = new TextEncoder();

/**
 * Growable in-memory byte buffer with a single read cursor.
 *
 * Key features:
 * - Append-only content: bytes are only added by `write`/`append` and only
 *   dropped by `reset`/`close`.
 * - Random access: the cursor can be moved anywhere, including past the end.
 * - Owned storage: input is copied in and snapshots are copied out, so no
 *   caller ever aliases the backing array.
 *
 * @example
 * ```typescript
 * const buffer = SeekBuffer.fromString("line one\nline two");
 *
 * buffer.readUntil(0x0a); // { bytes: "line one\n", found: true }
 * buffer.seek(5);
 * buffer.read(new Uint8Array(3)); // { bytesRead: 3, endOfData: false }
 * ```
 */
export class SeekBuffer implements ISeekableBuffer {
  #view: Uint8Array;
  #size = 0;
  #cursor = 0;

  /**
   * Creates a buffer, optionally seeded with a copy of `initial`.
   *
   * @param initial Initial content.
   * @param cursor Initial cursor (default: 0).
   */
  public constructor(initial?: Uint8Array, cursor = 0) {
    this.#view = new Uint8Array(
      Math.max(INITIAL_CAPACITY, initial?.length ?? 0),
    );
    if (initial && initial.length > 0) {
      this.#view.set(initial);
      this.#size = initial.length;
    }
    assertValidOffset(cursor);
    this.#cursor = cursor;
  }

  /** Creates a buffer holding the UTF-8 encoding of `text`. */
  public static fromString(text: string): SeekBuffer {
    return new SeekBuffer(textEncoder.encode(text));
  }

  public write(data: Uint8Array): number {
    this.#ensureCapacity(this.#size + data.length);
    this.#view.set(data, this.#size);
    this.#size += data.length;
    return data.length;
  }

  public append(data: Uint8Array): void {
    this.write(data);
  }

  public read(target: Uint8Array): ReadResult {
    if (this.#cursor >= this.#size) {
      return { bytesRead: 0, endOfData: true };
    }
    const count = Math.min(target.length, this.#size - this.#cursor);
    target.set(this.#view.subarray(this.#cursor, this.#cursor + count));
    this.#cursor += count;
    return { bytesRead: count, endOfData: false };
  }

  public readUntil(delimiter: number): ReadUntilResult {
    assertByte(delimiter);
    if (this.#cursor >= this.#size) {
      return { bytes: new Uint8Array(0), found: false };
    }
    const unread = this.#view.subarray(this.#cursor, this.#size);
    const index = unread.indexOf(delimiter);
    if (index === -1) {
      this.#cursor = this.#size;
      return { bytes: unread.slice(), found: false };
    }
    this.#cursor += index + 1;
    return { bytes: unread.slice(0, index + 1), found: true };
  }

  public seek(offset: number): void {
    assertValidOffset(offset);
    this.#cursor = offset;
  }

  public rewind(): void {
    this.#cursor = 0;
  }

  public unreadLength(): number {
    return Math.max(this.#size - this.#cursor, 0);
  }

  public contentSnapshot(): Uint8Array {
    return this.#view.slice(0, this.#size);
  }

  public position(): number {
    return this.#cursor;
  }

  public size(): number {
    return this.#size;
  }

  public reset(): void {
    this.#view = new Uint8Array(INITIAL_CAPACITY);
    this.#size = 0;
    this.#cursor = 0;
  }

  /** Releases the backing storage. The buffer stays usable, empty. */
  public close(): void {
    this.reset();
  }

  /**
   * @internal Test-only function to get the allocated capacity.
   */
  public _testOnlyCapacity(): number {
    return this.#view.length;
  }

  #ensureCapacity(required: number): void {
    if (required <= this.#view.length) {
      return;
    }
    let capacity = this.#view.length;
    while (capacity < required) {
      capacity *= 2;
    }
    const grown = new Uint8Array(capacity);
    grown.set(this.#view.subarray(0, this.#size));
    this.#view = grown;
  }
}
