/**
 * The operation set shared by the base store and every overlay, so overlays
 * can wrap the store or each other interchangeably.
 */

/** Outcome of a positional read. */
export interface ReadResult {
  /** Number of bytes copied into the target. */
  bytesRead: number;
  /**
   * True when the cursor was already at or past the end of the content.
   * A short read with `bytesRead > 0` is not end-of-data.
   */
  endOfData: boolean;
}

/** Outcome of a delimiter scan. */
export interface ReadUntilResult {
  /** The bytes consumed, including the delimiter when found. */
  bytes: Uint8Array;
  /** False when the scan ran off the end of the content. */
  found: boolean;
}

/**
 * Interface describing a seekable, growable byte buffer with a single
 * read cursor.
 */
export interface ISeekableBuffer {
  /**
   * Appends bytes to the content and returns the number of bytes accepted,
   * which is always `data.length`.
   */
  write(data: Uint8Array): number;

  /**
   * Appends bytes to the content. Same effect as `write`.
   */
  append(data: Uint8Array): void;

  /**
   * Copies bytes starting at the cursor into `target` and advances the cursor
   * by the number of bytes copied.
   */
  read(target: Uint8Array): ReadResult;

  /**
   * Consumes bytes from the cursor up to and including the first occurrence
   * of `delimiter`, or everything that is left when there is none.
   */
  readUntil(delimiter: number): ReadUntilResult;

  /**
   * Moves the cursor. Offsets beyond the end are allowed and make the next
   * read report end-of-data; negative offsets throw InvalidOffsetError.
   */
  seek(offset: number): void;

  /** Moves the cursor back to 0. */
  rewind(): void;

  /** Number of bytes between the cursor and the end, never negative. */
  unreadLength(): number;

  /** Copy of the whole content from index 0, independent of the cursor. */
  contentSnapshot(): Uint8Array;

  /** Current cursor. */
  position(): number;

  /** Total content length. */
  size(): number;

  /**
   * Discards all content and moves the cursor to 0 while keeping the buffer
   * usable.
   */
  reset(): void;

  /** Releases the content and any resources held by this layer. */
  close(): void;
}
