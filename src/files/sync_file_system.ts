/**
 * Interfaces describing the blocking file access a file-synced buffer needs.
 *
 * The overlay depends only on these, so tests can run it against an
 * in-process file system and inject failures at any step.
 */

/**
 * An open, writable file.
 */
export interface ISyncFileHandle {
  /**
   * Writes all of `data` at the absolute byte `position` without moving any
   * shared file cursor. Returns the number of bytes written.
   */
  writeAt(data: Uint8Array, position: number): number;

  /**
   * Truncates (or extends with zeros) the file to `length` bytes.
   */
  truncate(length: number): void;

  /**
   * Closes the handle and releases any held resources.
   */
  close(): void;
}

/**
 * Opens files for read-write access.
 */
export interface ISyncFileSystem {
  /**
   * Opens `path` for reading and writing, creating it with `mode` when it
   * does not exist. Existing content is kept.
   */
  open(path: string, mode: number): ISyncFileHandle;
}
