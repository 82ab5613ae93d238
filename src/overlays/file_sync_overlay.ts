import { BufferIoError, type BufferIoOperation } from "../buffers/buffer_errors.ts";
import type {
  ISeekableBuffer,
  ReadResult,
  ReadUntilResult,
} from "../buffers/seekable_buffer.ts";
import { nodeSyncFileSystem } from "../files/node_sync_file_system.ts";
import type {
  ISyncFileHandle,
  ISyncFileSystem,
} from "../files/sync_file_system.ts";
import { fileSyncLogger, type Logger, logError } from "../internal/logger.ts";

/** Default permission bits for files created by {@link FileSyncOverlay}. */
export const DEFAULT_FILE_MODE = 0o644;

const EMPTY = new Uint8Array(0);

/** Options for {@link FileSyncOverlay}. */
export interface FileSyncOptions {
  /** File system used to open the backing file. Defaults to node:fs. */
  fileSystem?: ISyncFileSystem;
  /** Permission bits used when the backing file is created. */
  mode?: number;
  /** Logger for sync lifecycle events and failures. */
  logger?: Logger;
}

/**
 * Mirrors a seekable buffer into a backing file, byte for byte.
 *
 * Only the unsynced tail is written after each write or append, at the
 * position where the previous sync stopped. Reads never touch the file. Seek and rewind move a logical file
 * position alongside the buffer cursor; tail writes are positional and leave
 * it where it was.
 *
 * The overlay remembers the bytes it has written. Before each catch-up it
 * compares them with the wrapped content, and when an inner layer has changed
 * earlier bytes (a rollback, reset or close underneath this overlay) it
 * truncates the file to the longest common prefix and rewrites from there.
 * This happens on the next write through this overlay, or on an explicit
 * {@link sync}.
 *
 * @example
 * ```typescript
 * const synced = new FileSyncOverlay(new SeekBuffer());
 * synced.enableSync("out.log");
 * synced.write(encode("Hello, "));
 * synced.write(encode("World!")); // out.log now holds "Hello, World!"
 * ```
 */
export class FileSyncOverlay implements ISeekableBuffer {
  #buffer: ISeekableBuffer;
  #fileSystem: ISyncFileSystem;
  #mode: number;
  #logger: Logger;
  #handle: ISyncFileHandle | undefined;
  #path = "";
  // Bytes known to be in the file, always a prefix of it.
  #synced: Uint8Array = EMPTY;
  #filePosition = 0;

  /**
   * @param buffer The buffer to mirror. Closed together with this overlay.
   * @param options File system, creation mode and logger.
   */
  public constructor(buffer: ISeekableBuffer, options: FileSyncOptions = {}) {
    this.#buffer = buffer;
    this.#fileSystem = options.fileSystem ?? nodeSyncFileSystem;
    this.#mode = options.mode ?? DEFAULT_FILE_MODE;
    this.#logger = options.logger ?? fileSyncLogger;
  }

  /**
   * Starts mirroring into `path`. Any file already being synced is closed
   * first. The target is truncated and receives the buffer's current content.
   *
   * @throws BufferIoError if the file cannot be opened, truncated or written.
   * The overlay is left disabled in that case.
   */
  public enableSync(path: string): void {
    if (this.#handle !== undefined) {
      this.disableSync();
    }

    const handle = this.#attempt(
      path,
      "open",
      () => this.#fileSystem.open(path, this.#mode),
    );
    this.#handle = handle;
    this.#path = path;
    this.#synced = EMPTY;
    this.#filePosition = 0;

    try {
      this.#attempt(path, "truncate", () => handle.truncate(0));
      this.#syncNewData();
    } catch (err) {
      this.#clearState();
      this.#closeQuietly(handle, path);
      throw err;
    }
    this.#logger.debug(
      { path, bytes: this.#synced.length },
      "file sync enabled",
    );
  }

  /**
   * Stops mirroring and closes the file. The in-memory content is kept.
   * Calling this while disabled does nothing.
   *
   * @throws BufferIoError if closing the file fails. Sync is disabled anyway.
   */
  public disableSync(): void {
    const handle = this.#handle;
    if (handle === undefined) {
      return;
    }
    const path = this.#path;
    this.#clearState();
    this.#attempt(path, "close", () => handle.close());
    this.#logger.debug({ path }, "file sync disabled");
  }

  /** Whether a backing file is currently being kept in sync. */
  public isSyncEnabled(): boolean {
    return this.#handle !== undefined;
  }

  /** Path of the backing file, or an empty string when disabled. */
  public syncPath(): string {
    return this.#path;
  }

  /** Number of leading content bytes already written to the file. */
  public syncedLength(): number {
    return this.#synced.length;
  }

  /** Logical file position, kept in step with seek and rewind. */
  public filePosition(): number {
    return this.#filePosition;
  }

  /**
   * Brings the file up to date with the wrapped buffer: truncates it where the
   * content no longer matches what was written, then writes the rest. Does
   * nothing while disabled.
   *
   * @throws BufferIoError
   */
  public sync(): void {
    this.#syncNewData();
  }

  /**
   * Appends to the buffer, then writes the new tail to the file.
   *
   * @returns The number of bytes accepted by the buffer.
   * @throws BufferIoError if the tail cannot be written. The bytes stay in
   * memory and are retried by the next sync.
   */
  public write(data: Uint8Array): number {
    const count = this.#buffer.write(data);
    this.#syncNewData();
    return count;
  }

  /**
   * Same as {@link write} without the return value.
   *
   * @throws BufferIoError
   */
  public append(data: Uint8Array): void {
    this.#buffer.append(data);
    this.#syncNewData();
  }

  public read(target: Uint8Array): ReadResult {
    return this.#buffer.read(target);
  }

  public readUntil(delimiter: number): ReadUntilResult {
    return this.#buffer.readUntil(delimiter);
  }

  public seek(offset: number): void {
    this.#buffer.seek(offset);
    if (this.#handle !== undefined) {
      this.#filePosition = offset;
    }
  }

  public rewind(): void {
    this.#buffer.rewind();
    if (this.#handle !== undefined) {
      this.#filePosition = 0;
    }
  }

  public unreadLength(): number {
    return this.#buffer.unreadLength();
  }

  public contentSnapshot(): Uint8Array {
    return this.#buffer.contentSnapshot();
  }

  public position(): number {
    return this.#buffer.position();
  }

  public size(): number {
    return this.#buffer.size();
  }

  /**
   * Empties the backing file, then resets the wrapped buffer. Sync stays
   * enabled.
   *
   * @throws BufferIoError if the file cannot be truncated. The buffer is left
   * untouched in that case.
   */
  public reset(): void {
    const handle = this.#handle;
    if (handle !== undefined) {
      this.#attempt(this.#path, "truncate", () => handle.truncate(0));
      this.#synced = EMPTY;
      this.#filePosition = 0;
    }
    this.#buffer.reset();
  }

  /**
   * Closes the wrapped buffer and the backing file.
   *
   * @throws BufferIoError if the file fails to close; otherwise rethrows
   * whatever closing the wrapped buffer threw.
   */
  public close(): void {
    let bufferError: unknown;
    let bufferFailed = false;
    try {
      this.#buffer.close();
    } catch (err) {
      bufferFailed = true;
      bufferError = err;
    }

    const handle = this.#handle;
    if (handle !== undefined) {
      const path = this.#path;
      this.#clearState();
      this.#attempt(path, "close", () => handle.close());
    }

    if (bufferFailed) {
      throw bufferError;
    }
  }

  /**
   * Truncates the file to the prefix it still shares with the content, then
   * writes the remaining content after it.
   */
  #syncNewData(): void {
    const handle = this.#handle;
    if (handle === undefined) {
      return;
    }
    const content = this.#buffer.contentSnapshot();
    const common = commonPrefixLength(this.#synced, content);

    if (common < this.#synced.length) {
      this.#attempt(this.#path, "truncate", () => handle.truncate(common));
      this.#synced = this.#synced.subarray(0, common);
    }
    if (common === content.length) {
      return;
    }

    const written = this.#attempt(
      this.#path,
      "write",
      () => handle.writeAt(content.subarray(common), common),
    );
    this.#synced = content.subarray(0, common + written);
  }

  /**
   * Runs a file system step, converting failures into BufferIoError.
   */
  #attempt<T>(path: string, operation: BufferIoOperation, step: () => T): T {
    try {
      return step();
    } catch (err) {
      if (err instanceof BufferIoError) {
        throw err;
      }
      const error = new BufferIoError(
        `File sync ${operation} failed for ${path}`,
        path,
        operation,
        err,
      );
      logError(this.#logger, error, {
        path,
        operation,
        syncedLength: this.#synced.length,
      });
      throw error;
    }
  }

  /** Closes a handle after an earlier failure, logging any secondary error. */
  #closeQuietly(handle: ISyncFileHandle, path: string): void {
    try {
      handle.close();
    } catch (err) {
      logError(this.#logger, err, { path, operation: "close" });
    }
  }

  #clearState(): void {
    this.#handle = undefined;
    this.#path = "";
    this.#synced = EMPTY;
    this.#filePosition = 0;
  }
}

function commonPrefixLength(a: Uint8Array, b: Uint8Array): number {
  const limit = Math.min(a.length, b.length);
  let index = 0;
  while (index < limit && a[index] === b[index]) {
    index++;
  }
  return index;
}
