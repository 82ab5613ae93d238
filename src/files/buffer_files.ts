/**
 * Whole-buffer file helpers.
 *
 * These read or write the complete content in one call and do not take part
 * in transactions or file sync: used on a buffer that is currently being
 * synced, they bypass the sync bookkeeping.
 */
import { appendFileSync, readFileSync, writeFileSync } from "node:fs";
import { BufferIoError, type BufferIoOperation } from "../buffers/buffer_errors.ts";
import { SeekBuffer } from "../buffers/seek_buffer.ts";
import type { ISeekableBuffer } from "../buffers/seekable_buffer.ts";
import { bufferFilesLogger, logError } from "../internal/logger.ts";

function withIo<T>(path: string, operation: BufferIoOperation, step: () => T): T {
  try {
    return step();
  } catch (err) {
    const error = new BufferIoError(
      `Cannot ${operation} ${path}`,
      path,
      operation,
      err,
    );
    logError(bufferFilesLogger, error, { path, operation });
    throw error;
  }
}

/** Overwrites `path` with the full content of `buffer`. */
export function saveToFile(buffer: ISeekableBuffer, path: string): void {
  const content = buffer.contentSnapshot();
  withIo(path, "write", () => writeFileSync(path, content));
  bufferFilesLogger.debug({ path, bytes: content.length }, "buffer saved");
}

/** Appends the full content of `buffer` to `path`, creating it if needed. */
export function appendToFile(buffer: ISeekableBuffer, path: string): void {
  const content = buffer.contentSnapshot();
  withIo(path, "append", () => appendFileSync(path, content));
  bufferFilesLogger.debug({ path, bytes: content.length }, "buffer appended");
}

/**
 * Appends only the bytes after the cursor to `path`. The cursor does not
 * move. Nothing is written when everything has been read, but the file is
 * still created.
 */
export function appendUnreadToFile(
  buffer: ISeekableBuffer,
  path: string,
): void {
  const start = Math.min(buffer.position(), buffer.size());
  const unread = buffer.contentSnapshot().subarray(start);
  withIo(path, "append", () => appendFileSync(path, unread));
  bufferFilesLogger.debug(
    { path, bytes: unread.length },
    "unread bytes appended",
  );
}

/**
 * Replaces the content of `buffer` with the bytes of `path` and rewinds it.
 * The buffer is untouched when the file cannot be read.
 */
export function loadFromFile(buffer: ISeekableBuffer, path: string): void {
  const data = withIo(path, "read", () => readFileSync(path));
  buffer.reset();
  buffer.write(data);
  buffer.rewind();
  bufferFilesLogger.debug({ path, bytes: data.length }, "buffer loaded");
}

/** Creates a new {@link SeekBuffer} holding the bytes of `path`. */
export function seekBufferFromFile(path: string): SeekBuffer {
  const data = withIo(path, "read", () => readFileSync(path));
  return new SeekBuffer(data);
}
