import type {
  ISeekableBuffer,
  ReadResult,
  ReadUntilResult,
} from "../buffers/seekable_buffer.ts";
import { type Logger, logError, seekBufferLogger } from "../internal/logger.ts";

/** Name used in log entries when none is given. */
export const DEFAULT_BUFFER_NAME = "SeekBuffer";

/** Options for {@link LoggingOverlay}. */
export interface LoggingOptions {
  /** Destination logger. Defaults to the package's seek-buffer logger. */
  logger?: Logger;
  /** Name attached to every entry as `buffer` and used as message prefix. */
  name?: string;
}

/**
 * Pass-through overlay that times every operation and logs it at debug level.
 * Behaviour of the wrapped buffer is unchanged; failures are logged at error
 * level and rethrown.
 */
export class LoggingOverlay implements ISeekableBuffer {
  #buffer: ISeekableBuffer;
  #logger: Logger;
  #name: string;

  public constructor(buffer: ISeekableBuffer, options: LoggingOptions = {}) {
    this.#buffer = buffer;
    this.#logger = options.logger ?? seekBufferLogger;
    this.#name = options.name || DEFAULT_BUFFER_NAME;
  }

  public write(data: Uint8Array): number {
    const { value: bytes, durationMs } = this.#timed(
      "write",
      () => this.#buffer.write(data),
      { bytes: data.length },
    );
    this.#log("write", { bytes }, `Write: ${bytes} bytes`, durationMs);
    return bytes;
  }

  public append(data: Uint8Array): void {
    const { durationMs } = this.#timed(
      "append",
      () => this.#buffer.append(data),
      { bytes: data.length },
    );
    this.#log(
      "append",
      { bytes: data.length },
      `Append: ${data.length} bytes`,
      durationMs,
    );
  }

  public read(target: Uint8Array): ReadResult {
    const { value: result, durationMs } = this.#timed(
      "read",
      () => this.#buffer.read(target),
    );
    const suffix = result.endOfData ? ", end of data" : "";
    this.#log(
      "read",
      { bytes: result.bytesRead, endOfData: result.endOfData },
      `Read: ${result.bytesRead} bytes${suffix}`,
      durationMs,
    );
    return result;
  }

  public readUntil(delimiter: number): ReadUntilResult {
    const { value: result, durationMs } = this.#timed(
      "readUntil",
      () => this.#buffer.readUntil(delimiter),
      { delimiter },
    );
    const suffix = result.found ? "" : ", end of data";
    this.#log(
      "readUntil",
      { delimiter, bytes: result.bytes.length, found: result.found },
      `ReadUntil: delimiter=0x${hexByte(delimiter)}, read ${result.bytes.length} bytes${suffix}`,
      durationMs,
    );
    return result;
  }

  public seek(offset: number): void {
    const { durationMs } = this.#timed(
      "seek",
      () => this.#buffer.seek(offset),
      { offset },
    );
    this.#log("seek", { offset }, `Seek: moved to offset ${offset}`, durationMs);
  }

  public rewind(): void {
    const { durationMs } = this.#timed("rewind", () => this.#buffer.rewind());
    this.#log("rewind", {}, "Rewind: offset reset to 0", durationMs);
  }

  public unreadLength(): number {
    const { value: unread, durationMs } = this.#timed(
      "unreadLength",
      () => this.#buffer.unreadLength(),
    );
    this.#log(
      "unreadLength",
      { unread },
      `UnreadLength: ${unread} bytes`,
      durationMs,
    );
    return unread;
  }

  public contentSnapshot(): Uint8Array {
    const { value: content, durationMs } = this.#timed(
      "contentSnapshot",
      () => this.#buffer.contentSnapshot(),
    );
    this.#log(
      "contentSnapshot",
      { bytes: content.length },
      `ContentSnapshot: retrieved ${content.length} bytes`,
      durationMs,
    );
    return content;
  }

  // Cursor and size observers are read by other overlays on every call;
  // they are forwarded without an entry.
  public position(): number {
    return this.#buffer.position();
  }

  public size(): number {
    return this.#buffer.size();
  }

  public reset(): void {
    const { durationMs } = this.#timed("reset", () => this.#buffer.reset());
    this.#log("reset", {}, "Reset: content discarded", durationMs);
  }

  public close(): void {
    const { durationMs } = this.#timed("close", () => this.#buffer.close());
    this.#log("close", {}, "Close: success", durationMs);
  }

  /** Replaces the destination logger. */
  public setLogger(logger: Logger): void {
    this.#logger = logger;
  }

  /** Replaces the buffer name; an empty name is ignored. */
  public setName(name: string): void {
    if (name !== "") {
      this.#name = name;
    }
  }

  public getLogger(): Logger {
    return this.#logger;
  }

  public getName(): string {
    return this.#name;
  }

  /** Logs total, read and unread byte counts at info level. */
  public logSummary(): void {
    const total = this.#buffer.size();
    const unread = this.#buffer.unreadLength();
    const read = total - unread;
    this.#logger.info(
      { buffer: this.#name, total, read, unread },
      `[${this.#name}] Summary: total=${total} bytes, read=${read} bytes, unread=${unread} bytes`,
    );
  }

  /** Logs a free-form message at info level, tagged with the buffer name. */
  public logMessage(message: string, fields: Record<string, unknown> = {}): void {
    this.#logger.info(
      { buffer: this.#name, ...fields },
      `[${this.#name}] ${message}`,
    );
  }

  #timed<T>(
    operation: string,
    action: () => T,
    fields: Record<string, unknown> = {},
  ): { value: T; durationMs: number } {
    const startedAt = performance.now();
    try {
      const value = action();
      return { value, durationMs: performance.now() - startedAt };
    } catch (err) {
      logError(this.#logger, err, {
        buffer: this.#name,
        operation,
        durationMs: performance.now() - startedAt,
        ...fields,
      });
      throw err;
    }
  }

  #log(
    operation: string,
    fields: Record<string, unknown>,
    message: string,
    durationMs: number,
  ): void {
    this.#logger.debug(
      { buffer: this.#name, operation, ...fields, durationMs },
      `[${this.#name}] ${message}`,
    );
  }
}

function hexByte(value: number): string {
  return value.toString(16).padStart(2, "0");
}
