/**
 * Error types shared by the seekable buffer and its overlays.
 *
 * End-of-data is not an error: reads report it through their result object.
 * Everything below is thrown.
 */

/** Error thrown when a cursor is moved to an offset that cannot exist. */
export class InvalidOffsetError extends RangeError {
  /** The rejected offset. */
  public readonly offset: number;

  constructor(message: string, offset: number) {
    super(message);
    this.name = "InvalidOffsetError";
    this.offset = offset;
  }
}

/** Error thrown by a strict read that cannot fill its target. */
export class ShortReadError extends RangeError {
  /** Bytes the read asked for. */
  public readonly requested: number;
  /** Bytes that were left to read. */
  public readonly available: number;

  constructor(message: string, requested: number, available: number) {
    super(message);
    this.name = "ShortReadError";
    this.requested = requested;
    this.available = available;
  }
}

/** Operations that require an open transaction. */
export type TransactionOperation = "commit" | "rollback";

/** Error thrown when commit or rollback is called with no open transaction. */
export class NoActiveTransactionError extends Error {
  /** The operation that was attempted. */
  public readonly operation: TransactionOperation;

  constructor(operation: TransactionOperation) {
    super(`Cannot ${operation}: no transaction in progress`);
    this.name = "NoActiveTransactionError";
    this.operation = operation;
  }
}

/** File system steps that can fail while mirroring or saving a buffer. */
export type BufferIoOperation =
  | "open"
  | "truncate"
  | "write"
  | "close"
  | "read"
  | "append";

/**
 * Error thrown when a file backing a buffer cannot be opened, written,
 * truncated, read or closed. The original failure is kept as `cause`.
 */
export class BufferIoError extends Error {
  /** The file path involved. */
  public readonly path: string;
  /** The step that failed. */
  public readonly operation: BufferIoOperation;

  constructor(
    message: string,
    path: string,
    operation: BufferIoOperation,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "BufferIoError";
    this.path = path;
    this.operation = operation;
  }
}

/**
 * Validates a cursor offset. Offsets past the end of the content are legal;
 * negative and fractional ones are not.
 *
 * @throws InvalidOffsetError
 */
export function assertValidOffset(offset: number): void {
  if (!Number.isSafeInteger(offset) || offset < 0) {
    throw new InvalidOffsetError(
      `Offset must be a non-negative integer. Got offset=${offset}`,
      offset,
    );
  }
}

/**
 * Validates a delimiter byte for readUntil.
 *
 * @throws RangeError
 */
export function assertByte(value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new RangeError(`Delimiter must be a byte (0-255). Got ${value}`);
  }
}
