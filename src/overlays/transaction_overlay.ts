import { NoActiveTransactionError } from "../buffers/buffer_errors.ts";
import { SeekBuffer } from "../buffers/seek_buffer.ts";
import type {
  ISeekableBuffer,
  ReadResult,
  ReadUntilResult,
} from "../buffers/seekable_buffer.ts";
import { SavepointStack } from "../internal/collections/savepoint_stack.ts";
import {
  type Logger,
  logError,
  transactionLogger,
} from "../internal/logger.ts";

/** Working state pushed by a nested Begin, tagged with its level. */
interface Savepoint {
  content: Uint8Array;
  cursor: number;
  level: number;
}

/** Options for {@link TransactionOverlay}. */
export interface TransactionOptions {
  /** Logger for begin/commit/rollback events. */
  logger?: Logger;
}

/**
 * Adds nestable Begin/Commit/Rollback to any seekable buffer.
 *
 * While a transaction is open every operation runs against a private working
 * copy; the wrapped buffer is untouched until the outermost Commit, which
 * replaces its content wholesale. Nested levels are savepoints: a nested
 * Commit folds the child's edits into the parent, a nested Rollback restores
 * the working copy to where the child began.
 *
 * The overlay does not own the wrapped buffer: closing it rolls back any open
 * transaction and leaves the wrapped buffer open.
 *
 * @example
 * ```typescript
 * const tx = new TransactionOverlay(SeekBuffer.fromString("balance: 10"));
 * tx.begin();
 * tx.write(encode(" -> 15"));
 * tx.rollback(); // wrapped content is still "balance: 10"
 * ```
 */
export class TransactionOverlay implements ISeekableBuffer {
  #buffer: ISeekableBuffer;
  #logger: Logger;
  #level = 0;
  #working: SeekBuffer | undefined;
  #savepoints = new SavepointStack<Savepoint>();

  /**
   * @param buffer The buffer to wrap.
   * @param options Optional logger.
   */
  public constructor(buffer: ISeekableBuffer, options: TransactionOptions = {}) {
    this.#buffer = buffer;
    this.#logger = options.logger ?? transactionLogger;
  }

  /**
   * Opens a transaction, or a nested savepoint when one is already open.
   */
  public begin(): void {
    if (this.#working === undefined) {
      // The wrapped buffer is not written again until the outermost commit,
      // so it doubles as the snapshot a full rollback returns to.
      this.#working = new SeekBuffer(
        this.#buffer.contentSnapshot(),
        this.#buffer.position(),
      );
      this.#level = 1;
    } else {
      this.#savepoints.push({
        content: this.#working.contentSnapshot(),
        cursor: this.#working.position(),
        level: this.#level,
      });
      this.#level++;
    }
    this.#logger.debug({ depth: this.#level }, "transaction begin");
  }

  /**
   * Commits the innermost open level. Only the outermost commit writes to the
   * wrapped buffer.
   *
   * If writing to the wrapped buffer fails, the wrapped buffer is put back to
   * its state before the commit and the transaction stays open, so the caller
   * can commit again or roll back.
   *
   * @throws NoActiveTransactionError if no transaction is open.
   */
  public commit(): void {
    const working = this.#requireWorking("commit");
    if (this.#level > 1) {
      this.#level = this.#savepoints.pop().level;
      this.#logger.debug({ depth: this.#level }, "transaction commit (nested)");
      return;
    }

    const content = working.contentSnapshot();
    const cursor = working.position();
    const before = {
      content: this.#buffer.contentSnapshot(),
      cursor: this.#buffer.position(),
    };

    try {
      this.#replaceWrapped(content, cursor);
    } catch (err) {
      logError(this.#logger, err, { depth: this.#level, operation: "commit" });
      this.#restoreWrapped(before.content, before.cursor);
      throw err;
    }
    this.#finish();
    this.#logger.debug(
      { bytes: content.length, cursor },
      "transaction commit",
    );
  }

  /**
   * Rolls back the innermost open level. The outermost rollback restores the
   * state captured by the first Begin.
   *
   * @throws NoActiveTransactionError if no transaction is open.
   */
  public rollback(): void {
    this.#requireWorking("rollback");
    if (this.#level > 1) {
      const savepoint = this.#savepoints.pop();
      this.#working = new SeekBuffer(savepoint.content, savepoint.cursor);
      this.#level = savepoint.level;
      this.#logger.debug(
        { depth: this.#level },
        "transaction rollback (nested)",
      );
      return;
    }
    this.#finish();
    this.#logger.debug("transaction rollback");
  }

  /**
   * Runs `fn` inside a transaction level: commits when it returns and rolls
   * back (then rethrows) when it throws.
   */
  public run<T>(fn: (buffer: TransactionOverlay) => T): T {
    this.begin();
    let result: T;
    try {
      result = fn(this);
    } catch (err) {
      this.rollback();
      throw err;
    }
    try {
      this.commit();
    } catch (err) {
      this.rollback();
      throw err;
    }
    return result;
  }

  /** Whether a transaction is open. */
  public inTransaction(): boolean {
    return this.#working !== undefined;
  }

  /** Current nesting depth, 0 when idle. */
  public transactionLevel(): number {
    return this.#level;
  }

  public write(data: Uint8Array): number {
    return this.#target().write(data);
  }

  public append(data: Uint8Array): void {
    this.#target().append(data);
  }

  public read(target: Uint8Array): ReadResult {
    return this.#target().read(target);
  }

  public readUntil(delimiter: number): ReadUntilResult {
    return this.#target().readUntil(delimiter);
  }

  public seek(offset: number): void {
    this.#target().seek(offset);
  }

  public rewind(): void {
    this.#target().rewind();
  }

  public unreadLength(): number {
    return this.#target().unreadLength();
  }

  public contentSnapshot(): Uint8Array {
    return this.#target().contentSnapshot();
  }

  public position(): number {
    return this.#target().position();
  }

  public size(): number {
    return this.#target().size();
  }

  /**
   * Empties the working copy while a transaction is open (undone by
   * rollback); otherwise resets the wrapped buffer.
   */
  public reset(): void {
    this.#target().reset();
  }

  /**
   * Discards any open transaction, including all nested levels. The wrapped
   * buffer belongs to whoever created this overlay and stays open.
   */
  public close(): void {
    if (this.#working !== undefined) {
      this.#logger.debug(
        { depth: this.#level },
        "transaction discarded on close",
      );
      this.#finish();
    }
  }

  /**
   * @internal Test-only function to get the number of stacked savepoints.
   */
  public _testOnlySavepointCount(): number {
    return this.#savepoints.size();
  }

  #target(): ISeekableBuffer {
    return this.#working ?? this.#buffer;
  }

  #requireWorking(operation: "commit" | "rollback"): SeekBuffer {
    if (this.#working === undefined) {
      throw new NoActiveTransactionError(operation);
    }
    return this.#working;
  }

  // Close-then-rewrite: the wrapped layer sees a reset followed by one write
  // of the full content, never an in-place patch.
  #replaceWrapped(content: Uint8Array, cursor: number): void {
    this.#buffer.reset();
    if (content.length > 0) {
      this.#buffer.write(content);
    }
    this.#buffer.seek(cursor);
  }

  #restoreWrapped(content: Uint8Array, cursor: number): void {
    try {
      this.#replaceWrapped(content, cursor);
    } catch (err) {
      logError(this.#logger, err, { operation: "restore" });
    }
  }

  #finish(): void {
    this.#working = undefined;
    this.#savepoints.clear();
    this.#level = 0;
  }
}
