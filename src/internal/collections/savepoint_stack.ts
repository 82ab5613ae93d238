/**
 * Last-in first-out stack used for nested transaction savepoints.
 */
export class SavepointStack<T> {
  #entries: T[] = [];

  /**
   * Number of entries on the stack.
   */
  public size(): number {
    return this.#entries.length;
  }

  /**
   * Whether the stack holds no entries.
   */
  public isEmpty(): boolean {
    return this.#entries.length === 0;
  }

  /**
   * Pushes an entry on top of the stack.
   */
  public push(entry: T): void {
    this.#entries.push(entry);
  }

  /**
   * Removes and returns the top entry.
   * @throws RangeError if the stack is empty
   */
  public pop(): T {
    const entry = this.#entries.pop();
    if (entry === undefined) {
      throw new RangeError("Cannot pop from an empty savepoint stack");
    }
    return entry;
  }

  /**
   * Returns the top entry without removing it, or undefined when empty.
   */
  public peek(): T | undefined {
    return this.#entries[this.#entries.length - 1];
  }

  /**
   * Drops every entry.
   */
  public clear(): void {
    this.#entries = [];
  }
}
