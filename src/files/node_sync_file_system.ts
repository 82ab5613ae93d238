import {
  closeSync,
  constants,
  ftruncateSync,
  openSync,
  writeSync,
} from "node:fs";
import type { ISyncFileHandle, ISyncFileSystem } from "./sync_file_system.ts";

/**
 * File handle backed by a Node.js file descriptor.
 */
export class NodeSyncFileHandle implements ISyncFileHandle {
  #fd: number;
  #closed = false;

  /**
   * @param fd An open file descriptor with write access.
   */
  public constructor(fd: number) {
    this.#fd = fd;
  }

  public writeAt(data: Uint8Array, position: number): number {
    this.#assertOpen();
    let written = 0;
    // writeSync may accept fewer bytes than asked; keep going until done.
    while (written < data.length) {
      written += writeSync(
        this.#fd,
        data,
        written,
        data.length - written,
        position + written,
      );
    }
    return written;
  }

  public truncate(length: number): void {
    this.#assertOpen();
    ftruncateSync(this.#fd, length);
  }

  public close(): void {
    if (!this.#closed) {
      this.#closed = true;
      closeSync(this.#fd);
    }
  }

  #assertOpen(): void {
    if (this.#closed) {
      throw new Error("File handle is closed");
    }
  }
}

/**
 * {@link ISyncFileSystem} over `node:fs`.
 */
export class NodeSyncFileSystem implements ISyncFileSystem {
  public open(path: string, mode: number): ISyncFileHandle {
    const fd = openSync(path, constants.O_RDWR | constants.O_CREAT, mode);
    return new NodeSyncFileHandle(fd);
  }
}

/** Shared default instance. */
export const nodeSyncFileSystem: ISyncFileSystem = new NodeSyncFileSystem();
