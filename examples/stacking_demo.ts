// Example: mirror a buffer into a file and only publish committed writes to it.
import { readFileSync } from "node:fs";
import { SeekBuffer } from "../src/buffers/seek_buffer.ts";
import { FileSyncOverlay } from "../src/overlays/file_sync_overlay.ts";
import { TransactionOverlay } from "../src/overlays/transaction_overlay.ts";

const encoder = new TextEncoder();

/**
 * Stacks a transaction overlay on top of a file-synced buffer. The file only
 * changes when a transaction commits. Returns the file content after the
 * rolled back and after the committed transaction.
 */
export function runStackingDemo(path: string): {
  afterRollback: string;
  afterCommit: string;
} {
  const synced = new FileSyncOverlay(new SeekBuffer());
  synced.enableSync(path);
  synced.write(encoder.encode("header\n"));

  const tx = new TransactionOverlay(synced);
  try {
    tx.begin();
    tx.write(encoder.encode("draft row\n"));
    tx.rollback();
    const afterRollback = readFileSync(path, "utf8");

    tx.run((buffer) => buffer.write(encoder.encode("final row\n")));
    const afterCommit = readFileSync(path, "utf8");

    return { afterRollback, afterCommit };
  } finally {
    tx.close();
    synced.close();
  }
}
