// Example: stage edits in a transaction and decide afterwards whether to keep them.
import { SeekBuffer } from "../src/buffers/seek_buffer.ts";
import { TransactionOverlay } from "../src/overlays/transaction_overlay.ts";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Applies a deposit inside a transaction, rolls it back, then applies a second
 * deposit inside a nested transaction and commits everything. Returns the
 * ledger content after each step.
 */
export function runTransactionDemo(): string[] {
  const ledger = new SeekBuffer(encoder.encode("Account Balance: $1000"));
  const tx = new TransactionOverlay(ledger);
  const steps: string[] = [];

  tx.begin();
  tx.write(encoder.encode(" -> $1500"));
  steps.push(decoder.decode(tx.contentSnapshot()));
  tx.rollback();
  steps.push(decoder.decode(ledger.contentSnapshot()));

  tx.begin();
  tx.write(encoder.encode(" -> $1200"));
  tx.run((nested) => nested.write(encoder.encode(" -> $1250")));
  steps.push(decoder.decode(ledger.contentSnapshot()));
  tx.commit();
  steps.push(decoder.decode(ledger.contentSnapshot()));

  return steps;
}
