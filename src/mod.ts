// Core buffers
export { RandomBuffer } from "./buffers/random_buffer.ts";
export { SeekBuffer } from "./buffers/seek_buffer.ts";
export type {
  ISeekableBuffer,
  ReadResult,
  ReadUntilResult,
} from "./buffers/seekable_buffer.ts";

// Errors
export {
  BufferIoError,
  InvalidOffsetError,
  NoActiveTransactionError,
  ShortReadError,
} from "./buffers/buffer_errors.ts";
export type {
  BufferIoOperation,
  TransactionOperation,
} from "./buffers/buffer_errors.ts";

// Overlays
export { TransactionOverlay } from "./overlays/transaction_overlay.ts";
export type { TransactionOptions } from "./overlays/transaction_overlay.ts";
export {
  DEFAULT_FILE_MODE,
  FileSyncOverlay,
} from "./overlays/file_sync_overlay.ts";
export type { FileSyncOptions } from "./overlays/file_sync_overlay.ts";
export {
  DEFAULT_BUFFER_NAME,
  LoggingOverlay,
} from "./overlays/logging_overlay.ts";
export type { LoggingOptions } from "./overlays/logging_overlay.ts";

// Files
export {
  appendToFile,
  appendUnreadToFile,
  loadFromFile,
  saveToFile,
  seekBufferFromFile,
} from "./files/buffer_files.ts";
export {
  NodeSyncFileHandle,
  NodeSyncFileSystem,
  nodeSyncFileSystem,
} from "./files/node_sync_file_system.ts";
export type {
  ISyncFileHandle,
  ISyncFileSystem,
} from "./files/sync_file_system.ts";

// Logging
export { createLogger, logger } from "./internal/logger.ts";
export type { Logger } from "./internal/logger.ts";
