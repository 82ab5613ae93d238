import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, it } from "vitest";

import { BufferIoError } from "../../buffers/buffer_errors.ts";
import { SeekBuffer } from "../../buffers/seek_buffer.ts";
import { loadFromFile } from "../../files/buffer_files.ts";
import { FileSyncOverlay } from "../file_sync_overlay.ts";
import { LoggingOverlay } from "../logging_overlay.ts";
import { TransactionOverlay } from "../transaction_overlay.ts";
import {
  bytes,
  captureLogger,
  makeTempDir,
  MemoryFileSystem,
  text,
} from "../../test/test_helpers.ts";

describe("overlay stacking", () => {
  describe("transactions over file sync", () => {
    function setup(): {
      fileSystem: MemoryFileSystem;
      synced: FileSyncOverlay;
      tx: TransactionOverlay;
    } {
      const fileSystem = new MemoryFileSystem();
      const synced = new FileSyncOverlay(new SeekBuffer(), { fileSystem });
      synced.enableSync("stack.txt");
      synced.write(bytes("base"));
      return { fileSystem, synced, tx: new TransactionOverlay(synced) };
    }

    it("reaches the file only on commit", () => {
      const { fileSystem, synced, tx } = setup();
      tx.begin();
      tx.write(bytes(" + change"));

      expect(fileSystem.read("stack.txt")).toBe("base");

      tx.commit();
      expect(fileSystem.read("stack.txt")).toBe("base + change");
      expect(synced.isSyncEnabled()).toBe(true);
      expect(synced.syncedLength()).toBe(13);
    });

    it("rewrites the file from offset zero on commit", () => {
      const { fileSystem, tx } = setup();
      tx.run((buffer) => buffer.append(bytes("!")));

      expect(fileSystem.writes.map((write) => write.position)).toEqual([0, 0]);
      expect(fileSystem.writes.at(-1)?.data).toBe("base!");
    });

    it("never touches the file on rollback", () => {
      const { fileSystem, tx } = setup();
      tx.begin();
      tx.write(bytes(" + change"));
      tx.rollback();

      expect(fileSystem.read("stack.txt")).toBe("base");
      expect(fileSystem.writes).toHaveLength(1);
    });

    it("applies a reset made inside the transaction on commit", () => {
      const { fileSystem, tx } = setup();
      tx.begin();
      tx.reset();
      tx.write(bytes("new"));

      expect(fileSystem.read("stack.txt")).toBe("base");

      tx.commit();
      expect(fileSystem.read("stack.txt")).toBe("new");
    });

    it("keeps memory and the transaction when the commit cannot truncate", () => {
      const { fileSystem, synced, tx } = setup();
      tx.begin();
      tx.write(bytes(" + change"));
      fileSystem.fail("truncate");

      expect(() => tx.commit()).toThrow(BufferIoError);
      expect(tx.inTransaction()).toBe(true);
      expect(text(tx.contentSnapshot())).toBe("base + change");
      expect(text(synced.contentSnapshot())).toBe("base");
      expect(fileSystem.read("stack.txt")).toBe("base");

      fileSystem.heal("truncate");
      tx.commit();
      expect(fileSystem.read("stack.txt")).toBe("base + change");
      expect(tx.inTransaction()).toBe(false);
    });

    it("restores the previous content when the commit cannot write", () => {
      const { fileSystem, synced, tx } = setup();
      tx.begin();
      tx.write(bytes(" + change"));
      fileSystem.fail("write");

      expect(() => tx.commit()).toThrow(BufferIoError);
      expect(tx.inTransaction()).toBe(true);
      expect(text(synced.contentSnapshot())).toBe("base");

      fileSystem.heal("write");
      tx.rollback();
      synced.sync();
      expect(fileSystem.read("stack.txt")).toBe("base");
    });

    it("run rolls back when the commit fails", () => {
      const { fileSystem, synced, tx } = setup();
      fileSystem.fail("truncate");

      expect(() => tx.run((buffer) => buffer.write(bytes("!")))).toThrow(
        BufferIoError,
      );
      expect(tx.inTransaction()).toBe(false);
      expect(text(synced.contentSnapshot())).toBe("base");
      expect(fileSystem.read("stack.txt")).toBe("base");
    });

    it("keeps syncing later writes after a commit", () => {
      const { fileSystem, tx } = setup();
      tx.run((buffer) => buffer.write(bytes("1")));
      tx.write(bytes("2"));

      expect(fileSystem.read("stack.txt")).toBe("base12");
    });
  });

  describe("file sync over transactions", () => {
    function setup(): {
      fileSystem: MemoryFileSystem;
      synced: FileSyncOverlay;
      tx: TransactionOverlay;
    } {
      const fileSystem = new MemoryFileSystem();
      const tx = new TransactionOverlay(new SeekBuffer());
      const synced = new FileSyncOverlay(tx, { fileSystem });
      synced.enableSync("stack.txt");
      synced.write(bytes("base"));
      return { fileSystem, synced, tx };
    }

    it("streams uncommitted writes to the file", () => {
      const { fileSystem, synced, tx } = setup();
      tx.begin();
      synced.write(bytes(" draft"));

      expect(fileSystem.read("stack.txt")).toBe("base draft");

      tx.commit();
      expect(fileSystem.read("stack.txt")).toBe("base draft");
      expect(synced.syncedLength()).toBe(10);
    });

    it("drops rolled back bytes from the file on the next sync", () => {
      const { fileSystem, synced, tx } = setup();
      tx.begin();
      synced.write(bytes(" draft"));
      tx.rollback();

      synced.sync();
      expect(fileSystem.read("stack.txt")).toBe("base");
      expect(text(synced.contentSnapshot())).toBe("base");
    });

    it.each(["XY", "XYZWV"])(
      "rewrites the file after a rolled back reset and write of %s",
      (draft) => {
        const { fileSystem, synced, tx } = setup();
        tx.begin();
        synced.reset();
        synced.write(bytes(draft));

        expect(fileSystem.read("stack.txt")).toBe(draft);

        tx.rollback();
        synced.sync();
        expect(fileSystem.read("stack.txt")).toBe("base");
        expect(synced.syncedLength()).toBe(4);
      },
    );

    it("rewrites the file after a rolled back load", () => {
      const { dir, cleanup } = makeTempDir();
      try {
        const source = join(dir, "source.txt");
        writeFileSync(source, "loaded!");
        const { fileSystem, synced, tx } = setup();

        tx.begin();
        loadFromFile(synced, source);
        expect(fileSystem.read("stack.txt")).toBe("loaded!");

        tx.rollback();
        synced.write(bytes("+"));
        expect(fileSystem.read("stack.txt")).toBe("base+");
      } finally {
        cleanup();
      }
    });
  });

  it("logs operations on a transactional buffer", () => {
    const { logger, entries } = captureLogger();
    const tx = new TransactionOverlay(new SeekBuffer());
    const logged = new LoggingOverlay(tx, { logger, name: "ledger" });

    tx.begin();
    logged.write(bytes("abc"));
    tx.rollback();
    logged.unreadLength();

    expect(entries.map((entry) => entry.msg)).toEqual([
      "[ledger] Write: 3 bytes",
      "[ledger] UnreadLength: 0 bytes",
    ]);
  });
});
