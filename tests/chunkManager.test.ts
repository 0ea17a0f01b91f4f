import { promises as fs } from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ChunkManager, formatSize, hashBuffer } from "../src/engine/chunkManager";
import {
  IOFailureError,
  InvalidInputError,
  NotFoundError,
} from "../src/utils/errors";
import { EMPTY_SHA256, makeTempDir, patternBytes, removeDir, writeFixture } from "./helpers";

const CHUNK = 1024;

describe("ChunkManager", () => {
  let dir: string;
  let manager: ChunkManager;

  beforeEach(async () => {
    dir = await makeTempDir();
    manager = new ChunkManager({ chunkSize: CHUNK });
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe("createFileManifest", () => {
    it("splits a file into fixed-size chunks with a short last chunk", async () => {
      const data = patternBytes(2560);
      const file = await writeFixture(path.join(dir, "report.bin"), data);

      const manifest = await manager.createFileManifest(file);

      expect(manifest.kind).toBe("file");
      expect(manifest.fileName).toBe("report.bin");
      expect(manifest.filePath).toBe(file);
      expect(manifest.size).toBe(2560);
      expect(manifest.chunkSize).toBe(CHUNK);
      expect(manifest.totalChunks).toBe(3);
      expect(manifest.mode).toBe("relay");
      expect(manifest.hash).toBe(hashBuffer(data));
      expect(manifest.chunks).toEqual([
        { id: 0, hash: hashBuffer(data.subarray(0, 1024)), size: 1024 },
        { id: 1, hash: hashBuffer(data.subarray(1024, 2048)), size: 1024 },
        { id: 2, hash: hashBuffer(data.subarray(2048)), size: 512 },
      ]);
    });

    it("produces no chunks for an empty file", async () => {
      const file = await writeFixture(path.join(dir, "empty"), Buffer.alloc(0));

      const manifest = await manager.createFileManifest(file);

      expect(manifest.totalChunks).toBe(0);
      expect(manifest.chunks).toEqual([]);
      expect(manifest.hash).toBe(EMPTY_SHA256);
    });

    it("adds no empty chunk when the size is an exact multiple", async () => {
      const file = await writeFixture(path.join(dir, "even"), patternBytes(2048));

      const manifest = await manager.createFileManifest(file);

      expect(manifest.totalChunks).toBe(2);
      expect(manifest.chunks.map((chunk) => chunk.size)).toEqual([1024, 1024]);
    });

    it("rejects a missing path with NotFound", async () => {
      await expect(manager.createFileManifest(path.join(dir, "nope"))).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it("rejects a directory with InvalidInput", async () => {
      await expect(manager.createFileManifest(dir)).rejects.toBeInstanceOf(InvalidInputError);
    });
  });

  describe("createFolderManifest", () => {
    it("lists regular files recursively, sorted by relative path", async () => {
      const root = path.join(dir, "photos");
      await writeFixture(path.join(root, "b.txt"), patternBytes(100, 1));
      await writeFixture(path.join(root, "a", "d.txt"), patternBytes(3000, 2));
      await writeFixture(path.join(root, "a", "c.txt"), Buffer.alloc(0));

      const manifest = await manager.createFolderManifest(root);

      expect(manifest.kind).toBe("folder");
      expect(manifest.folderName).toBe("photos");
      expect(manifest.folderPath).toBe(root);
      expect(manifest.totalFiles).toBe(3);
      expect(manifest.totalSize).toBe(3100);
      expect(manifest.chunkSize).toBe(CHUNK);
      expect(manifest.files.map((file) => file.relativePath)).toEqual([
        "a/c.txt",
        "a/d.txt",
        "b.txt",
      ]);
      expect(manifest.files.map((file) => file.totalChunks)).toEqual([0, 3, 1]);
      expect(manifest.files[1].filePath).toBe(path.join(root, "a", "d.txt"));
    });

    it("rejects a path that is not a directory", async () => {
      const file = await writeFixture(path.join(dir, "plain.txt"), patternBytes(10));

      const error = await manager.createFolderManifest(file).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error).toMatchObject({ details: { reason: "not_a_directory" } });
    });

    it("reports a missing folder as not a directory", async () => {
      const error = await manager
        .createFolderManifest(path.join(dir, "nowhere"))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error).toMatchObject({ details: { reason: "not_a_directory" } });
    });

    it("surfaces a folder that cannot be read as an IO failure", async () => {
      const root = path.join(dir, "locked");
      const denied = Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });
      const stat = vi.spyOn(fs, "stat").mockRejectedValueOnce(denied);
      try {
        const error = await manager.createFolderManifest(root).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(IOFailureError);
        expect(error).toMatchObject({
          message: `Cannot open folder ${root}: EACCES: permission denied`,
        });
      } finally {
        stat.mockRestore();
      }
    });
  });

  describe("readChunk", () => {
    it("returns exactly the chunk bytes, and the remainder for the last chunk", async () => {
      const data = patternBytes(2560);
      const file = await writeFixture(path.join(dir, "f"), data);

      expect((await manager.readChunk(file, 1)).equals(data.subarray(1024, 2048))).toBe(true);
      expect((await manager.readChunk(file, 2)).equals(data.subarray(2048))).toBe(true);
    });

    it("fails with IOFailure past the end of the file", async () => {
      const file = await writeFixture(path.join(dir, "f"), patternBytes(2560));

      await expect(manager.readChunk(file, 3)).rejects.toBeInstanceOf(IOFailureError);
    });

    it("reads an empty first chunk from an empty file", async () => {
      const file = await writeFixture(path.join(dir, "f"), Buffer.alloc(0));

      expect((await manager.readChunk(file, 0)).length).toBe(0);
    });
  });

  describe("writeChunk", () => {
    it("reassembles a file from chunks written out of order", async () => {
      const data = patternBytes(2560, 3);
      const target = path.join(dir, "out", "nested", "copy.bin");

      await manager.writeChunk(target, 2, data.subarray(2048));
      await manager.writeChunk(target, 0, data.subarray(0, 1024));
      await manager.writeChunk(target, 1, data.subarray(1024, 2048));

      expect((await fs.readFile(target)).equals(data)).toBe(true);
      expect(await manager.verifyFile(target, hashBuffer(data))).toBe(true);
    });

    it("leaves bytes outside the written region alone", async () => {
      const data = patternBytes(3072, 4);
      const target = await writeFixture(path.join(dir, "copy.bin"), data);
      const replacement = Buffer.alloc(1024, 0xab);

      await manager.writeChunk(target, 1, replacement);

      const written = await fs.readFile(target);
      expect(written.length).toBe(3072);
      expect(written.subarray(0, 1024).equals(data.subarray(0, 1024))).toBe(true);
      expect(written.subarray(1024, 2048).equals(replacement)).toBe(true);
      expect(written.subarray(2048).equals(data.subarray(2048))).toBe(true);
    });
  });

  describe("verification", () => {
    it("compares chunk and file digests without throwing on mismatch", async () => {
      const data = patternBytes(1500);
      const file = await writeFixture(path.join(dir, "f"), data);

      expect(await manager.verifyChunk(file, 0, hashBuffer(data.subarray(0, 1024)))).toBe(true);
      expect(await manager.verifyChunk(file, 1, hashBuffer(data.subarray(0, 1024)))).toBe(false);
      expect(await manager.verifyFile(file, EMPTY_SHA256)).toBe(false);
      expect(await manager.hashFile(file)).toBe(hashBuffer(data));
    });
  });

  describe("getMissingChunks", () => {
    it("reports every chunk for an absent file", async () => {
      expect(await manager.getMissingChunks(path.join(dir, "absent"), 3)).toEqual([0, 1, 2]);
    });

    it("infers downloaded chunks from the file size", async () => {
      const target = path.join(dir, "partial");
      await manager.writeChunk(target, 0, patternBytes(1024));

      expect(await manager.getMissingChunks(target, 3)).toEqual([1, 2]);
    });

    it("counts a partial last chunk as missing", async () => {
      const target = await writeFixture(path.join(dir, "full"), patternBytes(2560));

      expect(await manager.getMissingChunks(target, 3)).toEqual([2]);
    });

    it("reports nothing once the size covers every chunk", async () => {
      const target = await writeFixture(path.join(dir, "full"), patternBytes(3072));

      expect(await manager.getMissingChunks(target, 3)).toEqual([]);
    });
  });

  describe("configuration", () => {
    it("takes the chunk size of a transfer mode", () => {
      const lan = new ChunkManager("lan");
      expect(lan.chunkSize).toBe(2 * 1024 * 1024);
      expect(lan.mode).toBe("lan");
    });

    it("rejects a non-positive chunk size", () => {
      expect(() => new ChunkManager({ chunkSize: 0 })).toThrow(InvalidInputError);
    });

    it("formats sizes for logs", () => {
      expect(formatSize(0)).toBe("0.00 B");
      expect(formatSize(1536)).toBe("1.50 KB");
      expect(formatSize(5 * 1024 * 1024)).toBe("5.00 MB");
    });
  });
});
