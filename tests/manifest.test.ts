import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ChunkManager } from "../src/engine/chunkManager";
import { isManifest, manifestProblems } from "../src/types/manifest";
import { emptyFileManifest, makeTempDir, patternBytes, removeDir, writeFixture } from "./helpers";

describe("manifest validation", () => {
  let dir: string;
  const manager = new ChunkManager({ chunkSize: 1024 });

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("accepts manifests built by ChunkManager", async () => {
    const file = await writeFixture(path.join(dir, "one", "a.bin"), patternBytes(2500));
    await writeFixture(path.join(dir, "one", "b.bin"), patternBytes(10));

    expect(manifestProblems(await manager.createFileManifest(file))).toEqual([]);
    expect(isManifest(await manager.createFolderManifest(path.join(dir, "one")))).toBe(true);
  });

  it("accepts a manifest that went through JSON", () => {
    expect(isManifest(JSON.parse(JSON.stringify(emptyFileManifest())))).toBe(true);
  });

  it("flags a chunk count that does not match the size", () => {
    const manifest = { ...emptyFileManifest(), size: 2560 };

    expect(manifestProblems(manifest)).toEqual([
      { path: "/totalChunks", message: "expected 3 for size 2560" },
    ]);
  });

  it("flags gaps in chunk ids", () => {
    const hash = emptyFileManifest().hash;
    const manifest = {
      ...emptyFileManifest(),
      size: 2048,
      totalChunks: 2,
      chunks: [
        { id: 0, hash, size: 1024 },
        { id: 2, hash, size: 1024 },
      ],
    };

    expect(manifestProblems(manifest)).toEqual([
      { path: "/chunks/1/id", message: "expected contiguous id 1" },
    ]);
  });

  it("flags a folder whose file count is off", () => {
    const manifest = {
      kind: "folder",
      folderName: "docs",
      folderPath: "/src/docs",
      totalSize: 0,
      totalFiles: 2,
      chunkSize: 1024,
      mode: "relay",
      files: [{ ...emptyFileManifest(), relativePath: "empty.txt" }],
    };

    expect(manifestProblems(manifest)).toEqual([{ path: "/totalFiles", message: "expected 1" }]);
  });

  it("flags a folder file with a different chunk size", () => {
    const manifest = {
      kind: "folder",
      folderName: "docs",
      folderPath: "/src/docs",
      totalSize: 0,
      totalFiles: 1,
      chunkSize: 2048,
      mode: "relay",
      files: [{ ...emptyFileManifest(), relativePath: "empty.txt" }],
    };

    expect(manifestProblems(manifest)).toEqual([
      { path: "/files/0/chunkSize", message: "must match the folder chunk size" },
    ]);
  });

  it("flags a folder that lists the same path twice", () => {
    const file = { ...emptyFileManifest(), relativePath: "notes/empty.txt" };
    const manifest = {
      kind: "folder",
      folderName: "docs",
      folderPath: "/src/docs",
      totalSize: 0,
      totalFiles: 2,
      chunkSize: 1024,
      mode: "relay",
      files: [file, { ...file }],
    };

    expect(isManifest(manifest)).toBe(false);
    expect(manifestProblems(manifest)).toEqual([
      { path: "/files/1/relativePath", message: "duplicate path notes/empty.txt" },
    ]);
  });

  it("flags a folder whose total size disagrees with its files", () => {
    const manifest = {
      kind: "folder",
      folderName: "docs",
      folderPath: "/src/docs",
      totalSize: 512,
      totalFiles: 1,
      chunkSize: 1024,
      mode: "relay",
      files: [{ ...emptyFileManifest(), relativePath: "empty.txt" }],
    };

    expect(manifestProblems(manifest)).toEqual([{ path: "/totalSize", message: "expected 0" }]);
  });

  it("rejects structurally invalid values", () => {
    expect(isManifest(null)).toBe(false);
    expect(isManifest("manifest")).toBe(false);
    expect(isManifest({ ...emptyFileManifest(), kind: undefined })).toBe(false);
    expect(isManifest({ ...emptyFileManifest(), hash: "not-a-digest" })).toBe(false);
    expect(isManifest({ ...emptyFileManifest(), mode: "carrier-pigeon" })).toBe(false);
    expect(manifestProblems({}).length).toBeGreaterThan(0);
  });
});
