import { createHash } from "crypto";
import { constants as fsConstants, promises as fs, type Stats } from "fs";
import type { FileHandle } from "fs/promises";
import path from "path";
import { CONFIG, type TransferMode } from "../config/env";
import type {
  ChunkInfo,
  FileManifest,
  FolderFileManifest,
  FolderManifest,
} from "../types/manifest";
import {
  IOFailureError,
  InvalidInputError,
  NotFoundError,
  toTransferError,
} from "../utils/errors";

export type ChunkManagerOptions = TransferMode | { chunkSize: number; mode?: TransferMode };

/** sha256 hex digest of a buffer. */
export function hashBuffer(data: Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

/** Formats bytes to a human readable size, e.g. `1.50 MB`. */
export function formatSize(bytes: number): string {
  const units = ["B", "KB", "MB", "GB", "TB"];
  let value = bytes;
  for (const unit of units) {
    if (value < 1024) return `${value.toFixed(2)} ${unit}`;
    value /= 1024;
  }
  return `${value.toFixed(2)} PB`;
}

// Reads until `length` bytes are in or EOF is hit; a single read may return short.
async function readFully(
  handle: FileHandle,
  position: number,
  length: number
): Promise<Buffer> {
  const buffer = Buffer.alloc(length);
  let filled = 0;
  while (filled < length) {
    const { bytesRead } = await handle.read(
      buffer,
      filled,
      length - filled,
      position + filled
    );
    if (bytesRead === 0) break;
    filled += bytesRead;
  }
  return filled === length ? buffer : buffer.subarray(0, filled);
}

/**
 * Slices files into fixed-size chunks, hashes them, and writes them back at
 * their byte offsets. Every chunk except possibly the last is exactly
 * `chunkSize` bytes.
 */
export class ChunkManager {
  readonly chunkSize: number;
  readonly mode: TransferMode;

  constructor(options: ChunkManagerOptions = "relay") {
    if (typeof options === "string") {
      this.mode = options;
      this.chunkSize = CONFIG.CHUNK_SIZE[options];
    } else {
      this.mode = options.mode ?? "relay";
      this.chunkSize = options.chunkSize;
    }
    if (!Number.isInteger(this.chunkSize) || this.chunkSize <= 0) {
      throw new InvalidInputError(`Invalid chunk size: ${this.chunkSize}`);
    }
  }

  /**
   * Builds a single-file manifest in one pass: each chunk is read once and fed
   * to both its own digest and the whole-file digest.
   */
  async createFileManifest(filePath: string): Promise<FileManifest> {
    const resolved = path.resolve(filePath);
    const stat = await fs.stat(resolved).catch((error: unknown) => {
      throw toTransferError(error, `File not found: ${resolved}`);
    });
    if (!stat.isFile()) {
      throw new InvalidInputError(`Not a regular file: ${resolved}`);
    }

    const fileHash = createHash("sha256");
    const chunks: ChunkInfo[] = [];
    let size = 0;

    const handle = await fs.open(resolved, "r").catch((error: unknown) => {
      throw toTransferError(error, `Cannot open ${resolved}`);
    });
    try {
      for (;;) {
        const data = await readFully(handle, size, this.chunkSize);
        if (data.length === 0) break;
        fileHash.update(data);
        chunks.push({ id: chunks.length, hash: hashBuffer(data), size: data.length });
        size += data.length;
        if (data.length < this.chunkSize) break;
      }
    } catch (error) {
      throw toTransferError(error, `Failed to read ${resolved}`);
    } finally {
      await handle.close();
    }

    return {
      kind: "file",
      fileName: path.basename(resolved),
      filePath: resolved,
      size,
      chunkSize: this.chunkSize,
      totalChunks: chunks.length,
      hash: fileHash.digest("hex"),
      mode: this.mode,
      chunks,
    };
  }

  /** Recursively manifests every regular file under `folderPath`, sorted by relative path. */
  async createFolderManifest(folderPath: string): Promise<FolderManifest> {
    const root = path.resolve(folderPath);
    let stat: Stats | null;
    try {
      stat = await fs.stat(root);
    } catch (error) {
      const normalized = toTransferError(error, `Cannot open folder ${root}`);
      if (!(normalized instanceof NotFoundError)) throw normalized;
      stat = null;
    }
    if (!stat || !stat.isDirectory()) {
      throw new InvalidInputError(`Folder not found: ${root}`, {
        reason: "not_a_directory",
      });
    }

    const relativePaths = (await this.listFiles(root, "")).sort();
    const files: FolderFileManifest[] = [];
    let totalSize = 0;
    for (const relativePath of relativePaths) {
      const manifest = await this.createFileManifest(
        path.join(root, ...relativePath.split("/"))
      );
      files.push({ ...manifest, relativePath });
      totalSize += manifest.size;
    }

    return {
      kind: "folder",
      folderName: path.basename(root),
      folderPath: root,
      totalSize,
      totalFiles: files.length,
      chunkSize: this.chunkSize,
      mode: this.mode,
      files,
    };
  }

  // Relative paths use "/" whatever the platform separator is.
  private async listFiles(root: string, prefix: string): Promise<string[]> {
    const dir = prefix ? path.join(root, ...prefix.split("/")) : root;
    const entries = await fs.readdir(dir, { withFileTypes: true }).catch((error: unknown) => {
      throw toTransferError(error, `Cannot list ${dir}`);
    });
    const found: string[] = [];
    for (const entry of entries) {
      const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        found.push(...(await this.listFiles(root, relative)));
      } else if (entry.isFile()) {
        found.push(relative);
      }
    }
    return found;
  }

  /** Reads chunk `chunkId`: `chunkSize` bytes, or the remainder for the last chunk. */
  async readChunk(filePath: string, chunkId: number): Promise<Buffer> {
    const offset = chunkId * this.chunkSize;
    let handle: FileHandle;
    try {
      handle = await fs.open(filePath, "r");
    } catch (error) {
      throw toTransferError(error, `Cannot open ${filePath}`);
    }
    try {
      const { size } = await handle.stat();
      if (offset > 0 && offset >= size) {
        throw new IOFailureError(
          `Chunk ${chunkId} starts at ${offset} but ${filePath} is only ${size} bytes`
        );
      }
      return await readFully(handle, offset, this.chunkSize);
    } catch (error) {
      throw toTransferError(error, `Failed to read chunk ${chunkId} of ${filePath}`);
    } finally {
      await handle.close();
    }
  }

  /**
   * Writes `data` at `chunkId * chunkSize`, creating the file and its parents if
   * needed. The file is never truncated, so concurrent writers to different
   * chunks of the same file do not clobber each other.
   */
  async writeChunk(filePath: string, chunkId: number, data: Uint8Array): Promise<void> {
    const offset = chunkId * this.chunkSize;
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      const handle = await fs.open(filePath, fsConstants.O_RDWR | fsConstants.O_CREAT);
      try {
        let written = 0;
        while (written < data.length) {
          const { bytesWritten } = await handle.write(
            data,
            written,
            data.length - written,
            offset + written
          );
          written += bytesWritten;
        }
      } finally {
        await handle.close();
      }
    } catch (error) {
      throw toTransferError(error, `Failed to write chunk ${chunkId} of ${filePath}`);
    }
  }

  async verifyChunk(filePath: string, chunkId: number, expectedHash: string): Promise<boolean> {
    const data = await this.readChunk(filePath, chunkId);
    return hashBuffer(data) === expectedHash;
  }

  async verifyFile(filePath: string, expectedHash: string): Promise<boolean> {
    return (await this.hashFile(filePath)) === expectedHash;
  }

  async hashFile(filePath: string): Promise<string> {
    const hash = createHash("sha256");
    let handle: FileHandle;
    try {
      handle = await fs.open(filePath, "r");
    } catch (error) {
      throw toTransferError(error, `Cannot open ${filePath}`);
    }
    try {
      let position = 0;
      for (;;) {
        const data = await readFully(handle, position, this.chunkSize);
        if (data.length === 0) break;
        hash.update(data);
        position += data.length;
      }
    } catch (error) {
      throw toTransferError(error, `Failed to hash ${filePath}`);
    } finally {
      await handle.close();
    }
    return hash.digest("hex");
  }

  /**
   * Chunk ids still to fetch, inferred from the destination's current size.
   *
   * Assumes chunks were written in increasing, gap-free order: a file of
   * `size` bytes is taken to hold chunks `0 .. floor(size / chunkSize) - 1`.
   * A partial final chunk always counts as missing, and out-of-order writes
   * that extend the file past a gap make the gap invisible.
   */
  async getMissingChunks(filePath: string, totalChunks: number): Promise<number[]> {
    let size: number;
    try {
      size = (await fs.stat(filePath)).size;
    } catch (error) {
      const normalized = toTransferError(error, `Cannot stat ${filePath}`);
      if (normalized instanceof NotFoundError) {
        return range(0, totalChunks);
      }
      throw normalized;
    }
    const downloaded = Math.floor(size / this.chunkSize);
    return range(Math.min(downloaded, totalChunks), totalChunks);
  }
}

function range(start: number, end: number): number[] {
  const ids: number[] = [];
  for (let id = start; id < end; id++) ids.push(id);
  return ids;
}
