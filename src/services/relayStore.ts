/**
 * Filesystem layout used by the relay store:
 *
 *   <root>/<transfer_id>/manifest.json
 *     - The transfer record: `{ transfer_id, created_at, manifest }`.
 *     - `created_at` is epoch milliseconds and drives the retention sweep.
 *     - Rewritten on re-creation (idempotent create); chunks past the new
 *       total are pruned, the rest are kept.
 *
 *   <root>/<transfer_id>/chunks/chunk_<NNNNNN>
 *     - One file per uploaded chunk, named by zero-padded global chunk id.
 *     - Written to a temp name and renamed into place, so a reader never sees
 *       a half-written chunk and re-uploads simply replace the file.
 *
 * There is no in-memory index. Which chunks exist is always recomputed from
 * the chunk directory, so the store survives restarts and tolerates concurrent
 * writers as long as they touch different chunk ids.
 */
import { createHash, randomBytes } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import { totalChunksOf } from "../engine/chunkLayout";
import { isManifest, manifestProblems, type Manifest } from "../types/manifest";
import {
  InvalidInputError,
  ManifestCorruptError,
  NotFoundError,
  toTransferError,
} from "../utils/errors";

const MANIFEST_FILE = "manifest.json";
const CHUNK_DIR = "chunks";
const CHUNK_FILE_PATTERN = /^chunk_(\d+)$/;
const TRANSFER_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export interface StoredTransfer {
  transfer_id: string;
  created_at: number;
  manifest: Manifest;
}

export interface CreateTransferResult {
  status: "created";
  transfer_id: string;
  total_chunks: number;
}

export interface ChunkReceipt {
  status: "uploaded";
  chunk_id: number;
  hash: string;
  size: number;
}

export interface TransferStatus {
  transfer_id: string;
  total_chunks: number;
  uploaded_chunks: number;
  progress: number;
  available_chunks: number[];
  complete: boolean;
}

export interface RelayStoreOptions {
  rootDir: string;
  /** Transfers older than this are removed by `sweep()` */
  retentionMs: number;
  now?: () => number;
}

export function chunkFileName(chunkId: number): string {
  return `chunk_${String(chunkId).padStart(6, "0")}`;
}

export class RelayStore {
  readonly rootDir: string;
  readonly retentionMs: number;
  private readonly now: () => number;

  constructor(options: RelayStoreOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.retentionMs = options.retentionMs;
    this.now = options.now ?? Date.now;
  }

  private transferDir(transferId: string): string {
    if (!TRANSFER_ID_PATTERN.test(transferId)) {
      throw new InvalidInputError(`Invalid transfer id: ${transferId}`);
    }
    return path.join(this.rootDir, transferId);
  }

  private chunkDir(transferId: string): string {
    return path.join(this.transferDir(transferId), CHUNK_DIR);
  }

  async create(transferId: string, manifest: unknown): Promise<CreateTransferResult> {
    if (!isManifest(manifest)) {
      throw new InvalidInputError("Malformed manifest", manifestProblems(manifest));
    }
    const record: StoredTransfer = {
      transfer_id: transferId,
      created_at: this.now(),
      manifest,
    };
    const chunkDir = this.chunkDir(transferId);
    try {
      await fs.mkdir(chunkDir, { recursive: true });
      await this.writeAtomically(
        path.join(this.transferDir(transferId), MANIFEST_FILE),
        JSON.stringify(record, null, 2)
      );
    } catch (error) {
      throw toTransferError(error, `Failed to create transfer ${transferId}`);
    }
    await this.pruneChunks(transferId, totalChunksOf(manifest));
    return {
      status: "created",
      transfer_id: transferId,
      total_chunks: totalChunksOf(manifest),
    };
  }

  async putChunk(transferId: string, chunkId: number, data: Uint8Array): Promise<ChunkReceipt> {
    const { manifest } = await this.readRecord(transferId);
    this.assertChunkId(chunkId, totalChunksOf(manifest));
    const target = path.join(this.chunkDir(transferId), chunkFileName(chunkId));
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await this.writeAtomically(target, data);
    } catch (error) {
      throw toTransferError(error, `Failed to store chunk ${chunkId}`);
    }
    return {
      status: "uploaded",
      chunk_id: chunkId,
      hash: createHash("sha256").update(data).digest("hex"),
      size: data.length,
    };
  }

  async getChunk(transferId: string, chunkId: number): Promise<Buffer> {
    this.assertChunkId(chunkId);
    const { manifest } = await this.readRecord(transferId);
    this.assertChunkId(chunkId, totalChunksOf(manifest));
    const chunkPath = path.join(this.chunkDir(transferId), chunkFileName(chunkId));
    try {
      return await fs.readFile(chunkPath);
    } catch (error) {
      const normalized = toTransferError(error, `Failed to read chunk ${chunkId}`);
      if (!(normalized instanceof NotFoundError)) throw normalized;
    }
    throw new NotFoundError(
      "chunk_pending",
      `Chunk ${chunkId} not yet uploaded. Please wait for sender to complete upload.`
    );
  }

  async getManifest(transferId: string): Promise<Manifest> {
    return (await this.readRecord(transferId)).manifest;
  }

  async status(transferId: string): Promise<TransferStatus> {
    const { manifest } = await this.readRecord(transferId);
    const available = await this.listChunkIds(transferId);
    const total = totalChunksOf(manifest);
    const progress = total > 0 ? (available.length / total) * 100 : 0;
    return {
      transfer_id: transferId,
      total_chunks: total,
      uploaded_chunks: available.length,
      progress: Math.round(progress * 100) / 100,
      available_chunks: available,
      complete: available.length === total,
    };
  }

  async delete(transferId: string): Promise<void> {
    if (!(await this.exists(transferId))) {
      throw new NotFoundError("transfer_unknown", `Transfer ${transferId} not found`);
    }
    try {
      await fs.rm(this.transferDir(transferId), { recursive: true, force: true });
    } catch (error) {
      throw toTransferError(error, `Failed to delete transfer ${transferId}`);
    }
  }

  /** Removes transfers created more than `retentionMs` ago. Returns the removed ids. */
  async sweep(): Promise<string[]> {
    const cutoff = this.now() - this.retentionMs;
    let entries: string[];
    try {
      entries = await fs.readdir(this.rootDir);
    } catch (error) {
      const normalized = toTransferError(error, "Failed to list relay storage");
      if (normalized instanceof NotFoundError) return [];
      throw normalized;
    }

    const removed: string[] = [];
    for (const transferId of entries.sort()) {
      if (!TRANSFER_ID_PATTERN.test(transferId)) continue;
      let record: StoredTransfer;
      try {
        record = await this.readRecord(transferId);
      } catch (error) {
        console.warn(`[relay] Skipping ${transferId} during cleanup:`, error);
        continue;
      }
      if (record.created_at < cutoff) {
        await fs.rm(this.transferDir(transferId), { recursive: true, force: true });
        removed.push(transferId);
      }
    }
    return removed;
  }

  async exists(transferId: string): Promise<boolean> {
    try {
      const stat = await fs.stat(path.join(this.transferDir(transferId), MANIFEST_FILE));
      return stat.isFile();
    } catch (error) {
      const normalized = toTransferError(error, `Failed to check ${transferId}`);
      if (normalized instanceof NotFoundError) return false;
      throw normalized;
    }
  }

  /** Chunk ids present on disk, sorted numerically. */
  async listChunkIds(transferId: string): Promise<number[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.chunkDir(transferId));
    } catch (error) {
      throw toTransferError(error, `Transfer ${transferId} not found`, "transfer_unknown");
    }
    const ids: number[] = [];
    for (const name of names) {
      const match = CHUNK_FILE_PATTERN.exec(name);
      if (match) ids.push(parseInt(match[1], 10));
    }
    return ids.sort((a, b) => a - b);
  }

  // A re-created transfer may describe fewer chunks than were already uploaded
  private async pruneChunks(transferId: string, totalChunks: number): Promise<void> {
    const stale = (await this.listChunkIds(transferId)).filter((id) => id >= totalChunks);
    for (const id of stale) {
      try {
        await fs.rm(path.join(this.chunkDir(transferId), chunkFileName(id)), { force: true });
      } catch (error) {
        throw toTransferError(error, `Failed to prune chunk ${id} of ${transferId}`);
      }
    }
    if (stale.length > 0) {
      console.log(`[relay] Pruned ${stale.length} stale chunk(s) of ${transferId}`);
    }
  }

  async readRecord(transferId: string): Promise<StoredTransfer> {
    const manifestPath = path.join(this.transferDir(transferId), MANIFEST_FILE);
    let raw: string;
    try {
      raw = await fs.readFile(manifestPath, "utf8");
    } catch (error) {
      throw toTransferError(
        error,
        `Transfer ${transferId} not found`,
        "transfer_unknown"
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ManifestCorruptError(`Manifest of ${transferId} is not valid JSON`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    if (parsed === null || typeof parsed !== "object") {
      throw new ManifestCorruptError(`Manifest record of ${transferId} is not an object`);
    }
    const createdAt = "created_at" in parsed ? parsed.created_at : undefined;
    const manifest = "manifest" in parsed ? parsed.manifest : undefined;
    if (typeof createdAt !== "number" || !isManifest(manifest)) {
      throw new ManifestCorruptError(
        `Manifest record of ${transferId} is invalid`,
        manifestProblems(manifest)
      );
    }
    return { transfer_id: transferId, created_at: createdAt, manifest };
  }

  private assertChunkId(chunkId: number, totalChunks?: number): void {
    if (!Number.isInteger(chunkId) || chunkId < 0) {
      throw new InvalidInputError(`Invalid chunk id: ${chunkId}`);
    }
    if (totalChunks !== undefined && chunkId >= totalChunks) {
      throw new InvalidInputError(
        `Chunk ${chunkId} is outside the transfer's ${totalChunks} chunks`
      );
    }
  }

  private async writeAtomically(target: string, data: string | Uint8Array): Promise<void> {
    const temp = `${target}.${randomBytes(6).toString("hex")}.tmp`;
    try {
      await fs.writeFile(temp, data);
      await fs.rename(temp, target);
    } catch (error) {
      await fs.rm(temp, { force: true });
      throw error;
    }
  }
}
