import path from "path";
import { CONFIG } from "../config/env";
import type { Manifest } from "../types/manifest";
import { HashMismatchError, InvalidInputError } from "../utils/errors";
import { chunkLayout, type FileChunkRange } from "./chunkLayout";
import { ChunkManager, hashBuffer } from "./chunkManager";
import { runPool, withRetry, type RetryPolicy } from "./pool";
import { isChunkSink, type ChunkSource, type ChunkTransport } from "./transport";

export type ProgressCallback = (completed: number, total: number) => void;

export interface TransferEngineOptions {
  /** Chunks in flight at once */
  concurrency?: number;
  retry?: Partial<RetryPolicy>;
}

export interface TransferRunOptions {
  signal?: AbortSignal;
}

export interface DownloadOptions extends TransferRunOptions {
  /** Compare whole-file digests after the download (default true) */
  verify?: boolean;
}

export interface UploadReport {
  transferId: string;
  totalChunks: number;
  uploadedChunks: number;
}

export interface FileVerification {
  /** `null` for a single-file transfer */
  relativePath: string | null;
  outputPath: string;
  verified: boolean;
}

export interface DownloadReport {
  outputPath: string;
  totalChunks: number;
  /** Chunks fetched by this run; resumed chunks are not counted */
  downloadedChunks: number;
  /** `null` when verification was skipped */
  verified: boolean | null;
  files: FileVerification[];
}

interface ChunkTask {
  globalId: number;
  chunkId: number;
  range: FileChunkRange;
  target: string;
}

/**
 * Moves every chunk of one transfer between local disk and a transport.
 * Works the same against the relay (in-process `RelayStore` or `RelayClient`)
 * and the LAN client, because both speak the global chunk id space produced
 * by `chunkLayout`.
 */
export class TransferEngine {
  readonly concurrency: number;
  readonly retry: RetryPolicy;

  constructor(
    private readonly transport: ChunkTransport,
    options: TransferEngineOptions = {}
  ) {
    this.concurrency = Math.max(
      CONFIG.TRANSFER.MIN_PARALLEL_CHUNKS,
      options.concurrency ?? CONFIG.TRANSFER.MAX_PARALLEL_CHUNKS
    );
    this.retry = {
      maxAttempts: options.retry?.maxAttempts ?? CONFIG.TRANSFER.MAX_RETRY_ATTEMPTS,
      baseDelayMs: options.retry?.baseDelayMs ?? CONFIG.TRANSFER.RETRY_DELAY_MS,
    };
  }

  async upload(
    transferId: string,
    manifest: Manifest,
    onProgress?: ProgressCallback,
    options: TransferRunOptions = {}
  ): Promise<UploadReport> {
    const sink = this.transport;
    if (!isChunkSink(sink)) {
      throw new InvalidInputError("Transport does not accept uploads");
    }
    const { signal } = options;

    await withRetry(
      `Creating transfer ${transferId}`,
      this.retry,
      () => sink.create(transferId, manifest, signal),
      signal
    );

    const layout = chunkLayout(manifest);
    const chunks = new ChunkManager({ chunkSize: manifest.chunkSize, mode: manifest.mode });
    const tasks: ChunkTask[] = [];
    for (const range of layout.files) {
      for (let chunkId = 0; chunkId < range.count; chunkId++) {
        tasks.push({ globalId: range.offset + chunkId, chunkId, range, target: range.file.filePath });
      }
    }

    console.log(
      `[engine] Uploading ${transferId}: ${layout.totalChunks} chunks, ${this.concurrency} in parallel`
    );
    let completed = 0;
    await runPool(
      tasks,
      this.concurrency,
      async (task) => {
        await withRetry(
          `Upload of chunk ${task.globalId}`,
          this.retry,
          async () => {
            const data = await chunks.readChunk(task.target, task.chunkId);
            const stored = await sink.putChunk(transferId, task.globalId, data, signal);
            const expected = hashBuffer(data);
            if (stored.hash !== expected || stored.size !== data.length) {
              throw new HashMismatchError(
                `Chunk ${task.globalId} was stored as ${stored.size} bytes with a different digest`,
                expected,
                stored.hash
              );
            }
          },
          signal
        );
        completed++;
        notify(onProgress, completed, layout.totalChunks);
      },
      signal
    );

    console.log(`[engine] Upload of ${transferId} complete`);
    return { transferId, totalChunks: layout.totalChunks, uploadedChunks: completed };
  }

  /**
   * Fetches whatever the destination is still missing. For a folder,
   * `outputPath` is the directory the files are written under.
   */
  async download(
    locator: string,
    outputPath: string,
    onProgress?: ProgressCallback,
    options: DownloadOptions = {}
  ): Promise<DownloadReport> {
    const source: ChunkSource = this.transport;
    const { signal } = options;

    const manifest = await withRetry(
      `Fetching manifest of ${locator}`,
      this.retry,
      () => source.getManifest(locator, signal),
      signal
    );
    const layout = chunkLayout(manifest);
    const chunks = new ChunkManager({ chunkSize: manifest.chunkSize, mode: manifest.mode });
    const root = path.resolve(outputPath);

    const tasks: ChunkTask[] = [];
    const targets: string[] = [];
    for (const range of layout.files) {
      const target = destinationOf(root, range);
      targets.push(target);
      if (range.count === 0) {
        // Empty files carry no chunks but still belong in the output
        await chunks.writeChunk(target, 0, Buffer.alloc(0));
        continue;
      }
      for (const chunkId of await chunks.getMissingChunks(target, range.count)) {
        tasks.push({ globalId: range.offset + chunkId, chunkId, range, target });
      }
    }

    let completed = layout.totalChunks - tasks.length;
    console.log(
      `[engine] Downloading ${locator}: ${tasks.length} of ${layout.totalChunks} chunks missing`
    );
    await runPool(
      tasks,
      this.concurrency,
      async (task) => {
        const expected = task.range.file.chunks[task.chunkId].hash;
        await withRetry(
          `Download of chunk ${task.globalId}`,
          this.retry,
          async () => {
            const data = await source.getChunk(locator, task.globalId, signal);
            const actual = hashBuffer(data);
            if (actual !== expected) {
              throw new HashMismatchError(
                `Chunk ${task.globalId} digest does not match the manifest`,
                expected,
                actual
              );
            }
            await chunks.writeChunk(task.target, task.chunkId, data);
          },
          signal
        );
        completed++;
        notify(onProgress, completed, layout.totalChunks);
      },
      signal
    );

    const report: DownloadReport = {
      outputPath: root,
      totalChunks: layout.totalChunks,
      downloadedChunks: tasks.length,
      verified: null,
      files: [],
    };
    if (options.verify === false) return report;

    for (const [index, range] of layout.files.entries()) {
      const target = targets[index];
      const verified = await chunks.verifyFile(target, range.file.hash);
      if (!verified) {
        console.warn(`[engine] Verification failed for ${target}`);
      }
      report.files.push({ relativePath: range.relativePath, outputPath: target, verified });
    }
    report.verified = report.files.every((file) => file.verified);
    console.log(
      `[engine] Download of ${locator} complete${report.verified ? "" : " with verification failures"}`
    );
    return report;
  }
}

function destinationOf(root: string, range: FileChunkRange): string {
  if (range.relativePath === null) return root;
  const target = path.resolve(root, ...range.relativePath.split("/"));
  if (!target.startsWith(root + path.sep)) {
    throw new InvalidInputError(`Refusing to write outside ${root}: ${range.relativePath}`);
  }
  return target;
}

function notify(onProgress: ProgressCallback | undefined, completed: number, total: number): void {
  if (!onProgress) return;
  try {
    onProgress(completed, total);
  } catch (error) {
    console.warn("[engine] Progress callback failed:", error);
  }
}
