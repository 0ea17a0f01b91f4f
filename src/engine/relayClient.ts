import { CONFIG } from "../config/env";
import { isManifest, manifestProblems, type Manifest } from "../types/manifest";
import { InvalidInputError } from "../utils/errors";
import { isRecord, requestBuffer, requestJson } from "./http";
import type { ChunkSink, ChunkSource, StoredChunk } from "./transport";

export interface RelayClientOptions {
  /** Per-request timeout for manifest, status and bookkeeping calls */
  timeoutMs?: number;
  /** Per-request timeout for chunk bodies */
  chunkTimeoutMs?: number;
}

export interface RelayCreateResult {
  transfer_id: string;
  total_chunks: number;
}

export interface RelayStatus {
  transfer_id: string;
  total_chunks: number;
  uploaded_chunks: number;
  progress: number;
  available_chunks: number[];
  complete: boolean;
}

export interface RelayCleanupResult {
  deleted_count: number;
  deleted_transfers: string[];
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === "number");
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function malformed(what: string, body: unknown): InvalidInputError {
  return new InvalidInputError(`Malformed ${what} response from relay`, { body });
}

/** HTTP client of the relay API; a drop-in transport for `TransferEngine`. */
export class RelayClient implements ChunkSource, ChunkSink {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly chunkTimeoutMs: number;

  constructor(baseUrl: string = CONFIG.RELAY_URL, options: RelayClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? CONFIG.TRANSFER.CONNECTION_TIMEOUT_MS;
    this.chunkTimeoutMs = options.chunkTimeoutMs ?? CONFIG.TRANSFER.CHUNK_TIMEOUT_MS;
  }

  private url(route: string): string {
    return `${this.baseUrl}${route}`;
  }

  private transferUrl(transferId: string, suffix = ""): string {
    return this.url(`/transfer/${encodeURIComponent(transferId)}${suffix}`);
  }

  async create(
    transferId: string,
    manifest: Manifest,
    signal?: AbortSignal
  ): Promise<RelayCreateResult> {
    const body = await requestJson(
      this.url("/transfer/create"),
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ transfer_id: transferId, manifest }),
        signal,
      },
      this.timeoutMs
    );
    if (
      !isRecord(body) ||
      typeof body.transfer_id !== "string" ||
      typeof body.total_chunks !== "number"
    ) {
      throw malformed("create", body);
    }
    return { transfer_id: body.transfer_id, total_chunks: body.total_chunks };
  }

  async putChunk(
    transferId: string,
    chunkId: number,
    data: Buffer,
    signal?: AbortSignal
  ): Promise<StoredChunk> {
    const body = await requestJson(
      this.transferUrl(transferId, `/chunk/${chunkId}`),
      {
        method: "POST",
        headers: { "Content-Type": "application/octet-stream" },
        body: data,
        signal,
      },
      this.chunkTimeoutMs
    );
    if (!isRecord(body) || typeof body.hash !== "string" || typeof body.size !== "number") {
      throw malformed("chunk upload", body);
    }
    return { hash: body.hash, size: body.size };
  }

  async getChunk(transferId: string, chunkId: number, signal?: AbortSignal): Promise<Buffer> {
    return requestBuffer(
      this.transferUrl(transferId, `/chunk/${chunkId}`),
      { method: "GET", signal },
      this.chunkTimeoutMs
    );
  }

  async getManifest(transferId: string, signal?: AbortSignal): Promise<Manifest> {
    const body = await requestJson(
      this.transferUrl(transferId, "/manifest"),
      { method: "GET", signal },
      this.timeoutMs
    );
    if (!isManifest(body)) {
      throw new InvalidInputError("Malformed manifest response from relay", manifestProblems(body));
    }
    return body;
  }

  async status(transferId: string): Promise<RelayStatus> {
    const body = await requestJson(
      this.transferUrl(transferId, "/status"),
      { method: "GET" },
      this.timeoutMs
    );
    if (
      !isRecord(body) ||
      typeof body.transfer_id !== "string" ||
      typeof body.total_chunks !== "number" ||
      typeof body.uploaded_chunks !== "number" ||
      typeof body.progress !== "number" ||
      !isNumberArray(body.available_chunks) ||
      typeof body.complete !== "boolean"
    ) {
      throw malformed("status", body);
    }
    return {
      transfer_id: body.transfer_id,
      total_chunks: body.total_chunks,
      uploaded_chunks: body.uploaded_chunks,
      progress: body.progress,
      available_chunks: body.available_chunks,
      complete: body.complete,
    };
  }

  async delete(transferId: string): Promise<void> {
    await requestJson(this.transferUrl(transferId), { method: "DELETE" }, this.timeoutMs);
  }

  async cleanup(): Promise<RelayCleanupResult> {
    const body = await requestJson(this.url("/cleanup"), { method: "POST" }, this.timeoutMs);
    if (
      !isRecord(body) ||
      typeof body.deleted_count !== "number" ||
      !isStringArray(body.deleted_transfers)
    ) {
      throw malformed("cleanup", body);
    }
    return { deleted_count: body.deleted_count, deleted_transfers: body.deleted_transfers };
  }
}
