import type { Manifest } from "../types/manifest";

/** What a sink hands back for each stored chunk, so the sender can cross-check it. */
export interface StoredChunk {
  hash: string;
  size: number;
}

/**
 * Read side of a transport. `locator` names the transfer on transports that
 * hold more than one (the relay); single-transfer transports ignore it.
 * Chunk ids are global: a folder's files share one flattened id space.
 * Network transports abort their in-flight request when `signal` fires.
 */
export interface ChunkSource {
  getManifest(locator: string, signal?: AbortSignal): Promise<Manifest>;
  getChunk(locator: string, chunkId: number, signal?: AbortSignal): Promise<Buffer>;
}

/** Write side of a transport. */
export interface ChunkSink {
  create(transferId: string, manifest: Manifest, signal?: AbortSignal): Promise<unknown>;
  putChunk(
    transferId: string,
    chunkId: number,
    data: Buffer,
    signal?: AbortSignal
  ): Promise<StoredChunk>;
}

export type ChunkTransport = ChunkSource | (ChunkSource & ChunkSink);

export function isChunkSink(transport: ChunkTransport): transport is ChunkSource & ChunkSink {
  return "create" in transport && "putChunk" in transport;
}
