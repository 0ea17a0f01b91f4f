export { createTransferServer, type ServerDependencies, type TransferServer } from "./app";
export { CONFIG, type AppConfig, type TransferMode } from "./config/env";
export { chunkLayout, locateChunk, totalChunksOf } from "./engine/chunkLayout";
export type { ChunkLayout, ChunkLocation, FileChunkRange } from "./engine/chunkLayout";
export { ChunkManager, formatSize, hashBuffer } from "./engine/chunkManager";
export { LanTransferClient, LanTransferServer, getLocalAddress } from "./engine/lanTransfer";
export { RelayClient } from "./engine/relayClient";
export type { RelayStatus } from "./engine/relayClient";
export { PairingChannel, SignalingClient } from "./engine/signalingClient";
export { TransferEngine } from "./engine/transferEngine";
export type {
  DownloadReport,
  ProgressCallback,
  TransferEngineOptions,
  UploadReport,
} from "./engine/transferEngine";
export type { ChunkSink, ChunkSource, ChunkTransport } from "./engine/transport";
export { MemoryPairCodeStore, type PairCodeStore } from "./services/pairCodeStore";
export { RedisPairCodeStore } from "./services/redisPairCodeStore";
export { RelayStore } from "./services/relayStore";
export { SignalingHub, type PeerConnection } from "./services/signalingHub";
export * from "./types/manifest";
export * from "./types/signaling";
export * from "./utils/errors";
