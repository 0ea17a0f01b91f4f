/**
 * LAN transport
 *
 *   GET /manifest                          the served manifest
 *   GET /chunk/:chunkId                    chunk of a single-file transfer
 *   GET /file/:fileIndex/chunk/:chunkId    chunk of one file of a folder transfer
 *
 * The server reads chunks straight from the sender's disk; nothing is staged.
 */
import dgram from "dgram";
import express, { type RequestHandler } from "express";
import http from "http";
import type { AddressInfo } from "net";
import { CONFIG } from "../config/env";
import { errorHandler } from "../routes/errors";
import { isManifest, manifestProblems, type FileManifest, type Manifest } from "../types/manifest";
import { InvalidInputError, NotFoundError } from "../utils/errors";
import { chunkLayout, locateChunk, type ChunkLayout } from "./chunkLayout";
import { ChunkManager } from "./chunkManager";
import { requestBuffer, requestJson } from "./http";
import type { ChunkSource } from "./transport";

const FALLBACK_ADDRESS = "127.0.0.1";
const PROBE_HOST = "8.8.8.8";
const PROBE_PORT = 80;

/**
 * Local address other hosts on the network can reach us at. A UDP socket
 * "connected" to a public address makes the OS pick the outbound interface;
 * no datagram is sent.
 */
export function getLocalAddress(timeoutMs = 1000): Promise<string> {
  return new Promise((resolve) => {
    const socket = dgram.createSocket("udp4");
    let settled = false;
    const finish = (address: string) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.close();
      resolve(address);
    };
    const timer = setTimeout(() => finish(FALLBACK_ADDRESS), timeoutMs);
    socket.on("error", (error) => {
      console.warn("[lan] Local address discovery failed:", error.message);
      finish(FALLBACK_ADDRESS);
    });
    socket.connect(PROBE_PORT, PROBE_HOST, () => {
      try {
        finish(socket.address().address);
      } catch (error) {
        console.warn("[lan] Could not read local address:", error);
        finish(FALLBACK_ADDRESS);
      }
    });
  });
}

function parseIndex(raw: string, what: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new InvalidInputError(`Invalid ${what}: ${raw}`);
  }
  return parseInt(raw, 10);
}

export interface LanServerAddress {
  address: string;
  port: number;
}

export class LanTransferServer {
  readonly app: express.Express;
  private server: http.Server | null = null;
  private readonly chunks: ChunkManager;

  constructor(private readonly manifest: Manifest) {
    this.chunks = new ChunkManager({ chunkSize: manifest.chunkSize, mode: manifest.mode });
    this.app = express();

    const manifestHandler: RequestHandler = (req, res) => {
      res.json(this.manifest);
    };

    const chunkHandler: RequestHandler<{ chunkId: string }> = async (req, res, next) => {
      try {
        if (this.manifest.kind !== "file") {
          throw new InvalidInputError("Folder transfers are served per file");
        }
        const chunkId = parseIndex(req.params.chunkId, "chunk id");
        await this.sendChunk(res, this.manifest, chunkId);
      } catch (error) {
        next(error);
      }
    };

    const fileChunkHandler: RequestHandler<{ fileIndex: string; chunkId: string }> = async (
      req,
      res,
      next
    ) => {
      try {
        if (this.manifest.kind !== "folder") {
          throw new InvalidInputError("Single-file transfers have no file index");
        }
        const fileIndex = parseIndex(req.params.fileIndex, "file index");
        const chunkId = parseIndex(req.params.chunkId, "chunk id");
        const file = this.manifest.files[fileIndex];
        if (!file) {
          throw new NotFoundError("path", `File ${fileIndex} not found`);
        }
        await this.sendChunk(res, file, chunkId);
      } catch (error) {
        next(error);
      }
    };

    this.app.get("/manifest", manifestHandler);
    this.app.get("/chunk/:chunkId", chunkHandler);
    this.app.get("/file/:fileIndex/chunk/:chunkId", fileChunkHandler);
    this.app.use(errorHandler);
  }

  private async sendChunk(res: express.Response, file: FileManifest, chunkId: number) {
    if (chunkId >= file.totalChunks) {
      throw new InvalidInputError(`Chunk ${chunkId} is outside 0..${file.totalChunks - 1}`);
    }
    const data = await this.chunks.readChunk(file.filePath, chunkId);
    res.status(200).type("application/octet-stream").send(data);
  }

  /** Starts serving; pass port 0 for an ephemeral port. */
  async start(port: number = CONFIG.LAN_DISCOVERY_PORT): Promise<LanServerAddress> {
    if (this.server) {
      throw new InvalidInputError("LAN server is already running");
    }
    const server = http.createServer(this.app);
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, () => {
        server.off("error", reject);
        resolve();
      });
    });
    this.server = server;

    const { port: boundPort }: AddressInfo = addressOf(server);
    const address = await getLocalAddress();
    console.log(`[lan] Serving ${describe(this.manifest)} on http://${address}:${boundPort}`);
    return { address, port: boundPort };
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
    console.log("[lan] Server stopped");
  }
}

function addressOf(server: http.Server): AddressInfo {
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new InvalidInputError("LAN server is not listening on a TCP port");
  }
  return address;
}

function describe(manifest: Manifest): string {
  return manifest.kind === "file"
    ? `file ${manifest.fileName}`
    : `folder ${manifest.folderName} (${manifest.totalFiles} files)`;
}

export interface LanTransferClientOptions {
  timeoutMs?: number;
  chunkTimeoutMs?: number;
}

/**
 * Receiver side of the LAN transport. Implements `ChunkSource` over the global
 * chunk id space so `TransferEngine` can download from it unchanged; the
 * locator argument is ignored since a LAN server serves one transfer.
 */
export class LanTransferClient implements ChunkSource {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly chunkTimeoutMs: number;
  private layout: ChunkLayout | null = null;

  constructor(
    serverAddress: string,
    port: number = CONFIG.LAN_DISCOVERY_PORT,
    options: LanTransferClientOptions = {}
  ) {
    this.baseUrl = `http://${serverAddress}:${port}`;
    this.timeoutMs = options.timeoutMs ?? CONFIG.TRANSFER.CONNECTION_TIMEOUT_MS;
    this.chunkTimeoutMs = options.chunkTimeoutMs ?? CONFIG.TRANSFER.CHUNK_TIMEOUT_MS;
  }

  async getManifest(_locator?: string, signal?: AbortSignal): Promise<Manifest> {
    const body = await requestJson(
      `${this.baseUrl}/manifest`,
      { method: "GET", signal },
      this.timeoutMs
    );
    if (!isManifest(body)) {
      throw new InvalidInputError("Malformed manifest from LAN peer", manifestProblems(body));
    }
    this.layout = chunkLayout(body);
    return body;
  }

  async downloadChunk(chunkId: number, signal?: AbortSignal): Promise<Buffer> {
    return requestBuffer(
      `${this.baseUrl}/chunk/${chunkId}`,
      { method: "GET", signal },
      this.chunkTimeoutMs
    );
  }

  async downloadFileChunk(
    fileIndex: number,
    chunkId: number,
    signal?: AbortSignal
  ): Promise<Buffer> {
    return requestBuffer(
      `${this.baseUrl}/file/${fileIndex}/chunk/${chunkId}`,
      { method: "GET", signal },
      this.chunkTimeoutMs
    );
  }

  /** Fetches a chunk by its global id, routing folder ids to the owning file. */
  async getChunk(locator: string, chunkId: number, signal?: AbortSignal): Promise<Buffer> {
    const layout = this.layout ?? chunkLayout(await this.getManifest(locator, signal));
    if (layout.files.length === 1 && layout.files[0].relativePath === null) {
      return this.downloadChunk(chunkId, signal);
    }
    const location = locateChunk(layout, chunkId);
    return this.downloadFileChunk(location.fileIndex, location.chunkId, signal);
  }
}
