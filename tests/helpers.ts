import { promises as fs } from "fs";
import type http from "http";
import os from "os";
import path from "path";
import type { FileManifest } from "../src/types/manifest";
import type { SignalingFrame } from "../src/types/signaling";
import type { PeerConnection } from "../src/services/signalingHub";

export const EMPTY_SHA256 = "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855";

export async function makeTempDir(prefix = "chunkdrop-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Deterministic, non-repeating-per-chunk bytes. */
export function patternBytes(size: number, seed = 0): Buffer {
  const data = Buffer.alloc(size);
  for (let i = 0; i < size; i++) {
    data[i] = (i * 31 + seed * 7 + Math.floor(i / 251)) % 256;
  }
  return data;
}

export async function writeFixture(filePath: string, data: Uint8Array): Promise<string> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, data);
  return filePath;
}

export function emptyFileManifest(fileName = "empty.txt"): FileManifest {
  return {
    kind: "file",
    fileName,
    filePath: `/tmp/${fileName}`,
    size: 0,
    chunkSize: 1024,
    totalChunks: 0,
    hash: EMPTY_SHA256,
    mode: "relay",
    chunks: [],
  };
}

export async function listen(server: http.Server): Promise<number> {
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Server is not bound to a TCP port");
  }
  return address.port;
}

/** In-memory end of a pairing channel that records what the hub sends it. */
export class FakeConnection implements PeerConnection {
  readonly frames: SignalingFrame[] = [];
  closed = false;
  failSends = false;
  /** Record frames but never acknowledge the write, like a stalled socket */
  hangSends = false;

  constructor(readonly id: string) {}

  send(frame: SignalingFrame): void | Promise<void> {
    if (this.failSends) throw new Error("socket write failed");
    this.frames.push(frame);
    if (this.hangSends) return new Promise<void>(() => undefined);
  }

  close(): void {
    this.closed = true;
  }

  get lastFrame(): SignalingFrame | undefined {
    return this.frames[this.frames.length - 1];
  }
}
