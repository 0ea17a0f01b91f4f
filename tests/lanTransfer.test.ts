import { promises as fs } from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ChunkManager } from "../src/engine/chunkManager";
import { LanTransferClient, LanTransferServer } from "../src/engine/lanTransfer";
import { TransferEngine } from "../src/engine/transferEngine";
import type { Manifest } from "../src/types/manifest";
import { makeTempDir, patternBytes, removeDir, writeFixture } from "./helpers";

const CLIENT_TIMEOUTS = { timeoutMs: 5000, chunkTimeoutMs: 5000 };

describe("LAN transfer", () => {
  let dir: string;
  let server: LanTransferServer | null;
  const chunks = new ChunkManager({ chunkSize: 1024, mode: "lan" });

  beforeEach(async () => {
    dir = await makeTempDir();
    server = null;
  });

  afterEach(async () => {
    await server?.stop();
    await removeDir(dir);
  });

  async function serve(manifest: Manifest) {
    server = new LanTransferServer(manifest);
    const { port } = await server.start(0);
    return { port, baseUrl: `http://127.0.0.1:${port}` };
  }

  it("serves a single file chunk by chunk", async () => {
    const data = patternBytes(2500, 6);
    const manifest = await chunks.createFileManifest(
      await writeFixture(path.join(dir, "share", "clip.bin"), data)
    );
    const { port } = await serve(manifest);
    const client = new LanTransferClient("127.0.0.1", port, CLIENT_TIMEOUTS);

    expect(await client.getManifest()).toEqual(manifest);
    expect((await client.downloadChunk(2)).equals(data.subarray(2048))).toBe(true);
    expect((await client.getChunk("ignored", 1)).equals(data.subarray(1024, 2048))).toBe(true);
  });

  it("lets the transfer engine download a folder from a LAN peer", async () => {
    const root = path.join(dir, "share", "project");
    const files = {
      "README.md": patternBytes(300, 1),
      "src/main.bin": patternBytes(3000, 2),
      "src/util.bin": patternBytes(1024, 3),
    };
    for (const [relative, data] of Object.entries(files)) {
      await writeFixture(path.join(root, ...relative.split("/")), data);
    }
    const manifest = await chunks.createFolderManifest(root);
    const { port } = await serve(manifest);
    const engine = new TransferEngine(new LanTransferClient("127.0.0.1", port, CLIENT_TIMEOUTS), {
      concurrency: 2,
      retry: { maxAttempts: 2, baseDelayMs: 1 },
    });
    const outDir = path.join(dir, "received");

    const report = await engine.download("lan", outDir);

    expect(report.totalChunks).toBe(1 + 3 + 1);
    expect(report.verified).toBe(true);
    for (const [relative, data] of Object.entries(files)) {
      const written = await fs.readFile(path.join(outDir, ...relative.split("/")));
      expect(written.equals(data)).toBe(true);
    }
  });

  it("answers bad chunk requests with structured errors", async () => {
    const root = path.join(dir, "share", "pair");
    await writeFixture(path.join(root, "one.bin"), patternBytes(1500));
    const { baseUrl } = await serve(await chunks.createFolderManifest(root));

    const perFile = await fetch(`${baseUrl}/chunk/0`);
    expect(perFile.status).toBe(400);
    expect(await perFile.json()).toEqual({
      error: "InvalidInput",
      detail: "Folder transfers are served per file",
    });

    const noFile = await fetch(`${baseUrl}/file/4/chunk/0`);
    expect(noFile.status).toBe(404);
    expect(await noFile.json()).toEqual({
      error: "NotFound",
      detail: "File 4 not found",
      reason: "path",
    });

    const pastEnd = await fetch(`${baseUrl}/file/0/chunk/2`);
    expect(pastEnd.status).toBe(400);
    expect(await pastEnd.json()).toEqual({
      error: "InvalidInput",
      detail: "Chunk 2 is outside 0..1",
    });
  });

  it("refuses to start twice", async () => {
    const manifest = await chunks.createFileManifest(
      await writeFixture(path.join(dir, "share", "x.bin"), patternBytes(10))
    );
    await serve(manifest);

    await expect(server?.start(0)).rejects.toThrow("LAN server is already running");
  });
});
