import path from "path";
import type { Server } from "socket.io";
import { afterAll, afterEach, beforeAll, describe, expect, it } from "vitest";
import { createTransferServer } from "../src/app";
import { isRecord } from "../src/engine/http";
import { SignalingClient, type PairingChannel } from "../src/engine/signalingClient";
import { MemoryPairCodeStore } from "../src/services/pairCodeStore";
import { RelayStore } from "../src/services/relayStore";
import { SignalingHub } from "../src/services/signalingHub";
import type { SignalingFrame } from "../src/types/signaling";
import { emptyFileManifest, listen, makeTempDir, removeDir } from "./helpers";

const ofType =
  (type: string) =>
  (frame: SignalingFrame): boolean =>
    isRecord(frame) && frame.type === type;

describe("pairing channel over socket.io", () => {
  let dir: string;
  let io: Server;
  let hub: SignalingHub;
  let signaling: SignalingClient;
  let nextCode = 100000;
  const open: PairingChannel[] = [];
  const manifest = emptyFileManifest("plans.pdf");

  beforeAll(async () => {
    dir = await makeTempDir();
    hub = new SignalingHub({
      store: new MemoryPairCodeStore(),
      codeLength: 6,
      ttlSeconds: 3600,
      generateCode: () => String(nextCode++),
    });
    const server = createTransferServer({
      relayStore: new RelayStore({ rootDir: path.join(dir, "uploads"), retentionMs: 60_000 }),
      hub,
      maxChunkBytes: 4096,
    });
    io = server.io;
    const port = await listen(server.server);
    signaling = new SignalingClient(`http://127.0.0.1:${port}`, { timeoutMs: 5000 });
  });

  afterEach(() => {
    for (const channel of open.splice(0)) channel.close();
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => io.close(() => resolve()));
    await removeDir(dir);
  });

  async function join(code: string, role: "sender" | "receiver"): Promise<PairingChannel> {
    const channel = await signaling.connect(code, role);
    open.push(channel);
    return channel;
  }

  it("pairs a sender and a receiver and relays frames between them", async () => {
    const { pair_code: code } = await hub.issuePairCode("t1", manifest);

    const sender = await join(code, "sender");
    expect(await sender.waitFor(ofType("connected"), 5000)).toEqual({
      type: "connected",
      role: "sender",
      pair_code: code,
    });

    const receiver = await join(code, "receiver");
    expect(await receiver.waitFor(ofType("peer_connected"), 5000)).toEqual({
      type: "peer_connected",
      peer_role: "sender",
      manifest,
    });
    expect(await sender.waitFor(ofType("peer_connected"), 5000)).toEqual({
      type: "peer_connected",
      peer_role: "receiver",
    });

    sender.send({ type: "offer", sdp: "v=0", port: 9000 });
    expect(await receiver.waitFor(ofType("offer"), 5000)).toEqual({
      type: "offer",
      sdp: "v=0",
      port: 9000,
    });

    receiver.send({ type: "answer", accepted: true });
    expect(await sender.waitFor(ofType("answer"), 5000)).toEqual({
      type: "answer",
      accepted: true,
    });

    receiver.close();
    expect(await sender.waitFor(ofType("peer_disconnected"), 5000)).toEqual({
      type: "peer_disconnected",
      peer_role: "receiver",
    });
  });

  it("sends an error frame and closes for an unknown code", async () => {
    const channel = await join("000001", "receiver");

    expect(await channel.waitFor(ofType("error"), 5000)).toEqual({
      type: "error",
      message: "Invalid or expired pair code",
    });
  });

  it("tells a lone peer that nobody is listening", async () => {
    const { pair_code: code } = await hub.issuePairCode("t2", manifest);
    const sender = await join(code, "sender");
    await sender.waitFor(ofType("connected"), 5000);

    sender.send({ type: "offer" });

    expect(await sender.waitFor(ofType("error"), 5000)).toEqual({
      type: "error",
      message: "Peer not connected",
    });
  });
});
