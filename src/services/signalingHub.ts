import { randomInt } from "crypto";
import { isManifest, manifestProblems } from "../types/manifest";
import {
  isPeerRole,
  oppositeRole,
  type PairCodeIssued,
  type PairInfo,
  type PairCodeRecord,
  type PeerRole,
  type SignalingFrame,
  type SignalingStats,
} from "../types/signaling";
import {
  ExhaustedError,
  InvalidInputError,
  NotFoundError,
} from "../utils/errors";
import { SerialQueue } from "../utils/serialQueue";
import type { PairCodeStore } from "./pairCodeStore";

/** One live end of a pairing channel, independent of the socket library behind it. */
export interface PeerConnection {
  readonly id: string;
  send(frame: SignalingFrame): void | Promise<void>;
  close(): void;
}

interface Room {
  sender?: PeerConnection;
  receiver?: PeerConnection;
}

interface Delivery {
  to: PeerConnection;
  frame: SignalingFrame;
  /** Close the connection once the frame is out (or failed) */
  closeAfter?: boolean;
}

export interface SignalingHubOptions {
  store: PairCodeStore;
  codeLength: number;
  ttlSeconds: number;
  now?: () => number;
  generateCode?: (length: number) => string;
  maxCodeAttempts?: number;
}

const DEFAULT_MAX_CODE_ATTEMPTS = 100;

// Generate a random numeric pairing code of the given length
export function generateNumericCode(length: number): string {
  let code = "";
  for (let i = 0; i < length; i++) {
    code += randomInt(0, 10).toString();
  }
  return code;
}

/**
 * Issues pairing codes, pairs a sender and a receiver into a room, and relays
 * opaque messages between them.
 *
 * Both tables (pairing codes and rooms) are only touched inside `queue`, so no
 * two mutations interleave. Frames to peers are collected while holding the
 * queue and sent after it is released: a slow or dead socket never holds up
 * other rooms.
 */
export class SignalingHub {
  private readonly rooms = new Map<string, Room>();
  private readonly queue = new SerialQueue();
  private readonly store: PairCodeStore;
  private readonly codeLength: number;
  private readonly ttlSeconds: number;
  private readonly now: () => number;
  private readonly generateCode: (length: number) => string;
  private readonly maxCodeAttempts: number;

  constructor(options: SignalingHubOptions) {
    this.store = options.store;
    this.codeLength = options.codeLength;
    this.ttlSeconds = options.ttlSeconds;
    this.now = options.now ?? Date.now;
    this.generateCode = options.generateCode ?? generateNumericCode;
    this.maxCodeAttempts = options.maxCodeAttempts ?? DEFAULT_MAX_CODE_ATTEMPTS;
  }

  async issuePairCode(transferId: unknown, manifest: unknown): Promise<PairCodeIssued> {
    if (typeof transferId !== "string" || transferId.length === 0) {
      throw new InvalidInputError("transfer_id is required");
    }
    if (!isManifest(manifest)) {
      throw new InvalidInputError("Malformed manifest", manifestProblems(manifest));
    }

    return this.queue.run(async () => {
      await this.purgeExpired();

      let code: string | null = null;
      for (let attempt = 0; attempt < this.maxCodeAttempts; attempt++) {
        const candidate = this.generateCode(this.codeLength);
        if (!(await this.store.has(candidate))) {
          code = candidate;
          break;
        }
      }
      if (code === null) {
        throw new ExhaustedError(
          "Failed to generate a unique pair code",
          this.maxCodeAttempts
        );
      }

      await this.store.put(
        code,
        { transfer_id: transferId, manifest, created_at: this.now(), status: "waiting" },
        this.ttlSeconds
      );
      console.log(`[signaling] Issued pair code ${code} for transfer ${transferId}`);
      return { pair_code: code, transfer_id: transferId, expires_in: this.ttlSeconds };
    });
  }

  async getInfo(code: string): Promise<PairInfo> {
    return this.queue.run(async () => {
      await this.purgeExpired();
      const record = await this.liveRecord(code);
      if (!record) {
        throw new NotFoundError("pair_code", "Pair code not found or expired");
      }
      return {
        pair_code: code,
        transfer_id: record.transfer_id,
        manifest: record.manifest,
        status: record.status,
        expires_in: this.remainingSeconds(record),
      };
    });
  }

  /**
   * Registers `connection` under `role` in the code's room. Returns false if the
   * code or role was rejected; the connection has then been sent an error frame
   * and closed.
   */
  async connect(code: string, role: unknown, connection: PeerConnection): Promise<boolean> {
    const { accepted, deliveries, replaced } = await this.queue.run(async () => {
      const out: Delivery[] = [];
      const record = await this.liveRecord(code);
      if (!record) {
        out.push({
          to: connection,
          frame: { type: "error", message: "Invalid or expired pair code" },
          closeAfter: true,
        });
        return { accepted: false, deliveries: out, replaced: undefined };
      }
      if (!isPeerRole(role)) {
        out.push({
          to: connection,
          frame: { type: "error", message: "Invalid role. Must be 'sender' or 'receiver'" },
          closeAfter: true,
        });
        return { accepted: false, deliveries: out, replaced: undefined };
      }

      const room = this.rooms.get(code) ?? {};
      const previous = room[role];
      room[role] = connection;
      this.rooms.set(code, room);
      out.push({ to: connection, frame: { type: "connected", role, pair_code: code } });

      if (room.sender && room.receiver) {
        await this.store.setStatus(code, "paired");
        out.push({ to: room.sender, frame: { type: "peer_connected", peer_role: "receiver" } });
        out.push({
          to: room.receiver,
          frame: { type: "peer_connected", peer_role: "sender", manifest: record.manifest },
        });
      }
      console.log(`[signaling] ${role} joined room ${code} (${connection.id})`);
      return {
        accepted: true,
        deliveries: out,
        replaced: previous && previous !== connection ? previous : undefined,
      };
    });

    if (replaced) replaced.close();
    await this.deliverAll(deliveries);
    return accepted;
  }

  /** Forwards `message` verbatim to the other role, or tells the sender the peer is gone. */
  async relay(
    code: string,
    role: PeerRole,
    connection: PeerConnection,
    message: SignalingFrame
  ): Promise<void> {
    const peer = await this.queue.run(() => this.rooms.get(code)?.[oppositeRole(role)]);
    const delivered = peer ? await this.deliver({ to: peer, frame: message }) : false;
    if (!delivered) {
      await this.deliver({
        to: connection,
        frame: { type: "error", message: "Peer not connected" },
      });
    }
  }

  async disconnect(code: string, role: PeerRole, connection: PeerConnection): Promise<void> {
    const deliveries = await this.queue.run(() => {
      const out: Delivery[] = [];
      const room = this.rooms.get(code);
      // A connection that was already replaced must not evict its successor
      if (!room || room[role] !== connection) return out;

      delete room[role];
      const peer = room[oppositeRole(role)];
      if (peer) {
        out.push({ to: peer, frame: { type: "peer_disconnected", peer_role: role } });
      } else {
        this.rooms.delete(code);
      }
      console.log(`[signaling] ${role} left room ${code} (${connection.id})`);
      return out;
    });
    await this.deliverAll(deliveries);
  }

  async stats(): Promise<SignalingStats> {
    return this.queue.run(async () => {
      await this.purgeExpired();
      let connections = 0;
      for (const room of this.rooms.values()) {
        if (room.sender) connections++;
        if (room.receiver) connections++;
      }
      return {
        active_pairs: this.rooms.size,
        total_pair_codes: await this.store.count(),
        active_connections: connections,
      };
    });
  }

  /** Closes every live connection and forgets all rooms. */
  async shutdown(): Promise<void> {
    const connections = await this.queue.run(() => {
      const all: PeerConnection[] = [];
      for (const room of this.rooms.values()) {
        if (room.sender) all.push(room.sender);
        if (room.receiver) all.push(room.receiver);
      }
      this.rooms.clear();
      return all;
    });
    for (const connection of connections) connection.close();
    await this.store.close?.();
  }

  // Must run inside the queue
  private async purgeExpired(): Promise<void> {
    const expired = await this.store.purgeCreatedBefore(this.now() - this.ttlSeconds * 1000);
    if (expired.length > 0) {
      console.log(`[signaling] Expired ${expired.length} pair code(s)`);
    }
  }

  // Must run inside the queue; a record past its TTL is treated as absent
  private async liveRecord(code: string): Promise<PairCodeRecord | null> {
    const record = await this.store.get(code);
    if (!record) return null;
    if (this.now() - record.created_at > this.ttlSeconds * 1000) return null;
    return record;
  }

  private remainingSeconds(record: PairCodeRecord): number {
    const ageSeconds = Math.floor((this.now() - record.created_at) / 1000);
    return Math.max(0, this.ttlSeconds - ageSeconds);
  }

  private async deliverAll(deliveries: Delivery[]): Promise<void> {
    for (const delivery of deliveries) {
      await this.deliver(delivery);
    }
  }

  /** Sends one frame; a failed write counts as "peer not connected", never as fatal. */
  private async deliver({ to, frame, closeAfter }: Delivery): Promise<boolean> {
    let ok = true;
    try {
      await to.send(frame);
    } catch (error) {
      console.warn(`[signaling] Failed to send to ${to.id}:`, error);
      ok = false;
    }
    if (closeAfter) to.close();
    return ok;
  }
}
