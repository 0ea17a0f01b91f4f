import { EventEmitter } from "events";
import { io, type Socket } from "socket.io-client";
import { CONFIG } from "../config/env";
import { isManifest, type Manifest } from "../types/manifest";
import {
  isJsonValue,
  isPeerRole,
  type JsonValue,
  type PairCodeIssued,
  type PairInfo,
  type PairStatus,
  type PeerRole,
  type SignalingFrame,
} from "../types/signaling";
import { InvalidInputError, NetworkFailureError } from "../utils/errors";
import { isRecord, requestJson } from "./http";

const FRAME_EVENT = "frame";

function isPairStatus(value: unknown): value is PairStatus {
  return value === "waiting" || value === "paired";
}

export interface SignalingClientOptions {
  timeoutMs?: number;
}

/**
 * One side of a pairing channel. Emits `frame` for every frame the hub sends
 * (its own frames and the peer's relayed payloads alike) and `close` once the
 * channel is gone.
 */
export class PairingChannel extends EventEmitter {
  // Frames not yet claimed by `waitFor`, so a frame that lands before anyone waits is not lost
  private readonly inbox: SignalingFrame[] = [];

  constructor(
    readonly role: PeerRole,
    private readonly socket: Socket
  ) {
    super();
    socket.on(FRAME_EVENT, (frame: unknown) => {
      if (!isJsonValue(frame)) {
        console.warn("[signaling] Dropping non-JSON frame");
        return;
      }
      this.inbox.push(frame);
      this.emit("frame", frame);
    });
    socket.on("disconnect", (reason) => {
      this.emit("close", reason);
    });
  }

  get connected(): boolean {
    return this.socket.connected;
  }

  /** Sends a payload to the peer; the hub relays it untouched. */
  send(message: JsonValue): void {
    this.socket.emit(FRAME_EVENT, message);
  }

  /** Resolves with the oldest unclaimed frame matching `predicate`. */
  waitFor(
    predicate: (frame: SignalingFrame) => boolean,
    timeoutMs: number = CONFIG.TRANSFER.CONNECTION_TIMEOUT_MS
  ): Promise<SignalingFrame> {
    const index = this.inbox.findIndex(predicate);
    if (index >= 0) {
      const [frame] = this.inbox.splice(index, 1);
      return Promise.resolve(frame);
    }
    if (!this.socket.connected) {
      return Promise.reject(new NetworkFailureError("Pairing channel is closed"));
    }
    return new Promise((resolve, reject) => {
      const onFrame = (frame: SignalingFrame) => {
        if (!predicate(frame)) return;
        cleanup();
        this.inbox.splice(this.inbox.indexOf(frame), 1);
        resolve(frame);
      };
      const onClose = (reason: string) => {
        cleanup();
        reject(new NetworkFailureError(`Pairing channel closed: ${reason}`));
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new NetworkFailureError(`No matching frame within ${timeoutMs}ms`));
      }, timeoutMs);
      const cleanup = () => {
        clearTimeout(timer);
        this.off("frame", onFrame);
        this.off("close", onClose);
      };
      this.on("frame", onFrame);
      this.on("close", onClose);
    });
  }

  close(): void {
    this.socket.disconnect();
  }
}

/** Sender and receiver side of the signaling API. */
export class SignalingClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(baseUrl: string = CONFIG.SIGNALING_URL, options: SignalingClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? CONFIG.TRANSFER.CONNECTION_TIMEOUT_MS;
  }

  async createPairCode(transferId: string, manifest: Manifest): Promise<PairCodeIssued> {
    const body = await requestJson(
      `${this.baseUrl}/pair/create`,
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ transfer_id: transferId, manifest }),
      },
      this.timeoutMs
    );
    if (
      !isRecord(body) ||
      typeof body.pair_code !== "string" ||
      typeof body.transfer_id !== "string" ||
      typeof body.expires_in !== "number"
    ) {
      throw new InvalidInputError("Malformed pair code response", { body });
    }
    return { pair_code: body.pair_code, transfer_id: body.transfer_id, expires_in: body.expires_in };
  }

  async getPairInfo(code: string): Promise<PairInfo> {
    const body = await requestJson(
      `${this.baseUrl}/pair/${encodeURIComponent(code)}/info`,
      { method: "GET" },
      this.timeoutMs
    );
    if (
      !isRecord(body) ||
      typeof body.pair_code !== "string" ||
      typeof body.transfer_id !== "string" ||
      !isManifest(body.manifest) ||
      !isPairStatus(body.status) ||
      typeof body.expires_in !== "number"
    ) {
      throw new InvalidInputError("Malformed pair info response", { body });
    }
    return {
      pair_code: body.pair_code,
      transfer_id: body.transfer_id,
      manifest: body.manifest,
      status: body.status,
      expires_in: body.expires_in,
    };
  }

  /**
   * Opens the pairing channel for `code` as `role`. Resolves once the
   * transport is up; the hub's `connected` (or `error`) frame follows on the
   * channel.
   */
  connect(code: string, role: PeerRole): Promise<PairingChannel> {
    if (!isPeerRole(role)) {
      return Promise.reject(new InvalidInputError(`Invalid role: ${String(role)}`));
    }
    const socket = io(this.baseUrl, {
      query: { code, role },
      transports: ["websocket"],
      reconnection: false,
      timeout: this.timeoutMs,
    });
    // Attach before the first frame can arrive
    const channel = new PairingChannel(role, socket);
    return new Promise((resolve, reject) => {
      socket.once("connect", () => {
        socket.off("connect_error");
        resolve(channel);
      });
      socket.once("connect_error", (error) => {
        socket.disconnect();
        reject(new NetworkFailureError(`Signaling connection failed: ${error.message}`, error));
      });
    });
  }
}
