import type { Manifest } from "./manifest";

export type PeerRole = "sender" | "receiver";
export const PEER_ROLES: readonly PeerRole[] = ["sender", "receiver"];

export type PairStatus = "waiting" | "paired";

export interface PairCodeRecord {
  transfer_id: string;
  manifest: Manifest;
  /** Epoch milliseconds */
  created_at: number;
  status: PairStatus;
}

export interface PairCodeIssued {
  pair_code: string;
  transfer_id: string;
  expires_in: number;
}

export interface PairInfo {
  pair_code: string;
  transfer_id: string;
  manifest: Manifest;
  status: PairStatus;
  expires_in: number;
}

export interface SignalingStats {
  active_pairs: number;
  total_pair_codes: number;
  active_connections: number;
}

/** Any JSON value a peer may send through the hub. The hub never looks inside. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// Frames the hub itself produces
export type ConnectedFrame = { type: "connected"; role: PeerRole; pair_code: string };
export type PeerConnectedFrame =
  | { type: "peer_connected"; peer_role: "receiver" }
  | { type: "peer_connected"; peer_role: "sender"; manifest: Manifest };
export type PeerDisconnectedFrame = { type: "peer_disconnected"; peer_role: PeerRole };
export type ErrorFrame = { type: "error"; message: string };

export type HubFrame =
  | ConnectedFrame
  | PeerConnectedFrame
  | PeerDisconnectedFrame
  | ErrorFrame;

/** What travels over a pairing channel: hub frames, or peer payloads relayed verbatim. */
export type SignalingFrame = HubFrame | JsonValue;

export function isPeerRole(value: unknown): value is PeerRole {
  return value === "sender" || value === "receiver";
}

export function oppositeRole(role: PeerRole): PeerRole {
  return role === "sender" ? "receiver" : "sender";
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) return value.every(isJsonValue);
      if (Object.getPrototypeOf(value) !== Object.prototype) return false;
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}
