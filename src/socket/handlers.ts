import type { Server, Socket } from "socket.io";
import type { PeerConnection, SignalingHub } from "../services/signalingHub";
import { isJsonValue, isPeerRole, type SignalingFrame } from "../types/signaling";

// Every frame, hub-generated or relayed, travels on this one event name.
export const FRAME_EVENT = "frame";

function firstValue(value: string | string[] | undefined): string {
  if (Array.isArray(value)) return value[0] ?? "";
  return value ?? "";
}

function socketConnection(socket: Socket): PeerConnection {
  return {
    id: socket.id,
    send(frame: SignalingFrame) {
      if (!socket.connected) {
        throw new Error(`Socket ${socket.id} is no longer connected`);
      }
      socket.emit(FRAME_EVENT, frame);
    },
    close() {
      // Namespace-level disconnect keeps already queued frames ahead of the close
      socket.disconnect();
    },
  };
}

// Pairing channel:
// A client connects with `query: { code, role }` where role is "sender" or "receiver".
// The hub acknowledges with a `connected` frame, pairs the two roles, and from then on
// forwards every frame one side emits to the other side untouched.
export function setupSocketHandlers(io: Server, hub: SignalingHub): void {
  io.on("connection", (socket: Socket) => {
    const code = firstValue(socket.handshake.query.code);
    const rawRole = firstValue(socket.handshake.query.role);
    const connection = socketConnection(socket);
    console.log(`[signaling] New client connected: ${socket.id} code=${code} role=${rawRole}`);

    const joined = hub.connect(code, rawRole, connection).catch((error: unknown) => {
      console.error("[signaling] Error joining room:", error);
      socket.emit(FRAME_EVENT, { type: "error", message: "Server error while joining room" });
      socket.disconnect();
      return false;
    });

    socket.on(FRAME_EVENT, async (message: unknown) => {
      try {
        if (!(await joined) || !isPeerRole(rawRole)) return;
        if (!isJsonValue(message)) {
          socket.emit(FRAME_EVENT, { type: "error", message: "Invalid message format" });
          return;
        }
        await hub.relay(code, rawRole, connection, message);
      } catch (error) {
        console.error("[signaling] Error relaying message:", error);
      }
    });

    socket.on("disconnect", async (reason) => {
      console.log(`[signaling] Disconnected: ${socket.id} (${reason})`);
      try {
        if ((await joined) && isPeerRole(rawRole)) {
          await hub.disconnect(code, rawRole, connection);
        }
      } catch (error) {
        console.error("[signaling] Error leaving room:", error);
      }
    });
  });
}
