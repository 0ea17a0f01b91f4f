import cors from "cors";
import express from "express"; // express: A minimalist and flexible Node.js web application framework
import http from "http";
import type { Redis } from "ioredis";
import { Server } from "socket.io"; // socket.io: real-time, bi-directional channel used for pairing
import { corsOptions, corsWSOptions } from "./config/server";
import { createHealthRouter } from "./routes/health";
import { errorHandler } from "./routes/errors";
import { createRelayRouter } from "./routes/relay";
import { createSignalingRouter } from "./routes/signaling";
import type { RelayStore } from "./services/relayStore";
import type { SignalingHub } from "./services/signalingHub";
import { setupSocketHandlers } from "./socket/handlers";

export interface ServerDependencies {
  relayStore: RelayStore;
  hub: SignalingHub;
  maxChunkBytes: number;
  redis?: Redis;
}

export interface TransferServer {
  app: express.Express;
  server: http.Server;
  io: Server;
}

/** Wires the relay API, the signaling API and the pairing channel onto one HTTP server. */
export function createTransferServer(deps: ServerDependencies): TransferServer {
  const app = express(); // Create an Express application
  app.use(cors(corsOptions)); // Add CORS middleware

  const server = http.createServer(app);

  const io = new Server(server, { cors: corsWSOptions });
  setupSocketHandlers(io, deps.hub);

  // Make io instance available to routes
  app.set("io", io);

  app.use(createHealthRouter({ uploadDir: deps.relayStore.rootDir, redis: deps.redis }));
  app.use(createRelayRouter(deps.relayStore, { maxChunkBytes: deps.maxChunkBytes }));
  app.use(createSignalingRouter(deps.hub));
  app.use(errorHandler);

  return { app, server, io };
}
