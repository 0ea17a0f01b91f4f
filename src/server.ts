import { createTransferServer } from "./app";
import { CONFIG } from "./config/env";
import { MemoryPairCodeStore, type PairCodeStore } from "./services/pairCodeStore";
import { createRedisClient } from "./services/redis";
import { RedisPairCodeStore } from "./services/redisPairCodeStore";
import { RelayStore } from "./services/relayStore";
import { SignalingHub } from "./services/signalingHub";

const redis = CONFIG.PAIR.STORE === "redis" ? createRedisClient() : undefined;
const pairStore: PairCodeStore = redis
  ? new RedisPairCodeStore(redis)
  : new MemoryPairCodeStore();

const relayStore = new RelayStore({
  rootDir: CONFIG.UPLOAD_DIR,
  retentionMs: CONFIG.CLEANUP_AFTER_HOURS * 60 * 60 * 1000,
});

const hub = new SignalingHub({
  store: pairStore,
  codeLength: CONFIG.PAIR.CODE_LENGTH,
  ttlSeconds: CONFIG.PAIR.EXPIRY_SECONDS,
});

const { server, io } = createTransferServer({
  relayStore,
  hub,
  // Room for the largest configured chunk plus transport overhead
  maxChunkBytes: Math.max(...Object.values(CONFIG.CHUNK_SIZE)) + 64 * 1024,
  redis,
});

// Periodic cleanup of transfers past the retention window
const cleanupTimer = setInterval(async () => {
  try {
    const deleted = await relayStore.sweep();
    if (deleted.length > 0) {
      console.log(`[relay] Cleanup removed ${deleted.length} transfer(s): ${deleted.join(", ")}`);
    }
  } catch (error) {
    console.error("[relay] Error during cleanup:", error);
  }
}, CONFIG.CLEANUP_INTERVAL_MINUTES * 60 * 1000);

server.listen(CONFIG.BACKEND_PORT, () => {
  console.log(
    `Transfer server running in ${CONFIG.NODE_ENV} mode on port ${CONFIG.BACKEND_PORT}`
  );
  console.log(`Upload directory: ${CONFIG.UPLOAD_DIR}`);
  console.log(`Auto-cleanup after: ${CONFIG.CLEANUP_AFTER_HOURS} hours`);
  console.log(
    `Pair codes: ${CONFIG.PAIR.CODE_LENGTH} digits, ${CONFIG.PAIR.EXPIRY_SECONDS}s expiry, ${CONFIG.PAIR.STORE} store`
  );
});

// Graceful shutdown
const shutdown = () => {
  console.log("Shutting down transfer server...");
  clearInterval(cleanupTimer);
  hub
    .shutdown()
    .catch((error: unknown) => console.error("Error closing signaling hub:", error))
    .finally(() => {
      io.close(() => {
        console.log("HTTP and socket servers closed");
        process.exit(0);
      });
    });

  // Force exit after 10 seconds
  setTimeout(() => {
    console.error("Forced shutdown after timeout");
    process.exit(1);
  }, 10000).unref();
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
