import dotenv from "dotenv";
import path from "path";

export type TransferMode = "lan" | "webrtc" | "relay";
export type PairStoreKind = "memory" | "redis";

// Define the type for the configuration object
export interface AppConfig {
  BACKEND_PORT: number;
  CORS_ORIGIN: string;
  NODE_ENV: "development" | "production";
  UPLOAD_DIR: string;
  CLEANUP_AFTER_HOURS: number;
  CLEANUP_INTERVAL_MINUTES: number;
  CHUNK_SIZE: Record<TransferMode, number>;
  TRANSFER: {
    MAX_PARALLEL_CHUNKS: number;
    MIN_PARALLEL_CHUNKS: number;
    MAX_RETRY_ATTEMPTS: number;
    RETRY_DELAY_MS: number;
    CONNECTION_TIMEOUT_MS: number;
    CHUNK_TIMEOUT_MS: number;
  };
  PAIR: {
    CODE_LENGTH: number;
    EXPIRY_SECONDS: number;
    STORE: PairStoreKind;
  };
  REDIS: {
    HOST: string;
    PORT: number;
  };
  LAN_DISCOVERY_PORT: number;
  RELAY_URL: string;
  SIGNALING_URL: string;
}

// Load the corresponding .env file based on the environment
dotenv.config({
  path:
    process.env.NODE_ENV === "production"
      ? path.resolve(process.cwd(), ".env.production")
      : path.resolve(process.cwd(), ".env.development"),
});

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    console.error(`FATAL ERROR: ${name} must be an integer, got "${raw}".`);
    process.exit(1);
  }
  return value;
}

const pairStore: PairStoreKind =
  process.env.PAIR_STORE === "redis" ? "redis" : "memory";

// Redis is only needed when pairing codes are kept there
if (pairStore === "redis" && !process.env.REDIS_HOST) {
  console.error("FATAL ERROR: REDIS_HOST environment variable is not set.");
  process.exit(1);
}

const backendPort = intFromEnv("BACKEND_PORT", 8000);

// Export the type-safe configuration object
export const CONFIG: AppConfig = {
  BACKEND_PORT: backendPort,
  CORS_ORIGIN: process.env.CORS_ORIGIN ?? "",
  NODE_ENV:
    process.env.NODE_ENV === "production" ? "production" : "development",
  UPLOAD_DIR: path.resolve(process.cwd(), process.env.UPLOAD_DIR || "uploads"),
  CLEANUP_AFTER_HOURS: intFromEnv("CLEANUP_AFTER_HOURS", 24),
  CLEANUP_INTERVAL_MINUTES: intFromEnv("CLEANUP_INTERVAL_MINUTES", 60),
  CHUNK_SIZE: {
    lan: intFromEnv("CHUNK_SIZE_LAN", 2 * 1024 * 1024), // 2MB
    webrtc: intFromEnv("CHUNK_SIZE_WEBRTC", 512 * 1024), // 512KB
    relay: intFromEnv("CHUNK_SIZE_RELAY", 1024 * 1024), // 1MB
  },
  TRANSFER: {
    MAX_PARALLEL_CHUNKS: intFromEnv("MAX_PARALLEL_CHUNKS", 5),
    MIN_PARALLEL_CHUNKS: intFromEnv("MIN_PARALLEL_CHUNKS", 1),
    MAX_RETRY_ATTEMPTS: intFromEnv("MAX_RETRY_ATTEMPTS", 3),
    RETRY_DELAY_MS: intFromEnv("RETRY_DELAY_MS", 2000),
    CONNECTION_TIMEOUT_MS: intFromEnv("CONNECTION_TIMEOUT", 30) * 1000,
    CHUNK_TIMEOUT_MS: intFromEnv("CHUNK_TIMEOUT", 60) * 1000,
  },
  PAIR: {
    CODE_LENGTH: intFromEnv("PAIR_CODE_LENGTH", 6),
    EXPIRY_SECONDS: intFromEnv("PAIR_CODE_EXPIRY", 3600), // 1 hour
    STORE: pairStore,
  },
  REDIS: {
    HOST: process.env.REDIS_HOST ?? "",
    PORT: intFromEnv("REDIS_PORT", 6379),
  },
  LAN_DISCOVERY_PORT: intFromEnv("LAN_DISCOVERY_PORT", 9000),
  RELAY_URL: process.env.RELAY_URL || `http://localhost:${backendPort}`,
  SIGNALING_URL: process.env.SIGNALING_URL || `http://localhost:${backendPort}`,
};
