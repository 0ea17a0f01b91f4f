import { Redis } from "ioredis";
import { CONFIG } from "../config/env";

// Pairing code key prefix
export const PAIR_PREFIX = "pair:";
// Extra lifetime on top of the pairing TTL; lookups enforce the TTL themselves
export const PAIR_EXPIRY_GRACE = 60;

export function createRedisClient(): Redis {
  // Redis configuration options
  const redis = new Redis({
    host: CONFIG.REDIS.HOST,
    port: CONFIG.REDIS.PORT,
    // Redis persistence configuration needs to be set in redis.conf, not in the client
  });

  // Connection event listeners
  redis.on("connect", () => {
    console.log("Redis connected successfully");
  });

  redis.on("error", (err) => {
    console.error("Redis connection error:", err);
  });

  return redis;
}
