/**
 * Redis Data Structures Used:
 *
 * 1. Pairing Code:
 *    - Key Pattern: `pair:<code>` (e.g., "pair:482913")
 *    - Type: Hash
 *    - Fields:
 *      - `transfer_id`: Transfer the code resolves to.
 *      - `manifest`: JSON-encoded manifest.
 *      - `created_at`: Epoch milliseconds of issuance; expiry is computed from it.
 *      - `status`: "waiting" until both roles connect, then "paired".
 *    - TTL: pairing TTL + PAIR_EXPIRY_GRACE. The hub treats a code as expired
 *           from `created_at` alone; the Redis TTL only reclaims what nobody looks up.
 *    - Operations: HSET + EXPIRE (put), HGETALL (get), EXISTS (has),
 *                  HSET status (setStatus), DEL (delete), KEYS + HGET (purge, count).
 */
import type { Redis } from "ioredis";
import { isManifest } from "../types/manifest";
import type { PairCodeRecord, PairStatus } from "../types/signaling";
import { ManifestCorruptError } from "../utils/errors";
import type { PairCodeStore } from "./pairCodeStore";
import { PAIR_EXPIRY_GRACE, PAIR_PREFIX } from "./redis";

export class RedisPairCodeStore implements PairCodeStore {
  constructor(private readonly redis: Redis) {}

  async get(code: string): Promise<PairCodeRecord | null> {
    const fields = await this.redis.hgetall(PAIR_PREFIX + code);
    if (!fields.transfer_id) return null;

    let manifest: unknown;
    try {
      manifest = JSON.parse(fields.manifest ?? "");
    } catch (error) {
      throw new ManifestCorruptError(`Stored manifest of pair code ${code} is not JSON`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    if (!isManifest(manifest)) {
      throw new ManifestCorruptError(`Stored manifest of pair code ${code} is invalid`);
    }
    return {
      transfer_id: fields.transfer_id,
      manifest,
      created_at: parseInt(fields.created_at ?? "0", 10),
      status: fields.status === "paired" ? "paired" : "waiting",
    };
  }

  async has(code: string): Promise<boolean> {
    return (await this.redis.exists(PAIR_PREFIX + code)) === 1;
  }

  async put(code: string, record: PairCodeRecord, ttlSeconds: number): Promise<void> {
    const key = PAIR_PREFIX + code;
    await this.redis
      .multi()
      .hset(key, {
        transfer_id: record.transfer_id,
        manifest: JSON.stringify(record.manifest),
        created_at: String(record.created_at),
        status: record.status,
      })
      .expire(key, ttlSeconds + PAIR_EXPIRY_GRACE)
      .exec();
  }

  async setStatus(code: string, status: PairStatus): Promise<void> {
    const key = PAIR_PREFIX + code;
    // HSET on a missing key would resurrect a partial hash
    if ((await this.redis.exists(key)) === 1) {
      await this.redis.hset(key, "status", status);
    }
  }

  async delete(code: string): Promise<void> {
    await this.redis.del(PAIR_PREFIX + code);
  }

  async purgeCreatedBefore(cutoff: number): Promise<string[]> {
    const keys = await this.redis.keys(`${PAIR_PREFIX}*`);
    const expired: string[] = [];
    for (const key of keys) {
      const createdAt = await this.redis.hget(key, "created_at");
      if (createdAt !== null && parseInt(createdAt, 10) < cutoff) {
        await this.redis.del(key);
        expired.push(key.slice(PAIR_PREFIX.length));
      }
    }
    return expired;
  }

  async count(): Promise<number> {
    return (await this.redis.keys(`${PAIR_PREFIX}*`)).length;
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
