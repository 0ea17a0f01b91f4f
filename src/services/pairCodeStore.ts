import type { PairCodeRecord, PairStatus } from "../types/signaling";

/**
 * Storage for pairing codes. The signaling hub is the only writer and
 * serializes every call, so implementations need no locking of their own.
 */
export interface PairCodeStore {
  get(code: string): Promise<PairCodeRecord | null>;
  has(code: string): Promise<boolean>;
  /** `ttlSeconds` lets backends with native expiry drop the entry on their own */
  put(code: string, record: PairCodeRecord, ttlSeconds: number): Promise<void>;
  setStatus(code: string, status: PairStatus): Promise<void>;
  delete(code: string): Promise<void>;
  /** Removes entries created strictly before `cutoff` (epoch ms) and returns their codes. */
  purgeCreatedBefore(cutoff: number): Promise<string[]>;
  count(): Promise<number>;
  close?(): Promise<void>;
}

export class MemoryPairCodeStore implements PairCodeStore {
  private readonly codes = new Map<string, PairCodeRecord>();

  async get(code: string): Promise<PairCodeRecord | null> {
    const record = this.codes.get(code);
    return record ? { ...record } : null;
  }

  async has(code: string): Promise<boolean> {
    return this.codes.has(code);
  }

  async put(code: string, record: PairCodeRecord): Promise<void> {
    this.codes.set(code, { ...record });
  }

  async setStatus(code: string, status: PairStatus): Promise<void> {
    const record = this.codes.get(code);
    if (record) record.status = status;
  }

  async delete(code: string): Promise<void> {
    this.codes.delete(code);
  }

  async purgeCreatedBefore(cutoff: number): Promise<string[]> {
    const expired: string[] = [];
    for (const [code, record] of this.codes) {
      if (record.created_at < cutoff) expired.push(code);
    }
    for (const code of expired) this.codes.delete(code);
    return expired;
  }

  async count(): Promise<number> {
    return this.codes.size;
  }
}
