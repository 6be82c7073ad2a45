import { Injectable } from '@nestjs/common';
import { CacheStore } from './cache.store';

interface CacheEntry {
  value: string;
  expiresAt: number; // epoch ms, Infinity when the entry never expires
}

// Expired entries nobody reads again are dropped by a sweep on write at most this often
const SWEEP_INTERVAL_MS = 30_000;

@Injectable()
export class InMemoryCacheStore extends CacheStore {
  private readonly entries = new Map<string, CacheEntry>();
  private lastSweepAt = Date.now();

  /** Entries held, including expired ones not yet swept. */
  get size(): number {
    return this.entries.size;
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const now = Date.now();
    if (now - this.lastSweepAt >= SWEEP_INTERVAL_MS) {
      this.sweep(now);
    }

    this.entries.set(key, {
      value,
      expiresAt: ttlSeconds > 0 ? now + ttlSeconds * 1000 : Infinity,
    });
  }

  async delete(key: string): Promise<boolean> {
    const existed = this.live(key) !== undefined;
    this.entries.delete(key);
    return existed;
  }

  async ttl(key: string): Promise<number> {
    const entry = this.live(key);
    if (!entry) {
      return -2;
    }
    if (entry.expiresAt === Infinity) {
      return -1;
    }
    return Math.ceil((entry.expiresAt - Date.now()) / 1000);
  }

  async keys(prefix: string): Promise<string[]> {
    return [...this.entries.keys()].filter((key) => key.startsWith(prefix) && this.live(key));
  }

  async ping(): Promise<void> {
    // always reachable
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
      }
    }
    this.lastSweepAt = now;
  }

  private live(key: string): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}
