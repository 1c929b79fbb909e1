import { createSilentLogger, type Logger } from "../core/logging";
import { cancelledError, isProviderRuntimeError } from "./errors";
import type { CacheTtlPolicy, ProviderOperation } from "./types";

export const DEFAULT_CACHE_TTLS: CacheTtlPolicy = {
  ttlMs: {
    search: 5 * 60_000,
    categories: 30 * 60_000,
    categoryDramas: 5 * 60_000,
    recommendations: 5 * 60_000,
    episodes: 10 * 60_000,
    // CDN play tokens expire quickly.
    videoUrl: 60_000
  },
  negativeTtlMs: 5_000
};

export const DEFAULT_MAX_ENTRIES = 500;

// Admission and cancellation failures say nothing about the upstream answer.
const UNCACHED_FAILURE_CODES: ReadonlySet<string> = new Set(["rate_limit_exceeded", "cancelled"]);

const isCacheableFailure = (error: unknown): boolean => {
  return !isProviderRuntimeError(error) || !UNCACHED_FAILURE_CODES.has(error.code);
};

export type CacheEntryState = "pending" | "ready" | "failed";

type Outcome<V> = { ok: true; value: V } | { ok: false; error: unknown };

interface EntryBase {
  fingerprint: string;
  providerId: string;
  operation: ProviderOperation;
  createdAt: number;
  lastAccessedAt: number;
}

interface PendingEntry<V> extends EntryBase {
  state: "pending";
  ttlMs: number;
  settled: Promise<Outcome<V>>;
  waiters: number;
}

interface ReadyEntry<V> extends EntryBase {
  state: "ready";
  value: V;
  expiresAt: number;
}

interface FailedEntry extends EntryBase {
  state: "failed";
  error: unknown;
  expiresAt: number;
}

type CacheEntry<V> = PendingEntry<V> | ReadyEntry<V> | FailedEntry;

export interface CacheEntrySnapshot {
  fingerprint: string;
  providerId: string;
  operation: ProviderOperation;
  state: CacheEntryState;
  createdAt: number;
  lastAccessedAt: number;
  expiresAt?: number;
  waiters?: number;
}

export interface CacheRequest {
  fingerprint: string;
  providerId: string;
  operation: ProviderOperation;
  /** Overrides the operation's TTL from the policy. */
  ttlMs?: number;
  signal?: AbortSignal;
}

export interface QueryCacheOptions {
  maxEntries?: number;
  policy?: {
    ttlMs?: Partial<Record<ProviderOperation, number>>;
    negativeTtlMs?: number;
  };
  now?: () => number;
  logger?: Logger;
}

export interface QueryCacheStats {
  size: number;
  pending: number;
  hits: number;
  misses: number;
  dedupJoins: number;
  negativeHits: number;
  evictions: number;
  maxEntries: number;
}

/**
 * Maps query fingerprints to a settled value or to the one in-flight fetch
 * for that fingerprint. Entry transitions happen synchronously, so every
 * waiter attached to a pending entry observes the same outcome.
 */
export class QueryCache<V> {
  readonly maxEntries: number;
  private readonly policy: CacheTtlPolicy;
  // Map iteration order doubles as recency order: touching an entry re-inserts it.
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly now: () => number;
  private readonly logger: Logger;
  private counters = { hits: 0, misses: 0, dedupJoins: 0, negativeHits: 0, evictions: 0 };

  constructor(options: QueryCacheOptions = {}) {
    this.maxEntries = Math.max(1, Math.floor(options.maxEntries ?? DEFAULT_MAX_ENTRIES));
    this.policy = {
      ttlMs: { ...DEFAULT_CACHE_TTLS.ttlMs, ...(options.policy?.ttlMs ?? {}) },
      negativeTtlMs: options.policy?.negativeTtlMs ?? DEFAULT_CACHE_TTLS.negativeTtlMs
    };
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger ?? createSilentLogger("cache");
  }

  /** Synchronous lookup of a ready, unexpired value. */
  peek(fingerprint: string): V | undefined {
    const entry = this.entries.get(fingerprint);
    if (!entry || entry.state !== "ready") return undefined;
    if (entry.expiresAt <= this.now()) return undefined;
    return entry.value;
  }

  /**
   * Returns the cached value, joins the in-flight fetch, or starts one.
   * Aborting `request.signal` only ends this caller's wait.
   */
  resolve(request: CacheRequest, fetcher: () => Promise<V>): Promise<V> {
    if (request.signal?.aborted) {
      return Promise.reject(cancelledError());
    }

    const now = this.now();
    const existing = this.entries.get(request.fingerprint);

    if (existing?.state === "ready" && existing.expiresAt > now) {
      this.counters.hits += 1;
      this.touch(existing, now);
      this.logger.debug("cache.hit", { provider: existing.providerId, data: { fingerprint: existing.fingerprint } });
      return Promise.resolve(existing.value);
    }

    if (existing?.state === "failed" && existing.expiresAt > now) {
      this.counters.negativeHits += 1;
      this.touch(existing, now);
      return Promise.reject(existing.error);
    }

    if (existing?.state === "pending") {
      this.counters.dedupJoins += 1;
      existing.lastAccessedAt = now;
      this.logger.debug("cache.dedup", { provider: existing.providerId, data: { fingerprint: existing.fingerprint } });
      return this.attach(existing, request.signal);
    }

    if (existing) {
      this.entries.delete(existing.fingerprint);
    }

    this.counters.misses += 1;
    const entry = this.startFetch(request, fetcher, now);
    return this.attach(entry, request.signal);
  }

  /** Drops settled entries matching the filter; in-flight fetches are left alone. */
  invalidate(filter: { providerId?: string; operation?: ProviderOperation } = {}): number {
    let removed = 0;
    for (const entry of [...this.entries.values()]) {
      if (entry.state === "pending") continue;
      if (filter.providerId && entry.providerId !== filter.providerId) continue;
      if (filter.operation && entry.operation !== filter.operation) continue;
      this.entries.delete(entry.fingerprint);
      removed += 1;
    }
    return removed;
  }

  clear(): void {
    this.invalidate();
    this.counters = { hits: 0, misses: 0, dedupJoins: 0, negativeHits: 0, evictions: 0 };
  }

  purgeExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const entry of [...this.entries.values()]) {
      if (entry.state !== "pending" && entry.expiresAt <= now) {
        this.entries.delete(entry.fingerprint);
        removed += 1;
      }
    }
    return removed;
  }

  has(fingerprint: string): boolean {
    return this.entries.has(fingerprint);
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): QueryCacheStats {
    let pending = 0;
    for (const entry of this.entries.values()) {
      if (entry.state === "pending") pending += 1;
    }
    return {
      size: this.entries.size,
      pending,
      ...this.counters,
      maxEntries: this.maxEntries
    };
  }

  /** Entries in least- to most-recently-accessed order. */
  inspect(): CacheEntrySnapshot[] {
    return [...this.entries.values()].map((entry) => ({
      fingerprint: entry.fingerprint,
      providerId: entry.providerId,
      operation: entry.operation,
      state: entry.state,
      createdAt: entry.createdAt,
      lastAccessedAt: entry.lastAccessedAt,
      ...(entry.state === "pending" ? { waiters: entry.waiters } : { expiresAt: entry.expiresAt })
    }));
  }

  private startFetch(request: CacheRequest, fetcher: () => Promise<V>, now: number): PendingEntry<V> {
    const ttlMs = request.ttlMs ?? this.policy.ttlMs[request.operation];
    // Deferred a microtask so the pending entry is in the table before the fetcher runs.
    const settled: Promise<Outcome<V>> = Promise.resolve()
      .then(fetcher)
      .then(
        (value): Outcome<V> => ({ ok: true, value }),
        (error: unknown): Outcome<V> => ({ ok: false, error })
      );

    const entry: PendingEntry<V> = {
      state: "pending",
      fingerprint: request.fingerprint,
      providerId: request.providerId,
      operation: request.operation,
      createdAt: now,
      lastAccessedAt: now,
      ttlMs,
      settled,
      waiters: 0
    };
    this.entries.set(entry.fingerprint, entry);
    this.enforceLimit();

    void settled.then((outcome) => this.settle(entry, outcome));
    return entry;
  }

  private settle(entry: PendingEntry<V>, outcome: Outcome<V>): void {
    // Only the current entry for a fingerprint is stored; waiters get the outcome either way.
    if (this.entries.get(entry.fingerprint) !== entry) return;
    this.entries.delete(entry.fingerprint);

    const now = this.now();
    const base: EntryBase = {
      fingerprint: entry.fingerprint,
      providerId: entry.providerId,
      operation: entry.operation,
      createdAt: now,
      lastAccessedAt: entry.lastAccessedAt
    };

    if (outcome.ok) {
      if (entry.ttlMs > 0) {
        this.entries.set(entry.fingerprint, { ...base, state: "ready", value: outcome.value, expiresAt: now + entry.ttlMs });
      }
    } else {
      this.logger.debug("cache.fetch.failed", {
        provider: entry.providerId,
        data: { fingerprint: entry.fingerprint, waiters: entry.waiters }
      });
      if (this.policy.negativeTtlMs > 0 && isCacheableFailure(outcome.error)) {
        this.entries.set(entry.fingerprint, {
          ...base,
          state: "failed",
          error: outcome.error,
          expiresAt: now + this.policy.negativeTtlMs
        });
      }
    }
    this.enforceLimit();
  }

  private async attach(entry: PendingEntry<V>, signal?: AbortSignal): Promise<V> {
    entry.waiters += 1;
    try {
      const outcome = await this.waitFor(entry.settled, signal);
      if (!outcome.ok) {
        throw outcome.error;
      }
      return outcome.value;
    } finally {
      entry.waiters -= 1;
    }
  }

  private waitFor(settled: Promise<Outcome<V>>, signal?: AbortSignal): Promise<Outcome<V>> {
    if (!signal) return settled;
    return new Promise<Outcome<V>>((resolve, reject) => {
      const onAbort = () => reject(cancelledError());
      signal.addEventListener("abort", onAbort, { once: true });
      void settled.then((outcome) => {
        signal.removeEventListener("abort", onAbort);
        resolve(outcome);
      });
    });
  }

  private touch(entry: CacheEntry<V>, now: number): void {
    entry.lastAccessedAt = now;
    this.entries.delete(entry.fingerprint);
    this.entries.set(entry.fingerprint, entry);
  }

  private enforceLimit(): void {
    if (this.entries.size <= this.maxEntries) return;
    this.purgeExpired();

    for (const entry of [...this.entries.values()]) {
      if (this.entries.size <= this.maxEntries) return;
      if (entry.state === "pending") continue;
      this.entries.delete(entry.fingerprint);
      this.counters.evictions += 1;
      this.logger.debug("cache.evict", { provider: entry.providerId, data: { fingerprint: entry.fingerprint } });
    }
  }
}
