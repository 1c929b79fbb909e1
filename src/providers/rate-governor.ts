import { createSilentLogger, type Logger } from "../core/logging";
import { RateLimitExceededError, UnknownProviderError, cancelledError, invalidInput } from "./errors";

export const DEFAULT_MAX_QUEUE_DEPTH = 32;

export interface TokenBucketOptions {
  qpsBudget: number;
  maxQueueDepth?: number;
  now?: () => number;
}

export interface TokenBucketSnapshot {
  capacity: number;
  refillPerSecond: number;
  tokens: number;
  queued: number;
  maxQueueDepth: number;
}

type Waiter = {
  resolve: () => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
};

export class TokenBucket {
  readonly capacity: number;
  readonly refillPerSecond: number;
  readonly maxQueueDepth: number;
  private tokens: number;
  private lastRefillAt: number;
  private readonly queue: Waiter[] = [];
  private timer: ReturnType<typeof setTimeout> | null = null;
  private readonly now: () => number;

  constructor(readonly providerId: string, options: TokenBucketOptions) {
    if (!Number.isFinite(options.qpsBudget) || options.qpsBudget <= 0) {
      throw invalidInput(`qpsBudget must be a positive number, got ${options.qpsBudget}`, { provider: providerId });
    }
    this.refillPerSecond = options.qpsBudget;
    this.capacity = Math.max(1, Math.ceil(options.qpsBudget));
    this.maxQueueDepth = Math.max(0, Math.floor(options.maxQueueDepth ?? DEFAULT_MAX_QUEUE_DEPTH));
    this.now = options.now ?? (() => Date.now());
    this.tokens = this.capacity;
    this.lastRefillAt = this.now();
  }

  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(cancelledError());
    }
    this.refill();
    if (this.queue.length === 0 && this.tokens >= 1) {
      this.tokens -= 1;
      return Promise.resolve();
    }
    if (this.queue.length >= this.maxQueueDepth) {
      return Promise.reject(new RateLimitExceededError(this.providerId, this.maxQueueDepth));
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          const index = this.queue.indexOf(waiter);
          if (index >= 0) {
            this.queue.splice(index, 1);
          }
          reject(cancelledError());
        };
        signal.addEventListener("abort", waiter.onAbort, { once: true });
      }
      this.queue.push(waiter);
      this.schedule();
    });
  }

  snapshot(): TokenBucketSnapshot {
    this.refill();
    return {
      capacity: this.capacity,
      refillPerSecond: this.refillPerSecond,
      tokens: this.tokens,
      queued: this.queue.length,
      maxQueueDepth: this.maxQueueDepth
    };
  }

  dispose(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    for (const waiter of this.queue.splice(0)) {
      this.detach(waiter);
      waiter.reject(cancelledError("Rate governor disposed"));
    }
  }

  private refill(): void {
    const now = this.now();
    const elapsedMs = Math.max(0, now - this.lastRefillAt);
    this.tokens = Math.min(this.capacity, this.tokens + (elapsedMs * this.refillPerSecond) / 1000);
    this.lastRefillAt = now;
  }

  private schedule(): void {
    if (this.timer || this.queue.length === 0) return;
    const deficit = Math.max(0, 1 - this.tokens);
    const waitMs = Math.ceil((deficit * 1000) / this.refillPerSecond);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.drain();
    }, waitMs);
  }

  private drain(): void {
    this.refill();
    while (this.queue.length > 0 && this.tokens >= 1) {
      const waiter = this.queue.shift();
      if (!waiter) break;
      this.tokens -= 1;
      this.detach(waiter);
      waiter.resolve();
    }
    this.schedule();
  }

  private detach(waiter: Waiter): void {
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener("abort", waiter.onAbort);
    }
  }
}

/**
 * One token bucket per provider. Callers over budget wait in FIFO order;
 * only a full queue turns into a RateLimitExceededError.
 */
export class RateGovernor {
  private readonly buckets = new Map<string, TokenBucket>();

  constructor(
    private readonly options: { maxQueueDepth?: number; now?: () => number } = {},
    private readonly logger: Logger = createSilentLogger("governor")
  ) {}

  register(providerId: string, qpsBudget: number): TokenBucket {
    const bucket = new TokenBucket(providerId, {
      qpsBudget,
      maxQueueDepth: this.options.maxQueueDepth,
      now: this.options.now
    });
    this.buckets.get(providerId)?.dispose();
    this.buckets.set(providerId, bucket);
    return bucket;
  }

  async acquire(providerId: string, signal?: AbortSignal): Promise<void> {
    const bucket = this.bucket(providerId);
    const before = bucket.snapshot();
    if (before.queued > 0 || before.tokens < 1) {
      this.logger.debug("governor.queued", {
        provider: providerId,
        data: { queued: before.queued, available: before.tokens }
      });
    }
    try {
      await bucket.acquire(signal);
    } catch (error) {
      if (error instanceof RateLimitExceededError) {
        this.logger.warn("governor.rejected", {
          provider: providerId,
          data: { maxQueueDepth: bucket.maxQueueDepth }
        });
      }
      throw error;
    }
  }

  snapshot(providerId: string): TokenBucketSnapshot {
    return this.bucket(providerId).snapshot();
  }

  dispose(): void {
    for (const bucket of this.buckets.values()) {
      bucket.dispose();
    }
    this.buckets.clear();
  }

  private bucket(providerId: string): TokenBucket {
    const bucket = this.buckets.get(providerId);
    if (!bucket) {
      throw new UnknownProviderError(providerId);
    }
    return bucket;
  }
}
