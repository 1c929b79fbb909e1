export type ReleaseSlot = () => void;

type SlotWaiter = {
  resolve: (release: ReleaseSlot) => void;
  reject: (error: Error) => void;
};

/** Bounds how many upstream fetches run at once; waiters resume in FIFO order. */
export class Semaphore {
  private active = 0;
  private readonly queue: SlotWaiter[] = [];

  constructor(private limit: number) {
    this.limit = Math.max(1, Math.floor(limit));
  }

  setLimit(limit: number): void {
    this.limit = Math.max(1, Math.floor(limit));
    this.drain();
  }

  snapshot(): { limit: number; active: number; queued: number } {
    return {
      limit: this.limit,
      active: this.active,
      queued: this.queue.length
    };
  }

  /** Resolves with a release callback once a slot is free. Extra release calls are ignored. */
  acquire(): Promise<ReleaseSlot> {
    if (this.active < this.limit) {
      this.active += 1;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<ReleaseSlot>((resolve, reject) => {
      this.queue.push({ resolve, reject });
    });
  }

  /** Rejects every queued waiter; slots already held drain normally. */
  dispose(error: Error): void {
    for (const waiter of this.queue.splice(0)) {
      waiter.reject(error);
    }
  }

  private createRelease(): ReleaseSlot {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.active = Math.max(0, this.active - 1);
      this.drain();
    };
  }

  private drain(): void {
    while (this.active < this.limit && this.queue.length > 0) {
      const next = this.queue.shift();
      if (!next) break;
      this.active += 1;
      next.resolve(this.createRelease());
    }
  }
}
