export class Semaphore {
  private readonly waiters: Array<() => void> = [];
  private available: number;

  constructor(private readonly capacity: number) {
    if (!Number.isFinite(capacity) || capacity <= 0) throw new Error("capacity must be > 0");
    this.available = capacity;
  }

  /** Holders currently inside the critical section. */
  get inUse(): number {
    return this.capacity - Math.max(0, this.available);
  }

  get queued(): number {
    return this.waiters.length;
  }

  async acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) throw signal.reason ?? new Error("aborted");

    if (this.available > 0) {
      this.available -= 1;
      return this.releaser();
    }

    return await new Promise<() => void>((resolve, reject) => {
      const onAbort = () => {
        const idx = this.waiters.indexOf(next);
        if (idx >= 0) this.waiters.splice(idx, 1);
        reject(signal?.reason ?? new Error("aborted"));
      };
      const next = () => {
        signal?.removeEventListener("abort", onAbort);
        this.available -= 1;
        resolve(this.releaser());
      };
      this.waiters.push(next);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  async use<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.available += 1;
      const next = this.waiters.shift();
      if (next) next();
    };
  }
}
