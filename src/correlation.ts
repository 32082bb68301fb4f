// Lv.1 — Pending request/echo correlations, resolved oldest first

type PendingCorrelation = {
  key: string;
  createdAt: number;
  timer: ReturnType<typeof setTimeout>;
  resolve: (messageId: string | null) => void;
};

export class CorrelationRegistry {
  // Map iteration follows insertion order, which gives FIFO resolution
  private readonly pending = new Map<string, PendingCorrelation>();
  private counter = 0;

  get size(): number {
    return this.pending.size;
  }

  /** The promise resolves with the echoed message id, or null once `timeoutMs` elapses. */
  register(timeoutMs: number): { key: string; promise: Promise<string | null> } {
    this.counter += 1;
    const key = `corr-${this.counter}`;
    const promise = new Promise<string | null>((resolve) => {
      const timer = setTimeout(() => this.settle(key, null), timeoutMs);
      this.pending.set(key, { key, createdAt: Date.now(), timer, resolve });
    });
    return { key, promise };
  }

  resolveNext(messageId: string): boolean {
    const oldest = this.pending.values().next();
    if (oldest.done) return false;
    this.settle(oldest.value.key, messageId);
    return true;
  }

  cancel(key: string): boolean {
    return this.settle(key, null);
  }

  clear(): void {
    for (const key of [...this.pending.keys()]) {
      this.settle(key, null);
    }
  }

  private settle(key: string, messageId: string | null): boolean {
    const entry = this.pending.get(key);
    if (!entry) return false;
    this.pending.delete(key);
    clearTimeout(entry.timer);
    entry.resolve(messageId);
    return true;
  }
}
