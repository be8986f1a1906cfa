interface PendingSend<R> {
  timer: NodeJS.Timeout;
  send: () => Promise<R>;
  waiters: Array<{ resolve: (result: R) => void; reject: (error: unknown) => void }>;
}

/**
 * Coalesces bursts per key: every schedule() inside the window resets the
 * timer and replaces the pending send, so only the last one runs. Every
 * caller of a window receives that window's result.
 */
export class SettingsDebouncer<R> {
  private pending: Map<string, PendingSend<R>> = new Map();

  constructor(private readonly windowMs = 300) {}

  get pendingCount(): number {
    return this.pending.size;
  }

  schedule(key: string, send: () => Promise<R>): Promise<R> {
    return new Promise<R>((resolve, reject) => {
      const existing = this.pending.get(key);
      if (existing) {
        clearTimeout(existing.timer);
        existing.send = send;
        existing.waiters.push({ resolve, reject });
        existing.timer = setTimeout(() => this.fire(key), this.windowMs);
        return;
      }

      this.pending.set(key, {
        send,
        waiters: [{ resolve, reject }],
        timer: setTimeout(() => this.fire(key), this.windowMs)
      });
    });
  }

  /** Runs every pending send now. */
  async flush(): Promise<void> {
    const keys = Array.from(this.pending.keys());
    await Promise.allSettled(keys.map(key => this.fire(key)));
  }

  private async fire(key: string): Promise<void> {
    const entry = this.pending.get(key);
    if (!entry) return;
    clearTimeout(entry.timer);
    this.pending.delete(key);

    try {
      const result = await entry.send();
      for (const waiter of entry.waiters) waiter.resolve(result);
    } catch (error) {
      for (const waiter of entry.waiters) waiter.reject(error);
    }
  }
}
