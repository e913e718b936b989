/**
 * Unbounded FIFO of notification buffers with a suspend-on-empty reader.
 *
 * The transport pushes from its callback; the receive loop awaits `next`.
 * `next` resolves null once the queue is closed and drained, or when the
 * given signal aborts while waiting. A failure is delivered after the
 * items queued before it.
 */

type Waiter = {
  resolve: (value: Uint8Array | null) => void;
  reject: (error: unknown) => void;
};

export class NotificationQueue {
  private readonly items: Uint8Array[] = [];
  private waiter: Waiter | null = null;
  private closed = false;
  private failure: { error: unknown } | null = null;

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(data: Uint8Array): void {
    if (this.closed) return;
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter.resolve(data);
      return;
    }
    this.items.push(data);
  }

  /** End the sequence; readers drain what is queued, then get null. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.settleWaiter();
  }

  /** End the sequence with an error, raised after queued items drain. */
  fail(error: unknown): void {
    if (this.closed) return;
    this.failure = { error };
    this.closed = true;
    this.settleWaiter();
  }

  next(signal?: AbortSignal): Promise<Uint8Array | null> {
    const item = this.items.shift();
    if (item !== undefined) return Promise.resolve(item);
    if (this.failure) return Promise.reject(this.failure.error);
    if (this.closed || signal?.aborted) return Promise.resolve(null);
    if (this.waiter) {
      return Promise.reject(new Error("NotificationQueue supports a single reader"));
    }

    return new Promise<Uint8Array | null>((resolve, reject) => {
      const onAbort = () => {
        if (this.waiter === waiter) this.waiter = null;
        resolve(null);
      };
      const waiter: Waiter = {
        resolve: (value) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(value);
        },
        reject: (error) => {
          signal?.removeEventListener("abort", onAbort);
          reject(error);
        },
      };
      this.waiter = waiter;
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private settleWaiter(): void {
    const waiter = this.waiter;
    if (!waiter) return;
    this.waiter = null;
    if (this.failure) {
      waiter.reject(this.failure.error);
    } else {
      waiter.resolve(null);
    }
  }
}
