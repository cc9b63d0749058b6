export interface BatcherOptions<T> {
  maxSize: number;
  windowMs: number;
  handler: (batch: T[]) => Promise<void>;
  onError?: (err: unknown, batch: T[]) => void;
}

/**
 * Buffers items and hands them to `handler` in batches, either when `maxSize`
 * items are waiting or `windowMs` after the first item of a batch arrived.
 * Batches are handled one after another, never in parallel.
 */
export class MessageBatcher<T> {
  private buffer: T[] = [];
  private timer: NodeJS.Timeout | null = null;
  private chain: Promise<void> = Promise.resolve();
  private readonly maxSize: number;

  constructor(private readonly options: BatcherOptions<T>) {
    this.maxSize = Math.max(1, options.maxSize);
  }

  get pending(): number {
    return this.buffer.length;
  }

  push(item: T): void {
    this.buffer.push(item);
    if (this.buffer.length >= this.maxSize) {
      void this.flush();
    } else if (!this.timer) {
      this.timer = setTimeout(() => void this.flush(), this.options.windowMs);
    }
  }

  /** Hand the buffered items over now. Resolves once they have been handled. */
  flush(): Promise<void> {
    this.clearTimer();
    if (this.buffer.length > 0) {
      const batch = this.buffer;
      this.buffer = [];
      const next = () => this.run(batch);
      this.chain = this.chain.then(next, next);
    }
    return this.chain;
  }

  async stop(): Promise<void> {
    await this.flush();
  }

  private async run(batch: T[]): Promise<void> {
    try {
      await this.options.handler(batch);
    } catch (err) {
      this.report(err, batch);
    }
  }

  private report(err: unknown, batch: T[]): void {
    if (!this.options.onError) {
      console.error("❌ Batch handler failed:", err);
      return;
    }
    try {
      this.options.onError(err, batch);
    } catch (reportErr) {
      console.error("❌ Batch handler failed:", err, "and onError threw:", reportErr);
    }
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
