// src/flush-scheduler.ts
//
// Bounds how often the walk commits the destination tree. With no interval,
// ticks do nothing and the caller flushes once per phase.

export type Clock = () => number;

export class FlushScheduler {
  private nextFlushAt: number;
  private issued = 0;

  constructor(
    private readonly flushFn: () => Promise<void>,
    readonly intervalMs: number | undefined,
    private readonly clock: Clock = Date.now,
  ) {
    this.nextFlushAt = clock();
  }

  get flushes(): number {
    return this.issued;
  }

  /** Called after every upload; returns whether a flush was issued. */
  async tick(): Promise<boolean> {
    // <= 0 means the store flushes on every write by itself
    if (this.intervalMs === undefined || this.intervalMs <= 0) {
      return false;
    }
    const now = this.clock();
    if (now <= this.nextFlushAt) {
      return false;
    }
    await this.flushFn();
    this.issued += 1;
    this.nextFlushAt = now + this.intervalMs;
    return true;
  }

  async flushNow(): Promise<void> {
    await this.flushFn();
    this.issued += 1;
    this.nextFlushAt = this.clock() + (this.intervalMs ?? 0);
  }
}
