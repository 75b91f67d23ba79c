export interface Clock {
  nowMs(): number;
}

/** Wall-clock source that never steps backwards. */
export class MonotonicClock implements Clock {
  private lastMs = 0;

  constructor(private readonly source: () => number = Date.now) {}

  nowMs(): number {
    const now = Math.max(this.lastMs, Math.floor(this.source()));
    this.lastMs = now;
    return now;
  }
}

export class ManualClock implements Clock {
  constructor(private currentMs = 0) {}

  nowMs(): number {
    return this.currentMs;
  }

  set(ms: number): void {
    this.currentMs = ms;
  }

  advance(ms: number): number {
    this.currentMs += ms;
    return this.currentMs;
  }
}
