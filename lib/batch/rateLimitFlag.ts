type RateLimitFlagOptions = {
  // null: stays set for the life of the process
  resetAfterMs?: number | null;
  now?: () => number;
};

/**
 * One-way breaker shared by every task in the process. The first task that sees a
 * provider rate limit trips it, and the scheduler reads it before each batch to
 * shrink concurrency for everyone.
 */
export class RateLimitFlag {
  private trippedAt: number | null = null;
  private readonly resetAfterMs: number | null;
  private readonly now: () => number;

  constructor(options: RateLimitFlagOptions = {}) {
    this.resetAfterMs = options.resetAfterMs ?? null;
    this.now = options.now ?? Date.now;
  }

  trip(): void {
    if (this.isSet()) return;
    this.trippedAt = this.now();
    console.warn("[batch] provider rate limit observed; reducing concurrency for subsequent batches");
  }

  isSet(): boolean {
    if (this.trippedAt == null) return false;
    if (this.resetAfterMs != null && this.now() - this.trippedAt >= this.resetAfterMs) {
      this.trippedAt = null;
      return false;
    }
    return true;
  }

  getTrippedAt(): number | null {
    return this.isSet() ? this.trippedAt : null;
  }
}

let processFlag: RateLimitFlag | null = null;

export function getProcessRateLimitFlag(resetAfterMs: number | null = null): RateLimitFlag {
  if (!processFlag) {
    processFlag = new RateLimitFlag({ resetAfterMs });
  }
  return processFlag;
}

export function effectiveConcurrency(maxConcurrent: number, flag: RateLimitFlag, divisor = 2): number {
  if (!flag.isSet()) return Math.max(1, maxConcurrent);
  return Math.max(1, Math.floor(maxConcurrent / Math.max(1, divisor)));
}
