import { createAbortError, PipelineConfigError } from "./errors";

export type GateRelease = () => void;

export type ConcurrencyGateState = {
  capacity: number;
  inUse: number;
  waiting: number;
};

type Waiter = {
  grant: (release: GateRelease) => void;
  settled: boolean;
};

/**
 * Counting admission gate. Permits are handed out strictly in request order, and
 * each release handle frees its permit at most once however many times it is called.
 */
export class ConcurrencyGate {
  private capacity: number;
  private active = 0;
  private readonly waiters: Waiter[] = [];

  constructor(capacity: number) {
    this.capacity = ConcurrencyGate.normalizeCapacity(capacity);
  }

  get inUse() {
    return this.active;
  }

  get waiting() {
    return this.waiters.length;
  }

  getState(): ConcurrencyGateState {
    return { capacity: this.capacity, inUse: this.active, waiting: this.waiters.length };
  }

  // Lowering capacity never revokes permits already held; it only delays new grants.
  setCapacity(capacity: number): void {
    this.capacity = ConcurrencyGate.normalizeCapacity(capacity);
    this.drain();
  }

  acquire(signal?: AbortSignal): Promise<GateRelease> {
    if (signal?.aborted) {
      return Promise.reject(createAbortError());
    }
    if (this.active < this.capacity && this.waiters.length === 0) {
      this.active += 1;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<GateRelease>((resolve, reject) => {
      const waiter: Waiter = {
        grant: resolve,
        settled: false,
      };
      this.waiters.push(waiter);

      if (signal) {
        const onAbort = () => {
          if (waiter.settled) return;
          waiter.settled = true;
          const position = this.waiters.indexOf(waiter);
          if (position >= 0) this.waiters.splice(position, 1);
          reject(createAbortError());
        };
        signal.addEventListener("abort", onAbort, { once: true });
        waiter.grant = (release) => {
          signal.removeEventListener("abort", onAbort);
          resolve(release);
        };
      }
    });
  }

  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): GateRelease {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.active -= 1;
      this.drain();
    };
  }

  private drain(): void {
    while (this.active < this.capacity && this.waiters.length > 0) {
      const next = this.waiters.shift();
      if (!next || next.settled) continue;
      next.settled = true;
      this.active += 1;
      next.grant(this.createRelease());
    }
  }

  private static normalizeCapacity(capacity: number) {
    if (!Number.isFinite(capacity) || capacity < 1) return 1;
    return Math.floor(capacity);
  }
}

export function assertSchedulerPreconditions(config: { batchSize: number; maxConcurrent: number }): void {
  if (!Number.isInteger(config.batchSize) || config.batchSize < 1) {
    throw new PipelineConfigError(`batchSize must be a positive integer (got ${config.batchSize})`);
  }
  if (!Number.isInteger(config.maxConcurrent) || config.maxConcurrent < 1) {
    throw new PipelineConfigError(`maxConcurrent must be a positive integer (got ${config.maxConcurrent})`);
  }
  if (config.batchSize > config.maxConcurrent) {
    throw new PipelineConfigError(
      `batchSize (${config.batchSize}) must not exceed maxConcurrent (${config.maxConcurrent})`,
    );
  }
}
