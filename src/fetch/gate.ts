import { RunCancelledError } from '../shared/errors.js';
import { sleep } from '../shared/utils.js';

/**
 * Counting semaphore with a FIFO wait queue.
 */
export class Semaphore {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(private limit: number) {}

  get inUse(): number {
    return this.active;
  }

  setLimit(limit: number): void {
    this.limit = limit;
    this.drain();
  }

  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(new RunCancelledError());
    if (this.active < this.limit) {
      this.active++;
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      const grant = (): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      const onAbort = (): void => {
        const idx = this.waiters.indexOf(grant);
        if (idx >= 0) this.waiters.splice(idx, 1);
        reject(new RunCancelledError());
      };
      this.waiters.push(grant);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  release(): void {
    this.active--;
    this.drain();
  }

  private drain(): void {
    while (this.active < this.limit && this.waiters.length > 0) {
      const next = this.waiters.shift();
      if (next) {
        this.active++;
        next();
      }
    }
  }
}

export interface HostPolicy {
  minDelayMs: number;
  maxConcurrent: number;
}

/**
 * Per-host politeness gate: caps in-flight requests to one host and spaces request starts
 * by at least `minDelayMs`. Slots are reserved synchronously, so concurrent callers never
 * share one.
 */
export class HostGate {
  private nextSlotAt = 0;
  private readonly semaphore: Semaphore;

  constructor(private policy: HostPolicy) {
    this.semaphore = new Semaphore(policy.maxConcurrent);
  }

  get inFlight(): number {
    return this.semaphore.inUse;
  }

  update(policy: Partial<HostPolicy>): void {
    this.policy = { ...this.policy, ...policy };
    if (policy.maxConcurrent !== undefined) {
      this.semaphore.setLimit(policy.maxConcurrent);
    }
  }

  async enter(signal?: AbortSignal): Promise<void> {
    await this.semaphore.acquire(signal);
    try {
      const now = Date.now();
      const slot = Math.max(now, this.nextSlotAt);
      this.nextSlotAt = slot + this.policy.minDelayMs;
      await sleep(slot - now, signal);
    } catch (err) {
      this.semaphore.release();
      throw err;
    }
  }

  leave(): void {
    this.semaphore.release();
  }
}
