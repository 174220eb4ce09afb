import { Injectable } from '@nestjs/common';
import { CounterHit, RateLimitStore } from './rate-limit.store';

interface Counter {
  count: number;
  expiresAt: number;
}

const SWEEP_INTERVAL_MS = 60 * 1000;

/** Process-local counters for single-instance deployments and tests. */
@Injectable()
export class MemoryRateLimitStore extends RateLimitStore {
  private readonly counters = new Map<string, Counter>();
  private lastSweep = 0;

  incrementBelow(key: string, limit: number, ttlMs: number): Promise<CounterHit> {
    const now = Date.now();
    this.sweep(now);

    let counter = this.counters.get(key);
    if (!counter || counter.expiresAt <= now) {
      counter = { count: 0, expiresAt: now + ttlMs };
      this.counters.set(key, counter);
    }

    if (counter.count >= limit) {
      return Promise.resolve({ count: counter.count, incremented: false });
    }
    counter.count += 1;
    return Promise.resolve({ count: counter.count, incremented: true });
  }

  get size(): number {
    return this.counters.size;
  }

  private sweep(now: number): void {
    if (now - this.lastSweep < SWEEP_INTERVAL_MS) {
      return;
    }
    this.lastSweep = now;
    for (const [key, counter] of this.counters) {
      if (counter.expiresAt <= now) {
        this.counters.delete(key);
      }
    }
  }
}
