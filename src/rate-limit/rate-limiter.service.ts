import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter } from 'prom-client';
import { RateLimitFailureMode } from './config/rate-limit-config.type';
import { RateLimitStore } from './stores/rate-limit.store';
import {
  RATE_LIMIT_OPTIONS,
  RateLimitDecision,
  RateLimitOptions,
} from './rate-limit.types';

/**
 * Fixed-window request counter per client. Windows are aligned to
 * multiples of `windowMs` since the epoch, so every counter key names the
 * window it belongs to and old keys only need to expire.
 */
@Injectable()
export class RateLimiterService implements OnModuleInit {
  private readonly logger = new Logger(RateLimiterService.name);

  constructor(
    @Inject(RATE_LIMIT_OPTIONS) private readonly options: RateLimitOptions,
    private readonly store: RateLimitStore,
    @InjectMetric('rate_limit_decisions_total')
    private readonly decisions: Counter<string>,
  ) {}

  onModuleInit() {
    this.logger.log(
      `Rate limiting ${this.options.limit} requests per ${this.options.windowMs}ms window, failing ${this.options.failureMode} when the store is unavailable`,
    );
  }

  get limit(): number {
    return this.options.limit;
  }

  windowStart(now: Date): number {
    const { windowMs } = this.options;
    return Math.floor(now.getTime() / windowMs) * windowMs;
  }

  keyFor(clientId: string, now: Date): string {
    return `ratelimit:${clientId}:${this.windowStart(now)}`;
  }

  async admit(clientId: string, now: Date = new Date()): Promise<RateLimitDecision> {
    const { limit, windowMs, failureMode } = this.options;
    const retryAfterMs = this.windowStart(now) + windowMs - now.getTime();

    try {
      const hit = await this.store.incrementBelow(
        this.keyFor(clientId, now),
        limit,
        windowMs,
      );
      if (!hit.incremented) {
        this.decisions.inc({ outcome: 'blocked' });
        return { allowed: false, retryAfterMs };
      }
      this.decisions.inc({ outcome: 'allowed' });
      return { allowed: true, remaining: Math.max(limit - hit.count, 0) };
    } catch (error) {
      this.decisions.inc({ outcome: 'store_error' });
      const reason = error instanceof Error ? error.message : String(error);

      if (failureMode === RateLimitFailureMode.Closed) {
        this.logger.error(
          `Rate limit store unavailable, blocking ${clientId}: ${reason}`,
        );
        return { allowed: false, retryAfterMs };
      }
      this.logger.warn(
        `Rate limit store unavailable, allowing ${clientId}: ${reason}`,
      );
      return { allowed: true, remaining: limit };
    }
  }
}
