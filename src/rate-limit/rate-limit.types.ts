import { RateLimitFailureMode } from './config/rate-limit-config.type';

export const RATE_LIMIT_OPTIONS = Symbol('RATE_LIMIT_OPTIONS');

export interface RateLimitOptions {
  /** Admitted requests per client per window. */
  limit: number;
  windowMs: number;
  failureMode: RateLimitFailureMode;
}

export type RateLimitDecision =
  | { allowed: true; remaining: number }
  | { allowed: false; retryAfterMs: number };
