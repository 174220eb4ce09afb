export interface CounterHit {
  /** Counter value after the call. */
  count: number;
  /** False when the counter was already at the limit and left untouched. */
  incremented: boolean;
}

/**
 * Shared counter storage. `incrementBelow` must check and increment as one
 * atomic step, and set the key to expire after `ttlMs` on its first hit.
 */
export abstract class RateLimitStore {
  abstract incrementBelow(
    key: string,
    limit: number,
    ttlMs: number,
  ): Promise<CounterHit>;
}
