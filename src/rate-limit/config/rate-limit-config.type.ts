export enum RateLimitStoreKind {
  Redis = 'redis',
  Memory = 'memory',
}

/** What to do with a request when the counter store cannot be reached. */
export enum RateLimitFailureMode {
  Open = 'open',
  Closed = 'closed',
}

export type RateLimitConfig = {
  limit: number;
  windowSeconds: number;
  store: RateLimitStoreKind;
  failureMode: RateLimitFailureMode;
};
