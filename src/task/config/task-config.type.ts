export type TaskConfig = {
  pollIntervalMs: number;
  batchSize: number;
  timeoutMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
};
