export enum TaskKind {
  SendVerificationEmail = 'send-verification-email',
  SendPasswordResetEmail = 'send-password-reset-email',
  PurgeExpiredTokens = 'purge-expired-tokens',
  RecountParticipants = 'recount-participants',
}

export enum TaskStatus {
  Pending = 'pending',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
}

export interface TaskPayloads {
  [TaskKind.SendVerificationEmail]: { userId: number };
  [TaskKind.SendPasswordResetEmail]: { userId: number };
  [TaskKind.PurgeExpiredTokens]: Record<string, never>;
  [TaskKind.RecountParticipants]: Record<string, never>;
}

/** A task row as stored, before its payload has been checked against its kind. */
export interface TaskRecord {
  id: number;
  kind: string;
  payload: unknown;
  status: TaskStatus;
  attempts: number;
  maxAttempts: number;
  runAt: Date;
  lockedAt: Date | null;
  lastError: string | null;
  uniqueKey: string | null;
}

export type TaskOf<K extends TaskKind> = Omit<TaskRecord, 'kind' | 'payload'> & {
  kind: K;
  payload: TaskPayloads[K];
};

export type Task = { [K in TaskKind]: TaskOf<K> }[TaskKind];

export interface NewTask {
  kind: TaskKind;
  payload: TaskPayloads[TaskKind];
  runAt: Date;
  maxAttempts: number;
  uniqueKey: string | null;
}

export interface EnqueueOptions {
  runAt?: Date;
  /** Enqueues are deduplicated on this key; the existing task is returned instead. */
  uniqueKey?: string;
  maxAttempts?: number;
}

export interface TaskHandle {
  id: number;
  kind: TaskKind;
}

export class InvalidTaskError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTaskError';
  }
}

/**
 * Delay before the next attempt after `attempts` failed ones: doubles from
 * `baseMs` and is capped at `maxMs`.
 */
export function computeRetryDelay(
  attempts: number,
  baseMs: number,
  maxMs: number,
): number {
  const exponent = Math.max(attempts - 1, 0);
  return Math.min(baseMs * 2 ** exponent, maxMs);
}

function readUserId(payload: unknown): number {
  if (
    typeof payload === 'object' &&
    payload !== null &&
    'userId' in payload &&
    typeof payload.userId === 'number' &&
    Number.isInteger(payload.userId)
  ) {
    return payload.userId;
  }
  throw new InvalidTaskError('payload.userId must be an integer');
}

export function decodeTask(record: TaskRecord): Task {
  const { kind, payload, ...state } = record;

  switch (kind) {
    case TaskKind.SendVerificationEmail:
      return { ...state, kind, payload: { userId: readUserId(payload) } };
    case TaskKind.SendPasswordResetEmail:
      return { ...state, kind, payload: { userId: readUserId(payload) } };
    case TaskKind.PurgeExpiredTokens:
      return { ...state, kind, payload: {} };
    case TaskKind.RecountParticipants:
      return { ...state, kind, payload: {} };
    default:
      throw new InvalidTaskError(`Unknown task kind "${kind}"`);
  }
}
