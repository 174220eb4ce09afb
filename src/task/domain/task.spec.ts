import {
  computeRetryDelay,
  decodeTask,
  InvalidTaskError,
  TaskKind,
  TaskRecord,
  TaskStatus,
} from './task';

describe('computeRetryDelay', () => {
  it('should double the delay after every failed attempt', () => {
    expect(computeRetryDelay(1, 1000, 60000)).toBe(1000);
    expect(computeRetryDelay(2, 1000, 60000)).toBe(2000);
    expect(computeRetryDelay(4, 1000, 60000)).toBe(8000);
  });

  it('should cap the delay at the maximum', () => {
    expect(computeRetryDelay(10, 1000, 60000)).toBe(60000);
  });

  it('should treat zero attempts like the first one', () => {
    expect(computeRetryDelay(0, 1000, 60000)).toBe(1000);
  });
});

describe('decodeTask', () => {
  const record = (kind: string, payload: unknown): TaskRecord => ({
    id: 3,
    kind,
    payload,
    status: TaskStatus.Running,
    attempts: 1,
    maxAttempts: 4,
    runAt: new Date('2026-05-10T12:00:00.000Z'),
    lockedAt: new Date('2026-05-10T12:00:00.000Z'),
    lastError: null,
    uniqueKey: null,
  });

  it('should keep the user id of an email task', () => {
    const task = decodeTask(
      record(TaskKind.SendPasswordResetEmail, { userId: 12 }),
    );

    expect(task.kind).toBe(TaskKind.SendPasswordResetEmail);
    expect(task.payload).toEqual({ userId: 12 });
  });

  it('should drop whatever a maintenance task payload carries', () => {
    const task = decodeTask(
      record(TaskKind.PurgeExpiredTokens, { stale: true }),
    );

    expect(task.payload).toEqual({});
  });

  it('should reject an email task without a numeric user id', () => {
    expect(() =>
      decodeTask(record(TaskKind.SendVerificationEmail, { userId: '12' })),
    ).toThrow(InvalidTaskError);
  });

  it('should reject an unknown kind', () => {
    expect(() => decodeTask(record('send-newsletter', {}))).toThrow(
      'Unknown task kind "send-newsletter"',
    );
  });
});
