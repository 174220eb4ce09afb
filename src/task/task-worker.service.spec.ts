import { Test, TestingModule } from '@nestjs/testing';
import { SchedulerRegistry } from '@nestjs/schedule';
import { getToken } from '@willsoto/nestjs-prometheus';
import { InMemoryTaskRepository } from '../test/fakes/in-memory-task.repository';
import { TaskKind, TaskStatus } from './domain/task';
import { TaskRepository } from './infrastructure/persistence/task.repository';
import {
  TaskTimeoutError,
  TaskWorkerService,
  withTimeout,
} from './task-worker.service';
import { TASK_HANDLERS, TASK_WORKER_OPTIONS } from './task.types';

const TIMEOUT_MS = 20;
const BACKOFF_BASE_MS = 1000;

describe('TaskWorkerService', () => {
  let worker: TaskWorkerService;
  let repository: InMemoryTaskRepository;
  let schedulerRegistry: SchedulerRegistry;
  const processed = { inc: jest.fn() };
  const handlers = {
    [TaskKind.SendVerificationEmail]: { handle: jest.fn() },
    [TaskKind.SendPasswordResetEmail]: { handle: jest.fn() },
    [TaskKind.PurgeExpiredTokens]: { handle: jest.fn() },
    [TaskKind.RecountParticipants]: { handle: jest.fn() },
  };
  const sendVerification = handlers[TaskKind.SendVerificationEmail].handle;
  const t0 = new Date('2026-05-10T12:00:00.000Z');
  const at = (msAfter: number) => new Date(t0.getTime() + msAfter);

  const enqueueVerification = (maxAttempts = 4) =>
    repository.insert({
      kind: TaskKind.SendVerificationEmail,
      payload: { userId: 7 },
      runAt: t0,
      maxAttempts,
      uniqueKey: null,
    });

  beforeEach(async () => {
    jest.clearAllMocks();
    for (const handler of Object.values(handlers)) {
      handler.handle.mockResolvedValue(undefined);
    }
    repository = new InMemoryTaskRepository();
    schedulerRegistry = new SchedulerRegistry();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TaskWorkerService,
        {
          provide: TASK_WORKER_OPTIONS,
          useValue: {
            pollIntervalMs: 1000,
            batchSize: 10,
            timeoutMs: TIMEOUT_MS,
            backoffBaseMs: BACKOFF_BASE_MS,
            backoffMaxMs: 60000,
          },
        },
        { provide: TASK_HANDLERS, useValue: handlers },
        { provide: TaskRepository, useValue: repository },
        { provide: SchedulerRegistry, useValue: schedulerRegistry },
        { provide: getToken('tasks_processed_total'), useValue: processed },
      ],
    }).compile();

    worker = module.get<TaskWorkerService>(TaskWorkerService);
  });

  it('should run a due task with its payload and mark it succeeded', async () => {
    const { id } = await enqueueVerification();

    await expect(worker.runOnce(t0)).resolves.toBe(1);

    expect(sendVerification).toHaveBeenCalledWith(
      { userId: 7 },
      expect.objectContaining({ id, kind: TaskKind.SendVerificationEmail }),
    );
    expect(repository.get(id)).toMatchObject({
      status: TaskStatus.Succeeded,
      attempts: 1,
      lockedAt: null,
    });
    expect(processed.inc).toHaveBeenCalledWith({
      kind: TaskKind.SendVerificationEmail,
      outcome: 'succeeded',
    });
  });

  it('should leave tasks scheduled for later alone', async () => {
    await repository.insert({
      kind: TaskKind.PurgeExpiredTokens,
      payload: {},
      runAt: at(5000),
      maxAttempts: 4,
      uniqueKey: null,
    });

    await expect(worker.runOnce(t0)).resolves.toBe(0);
    expect(handlers[TaskKind.PurgeExpiredTokens].handle).not.toHaveBeenCalled();
  });

  it('should reschedule a failed attempt with exponential backoff', async () => {
    const { id } = await enqueueVerification();
    sendVerification.mockRejectedValue(new Error('smtp unavailable'));

    await worker.runOnce(t0);

    expect(repository.get(id)).toMatchObject({
      status: TaskStatus.Pending,
      attempts: 1,
      runAt: at(BACKOFF_BASE_MS),
      lastError: 'smtp unavailable',
    });

    await expect(worker.runOnce(at(BACKOFF_BASE_MS - 1))).resolves.toBe(0);
    await worker.runOnce(at(BACKOFF_BASE_MS));

    expect(repository.get(id)).toMatchObject({
      status: TaskStatus.Pending,
      attempts: 2,
      runAt: at(BACKOFF_BASE_MS + 2 * BACKOFF_BASE_MS),
    });
    expect(processed.inc).toHaveBeenCalledWith({
      kind: TaskKind.SendVerificationEmail,
      outcome: 'retried',
    });
  });

  it('should give up once the attempt budget is spent', async () => {
    const { id } = await enqueueVerification(2);
    sendVerification.mockRejectedValue(new Error('smtp unavailable'));

    await worker.runOnce(t0);
    await worker.runOnce(at(BACKOFF_BASE_MS));
    await worker.runOnce(at(60 * 60 * 1000));

    expect(sendVerification).toHaveBeenCalledTimes(2);
    expect(repository.get(id)).toMatchObject({
      status: TaskStatus.Failed,
      attempts: 2,
      lastError: 'smtp unavailable',
    });
    expect(processed.inc).toHaveBeenLastCalledWith({
      kind: TaskKind.SendVerificationEmail,
      outcome: 'failed',
    });
  });

  it('should count a handler that outlives the timeout as a failed attempt', async () => {
    const { id } = await enqueueVerification();
    sendVerification.mockReturnValue(new Promise<void>(() => undefined));

    await worker.runOnce(t0);

    expect(repository.get(id)).toMatchObject({
      status: TaskStatus.Pending,
      attempts: 1,
      lastError: `Task timed out after ${TIMEOUT_MS}ms`,
    });
  });

  it('should claim a task again once the lease of a crashed worker runs out', async () => {
    const { id } = await enqueueVerification();
    await repository.claimDue(t0, 10, 2 * TIMEOUT_MS);

    await expect(worker.runOnce(at(2 * TIMEOUT_MS))).resolves.toBe(0);
    await expect(worker.runOnce(at(2 * TIMEOUT_MS + 1))).resolves.toBe(1);

    expect(sendVerification).toHaveBeenCalledTimes(1);
    expect(repository.get(id)).toMatchObject({
      status: TaskStatus.Succeeded,
      attempts: 2,
    });
  });

  it('should fail a reclaimed task whose last attempt never reported back', async () => {
    const { id } = await enqueueVerification(1);
    await repository.claimDue(t0, 10, 2 * TIMEOUT_MS);

    await worker.runOnce(at(2 * TIMEOUT_MS + 1));

    expect(sendVerification).not.toHaveBeenCalled();
    expect(repository.get(id)).toMatchObject({
      status: TaskStatus.Failed,
      lastError: 'Lease expired on the last attempt',
    });
  });

  it('should fail a task with a malformed payload without retrying', async () => {
    const record = repository.seed(TaskKind.SendVerificationEmail, {}, t0);

    await worker.runOnce(t0);

    expect(sendVerification).not.toHaveBeenCalled();
    expect(repository.get(record.id)).toMatchObject({
      status: TaskStatus.Failed,
      attempts: 1,
      lastError: 'payload.userId must be an integer',
    });
  });

  it('should route each kind to its own handler', async () => {
    await repository.insert({
      kind: TaskKind.RecountParticipants,
      payload: {},
      runAt: t0,
      maxAttempts: 4,
      uniqueKey: null,
    });

    await worker.runOnce(t0);

    expect(handlers[TaskKind.RecountParticipants].handle).toHaveBeenCalledWith(
      {},
      expect.objectContaining({ kind: TaskKind.RecountParticipants }),
    );
    expect(sendVerification).not.toHaveBeenCalled();
  });

  it('should register its poll interval on bootstrap and remove it on shutdown', async () => {
    worker.onApplicationBootstrap();
    expect(
      schedulerRegistry.doesExist('interval', TaskWorkerService.POLL_INTERVAL_NAME),
    ).toBe(true);

    await worker.onApplicationShutdown();

    expect(
      schedulerRegistry.doesExist('interval', TaskWorkerService.POLL_INTERVAL_NAME),
    ).toBe(false);
  });
});

describe('withTimeout', () => {
  it('should pass the result through when the work finishes in time', async () => {
    await expect(withTimeout(Promise.resolve(5), 1000)).resolves.toBe(5);
  });

  it('should reject with a timeout error when the work takes too long', async () => {
    await expect(
      withTimeout(new Promise<number>(() => undefined), 10),
    ).rejects.toBeInstanceOf(TaskTimeoutError);
  });
});
