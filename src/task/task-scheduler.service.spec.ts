import { Test, TestingModule } from '@nestjs/testing';
import { InMemoryTaskRepository } from '../test/fakes/in-memory-task.repository';
import { TaskKind } from './domain/task';
import { TaskRepository } from './infrastructure/persistence/task.repository';
import { TaskDispatcherService } from './task-dispatcher.service';
import { TaskSchedulerService } from './task-scheduler.service';
import { TASK_DEFAULT_MAX_ATTEMPTS } from './task.types';

const HOUR = 60 * 60 * 1000;

describe('TaskSchedulerService', () => {
  let scheduler: TaskSchedulerService;
  let repository: InMemoryTaskRepository;

  beforeEach(async () => {
    repository = new InMemoryTaskRepository();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TaskSchedulerService,
        TaskDispatcherService,
        { provide: TASK_DEFAULT_MAX_ATTEMPTS, useValue: 4 },
        { provide: TaskRepository, useValue: repository },
      ],
    }).compile();
    scheduler = module.get<TaskSchedulerService>(TaskSchedulerService);
  });

  it('should key the task on the start of its period', async () => {
    await scheduler.enqueuePeriodic(
      TaskKind.PurgeExpiredTokens,
      HOUR,
      new Date('2026-05-10T12:34:56.000Z'),
    );

    expect(repository.tasks[0].uniqueKey).toBe(
      'purge-expired-tokens:2026-05-10T12:00:00.000Z',
    );
  });

  it('should enqueue once per period however often it fires', async () => {
    await scheduler.enqueuePeriodic(
      TaskKind.RecountParticipants,
      HOUR / 2,
      new Date('2026-05-10T12:31:00.000Z'),
    );
    await scheduler.enqueuePeriodic(
      TaskKind.RecountParticipants,
      HOUR / 2,
      new Date('2026-05-10T12:59:00.000Z'),
    );
    await scheduler.enqueuePeriodic(
      TaskKind.RecountParticipants,
      HOUR / 2,
      new Date('2026-05-10T13:00:00.000Z'),
    );

    expect(repository.tasks.map((t) => t.uniqueKey)).toEqual([
      'recount-participants:2026-05-10T12:30:00.000Z',
      'recount-participants:2026-05-10T13:00:00.000Z',
    ]);
  });

  it('should log and carry on when the queue cannot be written', async () => {
    jest
      .spyOn(repository, 'insert')
      .mockRejectedValueOnce(new Error('connection refused'));

    await expect(
      scheduler.enqueuePeriodic(TaskKind.PurgeExpiredTokens, HOUR),
    ).resolves.toBeNull();
  });
});
