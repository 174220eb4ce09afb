import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Brackets, DataSource, In, Repository } from 'typeorm';
import {
  NewTask,
  TaskHandle,
  TaskRecord,
  TaskStatus,
} from '../../../../domain/task';
import { TaskRepository } from '../../task.repository';
import { TaskEntity } from '../entities/task.entity';
import { TaskMapper } from '../mappers/task.mapper';
import { TransactionHelper } from '../../../../../utils/transaction-helper';

function insertedId(raw: unknown): number | undefined {
  if (!Array.isArray(raw) || raw.length === 0) {
    return undefined;
  }
  const row: unknown = raw[0];
  if (
    typeof row === 'object' &&
    row !== null &&
    'id' in row &&
    typeof row.id === 'number'
  ) {
    return row.id;
  }
  return undefined;
}

@Injectable()
export class TaskRelationalRepository implements TaskRepository {
  constructor(
    private readonly dataSource: DataSource,
    @InjectRepository(TaskEntity)
    private readonly tasksRepository: Repository<TaskEntity>,
  ) {}

  async insert(task: NewTask): Promise<TaskHandle> {
    const result = await this.tasksRepository
      .createQueryBuilder()
      .insert()
      .into(TaskEntity)
      .values({
        kind: task.kind,
        payload: task.payload,
        status: TaskStatus.Pending,
        attempts: 0,
        maxAttempts: task.maxAttempts,
        runAt: task.runAt,
        uniqueKey: task.uniqueKey,
      })
      .orIgnore()
      .returning(['id'])
      .execute();

    const id = insertedId(result.raw);
    if (id !== undefined) {
      return { id, kind: task.kind };
    }

    if (task.uniqueKey === null) {
      throw new Error(`Insert of ${task.kind} task returned no id`);
    }
    const existing = await this.tasksRepository.findOneOrFail({
      where: { uniqueKey: task.uniqueKey },
    });
    return { id: existing.id, kind: task.kind };
  }

  claimDue(now: Date, limit: number, leaseMs: number): Promise<TaskRecord[]> {
    const leaseCutoff = new Date(now.getTime() - leaseMs);

    return TransactionHelper.runInTransaction(
      this.dataSource,
      async (manager) => {
        const due = await manager
          .getRepository(TaskEntity)
          .createQueryBuilder('task')
          .setLock('pessimistic_write')
          .setOnLocked('skip_locked')
          .where(
            new Brackets((qb) =>
              qb
                .where('task.status = :pending', {
                  pending: TaskStatus.Pending,
                })
                .andWhere('task.runAt <= :now', { now }),
            ),
          )
          .orWhere(
            new Brackets((qb) =>
              qb
                .where('task.status = :running', {
                  running: TaskStatus.Running,
                })
                .andWhere('task.lockedAt < :leaseCutoff', { leaseCutoff }),
            ),
          )
          .orderBy('task.runAt', 'ASC')
          .limit(limit)
          .getMany();

        if (due.length === 0) {
          return [];
        }

        await manager.update(
          TaskEntity,
          { id: In(due.map((task) => task.id)) },
          {
            status: TaskStatus.Running,
            lockedAt: now,
            attempts: () => '"attempts" + 1',
          },
        );

        return due.map((task) =>
          TaskMapper.toRecord(
            Object.assign(task, {
              status: TaskStatus.Running,
              lockedAt: now,
              attempts: task.attempts + 1,
            }),
          ),
        );
      },
    );
  }

  async complete(id: number): Promise<void> {
    await this.tasksRepository.update(
      { id },
      { status: TaskStatus.Succeeded, lockedAt: null, lastError: null },
    );
  }

  async retry(id: number, runAt: Date, error: string): Promise<void> {
    await this.tasksRepository.update(
      { id },
      { status: TaskStatus.Pending, lockedAt: null, runAt, lastError: error },
    );
  }

  async fail(id: number, error: string): Promise<void> {
    await this.tasksRepository.update(
      { id },
      { status: TaskStatus.Failed, lockedAt: null, lastError: error },
    );
  }
}
