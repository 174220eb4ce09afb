import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter } from 'prom-client';
import { LoggingContextStorage } from '../logger/logging.context';
import {
  computeRetryDelay,
  decodeTask,
  InvalidTaskError,
  Task,
  TaskKind,
  TaskRecord,
} from './domain/task';
import { TaskRepository } from './infrastructure/persistence/task.repository';
import {
  TASK_HANDLERS,
  TASK_WORKER_OPTIONS,
  TaskHandlers,
  TaskWorkerOptions,
} from './task.types';

export class TaskTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Task timed out after ${timeoutMs}ms`);
    this.name = 'TaskTimeoutError';
  }
}

export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TaskTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function dispatch(handlers: TaskHandlers, task: Task): Promise<void> {
  switch (task.kind) {
    case TaskKind.SendVerificationEmail:
      return handlers[task.kind].handle(task.payload, task);
    case TaskKind.SendPasswordResetEmail:
      return handlers[task.kind].handle(task.payload, task);
    case TaskKind.PurgeExpiredTokens:
      return handlers[task.kind].handle(task.payload, task);
    case TaskKind.RecountParticipants:
      return handlers[task.kind].handle(task.payload, task);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type TaskOutcome = 'succeeded' | 'retried' | 'failed';

/**
 * Polls the task table and runs due tasks. A task whose lease ran out
 * (worker crashed or hung past twice the timeout) is claimed again, so
 * every task runs at least once.
 */
@Injectable()
export class TaskWorkerService
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  static readonly POLL_INTERVAL_NAME = 'task-worker-poll';

  private readonly logger = new Logger(TaskWorkerService.name);
  private polling: Promise<number> | null = null;

  constructor(
    @Inject(TASK_WORKER_OPTIONS) private readonly options: TaskWorkerOptions,
    @Inject(TASK_HANDLERS) private readonly handlers: TaskHandlers,
    private readonly taskRepository: TaskRepository,
    private readonly schedulerRegistry: SchedulerRegistry,
    @InjectMetric('tasks_processed_total')
    private readonly processed: Counter<string>,
  ) {}

  onApplicationBootstrap() {
    const interval = setInterval(() => this.tick(), this.options.pollIntervalMs);
    this.schedulerRegistry.addInterval(
      TaskWorkerService.POLL_INTERVAL_NAME,
      interval,
    );
    this.logger.log(
      `Polling every ${this.options.pollIntervalMs}ms for up to ${this.options.batchSize} tasks (timeout ${this.options.timeoutMs}ms)`,
    );
  }

  async onApplicationShutdown() {
    if (
      this.schedulerRegistry.doesExist(
        'interval',
        TaskWorkerService.POLL_INTERVAL_NAME,
      )
    ) {
      this.schedulerRegistry.deleteInterval(
        TaskWorkerService.POLL_INTERVAL_NAME,
      );
    }
    if (this.polling) {
      await this.polling;
    }
  }

  /** Claims one batch of due tasks and runs them. Resolves to the batch size. */
  async runOnce(now: Date = new Date()): Promise<number> {
    const { batchSize, timeoutMs } = this.options;
    const records = await this.taskRepository.claimDue(
      now,
      batchSize,
      2 * timeoutMs,
    );
    await Promise.all(records.map((record) => this.execute(record, now)));
    return records.length;
  }

  private tick(): void {
    if (this.polling) {
      return;
    }
    this.polling = this.runOnce()
      .catch((error: unknown) => {
        this.logger.error(`Task poll failed: ${errorMessage(error)}`);
        return 0;
      })
      .finally(() => {
        this.polling = null;
      });
  }

  private execute(record: TaskRecord, now: Date): Promise<void> {
    return LoggingContextStorage.run(
      { taskId: record.id, taskKind: record.kind },
      async () => {
        let outcome: TaskOutcome;
        try {
          outcome = await this.attempt(record, now);
        } catch (error) {
          this.logger.error(
            `Could not record the result of task ${record.id}: ${errorMessage(error)}`,
          );
          return;
        }
        this.processed.inc({ kind: record.kind, outcome });
      },
    );
  }

  private async attempt(record: TaskRecord, now: Date): Promise<TaskOutcome> {
    if (record.attempts > record.maxAttempts) {
      await this.taskRepository.fail(
        record.id,
        record.lastError ?? 'Lease expired on the last attempt',
      );
      this.logger.error(
        `Task ${record.id} (${record.kind}) failed: lease expired after ${record.maxAttempts} attempts`,
      );
      return 'failed';
    }

    try {
      const task = decodeTask(record);
      await withTimeout(dispatch(this.handlers, task), this.options.timeoutMs);
    } catch (error) {
      return this.handleFailure(record, now, error);
    }

    await this.taskRepository.complete(record.id);
    this.logger.log(
      `Task ${record.id} (${record.kind}) succeeded on attempt ${record.attempts}`,
    );
    return 'succeeded';
  }

  private async handleFailure(
    record: TaskRecord,
    now: Date,
    error: unknown,
  ): Promise<TaskOutcome> {
    const message = errorMessage(error);

    if (error instanceof InvalidTaskError || record.attempts >= record.maxAttempts) {
      await this.taskRepository.fail(record.id, message);
      this.logger.error(
        `Task ${record.id} (${record.kind}) failed after ${record.attempts} attempts: ${message}`,
      );
      return 'failed';
    }

    const delayMs = computeRetryDelay(
      record.attempts,
      this.options.backoffBaseMs,
      this.options.backoffMaxMs,
    );
    await this.taskRepository.retry(
      record.id,
      new Date(now.getTime() + delayMs),
      message,
    );
    this.logger.warn(
      `Task ${record.id} (${record.kind}) attempt ${record.attempts} failed, retrying in ${delayMs}ms: ${message}`,
    );
    return 'retried';
  }
}
