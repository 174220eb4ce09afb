import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  EnqueueOptions,
  TaskHandle,
  TaskKind,
  TaskPayloads,
} from './domain/task';
import { TaskRepository } from './infrastructure/persistence/task.repository';
import { TASK_DEFAULT_MAX_ATTEMPTS } from './task.types';

@Injectable()
export class TaskDispatcherService {
  private readonly logger = new Logger(TaskDispatcherService.name);

  constructor(
    @Inject(TASK_DEFAULT_MAX_ATTEMPTS)
    private readonly defaultMaxAttempts: number,
    private readonly taskRepository: TaskRepository,
  ) {}

  async enqueue<K extends TaskKind>(
    kind: K,
    payload: TaskPayloads[K],
    options: EnqueueOptions = {},
  ): Promise<TaskHandle> {
    const handle = await this.taskRepository.insert({
      kind,
      payload,
      runAt: options.runAt ?? new Date(),
      maxAttempts: options.maxAttempts ?? this.defaultMaxAttempts,
      uniqueKey: options.uniqueKey ?? null,
    });
    this.logger.debug(`Enqueued ${kind} task ${handle.id}`);
    return handle;
  }
}
