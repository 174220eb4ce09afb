import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { TaskHandle, TaskKind } from './domain/task';
import { TaskDispatcherService } from './task-dispatcher.service';

const HOUR_MS = 60 * 60 * 1000;

type PeriodicTaskKind = TaskKind.PurgeExpiredTokens | TaskKind.RecountParticipants;

/**
 * Enqueues the periodic maintenance tasks. Each enqueue carries the start of
 * its period as unique key, so several worker processes firing the same cron
 * slot produce one task.
 */
@Injectable()
export class TaskSchedulerService {
  private readonly logger = new Logger(TaskSchedulerService.name);

  constructor(private readonly taskDispatcher: TaskDispatcherService) {}

  @Cron(CronExpression.EVERY_HOUR)
  async schedulePurgeExpiredTokens(): Promise<void> {
    await this.enqueuePeriodic(TaskKind.PurgeExpiredTokens, HOUR_MS);
  }

  @Cron(CronExpression.EVERY_30_MINUTES)
  async scheduleRecountParticipants(): Promise<void> {
    await this.enqueuePeriodic(TaskKind.RecountParticipants, HOUR_MS / 2);
  }

  async enqueuePeriodic(
    kind: PeriodicTaskKind,
    periodMs: number,
    now: Date = new Date(),
  ): Promise<TaskHandle | null> {
    const slot = new Date(Math.floor(now.getTime() / periodMs) * periodMs);
    try {
      return await this.taskDispatcher.enqueue(
        kind,
        {},
        { uniqueKey: `${kind}:${slot.toISOString()}`, runAt: now },
      );
    } catch (error) {
      this.logger.error(
        `Failed to schedule ${kind}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }
  }
}
