import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { AuthTasksModule } from './auth/auth-tasks.module';
import { SendPasswordResetEmailHandler } from './auth/tasks/send-password-reset-email.handler';
import { SendVerificationEmailHandler } from './auth/tasks/send-verification-email.handler';
import { AllConfigType } from './config/config.type';
import { AppConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
import { EventParticipantModule } from './event-participant/event-participant.module';
import { RecountParticipantsHandler } from './event-participant/tasks/recount-participants.handler';
import { LoggerModule } from './logger/logger.module';
import { MetricsModule } from './metrics/metrics.module';
import { TaskKind } from './task/domain/task';
import { TaskSchedulerService } from './task/task-scheduler.service';
import { TaskWorkerService } from './task/task-worker.service';
import { TaskModule } from './task/task.module';
import {
  TASK_HANDLERS,
  TASK_WORKER_OPTIONS,
  TaskHandlers,
  TaskWorkerOptions,
} from './task/task.types';
import { TracingModule } from './tracing/tracing.module';
import { PurgeExpiredTokensHandler } from './verification-token/tasks/purge-expired-tokens.handler';
import { VerificationTokenModule } from './verification-token/verification-token.module';

/**
 * Root module of the worker process: polls the task table and enqueues the
 * periodic tasks. Serves no HTTP.
 */
@Module({
  imports: [
    AppConfigModule,
    DatabaseModule,
    ScheduleModule.forRoot(),
    TracingModule,
    MetricsModule,
    LoggerModule,
    TaskModule,
    AuthTasksModule,
    VerificationTokenModule,
    EventParticipantModule,
  ],
  providers: [
    {
      provide: TASK_WORKER_OPTIONS,
      inject: [ConfigService],
      useFactory: (
        configService: ConfigService<AllConfigType>,
      ): TaskWorkerOptions => {
        const task = configService.getOrThrow('task', { infer: true });
        return {
          pollIntervalMs: task.pollIntervalMs,
          batchSize: task.batchSize,
          timeoutMs: task.timeoutMs,
          backoffBaseMs: task.backoffBaseMs,
          backoffMaxMs: task.backoffMaxMs,
        };
      },
    },
    PurgeExpiredTokensHandler,
    {
      provide: TASK_HANDLERS,
      inject: [
        SendVerificationEmailHandler,
        SendPasswordResetEmailHandler,
        PurgeExpiredTokensHandler,
        RecountParticipantsHandler,
      ],
      useFactory: (
        sendVerificationEmail: SendVerificationEmailHandler,
        sendPasswordResetEmail: SendPasswordResetEmailHandler,
        purgeExpiredTokens: PurgeExpiredTokensHandler,
        recountParticipants: RecountParticipantsHandler,
      ): TaskHandlers => ({
        [TaskKind.SendVerificationEmail]: sendVerificationEmail,
        [TaskKind.SendPasswordResetEmail]: sendPasswordResetEmail,
        [TaskKind.PurgeExpiredTokens]: purgeExpiredTokens,
        [TaskKind.RecountParticipants]: recountParticipants,
      }),
    },
    TaskWorkerService,
    TaskSchedulerService,
  ],
})
export class WorkerModule {}
