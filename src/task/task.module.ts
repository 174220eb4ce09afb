import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';
import { RelationalTaskPersistenceModule } from './infrastructure/persistence/relational/relational-persistence.module';
import { TaskDispatcherService } from './task-dispatcher.service';
import { TASK_DEFAULT_MAX_ATTEMPTS } from './task.types';

@Module({
  imports: [RelationalTaskPersistenceModule],
  providers: [
    {
      provide: TASK_DEFAULT_MAX_ATTEMPTS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AllConfigType>): number =>
        configService.getOrThrow('task.maxAttempts', { infer: true }),
    },
    TaskDispatcherService,
  ],
  exports: [TaskDispatcherService, RelationalTaskPersistenceModule],
})
export class TaskModule {}
