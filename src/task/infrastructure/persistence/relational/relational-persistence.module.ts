import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { TaskRepository } from '../task.repository';
import { TaskEntity } from './entities/task.entity';
import { TaskRelationalRepository } from './repositories/task.repository';

@Module({
  imports: [TypeOrmModule.forFeature([TaskEntity])],
  providers: [
    {
      provide: TaskRepository,
      useClass: TaskRelationalRepository,
    },
  ],
  exports: [TaskRepository],
})
export class RelationalTaskPersistenceModule {}
