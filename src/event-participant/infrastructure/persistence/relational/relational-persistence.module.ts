import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EventParticipantRepository } from '../event-participant.repository';
import { EventParticipantEntity } from './entities/event-participant.entity';
import { EventParticipantRelationalRepository } from './repositories/event-participant.repository';
import { EventEntity } from '../../../../event/infrastructure/persistence/relational/entities/event.entity';

@Module({
  imports: [TypeOrmModule.forFeature([EventParticipantEntity, EventEntity])],
  providers: [
    {
      provide: EventParticipantRepository,
      useClass: EventParticipantRelationalRepository,
    },
  ],
  exports: [EventParticipantRepository],
})
export class RelationalEventParticipantPersistenceModule {}
