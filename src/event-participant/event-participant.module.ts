import { Module } from '@nestjs/common';
import { EventParticipantService } from './event-participant.service';
import { RelationalEventParticipantPersistenceModule } from './infrastructure/persistence/relational/relational-persistence.module';
import { RecountParticipantsHandler } from './tasks/recount-participants.handler';

@Module({
  imports: [RelationalEventParticipantPersistenceModule],
  providers: [EventParticipantService, RecountParticipantsHandler],
  exports: [EventParticipantService, RecountParticipantsHandler],
})
export class EventParticipantModule {}
