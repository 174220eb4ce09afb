import { Injectable } from '@nestjs/common';
import { TaskKind } from '../../task/domain/task';
import { TaskHandler } from '../../task/task.types';
import { EventParticipantService } from '../event-participant.service';

@Injectable()
export class RecountParticipantsHandler
  implements TaskHandler<TaskKind.RecountParticipants>
{
  constructor(
    private readonly eventParticipantService: EventParticipantService,
  ) {}

  async handle(): Promise<void> {
    await this.eventParticipantService.recountAll();
  }
}
