import { Injectable, Logger } from '@nestjs/common';
import { AuditLoggerService } from '../logger/audit-logger.provider';
import { JoinOutcome, WithdrawOutcome } from './domain/participation';
import { EventParticipantRepository } from './infrastructure/persistence/event-participant.repository';

export const RECOUNT_CHUNK_SIZE = 2000;

@Injectable()
export class EventParticipantService {
  private readonly logger = new Logger(EventParticipantService.name);

  constructor(
    private readonly participantRepository: EventParticipantRepository,
    private readonly auditLogger: AuditLoggerService,
  ) {}

  async join(userId: number, eventId: number): Promise<JoinOutcome> {
    const outcome = await this.participantRepository.join(eventId, userId);
    if (outcome === JoinOutcome.Joined) {
      this.auditLogger.log('event.joined', { userId, eventId });
    } else {
      this.logger.debug(`Join of event ${eventId} by ${userId}: ${outcome}`);
    }
    return outcome;
  }

  async withdraw(userId: number, eventId: number): Promise<WithdrawOutcome> {
    const outcome = await this.participantRepository.withdraw(eventId, userId);
    if (outcome === WithdrawOutcome.Withdrawn) {
      this.auditLogger.log('event.withdrawn', { userId, eventId });
    }
    return outcome;
  }

  isParticipant(userId: number, eventId: number): Promise<boolean> {
    return this.participantRepository.exists(eventId, userId);
  }

  countParticipants(eventId: number): Promise<number> {
    return this.participantRepository.countByEventId(eventId);
  }

  async recountAll(): Promise<number> {
    const visited = await this.participantRepository.recountAll(
      RECOUNT_CHUNK_SIZE,
    );
    this.logger.log(`Recounted participants of ${visited} events`);
    return visited;
  }
}
