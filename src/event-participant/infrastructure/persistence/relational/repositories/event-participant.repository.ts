import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import {
  decideJoin,
  JoinOutcome,
  WithdrawOutcome,
} from '../../../../domain/participation';
import { EventParticipantRepository } from '../../event-participant.repository';
import { EventParticipantEntity } from '../entities/event-participant.entity';
import { EventEntity } from '../../../../../event/infrastructure/persistence/relational/entities/event.entity';
import { TransactionHelper } from '../../../../../utils/transaction-helper';
import { isUniqueViolation } from '../../../../../utils/database-errors';

function lockEvent(
  manager: EntityManager,
  eventId: number,
): Promise<EventEntity | null> {
  return manager
    .getRepository(EventEntity)
    .createQueryBuilder('event')
    .setLock('pessimistic_write')
    .where('event.id = :eventId', { eventId })
    .getOne();
}

@Injectable()
export class EventParticipantRelationalRepository
  implements EventParticipantRepository
{
  constructor(
    private readonly dataSource: DataSource,
    @InjectRepository(EventParticipantEntity)
    private readonly participantsRepository: Repository<EventParticipantEntity>,
  ) {}

  async join(eventId: number, userId: number): Promise<JoinOutcome> {
    try {
      return await TransactionHelper.runInTransaction(
        this.dataSource,
        async (manager): Promise<JoinOutcome> => {
          const event = await lockEvent(manager, eventId);
          if (!event) {
            return JoinOutcome.EventNotFound;
          }

          const alreadyJoined = await manager.exists(EventParticipantEntity, {
            where: { eventId, userId },
          });
          const participantsCount = await manager.count(
            EventParticipantEntity,
            { where: { eventId } },
          );
          const decision = decideJoin({
            alreadyJoined,
            participantsCount,
            capacity: event.capacity,
          });
          if (decision !== JoinOutcome.Joined) {
            return decision;
          }

          await manager.insert(EventParticipantEntity, { eventId, userId });
          await manager.update(
            EventEntity,
            { id: eventId },
            { participantsCount: participantsCount + 1 },
          );
          return JoinOutcome.Joined;
        },
      );
    } catch (error) {
      // The unique constraint catches a duplicate the lock did not serialise.
      if (isUniqueViolation(error)) {
        return JoinOutcome.AlreadyJoined;
      }
      throw error;
    }
  }

  withdraw(eventId: number, userId: number): Promise<WithdrawOutcome> {
    return TransactionHelper.runInTransaction(
      this.dataSource,
      async (manager): Promise<WithdrawOutcome> => {
        const event = await lockEvent(manager, eventId);
        if (!event) {
          return WithdrawOutcome.NotAParticipant;
        }

        const result = await manager.delete(EventParticipantEntity, {
          eventId,
          userId,
        });
        if (!result.affected) {
          return WithdrawOutcome.NotAParticipant;
        }

        const participantsCount = await manager.count(EventParticipantEntity, {
          where: { eventId },
        });
        await manager.update(
          EventEntity,
          { id: eventId },
          { participantsCount },
        );
        return WithdrawOutcome.Withdrawn;
      },
    );
  }

  exists(eventId: number, userId: number): Promise<boolean> {
    return this.participantsRepository.exists({ where: { eventId, userId } });
  }

  countByEventId(eventId: number): Promise<number> {
    return this.participantsRepository.count({ where: { eventId } });
  }

  /**
   * Each chunk locks its event rows in id order before recounting, so a join
   * or withdraw on those events waits for the chunk instead of racing it.
   */
  async recountAll(chunkSize: number): Promise<number> {
    let lastId = 0;
    let visited = 0;

    for (;;) {
      const ids = await TransactionHelper.runInTransaction(
        this.dataSource,
        async (manager) => {
          const events = manager.getRepository(EventEntity);
          const rows = await events
            .createQueryBuilder('event')
            .select('event.id', 'id')
            .setLock('pessimistic_write')
            .where('event.id > :lastId', { lastId })
            .orderBy('event.id', 'ASC')
            .limit(chunkSize)
            .getRawMany<{ id: number }>();
          const chunk = rows.map((row) => row.id);
          if (chunk.length > 0) {
            await events
              .createQueryBuilder()
              .update(EventEntity)
              .set({
                participantsCount: () =>
                  '(SELECT COUNT(*) FROM "eventParticipants" p WHERE p."eventId" = "events"."id")',
              })
              .whereInIds(chunk)
              .execute();
          }
          return chunk;
        },
      );
      if (ids.length === 0) {
        return visited;
      }

      visited += ids.length;
      lastId = Math.max(...ids);
    }
  }
}
