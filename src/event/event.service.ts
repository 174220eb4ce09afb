import {
  ForbiddenException,
  HttpStatus,
  Injectable,
  Logger,
  NotFoundException,
  UnauthorizedException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { AllConfigType } from '../config/config.type';
import {
  JoinOutcome,
  WithdrawOutcome,
} from '../event-participant/domain/participation';
import { EventParticipantService } from '../event-participant/event-participant.service';
import { EventParticipantEntity } from '../event-participant/infrastructure/persistence/relational/entities/event-participant.entity';
import { AuditLoggerService } from '../logger/audit-logger.provider';
import { UserService } from '../user/user.service';
import { paginate, PaginationResult } from '../utils/generic-pagination';
import { Trace } from '../utils/trace.decorator';
import { TransactionHelper } from '../utils/transaction-helper';
import {
  EventSchedule,
  hasStarted,
  validateEventSchedule,
} from './domain/event-schedule';
import { CreateEventDto } from './dto/create-event.dto';
import { EventScope, QueryEventsDto } from './dto/query-events.dto';
import { UpdateEventDto } from './dto/update-event.dto';
import { EventEntity } from './infrastructure/persistence/relational/entities/event.entity';

function lockEventBySlug(
  manager: EntityManager,
  slug: string,
): Promise<EventEntity | null> {
  return manager
    .getRepository(EventEntity)
    .createQueryBuilder('event')
    .setLock('pessimistic_write')
    .where('event.slug = :slug', { slug })
    .getOne();
}

@Injectable()
export class EventService {
  private readonly logger = new Logger(EventService.name);

  constructor(
    @InjectRepository(EventEntity)
    private readonly eventRepository: Repository<EventEntity>,
    private readonly dataSource: DataSource,
    private readonly userService: UserService,
    private readonly eventParticipantService: EventParticipantService,
    private readonly auditLogger: AuditLoggerService,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  @Trace('findAll')
  async findAll(
    query: QueryEventsDto,
    userId: number | null,
    now: Date = new Date(),
  ): Promise<PaginationResult<EventEntity>> {
    const queryBuilder = this.eventRepository.createQueryBuilder('event');

    if ((query.scope ?? EventScope.Upcoming) === EventScope.Mine) {
      if (userId === null) {
        throw new UnauthorizedException('Authentication required');
      }
      queryBuilder
        .where('event.ownerId = :userId', { userId })
        .orderBy('event.startDate', 'DESC');
    } else {
      queryBuilder
        .where('event.startDate > :now', { now })
        .orderBy('event.startDate', 'ASC');
    }
    queryBuilder.addOrderBy('event.id', 'ASC');

    return paginate(queryBuilder, {
      page: query.page ?? 1,
      limit:
        query.limit ??
        this.configService.getOrThrow('event', { infer: true }).pageSize,
    });
  }

  async getBySlug(slug: string): Promise<EventEntity> {
    const event = await this.eventRepository.findOne({ where: { slug } });
    if (!event) {
      throw new NotFoundException(`Event with slug ${slug} not found`);
    }
    return event;
  }

  /** The event, with `joined` filled in for a signed-in caller. */
  async findBySlug(slug: string, userId: number | null): Promise<EventEntity> {
    const event = await this.getBySlug(slug);
    if (userId !== null) {
      event.joined = await this.eventParticipantService.isParticipant(
        userId,
        event.id,
      );
    }
    return event;
  }

  @Trace('create')
  async create(
    userId: number,
    dto: CreateEventDto,
    now: Date = new Date(),
  ): Promise<EventEntity> {
    const owner = await this.userService.getById(userId);
    if (!owner.isVerified) {
      throw new ForbiddenException({
        status: HttpStatus.FORBIDDEN,
        errors: { user: 'emailNotVerified' },
      });
    }

    const schedule: EventSchedule = {
      startDate: dto.startDate,
      endDate: dto.endDate ?? null,
    };
    this.assertValidSchedule(schedule, now);

    const event = await this.eventRepository.save(
      this.eventRepository.create({
        title: dto.title,
        description: dto.description ?? '',
        ...schedule,
        capacity:
          dto.capacity === undefined
            ? this.configService.getOrThrow('event', { infer: true })
                .defaultCapacity
            : dto.capacity,
        participantsCount: 0,
        ownerId: owner.id,
      }),
    );
    this.auditLogger.log('event.created', { userId, eventId: event.id });
    return event;
  }

  /**
   * Applies an owner's changes under the event row lock. The capacity floor
   * is the live participation row count, read under that lock the same way
   * joins read it.
   */
  @Trace('update')
  update(
    slug: string,
    userId: number,
    dto: UpdateEventDto,
    now: Date = new Date(),
  ): Promise<EventEntity> {
    return TransactionHelper.runInTransaction(
      this.dataSource,
      async (manager) => {
        const event = await lockEventBySlug(manager, slug);
        if (!event) {
          throw new NotFoundException(`Event with slug ${slug} not found`);
        }
        this.assertMutable(event, userId, now);

        const schedule: EventSchedule = {
          startDate: dto.startDate ?? event.startDate,
          endDate: dto.endDate === undefined ? event.endDate : dto.endDate,
        };
        this.assertValidSchedule(schedule, now);

        if (
          typeof dto.capacity === 'number' &&
          dto.capacity <
            (await manager.count(EventParticipantEntity, {
              where: { eventId: event.id },
            }))
        ) {
          throw new UnprocessableEntityException({
            status: HttpStatus.UNPROCESSABLE_ENTITY,
            errors: { capacity: 'belowParticipantCount' },
          });
        }

        event.title = dto.title ?? event.title;
        event.description = dto.description ?? event.description;
        event.startDate = schedule.startDate;
        event.endDate = schedule.endDate;
        if (dto.capacity !== undefined) {
          event.capacity = dto.capacity;
        }

        const saved = await manager.save(event);
        this.logger.log(`Event ${event.id} updated by ${userId}`);
        return saved;
      },
    );
  }

  @Trace('remove')
  async remove(
    slug: string,
    userId: number,
    now: Date = new Date(),
  ): Promise<void> {
    const eventId = await TransactionHelper.runInTransaction(
      this.dataSource,
      async (manager) => {
        const event = await lockEventBySlug(manager, slug);
        if (!event) {
          throw new NotFoundException(`Event with slug ${slug} not found`);
        }
        this.assertMutable(event, userId, now);

        await manager.delete(EventEntity, { id: event.id });
        return event.id;
      },
    );
    this.auditLogger.log('event.deleted', { userId, eventId });
  }

  async join(slug: string, userId: number): Promise<JoinOutcome> {
    const event = await this.getBySlug(slug);
    return this.eventParticipantService.join(userId, event.id);
  }

  async withdraw(slug: string, userId: number): Promise<WithdrawOutcome> {
    const event = await this.getBySlug(slug);
    return this.eventParticipantService.withdraw(userId, event.id);
  }

  private assertMutable(event: EventEntity, userId: number, now: Date): void {
    if (event.ownerId !== userId) {
      throw new ForbiddenException({
        status: HttpStatus.FORBIDDEN,
        errors: { event: 'notOwner' },
      });
    }
    if (hasStarted(event, now)) {
      throw new ForbiddenException({
        status: HttpStatus.FORBIDDEN,
        errors: { event: 'alreadyStarted' },
      });
    }
  }

  private assertValidSchedule(schedule: EventSchedule, now: Date): void {
    const result = validateEventSchedule(schedule, now);
    if (!result.ok) {
      throw new UnprocessableEntityException({
        status: HttpStatus.UNPROCESSABLE_ENTITY,
        errors: result.errors,
      });
    }
  }
}
