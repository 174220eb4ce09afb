import {
  Body,
  ConflictException,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  Patch,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiCreatedResponse,
  ApiNoContentResponse,
  ApiOkResponse,
  ApiTags,
} from '@nestjs/swagger';
import { JWTAuthGuard } from '../auth/auth.guard';
import { AuthUser } from '../auth/decorators/auth-user.decorator';
import { Public } from '../auth/decorators/public.decorator';
import { JwtPayloadType } from '../auth/strategies/types/jwt-payload.type';
import {
  JoinOutcome,
  WithdrawOutcome,
} from '../event-participant/domain/participation';
import { PaginationResult } from '../utils/generic-pagination';
import { CreateEventDto } from './dto/create-event.dto';
import { QueryEventsDto } from './dto/query-events.dto';
import { UpdateEventDto } from './dto/update-event.dto';
import { EventService } from './event.service';
import { EventEntity } from './infrastructure/persistence/relational/entities/event.entity';

export type ParticipationResponse = { status: JoinOutcome | WithdrawOutcome };

@ApiTags('Events')
@Controller({
  path: 'events',
  version: '1',
})
@ApiBearerAuth()
@UseGuards(JWTAuthGuard)
export class EventController {
  constructor(private readonly eventService: EventService) {}

  @Public()
  @Get()
  @HttpCode(HttpStatus.OK)
  findAll(
    @Query() query: QueryEventsDto,
    @AuthUser() user: JwtPayloadType | undefined,
  ): Promise<PaginationResult<EventEntity>> {
    return this.eventService.findAll(query, user?.id ?? null);
  }

  @Public()
  @Get(':slug')
  @ApiOkResponse({ type: EventEntity })
  @HttpCode(HttpStatus.OK)
  findOne(
    @Param('slug') slug: string,
    @AuthUser() user: JwtPayloadType | undefined,
  ): Promise<EventEntity> {
    return this.eventService.findBySlug(slug, user?.id ?? null);
  }

  @Post()
  @ApiCreatedResponse({ type: EventEntity })
  @HttpCode(HttpStatus.CREATED)
  create(
    @AuthUser() user: JwtPayloadType,
    @Body() createEventDto: CreateEventDto,
  ): Promise<EventEntity> {
    return this.eventService.create(user.id, createEventDto);
  }

  @Patch(':slug')
  @ApiOkResponse({ type: EventEntity })
  @HttpCode(HttpStatus.OK)
  update(
    @AuthUser() user: JwtPayloadType,
    @Param('slug') slug: string,
    @Body() updateEventDto: UpdateEventDto,
  ): Promise<EventEntity> {
    return this.eventService.update(slug, user.id, updateEventDto);
  }

  @Delete(':slug')
  @ApiNoContentResponse()
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(
    @AuthUser() user: JwtPayloadType,
    @Param('slug') slug: string,
  ): Promise<void> {
    return this.eventService.remove(slug, user.id);
  }

  @Post(':slug/join')
  @HttpCode(HttpStatus.OK)
  async join(
    @AuthUser() user: JwtPayloadType,
    @Param('slug') slug: string,
  ): Promise<ParticipationResponse> {
    const outcome = await this.eventService.join(slug, user.id);
    switch (outcome) {
      case JoinOutcome.Joined:
        return { status: outcome };
      case JoinOutcome.AlreadyJoined:
        throw new ConflictException({
          status: HttpStatus.CONFLICT,
          errors: { participation: 'alreadyJoined' },
        });
      case JoinOutcome.CapacityExceeded:
        throw new ConflictException({
          status: HttpStatus.CONFLICT,
          errors: { participation: 'capacityExceeded' },
        });
      case JoinOutcome.EventNotFound:
        throw new NotFoundException(`Event with slug ${slug} not found`);
    }
  }

  @Post(':slug/withdraw')
  @HttpCode(HttpStatus.OK)
  async withdraw(
    @AuthUser() user: JwtPayloadType,
    @Param('slug') slug: string,
  ): Promise<ParticipationResponse> {
    const outcome = await this.eventService.withdraw(slug, user.id);
    if (outcome === WithdrawOutcome.NotAParticipant) {
      throw new ConflictException({
        status: HttpStatus.CONFLICT,
        errors: { participation: 'notAParticipant' },
      });
    }
    return { status: outcome };
  }
}
