import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsEnum, IsOptional } from 'class-validator';
import { PaginationDto } from '../../utils/dto/pagination.dto';

export enum EventScope {
  Upcoming = 'upcoming',
  Mine = 'mine',
}

export class QueryEventsDto extends PaginationDto {
  @ApiPropertyOptional({ enum: EventScope, default: EventScope.Upcoming })
  @IsOptional()
  @IsEnum(EventScope)
  scope?: EventScope;
}
