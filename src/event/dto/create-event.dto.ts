import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsDate,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';
import {
  EVENT_DESCRIPTION_MAX_LENGTH,
  EVENT_TITLE_MAX_LENGTH,
} from '../infrastructure/persistence/relational/entities/event.entity';

export class CreateEventDto {
  @ApiProperty({
    example: 'Board game night',
    maxLength: EVENT_TITLE_MAX_LENGTH,
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(EVENT_TITLE_MAX_LENGTH)
  title!: string;

  @ApiPropertyOptional({ maxLength: EVENT_DESCRIPTION_MAX_LENGTH })
  @IsOptional()
  @IsString()
  @MaxLength(EVENT_DESCRIPTION_MAX_LENGTH)
  description?: string;

  @ApiProperty({ type: Date, example: '2026-11-20T18:00:00.000Z' })
  @Type(() => Date)
  @IsDate()
  startDate!: Date;

  @ApiPropertyOptional({ type: Date, nullable: true })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  endDate?: Date | null;

  @ApiPropertyOptional({
    type: Number,
    nullable: true,
    minimum: 1,
    description: 'Omit for the configured default; null for unlimited',
  })
  @IsOptional()
  @IsInt()
  @Min(1)
  capacity?: number | null;
}
