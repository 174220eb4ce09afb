import {
  BeforeInsert,
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import slugify from 'slugify';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { UserEntity } from '../../../../../user/infrastructure/persistence/relational/entities/user.entity';
import { generateShortCode } from '../../../../../utils/short-code';

export const EVENT_TITLE_MAX_LENGTH = 256;
export const EVENT_DESCRIPTION_MAX_LENGTH = 8192;

@Entity({ name: 'events' })
@Index(['startDate', 'id'])
export class EventEntity extends EntityRelationalHelper {
  @ApiProperty({ type: Number })
  @PrimaryGeneratedColumn()
  id!: number;

  @ApiProperty({ type: String, example: 'board-game-night-k3x9a' })
  @Column({ type: 'varchar', length: 300, unique: true })
  slug!: string;

  @ApiProperty({ type: String, example: 'Board game night' })
  @Column({ type: 'varchar', length: EVENT_TITLE_MAX_LENGTH })
  title!: string;

  @ApiProperty({ type: String })
  @Column({ type: 'text', default: '' })
  description!: string;

  @ApiProperty()
  @Column({ type: 'timestamptz' })
  startDate!: Date;

  @ApiPropertyOptional({ type: Date, nullable: true })
  @Column({ type: 'timestamptz', nullable: true })
  endDate!: Date | null;

  @ApiPropertyOptional({
    type: Number,
    nullable: true,
    description: 'Maximum number of participants; null means unlimited',
  })
  @Column({ type: Number, nullable: true })
  capacity!: number | null;

  @ApiProperty({ type: Number })
  @Column({ type: Number, default: 0 })
  participantsCount!: number;

  @ApiProperty({ type: Number })
  @Index()
  @Column({ type: Number })
  ownerId!: number;

  @ManyToOne(() => UserEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'ownerId' })
  owner?: UserEntity;

  @ApiProperty()
  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @ApiProperty()
  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;

  /** Whether the requesting user has joined; set on the detail view only. */
  @ApiPropertyOptional({ type: Boolean })
  joined?: boolean;

  @BeforeInsert()
  generateSlug() {
    if (!this.slug) {
      this.slug = slugify(`${this.title}-${generateShortCode()}`, {
        strict: true,
        lower: true,
      });
    }
  }
}
