import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { TaskStatus } from '../../../../domain/task';

@Entity({
  name: 'tasks',
})
@Index(['status', 'runAt'])
export class TaskEntity extends EntityRelationalHelper {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: String, length: 64 })
  kind!: string;

  @Column({ type: 'jsonb', default: {} })
  payload!: unknown;

  @Column({ type: 'enum', enum: TaskStatus, default: TaskStatus.Pending })
  status!: TaskStatus;

  @Column({ type: Number, default: 0 })
  attempts!: number;

  @Column({ type: Number })
  maxAttempts!: number;

  @Column({ type: 'timestamptz' })
  runAt!: Date;

  @Column({ type: 'timestamptz', nullable: true })
  lockedAt!: Date | null;

  @Column({ type: 'text', nullable: true })
  lastError!: string | null;

  @Column({ type: String, length: 255, nullable: true, unique: true })
  uniqueKey!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
