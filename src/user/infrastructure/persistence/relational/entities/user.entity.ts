import {
  BeforeInsert,
  Column,
  CreateDateColumn,
  DeleteDateColumn,
  Entity,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { Exclude } from 'class-transformer';
import { ApiProperty } from '@nestjs/swagger';
import { ulid } from 'ulid';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';

@Entity({
  name: 'users',
})
export class UserEntity extends EntityRelationalHelper {
  @ApiProperty({ type: Number })
  @PrimaryGeneratedColumn()
  id!: number;

  @ApiProperty({ type: String })
  @Column({ type: 'char', length: 26, unique: true })
  ulid!: string;

  @ApiProperty({ type: String, example: 'jane@example.com' })
  @Column({ type: String, unique: true })
  email!: string;

  @Exclude({ toPlainOnly: true })
  @Column({ type: String })
  password!: string;

  @ApiProperty({ type: Boolean })
  @Column({ type: Boolean, default: false })
  isVerified!: boolean;

  @ApiProperty()
  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @ApiProperty()
  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;

  @Exclude({ toPlainOnly: true })
  @DeleteDateColumn({ type: 'timestamptz' })
  deletedAt?: Date | null;

  @BeforeInsert()
  generateUlid() {
    if (!this.ulid) {
      this.ulid = ulid().toLowerCase();
    }
  }
}
