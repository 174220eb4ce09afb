import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Not, Repository } from 'typeorm';
import { NullableType } from '../utils/types/nullable.type';
import { SessionEntity } from './infrastructure/persistence/relational/entities/session.entity';

@Injectable()
export class SessionService {
  constructor(
    @InjectRepository(SessionEntity)
    private readonly sessionRepository: Repository<SessionEntity>,
  ) {}

  findById(id: number): Promise<NullableType<SessionEntity>> {
    return this.sessionRepository.findOne({ where: { id } });
  }

  create(data: { userId: number; hash: string }): Promise<SessionEntity> {
    return this.sessionRepository.save(this.sessionRepository.create(data));
  }

  async updateHash(id: number, hash: string): Promise<void> {
    await this.sessionRepository.update({ id }, { hash });
  }

  async deleteById(id: number): Promise<void> {
    await this.sessionRepository.softDelete({ id });
  }

  async deleteByUserId(userId: number): Promise<void> {
    await this.sessionRepository.softDelete({ userId });
  }

  /** Ends every other session of the user, keeping the one in use. */
  async deleteByUserIdExcept(userId: number, sessionId: number): Promise<void> {
    await this.sessionRepository.softDelete({ userId, id: Not(sessionId) });
  }
}
