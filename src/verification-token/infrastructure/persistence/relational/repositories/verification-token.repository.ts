import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  DataSource,
  EntityManager,
  IsNull,
  LessThan,
  MoreThan,
  Repository,
} from 'typeorm';
import {
  AccountTransition,
  classifyToken,
  NewVerificationToken,
  TokenPurpose,
  TokenStatus,
  TokenValidation,
  VerificationToken,
} from '../../../../domain/verification-token';
import { VerificationTokenRepository } from '../../verification-token.repository';
import { VerificationTokenEntity } from '../entities/verification-token.entity';
import { VerificationTokenMapper } from '../mappers/verification-token.mapper';
import { UserEntity } from '../../../../../user/infrastructure/persistence/relational/entities/user.entity';
import { SessionEntity } from '../../../../../session/infrastructure/persistence/relational/entities/session.entity';
import { TransactionHelper } from '../../../../../utils/transaction-helper';

async function applyTransition(
  manager: EntityManager,
  userId: number,
  transition: AccountTransition,
): Promise<void> {
  switch (transition.type) {
    case 'verify-email':
      await manager.update(UserEntity, { id: userId }, { isVerified: true });
      return;
    case 'reset-password':
      await manager.update(
        UserEntity,
        { id: userId },
        { password: transition.passwordHash },
      );
      await manager.softDelete(SessionEntity, { userId });
      return;
  }
}

@Injectable()
export class VerificationTokenRelationalRepository
  implements VerificationTokenRepository
{
  constructor(
    private readonly dataSource: DataSource,
    @InjectRepository(VerificationTokenEntity)
    private readonly tokensRepository: Repository<VerificationTokenEntity>,
  ) {}

  issue(data: NewVerificationToken, now: Date): Promise<VerificationToken> {
    return TransactionHelper.runInTransaction(
      this.dataSource,
      async (manager) => {
        await this.revokeLive(data.userId, data.purpose, now, manager);
        const saved = await manager.save(
          manager.create(VerificationTokenEntity, {
            ...data,
            createdAt: now,
            consumedAt: null,
            revokedAt: null,
          }),
        );
        return VerificationTokenMapper.toDomain(saved);
      },
    );
  }

  async revokeLive(
    userId: number,
    purpose: TokenPurpose,
    now: Date,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<number> {
    const result = await manager.update(
      VerificationTokenEntity,
      {
        userId,
        purpose,
        consumedAt: IsNull(),
        revokedAt: IsNull(),
        expiresAt: MoreThan(now),
      },
      { revokedAt: now },
    );
    return result.affected ?? 0;
  }

  consume(
    tokenHash: string,
    purpose: TokenPurpose,
    transition: AccountTransition,
    now: Date,
  ): Promise<TokenValidation> {
    return TransactionHelper.runInTransaction(
      this.dataSource,
      async (manager): Promise<TokenValidation> => {
        const token = await manager
          .getRepository(VerificationTokenEntity)
          .createQueryBuilder('token')
          .setLock('pessimistic_write')
          .where('token.tokenHash = :tokenHash', { tokenHash })
          .getOne();

        if (!token) {
          return { status: TokenStatus.NotFound };
        }
        const status = classifyToken(token, purpose, now);
        if (status === TokenStatus.Expired) {
          return { status, userId: token.userId };
        }
        if (status !== TokenStatus.Valid) {
          return { status };
        }

        await manager.update(
          VerificationTokenEntity,
          { id: token.id },
          { consumedAt: now },
        );
        await applyTransition(manager, token.userId, transition);
        return { status: TokenStatus.Valid, userId: token.userId };
      },
    );
  }

  async deleteExpiredBefore(cutoff: Date): Promise<number> {
    const result = await this.tokensRepository.delete({
      expiresAt: LessThan(cutoff),
    });
    return result.affected ?? 0;
  }
}
