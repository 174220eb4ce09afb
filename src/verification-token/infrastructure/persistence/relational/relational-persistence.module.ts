import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { VerificationTokenRepository } from '../verification-token.repository';
import { VerificationTokenEntity } from './entities/verification-token.entity';
import { VerificationTokenRelationalRepository } from './repositories/verification-token.repository';

@Module({
  imports: [TypeOrmModule.forFeature([VerificationTokenEntity])],
  providers: [
    {
      provide: VerificationTokenRepository,
      useClass: VerificationTokenRelationalRepository,
    },
  ],
  exports: [VerificationTokenRepository],
})
export class RelationalVerificationTokenPersistenceModule {}
