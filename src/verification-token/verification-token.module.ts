import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import ms from 'ms';
import { AllConfigType } from '../config/config.type';
import { TokenPurpose } from './domain/verification-token';
import { RelationalVerificationTokenPersistenceModule } from './infrastructure/persistence/relational/relational-persistence.module';
import { VerificationTokenService } from './verification-token.service';
import {
  VERIFICATION_TOKEN_OPTIONS,
  VerificationTokenOptions,
} from './verification-token.types';

@Module({
  imports: [RelationalVerificationTokenPersistenceModule],
  providers: [
    {
      provide: VERIFICATION_TOKEN_OPTIONS,
      inject: [ConfigService],
      useFactory: (
        configService: ConfigService<AllConfigType>,
      ): VerificationTokenOptions => {
        const auth = configService.getOrThrow('auth', { infer: true });
        return {
          ttlMs: {
            [TokenPurpose.EmailVerification]: ms(auth.emailVerificationExpires),
            [TokenPurpose.PasswordReset]: ms(auth.passwordResetExpires),
          },
          retentionMs: ms(auth.tokenRetention),
        };
      },
    },
    VerificationTokenService,
  ],
  exports: [VerificationTokenService],
})
export class VerificationTokenModule {}
