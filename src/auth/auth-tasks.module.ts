import { Module } from '@nestjs/common';
import { MailModule } from '../mail/mail.module';
import { UserModule } from '../user/user.module';
import { VerificationTokenModule } from '../verification-token/verification-token.module';
import { SendPasswordResetEmailHandler } from './tasks/send-password-reset-email.handler';
import { SendVerificationEmailHandler } from './tasks/send-verification-email.handler';

/** Task handlers for the account emails; loaded by the worker only. */
@Module({
  imports: [UserModule, VerificationTokenModule, MailModule],
  providers: [SendVerificationEmailHandler, SendPasswordResetEmailHandler],
  exports: [SendVerificationEmailHandler, SendPasswordResetEmailHandler],
})
export class AuthTasksModule {}
