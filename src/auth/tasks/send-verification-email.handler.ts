import { Injectable, Logger } from '@nestjs/common';
import { MailService } from '../../mail/mail.service';
import { TaskKind, TaskPayloads } from '../../task/domain/task';
import { TaskHandler } from '../../task/task.types';
import { UserService } from '../../user/user.service';
import { TokenPurpose } from '../../verification-token/domain/verification-token';
import { VerificationTokenService } from '../../verification-token/verification-token.service';

@Injectable()
export class SendVerificationEmailHandler
  implements TaskHandler<TaskKind.SendVerificationEmail>
{
  private readonly logger = new Logger(SendVerificationEmailHandler.name);

  constructor(
    private readonly userService: UserService,
    private readonly verificationTokenService: VerificationTokenService,
    private readonly mailService: MailService,
  ) {}

  async handle({
    userId,
  }: TaskPayloads[TaskKind.SendVerificationEmail]): Promise<void> {
    const user = await this.userService.findById(userId);
    if (!user) {
      this.logger.warn(`User ${userId} is gone, not sending verification`);
      return;
    }
    // A redelivered task for an account verified in the meantime.
    if (user.isVerified) {
      this.logger.debug(`User ${userId} is already verified`);
      return;
    }

    const { token } = await this.verificationTokenService.issue(
      user.id,
      TokenPurpose.EmailVerification,
    );
    await this.mailService.userSignUp({ to: user.email, data: { token } });
    this.logger.log(`Sent verification email to user ${userId}`);
  }
}
