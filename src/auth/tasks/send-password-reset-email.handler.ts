import { Injectable, Logger } from '@nestjs/common';
import { MailService } from '../../mail/mail.service';
import { TaskKind, TaskPayloads } from '../../task/domain/task';
import { TaskHandler } from '../../task/task.types';
import { UserService } from '../../user/user.service';
import { TokenPurpose } from '../../verification-token/domain/verification-token';
import { VerificationTokenService } from '../../verification-token/verification-token.service';

@Injectable()
export class SendPasswordResetEmailHandler
  implements TaskHandler<TaskKind.SendPasswordResetEmail>
{
  private readonly logger = new Logger(SendPasswordResetEmailHandler.name);

  constructor(
    private readonly userService: UserService,
    private readonly verificationTokenService: VerificationTokenService,
    private readonly mailService: MailService,
  ) {}

  async handle({
    userId,
  }: TaskPayloads[TaskKind.SendPasswordResetEmail]): Promise<void> {
    const user = await this.userService.findById(userId);
    if (!user) {
      this.logger.warn(`User ${userId} is gone, not sending password reset`);
      return;
    }

    const { token, expiresAt } = await this.verificationTokenService.issue(
      user.id,
      TokenPurpose.PasswordReset,
    );
    await this.mailService.forgotPassword({
      to: user.email,
      data: { token, expiresAt },
    });
    this.logger.log(`Sent password reset email to user ${userId}`);
  }
}
