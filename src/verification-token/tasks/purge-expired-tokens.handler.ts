import { Injectable } from '@nestjs/common';
import { TaskKind } from '../../task/domain/task';
import { TaskHandler } from '../../task/task.types';
import { VerificationTokenService } from '../verification-token.service';

@Injectable()
export class PurgeExpiredTokensHandler
  implements TaskHandler<TaskKind.PurgeExpiredTokens>
{
  constructor(
    private readonly verificationTokenService: VerificationTokenService,
  ) {}

  async handle(): Promise<void> {
    await this.verificationTokenService.purgeExpired();
  }
}
