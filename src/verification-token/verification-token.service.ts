import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomBytes } from 'crypto';
import { EntityManager } from 'typeorm';
import {
  AccountTransition,
  hashToken,
  IssuedToken,
  TokenPurpose,
  TokenStatus,
  TokenValidation,
} from './domain/verification-token';
import { VerificationTokenRepository } from './infrastructure/persistence/verification-token.repository';
import {
  VERIFICATION_TOKEN_OPTIONS,
  VerificationTokenOptions,
} from './verification-token.types';

const TOKEN_BYTES = 32;

@Injectable()
export class VerificationTokenService {
  private readonly logger = new Logger(VerificationTokenService.name);

  constructor(
    @Inject(VERIFICATION_TOKEN_OPTIONS)
    private readonly options: VerificationTokenOptions,
    private readonly tokenRepository: VerificationTokenRepository,
  ) {}

  /**
   * Creates a single-use token for `purpose`. Only the hash is stored; the
   * returned value is the one to deliver to the user.
   */
  async issue(
    userId: number,
    purpose: TokenPurpose,
    ttlMs: number = this.options.ttlMs[purpose],
    now: Date = new Date(),
  ): Promise<IssuedToken> {
    const token = randomBytes(TOKEN_BYTES).toString('hex');
    const expiresAt = new Date(now.getTime() + ttlMs);

    await this.tokenRepository.issue(
      { userId, purpose, tokenHash: hashToken(token), expiresAt },
      now,
    );
    this.logger.debug(`Issued ${purpose} token for user ${userId}`);

    return { token, expiresAt };
  }

  /**
   * Retires the user's outstanding tokens of `purpose`, e.g. verification
   * links mailed to an address the account no longer uses.
   */
  async revokeLive(
    userId: number,
    purpose: TokenPurpose,
    now: Date = new Date(),
    manager?: EntityManager,
  ): Promise<number> {
    const revoked = await this.tokenRepository.revokeLive(
      userId,
      purpose,
      now,
      manager,
    );
    this.logger.debug(`Revoked ${revoked} ${purpose} tokens for user ${userId}`);
    return revoked;
  }

  validate(
    token: string,
    purpose: TokenPurpose,
    transition: AccountTransition,
    now: Date = new Date(),
  ): Promise<TokenValidation> {
    if (!token) {
      return Promise.resolve({ status: TokenStatus.NotFound });
    }
    return this.tokenRepository.consume(
      hashToken(token),
      purpose,
      transition,
      now,
    );
  }

  async purgeExpired(now: Date = new Date()): Promise<number> {
    const cutoff = new Date(now.getTime() - this.options.retentionMs);
    const deleted = await this.tokenRepository.deleteExpiredBefore(cutoff);
    this.logger.log(
      `Purged ${deleted} tokens expired before ${cutoff.toISOString()}`,
    );
    return deleted;
  }
}
