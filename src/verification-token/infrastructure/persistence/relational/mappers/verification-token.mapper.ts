import { VerificationToken } from '../../../../domain/verification-token';
import { VerificationTokenEntity } from '../entities/verification-token.entity';

export class VerificationTokenMapper {
  static toDomain(raw: VerificationTokenEntity): VerificationToken {
    return {
      id: raw.id,
      userId: raw.userId,
      purpose: raw.purpose,
      tokenHash: raw.tokenHash,
      createdAt: raw.createdAt,
      expiresAt: raw.expiresAt,
      consumedAt: raw.consumedAt,
      revokedAt: raw.revokedAt,
    };
  }
}
