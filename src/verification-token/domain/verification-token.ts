import { createHash } from 'crypto';

export enum TokenPurpose {
  EmailVerification = 'email-verification',
  PasswordReset = 'password-reset',
}

export enum TokenStatus {
  Valid = 'valid',
  Expired = 'expired',
  Consumed = 'consumed',
  Superseded = 'superseded',
  NotFound = 'not-found',
}

export interface VerificationToken {
  id: number;
  userId: number;
  purpose: TokenPurpose;
  tokenHash: string;
  createdAt: Date;
  expiresAt: Date;
  consumedAt: Date | null;
  /** Set when a newer token or an email change replaced this one unused. */
  revokedAt: Date | null;
}

export type NewVerificationToken = Pick<
  VerificationToken,
  'userId' | 'purpose' | 'tokenHash' | 'expiresAt'
>;

/** The account change a valid token authorizes, applied in the same transaction that consumes it. */
export type AccountTransition =
  | { type: 'verify-email' }
  | { type: 'reset-password'; passwordHash: string };

/** Expired results name the owner so a fresh token can be sent. */
export type TokenValidation =
  | { status: TokenStatus.Valid; userId: number }
  | { status: TokenStatus.Expired; userId: number }
  | {
      status:
        | TokenStatus.Consumed
        | TokenStatus.Superseded
        | TokenStatus.NotFound;
    };

export interface IssuedToken {
  token: string;
  expiresAt: Date;
}

export function hashToken(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}

/**
 * Expiry wins over consumption: a token past its expiry is Expired whether
 * or not it was used. A token of another purpose is indistinguishable from
 * an unknown one.
 */
export function classifyToken(
  token: VerificationToken,
  purpose: TokenPurpose,
  now: Date,
): TokenStatus {
  if (token.purpose !== purpose) {
    return TokenStatus.NotFound;
  }
  if (token.expiresAt.getTime() <= now.getTime()) {
    return TokenStatus.Expired;
  }
  if (token.consumedAt) {
    return TokenStatus.Consumed;
  }
  if (token.revokedAt) {
    return TokenStatus.Superseded;
  }
  return TokenStatus.Valid;
}
