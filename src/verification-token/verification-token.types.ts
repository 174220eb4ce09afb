import { TokenPurpose } from './domain/verification-token';

export const VERIFICATION_TOKEN_OPTIONS = Symbol('VERIFICATION_TOKEN_OPTIONS');

export interface VerificationTokenOptions {
  ttlMs: Record<TokenPurpose, number>;
  /** How long expired tokens are kept (still answering Expired) before purge. */
  retentionMs: number;
}
