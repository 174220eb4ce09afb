import { EntityManager } from 'typeorm';
import {
  AccountTransition,
  NewVerificationToken,
  TokenPurpose,
  TokenValidation,
  VerificationToken,
} from '../../domain/verification-token';

export abstract class VerificationTokenRepository {
  /** Stores a new token, superseding the owner's live tokens of the same purpose. */
  abstract issue(
    data: NewVerificationToken,
    now: Date,
  ): Promise<VerificationToken>;

  /**
   * Marks the owner's unused, unexpired tokens of `purpose` superseded. Pass
   * `manager` to join a transaction the caller already holds.
   */
  abstract revokeLive(
    userId: number,
    purpose: TokenPurpose,
    now: Date,
    manager?: EntityManager,
  ): Promise<number>;

  /**
   * Looks the token up under a row lock and, when valid, marks it consumed
   * and applies `transition` in the same transaction.
   */
  abstract consume(
    tokenHash: string,
    purpose: TokenPurpose,
    transition: AccountTransition,
    now: Date,
  ): Promise<TokenValidation>;

  abstract deleteExpiredBefore(cutoff: Date): Promise<number>;
}
