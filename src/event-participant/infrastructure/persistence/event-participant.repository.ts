import { JoinOutcome, WithdrawOutcome } from '../../domain/participation';

export abstract class EventParticipantRepository {
  /**
   * Locks the event row, then checks membership and capacity and inserts,
   * all in one transaction.
   */
  abstract join(eventId: number, userId: number): Promise<JoinOutcome>;

  /** Deletes the participation and refreshes the event's count together. */
  abstract withdraw(eventId: number, userId: number): Promise<WithdrawOutcome>;

  abstract exists(eventId: number, userId: number): Promise<boolean>;

  abstract countByEventId(eventId: number): Promise<number>;

  /**
   * Rewrites every event's `participantsCount` from the participation rows,
   * `chunkSize` events at a time in id order. Returns the events visited.
   */
  abstract recountAll(chunkSize: number): Promise<number>;
}
