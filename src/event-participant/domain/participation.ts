export enum JoinOutcome {
  Joined = 'joined',
  AlreadyJoined = 'already-joined',
  CapacityExceeded = 'capacity-exceeded',
  EventNotFound = 'event-not-found',
}

export enum WithdrawOutcome {
  Withdrawn = 'withdrawn',
  NotAParticipant = 'not-a-participant',
}

export interface Participation {
  id: number;
  eventId: number;
  userId: number;
  createdAt: Date;
}

/** What a join sees once the event row is locked. */
export interface JoinState {
  alreadyJoined: boolean;
  participantsCount: number;
  capacity: number | null;
}

export type JoinDecision = Exclude<JoinOutcome, JoinOutcome.EventNotFound>;

export function decideJoin(state: JoinState): JoinDecision {
  if (state.alreadyJoined) {
    return JoinOutcome.AlreadyJoined;
  }
  if (state.capacity !== null && state.participantsCount >= state.capacity) {
    return JoinOutcome.CapacityExceeded;
  }
  return JoinOutcome.Joined;
}
