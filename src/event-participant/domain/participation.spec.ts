import { decideJoin, JoinOutcome } from './participation';

describe('decideJoin', () => {
  it('should admit while seats remain', () => {
    expect(
      decideJoin({ alreadyJoined: false, participantsCount: 1, capacity: 2 }),
    ).toBe(JoinOutcome.Joined);
  });

  it('should refuse once the event is full', () => {
    expect(
      decideJoin({ alreadyJoined: false, participantsCount: 2, capacity: 2 }),
    ).toBe(JoinOutcome.CapacityExceeded);
  });

  it('should admit any number without a capacity', () => {
    expect(
      decideJoin({
        alreadyJoined: false,
        participantsCount: 10_000,
        capacity: null,
      }),
    ).toBe(JoinOutcome.Joined);
  });

  it('should report a repeat join before checking capacity', () => {
    expect(
      decideJoin({ alreadyJoined: true, participantsCount: 2, capacity: 2 }),
    ).toBe(JoinOutcome.AlreadyJoined);
  });
});
