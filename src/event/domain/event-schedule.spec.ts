import { hasStarted, validateEventSchedule } from './event-schedule';

describe('validateEventSchedule', () => {
  const now = new Date('2026-06-01T10:00:00.000Z');

  it('should accept a future start without an end', () => {
    expect(
      validateEventSchedule(
        { startDate: new Date('2026-06-02T10:00:00.000Z'), endDate: null },
        now,
      ),
    ).toEqual({ ok: true });
  });

  it('should reject a start that is not in the future', () => {
    expect(
      validateEventSchedule({ startDate: now, endDate: null }, now),
    ).toEqual({ ok: false, errors: { startDate: 'mustBeInFuture' } });
  });

  it('should reject an end that does not follow the start', () => {
    const startDate = new Date('2026-06-02T10:00:00.000Z');

    expect(
      validateEventSchedule({ startDate, endDate: startDate }, now),
    ).toEqual({ ok: false, errors: { endDate: 'mustBeAfterStartDate' } });
  });

  it('should report both fields at once', () => {
    expect(
      validateEventSchedule(
        {
          startDate: new Date('2026-05-01T10:00:00.000Z'),
          endDate: new Date('2026-04-01T10:00:00.000Z'),
        },
        now,
      ),
    ).toEqual({
      ok: false,
      errors: { startDate: 'mustBeInFuture', endDate: 'mustBeAfterStartDate' },
    });
  });
});

describe('hasStarted', () => {
  const now = new Date('2026-06-01T10:00:00.000Z');

  it('should treat the start instant as started', () => {
    expect(hasStarted({ startDate: now, endDate: null }, now)).toBe(true);
    expect(
      hasStarted(
        { startDate: new Date('2026-06-01T10:00:01.000Z'), endDate: null },
        now,
      ),
    ).toBe(false);
  });
});
