export interface EventSchedule {
  startDate: Date;
  endDate: Date | null;
}

export type ScheduleErrors = Partial<Record<keyof EventSchedule, string>>;

export type ScheduleValidation =
  | { ok: true }
  | { ok: false; errors: ScheduleErrors };

/** Checked on create and on every update, against the merged schedule. */
export function validateEventSchedule(
  schedule: EventSchedule,
  now: Date,
): ScheduleValidation {
  const errors: ScheduleErrors = {};

  if (schedule.startDate.getTime() <= now.getTime()) {
    errors.startDate = 'mustBeInFuture';
  }
  if (
    schedule.endDate !== null &&
    schedule.endDate.getTime() <= schedule.startDate.getTime()
  ) {
    errors.endDate = 'mustBeAfterStartDate';
  }

  return Object.keys(errors).length === 0
    ? { ok: true }
    : { ok: false, errors };
}

/** An event that has started can no longer be edited or deleted. */
export function hasStarted(schedule: EventSchedule, now: Date): boolean {
  return schedule.startDate.getTime() <= now.getTime();
}
