import { QueryFailedError } from 'typeorm';

const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  if (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError
  ) {
    return driverError.code === UNIQUE_VIOLATION;
  }
  return error.message.includes('duplicate key');
}
