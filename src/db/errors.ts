import { StoreConstraintViolation } from '../errors';

const UNIQUE_VIOLATION = '23505';

/**
 * Maps a pg unique violation to StoreConstraintViolation; returns other errors unchanged
 */
export function translateUniqueViolation(error: unknown, fallbackConstraint: string): unknown {
  if (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  ) {
    const constraint =
      'constraint' in error && typeof error.constraint === 'string' ? error.constraint : fallbackConstraint;
    return new StoreConstraintViolation(`Unique constraint ${constraint} violated`, constraint, { cause: error });
  }
  return error;
}
