/** Postgres unique_violation. */
const UNIQUE_VIOLATION = '23505';

/**
 * The constraint behind a unique violation, '' when the driver did not name
 * it, or null for any other error.
 */
export function uniqueViolationConstraint(error: unknown): string | null {
  if (error && typeof error === 'object' && 'code' in error && error.code === UNIQUE_VIOLATION) {
    return 'constraint' in error && typeof error.constraint === 'string' ? error.constraint : '';
  }
  return null;
}
