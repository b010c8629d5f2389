const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';

interface PgErrorFields {
  code?: unknown;
  constraint?: unknown;
}

/** Drivers surface the Postgres error directly or as the `cause` of a wrapping query error. */
function pgError(err: unknown): (Error & PgErrorFields) | null {
  if (!(err instanceof Error)) return null;
  if ('code' in err) return err;
  return err.cause instanceof Error && 'code' in err.cause ? err.cause : null;
}

export function isPgUniqueViolation(err: unknown): boolean {
  return pgError(err)?.code === UNIQUE_VIOLATION;
}

export function isPgForeignKeyViolation(err: unknown): boolean {
  return pgError(err)?.code === FOREIGN_KEY_VIOLATION;
}

/** Name of the constraint or index the statement violated, when the driver reports it. */
export function pgConstraintName(err: unknown): string | undefined {
  const constraint = pgError(err)?.constraint;
  return typeof constraint === 'string' ? constraint : undefined;
}
