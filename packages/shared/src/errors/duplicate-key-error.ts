/**
 * Driver error codes reported for unique-constraint violations
 */
const DUPLICATE_KEY_CODES = new Set([
  '23505',
  'ER_DUP_ENTRY',
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT_PRIMARYKEY',
]);

/**
 * DuplicateKeyError
 *
 * Raised by result stores when a record with the same key already exists.
 */
export class DuplicateKeyError extends Error {
  readonly key: string;

  constructor(key: string, options?: ErrorOptions) {
    super(`Record already exists for key "${key}"`, options);
    this.name = 'DuplicateKeyError';
    this.key = key;
  }
}

/**
 * Whether an unknown error is a unique-constraint violation,
 * either a DuplicateKeyError or a driver error carrying a known code
 */
export function isDuplicateKeyError(error: unknown): boolean {
  if (error instanceof DuplicateKeyError) {
    return true;
  }
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  const { code } = error;
  return typeof code === 'string' && DUPLICATE_KEY_CODES.has(code);
}
