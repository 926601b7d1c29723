/**
 * Error thrown when a record or patch is missing a required field.
 * Raised before any state changes.
 */
export class ValidationError extends Error {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * Why a read or write of the key file failed.
 *
 * - `missing`: the key file does not exist yet
 * - `malformed`: the file exists but is not a valid record list
 * - `io`: the file could not be read or written
 * - `unsaved`: a load was attempted over unflushed in-memory changes
 * - `not-loaded`: a write was refused because the file failed to load
 */
export type PersistenceErrorKind = 'missing' | 'malformed' | 'io' | 'unsaved' | 'not-loaded';

/**
 * Error thrown when the key file cannot be loaded or flushed.
 */
export class PersistenceError extends Error {
  public readonly kind: PersistenceErrorKind;
  public readonly path: string;

  constructor(kind: PersistenceErrorKind, path: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PersistenceError';
    this.kind = kind;
    this.path = path;
  }
}

/** Narrow an unknown thrown value to a Node.js system error. */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

/** Human-readable message for any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
