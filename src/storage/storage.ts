import { type KeyRecordJSON } from '../models/key-record.js';

// ---------------------------------------------------------------------------
// KeyFile
// ---------------------------------------------------------------------------

/**
 * Synchronous backing file for a record store.
 *
 * Implementations read and write the whole record list at once; there are no
 * incremental writes. Failures are reported as `PersistenceError`, with kind
 * `missing` when nothing has been stored yet.
 */
export interface KeyFile {
  /** Where the records live, for messages and status output. */
  readonly location: string;

  /** Read the raw record list. Entries are validated by the caller. */
  read(): unknown[];

  /** Replace the stored record list. */
  write(records: KeyRecordJSON[]): void;
}
