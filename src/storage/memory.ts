import { PersistenceError, errorMessage } from '../errors.js';
import { type KeyRecordJSON } from '../models/key-record.js';
import { type KeyFile } from './storage.js';

/**
 * In-memory key file.
 *
 * Holds the last written record list as a JSON string, so reads hand back
 * fresh objects just like a file would. Starts out missing unless seeded.
 */
export class MemoryKeyFile implements KeyFile {
  readonly location: string;
  private content: string | null;
  private failNextWrites = 0;
  private writeCount = 0;

  constructor(seed?: unknown[], location = 'memory://keys') {
    this.location = location;
    this.content = seed === undefined ? null : JSON.stringify(seed);
  }

  /** A key file holding arbitrary text, e.g. a corrupt one. */
  static withContent(text: string, location?: string): MemoryKeyFile {
    const file = new MemoryKeyFile(undefined, location);
    file.content = text;
    return file;
  }

  /** Make the next `count` writes throw an `io` PersistenceError. */
  failWrites(count = 1): void {
    this.failNextWrites = count;
  }

  /** Number of successful writes so far. */
  writes(): number {
    return this.writeCount;
  }

  /** The stored records, parsed, or `null` when nothing has been written. */
  snapshot(): unknown[] | null {
    return this.content === null ? null : this.read();
  }

  read(): unknown[] {
    if (this.content === null) {
      throw new PersistenceError('missing', this.location, `No key file at ${this.location}`);
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(this.content);
    } catch (e: unknown) {
      throw new PersistenceError(
        'malformed',
        this.location,
        `Key file ${this.location} is not valid JSON: ${errorMessage(e)}`,
        { cause: e },
      );
    }
    if (!Array.isArray(parsed)) {
      throw new PersistenceError(
        'malformed',
        this.location,
        `Key file ${this.location} must contain a JSON array of records`,
      );
    }
    return parsed;
  }

  write(records: KeyRecordJSON[]): void {
    if (this.failNextWrites > 0) {
      this.failNextWrites--;
      throw new PersistenceError('io', this.location, `Failed to write key file ${this.location}`);
    }
    this.content = JSON.stringify(records);
    this.writeCount++;
  }
}
