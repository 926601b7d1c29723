import * as fs from 'node:fs';
import * as path from 'node:path';

import { PersistenceError, errorMessage, isErrnoException } from '../errors.js';
import { type KeyRecordJSON } from '../models/key-record.js';
import { type KeyFile } from './storage.js';

/** File name used when none is configured. */
export const DEFAULT_KEY_FILE = 'access_keys.json';

/**
 * Key file stored as a single pretty-printed JSON array.
 *
 * The directory is created on first write. Reads and writes are synchronous
 * so a mutating store call has hit the disk by the time it returns.
 */
export class JsonKeyFile implements KeyFile {
  readonly location: string;

  constructor(dir: string, fileName: string = DEFAULT_KEY_FILE) {
    this.location = path.join(dir, fileName);
  }

  read(): unknown[] {
    let content: string;
    try {
      content = fs.readFileSync(this.location, 'utf-8');
    } catch (e: unknown) {
      if (isErrnoException(e) && e.code === 'ENOENT') {
        throw new PersistenceError('missing', this.location, `No key file at ${this.location}`, {
          cause: e,
        });
      }
      throw new PersistenceError(
        'io',
        this.location,
        `Failed to read key file ${this.location}: ${errorMessage(e)}`,
        { cause: e },
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
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
    try {
      fs.mkdirSync(path.dirname(this.location), { recursive: true });
      fs.writeFileSync(this.location, JSON.stringify(records, null, 2) + '\n', 'utf-8');
    } catch (e: unknown) {
      throw new PersistenceError(
        'io',
        this.location,
        `Failed to write key file ${this.location}: ${errorMessage(e)}`,
        { cause: e },
      );
    }
  }
}
