import { type Clock, SystemClock } from '../clock.js';
import { PersistenceError, ValidationError } from '../errors.js';
import { normalizeDomain } from '../models/domain.js';
import {
  KeyRecord,
  KeyRecordShapeError,
  OPTIONAL_FIELDS,
  isExtraFieldName,
  type KeyListing,
  type KeyRecordPatch,
  type KeyRecordType,
} from '../models/key-record.js';
import { type KeyFile } from '../storage/storage.js';
import { KeyIndex } from './key-index.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Load state of a store.
 *
 * - `closed`: constructed, nothing loaded yet
 * - `open`: the key file was loaded (or has since been written)
 * - `missing`: there is no key file yet; the store starts empty
 * - `failed`: the key file could not be loaded; writes are refused
 */
export type StoreStatus =
  | { state: 'closed' }
  | { state: 'open' }
  | { state: 'missing' }
  | { state: 'failed'; error: PersistenceError };

export interface RecordStoreOptions {
  clock?: Clock;
  /** Index to populate. Defaults to a fresh one. */
  index?: KeyIndex;
}

// ---------------------------------------------------------------------------
// Validation helpers
// ---------------------------------------------------------------------------

function requireIdentity(account: string, domain: string, key: string): void {
  if (!account) {
    throw new ValidationError('account', "The 'account' field was empty. Must have an account.");
  }
  if (!domain) {
    throw new ValidationError('domain', "The 'domain' field was empty. Must have a domain name.");
  }
  if (!key) {
    throw new ValidationError('key', "The 'key' field was empty. Must have a key.");
  }
}

// ---------------------------------------------------------------------------
// RecordStore
// ---------------------------------------------------------------------------

/**
 * API key records held in memory under two indices and mirrored to a single
 * key file.
 *
 * Every mutating call flushes the full record list before it returns, so the
 * store is never left dirty by a call that succeeds. A failed flush leaves
 * the change in memory and the store dirty; calling {@link flush} retries.
 */
export class RecordStore {
  private readonly file: KeyFile;
  private readonly clock: Clock;
  private readonly index: KeyIndex;
  private dirty = false;
  private _status: StoreStatus = { state: 'closed' };

  constructor(file: KeyFile, options: RecordStoreOptions = {}) {
    this.file = file;
    this.clock = options.clock ?? new SystemClock();
    this.index = options.index ?? new KeyIndex();
  }

  /**
   * Create a store and load it from `file`.
   *
   * Never throws for load failures: a missing file yields an empty store with
   * status `missing`, any other failure an empty store with status `failed`.
   */
  static open(file: KeyFile, options: RecordStoreOptions = {}): RecordStore {
    const store = new RecordStore(file, options);
    try {
      store.load();
    } catch (e: unknown) {
      if (!(e instanceof PersistenceError)) throw e;
    }
    return store;
  }

  get status(): StoreStatus {
    return this._status;
  }

  get location(): string {
    return this.file.location;
  }

  /** Whether in-memory changes have not reached the key file. */
  isDirty(): boolean {
    return this.dirty;
  }

  size(): number {
    return this.index.size();
  }

  // -----------------------------------------------------------------------
  // Records
  // -----------------------------------------------------------------------

  /** A blank record stamped with the current time. */
  newRecord(): KeyRecordType {
    return KeyRecord.newWithClock(this.clock);
  }

  /**
   * Build a record from its required fields and submit it.
   * Without a description one is derived from the domain as given.
   */
  createRecord(account: string, domain: string, key: string, description?: string): void {
    requireIdentity(account, domain, key);

    const record = this.newRecord();
    record.account = account;
    record.domain = normalizeDomain(domain);
    record.key = key;
    record.description = description ? description : `A key for the ${domain} API`;
    this.submitRecord(record);
  }

  /**
   * Add `record` to the store and flush.
   *
   * The domain is normalised in place and the instance itself is indexed, so
   * the caller should not keep mutating it. Records with the same account and
   * domain accumulate in submission order.
   */
  submitRecord(record: KeyRecordType): void {
    requireIdentity(record.account, record.domain, record.key);
    record.domain = normalizeDomain(record.domain);
    if (!record.domain) {
      throw new ValidationError(
        'domain',
        "The 'domain' field has no host part. Must have a domain name.",
      );
    }
    this.ensureWritable();

    this.index.insert(record);
    this.dirty = true;
    record.updated_at = this.clock.timestamp();
    this.flush();
  }

  /**
   * Find records by account and/or domain. Returns copies; changing them
   * does not change the store.
   */
  find(account?: string, domain?: string, includeExpired = false): KeyRecordType[] {
    return this.lookup(account, domain, includeExpired).map((r) => KeyRecord.clone(r));
  }

  /**
   * Rewrite the optional fields of the record matching `patch`.
   *
   * Optional and extra fields absent from the patch are cleared; protected
   * fields in the patch are ignored. Returns `false` if nothing matched.
   */
  update(patch: KeyRecordPatch): boolean {
    const target = this.match(patch, 'update');
    if (target === null) return false;
    this.ensureWritable();

    for (const field of OPTIONAL_FIELDS) {
      target[field] = patch[field] ?? '';
    }
    const patchExtra: Record<string, string> = patch.extra ?? {};
    const extra: Record<string, string> = {};
    for (const [field, value] of Object.entries(patchExtra)) {
      if (isExtraFieldName(field)) extra[field] = value;
    }
    target.extra = extra;

    target.updated_at = this.clock.timestamp();
    this.dirty = true;
    this.flush();
    return true;
  }

  /**
   * Mark the record matching `patch` as expired. Expiring an already expired
   * record succeeds without changing it, but still flushes any change left
   * unsaved by an earlier failed write. Returns `false` if nothing matched.
   */
  expire(patch: KeyRecordPatch): boolean {
    const target = this.match(patch, 'expire');
    if (target === null) return false;
    if (target.expired) {
      this.flush();
      return true;
    }
    this.ensureWritable();

    target.expired = true;
    target.updated_at = this.clock.timestamp();
    this.dirty = true;
    this.flush();
    return true;
  }

  /**
   * Summaries of stored records, expired ones included. With no filter every
   * record is listed, grouped by account.
   */
  list(account?: string, domain?: string): KeyListing[] {
    const records =
      !account && !domain ? this.index.allByAccount() : this.lookup(account, domain, true);
    return records.map((r) => KeyRecord.summary(r));
  }

  /** Copies of every record in key-file order. */
  all(): KeyRecordType[] {
    return this.index.allByDomain().map((r) => KeyRecord.clone(r));
  }

  // -----------------------------------------------------------------------
  // Persistence
  // -----------------------------------------------------------------------

  /**
   * Replace the in-memory records with the key file's contents.
   *
   * Refuses to run over unsaved changes. On failure the store is left empty
   * and the status records why.
   */
  load(): void {
    if (this.dirty) {
      throw new PersistenceError(
        'unsaved',
        this.file.location,
        'There are changes that have not been written to the key file.',
      );
    }

    this.index.clear();
    let records: KeyRecordType[];
    try {
      records = this.readRecords();
    } catch (e: unknown) {
      if (e instanceof PersistenceError) {
        this._status = e.kind === 'missing' ? { state: 'missing' } : { state: 'failed', error: e };
      }
      throw e;
    }

    for (const record of records) {
      this.index.insert(record);
    }
    this._status = { state: 'open' };
  }

  /** Write every record to the key file if there are unsaved changes. */
  flush(): void {
    if (!this.dirty) return;
    this.ensureWritable();

    this.file.write(this.index.allByDomain().map((r) => KeyRecord.toJSON(r)));
    this.dirty = false;
    if (this._status.state === 'missing') {
      this._status = { state: 'open' };
    }
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private lookup(
    account: string | undefined,
    rawDomain: string | undefined,
    includeExpired: boolean,
  ): KeyRecordType[] {
    const domain = rawDomain ? normalizeDomain(rawDomain) : '';
    let found: KeyRecordType[] = [];

    if (account && this.index.hasAccount(account)) {
      found = domain ? this.index.forPair(account, domain) : this.index.forAccount(account);
    } else if (domain) {
      found = this.index.forDomain(domain);
    }

    return includeExpired ? found : found.filter((r) => !r.expired);
  }

  private match(patch: KeyRecordPatch, action: 'update' | 'expire'): KeyRecordType | null {
    const account = patch.account ?? '';
    const domain = normalizeDomain(patch.domain ?? '');
    if (!account && !domain) {
      throw new ValidationError(
        'account',
        `Cannot ${action} a key without either an account or a domain.`,
      );
    }
    const key = patch.key ?? '';
    if (!key) {
      throw new ValidationError(
        'key',
        `The 'key' field was empty. Cannot ${action} a key without the key.`,
      );
    }

    const candidates = this.lookup(account, domain, true);
    return candidates.find((r) => r.key === key) ?? null;
  }

  private ensureWritable(): void {
    const { state } = this._status;
    if (state === 'open' || state === 'missing') return;
    throw new PersistenceError(
      'not-loaded',
      this.file.location,
      state === 'failed'
        ? `Refusing to overwrite key file ${this.file.location}, which failed to load.`
        : `Key file ${this.file.location} has not been loaded.`,
    );
  }

  private readRecords(): KeyRecordType[] {
    const raw = this.file.read();
    const records: KeyRecordType[] = [];

    for (const [i, entry] of raw.entries()) {
      let record: KeyRecordType;
      try {
        record = KeyRecord.fromJSON(entry);
        requireIdentity(record.account, record.domain, record.key);
      } catch (e: unknown) {
        if (e instanceof KeyRecordShapeError || e instanceof ValidationError) {
          throw new PersistenceError(
            'malformed',
            this.file.location,
            `Record ${i} in ${this.file.location}: ${e.message}`,
            { cause: e },
          );
        }
        throw e;
      }
      record.domain = normalizeDomain(record.domain);
      if (!record.domain) {
        throw new PersistenceError(
          'malformed',
          this.file.location,
          `Record ${i} in ${this.file.location}: domain has no host part`,
        );
      }
      records.push(record);
    }
    return records;
  }
}
