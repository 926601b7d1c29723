import { type Clock, SystemClock } from '../clock.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * One stored credential.
 *
 * `key`, `account` and `domain` identify the record and never change once it
 * has been submitted. Optional string fields are `""` when unset.
 */
export interface KeyRecordType {
  key: string;
  account: string;
  domain: string;
  organization: string;
  mnemonic: string;
  description: string;
  created_at: string;
  updated_at: string;
  expired: boolean;
  /** Caller-defined fields, stored flat alongside the core fields. */
  extra: Record<string, string>;
}

/**
 * Partial record handed to update/expire.
 *
 * `key` plus `account` and/or `domain` select the stored record. Protected
 * fields may be present (e.g. a record obtained from `find`) but are ignored.
 */
export type KeyRecordPatch = Partial<KeyRecordType>;

/** Summary row produced by listing. */
export interface KeyListing {
  account: string;
  domain: string;
  description: string;
  expired: boolean;
}

export const OPTIONAL_FIELDS = ['organization', 'mnemonic', 'description'] as const;
export type OptionalField = (typeof OPTIONAL_FIELDS)[number];

export const PROTECTED_FIELDS = [
  'expired',
  'account',
  'domain',
  'key',
  'created_at',
  'updated_at',
] as const;
export type ProtectedField = (typeof PROTECTED_FIELDS)[number];

const OPTIONAL_SET: ReadonlySet<string> = new Set<string>(OPTIONAL_FIELDS);
const PROTECTED_SET: ReadonlySet<string> = new Set<string>(PROTECTED_FIELDS);

// Assigning this name on a plain object replaces its prototype.
const RESERVED_NAME = '__proto__';

export function isOptionalField(field: string): field is OptionalField {
  return OPTIONAL_SET.has(field);
}

export function isProtectedField(field: string): field is ProtectedField {
  return PROTECTED_SET.has(field);
}

/** Whether `field` can be used as a caller-defined extra field name. */
export function isExtraFieldName(field: string): boolean {
  return (
    field !== '' &&
    field !== RESERVED_NAME &&
    !OPTIONAL_SET.has(field) &&
    !PROTECTED_SET.has(field)
  );
}

// ---------------------------------------------------------------------------
// JSON types
// ---------------------------------------------------------------------------

/**
 * On-disk shape: the core fields followed by any extra fields, flat.
 */
export type KeyRecordJSON = {
  key: string;
  account: string;
  domain: string;
  organization: string;
  mnemonic: string;
  description: string;
  created_at: string;
  updated_at: string;
  expired: boolean;
} & Record<string, string | boolean>;

/** Thrown by {@link KeyRecord.fromJSON} when a value is not a record. */
export class KeyRecordShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'KeyRecordShapeError';
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(obj: Record<string, unknown>, field: string): string {
  const value = obj[field];
  if (value === undefined || value === null) return '';
  if (typeof value !== 'string') {
    throw new KeyRecordShapeError(`field '${field}' must be a string`);
  }
  return value;
}

// ---------------------------------------------------------------------------
// KeyRecord namespace (factory functions + serialization)
// ---------------------------------------------------------------------------

export const KeyRecord = {
  /**
   * Create a blank record stamped with the current time.
   */
  new(): KeyRecordType {
    return KeyRecord.newWithClock(new SystemClock());
  },

  /**
   * Create a blank record using an injectable clock.
   */
  newWithClock(clock: Clock): KeyRecordType {
    return {
      key: '',
      account: '',
      domain: '',
      organization: '',
      mnemonic: '',
      description: '',
      created_at: clock.timestamp(),
      updated_at: '',
      expired: false,
      extra: {},
    };
  },

  /** Deep copy; the result shares nothing with `record`. */
  clone(record: KeyRecordType): KeyRecordType {
    return { ...record, extra: { ...record.extra } };
  },

  /** Listing projection of a record. */
  summary(record: KeyRecordType): KeyListing {
    return {
      account: record.account,
      domain: record.domain,
      description: record.description,
      expired: record.expired,
    };
  },

  /**
   * Serialize to the flat on-disk object. Core fields come first, extra
   * fields after them in insertion order.
   */
  toJSON(record: KeyRecordType): KeyRecordJSON {
    const json: KeyRecordJSON = {
      key: record.key,
      account: record.account,
      domain: record.domain,
      organization: record.organization,
      mnemonic: record.mnemonic,
      description: record.description,
      created_at: record.created_at,
      updated_at: record.updated_at,
      expired: record.expired,
    };
    for (const [field, value] of Object.entries(record.extra)) {
      if (isExtraFieldName(field)) json[field] = value;
    }
    return json;
  },

  /**
   * Parse one on-disk record.
   *
   * Missing optional strings and timestamps default to `""`, a missing
   * `expired` to `false`. Unknown string properties become extra fields;
   * `__proto__` is refused. Required fields are not checked here; the store
   * validates them.
   */
  fromJSON(value: unknown): KeyRecordType {
    if (!isPlainObject(value)) {
      throw new KeyRecordShapeError('record must be a JSON object');
    }

    const expired = value.expired ?? false;
    if (typeof expired !== 'boolean') {
      throw new KeyRecordShapeError("field 'expired' must be a boolean");
    }

    const extra: Record<string, string> = {};
    for (const [field, fieldValue] of Object.entries(value)) {
      if (field === RESERVED_NAME) {
        throw new KeyRecordShapeError(`field '${field}' cannot be stored`);
      }
      if (!isExtraFieldName(field)) continue;
      if (typeof fieldValue !== 'string') {
        throw new KeyRecordShapeError(`extra field '${field}' must be a string`);
      }
      extra[field] = fieldValue;
    }

    return {
      key: readString(value, 'key'),
      account: readString(value, 'account'),
      domain: readString(value, 'domain'),
      organization: readString(value, 'organization'),
      mnemonic: readString(value, 'mnemonic'),
      description: readString(value, 'description'),
      created_at: readString(value, 'created_at'),
      updated_at: readString(value, 'updated_at'),
      expired,
      extra,
    };
  },
};
