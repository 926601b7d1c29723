/**
 * Mutation commands for the CLI.
 *
 * Each function takes a RecordStore and returns plain result objects.
 * Validation and persistence errors are returned as
 * `{ success: false, error }`, NOT thrown, so the CLI can render them as
 * JSON. A key that matched nothing is a success with a negative result.
 */

import { PersistenceError, ValidationError } from '../errors.js';
import { normalizeDomain } from '../models/domain.js';
import { isExtraFieldName, isOptionalField, isProtectedField } from '../models/key-record.js';
import { type RecordStore } from '../store/record-store.js';
import { type AddOutput, type ErrorOutput, type ExpireOutput, type SetOutput } from './types.js';

/** Identifies one stored key: its value plus its account and/or domain. */
export interface KeyTarget {
  account?: string;
  domain?: string;
  key: string;
}

export interface AddKeyInput {
  account: string;
  domain: string;
  key: string;
  description?: string;
}

function failure(err: unknown): ErrorOutput {
  if (err instanceof ValidationError || err instanceof PersistenceError) {
    return { success: false, error: err.message };
  }
  throw err;
}

// ---------------------------------------------------------------------------
// addKey
// ---------------------------------------------------------------------------

/**
 * Store a new key. Without a description one is derived from the domain.
 */
export function addKey(store: RecordStore, input: AddKeyInput): AddOutput | ErrorOutput {
  try {
    store.createRecord(input.account, input.domain, input.key, input.description);
  } catch (err) {
    return failure(err);
  }

  // The new record is the last one stored under its pair.
  const domain = normalizeDomain(input.domain);
  const stored = store.find(input.account, domain, true);
  const created = stored[stored.length - 1];
  return {
    success: true,
    key: {
      account: input.account,
      domain,
      description: created?.description ?? '',
    },
  };
}

// ---------------------------------------------------------------------------
// setField
// ---------------------------------------------------------------------------

/**
 * Set, clear or remove one field of a stored key.
 *
 * An empty `value` clears an optional field (`organization`, `mnemonic`,
 * `description`) and removes any other field. Protected fields cannot be set.
 */
export function setField(
  store: RecordStore,
  target: KeyTarget,
  field: string,
  value = '',
): SetOutput | ErrorOutput {
  const name = field.trim();
  if (name === '') {
    return { success: false, error: 'A field name is required.' };
  }
  if (isProtectedField(name)) {
    return {
      success: false,
      error: `The field '${name}' is a protected field with a value managed by the store.`,
    };
  }
  if (!isOptionalField(name) && !isExtraFieldName(name)) {
    return { success: false, error: `The name '${name}' cannot be used as a field name.` };
  }

  try {
    const record = store
      .find(target.account, target.domain, true)
      .find((r) => r.key === target.key);
    if (record === undefined) {
      // Same lookup as find: this validates the target and matches nothing.
      return { success: true, updated: store.update({ ...target }) };
    }

    if (isOptionalField(name)) {
      record[name] = value;
    } else if (value === '') {
      delete record.extra[name];
    } else {
      record.extra[name] = value;
    }
    return { success: true, updated: store.update(record) };
  } catch (err) {
    return failure(err);
  }
}

// ---------------------------------------------------------------------------
// expireKey
// ---------------------------------------------------------------------------

/**
 * Mark a stored key as expired.
 */
export function expireKey(store: RecordStore, target: KeyTarget): ExpireOutput | ErrorOutput {
  try {
    return { success: true, expired: store.expire({ ...target }) };
  } catch (err) {
    return failure(err);
  }
}
