/**
 * Read-only commands for the CLI.
 *
 * Each function takes a RecordStore and returns a plain object that can be
 * JSON.stringify'd. Listing never exposes key values; finding does.
 */

import { KeyRecord } from '../models/key-record.js';
import { type RecordStore } from '../store/record-store.js';
import {
  type ErrorOutput,
  type FindOutput,
  type ListOutput,
  type StatusOutput,
} from './types.js';

export interface KeyFilter {
  account?: string;
  domain?: string;
}

/** Where the key file is and whether it loaded. */
export function storeStatus(store: RecordStore): StatusOutput {
  const status = store.status;
  return {
    key_file: store.location,
    status: status.state,
    records: store.size(),
    ...(status.state === 'failed' ? { error: status.error.message } : {}),
  };
}

// A store whose key file failed to load is empty; that must not read as "no keys".
function loadFailure(store: RecordStore): ErrorOutput | null {
  const status = store.status;
  return status.state === 'failed' ? { success: false, error: status.error.message } : null;
}

/** Summaries of stored keys, expired ones included. */
export function listKeys(store: RecordStore, filter: KeyFilter = {}): ListOutput | ErrorOutput {
  return loadFailure(store) ?? { keys: store.list(filter.account, filter.domain) };
}

/**
 * Full records matching the filter, in the key file's flat shape.
 * Expired keys are only included with `includeExpired`.
 */
export function findKeys(
  store: RecordStore,
  filter: KeyFilter & { includeExpired?: boolean },
): FindOutput | ErrorOutput {
  const failed = loadFailure(store);
  if (failed !== null) return failed;
  const records = store.find(filter.account, filter.domain, filter.includeExpired ?? false);
  return { keys: records.map((r) => KeyRecord.toJSON(r)) };
}
