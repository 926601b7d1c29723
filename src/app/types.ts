/**
 * Output types for the CLI.
 *
 * Field names use snake_case, like the key file. These interfaces describe
 * the JSON shapes produced by CLI commands.
 */

import { type KeyListing, type KeyRecordJSON } from '../models/key-record.js';
import { type StoreStatus } from '../store/record-store.js';

/** Failure reported to the user instead of thrown. */
export interface ErrorOutput {
  success: false;
  error: string;
}

export interface StatusOutput {
  key_file: string;
  status: StoreStatus['state'];
  records: number;
  error?: string;
}

export interface ListOutput {
  keys: KeyListing[];
}

export interface FindOutput {
  keys: KeyRecordJSON[];
}

export interface AddOutput {
  success: true;
  key: {
    account: string;
    domain: string;
    description: string;
  };
}

/** `updated: false` means no stored key matched; it is not an error. */
export interface SetOutput {
  success: true;
  updated: boolean;
}

/** `expired: false` means no stored key matched; it is not an error. */
export interface ExpireOutput {
  success: true;
  expired: boolean;
}
