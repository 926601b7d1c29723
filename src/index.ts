/**
 * apikeys — local, file-backed API key store.
 *
 * Re-exports all public API surface from a single entry point.
 */

// ---------------------------------------------------------------------------
// Core utilities
// ---------------------------------------------------------------------------

export { type Clock, SystemClock, FixedClock, formatTimestamp } from './clock.js';
export {
  type Config,
  type ResolvedConfig,
  ConfigError,
  parseConfig,
  resolveKeyDir,
  DEFAULT_CONFIG,
  DEFAULT_KEY_DIR_NAME,
} from './config.js';
export {
  ValidationError,
  PersistenceError,
  type PersistenceErrorKind,
} from './errors.js';

// ---------------------------------------------------------------------------
// Models
// ---------------------------------------------------------------------------

export { normalizeDomain } from './models/domain.js';
export {
  KeyRecord,
  KeyRecordShapeError,
  type KeyRecordType,
  type KeyRecordPatch,
  type KeyRecordJSON,
  type KeyListing,
  OPTIONAL_FIELDS,
  PROTECTED_FIELDS,
  isOptionalField,
  isProtectedField,
  isExtraFieldName,
} from './models/key-record.js';

// ---------------------------------------------------------------------------
// Storage
// ---------------------------------------------------------------------------

export { type KeyFile } from './storage/storage.js';
export { JsonKeyFile, DEFAULT_KEY_FILE } from './storage/json-file.js';
export { MemoryKeyFile } from './storage/memory.js';

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export { KeyIndex, type IndexSlot } from './store/key-index.js';
export {
  RecordStore,
  type RecordStoreOptions,
  type StoreStatus,
} from './store/record-store.js';
