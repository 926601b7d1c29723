/**
 * Configuration module for apikeys.
 *
 * Parses TOML configuration and provides defaults. The only settings are
 * where the key file lives; everything else is decided by the store.
 */

import path from 'node:path';
import toml from 'toml';
import { DEFAULT_KEY_FILE } from './storage/json-file.js';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface Config {
  /** Directory holding the key file. Absolute, `~`-prefixed, or relative to the config file. */
  key_dir?: string;
  /** Name of the key file inside `key_dir`. */
  key_file: string;
}

export interface ResolvedConfig {
  /** Resolved (absolute) key directory. */
  key_dir: string;
  /** Name of the key file inside `key_dir`. */
  key_file: string;
}

/** Thrown for configuration values that cannot be used. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Hidden directory under the home directory used when `key_dir` is unset. */
export const DEFAULT_KEY_DIR_NAME = '.apikey_manager';

export const DEFAULT_CONFIG: Config = {
  key_dir: undefined,
  key_file: DEFAULT_KEY_FILE,
};

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a TOML configuration string into a `Config`.
 *
 * Missing or wrongly typed fields fall back to defaults. A `key_file` that is
 * not a single path segment is rejected.
 */
export function parseConfig(tomlStr: string): Config {
  // toml.parse throws on invalid TOML; an empty string yields an empty object.
  const parsed: unknown = tomlStr.trim().length === 0 ? {} : toml.parse(tomlStr);
  const raw = isPlainObject(parsed) ? parsed : {};

  const config: Config = { key_file: DEFAULT_CONFIG.key_file };

  if (typeof raw.key_dir === 'string' && raw.key_dir.trim().length > 0) {
    config.key_dir = raw.key_dir.trim();
  }

  if (typeof raw.key_file === 'string' && raw.key_file.trim().length > 0) {
    const name = raw.key_file.trim();
    if (name === '.' || name === '..' || name.includes('/') || name.includes('\\')) {
      throw new ConfigError(`Invalid key_file ${JSON.stringify(name)}: must be a file name`);
    }
    config.key_file = name;
  }

  return config;
}

// ---------------------------------------------------------------------------
// Path resolution
// ---------------------------------------------------------------------------

/**
 * Resolve the key directory for a config.
 *
 * - Unset: `<homeDir>/.apikey_manager`.
 * - `~` or `~/...`: expanded against `homeDir`.
 * - Absolute: returned as is.
 * - Relative: joined with `configDir`.
 */
export function resolveKeyDir(config: Config, configDir: string, homeDir: string): string {
  const keyDir = config.key_dir;
  if (keyDir == null) {
    return path.join(homeDir, DEFAULT_KEY_DIR_NAME);
  }
  if (keyDir === '~') {
    return homeDir;
  }
  if (keyDir.startsWith('~/')) {
    return path.join(homeDir, keyDir.slice(2));
  }
  if (path.isAbsolute(keyDir)) {
    return keyDir;
  }
  return path.join(configDir, keyDir);
}
