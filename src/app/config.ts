/**
 * CLI-specific config loading utilities.
 *
 * Wraps the library-level config parsing (`../config.js`) with file-system
 * awareness: locating the config file, reading TOML, resolving the key
 * directory, and producing the JSON output shape of the `config` command.
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

import { type Config, type ResolvedConfig, parseConfig, resolveKeyDir, DEFAULT_CONFIG } from '../config.js';

/** Environment variable that overrides the configured key directory. */
export const KEY_DIR_ENV = 'APIKEYS_DIR';

const CONFIG_FILE_NAME = 'apikeys.toml';

// ---------------------------------------------------------------------------
// Default config path discovery
// ---------------------------------------------------------------------------

/**
 * Determine the default configuration file path.
 *
 * Resolution order:
 * 1. `./apikeys.toml` if it exists in `cwd`.
 * 2. `$XDG_CONFIG_HOME/apikeys/apikeys.toml` (or `~/.config/apikeys/apikeys.toml`
 *    when `XDG_CONFIG_HOME` is not set), whether or not it exists.
 */
export function defaultConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  const localConfig = path.resolve(cwd, CONFIG_FILE_NAME);
  if (fs.existsSync(localConfig)) {
    return localConfig;
  }

  const xdgConfigHome = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(xdgConfigHome, 'apikeys', CONFIG_FILE_NAME);
}

// ---------------------------------------------------------------------------
// Config loading
// ---------------------------------------------------------------------------

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  homeDir?: string;
}

/**
 * Load and resolve the apikeys configuration.
 *
 * @param configPath - Explicit path to a TOML config file. When omitted the
 *   result of {@link defaultConfigPath} is used.
 * @returns The resolved path that was used and the fully-resolved config.
 *   A config file that does not exist yields the defaults.
 */
export async function loadConfig(
  configPath?: string,
  options: LoadConfigOptions = {},
): Promise<{ configPath: string; config: ResolvedConfig }> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const homeDir = options.homeDir ?? os.homedir();

  const resolvedPath = configPath ? path.resolve(cwd, configPath) : defaultConfigPath(env, cwd);

  let parsed: Config = DEFAULT_CONFIG;
  if (fs.existsSync(resolvedPath)) {
    const tomlStr = await fs.promises.readFile(resolvedPath, 'utf-8');
    parsed = parseConfig(tomlStr);
  }

  const override = env[KEY_DIR_ENV];
  const keyDir = override
    ? path.resolve(cwd, override)
    : resolveKeyDir(parsed, path.dirname(resolvedPath), homeDir);

  return {
    configPath: resolvedPath,
    config: { key_dir: keyDir, key_file: parsed.key_file },
  };
}

// ---------------------------------------------------------------------------
// CLI output
// ---------------------------------------------------------------------------

/**
 * Build the JSON-serialisable output object for the `config` CLI command.
 */
export function configOutput(configPath: string, config: ResolvedConfig): object {
  return {
    config_file: configPath,
    key_directory: config.key_dir,
    key_file: path.join(config.key_dir, config.key_file),
  };
}
