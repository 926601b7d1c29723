import { describe, expect, it } from 'vitest';
import path from 'node:path';
import {
  ConfigError,
  DEFAULT_CONFIG,
  DEFAULT_KEY_DIR_NAME,
  parseConfig,
  resolveKeyDir,
} from './config.js';
import type { Config } from './config.js';

describe('DEFAULT_CONFIG', () => {
  it('has no key_dir', () => {
    expect(DEFAULT_CONFIG.key_dir).toBeUndefined();
  });

  it('uses access_keys.json as the key file', () => {
    expect(DEFAULT_CONFIG.key_file).toBe('access_keys.json');
  });
});

describe('parseConfig', () => {
  it('returns defaults for empty string', () => {
    expect(parseConfig('')).toEqual({ key_file: 'access_keys.json' });
  });

  it('parses key_dir and key_file', () => {
    const config = parseConfig(`
key_dir = "~/secrets"
key_file = "keys.json"
`);
    expect(config).toEqual({ key_dir: '~/secrets', key_file: 'keys.json' });
  });

  it('ignores wrongly typed values', () => {
    const config = parseConfig(`
key_dir = 42
key_file = true
`);
    expect(config).toEqual({ key_file: 'access_keys.json' });
  });

  it('ignores blank strings', () => {
    expect(parseConfig('key_dir = "  "\nkey_file = ""')).toEqual({ key_file: 'access_keys.json' });
  });

  it('rejects a key_file with a directory part', () => {
    expect(() => parseConfig('key_file = "../keys.json"')).toThrow(ConfigError);
    expect(() => parseConfig('key_file = ".."')).toThrow(
      'Invalid key_file "..": must be a file name',
    );
  });

  it('throws on invalid TOML', () => {
    expect(() => parseConfig('key_dir = ')).toThrow();
  });
});

describe('resolveKeyDir', () => {
  const home = path.join(path.sep, 'home', 'alice');
  const configDir = path.join(path.sep, 'etc', 'apikeys');

  function withDir(key_dir?: string): Config {
    return { key_dir, key_file: 'access_keys.json' };
  }

  it('defaults to a hidden directory under home', () => {
    expect(resolveKeyDir(withDir(), configDir, home)).toBe(path.join(home, DEFAULT_KEY_DIR_NAME));
  });

  it('expands ~', () => {
    expect(resolveKeyDir(withDir('~'), configDir, home)).toBe(home);
    expect(resolveKeyDir(withDir('~/keys'), configDir, home)).toBe(path.join(home, 'keys'));
  });

  it('keeps absolute paths', () => {
    const abs = path.join(path.sep, 'var', 'keys');
    expect(resolveKeyDir(withDir(abs), configDir, home)).toBe(abs);
  });

  it('resolves relative paths against the config directory', () => {
    expect(resolveKeyDir(withDir('keys'), configDir, home)).toBe(path.join(configDir, 'keys'));
  });
});
