#!/usr/bin/env node
import path from 'node:path';
import { Command } from 'commander';

// App layer
import { loadConfig, configOutput } from '../app/config.js';
import { storeStatus, listKeys, findKeys } from '../app/list.js';
import { addKey, setField, expireKey } from '../app/mutations.js';

// Library
import { JsonKeyFile } from '../storage/json-file.js';
import { RecordStore } from '../store/record-store.js';
import { errorMessage } from '../errors.js';

// ---------------------------------------------------------------------------
// Helper
// ---------------------------------------------------------------------------

function isFailure(result: unknown): boolean {
  return (
    typeof result === 'object' &&
    result !== null &&
    'success' in result &&
    result.success === false
  );
}

async function run(fn: () => Promise<unknown>): Promise<void> {
  try {
    const result = await fn();
    console.log(JSON.stringify(result, null, 2));
    if (isFailure(result)) process.exitCode = 1;
  } catch (err) {
    console.log(JSON.stringify({ success: false, error: errorMessage(err) }, null, 2));
    process.exitCode = 1;
  }
}

async function runWithStore(fn: (store: RecordStore) => unknown): Promise<void> {
  await run(async () => {
    const cfg = await loadConfig(program.opts<{ config?: string }>().config);
    const store = RecordStore.open(new JsonKeyFile(cfg.config.key_dir, cfg.config.key_file));
    return fn(store);
  });
}

interface TargetOpts {
  account?: string;
  domain?: string;
  key: string;
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name('apikeys')
  .description('Keep API keys in a local key file instead of in code')
  .version('0.1.0')
  .option('-c, --config <path>', 'path to config file');

// ---------------------------------------------------------------------------
// config / status
// ---------------------------------------------------------------------------

program
  .command('config')
  .description('Print configuration as JSON')
  .action(async () => {
    await run(async () => {
      const cfg = await loadConfig(program.opts<{ config?: string }>().config);
      return configOutput(cfg.configPath, cfg.config);
    });
  });

program
  .command('status')
  .description('Show whether the key file was found and loaded')
  .action(async () => {
    await runWithStore((store) => storeStatus(store));
  });

// ---------------------------------------------------------------------------
// list / find
// ---------------------------------------------------------------------------

program
  .command('list')
  .description('List stored keys without their values')
  .option('--account <name>', 'only keys of this account')
  .option('--domain <domain>', 'only keys for this domain')
  .action(async (opts: { account?: string; domain?: string }) => {
    await runWithStore((store) => listKeys(store, opts));
  });

program
  .command('find')
  .description('Print full key records, including the key values')
  .option('--account <name>', 'account the key belongs to')
  .option('--domain <domain>', 'domain or URL of the API')
  .option('--all', 'include expired keys', false)
  .action(async (opts: { account?: string; domain?: string; all: boolean }) => {
    await runWithStore((store) =>
      findKeys(store, { account: opts.account, domain: opts.domain, includeExpired: opts.all }),
    );
  });

// ---------------------------------------------------------------------------
// add / set / expire
// ---------------------------------------------------------------------------

program
  .command('add')
  .description('Store a new key')
  .requiredOption('--account <name>', 'account the key belongs to')
  .requiredOption('--domain <domain>', 'domain or URL of the API')
  .requiredOption('--key <key>', 'the key value')
  .option('--description <text>', 'what the key is for')
  .action(
    async (opts: { account: string; domain: string; key: string; description?: string }) => {
      await runWithStore((store) => addKey(store, opts));
    },
  );

program
  .command('set <field> [value]')
  .description('Set a field of a stored key; without a value the field is cleared')
  .requiredOption('--key <key>', 'the key value')
  .option('--account <name>', 'account the key belongs to')
  .option('--domain <domain>', 'domain or URL of the API')
  .action(async (field: string, value: string | undefined, opts: TargetOpts) => {
    await runWithStore((store) => setField(store, opts, field, value));
  });

program
  .command('expire')
  .description('Mark a stored key as expired')
  .requiredOption('--key <key>', 'the key value')
  .option('--account <name>', 'account the key belongs to')
  .option('--domain <domain>', 'domain or URL of the API')
  .action(async (opts: TargetOpts) => {
    await runWithStore((store) => expireKey(store, opts));
  });

// ---------------------------------------------------------------------------
// Parse and execute
// ---------------------------------------------------------------------------

program.addHelpText(
  'after',
  `\nThe key file defaults to ${path.join('~', '.apikey_manager', 'access_keys.json')}.`,
);

await program.parseAsync(process.argv);
