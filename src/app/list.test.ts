import { describe, it, expect } from 'vitest';
import { MemoryKeyFile } from '../storage/memory.js';
import { FixedClock } from '../clock.js';
import { RecordStore } from '../store/record-store.js';
import { storeStatus, listKeys, findKeys } from './list.js';

function makeStore(file = new MemoryKeyFile()): RecordStore {
  return RecordStore.open(file, { clock: new FixedClock(new Date(2024, 5, 1, 12, 0, 0)) });
}

describe('storeStatus', () => {
  it('reports a missing key file', () => {
    expect(storeStatus(makeStore())).toEqual({
      key_file: 'memory://keys',
      status: 'missing',
      records: 0,
    });
  });

  it('reports the record count once written', () => {
    const store = makeStore();
    store.createRecord('alice', 'a.io', 'k1');
    store.createRecord('bob', 'b.io', 'k2');
    expect(storeStatus(store)).toEqual({ key_file: 'memory://keys', status: 'open', records: 2 });
  });

  it('includes the load error for a corrupt key file', () => {
    const store = makeStore(MemoryKeyFile.withContent('{}'));
    expect(storeStatus(store)).toEqual({
      key_file: 'memory://keys',
      status: 'failed',
      records: 0,
      error: 'Key file memory://keys must contain a JSON array of records',
    });
  });
});

describe('listKeys', () => {
  it('lists summaries without key values', () => {
    const store = makeStore();
    store.createRecord('alice', 'a.io', 'test-secret', 'alpha');

    expect(listKeys(store)).toEqual({
      keys: [{ account: 'alice', domain: 'a.io', description: 'alpha', expired: false }],
    });
  });

  it('applies filters', () => {
    const store = makeStore();
    store.createRecord('alice', 'a.io', 'k1');
    store.createRecord('bob', 'b.io', 'k2');

    expect(listKeys(store, { account: 'bob' })).toEqual({
      keys: [
        { account: 'bob', domain: 'b.io', description: 'A key for the b.io API', expired: false },
      ],
    });
    expect(listKeys(store, { domain: 'A.io' })).toMatchObject({ keys: [{ account: 'alice' }] });
  });

  it('reports a key file that failed to load instead of an empty list', () => {
    const store = makeStore(MemoryKeyFile.withContent('[1,'));
    const result = listKeys(store);
    expect(result).toMatchObject({ success: false });
    expect(result).not.toHaveProperty('keys');
  });
});

describe('findKeys', () => {
  it('returns full records in the key file shape', () => {
    const store = makeStore();
    store.createRecord('alice', 'a.io', 'test-secret', 'alpha');
    const [record] = store.find('alice');
    record.extra.region = 'eu';
    store.update(record);

    expect(findKeys(store, { account: 'alice' })).toEqual({
      keys: [
        {
          key: 'test-secret',
          account: 'alice',
          domain: 'a.io',
          organization: '',
          mnemonic: '',
          description: 'alpha',
          created_at: '2024-06-01 12:00:00',
          updated_at: '2024-06-01 12:00:00',
          expired: false,
          region: 'eu',
        },
      ],
    });
  });

  it('includes expired keys only when asked', () => {
    const store = makeStore();
    store.createRecord('alice', 'a.io', 'k1');
    store.expire({ account: 'alice', key: 'k1' });

    expect(findKeys(store, { account: 'alice' })).toEqual({ keys: [] });
    expect(findKeys(store, { account: 'alice', includeExpired: true })).toMatchObject({
      keys: [{ key: 'k1', expired: true }],
    });
  });

  it('reports a key file that failed to load', () => {
    const store = makeStore(MemoryKeyFile.withContent('{}'));
    expect(findKeys(store, { account: 'alice' })).toEqual({
      success: false,
      error: 'Key file memory://keys must contain a JSON array of records',
    });
  });
});
