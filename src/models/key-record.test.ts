import { describe, it, expect } from 'vitest';
import {
  KeyRecord,
  KeyRecordShapeError,
  isExtraFieldName,
  isOptionalField,
  isProtectedField,
} from './key-record.js';
import { FixedClock } from '../clock.js';

const clock = new FixedClock(new Date(2024, 5, 15, 12, 0, 0));

describe('KeyRecord.newWithClock', () => {
  it('creates a blank live record with only created_at set', () => {
    expect(KeyRecord.newWithClock(clock)).toEqual({
      key: '',
      account: '',
      domain: '',
      organization: '',
      mnemonic: '',
      description: '',
      created_at: '2024-06-15 12:00:00',
      updated_at: '',
      expired: false,
      extra: {},
    });
  });
});

describe('KeyRecord.new', () => {
  it('stamps created_at from the system clock', () => {
    const record = KeyRecord.new();
    expect(record.created_at).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
    expect(record.expired).toBe(false);
  });
});

describe('KeyRecord.clone', () => {
  it('copies the extra map', () => {
    const record = KeyRecord.newWithClock(clock);
    record.extra.region = 'eu';
    const copy = KeyRecord.clone(record);
    copy.extra.region = 'us';
    copy.description = 'changed';
    expect(record.extra.region).toBe('eu');
    expect(record.description).toBe('');
  });
});

describe('field classification', () => {
  it('recognises optional and protected fields', () => {
    expect(isOptionalField('mnemonic')).toBe(true);
    expect(isOptionalField('key')).toBe(false);
    expect(isProtectedField('created_at')).toBe(true);
    expect(isProtectedField('description')).toBe(false);
  });

  it('rejects core and empty names as extra fields', () => {
    expect(isExtraFieldName('region')).toBe(true);
    expect(isExtraFieldName('description')).toBe(false);
    expect(isExtraFieldName('expired')).toBe(false);
    expect(isExtraFieldName('')).toBe(false);
    expect(isExtraFieldName('__proto__')).toBe(false);
  });
});

describe('KeyRecord JSON', () => {
  it('toJSON flattens extra fields after the core fields', () => {
    const record = KeyRecord.newWithClock(clock);
    record.key = 'test-secret';
    record.account = 'alice';
    record.domain = 'api.example.com';
    record.extra.region = 'eu';

    const json = KeyRecord.toJSON(record);
    expect(Object.keys(json)).toEqual([
      'key',
      'account',
      'domain',
      'organization',
      'mnemonic',
      'description',
      'created_at',
      'updated_at',
      'expired',
      'region',
    ]);
    expect(json.region).toBe('eu');
    expect(json.expired).toBe(false);
  });

  it('fromJSON fills defaults for absent optional fields', () => {
    const record = KeyRecord.fromJSON({ key: 'k', account: 'a', domain: 'd' });
    expect(record).toEqual({
      key: 'k',
      account: 'a',
      domain: 'd',
      organization: '',
      mnemonic: '',
      description: '',
      created_at: '',
      updated_at: '',
      expired: false,
      extra: {},
    });
  });

  it('fromJSON collects unknown string properties as extra fields', () => {
    const record = KeyRecord.fromJSON({ key: 'k', account: 'a', domain: 'd', tier: 'free' });
    expect(record.extra).toEqual({ tier: 'free' });
  });

  it('fromJSON rejects non-objects', () => {
    expect(() => KeyRecord.fromJSON('nope')).toThrow(KeyRecordShapeError);
    expect(() => KeyRecord.fromJSON(null)).toThrow(KeyRecordShapeError);
    expect(() => KeyRecord.fromJSON([])).toThrow(KeyRecordShapeError);
  });

  it('fromJSON refuses a __proto__ field', () => {
    const parsed: unknown = JSON.parse('{"key": "k", "__proto__": "x"}');
    expect(() => KeyRecord.fromJSON(parsed)).toThrow("field '__proto__' cannot be stored");
  });

  it('fromJSON rejects wrongly typed fields', () => {
    expect(() => KeyRecord.fromJSON({ key: 1 })).toThrow("field 'key' must be a string");
    expect(() => KeyRecord.fromJSON({ expired: 'yes' })).toThrow(
      "field 'expired' must be a boolean",
    );
    expect(() => KeyRecord.fromJSON({ key: 'k', tier: 3 })).toThrow(
      "extra field 'tier' must be a string",
    );
  });

  it('survives a toJSON/fromJSON pass unchanged', () => {
    const record = KeyRecord.newWithClock(clock);
    record.key = 'test-secret';
    record.account = 'alice';
    record.domain = 'api.example.com';
    record.mnemonic = 'work';
    record.expired = true;
    record.extra.region = 'eu';

    const parsed = KeyRecord.fromJSON(JSON.parse(JSON.stringify(KeyRecord.toJSON(record))));
    expect(parsed).toEqual(record);
  });
});
