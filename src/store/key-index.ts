import { type KeyRecordType } from '../models/key-record.js';

type Nested = Map<string, Map<string, KeyRecordType[]>>;

/** One (account, domain) slot and the records stored under it. */
export interface IndexSlot {
  account: string;
  domain: string;
  records: readonly KeyRecordType[];
}

function appendTo(map: Nested, outer: string, inner: string, record: KeyRecordType): void {
  let innerMap = map.get(outer);
  if (innerMap === undefined) {
    innerMap = new Map();
    map.set(outer, innerMap);
  }
  const list = innerMap.get(inner);
  if (list !== undefined) {
    list.push(record);
  } else {
    innerMap.set(inner, [record]);
  }
}

function flatten(map: Map<string, KeyRecordType[]>): KeyRecordType[] {
  return Array.from(map.values()).flat();
}

/**
 * Two views over the same record objects: account → domain → records and
 * domain → account → records.
 *
 * Records are stored by reference, never copied, so a change made through
 * one view is visible through the other. Every level keeps insertion order.
 * Domains must already be in canonical form.
 */
export class KeyIndex {
  private readonly byAccount: Nested = new Map();
  private readonly byDomain: Nested = new Map();

  /** Append `record` under its (account, domain) pair in both views. */
  insert(record: KeyRecordType): void {
    appendTo(this.byAccount, record.account, record.domain, record);
    appendTo(this.byDomain, record.domain, record.account, record);
  }

  clear(): void {
    this.byAccount.clear();
    this.byDomain.clear();
  }

  /** Total number of stored records. */
  size(): number {
    let n = 0;
    for (const domains of this.byAccount.values()) {
      for (const list of domains.values()) n += list.length;
    }
    return n;
  }

  hasAccount(account: string): boolean {
    return this.byAccount.has(account);
  }

  /** Records of one (account, domain) pair, live. */
  forPair(account: string, domain: string): KeyRecordType[] {
    return [...(this.byAccount.get(account)?.get(domain) ?? [])];
  }

  /** All records of an account across its domains, in domain insertion order. */
  forAccount(account: string): KeyRecordType[] {
    const domains = this.byAccount.get(account);
    return domains === undefined ? [] : flatten(domains);
  }

  /** All records of a domain across its accounts, in account insertion order. */
  forDomain(domain: string): KeyRecordType[] {
    const accounts = this.byDomain.get(domain);
    return accounts === undefined ? [] : flatten(accounts);
  }

  /** Every record, grouped account then domain. */
  allByAccount(): KeyRecordType[] {
    return Array.from(this.byAccount.values()).flatMap(flatten);
  }

  /** Every record, grouped domain then account. This is the on-disk order. */
  allByDomain(): KeyRecordType[] {
    return Array.from(this.byDomain.values()).flatMap(flatten);
  }

  /** The slots of the by-account view. */
  slotsByAccount(): IndexSlot[] {
    const slots: IndexSlot[] = [];
    for (const [account, domains] of this.byAccount) {
      for (const [domain, records] of domains) slots.push({ account, domain, records });
    }
    return slots;
  }

  /** The slots of the by-domain view. */
  slotsByDomain(): IndexSlot[] {
    const slots: IndexSlot[] = [];
    for (const [domain, accounts] of this.byDomain) {
      for (const [account, records] of accounts) slots.push({ account, domain, records });
    }
    return slots;
  }

  /**
   * Whether both views hold the same record objects, in the same order, under
   * every (account, domain) pair, and each record sits under its own pair.
   */
  isConsistent(): boolean {
    const byAccount = this.slotsByAccount();
    const byDomain = this.slotsByDomain();
    if (byAccount.length !== byDomain.length) return false;

    for (const slot of byAccount) {
      const other = this.byDomain.get(slot.domain)?.get(slot.account);
      if (other === undefined || other.length !== slot.records.length) return false;
      for (let i = 0; i < other.length; i++) {
        const record = slot.records[i];
        if (other[i] !== record) return false;
        if (record.account !== slot.account || record.domain !== slot.domain) return false;
      }
    }
    return true;
  }
}
